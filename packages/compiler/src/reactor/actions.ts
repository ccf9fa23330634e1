/* =======================================================================================
 * PREREQUISITE / ACTION ENGINE
 * ---------------------------------------------------------------------------------------
 * An action is a deferred computation owned by a statement context: a list of
 * prerequisites plus an `apply` callback. Actions wait until every
 * prerequisite holds, then run exactly once.
 *
 * An unsatisfied action is indexed under the watch key of the first
 * prerequisite it is blocked on:
 *
 *   ns:<partition>:<key>   a namespace lookup that found nothing yet
 *   phase:<context id>     a context that has not completed the required phase
 *
 * A namespace write or a phase completion re-checks exactly the actions
 * watching that key. Actions that became satisfied are queued FIFO; within
 * one notification they are queued in registration order.
 * ======================================================================================= */

import type { CompilerDiagnostic } from "../model/diagnostics.js";
import { phaseIndex, phaseReached, type Phase } from "../model/phase.js";
import type { DiagnosticAccumulator } from "../shared/diagnosed.js";
import { buildDiagnostic, ReactorErrorCode } from "../shared/diagnostics.js";
import { diagnosticAtStage, ReactorError } from "../shared/errors.js";
import { formatLocation } from "../model/source.js";
import { debug } from "../shared/debug.js";
import type { NamespacePartition } from "./namespace.js";
import type { StatementContext } from "./statement-context.js";

// ============================================================================
// Prerequisites
// ============================================================================

/**
 * Handle to a value an action needs. Reading `value` before the engine has
 * resolved it is a programming error.
 */
export interface Prerequisite<V> {
  readonly resolved: boolean;
  readonly value: V;
  /** What is being waited for, e.g. `typedef 'counter'`. */
  readonly description: string;
  /** Partition and key (or phase) that were not satisfied, for diagnostics. */
  readonly missing: Readonly<Record<string, string>>;
}

const nsWatchKey = (partition: string, key: string): string => `ns:${partition}:${key}`;
const phaseWatchKey = (ctx: StatementContext): string => `phase:${ctx.id}`;

abstract class PrerequisiteHandle<V> implements Prerequisite<V> {
  #settled: { readonly value: V } | null = null;

  get resolved(): boolean {
    return this.#settled !== null;
  }

  get value(): V {
    if (!this.#settled) {
      throw new Error(`Prerequisite ${this.description} read before it was resolved`);
    }
    return this.#settled.value;
  }

  abstract readonly description: string;
  abstract readonly missing: Readonly<Record<string, string>>;

  /**
   * Try to satisfy the prerequisite. Returns the watch key to wait on when it
   * does not hold yet, `null` once resolved.
   */
  check(): string | null {
    return this.#settled ? null : this.attempt();
  }

  protected abstract attempt(): string | null;

  protected settle(value: V): null {
    this.#settled = { value };
    return null;
  }
}

class NamespacePrerequisite<K, V> extends PrerequisiteHandle<V> {
  readonly #encoded: string;

  constructor(
    private readonly from: StatementContext,
    private readonly partition: NamespacePartition<K, V>,
    private readonly key: K,
  ) {
    super();
    this.#encoded = partition.encodeKey(key);
  }

  get description(): string {
    return `${this.partition.name} '${this.#encoded}'`;
  }

  get missing(): Readonly<Record<string, string>> {
    return { partition: this.partition.name, key: this.#encoded };
  }

  protected attempt(): string | null {
    const value = this.from.getFromNamespace(this.partition, this.key);
    return value === undefined ? nsWatchKey(this.partition.name, this.#encoded) : this.settle(value);
  }
}

class ContextPrerequisite<K> extends PrerequisiteHandle<StatementContext> {
  readonly #encoded: string;

  constructor(
    private readonly from: StatementContext,
    private readonly partition: NamespacePartition<K, StatementContext>,
    private readonly key: K,
    private readonly phase: Phase,
  ) {
    super();
    this.#encoded = partition.encodeKey(key);
  }

  get description(): string {
    return `${this.partition.name} '${this.#encoded}' at ${this.phase}`;
  }

  get missing(): Readonly<Record<string, string>> {
    return { partition: this.partition.name, key: this.#encoded, phase: this.phase };
  }

  protected attempt(): string | null {
    const target = this.from.getFromNamespace(this.partition, this.key);
    if (target === undefined) return nsWatchKey(this.partition.name, this.#encoded);
    if (!phaseReached(target.completedPhase, this.phase)) return phaseWatchKey(target);
    return this.settle(target);
  }
}

class PhasePrerequisite extends PrerequisiteHandle<StatementContext> {
  constructor(
    private readonly target: StatementContext,
    private readonly phase: Phase,
  ) {
    super();
  }

  get description(): string {
    return `'${this.target.toString()}' at ${this.phase}`;
  }

  get missing(): Readonly<Record<string, string>> {
    return { context: this.target.toString(), phase: this.phase };
  }

  protected attempt(): string | null {
    return phaseReached(this.target.completedPhase, this.phase) ? this.settle(this.target) : phaseWatchKey(this.target);
  }
}

// ============================================================================
// Actions
// ============================================================================

export interface InferenceAction {
  /** Runs once, after every prerequisite resolved. May publish, register actions, or throw a SourceError. */
  apply(): void;
  /**
   * Called when the phase stalled with this action still waiting. Throw a
   * SourceError to replace the default message.
   */
  prerequisiteFailed?(failed: readonly Prerequisite<unknown>[]): void;
}

export type ActionState = "pending" | "applied" | "failed";

interface ActionRecord {
  readonly id: number;
  readonly owner: StatementContext;
  readonly phase: Phase;
  readonly prerequisites: readonly PrerequisiteHandle<unknown>[];
  readonly action: InferenceAction;
  state: ActionState;
}

/**
 * Collects prerequisites for one action. Nothing is scheduled until
 * {@link ActionBuilder.apply} is called.
 */
export class ActionBuilder {
  readonly #prerequisites: PrerequisiteHandle<unknown>[] = [];
  #sealed = false;

  constructor(
    private readonly engine: ActionEngine,
    readonly owner: StatementContext,
    readonly phase: Phase,
  ) {}

  /** Wait until `key` is published in `partition`, looked up from `from` (default: the owner). */
  requires<K, V>(partition: NamespacePartition<K, V>, key: K, options: { from?: StatementContext } = {}): Prerequisite<V> {
    return this.add(new NamespacePrerequisite(options.from ?? this.owner, partition, key));
  }

  /** Wait until a context is published under `key` and has completed `phase`. */
  requiresContext<K>(
    partition: NamespacePartition<K, StatementContext>,
    key: K,
    phase: Phase,
    options: { from?: StatementContext } = {},
  ): Prerequisite<StatementContext> {
    return this.add(new ContextPrerequisite(options.from ?? this.owner, partition, key, phase));
  }

  /** Wait until a known context has completed `phase`. */
  requiresPhase(target: StatementContext, phase: Phase): Prerequisite<StatementContext> {
    return this.add(new PhasePrerequisite(target, phase));
  }

  apply(action: InferenceAction): void {
    if (this.#sealed) throw new Error(`Action of '${this.owner.toString()}' was already applied`);
    this.#sealed = true;
    this.engine.register(this.owner, this.phase, this.#prerequisites, action);
  }

  private add<V>(prerequisite: PrerequisiteHandle<V>): Prerequisite<V> {
    if (this.#sealed) throw new Error(`Action of '${this.owner.toString()}' was already applied`);
    this.#prerequisites.push(prerequisite);
    return prerequisite;
  }
}

export interface ActionEngineStats {
  readonly registered: number;
  readonly applied: number;
  readonly failed: number;
}

export class ActionEngine {
  readonly #actions: ActionRecord[] = [];
  readonly #byOwner = new Map<number, ActionRecord[]>();
  readonly #waiting = new Map<string, ActionRecord[]>();
  readonly #ready: ActionRecord[] = [];
  readonly #pending = new Map<Phase, number>();
  #applied = 0;
  #failed = 0;

  constructor(
    private readonly diagnostics: DiagnosticAccumulator,
    private readonly currentPhase: () => Phase | null,
    private readonly markFailed: (ctx: StatementContext) => void,
  ) {}

  get stats(): ActionEngineStats {
    return { registered: this.#actions.length, applied: this.#applied, failed: this.#failed };
  }

  newAction(owner: StatementContext, phase: Phase): ActionBuilder {
    const current = this.currentPhase();
    if (current !== null && phaseIndex(phase) < phaseIndex(current)) {
      throw new Error(`Cannot schedule a ${phase} action for '${owner.toString()}' during ${current}`);
    }
    if (phaseReached(owner.completedPhase, phase)) {
      throw new Error(`'${owner.toString()}' already completed ${phase}`);
    }
    return new ActionBuilder(this, owner, phase);
  }

  /** @internal called by {@link ActionBuilder.apply} */
  register(
    owner: StatementContext,
    phase: Phase,
    prerequisites: readonly PrerequisiteHandle<unknown>[],
    action: InferenceAction,
  ): void {
    const record: ActionRecord = { id: this.#actions.length, owner, phase, prerequisites, action, state: "pending" };
    this.#actions.push(record);
    const owned = this.#byOwner.get(owner.id) ?? [];
    owned.push(record);
    this.#byOwner.set(owner.id, owned);
    this.#pending.set(phase, (this.#pending.get(phase) ?? 0) + 1);
    debug.infer("action.register", { action: record.id, owner: owner.toString(), phase, prerequisites: prerequisites.length });
    this.evaluate(record);
  }

  /** Number of actions still waiting whose phase is `phase` or earlier. */
  pendingCount(phase: Phase): number {
    let count = 0;
    for (const [actionPhase, pending] of this.#pending) {
      if (phaseIndex(actionPhase) <= phaseIndex(phase)) count += pending;
    }
    return count;
  }

  /** Whether `owner` still has a waiting action scheduled for `phase` or earlier. */
  hasPending(owner: StatementContext, phase: Phase): boolean {
    const owned = this.#byOwner.get(owner.id);
    if (!owned) return false;
    return owned.some((record) => record.state === "pending" && phaseIndex(record.phase) <= phaseIndex(phase));
  }

  onNamespaceWrite(partition: string, key: string): void {
    this.notify(nsWatchKey(partition, key));
  }

  onPhaseCompleted(ctx: StatementContext): void {
    this.notify(phaseWatchKey(ctx));
  }

  /**
   * Apply queued actions until the queue is empty, including actions that
   * become ready while draining. Returns the number applied.
   */
  drainReady(): number {
    let applied = 0;
    for (let record = this.#ready.shift(); record; record = this.#ready.shift()) {
      if (record.state !== "pending") continue;
      record.state = "applied";
      this.decrementPending(record.phase);
      this.#applied++;
      applied++;
      debug.infer("action.apply", { action: record.id, owner: record.owner.toString(), phase: record.phase });
      try {
        record.action.apply();
      } catch (error) {
        if (!(error instanceof ReactorError)) throw error;
        this.markFailed(record.owner);
        this.diagnostics.push(diagnosticAtStage(error, this.stageFor(record)));
      }
    }
    return applied;
  }

  /**
   * Permanently fail every action still waiting for `phase` or earlier. Each
   * yields exactly one `UnresolvedPrerequisite` diagnostic.
   */
  failStalled(phase: Phase): number {
    const stalled = this.#actions.filter(
      (record) => record.state === "pending" && phaseIndex(record.phase) <= phaseIndex(phase),
    );
    for (const record of stalled) {
      record.state = "failed";
      this.decrementPending(record.phase);
      this.#failed++;
    }
    for (const record of stalled) {
      this.markFailed(record.owner);
      const unmet = record.prerequisites.filter((prerequisite) => !prerequisite.resolved);
      debug.infer("action.fail", {
        action: record.id,
        owner: record.owner.toString(),
        missing: unmet.map((p) => p.description),
      });
      this.diagnostics.push(this.failureDiagnostic(record, unmet));
    }
    return stalled.length;
  }

  private failureDiagnostic(record: ActionRecord, unmet: readonly PrerequisiteHandle<unknown>[]): CompilerDiagnostic {
    const owner = record.owner;
    let message = `'${owner.toString()}' could not resolve ${unmet.map((p) => p.description).join(", ")} [at ${formatLocation(owner.location)}]`;
    try {
      record.action.prerequisiteFailed?.(unmet);
    } catch (error) {
      if (!(error instanceof ReactorError)) throw error;
      message = error.message;
    }
    return buildDiagnostic({
      code: ReactorErrorCode.UnresolvedPrerequisite,
      message,
      stage: this.stageFor(record),
      location: owner.location,
      data: { statement: owner.keyword, missing: unmet.map((p) => p.missing) },
    });
  }

  private evaluate(record: ActionRecord): void {
    for (const prerequisite of record.prerequisites) {
      const watch = prerequisite.check();
      if (watch !== null) {
        const watchers = this.#waiting.get(watch) ?? [];
        watchers.push(record);
        this.#waiting.set(watch, watchers);
        return;
      }
    }
    this.#ready.push(record);
  }

  private notify(watch: string): void {
    const watchers = this.#waiting.get(watch);
    if (!watchers) return;
    this.#waiting.delete(watch);
    for (const record of [...watchers].sort((a, b) => a.id - b.id)) {
      if (record.state === "pending") this.evaluate(record);
    }
  }

  private decrementPending(phase: Phase): void {
    this.#pending.set(phase, (this.#pending.get(phase) ?? 1) - 1);
  }

  private stageFor(record: ActionRecord): Phase {
    return this.currentPhase() ?? record.phase;
  }
}
