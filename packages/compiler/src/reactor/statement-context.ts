/* =======================================================================================
 * STATEMENT CONTEXT TREE
 * ---------------------------------------------------------------------------------------
 * The mutable working tree the reactor drives through the phases. Contexts
 * live in one arena indexed by id: a parent owns the ids of its children and
 * each child keeps its parent's id. Contexts are never removed; a failed
 * context stays in place with its `failed` flag set.
 *
 * StatementContext is the handle statement definitions see. The phase state
 * behind it (entered, completed, failed) is only written by the reactor.
 * ======================================================================================= */

import type { DiagnosticStage } from "../model/diagnostics.js";
import type { ModuleIdentity } from "../model/identity.js";
import type { Phase } from "../model/phase.js";
import type { ModuleSource, SourceLocation, StatementSource } from "../model/source.js";
import type { DiagnosticAccumulator } from "../shared/diagnosed.js";
import { ReactorErrorCode } from "../shared/diagnostics.js";
import { SourceError } from "../shared/errors.js";
import { ActionEngine, type ActionBuilder } from "./actions.js";
import type { StatementDefinition } from "./definitions.js";
import { NamespaceStore, type NamespaceEntry, type NamespacePartition, type ScopeResolver } from "./namespace.js";

/** Reactor-owned state of one context. */
export interface ContextRecord {
  readonly handle: StatementContext;
  readonly parent: number | null;
  readonly root: number;
  readonly children: number[];
  enteredPhase: Phase | null;
  completedPhase: Phase | null;
  failed: boolean;
}

export class StatementContext<A = unknown> {
  readonly #tree: ContextTree;

  /** @internal created by {@link ContextTree.create} */
  constructor(
    tree: ContextTree,
    readonly id: number,
    readonly definition: StatementDefinition<A>,
    readonly source: StatementSource,
    readonly argument: A,
    /** The module source this statement was declared in. */
    readonly module: ModuleSource,
  ) {
    this.#tree = tree;
  }

  get keyword(): string {
    return this.source.keyword;
  }

  get rawArgument(): string | null {
    return this.source.argument;
  }

  get location(): SourceLocation {
    return this.source.location;
  }

  get moduleIdentity(): ModuleIdentity {
    return this.module.identity;
  }

  // --- Navigation -----------------------------------------------------------

  get parent(): StatementContext | null {
    const parent = this.#tree.record(this.id).parent;
    return parent === null ? null : this.#tree.context(parent);
  }

  get root(): StatementContext {
    return this.#tree.context(this.#tree.record(this.id).root);
  }

  get isRoot(): boolean {
    return this.#tree.record(this.id).parent === null;
  }

  get children(): readonly StatementContext[] {
    return this.#tree.record(this.id).children.map((id) => this.#tree.context(id));
  }

  /** The parent's other children, in declaration order. */
  get siblings(): readonly StatementContext[] {
    const parent = this.parent;
    return parent ? parent.children.filter((child) => child.id !== this.id) : [];
  }

  substatements(keyword: string): readonly StatementContext[] {
    return this.children.filter((child) => child.keyword === keyword);
  }

  firstSubstatement(keyword: string): StatementContext | undefined {
    return this.children.find((child) => child.keyword === keyword);
  }

  // --- Phase state ----------------------------------------------------------

  get completedPhase(): Phase | null {
    return this.#tree.record(this.id).completedPhase;
  }

  get failed(): boolean {
    return this.#tree.record(this.id).failed;
  }

  // --- Namespaces -----------------------------------------------------------

  addToNamespace<K, V>(partition: NamespacePartition<K, V>, key: K, value: V): void {
    this.#tree.store.write(this.id, partition, key, value);
  }

  getFromNamespace<K, V>(partition: NamespacePartition<K, V>, key: K): V | undefined {
    return this.#tree.store.read(this.id, partition, key);
  }

  namespaceEntries<K, V>(partition: NamespacePartition<K, V>): readonly NamespaceEntry<V>[] {
    return this.#tree.store.entries(this.id, partition);
  }

  // --- Actions --------------------------------------------------------------

  newAction(phase: Phase): ActionBuilder {
    return this.#tree.engine.newAction(this, phase);
  }

  /** A user-input error located at this statement, tagged with the running phase. */
  sourceError(message: string, code: string = ReactorErrorCode.SourceError): SourceError {
    return new SourceError(this.location, message, code, this.#tree.stage);
  }

  toString(): string {
    return this.rawArgument === null ? this.keyword : `${this.keyword} ${this.rawArgument}`;
  }
}

export class ContextTree implements ScopeResolver {
  readonly #records: ContextRecord[] = [];
  readonly #roots: number[] = [];
  #phase: Phase | null = null;

  readonly store: NamespaceStore;
  readonly engine: ActionEngine;

  constructor(diagnostics: DiagnosticAccumulator) {
    this.store = new NamespaceStore(this, () => this.stage);
    this.engine = new ActionEngine(diagnostics, () => this.#phase, (ctx) => this.markFailed(ctx.id));
    this.store.onWrite((partition, key) => this.engine.onNamespaceWrite(partition, key));
  }

  get phase(): Phase | null {
    return this.#phase;
  }

  get stage(): DiagnosticStage {
    return this.#phase ?? "build";
  }

  get size(): number {
    return this.#records.length;
  }

  enterPhase(phase: Phase): void {
    this.#phase = phase;
  }

  create<A>(
    definition: StatementDefinition<A>,
    source: StatementSource,
    argument: A,
    parent: StatementContext | null,
    module: ModuleSource,
  ): StatementContext<A> {
    const id = this.#records.length;
    const handle = new StatementContext(this, id, definition, source, argument, module);
    const parentId = parent?.id ?? null;
    this.#records.push({
      handle,
      parent: parentId,
      root: parent ? this.record(parent.id).root : id,
      children: [],
      enteredPhase: null,
      completedPhase: null,
      failed: false,
    });
    if (parentId === null) {
      this.#roots.push(id);
    } else {
      this.record(parentId).children.push(id);
    }
    return handle;
  }

  record(id: number): ContextRecord {
    const record = this.#records[id];
    if (!record) throw new RangeError(`No statement context with id ${id}`);
    return record;
  }

  context(id: number): StatementContext {
    return this.record(id).handle;
  }

  get roots(): readonly StatementContext[] {
    return this.#roots.map((id) => this.context(id));
  }

  /** Every context in creation order, which is pre-order per module, modules in sort order. */
  get records(): readonly ContextRecord[] {
    return this.#records;
  }

  markFailed(id: number): void {
    this.record(id).failed = true;
  }

  parentOf(id: number): number | null {
    return this.record(id).parent;
  }

  rootOf(id: number): number {
    return this.record(id).root;
  }

  locationOf(id: number): SourceLocation {
    return this.record(id).handle.location;
  }
}
