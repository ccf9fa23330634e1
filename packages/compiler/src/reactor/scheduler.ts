import { phaseReached, type Phase } from "../model/phase.js";
import type { DiagnosticAccumulator } from "../shared/diagnosed.js";
import { diagnosticAtStage, ReactorError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { NOOP_TRACE, ReactorAttributes, type CompileTrace } from "../shared/trace.js";
import type { ContextRecord, ContextTree } from "./statement-context.js";

export interface PhaseOutcome {
  readonly phase: Phase;
  readonly status: "completed" | "failed";
  /** Fixpoint passes, including the final one that made no progress. */
  readonly passes: number;
  readonly applied: number;
  /** Actions failed because the phase stalled. */
  readonly stalled: number;
}

/**
 * Drives the whole context forest through one phase at a time:
 *
 * 1. run every definition's entry hook for the phase, modules in sort order,
 *    statements pre-order
 * 2. drain the action engine and complete settled contexts, repeating while
 *    either made progress
 * 3. fail whatever is still waiting for this phase or an earlier one
 *
 * The phase fails when any error was reported while it ran.
 */
export class PhaseScheduler {
  constructor(
    private readonly tree: ContextTree,
    private readonly diagnostics: DiagnosticAccumulator,
    private readonly trace: CompileTrace = NOOP_TRACE,
  ) {}

  run(phase: Phase): PhaseOutcome {
    return this.trace.span(`phase:${phase}`, () => {
      const errorsBefore = this.diagnostics.errorCount;
      const engine = this.tree.engine;
      this.tree.enterPhase(phase);

      for (const record of this.tree.records) {
        this.enter(record, phase);
      }

      let passes = 0;
      let applied = 0;
      for (;;) {
        passes++;
        const appliedNow = engine.drainReady();
        const completedNow = this.completeSettled(phase);
        applied += appliedNow;
        debug.reactor("phase.pass", { phase, pass: passes, applied: appliedNow, completed: completedNow });
        if (appliedNow === 0 && completedNow === 0) break;
      }

      const stalled = engine.pendingCount(phase) > 0 ? engine.failStalled(phase) : 0;
      const status = this.diagnostics.errorCount > errorsBefore ? "failed" : "completed";

      this.trace.setAttributes({
        [ReactorAttributes.PHASE]: phase,
        [ReactorAttributes.PASS_COUNT]: passes,
        [ReactorAttributes.APPLIED_COUNT]: applied,
        [ReactorAttributes.FAILED_COUNT]: stalled,
        [ReactorAttributes.STATUS]: status,
      });
      debug.reactor("phase.done", { phase, status, passes, applied, stalled });
      return { phase, status, passes, applied, stalled };
    });
  }

  private enter(record: ContextRecord, phase: Phase): void {
    record.enteredPhase = phase;
    const ctx = record.handle;
    const hooks = ctx.definition.onPhaseEntry;
    try {
      hooks?.[phase]?.call(hooks, ctx);
    } catch (error) {
      if (!(error instanceof ReactorError)) throw error;
      this.tree.markFailed(ctx.id);
      this.diagnostics.push(diagnosticAtStage(error, phase));
    }
  }

  /**
   * Mark contexts complete for `phase` bottom-up. Records are created
   * pre-order, so walking them backwards sees every child before its parent
   * and one sweep settles a whole subtree.
   */
  private completeSettled(phase: Phase): number {
    const records = this.tree.records;
    const engine = this.tree.engine;
    let completed = 0;
    for (let id = records.length - 1; id >= 0; id--) {
      const record = records[id];
      if (!record || record.enteredPhase !== phase || phaseReached(record.completedPhase, phase)) continue;
      if (engine.hasPending(record.handle, phase)) continue;
      if (!record.children.every((child) => phaseReached(this.tree.record(child).completedPhase, phase))) continue;
      record.completedPhase = phase;
      completed++;
      engine.onPhaseCompleted(record.handle);
    }
    return completed;
  }
}
