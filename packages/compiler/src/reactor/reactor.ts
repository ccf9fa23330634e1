/* =======================================================================================
 * STATEMENT REACTOR
 * ---------------------------------------------------------------------------------------
 * sources → sort → context tree → phases → effective modules → schema context
 *
 * The run is synchronous and all-or-nothing: any error in a step stops the
 * run at that step and no schema is produced.
 * ======================================================================================= */

import type { CompilerDiagnostic, DiagnosticStage } from "../model/diagnostics.js";
import { PHASES } from "../model/phase.js";
import type { ModuleSource } from "../model/source.js";
import { formatIdentity } from "../model/identity.js";
import { DiagnosticAccumulator } from "../shared/diagnosed.js";
import { ReactorError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { ReactorAttributes } from "../shared/trace.js";
import { sortWithContext, type SortResult } from "../graph/module-sort.js";
import type { ModuleLike } from "../model/source.js";
import { EffectiveTreeBuilder } from "../effective/builder.js";
import { createSchemaContext, type SchemaContext } from "../schema/schema-context.js";
import { CompiledModules, ResolvedLinkage } from "./linkage.js";
import { resolveReactorOptions, type ReactorOptions, type ResolvedReactorOptions } from "./options.js";
import { PhaseScheduler } from "./scheduler.js";
import { ContextTree, type StatementContext } from "./statement-context.js";
import { buildModuleContexts } from "./tree-builder.js";

export interface ReactorCompleted {
  readonly status: "completed";
  readonly schema: SchemaContext;
  readonly warnings: readonly CompilerDiagnostic[];
  /** Everything reported, in order (warnings only, on success). */
  readonly diagnostics: readonly CompilerDiagnostic[];
}

export interface ReactorFailed {
  readonly status: "failed";
  /** The step that failed; later steps did not run. */
  readonly failedStage: DiagnosticStage;
  readonly diagnostics: readonly CompilerDiagnostic[];
  readonly warnings: readonly CompilerDiagnostic[];
}

export type ReactorResult = ReactorCompleted | ReactorFailed;

export type ReactorState = "idle" | "completed" | "failed";

/**
 * One compilation. {@link SchemaReactor.run} may be called once; after it
 * completed, {@link SchemaReactor.buildEffective} can re-materialize the
 * schema from the same context tree.
 */
export class SchemaReactor {
  readonly #sources: readonly ModuleSource[];
  readonly #options: ResolvedReactorOptions;
  readonly #diagnostics: DiagnosticAccumulator;
  readonly #tree: ContextTree;
  #state: ReactorState = "idle";

  constructor(sources: readonly ModuleSource[], options: ReactorOptions) {
    this.#sources = sources;
    this.#options = resolveReactorOptions(options);
    this.#diagnostics = new DiagnosticAccumulator(this.#options.sink);
    this.#tree = new ContextTree(this.#diagnostics);
  }

  get state(): ReactorState {
    return this.#state;
  }

  get tree(): ContextTree {
    return this.#tree;
  }

  run(): ReactorResult {
    if (this.#state !== "idle") throw new Error(`Reactor already ran (${this.#state})`);
    const { trace, logger } = this.#options;

    return trace.span("reactor:compile", () => {
      const sorted = trace.span("reactor:sort", () => this.sort());
      if (!sorted) return this.fail("sort");
      trace.setAttribute(ReactorAttributes.MODULE_COUNT, sorted.order.length);

      trace.span("reactor:build", () => this.build(sorted));
      if (this.#diagnostics.errorCount > 0) return this.fail("build");

      const scheduler = new PhaseScheduler(this.#tree, this.#diagnostics, trace);
      for (const phase of PHASES) {
        const outcome = scheduler.run(phase);
        if (outcome.status === "failed") return this.fail(phase);
      }

      const schema = this.buildEffective();
      this.#state = "completed";
      const stats = this.#tree.engine.stats;
      trace.setAttributes({
        [ReactorAttributes.ACTION_COUNT]: stats.registered,
        [ReactorAttributes.NAMESPACE_WRITES]: this.#tree.store.writeCount,
        [ReactorAttributes.DIAG_WARNING_COUNT]: this.#diagnostics.warnings.length,
        [ReactorAttributes.STATUS]: "completed",
      });
      logger.info(`[reactor] compiled ${sorted.order.length} module(s), ${this.#tree.size} statement(s)`);
      return {
        status: "completed",
        schema,
        warnings: this.#diagnostics.warnings,
        diagnostics: this.#diagnostics.diagnostics,
      };
    });
  }

  /** Materialize the completed tree into a schema context (existing modules first). */
  buildEffective(): SchemaContext {
    if (this.#state === "failed") throw new Error("Cannot build the effective model of a failed compilation");
    if (this.#tree.phase !== "effective-model") throw new Error("Reactor has not completed its phases");
    return this.#options.trace.span("reactor:effective", () => {
      const built = new EffectiveTreeBuilder(this.#tree).modules();
      return createSchemaContext([...this.#options.existing.modules, ...built], this.#options.revisionOrder);
    });
  }

  private sort(): SortResult<ModuleSource, ModuleLike> | null {
    try {
      const sorted = sortWithContext(this.#options.existing.modules, this.#sources, { logger: this.#options.logger });
      this.#diagnostics.pushAll(sorted.warnings);
      return sorted;
    } catch (error) {
      if (!(error instanceof ReactorError)) throw error;
      this.#diagnostics.push(error.diagnostic);
      return null;
    }
  }

  private build(sorted: SortResult<ModuleSource, ModuleLike>): void {
    const tree = this.#tree;
    for (const module of this.#options.existing.modules) {
      tree.store.write(null, CompiledModules, module.identity, module);
    }

    for (const module of sorted.order) {
      const root = buildModuleContexts(tree, module, this.#options.statements, this.#diagnostics);
      if (root) this.publishLinkage(root, sorted);
    }
    this.#options.trace.setAttribute(ReactorAttributes.CONTEXT_COUNT, tree.size);
    debug.reactor("tree.built", { modules: sorted.order.length, contexts: tree.size });
  }

  private publishLinkage(root: StatementContext, sorted: SortResult<ModuleSource, ModuleLike>): void {
    const module = root.module;
    for (const [name, identity] of sorted.graph.resolvedImports(module.identity)) {
      root.addToNamespace(ResolvedLinkage, name, identity);
    }

    // The owning module is not an edge; resolve it the way an import would be.
    const owner = module.belongsTo;
    if (owner === undefined || root.getFromNamespace(ResolvedLinkage, owner)) return;
    const candidates = sorted.graph.byName.get(owner);
    if (!candidates || candidates.size === 0) return;
    const { node } = sorted.graph.resolve(module.identity, { module: owner });
    root.addToNamespace(ResolvedLinkage, owner, node.identity);
    debug.reactor("belongs-to.resolved", { submodule: formatIdentity(module.identity), module: formatIdentity(node.identity) });
  }

  private fail(stage: DiagnosticStage): ReactorFailed {
    this.#state = "failed";
    const errors = this.#diagnostics.errorCount;
    this.#options.trace.setAttributes({
      [ReactorAttributes.DIAG_ERROR_COUNT]: errors,
      [ReactorAttributes.STATUS]: "failed",
    });
    this.#options.logger.error(`[reactor] ${stage} failed with ${errors} error(s)`);
    return {
      status: "failed",
      failedStage: stage,
      diagnostics: this.#diagnostics.diagnostics,
      warnings: this.#diagnostics.warnings,
    };
  }
}

/** Compile module sources into a schema context in one call. */
export function compileSchema(sources: readonly ModuleSource[], options: ReactorOptions): ReactorResult {
  return new SchemaReactor(sources, options).run();
}
