import type { CompilerDiagnostic, DiagnosticSink } from "../model/diagnostics.js";
import type { EffectiveModule, ModuleDescriptor, ModuleLike, ModuleSource } from "../model/source.js";
import { formatIdentity } from "../model/identity.js";
import { ReactorErrorCode } from "../shared/diagnostics.js";
import { ModuleSortError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../shared/logger.js";
import { createModuleGraph, type ModuleGraph, type ModuleNode } from "./dependency-graph.js";
import { topologicalSort } from "./topological-sort.js";

export interface SortOptions {
  /** Receives warnings as they are found. */
  sink?: DiagnosticSink;
  logger?: Logger;
}

export interface SortResult<T extends ModuleDescriptor, G extends ModuleDescriptor = T> {
  /** Dependencies before dependents. */
  readonly order: readonly T[];
  readonly graph: ModuleGraph<G>;
  readonly warnings: readonly CompilerDiagnostic[];
}

/**
 * Order modules so that every module follows the modules it imports or
 * includes (if A imports B, the result is [B, A]).
 *
 * @throws ModuleSortError (`DuplicateIdentity`, `UnresolvedImport`,
 *   `ImportRevisionConflict`, `CyclicDependency`)
 */
export function sortModules<T extends ModuleDescriptor>(
  modules: readonly T[],
  options: SortOptions = {},
): SortResult<T> {
  const logger = options.logger ?? nullLogger;
  const graph = createModuleGraph(modules);

  for (const warning of graph.warnings) {
    logger.warn(`[sort] ${warning.message}`);
    options.sink?.report(warning);
  }

  const result = topologicalSort<ModuleNode<T>>(graph.nodes, (node) => node.edges);
  if (result.tag === "cycle") {
    const members = result.cycle.map((node) => formatIdentity(node.identity));
    throw new ModuleSortError(
      ReactorErrorCode.CyclicDependency,
      `Cyclic module dependency: ${members.join(" -> ")}`,
      { cycle: members.slice(0, -1) },
    );
  }

  const order = result.order.map((node) => node.module);
  debug.sort("order", { modules: result.order.map((node) => formatIdentity(node.identity)) });
  return { order, graph, warnings: graph.warnings };
}

/**
 * Sort new sources together with modules that are already compiled, so
 * sources may import them; only the sources are returned. The graph keeps
 * both kinds.
 */
export function sortWithContext(
  existing: Iterable<EffectiveModule>,
  sources: readonly ModuleSource[],
  options: SortOptions = {},
): SortResult<ModuleSource, ModuleLike> {
  const all: ModuleLike[] = [...sources, ...existing];
  const sorted = sortModules(all, options);
  const order = sorted.order.filter((module): module is ModuleSource => module.kind === "source");
  return { order, graph: sorted.graph, warnings: sorted.warnings };
}
