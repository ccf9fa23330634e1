// Module ordering: dependency graph + topological sort
export {
  createModuleGraph,
  type ImportResolution,
  type ModuleGraph,
  type ModuleNode,
} from "./dependency-graph.js";
export { topologicalSort, type TopologicalResult } from "./topological-sort.js";
export { sortModules, sortWithContext, type SortOptions, type SortResult } from "./module-sort.js";
