// Statement processing reactor: context tree, namespaces, actions, phases
export {
  defineStatement,
  invalidArgument,
  noArgument,
  stringArgument,
  StatementRegistry,
  SubstatementValidator,
  SubstatementValidatorBuilder,
  type Cardinality,
  type PhaseHooks,
  type StatementDefinition,
} from "./definitions.js";
export {
  definePartition,
  NamespaceStore,
  type NamespaceEntry,
  type NamespacePartition,
  type NamespaceScope,
  type NamespaceWriteListener,
  type ScopeResolver,
  type StorageOwner,
} from "./namespace.js";
export { ContextTree, StatementContext, type ContextRecord } from "./statement-context.js";
export {
  ActionBuilder,
  ActionEngine,
  type ActionEngineStats,
  type ActionState,
  type InferenceAction,
  type Prerequisite,
} from "./actions.js";
export { PhaseScheduler, type PhaseOutcome } from "./scheduler.js";
export { buildModuleContexts } from "./tree-builder.js";
export { CompiledModules, ResolvedLinkage } from "./linkage.js";
export { resolveReactorOptions, type ReactorOptions, type ResolvedReactorOptions } from "./options.js";
export {
  compileSchema,
  SchemaReactor,
  type ReactorCompleted,
  type ReactorFailed,
  type ReactorResult,
  type ReactorState,
} from "./reactor.js";
