// Default statement set for the schema reactor

export { createDefaultRegistry, DEFAULT_STATEMENTS } from "./registry.js";
export { moduleSourceFromStatements, type ModuleSourceOptions } from "./module-source.js";

export {
  belongsToStatement,
  importStatement,
  includeStatement,
  moduleStatement,
  submoduleStatement,
} from "./module-statements.js";
export {
  contactStatement,
  descriptionStatement,
  namespaceStatement,
  organizationStatement,
  prefixStatement,
  referenceStatement,
  revisionDateStatement,
  revisionStatement,
} from "./meta-statements.js";
export {
  containerStatement,
  DATA_DEFINITIONS,
  keyStatement,
  leafListStatement,
  leafStatement,
  listStatement,
  withDataDefinitions,
} from "./data-statements.js";
export { BUILTIN_TYPES, typedefStatement, typeStatement } from "./type-statements.js";
export { augmentStatement, groupingStatement, usesStatement } from "./grouping-statements.js";

export {
  AugmentTarget,
  BelongsToModuleContext,
  BelongsToPrefixToModule,
  Groupings,
  IncludedSubmodules,
  ModuleByIdentity,
  PrefixToModule,
  ResolvedGrouping,
  ResolvedType,
  SchemaNodes,
  SubmoduleByIdentity,
  Typedefs,
  type AugmentedNode,
  type LinkedModule,
  type ResolvedReference,
  type SchemaNode,
} from "./namespaces.js";
export {
  isLocalPrefix,
  linkedModule,
  publishUnique,
  requireDefinition,
  splitQualifiedName,
  StatementErrorCode,
  type DefinitionTarget,
  type QualifiedName,
  type RequireDefinitionOptions,
} from "./linking.js";
