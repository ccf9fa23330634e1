// Namespaces published by the default statement set.

import {
  definePartition,
  identityKey,
  type EffectiveModule,
  type EffectiveStatement,
  type ModuleIdentity,
  type StatementContext,
} from "@schema-reactor/compiler";

/**
 * A module reachable through a prefix: either a module compiled in this run
 * (its root context) or one taken from the existing schema context.
 */
export interface LinkedModule {
  readonly identity: ModuleIdentity;
  readonly root: StatementContext | null;
  readonly compiled: EffectiveModule | null;
}

/** What a `type` or `uses` resolved to, carried into its effective form. */
export interface ResolvedReference {
  readonly name: string;
  /** `name@revision` of the module that declares the target; absent for built-in types. */
  readonly module?: string;
  readonly builtin?: boolean;
  /** For groupings: names of the data nodes the grouping declares. */
  readonly nodes?: readonly string[];
}

export interface AugmentedNode {
  readonly node: SchemaNode;
  /** `name@revision` of the module declaring the node. */
  readonly module: string;
}

// --- Modules ------------------------------------------------------------------

export const ModuleByIdentity = definePartition<ModuleIdentity, StatementContext>(
  "ModuleByIdentity",
  "global",
  identityKey,
);

export const SubmoduleByIdentity = definePartition<ModuleIdentity, StatementContext>(
  "SubmoduleByIdentity",
  "global",
  identityKey,
);

/** Prefix → module, per module root: the module's own prefix and its imports. */
export const PrefixToModule = definePartition<string, LinkedModule>("PrefixToModule", "root");

/** Submodule identity → the module it belongs to. */
export const BelongsToModuleContext = definePartition<ModuleIdentity, LinkedModule>(
  "BelongsToModuleContext",
  "global",
  identityKey,
);

/** Per submodule root: the belongs-to prefix → owning module. */
export const BelongsToPrefixToModule = definePartition<string, LinkedModule>("BelongsToPrefixToModule", "root");

/** Per module root: included submodule name → its root context. */
export const IncludedSubmodules = definePartition<string, StatementContext>("IncludedSubmodules", "root");

// --- Lexically scoped definitions ---------------------------------------------

export const Typedefs = definePartition<string, StatementContext>("Typedefs", "tree");

export const Groupings = definePartition<string, StatementContext>("Groupings", "tree");

/** A data node compiled in this run, or one of a module taken from the existing schema context. */
export type SchemaNode = StatementContext | EffectiveStatement;

/**
 * Data nodes (container, list, leaf, leaf-list) by name, stored on their
 * parent. Nodes a `uses` or an `augment` brings in are stored there as well.
 */
export const SchemaNodes = definePartition<string, SchemaNode>("SchemaNodes", "local");

// --- Per-statement results ------------------------------------------------------

const SELF = (): string => "self";

export const ResolvedType = definePartition<null, ResolvedReference>("ResolvedType", "local", SELF);

export const ResolvedGrouping = definePartition<null, ResolvedReference>("ResolvedGrouping", "local", SELF);

export const AugmentTarget = definePartition<null, AugmentedNode>("AugmentTarget", "local", SELF);
