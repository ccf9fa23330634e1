// Namespaces the reactor itself fills before the first phase. Statement
// definitions read them to resolve imports without re-running the graph
// resolution rules.

import { identityKey, type ModuleIdentity } from "../model/identity.js";
import type { EffectiveModule } from "../model/source.js";
import { definePartition } from "./namespace.js";

/** Modules of the schema context being extended, keyed by identity. */
export const CompiledModules = definePartition<ModuleIdentity, EffectiveModule>(
  "CompiledModules",
  "global",
  identityKey,
);

/**
 * Per module root: imported, included or owning module name → the identity
 * the dependency graph resolved it to.
 */
export const ResolvedLinkage = definePartition<string, ModuleIdentity>("ResolvedLinkage", "root");
