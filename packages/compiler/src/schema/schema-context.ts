/* =======================================================================================
 * SCHEMA CONTEXT
 * ---------------------------------------------------------------------------------------
 * The output of a successful compilation: immutable effective modules keyed
 * by identity, in processing order. A schema context can be handed back to
 * the reactor as `existing` to compile further sources against it.
 * ======================================================================================= */

import {
  compareRevisions,
  identityKey,
  type IdentityKey,
  type ModuleIdentity,
  type Revision,
  type RevisionComparator,
} from "../model/identity.js";
import type { EffectiveModule } from "../model/source.js";

export interface SchemaContext {
  /** Dependencies before dependents; modules of an extended context come first. */
  readonly modules: readonly EffectiveModule[];
  get(identity: ModuleIdentity): EffectiveModule | undefined;
  /** Every revision of `name`, in processing order. */
  findModules(name: string): readonly EffectiveModule[];
  /** Exact revision when given, otherwise the latest one. */
  findModule(name: string, revision?: Revision): EffectiveModule | undefined;
  /** Modules (not submodules) declaring `namespace`. */
  findModuleByNamespace(namespace: string): readonly EffectiveModule[];
}

export function createSchemaContext(
  modules: readonly EffectiveModule[],
  revisionOrder: RevisionComparator = compareRevisions,
): SchemaContext {
  const byKey = new Map<IdentityKey, EffectiveModule>();
  const byName = new Map<string, EffectiveModule[]>();
  for (const module of modules) {
    const key = identityKey(module.identity);
    if (byKey.has(key)) {
      throw new Error(`Schema context already contains ${key}`);
    }
    byKey.set(key, module);
    const revisions = byName.get(module.identity.name) ?? [];
    revisions.push(module);
    byName.set(module.identity.name, revisions);
  }
  const ordered = Object.freeze([...modules]);

  return {
    modules: ordered,
    get(identity) {
      return byKey.get(identityKey(identity));
    },
    findModules(name) {
      return byName.get(name) ?? [];
    },
    findModule(name, revision) {
      const revisions = byName.get(name);
      if (!revisions) return undefined;
      if (revision !== undefined) {
        return revisions.find((module) => module.identity.revision === revision);
      }
      let latest: EffectiveModule | undefined;
      for (const module of revisions) {
        if (!latest || revisionOrder(module.identity.revision, latest.identity.revision) > 0) {
          latest = module;
        }
      }
      return latest;
    },
    findModuleByNamespace(namespace) {
      return ordered.filter((module) => !module.submodule && module.namespace === namespace);
    },
  };
}

export const EMPTY_SCHEMA_CONTEXT: SchemaContext = createSchemaContext([]);
