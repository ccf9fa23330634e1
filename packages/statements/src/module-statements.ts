/* =======================================================================================
 * MODULE LINKAGE STATEMENTS
 * ---------------------------------------------------------------------------------------
 * module / submodule publish themselves at pre-linkage. import, include and
 * belongs-to resolve their targets at linkage, after every root has been
 * published, so forward and mutual references between modules need no
 * particular source order.
 * ======================================================================================= */

import {
  CompiledModules,
  defineStatement,
  effectiveStatement,
  moduleIdentity,
  ResolvedLinkage,
  stringArgument,
  SubstatementValidator,
  type ModuleIdentity,
  type NamespacePartition,
  type StatementContext,
  type SubstatementValidatorBuilder,
} from "@schema-reactor/compiler";
import {
  BelongsToModuleContext,
  BelongsToPrefixToModule,
  Groupings,
  IncludedSubmodules,
  ModuleByIdentity,
  PrefixToModule,
  SubmoduleByIdentity,
  Typedefs,
} from "./namespaces.js";
import { publishUnique, stringArgumentOf } from "./linking.js";

const BODY = [
  "typedef",
  "grouping",
  "container",
  "list",
  "leaf",
  "leaf-list",
  "uses",
  "augment",
  "revision",
] as const;

const META = ["organization", "contact", "description", "reference"] as const;

function withBody(builder: SubstatementValidatorBuilder): SubstatementValidator {
  for (const keyword of BODY) builder.addAny(keyword);
  for (const keyword of META) builder.addOptional(keyword);
  return builder.addAny("import").addAny("include").build();
}

function prefixOf(ctx: StatementContext): string {
  const prefix = stringArgumentOf(ctx.firstSubstatement("prefix"));
  if (prefix === undefined) throw ctx.sourceError(`'${ctx.keyword}' needs a prefix`);
  return prefix;
}

/** Identity the reactor resolved `name` to for this module root. */
function resolvedTarget(ctx: StatementContext, name: string): ModuleIdentity | undefined {
  return ctx.getFromNamespace(ResolvedLinkage, name);
}

export const moduleStatement = defineStatement<string>({
  keyword: "module",
  parseArgument: stringArgument,
  validator: withBody(SubstatementValidator.builder("module").addMandatory("namespace").addMandatory("prefix")),
  onPhaseEntry: {
    "pre-linkage"(ctx) {
      ctx.addToNamespace(ModuleByIdentity, ctx.moduleIdentity, ctx);
      ctx.addToNamespace(PrefixToModule, prefixOf(ctx), { identity: ctx.moduleIdentity, root: ctx, compiled: null });
    },
  },
  createEffective(ctx, substatements) {
    return effectiveStatement(ctx, substatements, {
      namespace: stringArgumentOf(ctx.firstSubstatement("namespace")),
      prefix: stringArgumentOf(ctx.firstSubstatement("prefix")),
      revision: ctx.moduleIdentity.revision,
    });
  },
});

export const submoduleStatement = defineStatement<string>({
  keyword: "submodule",
  parseArgument: stringArgument,
  validator: withBody(SubstatementValidator.builder("submodule").addMandatory("belongs-to")),
  onPhaseEntry: {
    "pre-linkage"(ctx) {
      ctx.addToNamespace(SubmoduleByIdentity, ctx.moduleIdentity, ctx);
    },
  },
  createEffective(ctx, substatements) {
    return effectiveStatement(ctx, substatements, {
      belongsTo: stringArgumentOf(ctx.firstSubstatement("belongs-to")),
      revision: ctx.moduleIdentity.revision,
    });
  },
});

export const importStatement = defineStatement<string>({
  keyword: "import",
  parseArgument: stringArgument,
  validator: SubstatementValidator.builder("import")
    .addMandatory("prefix")
    .addOptional("revision-date")
    .addOptional("description")
    .addOptional("reference")
    .build(),
  onPhaseEntry: {
    linkage(ctx) {
      const name = ctx.argument;
      const prefix = prefixOf(ctx);
      const identity = resolvedTarget(ctx, name);
      if (!identity) throw ctx.sourceError(`Import of '${name}' was not resolved`);

      const compiled = ctx.getFromNamespace(CompiledModules, identity);
      if (compiled) {
        publishUnique(ctx.root, PrefixToModule, prefix, { identity, root: null, compiled }, ctx, "Prefix");
        return;
      }

      const action = ctx.newAction("linkage");
      const target = action.requiresContext(ModuleByIdentity, identity, "pre-linkage");
      action.apply({
        apply() {
          publishUnique(ctx.root, PrefixToModule, prefix, { identity, root: target.value, compiled: null }, ctx, "Prefix");
        },
        prerequisiteFailed() {
          throw ctx.sourceError(`Imported module '${name}' was not found`);
        },
      });
    },
  },
  createEffective(ctx, substatements) {
    return effectiveStatement(ctx, substatements, { revision: resolvedTarget(ctx, ctx.argument)?.revision });
  },
});

/** Copy the submodule's top-level definitions of `partition` into the including module's root. */
function shareDefinitions(
  ctx: StatementContext,
  submodule: StatementContext,
  partition: NamespacePartition<string, StatementContext>,
  kind: string,
): void {
  for (const { key, value } of submodule.namespaceEntries(partition)) {
    if (typeof key === "string") publishUnique(ctx.root, partition, key, value, value, kind);
  }
}

export const includeStatement = defineStatement<string>({
  keyword: "include",
  parseArgument: stringArgument,
  validator: SubstatementValidator.builder("include")
    .addOptional("revision-date")
    .addOptional("description")
    .addOptional("reference")
    .build(),
  onPhaseEntry: {
    linkage(ctx) {
      const name = ctx.argument;
      const identity = resolvedTarget(ctx, name);
      if (!identity) throw ctx.sourceError(`Include of '${name}' was not resolved`);
      if (ctx.getFromNamespace(CompiledModules, identity)) return;

      const action = ctx.newAction("linkage");
      const submodule = action.requiresContext(SubmoduleByIdentity, identity, "pre-linkage");
      const owner = action.requires(BelongsToModuleContext, identity);
      action.apply({
        apply() {
          const including = ctx.root.module.belongsTo ?? ctx.root.moduleIdentity.name;
          if (owner.value.identity.name !== including) {
            throw ctx.sourceError(`Submodule '${name}' belongs to '${owner.value.identity.name}', not '${including}'`);
          }
          ctx.addToNamespace(IncludedSubmodules, name, submodule.value);
        },
        prerequisiteFailed() {
          if (!submodule.resolved) throw ctx.sourceError(`Included submodule '${name}' was not found`);
        },
      });
    },
    "statement-definition"(ctx) {
      const submodule = ctx.getFromNamespace(IncludedSubmodules, ctx.argument);
      if (!submodule) return;

      // The submodule's typedefs and groupings are visible from the including module.
      const action = ctx.newAction("statement-definition");
      const settled = action.requiresPhase(submodule, "statement-definition");
      action.apply({
        apply() {
          shareDefinitions(ctx, settled.value, Typedefs, "Typedef");
          shareDefinitions(ctx, settled.value, Groupings, "Grouping");
        },
      });
    },
  },
});

export const belongsToStatement = defineStatement<string>({
  keyword: "belongs-to",
  parseArgument: stringArgument,
  validator: SubstatementValidator.builder("belongs-to").addMandatory("prefix").build(),
  onPhaseEntry: {
    linkage(ctx) {
      const name = ctx.argument;
      const prefix = prefixOf(ctx);
      const submodule = ctx.moduleIdentity;
      const identity = resolvedTarget(ctx, name) ?? moduleIdentity(name);

      const compiled = ctx.getFromNamespace(CompiledModules, identity);
      if (compiled) {
        const linked = { identity, root: null, compiled };
        ctx.addToNamespace(BelongsToModuleContext, submodule, linked);
        ctx.addToNamespace(BelongsToPrefixToModule, prefix, linked);
        return;
      }

      const action = ctx.newAction("linkage");
      const owner = action.requiresContext(ModuleByIdentity, identity, "pre-linkage");
      action.apply({
        apply() {
          const linked = { identity, root: owner.value, compiled: null };
          ctx.addToNamespace(BelongsToModuleContext, submodule, linked);
          ctx.addToNamespace(BelongsToPrefixToModule, prefix, linked);
        },
        prerequisiteFailed() {
          throw ctx.sourceError(`Module '${name}' from belongs-to was not found`);
        },
      });
    },
  },
});
