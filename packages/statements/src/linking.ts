import {
  formatIdentity,
  type EffectiveStatement,
  type NamespacePartition,
  type Phase,
  type StatementContext,
} from "@schema-reactor/compiler";
import { BelongsToPrefixToModule, PrefixToModule, type LinkedModule } from "./namespaces.js";

/** Codes of user errors the default statements report beyond the reactor's own. */
export const StatementErrorCode = {
  DuplicateDefinition: "DuplicateDefinition",
} as const;

export interface QualifiedName {
  readonly prefix: string | null;
  readonly name: string;
}

/** `pfx:name` → { prefix: "pfx", name: "name" }; unprefixed names get a null prefix. */
export function splitQualifiedName(value: string): QualifiedName {
  const colon = value.indexOf(":");
  return colon < 0 ? { prefix: null, name: value } : { prefix: value.slice(0, colon), name: value.slice(colon + 1) };
}

export function linkedModule(ctx: StatementContext, prefix: string): LinkedModule | undefined {
  return ctx.getFromNamespace(PrefixToModule, prefix) ?? ctx.getFromNamespace(BelongsToPrefixToModule, prefix);
}

/** Whether `prefix` names the module `ctx` is declared in (or, in a submodule, its owner). */
export function isLocalPrefix(ctx: StatementContext, prefix: string): boolean {
  if (ctx.getFromNamespace(BelongsToPrefixToModule, prefix)) return true;
  return ctx.getFromNamespace(PrefixToModule, prefix)?.root === ctx.root;
}

/**
 * Publish `value` under `key` in the storage `scope` writes to. A key already
 * held there is reported at `declared`, the statement that repeats it.
 */
export function publishUnique<V>(
  scope: StatementContext,
  partition: NamespacePartition<string, V>,
  key: string,
  value: V,
  declared: StatementContext,
  kind: string,
): void {
  if (scope.namespaceEntries(partition).some((entry) => entry.key === key)) {
    throw declared.sourceError(
      `${kind} '${key}' is already defined in '${scope.toString()}'`,
      StatementErrorCode.DuplicateDefinition,
    );
  }
  scope.addToNamespace(partition, key, value);
}

export function stringArgumentOf(ctx: StatementContext | undefined): string | undefined {
  const argument = ctx?.argument;
  return typeof argument === "string" ? argument : undefined;
}

export function findCompiled(
  statement: EffectiveStatement,
  keyword: string,
  name: string,
): EffectiveStatement | undefined {
  return statement.substatements.find((sub) => sub.keyword === keyword && sub.argument === name);
}

export interface DefinitionTarget {
  /** Context of a definition compiled in this run, or the effective statement of an existing module. */
  readonly target: StatementContext | EffectiveStatement;
  /** `name@revision` of the declaring module. */
  readonly module: string;
}

export interface RequireDefinitionOptions {
  readonly phase: Phase;
  readonly partition: NamespacePartition<string, StatementContext>;
  /** Keyword of the definition, used in messages and to search compiled modules. */
  readonly keyword: string;
  readonly reference: string;
  readonly resolved: (found: DefinitionTarget) => void;
}

/**
 * Resolve a possibly prefixed reference to a typedef-like definition.
 * Local names are looked up lexically from `ctx`; prefixed names from the top
 * level of the module the prefix is bound to.
 */
export function requireDefinition(ctx: StatementContext, options: RequireDefinitionOptions): void {
  const { prefix, name } = splitQualifiedName(options.reference);

  let scope = ctx;
  if (prefix !== null && !isLocalPrefix(ctx, prefix)) {
    const linked = linkedModule(ctx, prefix);
    if (!linked) {
      throw ctx.sourceError(`Unknown prefix '${prefix}' in '${options.reference}'`);
    }
    if (linked.compiled) {
      const found = findCompiled(linked.compiled.statement, options.keyword, name);
      if (!found) throw ctx.sourceError(`${options.keyword} '${options.reference}' was not found`);
      options.resolved({ target: found, module: formatIdentity(linked.compiled.identity) });
      return;
    }
    if (!linked.root) {
      throw ctx.sourceError(`Prefix '${prefix}' is not bound to a module`);
    }
    scope = linked.root;
  }

  const action = ctx.newAction(options.phase);
  const definition = action.requires(options.partition, name, { from: scope });
  action.apply({
    apply() {
      options.resolved({ target: definition.value, module: formatIdentity(definition.value.moduleIdentity) });
    },
    prerequisiteFailed() {
      throw ctx.sourceError(`${options.keyword} '${options.reference}' was not found`);
    },
  });
}
