// Effective Tree Builder: completed context tree → immutable statements
//
// Runs only after every phase completed. Each context is materialized once,
// children before parents, by its definition's `createEffective` (or the
// generic shape below). The resulting graph is deep-frozen.

import { deepFreeze, type EffectiveStatement } from "../model/effective.js";
import type { ImportDescriptor, EffectiveModule } from "../model/source.js";
import { debug } from "../shared/debug.js";
import { ResolvedLinkage } from "../reactor/linkage.js";
import type { ContextTree, StatementContext } from "../reactor/statement-context.js";

/**
 * Generic effective form; definitions that only add resolved data call this
 * with their `data`.
 */
export function effectiveStatement<A>(
  ctx: StatementContext<A>,
  substatements: readonly EffectiveStatement[],
  data?: Readonly<Record<string, unknown>>,
): EffectiveStatement<A> {
  return {
    keyword: ctx.keyword,
    argument: ctx.argument,
    location: { ...ctx.location },
    substatements,
    ...(data ? { data } : {}),
  };
}

/** Materializes a completed tree. One builder is one pass; each pass builds fresh objects. */
export class EffectiveTreeBuilder {
  readonly #built = new Map<number, EffectiveStatement>();

  constructor(private readonly tree: ContextTree) {}

  get builtCount(): number {
    return this.#built.size;
  }

  statement(ctx: StatementContext): EffectiveStatement {
    const memo = this.#built.get(ctx.id);
    if (memo) return memo;

    const substatements = ctx.children.map((child) => this.statement(child));
    const definition = ctx.definition;
    const built = definition.createEffective
      ? definition.createEffective(ctx, substatements)
      : effectiveStatement(ctx, substatements);
    const frozen = deepFreeze(built);
    this.#built.set(ctx.id, frozen);
    return frozen;
  }

  /** One effective module per root, in processing order. */
  modules(): EffectiveModule[] {
    const modules = this.tree.roots.map((root) => this.module(root));
    debug.effective("modules.built", { modules: modules.length, statements: this.#built.size });
    return modules;
  }

  private module(root: StatementContext): EffectiveModule {
    const source = root.module;
    const imports = source.imports.map((descriptor): ImportDescriptor => {
      const resolved = root.getFromNamespace(ResolvedLinkage, descriptor.module);
      return {
        kind: descriptor.kind,
        module: descriptor.module,
        revision: resolved?.revision ?? descriptor.revision,
        ...(descriptor.location ? { location: { ...descriptor.location } } : {}),
      };
    });
    const module: EffectiveModule = {
      kind: "compiled",
      identity: { name: source.identity.name, revision: source.identity.revision },
      ...(source.namespace !== undefined ? { namespace: source.namespace } : {}),
      submodule: source.submodule,
      imports,
      statement: this.statement(root),
    };
    return deepFreeze(module);
  }
}
