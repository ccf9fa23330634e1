// grouping / uses / augment
//
// Groupings are published lexically like typedefs. `uses` resolves its
// grouping at full-declaration and, once the grouping itself has settled,
// publishes the grouping's data nodes under its own parent. `augment` walks its
// absolute schema path one segment per action: each step waits for the next
// data node to be published under the node found by the previous step, then
// schedules the following one.

import {
  defineStatement,
  effectiveStatement,
  formatIdentity,
  invalidArgument,
  stringArgument,
  StatementContext,
  SubstatementValidator,
  type EffectiveStatement,
  type SourceLocation,
} from "@schema-reactor/compiler";
import { withDataDefinitions } from "./data-statements.js";
import {
  linkedModule,
  publishUnique,
  requireDefinition,
  splitQualifiedName,
  stringArgumentOf,
  type QualifiedName,
} from "./linking.js";
import { AugmentTarget, Groupings, ResolvedGrouping, SchemaNodes, type SchemaNode } from "./namespaces.js";

const DATA_NODES: ReadonlySet<string> = new Set(["container", "list", "leaf", "leaf-list"]);
const AUGMENTABLE: ReadonlySet<string> = new Set(["container", "list"]);

export const groupingStatement = defineStatement<string>({
  keyword: "grouping",
  parseArgument: stringArgument,
  validator: withDataDefinitions(SubstatementValidator.builder("grouping")).addAny("typedef").addAny("grouping").build(),
  onPhaseEntry: {
    "statement-definition"(ctx) {
      const scope = ctx.parent;
      if (!scope) throw ctx.sourceError("'grouping' cannot be a module root");
      publishUnique(scope, Groupings, ctx.argument, ctx, ctx, "Grouping");
    },
  },
});

function nodeName(node: SchemaNode): string | undefined {
  if (node instanceof StatementContext) return stringArgumentOf(node);
  return typeof node.argument === "string" ? node.argument : undefined;
}

function findDataNode(statement: EffectiveStatement, name: string): EffectiveStatement | undefined {
  return statement.substatements.find((sub) => DATA_NODES.has(sub.keyword) && sub.argument === name);
}

function isAncestor(candidate: SchemaNode, ctx: StatementContext): boolean {
  for (let current = ctx.parent; current; current = current.parent) {
    if (current === candidate) return true;
  }
  return false;
}

/** Publish the grouping's data nodes under the parent of `uses` and record what it brought in. */
function instantiate(ctx: StatementContext, name: string, module: string, nodes: readonly SchemaNode[]): void {
  const parent = ctx.parent;
  if (!parent) throw ctx.sourceError("'uses' cannot be a module root");
  const names: string[] = [];
  for (const node of nodes) {
    const key = nodeName(node);
    if (key === undefined) continue;
    publishUnique(parent, SchemaNodes, key, node, ctx, "Node");
    names.push(key);
  }
  ctx.addToNamespace(ResolvedGrouping, null, { name, module, nodes: names });
}

export const usesStatement = defineStatement<string>({
  keyword: "uses",
  parseArgument: stringArgument,
  validator: SubstatementValidator.builder("uses").addOptional("description").addOptional("reference").build(),
  onPhaseEntry: {
    "full-declaration"(ctx) {
      const { name } = splitQualifiedName(ctx.argument);
      requireDefinition(ctx, {
        phase: "full-declaration",
        partition: Groupings,
        keyword: "grouping",
        reference: ctx.argument,
        resolved({ target, module }) {
          if (isAncestor(target, ctx)) throw ctx.sourceError(`Grouping '${name}' uses itself`);
          if (!(target instanceof StatementContext)) {
            instantiate(ctx, name, module, target.substatements.filter((sub) => DATA_NODES.has(sub.keyword)));
            return;
          }
          // Nested uses add to the grouping during this phase; publish its nodes once it has settled.
          const action = ctx.newAction("full-declaration");
          const grouping = action.requiresPhase(target, "full-declaration");
          action.apply({
            apply() {
              instantiate(ctx, name, module, grouping.value.namespaceEntries(SchemaNodes).map((entry) => entry.value));
            },
          });
        },
      });
    },
  },
  createEffective(ctx, substatements) {
    const resolved = ctx.getFromNamespace(ResolvedGrouping, null);
    return effectiveStatement(ctx, substatements, resolved ? { ...resolved } : undefined);
  },
});

function parseSchemaPath(raw: string | null, location: SourceLocation): string {
  const path = stringArgument(raw, location);
  if (!path.startsWith("/") || path.split("/").slice(1).some((segment) => segment.length === 0)) {
    throw invalidArgument(location, `'${path}' is not an absolute schema node path`);
  }
  return path;
}

function pathSegments(path: string): readonly QualifiedName[] {
  return path
    .split("/")
    .slice(1)
    .map((segment) => splitQualifiedName(segment));
}

export const augmentStatement = defineStatement<string>({
  keyword: "augment",
  parseArgument: parseSchemaPath,
  validator: withDataDefinitions(SubstatementValidator.builder("augment")).build(),
  onPhaseEntry: {
    "full-declaration"(ctx) {
      const segments = pathSegments(ctx.argument);
      const notFound = () => ctx.sourceError(`Augment target '${ctx.argument}' was not found`);

      const finish = (node: SchemaNode, module: string): void => {
        if (!AUGMENTABLE.has(node.keyword)) throw ctx.sourceError(`Cannot augment ${node.keyword} '${ctx.argument}'`);
        ctx.addToNamespace(AugmentTarget, null, { node, module });
        if (!(node instanceof StatementContext)) return;
        // Added nodes become children of the target, so later augments can path through them.
        for (const child of ctx.children) {
          const name = stringArgumentOf(child);
          if (DATA_NODES.has(child.keyword) && name !== undefined) {
            publishUnique(node, SchemaNodes, name, child, child, "Node");
          }
        }
      };

      // Compiled nodes are complete; the rest of the path resolves at once.
      const walkCompiled = (statement: EffectiveStatement, from: number, module: string): void => {
        let node = statement;
        for (const segment of segments.slice(from)) {
          const next = findDataNode(node, segment.name);
          if (!next) throw notFound();
          node = next;
        }
        finish(node, module);
      };

      const step = (index: number, scope: StatementContext): void => {
        const segment = segments[index];
        if (!segment) {
          finish(scope, formatIdentity(scope.moduleIdentity));
          return;
        }
        const action = ctx.newAction("full-declaration");
        const node = action.requires(SchemaNodes, segment.name, { from: scope });
        action.apply({
          apply() {
            const found = node.value;
            if (found instanceof StatementContext) step(index + 1, found);
            else walkCompiled(found, index + 1, formatIdentity(scope.moduleIdentity));
          },
          prerequisiteFailed() {
            throw notFound();
          },
        });
      };

      const prefix = segments[0]?.prefix ?? null;
      if (prefix === null) {
        step(0, ctx.root);
        return;
      }
      const linked = linkedModule(ctx, prefix);
      if (!linked) throw ctx.sourceError(`Unknown prefix '${prefix}' in '${ctx.argument}'`);
      if (linked.compiled) {
        walkCompiled(linked.compiled.statement, 0, formatIdentity(linked.identity));
        return;
      }
      step(0, linked.root ?? ctx.root);
    },
  },
  createEffective(ctx, substatements) {
    const target = ctx.getFromNamespace(AugmentTarget, null);
    return effectiveStatement(ctx, substatements, {
      target: ctx.argument,
      ...(target ? { module: target.module } : {}),
    });
  },
});
