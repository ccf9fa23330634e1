// Data definition statements: container, list, leaf, leaf-list and list keys.
// Each data node is published on its parent under its name so augment paths
// and list keys can find it.

import {
  defineStatement,
  effectiveStatement,
  stringArgument,
  SubstatementValidator,
  type StatementContext,
  type StatementDefinition,
  type SubstatementValidatorBuilder,
} from "@schema-reactor/compiler";
import { publishUnique } from "./linking.js";
import { SchemaNodes } from "./namespaces.js";

export const DATA_DEFINITIONS = ["container", "list", "leaf", "leaf-list", "uses"] as const;

/** Substatements shared by every statement that may hold data nodes. */
export function withDataDefinitions(builder: SubstatementValidatorBuilder): SubstatementValidatorBuilder {
  for (const keyword of DATA_DEFINITIONS) builder.addAny(keyword);
  return builder.addOptional("description").addOptional("reference");
}

function publishNode(ctx: StatementContext<string>): void {
  const parent = ctx.parent;
  if (!parent) throw ctx.sourceError(`'${ctx.keyword}' cannot be a module root`);
  publishUnique(parent, SchemaNodes, ctx.argument, ctx, ctx, "Node");
}

function dataNode(keyword: string, validator: SubstatementValidator): StatementDefinition<string> {
  return defineStatement<string>({
    keyword,
    parseArgument: stringArgument,
    validator,
    onPhaseEntry: {
      "statement-definition": publishNode,
    },
  });
}

export const containerStatement = dataNode(
  "container",
  withDataDefinitions(SubstatementValidator.builder("container")).addAny("typedef").addAny("grouping").build(),
);

export const leafStatement = dataNode(
  "leaf",
  SubstatementValidator.builder("leaf")
    .addMandatory("type")
    .addOptional("description")
    .addOptional("reference")
    .build(),
);

export const leafListStatement = dataNode(
  "leaf-list",
  SubstatementValidator.builder("leaf-list")
    .addMandatory("type")
    .addOptional("description")
    .addOptional("reference")
    .build(),
);

export const keyStatement = defineStatement<readonly string[]>({
  keyword: "key",
  parseArgument(raw, location) {
    return stringArgument(raw, location).split(/\s+/).filter((name) => name.length > 0);
  },
});

export const listStatement = defineStatement<string>({
  keyword: "list",
  parseArgument: stringArgument,
  validator: withDataDefinitions(SubstatementValidator.builder("list"))
    .addOptional("key")
    .addAny("typedef")
    .addAny("grouping")
    .build(),
  onPhaseEntry: {
    "statement-definition": publishNode,
    "effective-model"(ctx) {
      for (const name of keyNames(ctx)) {
        const node = ctx.getFromNamespace(SchemaNodes, name);
        if (!node || node.keyword !== "leaf") {
          throw ctx.sourceError(`Key leaf '${name}' is not defined in list '${ctx.argument}'`);
        }
      }
    },
  },
  createEffective(ctx, substatements) {
    return effectiveStatement(ctx, substatements, { keys: keyNames(ctx) });
  },
});

function keyNames(ctx: StatementContext): readonly string[] {
  const argument = ctx.firstSubstatement("key")?.argument;
  return Array.isArray(argument) ? argument.filter((name): name is string => typeof name === "string") : [];
}
