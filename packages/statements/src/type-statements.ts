import {
  defineStatement,
  effectiveStatement,
  invalidArgument,
  stringArgument,
  SubstatementValidator,
} from "@schema-reactor/compiler";
import { publishUnique, requireDefinition, splitQualifiedName } from "./linking.js";
import { ResolvedType, Typedefs } from "./namespaces.js";

export const BUILTIN_TYPES: ReadonlySet<string> = new Set([
  "binary",
  "bits",
  "boolean",
  "decimal64",
  "empty",
  "enumeration",
  "identityref",
  "instance-identifier",
  "int8",
  "int16",
  "int32",
  "int64",
  "leafref",
  "string",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "union",
]);

/** Typedefs are visible to their siblings and everything below their parent. */
export const typedefStatement = defineStatement<string>({
  keyword: "typedef",
  parseArgument(raw, location) {
    const name = stringArgument(raw, location);
    if (BUILTIN_TYPES.has(name)) throw invalidArgument(location, `Typedef may not redefine built-in type '${name}'`);
    return name;
  },
  validator: SubstatementValidator.builder("typedef")
    .addMandatory("type")
    .addOptional("description")
    .addOptional("reference")
    .build(),
  onPhaseEntry: {
    "statement-definition"(ctx) {
      const scope = ctx.parent;
      if (!scope) throw ctx.sourceError("'typedef' cannot be a module root");
      publishUnique(scope, Typedefs, ctx.argument, ctx, ctx, "Typedef");
    },
  },
});

/**
 * A built-in type name, or a reference to a typedef (`name` or `prefix:name`)
 * resolved once every typedef has been published.
 */
export const typeStatement = defineStatement<string>({
  keyword: "type",
  parseArgument: stringArgument,
  validator: SubstatementValidator.builder("type").addAny("type").build(),
  onPhaseEntry: {
    "full-declaration"(ctx) {
      const { prefix, name } = splitQualifiedName(ctx.argument);
      if (prefix === null && BUILTIN_TYPES.has(name)) {
        ctx.addToNamespace(ResolvedType, null, { name, builtin: true });
        return;
      }

      const enclosing = ctx.parent;
      requireDefinition(ctx, {
        phase: "full-declaration",
        partition: Typedefs,
        keyword: "typedef",
        reference: ctx.argument,
        resolved({ target, module }) {
          if (target === enclosing) throw ctx.sourceError(`Typedef '${name}' refers to itself`);
          ctx.addToNamespace(ResolvedType, null, { name, module });
        },
      });
    },
  },
  createEffective(ctx, substatements) {
    const resolved = ctx.getFromNamespace(ResolvedType, null);
    return effectiveStatement(ctx, substatements, resolved ? { ...resolved } : undefined);
  },
});
