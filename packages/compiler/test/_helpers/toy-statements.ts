// A minimal statement set for exercising the reactor without the default
// definitions package:
//
//   module <name>   root, no semantics
//   def <name>      publishes itself in Defs at statement-definition
//   ref <name>      waits for Defs[name] at statement-definition
//   fail <message>  throws a source error on entering linkage
//   count <digits>  argument must be a number
//   holder <name>   must contain exactly one `def`
//   probe <label>   records every phase entry into a log

import {
  definePartition,
  defineStatement,
  effectiveStatement,
  invalidArgument,
  stringArgument,
  StatementRegistry,
  SubstatementValidator,
  type Phase,
  type StatementContext,
  type StatementDefinition,
} from "../../src/index.js";

export const Defs = definePartition<string, StatementContext>("Defs", "root");
export const RefTargets = definePartition<null, string>("RefTargets", "local", () => "self");

export const toyModule = defineStatement<string>({
  keyword: "module",
  parseArgument: stringArgument,
});

export const defStatement = defineStatement<string>({
  keyword: "def",
  parseArgument: stringArgument,
  onPhaseEntry: {
    "statement-definition"(ctx) {
      ctx.addToNamespace(Defs, ctx.argument, ctx);
    },
  },
});

export const refStatement = defineStatement<string>({
  keyword: "ref",
  parseArgument: stringArgument,
  onPhaseEntry: {
    "statement-definition"(ctx) {
      const action = ctx.newAction("statement-definition");
      const target = action.requires(Defs, ctx.argument);
      action.apply({
        apply() {
          ctx.addToNamespace(RefTargets, null, target.value.toString());
        },
      });
    },
  },
  createEffective(ctx, substatements) {
    return effectiveStatement(ctx, substatements, { target: ctx.getFromNamespace(RefTargets, null) ?? null });
  },
});

export const failStatement = defineStatement<string>({
  keyword: "fail",
  parseArgument: stringArgument,
  onPhaseEntry: {
    linkage(ctx) {
      throw ctx.sourceError(ctx.argument);
    },
  },
});

export const countStatement = defineStatement<number>({
  keyword: "count",
  parseArgument(raw, location) {
    const text = stringArgument(raw, location);
    if (!/^\d+$/.test(text)) throw invalidArgument(location, `'${text}' is not a number`);
    return Number(text);
  },
});

export const holderStatement = defineStatement<string>({
  keyword: "holder",
  parseArgument: stringArgument,
  validator: SubstatementValidator.builder("holder").addMandatory("def").addAny("ref").build(),
});

export function probeStatement(log: string[]): StatementDefinition<string> {
  const record = (phase: Phase) => (ctx: StatementContext<string>) => {
    log.push(`${phase}:${ctx.argument}`);
  };
  return defineStatement<string>({
    keyword: "probe",
    parseArgument: stringArgument,
    onPhaseEntry: {
      "pre-linkage": record("pre-linkage"),
      linkage: record("linkage"),
      "statement-definition": record("statement-definition"),
      "full-declaration": record("full-declaration"),
      "effective-model": record("effective-model"),
    },
  });
}

export function toyRegistry(...extra: StatementDefinition[]): StatementRegistry {
  return new StatementRegistry([
    toyModule,
    defStatement,
    refStatement,
    failStatement,
    countStatement,
    holderStatement,
    ...extra,
  ]);
}
