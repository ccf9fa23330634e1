import type { ModuleSource, StatementSource } from "../model/source.js";
import { formatLocation } from "../model/source.js";
import type { DiagnosticAccumulator } from "../shared/diagnosed.js";
import { buildDiagnostic, ReactorErrorCode } from "../shared/diagnostics.js";
import { diagnosticAtStage, ReactorError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import type { StatementRegistry } from "./definitions.js";
import type { ContextTree, StatementContext } from "./statement-context.js";

/**
 * Create the contexts of one module, pre-order, in declaration order.
 *
 * Errors (unknown keywords, rejected arguments, substatement cardinality) are
 * collected rather than thrown so a single run reports all of them. A
 * statement that cannot be created is skipped together with its subtree.
 *
 * @returns the root context, or `null` when the root itself was rejected
 */
export function buildModuleContexts(
  tree: ContextTree,
  module: ModuleSource,
  registry: StatementRegistry,
  diagnostics: DiagnosticAccumulator,
): StatementContext | null {
  const before = tree.size;

  function build(source: StatementSource, parent: StatementContext | null): StatementContext | null {
    const definition = registry.get(source.keyword);
    if (!definition) {
      diagnostics.push(
        buildDiagnostic({
          code: ReactorErrorCode.UnknownStatement,
          message: `Unknown statement '${source.keyword}' [at ${formatLocation(source.location)}]`,
          stage: "build",
          location: source.location,
          data: { keyword: source.keyword },
        }),
      );
      return null;
    }

    let argument: unknown;
    try {
      argument = definition.parseArgument(source.argument, source.location);
    } catch (error) {
      if (!(error instanceof ReactorError)) throw error;
      diagnostics.push(diagnosticAtStage(error, "build"));
      return null;
    }

    const ctx = tree.create(definition, source, argument, parent, module);
    for (const child of source.substatements) {
      build(child, ctx);
    }
    if (definition.validator) {
      diagnostics.pushAll(definition.validator.validate(ctx));
    }
    return ctx;
  }

  const root = build(module.root, null);
  debug.tree("module.built", { module: module.identity.name, contexts: tree.size - before });
  return root;
}
