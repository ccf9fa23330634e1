import { compareRevisions, type RevisionComparator } from "../model/identity.js";
import type { DiagnosticSink } from "../model/diagnostics.js";
import { nullLogger, type Logger } from "../shared/logger.js";
import { NOOP_TRACE, type CompileTrace } from "../shared/trace.js";
import { EMPTY_SCHEMA_CONTEXT, type SchemaContext } from "../schema/schema-context.js";
import type { StatementRegistry } from "./definitions.js";

export interface ReactorOptions {
  /** Definitions for every keyword the sources may use. */
  statements: StatementRegistry;
  /** Previously compiled schema the new sources may import from; its modules are kept in the result. */
  existing?: SchemaContext;
  /** Order used to pick the latest revision. Defaults to calendar order. */
  revisionOrder?: RevisionComparator;
  /** Receives every diagnostic as it is produced. */
  sink?: DiagnosticSink;
  logger?: Logger;
  trace?: CompileTrace;
}

export interface ResolvedReactorOptions {
  readonly statements: StatementRegistry;
  readonly existing: SchemaContext;
  readonly revisionOrder: RevisionComparator;
  readonly sink: DiagnosticSink | undefined;
  readonly logger: Logger;
  readonly trace: CompileTrace;
}

export function resolveReactorOptions(options: ReactorOptions): ResolvedReactorOptions {
  return {
    statements: options.statements,
    existing: options.existing ?? EMPTY_SCHEMA_CONTEXT,
    revisionOrder: options.revisionOrder ?? compareRevisions,
    sink: options.sink,
    logger: options.logger ?? nullLogger,
    trace: options.trace ?? NOOP_TRACE,
  };
}
