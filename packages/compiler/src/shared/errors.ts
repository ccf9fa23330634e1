/* =============================================================================
 * REACTOR ERRORS
 * ============================================================================= */

import type { SourceLocation } from "../model/source.js";
import { formatLocation } from "../model/source.js";
import type { CompilerDiagnostic, DiagnosticStage } from "../model/diagnostics.js";
import { buildDiagnostic, ReactorErrorCode, type ReactorErrorCodeType } from "./diagnostics.js";

/**
 * Fatal reactor failure. Carries the diagnostic that will be reported when
 * the error crosses a phase boundary.
 */
export class ReactorError extends Error {
  constructor(
    public readonly diagnostic: CompilerDiagnostic,
  ) {
    super(diagnostic.message);
    this.name = "ReactorError";
  }

  get code(): string {
    return this.diagnostic.code;
  }
}

/** Raised by the sorter for graph-level failures (duplicates, cycles, bad imports). */
export class ModuleSortError extends ReactorError {
  constructor(code: ReactorErrorCodeType, message: string, data?: Record<string, unknown>, location?: SourceLocation) {
    super(buildDiagnostic({ code, message, stage: "sort", location, ...(data ? { data } : {}) }));
    this.name = "ModuleSortError";
  }
}

/**
 * User-input error raised by a statement definition. The stage is filled in
 * by the reactor when it catches the error.
 */
export class SourceError extends ReactorError {
  constructor(
    public readonly location: SourceLocation | null,
    message: string,
    code: string = ReactorErrorCode.SourceError,
    stage: DiagnosticStage = "build",
  ) {
    super(buildDiagnostic({ code, message: `${message} [at ${formatLocation(location)}]`, stage, location }));
    this.name = "SourceError";
  }
}

/** A (partition, key) pair was written twice in the same storage. */
export class NamespaceWriteError extends ReactorError {
  constructor(partition: string, key: string, location: SourceLocation | null, stage: DiagnosticStage) {
    super(
      buildDiagnostic({
        code: ReactorErrorCode.DuplicateNamespaceWrite,
        message: `Namespace '${partition}' already holds key '${key}' [at ${formatLocation(location)}]`,
        stage,
        location,
        data: { partition, key },
      }),
    );
    this.name = "NamespaceWriteError";
  }
}

/** Attach the stage a caught error surfaced in, when the thrower could not know it. */
export function diagnosticAtStage(error: ReactorError, stage: DiagnosticStage): CompilerDiagnostic {
  return error.diagnostic.stage === stage ? error.diagnostic : { ...error.diagnostic, stage };
}
