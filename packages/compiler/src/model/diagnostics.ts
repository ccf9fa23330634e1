/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions. Builder functions live in shared/diagnostics.ts.
 * ======================================================================================= */

import type { Phase } from "./phase.js";
import type { SourceLocation } from "./source.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Where the diagnostic was produced: a pre-phase step or one of the phases. */
export type DiagnosticStage = "sort" | "build" | Phase | "effective";

export interface DiagnosticRelated {
  code?: string;
  message: string;
  location?: SourceLocation | null;
}

/** Unified diagnostic envelope for every reactor step. */
export interface CompilerDiagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  location?: SourceLocation | null;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** External reporting collaborator. */
export interface DiagnosticSink {
  report(diagnostic: CompilerDiagnostic): void;
}
