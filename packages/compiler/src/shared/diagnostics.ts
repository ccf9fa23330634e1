import type { SourceLocation } from "../model/source.js";
import type {
  CompilerDiagnostic,
  DiagnosticRelated,
  DiagnosticSeverity,
  DiagnosticStage,
} from "../model/diagnostics.js";

// Re-export foundation types from model
export type {
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticRelated,
  CompilerDiagnostic,
  DiagnosticSink,
} from "../model/diagnostics.js";

/**
 * Every code the reactor emits. Statement definitions may add their own;
 * these are the ones the core itself knows about.
 */
export const ReactorErrorCode = {
  DuplicateIdentity: "DuplicateIdentity",
  UnresolvedImport: "UnresolvedImport",
  ImportRevisionConflict: "ImportRevisionConflict",
  CyclicDependency: "CyclicDependency",
  UnresolvedPrerequisite: "UnresolvedPrerequisite",
  DuplicateNamespaceWrite: "DuplicateNamespaceWrite",
  UnknownStatement: "UnknownStatement",
  InvalidArgument: "InvalidArgument",
  SubstatementValidation: "SubstatementValidation",
  SourceError: "SourceError",
  NamespaceCollision: "NamespaceCollision",
  AmbiguousImportRevision: "AmbiguousImportRevision",
} as const;

export type ReactorErrorCodeType = (typeof ReactorErrorCode)[keyof typeof ReactorErrorCode];

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  /** Defaults to "error". */
  severity?: DiagnosticSeverity;
  location?: SourceLocation | null | undefined;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder; keeps optional fields absent rather than undefined. */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): CompilerDiagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    location: input.location ?? null,
    ...(input.related && input.related.length > 0 ? { related: input.related } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
}

export function isError(diagnostic: CompilerDiagnostic): boolean {
  return diagnostic.severity === "error";
}

