// Shared reactor infrastructure
//
// Cross-cutting utilities used by every layer.
// IMPORTANT: This module only imports from model/ - no other reactor layers.

// Diagnostics
export {
  buildDiagnostic,
  isError,
  ReactorErrorCode,
  type ReactorErrorCodeType,
  type BuildDiagnosticInput,
  type CompilerDiagnostic,
  type DiagnosticSeverity,
  type DiagnosticStage,
  type DiagnosticRelated,
  type DiagnosticSink,
} from "./diagnostics.js";

// Diagnostic accumulation
export { DiagnosticAccumulator } from "./diagnosed.js";

// Errors
export { ReactorError, ModuleSortError, SourceError, NamespaceWriteError, diagnosticAtStage } from "./errors.js";

// Logging
export { type Logger, nullLogger } from "./logger.js";
export {
  debug,
  configureDebug,
  isDebugEnabled,
  refreshDebugChannels,
  DEBUG_ENV,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

// Tracing
export {
  createTrace,
  createCollectingExporter,
  CollectingExporter,
  formatDuration,
  NOOP_SPAN,
  NOOP_TRACE,
  ReactorAttributes,
  type AttributeValue,
  type CompileTrace,
  type CreateTraceOptions,
  type ReactorAttributeKey,
  type Span,
  type SpanEvent,
  type TraceExporter,
} from "./trace.js";
