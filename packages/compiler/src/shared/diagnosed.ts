/* =======================================================================================
 * DIAGNOSTIC ACCUMULATION
 * ---------------------------------------------------------------------------------------
 * Tree building and the phase scheduler keep going after the first error so a
 * failed compilation reports everything it found.
 * ======================================================================================= */

import type { CompilerDiagnostic, DiagnosticSink } from "../model/diagnostics.js";

/**
 * Imperative accumulation, split by severity so callers can decide whether a
 * step failed without rescanning. With a sink, every diagnostic is forwarded
 * as soon as it is pushed.
 */
export class DiagnosticAccumulator {
  private readonly _diagnostics: CompilerDiagnostic[] = [];
  private _errorCount = 0;

  constructor(private readonly sink?: DiagnosticSink) {}

  push(d: CompilerDiagnostic): void {
    this._diagnostics.push(d);
    if (d.severity === "error") this._errorCount++;
    this.sink?.report(d);
  }

  pushAll(ds: readonly CompilerDiagnostic[]): void {
    for (const d of ds) this.push(d);
  }

  get diagnostics(): readonly CompilerDiagnostic[] {
    return this._diagnostics;
  }

  get errors(): readonly CompilerDiagnostic[] {
    return this._diagnostics.filter((d) => d.severity === "error");
  }

  get warnings(): readonly CompilerDiagnostic[] {
    return this._diagnostics.filter((d) => d.severity === "warning");
  }

  get errorCount(): number {
    return this._errorCount;
  }
}
