/* =======================================================================================
 * COMPILE TRACE - instrumentation for reactor runs
 * ---------------------------------------------------------------------------------------
 * Hierarchical spans (sort → build → phase:* → effective) with attributes and
 * point-in-time events. Exporters observe span lifecycle; NOOP_TRACE is the
 * default when nobody is listening.
 * ======================================================================================= */

export type AttributeValue = string | number | boolean | null | readonly AttributeValue[];

export type ReadonlyAttributeMap = ReadonlyMap<string, AttributeValue>;

export interface SpanEvent {
  readonly name: string;
  /** Nanoseconds, from process.hrtime.bigint */
  readonly timestamp: bigint;
  readonly attributes: ReadonlyAttributeMap;
}

export interface Span {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: Span | null;
  readonly children: readonly Span[];
  readonly startTime: bigint;
  readonly endTime: bigint | null;
  readonly duration: bigint | null;
  readonly attributes: ReadonlyAttributeMap;
  readonly events: readonly SpanEvent[];

  end(): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
}

export interface TraceExporter {
  onSpanStart(span: Span): void;
  onSpanEnd(span: Span): void;
  onEvent(span: Span, event: SpanEvent): void;
}

/**
 * Main instrumentation API.
 *
 * @example
 * const trace = options.trace ?? NOOP_TRACE;
 * const order = trace.span("reactor:sort", () => sortModules(sources));
 */
export interface CompileTrace {
  /** Run `fn` inside a named span; the span ends when `fn` returns or throws. */
  span<T>(name: string, fn: () => T): T;
  /** Record an event on the current span. */
  event(name: string, attributes?: Record<string, AttributeValue>): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  currentSpan(): Span | undefined;
  rootSpan(): Span;
}

/** Attribute keys shared by every reactor trace. */
export const ReactorAttributes = {
  PHASE: "reactor.phase",
  MODULE_COUNT: "reactor.modules",
  CONTEXT_COUNT: "reactor.contexts",
  ACTION_COUNT: "reactor.actions",
  APPLIED_COUNT: "reactor.applied",
  FAILED_COUNT: "reactor.failed",
  PASS_COUNT: "reactor.passes",
  NAMESPACE_WRITES: "reactor.namespace_writes",
  DIAG_ERROR_COUNT: "diag.errors",
  DIAG_WARNING_COUNT: "diag.warnings",
  STATUS: "reactor.status",
} as const;

export type ReactorAttributeKey = (typeof ReactorAttributes)[keyof typeof ReactorAttributes];

// =============================================================================
// No-op implementation
// =============================================================================

export const NOOP_SPAN: Span = {
  name: "",
  spanId: "",
  traceId: "",
  parent: null,
  children: [],
  startTime: 0n,
  endTime: null,
  duration: null,
  attributes: new Map(),
  events: [],
  end: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  addEvent: () => {},
};

export const NOOP_TRACE: CompileTrace = {
  span: <T>(_name: string, fn: () => T): T => fn(),
  event: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  currentSpan: () => undefined,
  rootSpan: () => NOOP_SPAN,
};

export function nowNanos(): bigint {
  return process.hrtime.bigint();
}

export function formatDuration(nanos: bigint): string {
  const ns = Number(nanos);
  if (ns < 1_000) return `${ns}ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(2)}µs`;
  if (ns < 1_000_000_000) return `${(ns / 1_000_000).toFixed(2)}ms`;
  return `${(ns / 1_000_000_000).toFixed(2)}s`;
}

// =============================================================================
// Recording implementation
// =============================================================================

let spanCounter = 0;
let traceCounter = 0;

class RecordingSpan implements Span {
  readonly spanId = `span_${++spanCounter}`;
  readonly startTime = nowNanos();
  readonly #children: Span[] = [];
  readonly #attributes = new Map<string, AttributeValue>();
  readonly #events: SpanEvent[] = [];
  #endTime: bigint | null = null;
  #onEnd: (() => void) | null = null;

  constructor(
    readonly name: string,
    readonly traceId: string,
    readonly parent: RecordingSpan | null,
    private readonly exporter: TraceExporter | null,
  ) {
    parent?.#children.push(this);
    exporter?.onSpanStart(this);
  }

  get endTime(): bigint | null {
    return this.#endTime;
  }

  get duration(): bigint | null {
    return this.#endTime === null ? null : this.#endTime - this.startTime;
  }

  get children(): readonly Span[] {
    return this.#children;
  }

  get attributes(): ReadonlyAttributeMap {
    return this.#attributes;
  }

  get events(): readonly SpanEvent[] {
    return this.#events;
  }

  /** Hook used by the trace to restore the previous current span. */
  whenEnded(fn: () => void): void {
    this.#onEnd = fn;
  }

  end(): void {
    if (this.#endTime !== null) return;
    this.#endTime = nowNanos();
    this.exporter?.onSpanEnd(this);
    this.#onEnd?.();
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.#attributes.set(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    for (const [key, value] of Object.entries(attrs)) this.#attributes.set(key, value);
  }

  addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
    const event: SpanEvent = {
      name,
      timestamp: nowNanos(),
      attributes: new Map(Object.entries(attributes ?? {})),
    };
    this.#events.push(event);
    this.exporter?.onEvent(this, event);
  }
}

export interface CreateTraceOptions {
  /** Root span name, defaults to "trace" */
  name?: string;
  exporter?: TraceExporter;
  traceId?: string;
}

class RecordingTrace implements CompileTrace {
  readonly #root: RecordingSpan;
  readonly #exporter: TraceExporter | null;
  #current: RecordingSpan;

  constructor(options: CreateTraceOptions) {
    this.#exporter = options.exporter ?? null;
    const traceId = options.traceId ?? `trace_${Date.now().toString(36)}_${++traceCounter}`;
    this.#root = new RecordingSpan(options.name ?? "trace", traceId, null, this.#exporter);
    this.#current = this.#root;
  }

  span<T>(name: string, fn: () => T): T {
    const previous = this.#current;
    const span = new RecordingSpan(name, this.#root.traceId, previous, this.#exporter);
    span.whenEnded(() => {
      if (this.#current === span) this.#current = previous;
    });
    this.#current = span;
    try {
      return fn();
    } catch (error) {
      span.setAttribute("error", true);
      span.setAttribute("error.message", error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      span.end();
    }
  }

  event(name: string, attributes?: Record<string, AttributeValue>): void {
    this.#current.addEvent(name, attributes);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.#current.setAttribute(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    this.#current.setAttributes(attrs);
  }

  currentSpan(): Span | undefined {
    return this.#current;
  }

  rootSpan(): Span {
    return this.#root;
  }
}

/**
 * Create a trace for one compilation.
 *
 * @example
 * const exporter = createCollectingExporter();
 * const trace = createTrace({ name: "compile", exporter });
 * compileSchema(sources, { statements, trace });
 */
export function createTrace(options: CreateTraceOptions = {}): CompileTrace {
  return new RecordingTrace(options);
}

// =============================================================================
// Collecting exporter
// =============================================================================

/** Keeps every finished span and event in memory; used by tests and tooling. */
export class CollectingExporter implements TraceExporter {
  readonly spans: Span[] = [];
  readonly events: { span: Span; event: SpanEvent }[] = [];

  onSpanStart(): void {}

  onSpanEnd(span: Span): void {
    this.spans.push(span);
  }

  onEvent(span: Span, event: SpanEvent): void {
    this.events.push({ span, event });
  }

  findSpan(name: string): Span | undefined {
    return this.spans.find((s) => s.name === name);
  }

  clear(): void {
    this.spans.length = 0;
    this.events.length = 0;
  }
}

export function createCollectingExporter(): CollectingExporter {
  return new CollectingExporter();
}
