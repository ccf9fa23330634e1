/**
 * Unit tests for CompileTrace instrumentation primitives.
 *
 * - Span lifecycle and nesting
 * - Attributes and events
 * - NOOP_TRACE pass-through
 * - Collecting exporter
 */
import { describe, test, expect } from "vitest";
import {
  createCollectingExporter,
  createTrace,
  formatDuration,
  NOOP_TRACE,
} from "../../src/shared/trace.js";

// =============================================================================
// Core Trace Tests
// =============================================================================

describe("createTrace", () => {
  test("creates a trace with a named root span", () => {
    const trace = createTrace({ name: "compile" });
    expect(trace.rootSpan().name).toBe("compile");
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  test("uses a custom traceId for every span", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ name: "compile", traceId: "trace-1", exporter });
    trace.span("work", () => undefined);
    expect(exporter.findSpan("work")?.traceId).toBe("trace-1");
  });
});

describe("span()", () => {
  test("returns the function result and ends the span", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });
    const result = trace.span("work", () => 42);
    expect(result).toBe(42);
    const span = exporter.findSpan("work");
    expect(span?.endTime).not.toBeNull();
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  test("nests spans under the current one", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ name: "root", exporter });
    trace.span("outer", () => {
      trace.span("inner", () => undefined);
    });
    expect(exporter.spans.map((s) => s.name)).toEqual(["inner", "outer"]);
    expect(exporter.findSpan("inner")?.parent?.name).toBe("outer");
    expect(exporter.findSpan("outer")?.children.map((s) => s.name)).toEqual(["inner"]);
  });

  test("marks the span on error and rethrows", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });
    expect(() =>
      trace.span("failing", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    const span = exporter.findSpan("failing");
    expect(span?.attributes.get("error")).toBe(true);
    expect(span?.attributes.get("error.message")).toBe("boom");
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });
});

describe("attributes and events", () => {
  test("attributes land on the current span", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });
    trace.span("phase:linkage", () => {
      trace.setAttribute("reactor.phase", "linkage");
      trace.setAttributes({ "reactor.passes": 2, "reactor.status": "completed" });
    });
    const attributes = exporter.findSpan("phase:linkage")?.attributes;
    expect(attributes?.get("reactor.phase")).toBe("linkage");
    expect(attributes?.get("reactor.passes")).toBe(2);
    expect(attributes?.get("reactor.status")).toBe("completed");
  });

  test("events are recorded and exported", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });
    trace.span("work", () => trace.event("stalled", { actions: 1 }));
    expect(exporter.events.map(({ span, event }) => [span.name, event.name, event.attributes.get("actions")])).toEqual([
      ["work", "stalled", 1],
    ]);
  });

  test("clear drops collected spans and events", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ exporter });
    trace.span("work", () => trace.event("tick"));
    exporter.clear();
    expect(exporter.spans).toEqual([]);
    expect(exporter.events).toEqual([]);
  });
});

describe("NOOP_TRACE", () => {
  test("runs the function and records nothing", () => {
    expect(NOOP_TRACE.span("work", () => "done")).toBe("done");
    expect(NOOP_TRACE.currentSpan()).toBeUndefined();
    expect(NOOP_TRACE.rootSpan().children).toEqual([]);
  });
});

describe("formatDuration", () => {
  test("picks a readable unit", () => {
    expect(formatDuration(500n)).toBe("500ns");
    expect(formatDuration(1_500n)).toBe("1.50µs");
    expect(formatDuration(2_500_000n)).toBe("2.50ms");
    expect(formatDuration(3_000_000_000n)).toBe("3.00s");
  });
});
