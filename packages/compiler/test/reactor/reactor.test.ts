/**
 * End-to-end reactor runs over the toy statement set.
 *
 * - Phase ordering and forward references
 * - Failure stages and diagnostics
 * - Observability (trace spans, sink, logger)
 * - Effective model and incremental compilation
 */
import { describe, test, expect } from "vitest";

import {
  compileSchema,
  createCollectingExporter,
  createTrace,
  formatIdentity,
  moduleIdentity,
  SchemaReactor,
  type CompilerDiagnostic,
  type Logger,
  type ReactorCompleted,
  type ReactorFailed,
  type ReactorOptions,
  type ReactorResult,
} from "../../src/index.js";
import { moduleSource, rev, s } from "../_helpers/sources.js";
import { probeStatement, toyRegistry } from "../_helpers/toy-statements.js";

// =============================================================================
// Helpers
// =============================================================================

function completed(result: ReactorResult): ReactorCompleted {
  if (result.status !== "completed") {
    throw new Error(`expected success, got: ${result.diagnostics.map((d) => d.message).join("; ")}`);
  }
  return result;
}

function failed(result: ReactorResult): ReactorFailed {
  if (result.status !== "failed") throw new Error("expected the compilation to fail");
  return result;
}

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: (m) => void lines.push(`log ${m}`),
    info: (m) => void lines.push(`info ${m}`),
    warn: (m) => void lines.push(`warn ${m}`),
    error: (m) => void lines.push(`error ${m}`),
  };
}

const options = (extra: Partial<ReactorOptions> = {}): ReactorOptions => ({ statements: toyRegistry(), ...extra });

// =============================================================================
// Resolution
// =============================================================================

describe("reactor resolution", () => {
  test("a reference declared before its target resolves in the same phase", () => {
    const result = completed(compileSchema([moduleSource("a", {}, s("ref", "x"), s("def", "x"))], options()));
    const [module] = result.schema.modules;
    const ref = module?.statement.substatements[0];
    expect(ref?.keyword).toBe("ref");
    expect(ref?.data).toEqual({ target: "def x" });
    expect(result.diagnostics).toEqual([]);
  });

  test("unresolved references fail the phase with one diagnostic each", () => {
    const result = failed(
      compileSchema([moduleSource("a", {}, s("ref", "missing1"), s("ref", "missing2"))], options()),
    );
    expect(result.failedStage).toBe("statement-definition");
    expect(result.diagnostics.map((d) => [d.code, d.stage, d.message])).toEqual([
      [
        "UnresolvedPrerequisite",
        "statement-definition",
        "'ref missing1' could not resolve Defs 'missing1' [at a.yang:2:3]",
      ],
      [
        "UnresolvedPrerequisite",
        "statement-definition",
        "'ref missing2' could not resolve Defs 'missing2' [at a.yang:3:3]",
      ],
    ]);
  });

  test("definitions are scoped to their own module", () => {
    const result = failed(
      compileSchema(
        [moduleSource("base", {}, s("def", "x")), moduleSource("app", { imports: ["base"] }, s("ref", "x"))],
        options(),
      ),
    );
    expect(result.diagnostics.map((d) => d.message)).toEqual([
      "'ref x' could not resolve Defs 'x' [at app.yang:2:3]",
    ]);
  });

  test("a duplicate definition fails with the second writer's location", () => {
    const result = failed(compileSchema([moduleSource("a", {}, s("def", "x"), s("def", "x"))], options()));
    expect(result.failedStage).toBe("statement-definition");
    expect(result.diagnostics.map((d) => [d.code, d.stage, d.message])).toEqual([
      [
        "DuplicateNamespaceWrite",
        "statement-definition",
        "Namespace 'Defs' already holds key 'x' [at a.yang:3:3]",
      ],
    ]);
  });
});

// =============================================================================
// Failure stages
// =============================================================================

describe("reactor failure stages", () => {
  test("sort errors stop the run before any statement is built", () => {
    const reactor = new SchemaReactor(
      [moduleSource("a", { imports: ["b"] }), moduleSource("b", { imports: ["a"] })],
      options(),
    );
    const result = failed(reactor.run());
    expect(result.failedStage).toBe("sort");
    expect(result.diagnostics.map((d) => d.code)).toEqual(["CyclicDependency"]);
    expect(reactor.tree.size).toBe(0);
  });

  test("build errors are all collected before the run stops", () => {
    const result = failed(
      compileSchema(
        [moduleSource("a", {}, s("bogus", null, s("def", "hidden")), s("count", "abc"), s("holder", "h"))],
        options(),
      ),
    );
    expect(result.failedStage).toBe("build");
    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["UnknownStatement", "Unknown statement 'bogus' [at a.yang:2:3]"],
      ["InvalidArgument", "'abc' is not a number [at a.yang:4:3]"],
      ["SubstatementValidation", "Missing 'def' substatement in 'holder'"],
    ]);
  });

  test("a source error thrown by a phase hook is reported at that phase", () => {
    const reactor = new SchemaReactor([moduleSource("a", {}, s("fail", "Nope"))], options());
    const result = failed(reactor.run());
    expect(result.failedStage).toBe("linkage");
    expect(result.diagnostics.map((d) => [d.code, d.stage, d.message])).toEqual([
      ["SourceError", "linkage", "Nope [at a.yang:2:3]"],
    ]);
    expect(reactor.tree.context(1).failed).toBe(true);
    expect(reactor.tree.context(0).failed).toBe(false);
  });

  test("a failed reactor produces no effective model", () => {
    const reactor = new SchemaReactor([moduleSource("a", {}, s("fail", "Nope"))], options());
    reactor.run();
    expect(reactor.state).toBe("failed");
    expect(() => reactor.buildEffective()).toThrow("Cannot build the effective model of a failed compilation");
  });
});

// =============================================================================
// Phase ordering
// =============================================================================

describe("reactor phase ordering", () => {
  test("every phase visits modules in sort order and statements pre-order", () => {
    const log: string[] = [];
    compileSchema(
      [
        moduleSource("a", { imports: ["b"] }, s("probe", "a1", s("probe", "a2"))),
        moduleSource("b", {}, s("probe", "b1")),
      ],
      { statements: toyRegistry(probeStatement(log)) },
    );
    expect(log).toEqual([
      "pre-linkage:b1",
      "pre-linkage:a1",
      "pre-linkage:a2",
      "linkage:b1",
      "linkage:a1",
      "linkage:a2",
      "statement-definition:b1",
      "statement-definition:a1",
      "statement-definition:a2",
      "full-declaration:b1",
      "full-declaration:a1",
      "full-declaration:a2",
      "effective-model:b1",
      "effective-model:a1",
      "effective-model:a2",
    ]);
  });

  test("no phase starts after a failed one", () => {
    const log: string[] = [];
    compileSchema([moduleSource("a", {}, s("probe", "p"), s("fail", "Nope"))], {
      statements: toyRegistry(probeStatement(log)),
    });
    expect(log).toEqual(["pre-linkage:p", "linkage:p"]);
  });

  test("every context completes every phase", () => {
    const reactor = new SchemaReactor([moduleSource("a", {}, s("ref", "x"), s("def", "x"))], options());
    completed(reactor.run());
    expect(reactor.tree.records.map((record) => record.completedPhase)).toEqual([
      "effective-model",
      "effective-model",
      "effective-model",
    ]);
  });
});

// =============================================================================
// Observability
// =============================================================================

describe("reactor observability", () => {
  test("spans cover each step and phase", () => {
    const exporter = createCollectingExporter();
    compileSchema([moduleSource("a", {}, s("ref", "x"), s("def", "x"))], options({ trace: createTrace({ exporter }) }));
    expect(exporter.spans.map((span) => span.name)).toEqual([
      "reactor:sort",
      "reactor:build",
      "phase:pre-linkage",
      "phase:linkage",
      "phase:statement-definition",
      "phase:full-declaration",
      "phase:effective-model",
      "reactor:effective",
      "reactor:compile",
    ]);
    const definition = exporter.findSpan("phase:statement-definition");
    expect(definition?.attributes.get("reactor.applied")).toBe(1);
    expect(definition?.attributes.get("reactor.status")).toBe("completed");
    const compile = exporter.findSpan("reactor:compile");
    expect(compile?.attributes.get("reactor.modules")).toBe(1);
    expect(compile?.attributes.get("reactor.status")).toBe("completed");
    expect(exporter.findSpan("reactor:build")?.attributes.get("reactor.contexts")).toBe(3);
  });

  test("the logger reports success and failure", () => {
    const ok = recordingLogger();
    compileSchema([moduleSource("a", {}, s("ref", "x"), s("def", "x"))], options({ logger: ok }));
    expect(ok.lines).toEqual(["info [reactor] compiled 1 module(s), 3 statement(s)"]);

    const bad = recordingLogger();
    compileSchema([moduleSource("a", {}, s("ref", "x"))], options({ logger: bad }));
    expect(bad.lines).toEqual(["error [reactor] statement-definition failed with 1 error(s)"]);
  });

  test("the sink sees every diagnostic once", () => {
    const reported: CompilerDiagnostic[] = [];
    const result = compileSchema(
      [
        moduleSource("bar", { revision: "2020-01-01" }),
        moduleSource("bar", { revision: "2021-01-01" }),
        moduleSource("foo", { imports: ["bar"] }, s("ref", "x")),
      ],
      options({ sink: { report: (d) => reported.push(d) } }),
    );
    expect(reported.map((d) => d.code)).toEqual(["AmbiguousImportRevision", "UnresolvedPrerequisite"]);
    expect(result.diagnostics).toEqual(reported);
  });
});

// =============================================================================
// Effective model
// =============================================================================

describe("reactor effective model", () => {
  test("run may only be called once", () => {
    const reactor = new SchemaReactor([moduleSource("a")], options());
    reactor.run();
    expect(() => reactor.run()).toThrow("Reactor already ran (completed)");
  });

  test("buildEffective needs a completed run", () => {
    const reactor = new SchemaReactor([moduleSource("a")], options());
    expect(() => reactor.buildEffective()).toThrow("Reactor has not completed its phases");
  });

  test("buildEffective rebuilds equal, separate, frozen modules", () => {
    const reactor = new SchemaReactor([moduleSource("a", {}, s("ref", "x"), s("def", "x"))], options());
    const result = completed(reactor.run());
    const again = reactor.buildEffective();
    const [first] = result.schema.modules;
    const [second] = again.modules;
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(Object.isFrozen(second)).toBe(true);
    expect(Object.isFrozen(second?.statement.substatements[0]?.location)).toBe(true);
  });

  test("ambiguous imports warn and record the chosen revision", () => {
    const result = completed(
      compileSchema(
        [
          moduleSource("bar", { revision: "2020-01-01" }),
          moduleSource("bar", { revision: "2021-01-01" }),
          moduleSource("foo", { imports: ["bar"] }),
        ],
        options(),
      ),
    );
    expect(result.warnings.map((w) => w.code)).toEqual(["AmbiguousImportRevision"]);
    expect(result.schema.findModule("foo")?.imports).toEqual([{ kind: "import", module: "bar", revision: "2020-01-01" }]);
    expect(result.schema.findModule("bar")?.identity.revision).toBe("2021-01-01");
  });

  test("a later compilation extends an existing schema", () => {
    const base = completed(compileSchema([moduleSource("base", {}, s("def", "x"))], options()));
    const next = completed(
      compileSchema([moduleSource("app", { imports: ["base"] }, s("def", "y"))], options({ existing: base.schema })),
    );
    expect(next.schema.modules.map((m) => formatIdentity(m.identity))).toEqual(["base@unspecified", "app@unspecified"]);
    expect(next.schema.get(moduleIdentity("base"))).toBe(base.schema.modules[0]);
    expect(next.schema.findModule("app")?.imports).toEqual([{ kind: "import", module: "base", revision: "unspecified" }]);
  });

  test("a source may not redeclare a module of the existing schema", () => {
    const base = completed(compileSchema([moduleSource("base", { revision: "2020-01-01" })], options()));
    const result = failed(
      compileSchema([moduleSource("base", { revision: "2020-01-01" })], options({ existing: base.schema })),
    );
    expect(result.failedStage).toBe("sort");
    expect(result.diagnostics.map((d) => d.message)).toEqual(["Module base@2020-01-01 declared twice"]);
  });

  test("revision identities come from the sources", () => {
    const result = completed(compileSchema([moduleSource("a", { revision: "2022-03-04" })], options()));
    expect(result.schema.get(moduleIdentity("a", rev("2022-03-04")))?.statement.argument).toBe("a");
  });
});
