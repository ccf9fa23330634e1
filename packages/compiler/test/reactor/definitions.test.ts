import { describe, test, expect } from "vitest";

import {
  buildModuleContexts,
  ContextTree,
  DiagnosticAccumulator,
  noArgument,
  SourceError,
  StatementRegistry,
  stringArgument,
  SubstatementValidator,
} from "../../src/index.js";
import { moduleSource, s, type Draft } from "../_helpers/sources.js";
import { defStatement, holderStatement, refStatement, toyModule, toyRegistry } from "../_helpers/toy-statements.js";

const at = { source: "t.yang", line: 4, column: 2 };

describe("argument parsers", () => {
  test("stringArgument rejects a missing or empty argument", () => {
    expect(stringArgument("x", at)).toBe("x");
    expect(() => stringArgument(null, at)).toThrow("Missing argument [at t.yang:4:2]");
    expect(() => stringArgument("", at)).toThrow(SourceError);
  });

  test("noArgument rejects any argument", () => {
    expect(noArgument(null, at)).toBeNull();
    expect(() => noArgument("x", at)).toThrow("Unexpected argument 'x' [at t.yang:4:2]");
  });
});

describe("StatementRegistry", () => {
  test("looks definitions up by keyword", () => {
    const registry = new StatementRegistry([toyModule, defStatement]);
    expect(registry.get("def")).toBe(defStatement);
    expect(registry.has("ref")).toBe(false);
    registry.register(refStatement);
    expect(registry.keywords).toEqual(["module", "def", "ref"]);
  });

  test("a keyword may be registered once", () => {
    expect(() => new StatementRegistry([defStatement, defStatement])).toThrow("Statement 'def' is already registered");
  });
});

// =============================================================================
// Substatement validation (through the tree builder)
// =============================================================================

function build(...body: Draft[]) {
  const diagnostics = new DiagnosticAccumulator();
  const tree = new ContextTree(diagnostics);
  const root = buildModuleContexts(tree, moduleSource("a", {}, ...body), toyRegistry(), diagnostics);
  return { root, tree, diagnostics };
}

describe("SubstatementValidator", () => {
  test("accepts children within their cardinality", () => {
    const { diagnostics } = build(s("holder", "h", s("def", "x"), s("ref", "x"), s("ref", "x")));
    expect(diagnostics.diagnostics).toEqual([]);
  });

  test("reports a missing mandatory child at the parent", () => {
    const { diagnostics } = build(s("holder", "h"));
    expect(diagnostics.diagnostics.map((d) => [d.message, d.location])).toEqual([
      ["Missing 'def' substatement in 'holder'", { source: "a.yang", line: 2, column: 3 }],
    ]);
  });

  test("reports an extra child at the first one over the limit", () => {
    const { diagnostics } = build(s("holder", "h", s("def", "x"), s("def", "y")));
    expect(diagnostics.diagnostics.map((d) => [d.message, d.location?.line])).toEqual([
      ["'def' may appear at most 1 time(s) in 'holder'", 4],
    ]);
  });

  test("reports a child the statement does not allow", () => {
    const { diagnostics } = build(s("holder", "h", s("def", "x"), s("count", "1")));
    expect(diagnostics.diagnostics.map((d) => [d.code, d.message, d.stage])).toEqual([
      ["SubstatementValidation", "'count' is not a valid substatement of 'holder'", "build"],
    ]);
  });

  test("a keyword may only get one rule", () => {
    expect(() => SubstatementValidator.builder("x").addAny("y").addOptional("y")).toThrow(
      "Substatement 'y' of 'x' declared twice",
    );
  });

  test("rules are exposed after build", () => {
    const validator = SubstatementValidator.builder("x").addAtLeastOne("a").addOptional("b").build();
    expect([...validator.rules]).toEqual([
      ["a", { min: 1, max: Number.POSITIVE_INFINITY }],
      ["b", { min: 0, max: 1 }],
    ]);
  });
});

describe("buildModuleContexts", () => {
  test("creates contexts pre-order with parents and roots", () => {
    const { root, tree } = build(s("holder", "h", s("def", "x")), s("def", "y"));
    expect(root?.toString()).toBe("module a");
    expect(tree.records.map((r) => r.handle.toString())).toEqual(["module a", "holder h", "def x", "def y"]);
    const holder = tree.context(1);
    expect(holder.parent).toBe(root);
    expect(tree.context(2).root).toBe(root);
    expect(tree.context(3).siblings.map((c) => c.toString())).toEqual(["holder h"]);
    expect(holder.definition).toBe(holderStatement);
    expect(holder.firstSubstatement("def")?.argument).toBe("x");
  });

  test("a rejected statement is skipped with its subtree", () => {
    const { tree, diagnostics } = build(s("count", "many", s("def", "x")), s("def", "y"));
    expect(tree.records.map((r) => r.handle.toString())).toEqual(["module a", "def y"]);
    expect(diagnostics.errors.map((d) => d.code)).toEqual(["InvalidArgument"]);
  });

  test("parsed arguments are kept on the context", () => {
    const { tree } = build(s("count", "42"));
    expect(tree.context(1).argument).toBe(42);
    expect(tree.context(1).rawArgument).toBe("42");
  });
});
