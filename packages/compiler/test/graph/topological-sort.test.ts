import { describe, test, expect } from "vitest";

import { topologicalSort } from "../../src/graph/topological-sort.js";

function sortNames(edges: Record<string, string[]>) {
  const names = Object.keys(edges);
  return topologicalSort(names, (name) => edges[name] ?? []);
}

describe("topologicalSort", () => {
  test("places every node after its dependencies", () => {
    const result = sortNames({ app: ["lib", "util"], lib: ["util"], util: [] });
    expect(result).toEqual({ tag: "order", order: ["util", "lib", "app"] });
  });

  test("keeps input order for independent nodes", () => {
    expect(sortNames({ c: [], a: [], b: [] })).toEqual({ tag: "order", order: ["c", "a", "b"] });
  });

  test("follows edges in their stored order", () => {
    expect(sortNames({ root: ["y", "x"], x: [], y: [] })).toEqual({ tag: "order", order: ["y", "x", "root"] });
  });

  test("reports a cycle with the first member repeated", () => {
    expect(sortNames({ a: ["b"], b: ["c"], c: ["a"] })).toEqual({ tag: "cycle", cycle: ["a", "b", "c", "a"] });
  });

  test("reports a self edge", () => {
    expect(sortNames({ a: ["a"] })).toEqual({ tag: "cycle", cycle: ["a", "a"] });
  });
});
