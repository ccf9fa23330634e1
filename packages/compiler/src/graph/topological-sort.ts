/**
 * Depth-first topological sort: every node comes after all nodes reachable
 * through its edges. Roots are visited in the order given and edges in their
 * stored order, so identical input always yields the identical order.
 */
export type TopologicalResult<N> =
  | { readonly tag: "order"; readonly order: readonly N[] }
  | { readonly tag: "cycle"; readonly cycle: readonly N[] };

export function topologicalSort<N>(
  nodes: readonly N[],
  edges: (node: N) => readonly N[],
): TopologicalResult<N> {
  const visiting = new Set<N>();
  const done = new Set<N>();
  const path: N[] = [];
  const order: N[] = [];

  // Returns the cycle (first member repeated at the end) when one is found.
  function visit(node: N): N[] | null {
    if (done.has(node)) return null;
    if (visiting.has(node)) {
      const start = path.indexOf(node);
      return [...path.slice(start), node];
    }

    visiting.add(node);
    path.push(node);
    for (const next of edges(node)) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    path.pop();
    visiting.delete(node);
    done.add(node);
    order.push(node);
    return null;
  }

  for (const node of nodes) {
    const cycle = visit(node);
    if (cycle) return { tag: "cycle", cycle };
  }
  return { tag: "order", order };
}
