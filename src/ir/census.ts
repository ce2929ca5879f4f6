import type { Graph } from "./graph";

export type CensusOptions = {
  /** Also count nodes inside body graphs. */
  recursive?: boolean;
};

/**
 * Count surviving nodes per operator type. Op types that do not occur are
 * absent from the result; use `countOp` for a zero default.
 */
export function getNodeCount(graph: Graph, options: CensusOptions = {}): Record<string, number> {
  const counts: Record<string, number> = {};
  const graphs = options.recursive ? graph.walk() : [graph];
  for (const scope of graphs) {
    for (const node of scope.nodes) {
      counts[node.op] = (counts[node.op] ?? 0) + 1;
    }
  }
  return counts;
}

export function countOp(graph: Graph, op: string, options: CensusOptions = {}): number {
  return getNodeCount(graph, options)[op] ?? 0;
}

export function totalNodeCount(graph: Graph, options: CensusOptions = {}): number {
  return Object.values(getNodeCount(graph, options)).reduce((acc, n) => acc + n, 0);
}
