import type { Graph } from "../graph/Graph";
import type { Neighbor } from "../interfaces/interfaces";
import type { TieBreak } from "../types/types";

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

export const byKey = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

// Unblocked neighbours of a node, in the order the tie-break rule asks for
export function adjacent(
  graph: Graph,
  key: string,
  tieBreak: TieBreak = "insertion",
  direction: "out" | "in" = "out"
): Neighbor[] {
  const list = direction === "out" ? graph.neighbors(key) : graph.predecessors(key);
  const out = list.filter((n) => !graph.isBlocked(n.node));
  if (tieBreak === "key") out.sort((a, b) => byKey(a.node, b.node));
  return out;
}

// Reconstruct path from parents
export function reconstructPath(
  parents: Map<string, string | null>,
  goal: string
): string[] {
  const path: string[] = [];
  let cur: string | null | undefined = goal;
  while (cur != null) {
    path.push(cur);
    cur = parents.get(cur);
  }
  return path.reverse();
}

// Sum of the cheapest edge between each consecutive pair
export function pathCost(graph: Graph, path: string[]): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    const e = graph.edgeBetween(path[i - 1], path[i]);
    if (!e) return Infinity;
    total += e.weight;
  }
  return total;
}

// Edges chosen along a path, one per hop
export function pathEdges(graph: Graph, path: string[]): string[] {
  const keys: string[] = [];
  for (let i = 1; i < path.length; i++) {
    const e = graph.edgeBetween(path[i - 1], path[i]);
    if (e) keys.push(e.key);
  }
  return keys;
}

/**
 * True when any negative cycle exists among unblocked nodes, reachable
 * from anywhere. Runs Bellman-Ford from a virtual source joined to every
 * node with weight 0.
 */
export function hasNegativeCycle(graph: Graph): boolean {
  const arcs = graph
    .arcs()
    .filter((a) => !graph.isBlocked(a.from) && !graph.isBlocked(a.to));
  const dist = new Map<string, number>();
  for (const n of graph.nodes) if (!n.blocked) dist.set(n.key, 0);

  for (let round = 0; round < dist.size; round++) {
    let changed = false;
    for (const { from, to, edge } of arcs) {
      const du = dist.get(from) ?? 0;
      const dv = dist.get(to) ?? 0;
      if (du + edge.weight < dv) {
        dist.set(to, du + edge.weight);
        changed = true;
      }
    }
    if (!changed) return false;
  }
  return true;
}

// Live heap entries in pop order, dropping finalised and superseded ones
export function heapFrontier(
  entries: { k: number; v: string }[],
  isLive: (node: string, key: number) => boolean
) {
  return entries.filter((e) => isLive(e.v, e.k)).map((e) => ({ node: e.v, priority: e.k }));
}

