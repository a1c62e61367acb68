import type { Graph } from "../graph/Graph";
import type { AlgoOptions, Step, StepOverlay } from "../interfaces/interfaces";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { byKey, pathCost, pathEdges } from "../utils/utils";

export const FLOYD_WARSHALL_PSEUDOCODE = [
  "FloydWarshall(graph, source, target):",
  "  dist ← edge weights (0 on the diagonal, ∞ elsewhere)",
  "  next[i][j] ← j for every edge (i, j)",
  "  for k in nodes:",
  "    for i in nodes:",
  "      for j in nodes:",
  "        if dist[i][k] + dist[k][j] < dist[i][j]:",
  "          dist[i][j] ← dist[i][k] + dist[k][j]",
  "          next[i][j] ← next[i][k]",
  "  if dist[v][v] < 0 for some v: return NEGATIVE CYCLE",
  "  return path(next, source, target)",
];

/**
 * All-pairs shortest paths. Every improved matrix cell is a relaxation
 * event keyed "<row>|<col>"; a node counts as visited once its k-round
 * completes.
 */
export function* algoFloydWarshall(
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const sb = new StepBuilder(graph, source, target);
  const nodes = graph.nodes.filter((n) => !n.blocked).map((n) => n.key);
  if (options.tieBreak === "key") nodes.sort(byKey);
  const n = nodes.length;
  const idx = new Map(nodes.map((key, i) => [key, i] as const));

  const dist: number[][] = nodes.map((_, i) => nodes.map((__, j) => (i === j ? 0 : Infinity)));
  const next: (number | null)[][] = nodes.map((_, i) => nodes.map((__, j) => (i === j ? j : null)));

  for (const { from, to, edge } of graph.arcs()) {
    const u = idx.get(from);
    const v = idx.get(to);
    if (u === undefined || v === undefined) continue;
    if (edge.weight < dist[u][v]) {
      dist[u][v] = edge.weight;
      next[u][v] = v;
    }
  }

  const overlay = (k: number | null, highlight: [string, string] | null = null): StepOverlay => ({
    kind: "matrix",
    nodes: [...nodes],
    k: k === null ? null : nodes[k],
    matrix: dist.map((row) => [...row]),
    highlight,
  });

  yield sb.emit({
    overlay: overlay(null),
    line: 1,
    explanation: `Initialise the ${n}×${n} distance matrix from the edges: 0 on the diagonal, ∞ where no edge exists.`,
  });

  for (let k = 0; k < n; k++) {
    const via = nodes[k];
    let updates = 0;
    yield sb.emit({
      current: via,
      overlay: overlay(k),
      line: 3,
      explanation: `k = "${via}": allow paths through "${via}".`,
    });

    for (let i = 0; i < n; i++) {
      if (dist[i][k] === Infinity) continue;
      for (let j = 0; j < n; j++) {
        if (dist[k][j] === Infinity) continue;
        const nd = dist[i][k] + dist[k][j];
        if (nd >= dist[i][j]) continue;

        const old = dist[i][j];
        dist[i][j] = nd;
        next[i][j] = next[i][k];
        updates++;

        const lit: string[] = [];
        const e1 = graph.edgeBetween(nodes[i], via);
        const e2 = graph.edgeBetween(via, nodes[j]);
        if (e1) lit.push(e1.key);
        if (e2) lit.push(e2.key);
        sb.relax(`${nodes[i]}|${nodes[j]}`, ...lit);
        sb.frontier(nodes[i]);
        sb.frontier(nodes[j]);

        yield sb.emit({
          current: via,
          overlay: overlay(k, [nodes[i], nodes[j]]),
          line: 7,
          explanation: `dist["${nodes[i]}"]["${nodes[j]}"]: ${dist[i][k]} + ${dist[k][j]} = ${nd} < ${old} via "${via}".`,
        });
      }
    }

    sb.visit(via);
    yield sb.emit({
      overlay: overlay(k),
      line: 3,
      explanation: `Round k = "${via}" complete: ${updates} update(s).`,
    });
  }

  const cycleAt = nodes.findIndex((_, i) => dist[i][i] < 0);
  if (cycleAt >= 0) {
    yield sb.finish({
      overlay: overlay(null),
      line: 9,
      explanation: `dist["${nodes[cycleAt]}"]["${nodes[cycleAt]}"] is negative: the graph has a negative cycle.`,
      path: null,
      cost: null,
      negativeCycle: true,
    });
    return;
  }

  const si = idx.get(source);
  const ti = idx.get(target);
  const path = si === undefined || ti === undefined ? null : walk(next, nodes, si, ti);
  if (!path) {
    yield sb.finish({
      overlay: overlay(null),
      line: 10,
      explanation: `All pairs computed; "${target}" is not reachable from "${source}".`,
      path: null,
      cost: null,
    });
    return;
  }

  sb.choose(path, pathEdges(graph, path));
  const cost = pathCost(graph, path);
  yield sb.finish({
    current: target,
    overlay: overlay(null, [source, target]),
    line: 10,
    explanation: `All pairs computed. Path ${path.join(" → ")} follows the next-hop matrix, cost ${cost}.`,
    path,
    cost,
  });
}

// Follow next-hop entries from i to j
function walk(
  next: (number | null)[][],
  nodes: string[],
  i: number,
  j: number
): string[] | null {
  const path = [nodes[i]];
  let cur = i;
  while (cur !== j) {
    const hop = next[cur][j];
    if (hop === null || path.length > nodes.length) return null;
    cur = hop;
    path.push(nodes[cur]);
  }
  return path;
}
