import type { Graph } from "../graph/Graph";
import type { AlgoOptions, Step, StepOverlay } from "../interfaces/interfaces";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { byKey, hasNegativeCycle, pathCost, pathEdges, reconstructPath } from "../utils/utils";

export const BELLMAN_FORD_PSEUDOCODE = [
  "BellmanFord(graph, source, target):",
  "  dist[v] ← ∞ for all v; dist[source] ← 0",
  "  for round in 1 … |V|-1:",
  "    for each edge (u, v, w):",
  "      if dist[u] + w < dist[v]:",
  "        dist[v] ← dist[u] + w; parent[v] ← u",
  "    if nothing changed this round: stop early",
  "  for each edge (u, v, w):",
  "    if dist[u] + w < dist[v]: return NEGATIVE CYCLE",
  "  return path(parent, target)",
];

/**
 * Relaxes every edge for up to |V|-1 rounds, so nodes can improve many
 * times. A node counts as visited the first time its distance becomes
 * finite. Any negative cycle in the graph ends the run with
 * `negativeCycle: true`, even one the source cannot reach.
 */
export function* algoBellmanFord(
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const sb = new StepBuilder(graph, source, target);
  const live = graph.nodes.filter((n) => !n.blocked).map((n) => n.key);
  const V = live.length;
  const dist = new Map<string, number>();
  for (const k of live) dist.set(k, Infinity);
  dist.set(source, 0);
  const parents = new Map<string, string | null>([[source, null]]);
  sb.visit(source);

  const arcs = graph
    .arcs()
    .filter((a) => !graph.isBlocked(a.from) && !graph.isBlocked(a.to));
  if (options.tieBreak === "key")
    arcs.sort((a, b) => byKey(a.from, b.from) || byKey(a.to, b.to));

  const overlay = (round: number): StepOverlay => ({
    kind: "rounds",
    round,
    distances: Object.fromEntries(dist),
  });
  const d = (k: string) => dist.get(k) ?? Infinity;

  yield sb.emit({
    current: source,
    overlay: overlay(0),
    line: 1,
    explanation: `dist["${source}"] = 0, all others ∞. Up to ${Math.max(V - 1, 0)} round(s) over ${arcs.length} directed edge(s).`,
  });

  for (let round = 1; round < V; round++) {
    yield sb.emit({
      overlay: overlay(round),
      line: 2,
      explanation: `Round ${round} of ${V - 1}: scan every edge.`,
    });

    let changed = false;
    for (const { from: u, to: v, edge } of arcs) {
      if (d(u) === Infinity) continue;
      const nd = d(u) + edge.weight;
      if (nd < d(v)) {
        const old = d(v);
        dist.set(v, nd);
        parents.set(v, u);
        sb.visit(v);
        sb.relax(edge.key, edge.key);
        changed = true;
        yield sb.emit({
          current: u,
          edge: edge.key,
          overlay: overlay(round),
          line: 5,
          explanation: `Relax ${u}→${v} (w=${edge.weight}): ${nd} < ${old}, update dist["${v}"].`,
        });
      } else {
        sb.ignore(edge.key);
        yield sb.emit({
          current: u,
          edge: edge.key,
          overlay: overlay(round),
          line: 4,
          explanation: `Edge ${u}→${v} (w=${edge.weight}): ${nd} ≥ ${d(v)}, no change.`,
        });
      }
    }

    yield sb.emit({
      overlay: overlay(round),
      line: 6,
      explanation: changed
        ? `Round ${round} complete.`
        : `Round ${round} changed nothing: distances have converged.`,
    });
    if (!changed) break;
  }

  yield sb.emit({
    overlay: overlay(V),
    line: 7,
    explanation: "Detection pass: one more scan for an edge that still improves.",
  });

  for (const { from: u, to: v, edge } of arcs) {
    if (d(u) === Infinity || d(u) + edge.weight >= d(v)) continue;
    yield sb.finish({
      current: u,
      edge: edge.key,
      overlay: overlay(V),
      line: 8,
      explanation: `Negative cycle: ${u}→${v} (w=${edge.weight}) still improves dist["${v}"]. Shortest paths are undefined.`,
      path: null,
      cost: null,
      negativeCycle: true,
    });
    return;
  }

  if (hasNegativeCycle(graph)) {
    yield sb.finish({
      overlay: overlay(V),
      line: 8,
      explanation: `The graph contains a negative cycle that "${source}" cannot reach. Shortest paths are undefined.`,
      path: null,
      cost: null,
      negativeCycle: true,
    });
    return;
  }

  if (d(target) === Infinity) {
    yield sb.finish({
      overlay: overlay(V),
      line: 9,
      explanation: `No negative cycle, but "${target}" is unreachable (dist = ∞).`,
      path: null,
      cost: null,
    });
    return;
  }

  const path = reconstructPath(parents, target);
  sb.choose(path, pathEdges(graph, path));
  const cost = pathCost(graph, path);
  yield sb.finish({
    current: target,
    overlay: overlay(V),
    line: 9,
    explanation: `No negative cycle. Shortest path ${path.join(" → ")} with cost ${cost}.`,
    path,
    cost,
  });
}
