import type { Graph } from "../graph/Graph";
import type { AlgoOptions, Step, StepOverlay } from "../interfaces/interfaces";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { adjacent, heapFrontier, pathEdges, reconstructPath } from "../utils/utils";

export const DIJKSTRA_PSEUDOCODE = [
  "Dijkstra(graph, source, target):",
  "  dist[v] ← ∞ for all v; dist[source] ← 0",
  "  pq ← [(0, source)]",
  "  while pq not empty:",
  "    (d, node) ← pq.popMin()",
  "    if node visited: continue",
  "    mark node visited",
  "    if node = target: return path(parent, target)",
  "    for each (neighbour, w) of node:",
  "      if dist[node] + w < dist[neighbour]:",
  "        dist[neighbour] ← dist[node] + w",
  "        parent[neighbour] ← node",
  "        pq.push((dist[neighbour], neighbour))",
  "  return NOT FOUND",
];

export function* algoDijkstra(
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const tieBreak = options.tieBreak ?? "insertion";
  const sb = new StepBuilder(graph, source, target);
  const heap = new MinHeap<string>();
  const g = new Map<string, number>();
  const parents = new Map<string, string | null>();
  g.set(source, 0);
  parents.set(source, null);
  heap.push(0, source);
  sb.frontier(source);

  const overlay = (): StepOverlay => ({
    kind: "priority",
    queue: heapFrontier(heap.entries(), (v, k) => !sb.isVisited(v) && g.get(v) === k),
    distances: Object.fromEntries(g),
  });

  yield sb.emit({
    overlay: overlay(),
    line: 2,
    explanation: `dist["${source}"] = 0, every other node starts at ∞.`,
  });

  while (heap.size()) {
    const k = heap.peekKey();
    const n = heap.pop();
    if (n === undefined) break;
    // stale entry left behind by a later improvement
    if (sb.isVisited(n)) {
      yield sb.emit({
        current: n,
        overlay: overlay(),
        line: 5,
        explanation: `Discard the stale entry ("${n}", ${k}); dist["${n}"] = ${g.get(n)} is already final.`,
      });
      continue;
    }
    sb.visit(n);
    const d = g.get(n) ?? Infinity;

    if (n === target) {
      const path = reconstructPath(parents, target);
      sb.choose(path, pathEdges(graph, path));
      yield sb.finish({
        current: n,
        overlay: overlay(),
        line: 7,
        explanation: `Popped the target "${target}" at distance ${d}. Shortest path: ${path.join(" → ")}.`,
        path,
        cost: d,
      });
      return;
    }

    yield sb.emit({
      current: n,
      overlay: overlay(),
      line: 4,
      explanation: `Pop "${n}" (dist ${d}); its distance is now final.`,
    });

    for (const { node: m, edge } of adjacent(graph, n, tieBreak)) {
      const nd = d + edge.weight;
      if (sb.isVisited(m)) {
        sb.ignore(edge.key);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: overlay(),
          line: 8,
          explanation: `"${m}" is already final; skip ${edge.key}.`,
        });
        continue;
      }
      const old = g.get(m) ?? Infinity;
      if (nd >= old) {
        sb.ignore(edge.key);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: overlay(),
          line: 9,
          explanation: `${d} + ${edge.weight} = ${nd} is no better than dist["${m}"] = ${old}.`,
        });
        continue;
      }
      g.set(m, nd);
      parents.set(m, n);
      heap.push(nd, m);
      sb.frontier(m);
      sb.relax(edge.key, edge.key);
      yield sb.emit({
        current: n,
        edge: edge.key,
        overlay: overlay(),
        line: 10,
        explanation: `Relax ${edge.key}: ${d} + ${edge.weight} = ${nd} < ${old}, update dist["${m}"].`,
      });
    }
  }

  yield sb.finish({
    overlay: overlay(),
    line: 13,
    explanation: `Priority queue exhausted: "${target}" is unreachable from "${source}".`,
    path: null,
    cost: null,
  });
}
