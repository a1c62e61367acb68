import type { Graph } from "../graph/Graph";
import type { AlgoOptions, ScoreEntry, Step, StepOverlay } from "../interfaces/interfaces";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { adjacent, heapFrontier, pathEdges, reconstructPath } from "../utils/utils";

export const ASTAR_PSEUDOCODE = [
  "AStar(graph, source, target, h):",
  "  g[source] ← 0; f[source] ← h(source)",
  "  open ← [(f[source], source)]",
  "  while open not empty:",
  "    node ← open.popMin()",
  "    if node closed: continue",
  "    close node",
  "    if node = target: return path(parent, target)",
  "    for each (neighbour, w) of node:",
  "      tentative ← g[node] + w",
  "      if tentative < g[neighbour]:",
  "        parent[neighbour] ← node; g[neighbour] ← tentative",
  "        f[neighbour] ← g[neighbour] + h(neighbour)",
  "        open.push((f[neighbour], neighbour))",
  "  return NOT FOUND",
];

export function* algoAStar(
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const tieBreak = options.tieBreak ?? "insertion";
  const heuristicType = options.heuristic ?? "Euclidean";
  const h = buildHeuristic(graph, target, heuristicType);
  const sb = new StepBuilder(graph, source, target);
  const heap = new MinHeap<string>();
  const scores = new Map<string, ScoreEntry>();
  const parents = new Map<string, string | null>();

  const score = (key: string, g: number) => {
    const hv = h(key);
    const entry = { g, h: hv, f: g + hv };
    scores.set(key, entry);
    return entry;
  };

  parents.set(source, null);
  heap.push(score(source, 0).f, source);
  sb.frontier(source);

  const overlay = (): StepOverlay => ({
    kind: "scores",
    queue: heapFrontier(
      heap.entries(),
      (v, k) => !sb.isVisited(v) && scores.get(v)?.f === k
    ),
    scores: Object.fromEntries([...scores].map(([k, s]) => [k, { ...s }] as const)),
    heuristic: heuristicType,
  });

  yield sb.emit({
    overlay: overlay(),
    line: 1,
    explanation: `g("${source}") = 0, h = ${h(source)} using the ${heuristicType} heuristic.`,
  });

  while (heap.size()) {
    const k = heap.peekKey();
    const n = heap.pop();
    if (n === undefined) break;
    if (sb.isVisited(n)) {
      yield sb.emit({
        current: n,
        overlay: overlay(),
        line: 5,
        explanation: `"${n}" (f = ${k}) is already closed; discard it.`,
      });
      continue;
    }
    sb.visit(n);
    const s = scores.get(n) ?? { g: Infinity, h: 0, f: Infinity };

    if (n === target) {
      const path = reconstructPath(parents, target);
      sb.choose(path, pathEdges(graph, path));
      yield sb.finish({
        current: n,
        overlay: overlay(),
        line: 7,
        explanation: `Reached the target "${target}" with g = ${s.g}. Path: ${path.join(" → ")}.`,
        path,
        cost: s.g,
      });
      return;
    }

    yield sb.emit({
      current: n,
      overlay: overlay(),
      line: 6,
      explanation: `Close "${n}": g = ${s.g}, h = ${s.h}, f = ${s.f}.`,
    });

    for (const { node: m, edge } of adjacent(graph, n, tieBreak)) {
      const tentative = s.g + edge.weight;
      if (sb.isVisited(m)) {
        sb.ignore(edge.key);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: overlay(),
          line: 8,
          explanation: `"${m}" is closed; skip ${edge.key}.`,
        });
        continue;
      }
      const old = scores.get(m)?.g ?? Infinity;
      if (tentative >= old) {
        sb.ignore(edge.key);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: overlay(),
          line: 10,
          explanation: `Tentative g = ${tentative} via "${n}" does not beat g("${m}") = ${old}.`,
        });
        continue;
      }
      parents.set(m, n);
      const next = score(m, tentative);
      heap.push(next.f, m);
      sb.frontier(m);
      sb.relax(edge.key, edge.key);
      yield sb.emit({
        current: n,
        edge: edge.key,
        overlay: overlay(),
        line: 11,
        explanation: `Relax ${edge.key}: g("${m}") = ${next.g}, h = ${next.h}, f = ${next.f}.`,
      });
    }
  }

  yield sb.finish({
    overlay: overlay(),
    line: 14,
    explanation: `Open set exhausted: "${target}" is unreachable from "${source}".`,
    path: null,
    cost: null,
  });
}
