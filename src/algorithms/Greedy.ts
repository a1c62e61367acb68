import type { Graph } from "../graph/Graph";
import type { AlgoOptions, Step, StepOverlay } from "../interfaces/interfaces";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { adjacent, heapFrontier, pathCost, pathEdges, reconstructPath } from "../utils/utils";

export const GREEDY_PSEUDOCODE = [
  "GreedyBestFirst(graph, source, target, h):",
  "  open ← [(h(source), source)]",
  "  while open not empty:",
  "    node ← open.popMin()",
  "    mark node visited",
  "    if node = target: return path(parent, target)",
  "    for each neighbour of node:",
  "      if neighbour never discovered:",
  "        parent[neighbour] ← node",
  "        open.push((h(neighbour), neighbour))",
  "  return NOT FOUND",
];

// Orders the frontier by h alone, so the path it returns can be longer than optimal
export function* algoGreedy(
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
  const estimates = new Map<string, number>();
  const parents = new Map<string, string | null>();

  parents.set(source, null);
  estimates.set(source, h(source));
  heap.push(h(source), source);
  sb.frontier(source);

  const overlay = (): StepOverlay => ({
    kind: "estimates",
    queue: heapFrontier(heap.entries(), (v) => !sb.isVisited(v)),
    estimates: Object.fromEntries(estimates),
    heuristic: heuristicType,
  });

  yield sb.emit({
    overlay: overlay(),
    line: 1,
    explanation: `Queue "${source}" with h = ${h(source)} (${heuristicType}).`,
  });

  while (heap.size()) {
    const n = heap.pop();
    // each node is queued once, so nothing popped is stale
    if (n === undefined) break;
    sb.visit(n);

    if (n === target) {
      const path = reconstructPath(parents, target);
      sb.choose(path, pathEdges(graph, path));
      const cost = pathCost(graph, path);
      yield sb.finish({
        current: n,
        overlay: overlay(),
        line: 5,
        explanation: `Reached the target "${target}" via ${path.join(" → ")} (cost ${cost}, not necessarily optimal).`,
        path,
        cost,
      });
      return;
    }

    yield sb.emit({
      current: n,
      overlay: overlay(),
      line: 3,
      explanation: `Pop "${n}", the node that looks closest to the target (h = ${estimates.get(n)}).`,
    });

    for (const { node: m, edge } of adjacent(graph, n, tieBreak)) {
      if (parents.has(m)) {
        sb.ignore(edge.key);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: overlay(),
          line: 7,
          explanation: `"${m}" was already discovered; skip ${edge.key}.`,
        });
        continue;
      }
      parents.set(m, n);
      estimates.set(m, h(m));
      heap.push(h(m), m);
      sb.frontier(m);
      sb.relax(edge.key, edge.key);
      yield sb.emit({
        current: n,
        edge: edge.key,
        overlay: overlay(),
        line: 9,
        explanation: `Queue "${m}" with h = ${h(m)}.`,
      });
    }
  }

  yield sb.finish({
    overlay: overlay(),
    line: 10,
    explanation: `Open set exhausted: "${target}" is unreachable from "${source}".`,
    path: null,
    cost: null,
  });
}
