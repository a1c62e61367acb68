import type { Graph } from "../graph/Graph";
import type { AlgoOptions, Step } from "../interfaces/interfaces";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { adjacent, pathCost, pathEdges, reconstructPath } from "../utils/utils";

export const BFS_PSEUDOCODE = [
  "BFS(graph, source, target):",
  "  queue ← [source]; parent[source] ← none",
  "  while queue not empty:",
  "    node ← queue.dequeue()",
  "    mark node visited",
  "    if node = target: return path(parent, target)",
  "    for each neighbour of node:",
  "      if neighbour never discovered:",
  "        parent[neighbour] ← node",
  "        queue.enqueue(neighbour)",
  "  return NOT FOUND",
];

export function* algoBFS(
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const tieBreak = options.tieBreak ?? "insertion";
  const sb = new StepBuilder(graph, source, target);
  const openQ: string[] = [source];
  const parents = new Map<string, string | null>();
  parents.set(source, null);
  sb.frontier(source);

  yield sb.emit({
    overlay: { kind: "queue", queue: [...openQ] },
    line: 1,
    explanation: `Start at "${source}": it is the only node in the queue.`,
  });

  while (openQ.length) {
    const n = openQ.shift();
    if (n === undefined) break;
    sb.visit(n);

    if (n === target) {
      const path = reconstructPath(parents, target);
      sb.choose(path, pathEdges(graph, path));
      const cost = pathCost(graph, path);
      yield sb.finish({
        current: n,
        overlay: { kind: "queue", queue: [...openQ] },
        line: 5,
        explanation: `Dequeued the target "${target}". Path ${path.join(" → ")} uses ${path.length - 1} edge(s), cost ${cost}.`,
        path,
        cost,
      });
      return;
    }

    yield sb.emit({
      current: n,
      overlay: { kind: "queue", queue: [...openQ] },
      line: 4,
      explanation: `Dequeue "${n}" and mark it visited.`,
    });

    for (const { node: m, edge } of adjacent(graph, n, tieBreak)) {
      if (parents.has(m)) {
        sb.ignore(edge.key);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: { kind: "queue", queue: [...openQ] },
          line: 7,
          explanation: `"${m}" was already discovered; skip ${edge.key}.`,
        });
        continue;
      }
      parents.set(m, n);
      openQ.push(m);
      sb.frontier(m);
      sb.relax(edge.key, edge.key);
      yield sb.emit({
        current: n,
        edge: edge.key,
        overlay: { kind: "queue", queue: [...openQ] },
        line: 9,
        explanation: `Discover "${m}" from "${n}" and enqueue it.`,
      });
    }
  }

  yield sb.finish({
    overlay: { kind: "queue", queue: [] },
    line: 10,
    explanation: `Queue exhausted: "${target}" is unreachable from "${source}".`,
    path: null,
    cost: null,
  });
}
