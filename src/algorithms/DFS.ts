import type { Graph } from "../graph/Graph";
import type { AlgoOptions, Step } from "../interfaces/interfaces";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { adjacent, pathCost, pathEdges, reconstructPath } from "../utils/utils";

export const DFS_PSEUDOCODE = [
  "DFS(graph, source, target):",
  "  stack ← [source]; parent[source] ← none",
  "  while stack not empty:",
  "    node ← stack.pop()",
  "    if node visited: continue",
  "    mark node visited",
  "    if node = target: return path(parent, target)",
  "    for each neighbour of node, last to first:",
  "      if neighbour not visited:",
  "        parent[neighbour] ← node",
  "        stack.push(neighbour)",
  "  return NOT FOUND",
];

export function* algoDFS(
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const tieBreak = options.tieBreak ?? "insertion";
  const sb = new StepBuilder(graph, source, target);
  const stack: string[] = [source];
  const parents = new Map<string, string | null>();
  parents.set(source, null);
  sb.frontier(source);

  // top of the stack first
  const overlay = () => ({ kind: "stack" as const, stack: [...stack].reverse() });

  yield sb.emit({
    overlay: overlay(),
    line: 1,
    explanation: `Push "${source}" onto the stack.`,
  });

  while (stack.length) {
    const n = stack.pop();
    if (n === undefined) break;
    if (sb.isVisited(n)) {
      yield sb.emit({
        current: n,
        overlay: overlay(),
        line: 4,
        explanation: `"${n}" was already visited; discard it.`,
      });
      continue;
    }
    sb.visit(n);

    if (n === target) {
      const path = reconstructPath(parents, target);
      sb.choose(path, pathEdges(graph, path));
      const cost = pathCost(graph, path);
      yield sb.finish({
        current: n,
        overlay: overlay(),
        line: 6,
        explanation: `Popped the target "${target}". Path ${path.join(" → ")} found with cost ${cost}; DFS does not promise it is the shortest.`,
        path,
        cost,
      });
      return;
    }

    yield sb.emit({
      current: n,
      overlay: overlay(),
      line: 5,
      explanation: `Pop "${n}" and mark it visited.`,
    });

    // pushed in reverse so the first neighbour is explored first
    for (const { node: m, edge } of adjacent(graph, n, tieBreak).reverse()) {
      if (sb.isVisited(m)) {
        sb.ignore(edge.key);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: overlay(),
          line: 8,
          explanation: `"${m}" is already visited; skip ${edge.key}.`,
        });
        continue;
      }
      parents.set(m, n);
      stack.push(m);
      sb.frontier(m);
      sb.relax(edge.key, edge.key);
      yield sb.emit({
        current: n,
        edge: edge.key,
        overlay: overlay(),
        line: 10,
        explanation: `Push "${m}" from "${n}".`,
      });
    }
  }

  yield sb.finish({
    overlay: overlay(),
    line: 11,
    explanation: `Stack exhausted: "${target}" is unreachable from "${source}".`,
    path: null,
    cost: null,
  });
}
