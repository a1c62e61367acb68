import type { Graph } from "../graph/Graph";
import type { AlgoOptions, Step, StepOverlay } from "../interfaces/interfaces";
import { StepBuilder } from "../utils/stepBuilder/StepBuilder";
import { adjacent, pathCost, pathEdges, reconstructPath } from "../utils/utils";

export const BIDIRECTIONAL_BFS_PSEUDOCODE = [
  "BidirectionalBFS(graph, source, target):",
  "  qF ← [source]; parentF[source] ← none",
  "  qB ← [target]; parentB[target] ← none",
  "  while qF and qB not empty:",
  "    expand one full layer of qF along outgoing edges",
  "      if a discovered node is in parentB: meet there",
  "    expand one full layer of qB along incoming edges",
  "      if a discovered node is in parentF: meet there",
  "  return NOT FOUND",
  "  path ← chain(parentF, meet) + chain(parentB, meet)",
];

type Side = "forward" | "backward";

export function* algoBidirectionalBFS(
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const tieBreak = options.tieBreak ?? "insertion";
  const sb = new StepBuilder(graph, source, target);
  const qF: string[] = [source];
  const qB: string[] = [target];
  const parentF = new Map<string, string | null>([[source, null]]);
  const parentB = new Map<string, string | null>([[target, null]]);
  sb.frontier(source);
  sb.frontier(target);

  const overlay = (meeting: string | null = null): StepOverlay => ({
    kind: "bidirectional",
    forward: [...qF],
    backward: [...qB],
    meeting,
  });

  const stitch = (meeting: string) => {
    const path = reconstructPath(parentF, meeting);
    let cur = parentB.get(meeting);
    while (cur != null) {
      path.push(cur);
      cur = parentB.get(cur);
    }
    return path;
  };

  if (source === target) {
    sb.visit(source);
    sb.choose([source], []);
    yield sb.finish({
      current: source,
      overlay: overlay(source),
      line: 9,
      explanation: `Source and target are the same node "${source}".`,
      path: [source],
      cost: 0,
    });
    return;
  }

  yield sb.emit({
    overlay: overlay(),
    line: 2,
    explanation: `Search forward from "${source}" and backward from "${target}" at the same time.`,
  });

  const expandLayer = function* (side: Side): Generator<Step, string | null, void> {
    const queue = side === "forward" ? qF : qB;
    const mine = side === "forward" ? parentF : parentB;
    const other = side === "forward" ? parentB : parentF;
    const line = side === "forward" ? 4 : 6;
    const layer = queue.length;

    for (let i = 0; i < layer; i++) {
      const n = queue.shift();
      if (n === undefined) break;
      sb.visit(n);
      yield sb.emit({
        current: n,
        overlay: overlay(),
        line,
        explanation: `[${side}] Expand "${n}".`,
      });

      for (const { node: m, edge } of adjacent(
        graph,
        n,
        tieBreak,
        side === "forward" ? "out" : "in"
      )) {
        if (mine.has(m)) {
          sb.ignore(edge.key);
          yield sb.emit({
            current: n,
            edge: edge.key,
            overlay: overlay(),
            line,
            explanation: `[${side}] "${m}" is already reached on this side; skip ${edge.key}.`,
          });
          continue;
        }
        mine.set(m, n);
        queue.push(m);
        sb.frontier(m);
        sb.relax(edge.key, edge.key);
        const meets = other.has(m);
        yield sb.emit({
          current: n,
          edge: edge.key,
          overlay: overlay(),
          line: meets ? line + 1 : line,
          explanation: meets
            ? `[${side}] Discover "${m}" from "${n}"; the other search already reached it.`
            : `[${side}] Discover "${m}" from "${n}".`,
        });
        if (meets) return m;
      }
    }
    return null;
  };

  while (qF.length && qB.length) {
    for (const side of ["forward", "backward"] as const) {
      const meeting = yield* expandLayer(side);
      if (meeting === null) continue;
      const path = stitch(meeting);
      sb.choose(path, pathEdges(graph, path));
      const cost = pathCost(graph, path);
      yield sb.finish({
        current: meeting,
        overlay: overlay(meeting),
        line: 9,
        explanation: `The ${side} search discovered "${meeting}", already reached from the other side. Path ${path.join(" → ")} (${path.length - 1} edge(s), cost ${cost}).`,
        path,
        cost,
      });
      return;
    }
  }

  yield sb.finish({
    overlay: overlay(),
    line: 8,
    explanation: `A frontier ran dry before the searches met: "${target}" is unreachable from "${source}".`,
    path: null,
    cost: null,
  });
}
