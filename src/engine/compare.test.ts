import { describe, expect, it } from "vitest";
import { RecorderStateError } from "../errors/errors";
import type { Graph } from "../graph/Graph";
import type { Metrics } from "../interfaces/interfaces";
import { generateRandomGraph } from "../utils/graphGen/graphGen";
import { diamond } from "../test-utils/fixtures";
import { compare, verdict } from "./compare";
import { Recorder } from "./Recorder";

const base: Metrics = {
  algoKey: "bfs",
  label: "Breadth-First Search",
  source: "A",
  target: "D",
  heuristic: null,
  nodesVisited: 4,
  edgesRelaxed: 3,
  pathLength: 2,
  pathCost: 6,
  pathFound: true,
  negativeCycle: false,
  totalSteps: 13,
  durationMs: 1,
  peakBufferedSteps: 13,
};

// Recorder with canned metrics
class FixedRecorder extends Recorder {
  constructor(private fixed: Metrics) {
    super();
  }

  get metrics(): Metrics | null {
    return this.fixed;
  }
}

const fixed = (overrides: Partial<Metrics>) => new FixedRecorder({ ...base, ...overrides });

const completed = (algoKey: string, ...args: [string, string, Graph]) => {
  const recorder = new Recorder();
  recorder.start(algoKey, ...args);
  recorder.runToCompletion();
  return recorder;
};

describe("verdict", () => {
  it("prefers the lower value", () => {
    expect(verdict(1, 2)).toBe("left");
    expect(verdict(2, 1)).toBe("right");
    expect(verdict(3, 3)).toBe("tie");
    expect(verdict(5, Infinity)).toBe("left");
    expect(verdict(Infinity, Infinity)).toBe("tie");
  });
});

describe("compare", () => {
  it("picks the side that wins more metrics", () => {
    const left = fixed({ nodesVisited: 3, edgesRelaxed: 2, pathCost: 9 });
    const right = fixed({ nodesVisited: 5, edgesRelaxed: 4, pathCost: 4 });
    const result = compare(left, right);
    expect(result.verdicts).toEqual({
      nodesVisited: "left",
      edgesRelaxed: "left",
      pathCost: "right",
      wallTime: "tie",
    });
    expect(result.winner).toBe("left");
    expect(result.left.nodesVisited).toBe(3);
  });

  it("is symmetric", () => {
    const a = fixed({ nodesVisited: 3, durationMs: 5 });
    const b = fixed({ nodesVisited: 5, durationMs: 2 });
    expect(compare(a, b).verdicts).toEqual({
      nodesVisited: "left",
      edgesRelaxed: "tie",
      pathCost: "tie",
      wallTime: "right",
    });
    expect(compare(a, b).winner).toBe("tie");
    expect(compare(b, a).verdicts.nodesVisited).toBe("right");
    expect(compare(b, a).verdicts.wallTime).toBe("left");
  });

  it("ties two runs that both failed to find a path", () => {
    const a = fixed({ pathCost: Infinity, pathFound: false });
    const b = fixed({ pathCost: Infinity, pathFound: false });
    expect(compare(a, b).verdicts.pathCost).toBe("tie");
  });

  it("needs both runs to have completed", () => {
    const started = new Recorder();
    started.start("bfs", "A", "D", diamond());
    expect(() => compare(started, fixed({}))).toThrow(RecorderStateError);
    expect(() => compare(started, fixed({}))).toThrow("Cannot compare: the left run has not completed");
    expect(() => compare(fixed({}), new Recorder())).toThrow(
      "Cannot compare: the right run has not completed"
    );
  });

  it("compares real runs on the same graph", () => {
    const result = compare(completed("bfs", "A", "D", diamond()), completed("dijkstra", "A", "D", diamond()));
    expect(result.verdicts.nodesVisited).toBe("tie");
    expect(result.verdicts.edgesRelaxed).toBe("left");
    expect(result.verdicts.pathCost).toBe("right");
  });

  it("finds BFS and Dijkstra level on unit weights", () => {
    const graph = generateRandomGraph({ nodes: 10, edgeProbability: 0.3, seed: 42, weighted: false });
    const result = compare(completed("bfs", "0", "9", graph), completed("dijkstra", "0", "9", graph));
    expect(result.verdicts.nodesVisited).toBe("tie");
    expect(result.verdicts.edgesRelaxed).toBe("tie");
    expect(result.verdicts.pathCost).toBe("tie");
  });
});
