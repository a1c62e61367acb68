import { describe, expect, it } from "vitest";
import { diamond, drain, negativeDag, reachableNegativeCycle } from "../test-utils/fixtures";
import { algoFloydWarshall } from "./FloydWarshall";

const I = Infinity;

describe("algoFloydWarshall", () => {
  it("computes all pairs and walks the next-hop matrix", () => {
    const steps = drain(algoFloydWarshall(negativeDag(), "S", "T"));
    const last = steps[steps.length - 1];
    expect(steps).toHaveLength(14);
    expect(last.result).toEqual({
      path: ["S", "B", "A", "T"],
      cost: 2,
      nodesVisited: 4,
      edgesRelaxed: 4,
      negativeCycle: false,
    });
    expect(last.overlay).toEqual({
      kind: "matrix",
      nodes: ["S", "A", "B", "T"],
      k: null,
      matrix: [
        [0, 1, 2, 2],
        [I, 0, I, 1],
        [I, -1, 0, 0],
        [I, I, I, 0],
      ],
      highlight: ["S", "T"],
    });
  });

  it("keys relaxations by matrix cell", () => {
    const relaxed = drain(algoFloydWarshall(negativeDag(), "S", "T")).flatMap((s) => s.events.relaxed);
    expect(relaxed).toEqual(["S|T", "B|T", "S|A", "S|T"]);
  });

  it("visits each node when its round ends", () => {
    const steps = drain(algoFloydWarshall(negativeDag(), "S", "T"));
    const visits = steps
      .map((s, i) => [i, s.events.visited] as const)
      .filter(([, v]) => v.length > 0);
    expect(visits).toEqual([
      [2, ["S"]],
      [6, ["A"]],
      [10, ["B"]],
      [12, ["T"]],
    ]);
  });

  it("detects a negative diagonal", () => {
    const steps = drain(algoFloydWarshall(reachableNegativeCycle(), "S", "B"));
    const result = steps[steps.length - 1].result;
    expect(result?.negativeCycle).toBe(true);
    expect(result?.path).toBeNull();
  });

  it("agrees with the cheapest diamond route", () => {
    const steps = drain(algoFloydWarshall(diamond(), "A", "D"));
    expect(steps[steps.length - 1].result?.path).toEqual(["A", "B", "C", "D"]);
    expect(steps[steps.length - 1].result?.cost).toBe(4);
  });
});
