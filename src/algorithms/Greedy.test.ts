import { describe, expect, it } from "vitest";
import { drain, greedyTrap, line } from "../test-utils/fixtures";
import { algoGreedy } from "./Greedy";

describe("algoGreedy", () => {
  it("follows the heuristic into an expensive path", () => {
    const steps = drain(algoGreedy(greedyTrap(), "S", "T"));
    expect(steps).toHaveLength(8);
    expect(steps[7].result).toEqual({
      path: ["S", "A", "T"],
      cost: 200,
      nodesVisited: 3,
      edgesRelaxed: 3,
      negativeCycle: false,
    });
  });

  it("orders the frontier by estimate only", () => {
    const steps = drain(algoGreedy(greedyTrap(), "S", "T"));
    expect(steps[3].overlay).toEqual({
      kind: "estimates",
      queue: [
        { node: "A", priority: 5 },
        { node: "B", priority: Math.sqrt(125) },
      ],
      estimates: { S: 10, A: 5, B: Math.sqrt(125) },
      heuristic: "Euclidean",
    });
  });

  it("emits one step per examined edge", () => {
    const steps = drain(algoGreedy(greedyTrap(), "S", "T"));
    expect(steps.map((s) => s.edge)).toEqual([null, null, "S-A", "S-B", null, "S-A", "A-T", null]);
    expect(steps.map((s) => s.line)).toEqual([1, 3, 9, 9, 3, 7, 9, 5]);
    expect(steps[2].explanation).toBe('Queue "A" with h = 5.');
    expect(steps[5].explanation).toBe('"S" was already discovered; skip S-A.');
  });

  it("walks straight down a line", () => {
    const steps = drain(algoGreedy(line(), "0", "4", { heuristic: "Manhattan" }));
    expect(steps[steps.length - 1].result?.path).toEqual(["0", "1", "2", "3", "4"]);
  });
});
