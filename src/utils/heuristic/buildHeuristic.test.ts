import { describe, expect, it } from "vitest";
import { createGraph } from "../../graph/Graph";
import { buildHeuristic, euclidean, manhattan, octile } from "./buildHeuristic";

const graph = createGraph({
  nodes: [
    { key: "s", position: { x: 0, y: 0 } },
    { key: "t", position: { x: 3, y: 4 } },
    { key: "nowhere" },
  ],
  edges: [],
});

describe("heuristics", () => {
  it("measures distances between positions", () => {
    const a = { x: 0, y: 0 };
    const b = { x: 3, y: 4 };
    expect(euclidean(a, b)).toBe(5);
    expect(manhattan(a, b)).toBe(7);
    expect(octile(a, b)).toBeCloseTo(4 + (Math.SQRT2 - 1) * 3, 12);
  });

  it("estimates towards the goal", () => {
    expect(buildHeuristic(graph, "t", "Euclidean")("s")).toBe(5);
    expect(buildHeuristic(graph, "t", "Manhattan")("s")).toBe(7);
    expect(buildHeuristic(graph, "t", "Zero")("s")).toBe(0);
    expect(buildHeuristic(graph, "t", "Euclidean")("t")).toBe(0);
  });

  it("falls back to 0 without positions", () => {
    expect(buildHeuristic(graph, "t", "Manhattan")("nowhere")).toBe(0);
    expect(buildHeuristic(graph, "nowhere", "Euclidean")("s")).toBe(0);
  });
});
