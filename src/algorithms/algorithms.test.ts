import { describe, expect, it } from "vitest";
import type { Step } from "../interfaces/interfaces";
import { generateRandomGraph } from "../utils/graphGen/graphGen";
import { pathCost } from "../utils/utils";
import { diamond, disconnected, drain } from "../test-utils/fixtures";
import { registry } from "./registry";

const SEEDS = [1, 7, 42, 99, 2024];
const OPTIMAL = ["dijkstra", "bellman_ford", "floyd_warshall"];
const ALL = registry.list().map((a) => a.key);

const resultOf = (steps: Step[]) => steps[steps.length - 1].result;

describe.each(ALL)("%s", (key) => {
  const descriptor = registry.resolve(key);

  it.each(SEEDS)("produces a well-formed run on random graph %i", (seed) => {
    const graph = generateRandomGraph({ nodes: 12, edgeProbability: 0.25, seed });
    const steps = drain(descriptor.run(graph, "0", "11"));

    expect(steps.map((s) => s.stepNumber)).toEqual(steps.map((_, i) => i));
    expect(steps.filter((s) => s.result !== null)).toHaveLength(1);
    expect(steps[steps.length - 1].result).not.toBeNull();

    for (const s of steps) {
      expect(Object.isFrozen(s)).toBe(true);
      expect(Object.isFrozen(s.nodeStates)).toBe(true);
      expect(Object.keys(s.nodeStates)).toHaveLength(graph.size);
      expect(Object.keys(s.edgeStates)).toHaveLength(graph.edges.length);
      expect(s.line).toBeGreaterThanOrEqual(0);
      expect(s.line).toBeLessThan(descriptor.pseudocode.length);
      if (s.edge !== null) expect(graph.getEdge(s.edge)).toBeDefined();
    }

    const result = resultOf(steps);
    const visited = new Set(steps.flatMap((s) => s.events.visited));
    const relaxed = steps.reduce((n, s) => n + s.events.relaxed.length, 0);
    expect(result?.nodesVisited).toBe(visited.size);
    expect(result?.edgesRelaxed).toBe(relaxed);

    // the random graph is connected, so everything finds a path
    const path = result?.path ?? [];
    expect(path[0]).toBe("0");
    expect(path[path.length - 1]).toBe("11");
    for (let i = 1; i < path.length; i++)
      expect(graph.edgeBetween(path[i - 1], path[i])).toBeDefined();
    expect(result?.cost).toBe(pathCost(graph, path));
  });

  it("replays identically for the same graph and options", () => {
    const graph = generateRandomGraph({ nodes: 12, edgeProbability: 0.25, seed: 7 });
    const options = descriptor.heuristics
      ? { tieBreak: "key" as const, heuristic: "Manhattan" as const }
      : { tieBreak: "key" as const };
    const run = () => descriptor.run(graph, "0", "11", options);
    expect([...run()]).toEqual([...run()]);
  });

  it("returns no path to an unreachable target", () => {
    expect(resultOf(drain(descriptor.run(disconnected(), "A", "C")))?.path).toBeNull();
  });

  it("returns the single-node path when source is target", () => {
    const result = resultOf(drain(descriptor.run(diamond(), "C", "C")));
    expect(result?.path).toEqual(["C"]);
    expect(result?.cost).toBe(0);
  });
});

describe.each(ALL.filter((key) => key !== "floyd_warshall"))("%s edge steps", (key) => {
  it("names the edge behind every relaxation", () => {
    const graph = generateRandomGraph({ nodes: 12, edgeProbability: 0.25, seed: 42 });
    const steps = drain(registry.resolve(key).run(graph, "0", "11"));
    const relaxing = steps.filter((s) => s.events.relaxed.length > 0);
    expect(relaxing.length).toBeGreaterThan(0);
    for (const s of relaxing) expect(s.events.relaxed).toEqual([s.edge]);
  });
});

describe("optimality", () => {
  it.each(SEEDS)("exact algorithms agree on the cheapest cost for seed %i", (seed) => {
    const graph = generateRandomGraph({ nodes: 12, edgeProbability: 0.25, seed });
    const costs = OPTIMAL.map((key) => resultOf(drain(registry.resolve(key).run(graph, "0", "11")))?.cost);
    const zeroAStar = resultOf(drain(registry.resolve("astar").run(graph, "0", "11", { heuristic: "Zero" })));
    expect(new Set(costs).size).toBe(1);
    expect(zeroAStar?.cost).toBe(costs[0]);
  });

  it.each(SEEDS)("breadth-first searches find fewest hops on unit weights for seed %i", (seed) => {
    const graph = generateRandomGraph({ nodes: 12, edgeProbability: 0.25, seed, weighted: false });
    const [bfs, bidirectional, dijkstra] = ["bfs", "bidirectional_bfs", "dijkstra"].map(
      (key) => resultOf(drain(registry.resolve(key).run(graph, "0", "11")))?.cost
    );
    expect(bfs).toBe(dijkstra);
    expect(bidirectional).toBe(dijkstra);
  });
});
