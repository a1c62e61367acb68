import { describe, expect, it } from "vitest";
import { createGraph } from "../graph/Graph";
import { diamond, disconnected, drain } from "../test-utils/fixtures";
import { algoBFS } from "./BFS";

describe("algoBFS", () => {
  it("finds the fewest-hop path, not the cheapest", () => {
    const steps = drain(algoBFS(diamond(), "A", "D"));
    const last = steps[steps.length - 1];
    expect(steps).toHaveLength(13);
    expect(last.result).toEqual({
      path: ["A", "B", "D"],
      cost: 6,
      nodesVisited: 4,
      edgesRelaxed: 3,
      negativeCycle: false,
    });
    expect(last.explanation).toBe('Dequeued the target "D". Path A → B → D uses 2 edge(s), cost 6.');
  });

  it("snapshots the queue and node states as it goes", () => {
    const steps = drain(algoBFS(diamond(), "A", "D"));
    expect(steps[0].overlay).toEqual({ kind: "queue", queue: ["A"] });
    expect(steps[0].nodeStates).toEqual({ A: "source", B: "unvisited", C: "unvisited", D: "target" });

    expect(steps[1].current).toBe("A");
    expect(steps[1].events).toEqual({ visited: ["A"], relaxed: [] });
    expect(steps[1].nodeStates.A).toBe("current");

    expect(steps[2].overlay).toEqual({ kind: "queue", queue: ["B"] });
    expect(steps[3].overlay).toEqual({ kind: "queue", queue: ["B", "C"] });
    expect(steps[3].events.relaxed).toEqual(["A-C"]);
    expect(steps[3].nodeStates.B).toBe("frontier");
    expect(steps[3].edgeStates["A-B"]).toBe("relaxed");
    expect(steps[3].edgeStates["B-C"]).toBe("default");
  });

  it("emits one step per examined edge", () => {
    const steps = drain(algoBFS(diamond(), "A", "D"));
    expect(steps.map((s) => s.edge)).toEqual([
      null,
      null,
      "A-B",
      "A-C",
      null,
      "A-B",
      "B-C",
      "B-D",
      null,
      "A-C",
      "B-C",
      "C-D",
      null,
    ]);
    expect(steps.map((s) => s.line)).toEqual([1, 4, 9, 9, 4, 7, 7, 9, 4, 7, 7, 7, 5]);
    expect(steps[6].explanation).toBe('"C" was already discovered; skip B-C.');
    expect(steps[6].edgeStates["B-C"]).toBe("ignored");
    expect(steps[7].explanation).toBe('Discover "D" from "B" and enqueue it.');
    expect(steps[7].events.relaxed).toEqual(["B-D"]);
  });

  it("marks the chosen path and the edges it ignored", () => {
    const steps = drain(algoBFS(diamond(), "A", "D"));
    const last = steps[steps.length - 1];
    expect(last.nodeStates).toEqual({ A: "path", B: "path", C: "visited", D: "path" });
    expect(last.edgeStates).toEqual({
      "A-B": "chosen",
      "A-C": "relaxed",
      "B-C": "ignored",
      "B-D": "chosen",
      "C-D": "ignored",
    });
  });

  it("ends with a null path when the target is unreachable", () => {
    const steps = drain(algoBFS(disconnected(), "A", "C"));
    expect(steps).toHaveLength(5);
    expect(steps[4].result).toEqual({
      path: null,
      cost: null,
      nodesVisited: 2,
      edgesRelaxed: 1,
      negativeCycle: false,
    });
  });

  it("routes around blocked nodes", () => {
    const g = createGraph({
      nodes: [{ key: "0" }, { key: "1", blocked: true }, { key: "2" }, { key: "3" }],
      edges: [
        { source: "0", target: "1" },
        { source: "1", target: "2" },
        { source: "0", target: "3" },
        { source: "3", target: "2" },
      ],
    });
    const steps = drain(algoBFS(g, "0", "2"));
    expect(steps[steps.length - 1].result?.path).toEqual(["0", "3", "2"]);
    expect(steps.every((s) => s.nodeStates["1"] === "blocked")).toBe(true);
  });

  it("orders neighbours by key when asked", () => {
    const g = createGraph({
      nodes: [{ key: "r" }, { key: "c" }, { key: "a" }, { key: "b" }],
      edges: [
        { source: "r", target: "c" },
        { source: "r", target: "a" },
        { source: "r", target: "b" },
      ],
    });
    expect(drain(algoBFS(g, "r", "b"))[4].overlay).toEqual({ kind: "queue", queue: ["c", "a", "b"] });
    expect(drain(algoBFS(g, "r", "b", { tieBreak: "key" }))[4].overlay).toEqual({
      kind: "queue",
      queue: ["a", "b", "c"],
    });
  });

  it("stops at once when source and target coincide", () => {
    const steps = drain(algoBFS(diamond(), "B", "B"));
    expect(steps).toHaveLength(2);
    expect(steps[1].result?.path).toEqual(["B"]);
    expect(steps[1].result?.cost).toBe(0);
  });
});
