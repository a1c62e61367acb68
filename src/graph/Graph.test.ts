import { describe, expect, it } from "vitest";
import { GraphInvariantError } from "../errors/errors";
import { createGraph } from "./Graph";

describe("createGraph", () => {
  it("rejects duplicate node keys", () => {
    expect(() => createGraph({ nodes: [{ key: "a" }, { key: "a" }], edges: [] })).toThrow(
      GraphInvariantError
    );
  });

  it("rejects edges that reference a missing node", () => {
    expect(() =>
      createGraph({ nodes: [{ key: "a" }], edges: [{ source: "a", target: "z" }] })
    ).toThrow('Edge a->z references missing node "z"');
  });

  it("rejects duplicate explicit edge keys", () => {
    expect(() =>
      createGraph({
        nodes: [{ key: "a" }, { key: "b" }],
        edges: [
          { key: "e", source: "a", target: "b" },
          { key: "e", source: "b", target: "a" },
        ],
      })
    ).toThrow('Duplicate edge key "e"');
  });

  it("rejects non-finite weights", () => {
    for (const weight of [Infinity, NaN]) {
      expect(() =>
        createGraph({
          nodes: [{ key: "a" }, { key: "b" }],
          edges: [{ source: "a", target: "b", weight }],
        })
      ).toThrow(GraphInvariantError);
    }
  });

  it("keys parallel edges apart and defaults the weight to 1", () => {
    const g = createGraph({
      nodes: [{ key: "a" }, { key: "b" }],
      edges: [
        { source: "a", target: "b" },
        { source: "a", target: "b", weight: 3 },
        { source: "a", target: "b", weight: 0.5 },
      ],
    });
    expect(g.edges.map((e) => e.key)).toEqual(["a-b", "a-b#2", "a-b#3"]);
    expect(g.getEdge("a-b")?.weight).toBe(1);
    expect(g.edgeBetween("a", "b")?.key).toBe("a-b#3");
    expect(g.edgeBetween("b", "a")?.key).toBe("a-b#3");
  });

  it("freezes nodes, positions and edges", () => {
    const g = createGraph({
      nodes: [{ key: "a", position: { x: 1, y: 2 } }, { key: "b" }],
      edges: [{ source: "a", target: "b" }],
    });
    const a = g.getNode("a");
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a?.position)).toBe(true);
    expect(Object.isFrozen(g.edges[0])).toBe(true);
    expect(Object.isFrozen(g.nodes)).toBe(true);
    expect(g.getNode("b")).toEqual({ key: "b" });
  });
});

describe("Graph", () => {
  const nodes = [{ key: "a" }, { key: "b" }, { key: "c" }];
  const edges = [
    { source: "a", target: "b" },
    { source: "c", target: "a", weight: -2 },
    { source: "b", target: "b" },
  ];

  it("follows both directions of an undirected edge", () => {
    const g = createGraph({ nodes, edges });
    expect(g.neighbors("a").map((n) => n.node)).toEqual(["b", "c"]);
    expect(g.neighbors("b").map((n) => n.node)).toEqual(["a", "b"]);
    expect(g.predecessors("a").map((n) => n.node)).toEqual(["b", "c"]);
  });

  it("separates outgoing and incoming edges when directed", () => {
    const g = createGraph({ directed: true, nodes, edges });
    expect(g.neighbors("a").map((n) => n.node)).toEqual(["b"]);
    expect(g.predecessors("a").map((n) => n.node)).toEqual(["c"]);
    expect(g.edgeBetween("a", "c")).toBeUndefined();
    expect(g.edgeBetween("c", "a")?.weight).toBe(-2);
  });

  it("lists each traversable direction once", () => {
    expect(createGraph({ nodes, edges }).arcs()).toHaveLength(5);
    expect(createGraph({ directed: true, nodes, edges }).arcs()).toHaveLength(3);
  });

  it("reports negative weights and blocked nodes", () => {
    const g = createGraph({ nodes: [...nodes, { key: "w", blocked: true }], edges });
    expect(g.hasNegativeWeights()).toBe(true);
    expect(g.firstNegativeEdge()?.key).toBe("c-a");
    expect(g.isBlocked("w")).toBe(true);
    expect(g.isBlocked("a")).toBe(false);
    expect(g.size).toBe(4);
    expect(g.nodeKeys()).toEqual(["a", "b", "c", "w"]);
  });

  it("returns no neighbours for unknown keys", () => {
    const g = createGraph({ nodes, edges });
    expect(g.neighbors("zz")).toEqual([]);
    expect(g.hasNode("zz")).toBe(false);
  });
});
