import { createGraph, type Graph } from "../graph/Graph";
import type { Step } from "../interfaces/interfaces";

// Undirected, A→D is cheapest through B and C (cost 4) but shortest by hops via B (A-B-D)
export const diamond = (): Graph =>
  createGraph({
    nodes: [
      { key: "A", position: { x: 0, y: 0 } },
      { key: "B", position: { x: 1, y: 0 } },
      { key: "C", position: { x: 1, y: 1 } },
      { key: "D", position: { x: 2, y: 1 } },
    ],
    edges: [
      { source: "A", target: "B", weight: 1 },
      { source: "A", target: "C", weight: 4 },
      { source: "B", target: "C", weight: 2 },
      { source: "B", target: "D", weight: 5 },
      { source: "C", target: "D", weight: 1 },
    ],
  });

// Directed, one negative edge and no cycle; S→T costs 2 via B and A
export const negativeDag = (): Graph =>
  createGraph({
    directed: true,
    nodes: [{ key: "S" }, { key: "A" }, { key: "B" }, { key: "T" }],
    edges: [
      { source: "S", target: "A", weight: 4 },
      { source: "S", target: "B", weight: 2 },
      { source: "B", target: "A", weight: -1 },
      { source: "A", target: "T", weight: 1 },
      { source: "B", target: "T", weight: 5 },
    ],
  });

// A→B→A sums to -1 and is reachable from S
export const reachableNegativeCycle = (): Graph =>
  createGraph({
    directed: true,
    nodes: [{ key: "S" }, { key: "A" }, { key: "B" }],
    edges: [
      { source: "S", target: "A", weight: 1 },
      { source: "A", target: "B", weight: -2 },
      { source: "B", target: "A", weight: 1 },
    ],
  });

// X→Y→X sums to -2 but nothing reaches it from S
export const unreachableNegativeCycle = (): Graph =>
  createGraph({
    directed: true,
    nodes: [{ key: "S" }, { key: "A" }, { key: "X" }, { key: "Y" }],
    edges: [
      { source: "S", target: "A", weight: 1 },
      { source: "X", target: "Y", weight: 1 },
      { source: "Y", target: "X", weight: -3 },
    ],
  });

// 0-1-2-3-4, unit weights
export const line = (n = 5): Graph =>
  createGraph({
    nodes: Array.from({ length: n }, (_, i) => ({ key: String(i), position: { x: i, y: 0 } })),
    edges: Array.from({ length: n - 1 }, (_, i) => ({ source: String(i), target: String(i + 1) })),
  });

// Greedy is lured towards A, which is close to T but expensive
export const greedyTrap = (): Graph =>
  createGraph({
    nodes: [
      { key: "S", position: { x: 0, y: 0 } },
      { key: "A", position: { x: 5, y: 0 } },
      { key: "B", position: { x: 0, y: 5 } },
      { key: "T", position: { x: 10, y: 0 } },
    ],
    edges: [
      { source: "S", target: "A", weight: 100 },
      { source: "A", target: "T", weight: 100 },
      { source: "S", target: "B", weight: 1 },
      { source: "B", target: "T", weight: 1 },
    ],
  });

// Directed A→B with C cut off
export const disconnected = (): Graph =>
  createGraph({
    directed: true,
    nodes: [{ key: "A" }, { key: "B" }, { key: "C" }],
    edges: [{ source: "A", target: "B", weight: 1 }],
  });

export const drain = (it: Iterable<Step>): Step[] => [...it];

// Wraps an iterator and counts how often it is pulled
export function counting<T>(it: Iterator<T>) {
  const counter = { calls: 0 };
  const wrapped: Iterator<T> = {
    next: () => {
      counter.calls++;
      return it.next();
    },
  };
  return { iterator: wrapped, counter };
}
