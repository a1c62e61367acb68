import type { Graph } from "../../graph/Graph";
import type { HeuristicType, Position } from "../../types/types";

export const manhattan = (a: Position, b: Position) =>
  Math.abs(a.x - b.x) + Math.abs(a.y - b.y);

export const euclidean = (a: Position, b: Position) => {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
};

// Diagonal moves cost sqrt(2)
export const octile = (a: Position, b: Position) => {
  const dx = Math.abs(a.x - b.x);
  const dy = Math.abs(a.y - b.y);
  return Math.max(dx, dy) + (Math.SQRT2 - 1) * Math.min(dx, dy);
};

export const HEURISTICS: readonly HeuristicType[] = ["Euclidean", "Manhattan", "Octile", "Zero"];

/**
 * Estimate from a node to the goal. Nodes without a position (or a goal
 * without one) estimate 0, which keeps the search admissible.
 */
export function buildHeuristic(
  graph: Graph,
  goal: string,
  type: HeuristicType
): (key: string) => number {
  const goalPos = graph.getNode(goal)?.position;
  if (!goalPos || type === "Zero") return () => 0;

  const measure =
    type === "Manhattan" ? manhattan : type === "Octile" ? octile : euclidean;

  return (key: string) => {
    const p = graph.getNode(key)?.position;
    return p ? measure(p, goalPos) : 0;
  };
}
