import { RecorderStateError } from "../errors/errors";
import type { ComparisonResult, MetricName } from "../interfaces/interfaces";
import type { Verdict } from "../types/types";
import type { Recorder } from "./Recorder";

// Lower wins; exact equality (Infinity included) is a tie
export const verdict = (left: number, right: number): Verdict =>
  left === right ? "tie" : left < right ? "left" : "right";

/**
 * Ranks two completed runs metric by metric. Whether both ran on the same
 * graph is the caller's business.
 */
export function compare(left: Recorder, right: Recorder): ComparisonResult {
  const a = left.metrics;
  const b = right.metrics;
  if (!a || !b)
    throw new RecorderStateError(
      `Cannot compare: the ${!a ? "left" : "right"} run has not completed`
    );

  const verdicts: Record<MetricName, Verdict> = {
    nodesVisited: verdict(a.nodesVisited, b.nodesVisited),
    edgesRelaxed: verdict(a.edgesRelaxed, b.edgesRelaxed),
    pathCost: verdict(a.pathCost, b.pathCost),
    wallTime: verdict(a.durationMs, b.durationMs),
  };
  const wins = { left: 0, right: 0 };
  for (const v of Object.values(verdicts)) if (v !== "tie") wins[v]++;

  return {
    verdicts,
    winner: verdict(-wins.left, -wins.right),
    left: a,
    right: b,
  };
}
