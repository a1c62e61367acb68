/**
 * Serialization of completed runs.
 *
 * A run is written as JSON wrapped in a format/version header. Distances
 * and costs may be `Infinity`, which JSON cannot carry, so non-finite
 * numbers are written as `{ "$num": "Infinity" }` and restored on load.
 * Object keys of the run's own data that start with `$` get one more `$`
 * in front, so a node keyed `$num` never reads back as a tag.
 */

import { createGraph } from "../graph/Graph";
import type {
  AlgoOptions,
  GraphInput,
  Metrics,
  Step,
  StepOverlay,
  StepResult,
} from "../interfaces/interfaces";
import type { EdgeState, NodeState } from "../types/types";
import type { RunRecord } from "./Recorder";

export const RUN_FORMAT = "pathfinding-run";
export const RUN_FORMAT_VERSION = "1.0";

export interface SerializedRunFile {
  format: typeof RUN_FORMAT;
  formatVersion: typeof RUN_FORMAT_VERSION;
  run: RunRecord;
}

export interface DeserializationResult {
  run: RunRecord | null;
  errors: string[];
  warnings: string[];
}

const NODE_STATES: readonly string[] = [
  "unvisited",
  "frontier",
  "visited",
  "current",
  "path",
  "blocked",
  "source",
  "target",
] satisfies NodeState[];
const EDGE_STATES: readonly string[] = ["default", "relaxed", "chosen", "ignored"] satisfies EdgeState[];
const ALGO_KEYS: readonly string[] = [
  "bfs",
  "dfs",
  "dijkstra",
  "astar",
  "bidirectional_bfs",
  "bellman_ford",
  "floyd_warshall",
  "greedy_bfs",
] satisfies Metrics["algoKey"][];
const HEURISTIC_NAMES: readonly string[] = ["Euclidean", "Manhattan", "Octile", "Zero"];

type Obj = { [key: string]: unknown };

const isObj = (v: unknown): v is Obj => typeof v === "object" && v !== null && !Array.isArray(v);
const isNum = (v: unknown): v is number => typeof v === "number";
const isStr = (v: unknown): v is string => typeof v === "string";

const escapeKey = (k: string) => (k.startsWith("$") ? `$${k}` : k);
const unescapeKey = (k: string) => (k.startsWith("$$") ? k.slice(1) : k);

function replacer(_key: string, value: unknown) {
  if (typeof value === "number" && !Number.isFinite(value)) return { $num: String(value) };
  if (isObj(value) && Object.keys(value).some((k) => k.startsWith("$")))
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [escapeKey(k), v]));
  return value;
}

function reviver(_key: string, value: unknown) {
  if (!isObj(value)) return value;
  const keys = Object.keys(value);
  if (keys.length === 1 && keys[0] === "$num" && isStr(value.$num)) return Number(value.$num);
  if (!keys.some((k) => k.startsWith("$$"))) return value;
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [unescapeKey(k), v]));
}

/**
 * Serializes a completed run to a JSON string.
 */
export function serializeRun(run: RunRecord, pretty: boolean = false): string {
  const wrapper: SerializedRunFile = {
    format: RUN_FORMAT,
    formatVersion: RUN_FORMAT_VERSION,
    run,
  };
  return JSON.stringify(wrapper, replacer, pretty ? 2 : 0);
}

// ---------- shape checks ----------
const isStrArr = (v: unknown): v is string[] => Array.isArray(v) && v.every(isStr);
const isNumRecord = (v: unknown): v is Record<string, number> =>
  isObj(v) && Object.values(v).every(isNum);
const isFrontier = (v: unknown) =>
  Array.isArray(v) && v.every((e: unknown) => isObj(e) && isStr(e.node) && isNum(e.priority));

function isOverlay(v: unknown): v is StepOverlay {
  if (!isObj(v)) return false;
  switch (v.kind) {
    case "queue":
      return isStrArr(v.queue);
    case "stack":
      return isStrArr(v.stack);
    case "priority":
      return isFrontier(v.queue) && isNumRecord(v.distances);
    case "estimates":
      return (
        isFrontier(v.queue) &&
        isNumRecord(v.estimates) &&
        isStr(v.heuristic) &&
        HEURISTIC_NAMES.includes(v.heuristic)
      );
    case "scores":
      return (
        isFrontier(v.queue) &&
        isStr(v.heuristic) &&
        HEURISTIC_NAMES.includes(v.heuristic) &&
        isObj(v.scores) &&
        Object.values(v.scores).every((s) => isObj(s) && isNum(s.g) && isNum(s.h) && isNum(s.f))
      );
    case "bidirectional":
      return isStrArr(v.forward) && isStrArr(v.backward) && (v.meeting === null || isStr(v.meeting));
    case "rounds":
      return isNum(v.round) && isNumRecord(v.distances);
    case "matrix":
      return (
        isStrArr(v.nodes) &&
        (v.k === null || isStr(v.k)) &&
        Array.isArray(v.matrix) &&
        v.matrix.every((row: unknown) => Array.isArray(row) && row.every(isNum)) &&
        (v.highlight === null || (isStrArr(v.highlight) && v.highlight.length === 2))
      );
    default:
      return false;
  }
}

function isResult(v: unknown): v is StepResult {
  return (
    isObj(v) &&
    (v.path === null || isStrArr(v.path)) &&
    (v.cost === null || isNum(v.cost)) &&
    isNum(v.nodesVisited) &&
    isNum(v.edgesRelaxed) &&
    typeof v.negativeCycle === "boolean"
  );
}

function isStep(v: unknown): v is Step {
  return (
    isObj(v) &&
    isNum(v.stepNumber) &&
    (v.current === null || isStr(v.current)) &&
    (v.edge === null || isStr(v.edge)) &&
    isObj(v.nodeStates) &&
    Object.values(v.nodeStates).every((s) => isStr(s) && NODE_STATES.includes(s)) &&
    isObj(v.edgeStates) &&
    Object.values(v.edgeStates).every((s) => isStr(s) && EDGE_STATES.includes(s)) &&
    isObj(v.events) &&
    isStrArr(v.events.visited) &&
    isStrArr(v.events.relaxed) &&
    isOverlay(v.overlay) &&
    isNum(v.line) &&
    isStr(v.explanation) &&
    (v.result === null || isResult(v.result))
  );
}

function isMetrics(value: unknown): value is Metrics {
  if (!isObj(value)) return false;
  const v: Obj = value;
  const numbers = [
    "nodesVisited",
    "edgesRelaxed",
    "pathLength",
    "pathCost",
    "totalSteps",
    "durationMs",
    "peakBufferedSteps",
  ];
  return (
    isStr(v.algoKey) &&
    ALGO_KEYS.includes(v.algoKey) &&
    isStr(v.label) &&
    isStr(v.source) &&
    isStr(v.target) &&
    (v.heuristic === null || (isStr(v.heuristic) && HEURISTIC_NAMES.includes(v.heuristic))) &&
    numbers.every((k) => isNum(v[k])) &&
    typeof v.pathFound === "boolean" &&
    typeof v.negativeCycle === "boolean"
  );
}

const isGraphNode = (v: unknown) =>
  isObj(v) &&
  isStr(v.key) &&
  (v.position === undefined || (isObj(v.position) && isNum(v.position.x) && isNum(v.position.y))) &&
  (v.blocked === undefined || typeof v.blocked === "boolean") &&
  (v.label === undefined || isStr(v.label));

const isGraphEdge = (v: unknown) =>
  isObj(v) &&
  isStr(v.source) &&
  isStr(v.target) &&
  (v.key === undefined || isStr(v.key)) &&
  (v.weight === undefined || isNum(v.weight));

function isGraphInput(v: unknown): v is GraphInput {
  return (
    isObj(v) &&
    (v.directed === undefined || typeof v.directed === "boolean") &&
    Array.isArray(v.nodes) &&
    v.nodes.every(isGraphNode) &&
    Array.isArray(v.edges) &&
    v.edges.every(isGraphEdge)
  );
}

function isOptions(v: unknown): v is AlgoOptions {
  return (
    isObj(v) &&
    (v.heuristic === undefined || (isStr(v.heuristic) && HEURISTIC_NAMES.includes(v.heuristic))) &&
    (v.tieBreak === undefined || v.tieBreak === "insertion" || v.tieBreak === "key")
  );
}

/**
 * Deserializes a JSON string produced by `serializeRun`.
 */
export function deserializeRun(json: string): DeserializationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let data: unknown;
  try {
    data = JSON.parse(json, reviver);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    errors.push(`JSON parse error: ${message}`);
    return { run: null, errors, warnings };
  }

  if (!isObj(data) || data.format !== RUN_FORMAT) {
    errors.push(`Invalid file format: expected "${RUN_FORMAT}"`);
    return { run: null, errors, warnings };
  }
  if (data.formatVersion !== RUN_FORMAT_VERSION) {
    errors.push(
      `Unsupported format version: ${String(data.formatVersion)} (expected "${RUN_FORMAT_VERSION}")`
    );
    return { run: null, errors, warnings };
  }

  const run = data.run;
  if (!isObj(run)) {
    errors.push("Missing run data in file");
    return { run: null, errors, warnings };
  }

  const { algoKey, source, target, options, graph, steps, metrics } = run;
  if (!isStr(algoKey) || !ALGO_KEYS.includes(algoKey)) errors.push("Invalid algorithm key");
  if (!isStr(source) || !isStr(target)) errors.push("Missing source or target");
  if (!isOptions(options)) errors.push("Invalid algorithm options");
  if (!isGraphInput(graph)) errors.push("Invalid graph");
  else {
    try {
      createGraph(graph);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(`Invalid graph: ${message}`);
    }
  }
  if (!isMetrics(metrics)) errors.push("Invalid metrics");
  const badStep = Array.isArray(steps) ? steps.findIndex((s: unknown) => !isStep(s)) : 0;
  if (badStep >= 0) errors.push(`Invalid step at index ${badStep}`);

  if (
    errors.length ||
    !isMetrics(metrics) ||
    !isOptions(options) ||
    !isGraphInput(graph) ||
    !isStr(source) ||
    !isStr(target) ||
    !Array.isArray(steps)
  )
    return { run: null, errors, warnings };

  const typedSteps = steps.filter(isStep);
  typedSteps.forEach((s, i) => {
    if (s.stepNumber !== i) warnings.push(`Step ${i} is numbered ${s.stepNumber}`);
  });
  if (metrics.totalSteps !== typedSteps.length)
    warnings.push(`Metrics report ${metrics.totalSteps} steps but the file holds ${typedSteps.length}`);

  return {
    run: { algoKey: metrics.algoKey, source, target, options, graph, steps: typedSteps, metrics },
    errors,
    warnings,
  };
}
