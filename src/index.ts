export { createGraph, Graph } from "./graph/Graph";
export type { Arc } from "./graph/Graph";
export { registry } from "./algorithms/registry";
export type { AlgoDescriptor, AlgoRun } from "./algorithms/registry";
export { Stepper, EXHAUSTED } from "./engine/Stepper";
export type { Exhausted } from "./engine/Stepper";
export { Recorder } from "./engine/Recorder";
export type { RunRecord } from "./engine/Recorder";
export { compare, verdict } from "./engine/compare";
export { serializeRun, deserializeRun } from "./engine/serialization";
export type { DeserializationResult, SerializedRunFile } from "./engine/serialization";
export {
  ConfigurationError,
  GraphInvariantError,
  NegativeWeightError,
  RecorderStateError,
  UnknownAlgorithmError,
  UnknownNodeError,
} from "./errors/errors";
export { buildHeuristic, HEURISTICS } from "./utils/heuristic/buildHeuristic";
export {
  generateGridGraph,
  generateRandomGraph,
  generateScaleFreeGraph,
} from "./utils/graphGen/graphGen";
export type { GridGraph } from "./utils/graphGen/graphGen";
export type * from "./interfaces/interfaces";
export type * from "./types/types";
