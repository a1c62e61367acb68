import type {
  AlgoKey,
  AlgoTag,
  EdgeState,
  HeuristicType,
  MapType,
  NodeState,
  Position,
  TieBreak,
  Verdict,
} from "../types/types";

export interface GraphNode {
  key: string;
  position?: Position;
  blocked?: boolean; // obstacle, never entered
  label?: string;
}

export interface GraphEdge {
  key: string;
  source: string;
  target: string;
  weight: number;
}

export interface Neighbor {
  node: string;
  edge: GraphEdge;
}

export interface GraphInput {
  directed?: boolean;
  nodes: GraphNode[];
  edges: Array<Omit<GraphEdge, "key" | "weight"> & { key?: string; weight?: number }>;
}

export interface AlgoOptions {
  heuristic?: HeuristicType;
  tieBreak?: TieBreak;
}

export interface StepEvents {
  visited: string[]; // nodes finalised at this step
  relaxed: string[]; // relaxations that improved a tentative cost
}

export interface FrontierEntry {
  node: string;
  priority: number;
}

export interface ScoreEntry {
  g: number;
  h: number;
  f: number;
}

export type StepOverlay =
  | { kind: "queue"; queue: string[] }
  | { kind: "stack"; stack: string[] }
  | {
      kind: "priority";
      queue: FrontierEntry[];
      distances: Record<string, number>;
    }
  | {
      kind: "estimates";
      queue: FrontierEntry[];
      estimates: Record<string, number>;
      heuristic: HeuristicType;
    }
  | {
      kind: "scores";
      queue: FrontierEntry[];
      scores: Record<string, ScoreEntry>;
      heuristic: HeuristicType;
    }
  | { kind: "bidirectional"; forward: string[]; backward: string[]; meeting: string | null }
  | { kind: "rounds"; round: number; distances: Record<string, number> }
  | {
      kind: "matrix";
      nodes: string[];
      k: string | null;
      matrix: number[][];
      highlight: [string, string] | null;
    };

export interface StepResult {
  path: string[] | null;
  cost: number | null;
  nodesVisited: number;
  edgesRelaxed: number;
  negativeCycle: boolean;
}

export interface Step {
  stepNumber: number;
  current: string | null;
  edge: string | null; // edge examined at this step
  nodeStates: Record<string, NodeState>;
  edgeStates: Record<string, EdgeState>;
  events: StepEvents;
  overlay: StepOverlay;
  line: number; // index into the descriptor's pseudocode
  explanation: string;
  result: StepResult | null;
}

export interface Complexity {
  time: string;
  space: string;
}

export interface AlgoSummary {
  key: AlgoKey;
  label: string;
  tags: AlgoTag[];
  complexity: Complexity;
}

export interface Metrics {
  algoKey: AlgoKey;
  label: string;
  source: string;
  target: string;
  heuristic: HeuristicType | null;
  nodesVisited: number;
  edgesRelaxed: number;
  pathLength: number; // edges on the path
  pathCost: number; // Infinity when no path
  pathFound: boolean;
  negativeCycle: boolean;
  totalSteps: number;
  durationMs: number;
  peakBufferedSteps: number;
}

export type MetricName = "nodesVisited" | "edgesRelaxed" | "pathCost" | "wallTime";

export interface ComparisonResult {
  verdicts: Record<MetricName, Verdict>;
  winner: Verdict;
  left: Metrics;
  right: Metrics;
}

export interface RandomGraphConfig {
  nodes: number;
  edgeProbability: number;
  seed: number;
  directed?: boolean;
  weighted?: boolean;
  weightRange?: [number, number];
}

export interface GridGraphConfig {
  rows: number;
  cols: number;
  mapType: MapType;
  density: number; // for Random
  seed: number;
  diag: boolean; // allow 8-neighbours
  ensurePath?: boolean; // carve a route from source to target through the walls
}

export interface ScaleFreeGraphConfig {
  nodes: number;
  m: number; // edges added per new node
  seed: number;
  weighted?: boolean;
  weightRange?: [number, number];
}
