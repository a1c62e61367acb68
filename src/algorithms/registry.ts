import {
  NegativeWeightError,
  UnknownAlgorithmError,
  UnknownNodeError,
} from "../errors/errors";
import type { Graph } from "../graph/Graph";
import type { AlgoOptions, AlgoSummary, Complexity, Step } from "../interfaces/interfaces";
import type { AlgoKey, AlgoTag, HeuristicType } from "../types/types";
import { HEURISTICS } from "../utils/heuristic/buildHeuristic";
import { algoAStar, ASTAR_PSEUDOCODE } from "./AStar";
import { algoBellmanFord, BELLMAN_FORD_PSEUDOCODE } from "./BellmanFord";
import { algoBFS, BFS_PSEUDOCODE } from "./BFS";
import { algoBidirectionalBFS, BIDIRECTIONAL_BFS_PSEUDOCODE } from "./biBFS";
import { algoDFS, DFS_PSEUDOCODE } from "./DFS";
import { algoDijkstra, DIJKSTRA_PSEUDOCODE } from "./Dijkstra";
import { algoFloydWarshall, FLOYD_WARSHALL_PSEUDOCODE } from "./FloydWarshall";
import { algoGreedy, GREEDY_PSEUDOCODE } from "./Greedy";

export type AlgoRun = (
  graph: Graph,
  source: string,
  target: string,
  options?: AlgoOptions
) => Generator<Step, void, void>;

export interface AlgoDescriptor {
  key: AlgoKey;
  label: string;
  run: AlgoRun;
  pseudocode: readonly string[];
  tags: AlgoTag[];
  complexity: Complexity;
  description: string;
  allowsNegativeWeights: boolean;
  allPairs: boolean;
  heuristics?: readonly HeuristicType[];
}

const DESCRIPTORS: readonly AlgoDescriptor[] = [
  {
    key: "bfs",
    label: "Breadth-First Search",
    run: algoBFS,
    pseudocode: BFS_PSEUDOCODE,
    tags: ["unweighted", "shortest-path", "traversal"],
    complexity: { time: "O(V + E)", space: "O(V)" },
    description: "Expands layer by layer; shortest path by edge count.",
    allowsNegativeWeights: true,
    allPairs: false,
  },
  {
    key: "dfs",
    label: "Depth-First Search",
    run: algoDFS,
    pseudocode: DFS_PSEUDOCODE,
    tags: ["unweighted", "traversal"],
    complexity: { time: "O(V + E)", space: "O(V)" },
    description: "Follows one branch as deep as it goes before backtracking. No shortest-path guarantee.",
    allowsNegativeWeights: true,
    allPairs: false,
  },
  {
    key: "dijkstra",
    label: "Dijkstra's Algorithm",
    run: algoDijkstra,
    pseudocode: DIJKSTRA_PSEUDOCODE,
    tags: ["weighted", "shortest-path"],
    complexity: { time: "O((V + E) log V)", space: "O(V)" },
    description: "Always expands the closest unfinished node. Optimal for non-negative weights.",
    allowsNegativeWeights: false,
    allPairs: false,
  },
  {
    key: "astar",
    label: "A* Search",
    run: algoAStar,
    pseudocode: ASTAR_PSEUDOCODE,
    tags: ["weighted", "shortest-path", "heuristic"],
    complexity: { time: "O((V + E) log V)", space: "O(V)" },
    description: "Dijkstra guided by a distance estimate. Optimal when the estimate never overshoots.",
    allowsNegativeWeights: false,
    allPairs: false,
    heuristics: HEURISTICS,
  },
  {
    key: "bidirectional_bfs",
    label: "Bidirectional BFS",
    run: algoBidirectionalBFS,
    pseudocode: BIDIRECTIONAL_BFS_PSEUDOCODE,
    tags: ["unweighted", "shortest-path", "bidirectional"],
    complexity: { time: "O(b^(d/2))", space: "O(b^(d/2))" },
    description: "Two breadth-first searches, from the source and from the target, meeting in the middle.",
    allowsNegativeWeights: true,
    allPairs: false,
  },
  {
    key: "bellman_ford",
    label: "Bellman–Ford",
    run: algoBellmanFord,
    pseudocode: BELLMAN_FORD_PSEUDOCODE,
    tags: ["weighted", "shortest-path", "negative-edges"],
    complexity: { time: "O(V · E)", space: "O(V)" },
    description: "Relaxes every edge round after round. Handles negative weights and reports negative cycles.",
    allowsNegativeWeights: true,
    allPairs: false,
  },
  {
    key: "floyd_warshall",
    label: "Floyd–Warshall",
    run: algoFloydWarshall,
    pseudocode: FLOYD_WARSHALL_PSEUDOCODE,
    tags: ["weighted", "all-pairs", "negative-edges"],
    complexity: { time: "O(V³)", space: "O(V²)" },
    description: "All-pairs shortest paths by dynamic programming over intermediate nodes.",
    allowsNegativeWeights: true,
    allPairs: true,
  },
  {
    key: "greedy_bfs",
    label: "Greedy Best-First",
    run: algoGreedy,
    pseudocode: GREEDY_PSEUDOCODE,
    tags: ["heuristic", "suboptimal"],
    complexity: { time: "O((V + E) log V)", space: "O(V)" },
    description: "Chases the heuristic alone: fast, but the path is not guaranteed optimal.",
    allowsNegativeWeights: true,
    allPairs: false,
    heuristics: HEURISTICS,
  },
];

const byAlgoKey = new Map<string, AlgoDescriptor>(DESCRIPTORS.map((d) => [d.key, d]));

function get(key: string): AlgoDescriptor | undefined {
  return byAlgoKey.get(key);
}

function list(): AlgoSummary[] {
  return DESCRIPTORS.map(({ key, label, tags, complexity }) => ({
    key,
    label,
    tags: [...tags],
    complexity: { ...complexity },
  }));
}

function byTag(tag: AlgoTag): AlgoDescriptor[] {
  return DESCRIPTORS.filter((d) => d.tags.includes(tag));
}

function resolve(key: string): AlgoDescriptor {
  const descriptor = get(key);
  if (!descriptor) throw new UnknownAlgorithmError(key);
  return descriptor;
}

// Rejects a configuration the algorithm cannot run, before any step is produced
function validate(descriptor: AlgoDescriptor, graph: Graph, source: string, target: string) {
  for (const [role, key] of [
    ["source", source],
    ["target", target],
  ] as const) {
    if (!graph.hasNode(key)) throw new UnknownNodeError(role, key, "missing");
    if (graph.isBlocked(key)) throw new UnknownNodeError(role, key, "blocked");
  }
  if (!descriptor.allowsNegativeWeights) {
    const neg = graph.firstNegativeEdge();
    if (neg) throw new NegativeWeightError(descriptor.key, neg.key, neg.weight);
  }
}

function createRun(
  key: string,
  graph: Graph,
  source: string,
  target: string,
  options: AlgoOptions = {}
): Generator<Step, void, void> {
  const descriptor = resolve(key);
  validate(descriptor, graph, source, target);
  return descriptor.run(graph, source, target, options);
}

export const registry = { list, get, byTag, resolve, validate, createRun };
