export type Position = { x: number; y: number };

export type NodeState =
  | "unvisited"
  | "frontier"
  | "visited"
  | "current"
  | "path"
  | "blocked"
  | "source"
  | "target";

export type EdgeState = "default" | "relaxed" | "chosen" | "ignored";

export type AlgoKey =
  | "bfs"
  | "dfs"
  | "dijkstra"
  | "astar"
  | "bidirectional_bfs"
  | "bellman_ford"
  | "floyd_warshall"
  | "greedy_bfs";

export type AlgoTag =
  | "unweighted"
  | "weighted"
  | "shortest-path"
  | "traversal"
  | "heuristic"
  | "bidirectional"
  | "negative-edges"
  | "all-pairs"
  | "suboptimal";

export type HeuristicType = "Euclidean" | "Manhattan" | "Octile" | "Zero";

// "insertion" keeps adjacency order, "key" sorts neighbours by node key
export type TieBreak = "insertion" | "key";

export type Verdict = "left" | "right" | "tie";

export type MapType = "Empty" | "Random" | "Maze";
