// experiments/experiment-runner.ts
//
// Offline experiments for the stepwise pathfinding engine.
// Runs every registered algorithm on seeded random graphs, checks each
// result against the Dijkstra baseline and writes a CSV with counts,
// timings, path cost and optimality.
//
// Run with:
//   npm run experiment
//
// Parameters below can be overridden from .env (see .env.example).

import { config } from "dotenv";
import { writeFileSync } from "fs";
import Papa from "papaparse";
import { registry } from "../src/algorithms/registry";
import { compare } from "../src/engine/compare";
import { Recorder } from "../src/engine/Recorder";
import { ConfigurationError } from "../src/errors/errors";
import type { Graph } from "../src/graph/Graph";
import type { ComparisonResult, Metrics } from "../src/interfaces/interfaces";
import type { HeuristicType, Verdict } from "../src/types/types";
import { generateRandomGraph } from "../src/utils/graphGen/graphGen";

config();

// ---------- Environment overrides ----------
const envNumber = (name: string, fallback: number) => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  return value;
};

const envList = (name: string, fallback: number[]) => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.split(",").map((part) => {
    const value = Number(part.trim());
    if (!Number.isInteger(value) || value < 2)
      throw new ConfigurationError(`${name} must list integers of at least 2, got "${part}"`);
    return value;
  });
};

// ---------- Experiment parameters (EDIT THESE AS YOU LIKE) ----------
const OUTPUT_CSV = process.env.EXPERIMENT_OUTPUT || "experiments/results.csv";

// how many seeds per graph size
const NUM_TRIALS = envNumber("EXPERIMENT_TRIALS", 20);

// node counts to test
const NODE_COUNTS = envList("EXPERIMENT_NODES", [12, 24, 48]);

const EDGE_PROBABILITY = envNumber("EXPERIMENT_EDGE_PROBABILITY", 0.25);

const BASE_SEED = envNumber("EXPERIMENT_SEED", 1);

// heuristics for A* and Greedy
const HEURISTICS: HeuristicType[] = ["Euclidean", "Zero"];

// Floyd–Warshall snapshots a V×V matrix per improvement
const MAX_ALL_PAIRS_NODES = 48;

// ---------- Types ----------
interface Trial {
  trial: number;
  nodes: number;
  seed: number;
  graph: Graph;
  source: string;
  target: string;
}

interface ResultRow {
  trial: number;
  nodes: number;
  edges: number;
  seed: number;
  algo: string;
  heuristic: string;
  runtimeMs: string;
  totalSteps: number;
  nodesVisited: number;
  edgesRelaxed: number;
  pathLength: number | "";
  pathCost: number | "";
  found: 0 | 1;
  optimal: 0 | 1 | "";
  visitedVsDijkstra: Verdict;
  relaxedVsDijkstra: Verdict;
  costVsDijkstra: Verdict;
  winner: Verdict;
}

// ---------- Runs ----------
function record(trial: Trial, algoKey: string, heuristic?: HeuristicType): Recorder {
  const recorder = new Recorder();
  recorder.start(algoKey, trial.source, trial.target, trial.graph, heuristic ? { heuristic } : {});
  recorder.runToCompletion();
  return recorder;
}

function toRow(trial: Trial, metrics: Metrics, baseline: Metrics, comparison: ComparisonResult): ResultRow {
  return {
    trial: trial.trial,
    nodes: trial.nodes,
    edges: trial.graph.edges.length,
    seed: trial.seed,
    algo: metrics.algoKey,
    heuristic: metrics.heuristic ?? "None",
    runtimeMs: metrics.durationMs.toFixed(4),
    totalSteps: metrics.totalSteps,
    nodesVisited: metrics.nodesVisited,
    edgesRelaxed: metrics.edgesRelaxed,
    pathLength: metrics.pathFound ? metrics.pathLength : "",
    pathCost: metrics.pathFound ? metrics.pathCost : "",
    found: metrics.pathFound ? 1 : 0,
    // exact comparison is safe: integer weights
    optimal: baseline.pathFound ? (metrics.pathCost === baseline.pathCost ? 1 : 0) : "",
    visitedVsDijkstra: comparison.verdicts.nodesVisited,
    relaxedVsDijkstra: comparison.verdicts.edgesRelaxed,
    costVsDijkstra: comparison.verdicts.pathCost,
    winner: comparison.winner,
  };
}

function runTrial(trial: Trial): ResultRow[] {
  const baseline = record(trial, "dijkstra");
  const baselineMetrics = baseline.metrics;
  if (!baselineMetrics) throw new Error(`Dijkstra baseline did not complete on trial ${trial.trial}`);

  const rows: ResultRow[] = [];
  for (const { key } of registry.list()) {
    const descriptor = registry.resolve(key);
    if (descriptor.allPairs && trial.nodes > MAX_ALL_PAIRS_NODES) continue;

    for (const heuristic of descriptor.heuristics ? HEURISTICS : [undefined]) {
      try {
        const recorder = descriptor.key === "dijkstra" ? baseline : record(trial, descriptor.key, heuristic);
        const comparison = compare(recorder, baseline);
        rows.push(toRow(trial, comparison.left, baselineMetrics, comparison));
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        console.error(`Trial ${trial.trial} :: ${descriptor.key} skipped: ${error.message}`);
      }
    }
  }
  return rows;
}

// ---------- Main experiment loop ----------
function main() {
  const rows: ResultRow[] = [];
  let trialIndex = 0;

  for (const nodes of NODE_COUNTS) {
    for (let t = 0; t < NUM_TRIALS; t++) {
      const seed = BASE_SEED + 1000 * trialIndex + t;
      const graph = generateRandomGraph({ nodes, edgeProbability: EDGE_PROBABILITY, seed });
      const trial: Trial = { trial: trialIndex, nodes, seed, graph, source: "0", target: String(nodes - 1) };

      rows.push(...runTrial(trial));

      trialIndex++;
      console.log(
        `Done trial ${trialIndex} :: nodes=${nodes}, edges=${graph.edges.length}, p=${EDGE_PROBABILITY}, seed=${seed}`
      );
    }
  }

  writeFileSync(OUTPUT_CSV, Papa.unparse(rows), "utf8");
  console.log(`\n✅ Wrote ${rows.length} rows to ${OUTPUT_CSV}`);
}

main();
