import type { Graph } from "../../graph/Graph";
import type { Step, StepOverlay } from "../../interfaces/interfaces";
import type { EdgeState, NodeState } from "../../types/types";

type BaseState = "unvisited" | "frontier" | "visited";

export interface StepFrame {
  current?: string | null;
  edge?: string | null;
  overlay: StepOverlay;
  line: number;
  explanation: string;
}

export interface FinishFrame extends StepFrame {
  path: string[] | null;
  cost: number | null;
  negativeCycle?: boolean;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Per-run scratch pad. Algorithms mark what happened since the last step,
 * then `emit` turns the accumulated state into a frozen Step with full
 * node/edge snapshots and the events raised in between.
 */
export class StepBuilder {
  private base = new Map<string, BaseState>();
  private edgeState = new Map<string, EdgeState>();
  private onPath = new Set<string>();
  private pendingVisited: string[] = [];
  private pendingRelaxed: string[] = [];
  private stepNo = 0;
  private finished = false;
  visitedCount = 0;
  relaxedCount = 0;

  constructor(
    private graph: Graph,
    private source: string,
    private target: string
  ) {
    for (const n of graph.nodes) this.base.set(n.key, "unvisited");
    for (const e of graph.edges) this.edgeState.set(e.key, "default");
  }

  isVisited(key: string) {
    return this.base.get(key) === "visited";
  }

  frontier(key: string) {
    if (this.base.get(key) === "unvisited") this.base.set(key, "frontier");
  }

  // Finalise a node; a node only raises a visited event once per run
  visit(key: string) {
    if (this.base.get(key) === "visited") return;
    this.base.set(key, "visited");
    this.pendingVisited.push(key);
    this.visitedCount++;
  }

  // An improving relaxation; edgeKeys light the edges it went through
  relax(eventKey: string, ...edgeKeys: string[]) {
    this.pendingRelaxed.push(eventKey);
    this.relaxedCount++;
    for (const k of edgeKeys)
      if (this.edgeState.get(k) !== "chosen") this.edgeState.set(k, "relaxed");
  }

  // Examined without improving anything
  ignore(edgeKey: string) {
    if (this.edgeState.get(edgeKey) === "default") this.edgeState.set(edgeKey, "ignored");
  }

  choose(path: string[], edgeKeys: string[]) {
    for (const n of path) this.onPath.add(n);
    for (const e of edgeKeys) this.edgeState.set(e, "chosen");
  }

  private display(key: string, current: string | null): NodeState {
    if (this.graph.isBlocked(key)) return "blocked";
    if (this.onPath.has(key)) return "path";
    if (key === current) return "current";
    if (key === this.source) return "source";
    if (key === this.target) return "target";
    return this.base.get(key) ?? "unvisited";
  }

  emit(frame: StepFrame): Step {
    return this.build(frame, null);
  }

  finish(frame: FinishFrame): Step {
    if (this.finished) throw new Error("Run already produced its terminal step");
    this.finished = true;
    return this.build(frame, {
      path: frame.path,
      cost: frame.cost,
      nodesVisited: this.visitedCount,
      edgesRelaxed: this.relaxedCount,
      negativeCycle: frame.negativeCycle ?? false,
    });
  }

  private build(frame: StepFrame, result: Step["result"]): Step {
    const current = frame.current ?? null;
    const nodeStates: Record<string, NodeState> = {};
    for (const n of this.graph.nodes) nodeStates[n.key] = this.display(n.key, current);
    const edgeStates: Record<string, EdgeState> = {};
    for (const [k, s] of this.edgeState) edgeStates[k] = s;

    const step: Step = {
      stepNumber: this.stepNo++,
      current,
      edge: frame.edge ?? null,
      nodeStates,
      edgeStates,
      events: { visited: this.pendingVisited, relaxed: this.pendingRelaxed },
      overlay: frame.overlay,
      line: frame.line,
      explanation: frame.explanation,
      result,
    };
    this.pendingVisited = [];
    this.pendingRelaxed = [];
    return deepFreeze(step);
  }
}
