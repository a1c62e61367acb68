import { performance } from "perf_hooks";
import { registry, type AlgoDescriptor } from "../algorithms/registry";
import { RecorderStateError } from "../errors/errors";
import type { Graph } from "../graph/Graph";
import type { AlgoOptions, GraphInput, Metrics, Step } from "../interfaces/interfaces";
import { Stepper } from "./Stepper";

export interface RunRecord {
  algoKey: Metrics["algoKey"];
  source: string;
  target: string;
  options: AlgoOptions;
  graph: GraphInput;
  steps: readonly Step[];
  metrics: Metrics;
}

interface Session {
  descriptor: AlgoDescriptor;
  graph: Graph;
  source: string;
  target: string;
  options: AlgoOptions;
  stepper: Stepper;
}

/**
 * Drives one run and measures it. Counts come from folding each buffered
 * step's events, so they agree with what a viewer stepping through the
 * run would have seen.
 */
export class Recorder {
  private session: Session | null = null;
  private visited = new Set<string>();
  private relaxed = 0;
  private folded = 0;
  private durationMs = 0;
  private final: Metrics | null = null;

  start(
    algoKey: string,
    source: string,
    target: string,
    graph: Graph,
    options: AlgoOptions = {}
  ): Stepper {
    const descriptor = registry.resolve(algoKey);
    registry.validate(descriptor, graph, source, target);
    const stepper = new Stepper(descriptor.run(graph, source, target, options));

    this.session = { descriptor, graph, source, target, options: { ...options }, stepper };
    this.visited.clear();
    this.relaxed = 0;
    this.folded = 0;
    this.durationMs = 0;
    this.final = null;
    return stepper;
  }

  private require(): Session {
    if (!this.session) throw new RecorderStateError("Recorder has not been started");
    return this.session;
  }

  private fold(stepper: Stepper) {
    for (; this.folded < stepper.length; this.folded++) {
      const step = stepper.steps[this.folded];
      for (const key of step.events.visited) this.visited.add(key);
      this.relaxed += step.events.relaxed.length;
    }
  }

  runToCompletion(): Metrics {
    const { stepper } = this.require();
    if (this.final) return this.final;

    const begin = performance.now();
    stepper.runToEnd();
    this.fold(stepper);
    this.durationMs = performance.now() - begin;

    this.final = Object.freeze(this.measure());
    return this.final;
  }

  // Drive to a position without timing; returns the step there
  runTo(position: number): Step | null {
    const { stepper } = this.require();
    const step = stepper.seek(position);
    this.fold(stepper);
    return step;
  }

  // Metrics over whatever has been buffered so far
  snapshot(): Metrics {
    const { stepper } = this.require();
    this.fold(stepper);
    return this.measure();
  }

  private measure(): Metrics {
    const { descriptor, source, target, options, stepper } = this.require();
    const result = this.finalStep?.result ?? null;
    const path = result?.path ?? null;
    return {
      algoKey: descriptor.key,
      label: descriptor.label,
      source,
      target,
      heuristic: descriptor.heuristics ? options.heuristic ?? "Euclidean" : null,
      nodesVisited: this.visited.size,
      edgesRelaxed: this.relaxed,
      pathLength: path ? path.length - 1 : 0,
      pathCost: result?.cost ?? Infinity,
      pathFound: path !== null,
      negativeCycle: result?.negativeCycle ?? false,
      totalSteps: stepper.length,
      durationMs: this.durationMs,
      peakBufferedSteps: stepper.length,
    };
  }

  get stepper(): Stepper | null {
    return this.session?.stepper ?? null;
  }

  get completed() {
    return this.final !== null;
  }

  get metrics(): Metrics | null {
    return this.final;
  }

  // Terminal step, once it has been pulled
  get finalStep(): Step | null {
    const stepper = this.session?.stepper;
    if (!stepper) return null;
    const last = stepper.at(stepper.length - 1);
    return last?.result ? last : null;
  }

  get path(): string[] | null {
    const path = this.finalStep?.result?.path;
    return path ? [...path] : null;
  }

  export(): RunRecord {
    const { descriptor, graph, source, target, options, stepper } = this.require();
    if (!this.final) throw new RecorderStateError("Run has not completed");
    return {
      algoKey: descriptor.key,
      source,
      target,
      options: { ...options },
      graph: graph.toInput(),
      steps: stepper.steps,
      metrics: this.final,
    };
  }
}
