import { GraphInvariantError } from "../errors/errors";
import type { GraphEdge, GraphInput, GraphNode, Neighbor } from "../interfaces/interfaces";

export interface Arc {
  from: string;
  to: string;
  edge: GraphEdge;
}

/**
 * Read-only graph shared by every run. Built once through `createGraph`,
 * which rejects malformed input before any algorithm sees it.
 */
export class Graph {
  readonly directed: boolean;
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];

  private nodeIndex = new Map<string, GraphNode>();
  private edgeIndex = new Map<string, GraphEdge>();
  private outgoing = new Map<string, Neighbor[]>();
  private incoming = new Map<string, Neighbor[]>();

  constructor(directed: boolean, nodes: GraphNode[], edges: GraphEdge[]) {
    this.directed = directed;
    for (const n of nodes) {
      this.nodeIndex.set(n.key, n);
      this.outgoing.set(n.key, []);
      this.incoming.set(n.key, []);
    }
    for (const e of edges) {
      this.edgeIndex.set(e.key, e);
      this.link(e.source, e.target, e);
      if (!directed && e.source !== e.target) this.link(e.target, e.source, e);
    }
    this.nodes = Object.freeze([...nodes]);
    this.edges = Object.freeze([...edges]);
    Object.freeze(this);
  }

  private link(from: string, to: string, edge: GraphEdge) {
    this.outgoing.get(from)?.push({ node: to, edge });
    this.incoming.get(to)?.push({ node: from, edge });
  }

  get size() {
    return this.nodes.length;
  }

  nodeKeys(): string[] {
    return this.nodes.map((n) => n.key);
  }

  hasNode(key: string) {
    return this.nodeIndex.has(key);
  }

  getNode(key: string): GraphNode | undefined {
    return this.nodeIndex.get(key);
  }

  getEdge(key: string): GraphEdge | undefined {
    return this.edgeIndex.get(key);
  }

  isBlocked(key: string) {
    return this.nodeIndex.get(key)?.blocked === true;
  }

  // Outgoing neighbours, in edge insertion order
  neighbors(key: string): readonly Neighbor[] {
    return this.outgoing.get(key) ?? [];
  }

  // Incoming neighbours; the same as neighbors() on an undirected graph
  predecessors(key: string): readonly Neighbor[] {
    return this.incoming.get(key) ?? [];
  }

  // Cheapest edge usable from a to b
  edgeBetween(a: string, b: string): GraphEdge | undefined {
    let best: GraphEdge | undefined;
    for (const { node, edge } of this.neighbors(a)) {
      if (node !== b) continue;
      if (!best || edge.weight < best.weight) best = edge;
    }
    return best;
  }

  // Every traversable direction of every edge; undirected edges count twice
  arcs(): Arc[] {
    const out: Arc[] = [];
    for (const e of this.edges) {
      out.push({ from: e.source, to: e.target, edge: e });
      if (!this.directed && e.source !== e.target)
        out.push({ from: e.target, to: e.source, edge: e });
    }
    return out;
  }

  firstNegativeEdge(): GraphEdge | undefined {
    return this.edges.find((e) => e.weight < 0);
  }

  hasNegativeWeights() {
    return this.firstNegativeEdge() !== undefined;
  }

  // Plain copy that createGraph accepts back, edge keys and weights included
  toInput(): GraphInput {
    return {
      directed: this.directed,
      nodes: this.nodes.map((n) => (n.position ? { ...n, position: { ...n.position } } : { ...n })),
      edges: this.edges.map((e) => ({ ...e })),
    };
  }
}

export function createGraph(input: GraphInput): Graph {
  const nodes: GraphNode[] = [];
  const seenNodes = new Set<string>();
  for (const n of input.nodes) {
    if (seenNodes.has(n.key)) throw new GraphInvariantError(`Duplicate node key "${n.key}"`);
    seenNodes.add(n.key);
    nodes.push(
      Object.freeze(
        n.position ? { ...n, position: Object.freeze({ ...n.position }) } : { ...n }
      )
    );
  }

  const edges: GraphEdge[] = [];
  const seenEdges = new Set<string>();
  for (const e of input.edges) {
    for (const end of [e.source, e.target]) {
      if (!seenNodes.has(end))
        throw new GraphInvariantError(
          `Edge ${e.source}->${e.target} references missing node "${end}"`
        );
    }
    const weight = e.weight ?? 1;
    if (!Number.isFinite(weight))
      throw new GraphInvariantError(`Edge ${e.source}->${e.target} has non-finite weight`);

    let key = e.key;
    if (key === undefined) {
      const base = `${e.source}-${e.target}`;
      key = base;
      for (let n = 2; seenEdges.has(key); n++) key = `${base}#${n}`;
    } else if (seenEdges.has(key)) {
      throw new GraphInvariantError(`Duplicate edge key "${key}"`);
    }
    seenEdges.add(key);
    edges.push(Object.freeze({ key, source: e.source, target: e.target, weight }));
  }

  return new Graph(input.directed ?? false, nodes, edges);
}
