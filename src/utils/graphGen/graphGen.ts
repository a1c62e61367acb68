import { createGraph, type Graph } from "../../graph/Graph";
import type {
  GraphInput,
  GraphNode,
  GridGraphConfig,
  RandomGraphConfig,
  ScaleFreeGraphConfig,
} from "../../interfaces/interfaces";
import { rngLCG } from "../utils";

export type Cell = { r: number; c: number };

const CANVAS_W = 800;
const CANVAS_H = 500;

function random(seed: number) {
  const R = rngLCG(seed);
  const next = () => R.next().value;
  const int = (lo: number, hi: number) => lo + Math.floor(next() * (hi - lo + 1));
  return { next, int };
}

const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

// ---------- Random graph ----------
// Nodes "0".."n-1" on a jittered circle. Each pair gets an edge with the
// given probability, then a shuffled chain guarantees connectivity.
export function generateRandomGraph({
  nodes,
  edgeProbability,
  seed,
  directed = false,
  weighted = true,
  weightRange = [1, 10],
}: RandomGraphConfig): Graph {
  const R = random(seed);
  const weight = () => (weighted ? R.int(weightRange[0], weightRange[1]) : 1);
  const ids = Array.from({ length: nodes }, (_, i) => String(i));

  const radius = Math.min(CANVAS_W, CANVAS_H) * 0.35;
  const graphNodes: GraphNode[] = ids.map((key, i) => {
    const angle = (2 * Math.PI * i) / nodes;
    const x = CANVAS_W / 2 + radius * Math.cos(angle) + (R.next() * 60 - 30);
    const y = CANVAS_H / 2 + radius * Math.sin(angle) + (R.next() * 60 - 30);
    return { key, label: key, position: { x: clamp(x, 40, CANVAS_W - 40), y: clamp(y, 40, CANVAS_H - 40) } };
  });

  const edges: GraphInput["edges"] = [];
  const linked = new Set<string>();
  const link = (a: string, b: string) => {
    edges.push({ source: a, target: b, weight: weight() });
    linked.add(`${a}|${b}`);
    if (!directed) linked.add(`${b}|${a}`);
  };

  for (let i = 0; i < nodes; i++) {
    for (let j = directed ? 0 : i + 1; j < nodes; j++) {
      if (i === j) continue;
      if (R.next() < edgeProbability) link(ids[i], ids[j]);
    }
  }

  const shuffled = [...ids];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(R.next() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  for (let k = 1; k < shuffled.length; k++) {
    if (!linked.has(`${shuffled[k - 1]}|${shuffled[k]}`)) link(shuffled[k - 1], shuffled[k]);
  }

  return createGraph({ directed, nodes: graphNodes, edges });
}

// ---------- Grid graph ----------
export const cellKey = (r: number, c: number) => `${r}_${c}`;

export type Layout = Set<string>; // keys of wall cells

const STEPS: [number, number][] = [
  [-1, 0],
  [0, 1],
  [1, 0],
  [0, -1],
];

// Each cell is a wall with probability `density`; the corners stay open
export function randomLayout(rows: number, cols: number, density: number, seed: number): Layout {
  const R = random(seed);
  const walls: Layout = new Set();
  for (let r = 0; r < rows; r++)
    for (let c = 0; c < cols; c++) if (R.next() < density) walls.add(cellKey(r, c));
  walls.delete(cellKey(0, 0));
  walls.delete(cellKey(rows - 1, cols - 1));
  return walls;
}

/**
 * Randomised Prim maze. Rooms sit on odd (row, col) pairs inside the
 * border; a room joins the maze by knocking out the wall cell between it
 * and a room already in it, picked at random among all such walls. Every
 * room ends up connected. Grids narrower than 3 have no rooms and stay open.
 */
export function mazeLayout(rows: number, cols: number, seed: number): Layout {
  const walls: Layout = new Set();
  if (rows < 3 || cols < 3) return walls;
  for (let r = 0; r < rows; r++) for (let c = 0; c < cols; c++) walls.add(cellKey(r, c));

  const R = random(seed);
  const isRoom = (r: number, c: number) =>
    r > 0 && r < rows - 1 && c > 0 && c < cols - 1 && r % 2 === 1 && c % 2 === 1;
  // [wall row, wall col, room row, room col]
  const candidates: [number, number, number, number][] = [];

  const join = (r: number, c: number) => {
    walls.delete(cellKey(r, c));
    for (const [dr, dc] of STEPS) {
      const rr = r + 2 * dr,
        rc = c + 2 * dc;
      if (isRoom(rr, rc) && walls.has(cellKey(rr, rc))) candidates.push([r + dr, c + dc, rr, rc]);
    }
  };

  join(1, 1);
  while (candidates.length) {
    const i = R.int(0, candidates.length - 1);
    const [wr, wc, rr, rc] = candidates[i];
    candidates[i] = candidates[candidates.length - 1];
    candidates.pop();
    if (!walls.has(cellKey(rr, rc))) continue;
    walls.delete(cellKey(wr, wc));
    join(rr, rc);
  }
  return walls;
}

// Clears a staircase of cells from one corner to the other, choosing
// between a vertical and a horizontal move at random while both remain
export function carveRoute(walls: Layout, from: Cell, to: Cell, seed: number) {
  const R = random(seed);
  let { r, c } = from;
  walls.delete(cellKey(r, c));
  while (r !== to.r || c !== to.c) {
    const vertical = c === to.c || (r !== to.r && R.next() < 0.5);
    if (vertical) r += Math.sign(to.r - r);
    else c += Math.sign(to.c - c);
    walls.delete(cellKey(r, c));
  }
}

export interface GridGraph {
  graph: Graph;
  source: string;
  target: string;
}

/**
 * Grid of "r_c" nodes at position (x = c, y = r), 4-connected with unit
 * weights, plus diagonals of weight √2 when `diag` is set. Walls become
 * blocked nodes. Source and target are the first and last free cells in
 * row-major order.
 */
export function generateGridGraph(config: GridGraphConfig): GridGraph {
  const { rows, cols, mapType, density, seed, diag } = config;
  const walls: Layout =
    mapType === "Maze"
      ? mazeLayout(rows, cols, seed)
      : mapType === "Random"
        ? randomLayout(rows, cols, density, seed)
        : new Set();

  const free: Cell[] = [];
  for (let r = 0; r < rows; r++)
    for (let c = 0; c < cols; c++) if (!walls.has(cellKey(r, c))) free.push({ r, c });
  const start = free[0] ?? { r: 0, c: 0 };
  const goal = free.length ? free[free.length - 1] : { r: rows - 1, c: cols - 1 };
  if (config.ensurePath) carveRoute(walls, start, goal, seed);

  const nodes: GraphNode[] = [];
  const edges: GraphInput["edges"] = [];
  const deltas: [number, number, number][] = [
    [0, 1, 1],
    [1, 0, 1],
  ];
  if (diag) deltas.push([1, 1, Math.SQRT2], [1, -1, Math.SQRT2]);

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      nodes.push({
        key: cellKey(r, c),
        position: { x: c, y: r },
        blocked: walls.has(cellKey(r, c)),
      });
      for (const [dr, dc, w] of deltas) {
        const nr = r + dr,
          nc = c + dc;
        if (nr < rows && nc >= 0 && nc < cols)
          edges.push({ source: cellKey(r, c), target: cellKey(nr, nc), weight: w });
      }
    }
  }

  return {
    graph: createGraph({ nodes, edges }),
    source: cellKey(start.r, start.c),
    target: cellKey(goal.r, goal.c),
  };
}

// ---------- Scale-free graph ----------
// Preferential attachment: each new node links to m existing nodes picked
// in proportion to their degree.
export function generateScaleFreeGraph({
  nodes,
  m,
  seed,
  weighted = true,
  weightRange = [1, 10],
}: ScaleFreeGraphConfig): Graph {
  const R = random(seed);
  const weight = () => (weighted ? R.int(weightRange[0], weightRange[1]) : 1);
  const graphNodes: GraphNode[] = [];
  const edges: GraphInput["edges"] = [];
  const degree = new Map<string, number>();

  const initial = Math.min(m + 1, nodes);
  for (let i = 0; i < initial; i++) {
    const angle = (2 * Math.PI * i) / initial;
    graphNodes.push({
      key: String(i),
      label: String(i),
      position: { x: CANVAS_W / 2 + 60 * Math.cos(angle), y: CANVAS_H / 2 + 60 * Math.sin(angle) },
    });
    degree.set(String(i), initial - 1);
  }
  for (let i = 0; i < initial; i++)
    for (let j = i + 1; j < initial; j++)
      edges.push({ source: String(i), target: String(j), weight: weight() });

  for (let i = initial; i < nodes; i++) {
    const key = String(i);
    const angle = (2 * Math.PI * i) / 7;
    const rad = 40 + i * 15;
    graphNodes.push({
      key,
      label: key,
      position: {
        x: clamp(CANVAS_W / 2 + rad * Math.cos(angle) + (R.next() * 40 - 20), 50, CANVAS_W - 50),
        y: clamp(CANVAS_H / 2 + rad * Math.sin(angle) + (R.next() * 40 - 20), 50, CANVAS_H - 50),
      },
    });

    let total = 0;
    for (const d of degree.values()) total += Math.max(d, 1);
    const picked = new Set<string>();
    for (let attempts = 0; picked.size < Math.min(m, degree.size) && attempts < m * 20; attempts++) {
      let roll = R.next() * total;
      for (const [cand, d] of degree) {
        roll -= Math.max(d, 1);
        if (roll < 0) {
          picked.add(cand);
          break;
        }
      }
    }

    degree.set(key, 0);
    for (const t of picked) {
      edges.push({ source: key, target: t, weight: weight() });
      degree.set(key, (degree.get(key) ?? 0) + 1);
      degree.set(t, (degree.get(t) ?? 0) + 1);
    }
  }

  return createGraph({ nodes: graphNodes, edges });
}
