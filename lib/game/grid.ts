import { cellIndex, inBounds, manhattan, movePoint, neighbours } from "./board";
import { Board, DIRECTIONS, Point } from "./types";

/**
 * Number of free cells reachable from `start`, not counting `start` itself.
 * `blocked` is indexed by `cellIndex`.
 */
export function floodFill(board: Board, blocked: Uint8Array, start: Point): number {
  const seen = new Uint8Array(board.width * board.height);
  const queue: Point[] = [start];
  if (inBounds(board, start)) seen[cellIndex(board, start)] = 1;
  let count = 0;

  for (let i = 0; i < queue.length; i++) {
    for (const next of neighbours(board, queue[i])) {
      const idx = cellIndex(board, next);
      if (seen[idx] || blocked[idx]) continue;
      seen[idx] = 1;
      count++;
      queue.push(next);
    }
  }
  return count;
}

/**
 * Breadth-first distance from `start` to the closest of `targets`,
 * or undefined when none can be reached.
 */
export function bfsDistance(
  board: Board,
  blocked: Uint8Array,
  start: Point,
  targets: readonly Point[]
): number | undefined {
  if (targets.length === 0) return undefined;
  const goal = new Uint8Array(board.width * board.height);
  for (const t of targets) {
    if (inBounds(board, t)) goal[cellIndex(board, t)] = 1;
  }

  const dist = new Int32Array(board.width * board.height).fill(-1);
  dist[cellIndex(board, start)] = 0;
  const queue: Point[] = [start];

  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    const d = dist[cellIndex(board, current)];
    for (const next of neighbours(board, current)) {
      const idx = cellIndex(board, next);
      if (dist[idx] !== -1) continue;
      if (goal[idx]) return d + 1;
      if (blocked[idx]) continue;
      dist[idx] = d + 1;
      queue.push(next);
    }
  }
  return undefined;
}

interface OpenNode {
  point: Point;
  g: number;
  f: number;
  order: number;
}

/**
 * A* over the grid with a Manhattan heuristic. Returns the path from
 * `start` to `goal`, both included, or undefined when the goal is walled off.
 */
export function aStar(
  board: Board,
  blocked: Uint8Array,
  start: Point,
  goal: Point
): Point[] | undefined {
  if (!inBounds(board, start) || !inBounds(board, goal)) return undefined;
  const size = board.width * board.height;
  const cameFrom = new Int32Array(size).fill(-1);
  const bestG = new Int32Array(size).fill(0x7fffffff);
  const closed = new Uint8Array(size);
  const startIdx = cellIndex(board, start);
  const goalIdx = cellIndex(board, goal);

  let order = 0;
  const open: OpenNode[] = [
    { point: start, g: 0, f: manhattan(start, goal), order: order++ },
  ];
  bestG[startIdx] = 0;

  while (open.length > 0) {
    let best = 0;
    for (let i = 1; i < open.length; i++) {
      const a = open[i];
      const b = open[best];
      if (a.f < b.f || (a.f === b.f && a.order < b.order)) best = i;
    }
    const [node] = open.splice(best, 1);
    const idx = cellIndex(board, node.point);
    if (closed[idx]) continue;
    closed[idx] = 1;

    if (idx === goalIdx) {
      const path: Point[] = [];
      for (let at = idx; at !== -1; at = cameFrom[at]) {
        path.push({ x: at % board.width, y: Math.floor(at / board.width) });
        if (at === startIdx) break;
      }
      return path.reverse();
    }

    for (const d of DIRECTIONS) {
      const next = movePoint(node.point, d);
      if (!inBounds(board, next)) continue;
      const nextIdx = cellIndex(board, next);
      if (closed[nextIdx] || (blocked[nextIdx] && nextIdx !== goalIdx)) continue;
      const g = node.g + 1;
      if (g >= bestG[nextIdx]) continue;
      bestG[nextIdx] = g;
      cameFrom[nextIdx] = idx;
      open.push({ point: next, g, f: g + manhattan(next, goal), order: order++ });
    }
  }
  return undefined;
}
