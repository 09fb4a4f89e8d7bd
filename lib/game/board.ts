import { Board, Direction, DIRECTIONS, Point } from "./types";

const OFFSETS: Record<Direction, Point> = {
  up: { x: 0, y: 1 },
  down: { x: 0, y: -1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

const OPPOSITES: Record<Direction, Direction> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

export function offset(direction: Direction): Point {
  return OFFSETS[direction];
}

export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function movePoint(point: Point, direction: Direction): Point {
  const delta = offset(direction);
  return { x: point.x + delta.x, y: point.y + delta.y };
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function pointKey(point: Point): string {
  return `${point.x},${point.y}`;
}

export function isPointInList(point: Point, list: readonly Point[]): boolean {
  return list.some((p) => p.x === point.x && p.y === point.y);
}

export function manhattan(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function inBounds(board: Board, point: Point): boolean {
  return (
    point.x >= 0 &&
    point.x < board.width &&
    point.y >= 0 &&
    point.y < board.height
  );
}

/** Direction of a single unit step, or undefined when the points are not adjacent. */
export function directionBetween(from: Point, to: Point): Direction | undefined {
  return DIRECTIONS.find((d) => pointsEqual(movePoint(from, d), to));
}

export function neighbours(board: Board, point: Point): Point[] {
  return DIRECTIONS.map((d) => movePoint(point, d)).filter((p) =>
    inBounds(board, p)
  );
}

export function cellIndex(board: Board, point: Point): number {
  return point.y * board.width + point.x;
}
