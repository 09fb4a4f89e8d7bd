import { directionBetween, movePoint, opposite, pointKey } from "./board";
import { createGameState, createSnake, resolveRules } from "./state";
import {
  Direction,
  DIRECTIONS,
  GameState,
  Point,
  RulesParameters,
  Snake,
} from "./types";

/*
 * Grid diagrams, top row first:
 *   .        free
 *   o        food
 *   x        hazard
 *   0-9      head of snake N
 *   ^ > v <  body segment, pointing at the segment nearer the head
 */

const BODY_CHARS: Record<Direction, string> = {
  up: "^",
  right: ">",
  down: "v",
  left: "<",
};

type RawCell =
  | { kind: "free" }
  | { kind: "food" }
  | { kind: "hazard" }
  | { kind: "head"; index: number }
  | { kind: "body"; direction: Direction };

function readCell(token: string): RawCell {
  const c = token.charAt(0);
  if (c === "o") return { kind: "food" };
  if (c === "x") return { kind: "hazard" };
  if (c >= "0" && c <= "9") return { kind: "head", index: Number(c) };
  const direction = DIRECTIONS.find((d) => BODY_CHARS[d] === c);
  if (direction) return { kind: "body", direction };
  return { kind: "free" };
}

/**
 * Builds a state from a diagram. Snakes get the ids "0", "1", ... in head
 * order and full health; bodies shorter than three are padded by stacking
 * the tail. Returns undefined when the rows have different widths.
 */
export function parseBoard(
  text: string,
  rules: Partial<RulesParameters> = {}
): GameState | undefined {
  const rows = text
    .trim()
    .split("\n")
    .map((line) => line.trim().split(/\s+/).map(readCell));
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  if (width === 0 || rows.some((r) => r.length !== width)) return undefined;

  const at = (p: Point): RawCell | undefined => {
    if (p.x < 0 || p.x >= width || p.y < 0 || p.y >= height) return undefined;
    return rows[height - 1 - p.y][p.x];
  };

  const food: Point[] = [];
  const hazards: Point[] = [];
  const heads = new Map<number, Point>();
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const cell = rows[height - 1 - y][x];
      if (cell.kind === "food") food.push({ x, y });
      else if (cell.kind === "hazard") hazards.push({ x, y });
      else if (cell.kind === "head") heads.set(cell.index, { x, y });
    }
  }

  const resolved = resolveRules(rules);
  const snakes: Snake[] = [];
  for (let index = 0; heads.has(index); index++) {
    const head = heads.get(index);
    if (!head) break;

    const body: Point[] = [head];
    const seen = new Set([pointKey(head)]);
    let current = head;
    for (;;) {
      const step = DIRECTIONS.find((d) => {
        const next = movePoint(current, d);
        const cell = at(next);
        return (
          cell?.kind === "body" &&
          cell.direction === opposite(d) &&
          !seen.has(pointKey(next))
        );
      });
      if (!step) break;
      current = movePoint(current, step);
      seen.add(pointKey(current));
      body.push(current);
    }
    while (body.length < 3) {
      body.push({ ...body[body.length - 1] });
    }

    snakes.push(createSnake(String(index), body, resolved.initialHealth));
  }

  return createGameState({ width, height, snakes, food, hazards, rules: resolved });
}

/** Prints the living snakes, food and hazards in the diagram notation. */
export function renderBoard(state: GameState): string {
  const cells: string[][] = Array.from({ length: state.height }, () =>
    Array.from({ length: state.width }, () => ".")
  );
  const put = (p: Point, c: string) => {
    if (p.x >= 0 && p.x < state.width && p.y >= 0 && p.y < state.height) {
      cells[state.height - 1 - p.y][p.x] = c;
    }
  };

  state.hazards.forEach((h) => put(h, "x"));
  state.food.forEach((f) => put(f, "o"));

  state.snakes.forEach((snake, index) => {
    if (snake.status !== "alive") return;
    for (let i = snake.body.length - 1; i > 0; i--) {
      const toward = directionBetween(snake.body[i], snake.body[i - 1]);
      if (toward) put(snake.body[i], BODY_CHARS[toward]);
    }
    put(snake.body[0], index < 10 ? String(index) : "#");
  });

  return cells.map((row) => row.join(" ")).join("\n");
}
