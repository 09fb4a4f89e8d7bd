import { randomUUID } from "node:crypto";
import {
  cellIndex,
  directionBetween,
  inBounds,
  movePoint,
  pointsEqual,
} from "./board";
import {
  Direction,
  DIRECTIONS,
  GameState,
  Point,
  RulesParameters,
  Snake,
} from "./types";

export const DEFAULT_RULES: RulesParameters = {
  initialHealth: 100,
  foodSpawnChance: 0.15,
  minFood: 1,
  hazardDamage: 14,
  shrinkEveryNTurns: 0,
  shrinkOnEliminationOnly: false,
  maxTurns: 0,
};

export function resolveRules(rules: Partial<RulesParameters> = {}): RulesParameters {
  return { ...DEFAULT_RULES, ...rules };
}

export interface GameStateInit {
  id?: string;
  width: number;
  height: number;
  turn?: number;
  snakes: Snake[];
  food?: Point[];
  hazards?: Point[];
  rules?: Partial<RulesParameters>;
}

export function createGameState(init: GameStateInit): GameState {
  return {
    id: init.id ?? randomUUID(),
    turn: init.turn ?? 0,
    width: init.width,
    height: init.height,
    snakes: init.snakes.map((s) => ({ ...s, body: [...s.body] })),
    food: [...(init.food ?? [])],
    hazards: [...(init.hazards ?? [])],
    rules: resolveRules(init.rules),
    isGameOver: false,
  };
}

export function createSnake(
  id: string,
  body: Point[],
  health: number = DEFAULT_RULES.initialHealth,
  name: string = id
): Snake {
  return { id, name, body: [...body], health, status: "alive" };
}

export function aliveSnakes(state: GameState): Snake[] {
  return state.snakes.filter((s) => s.status === "alive");
}

export function findSnake(state: GameState, snakeId: string): Snake | undefined {
  return state.snakes.find((s) => s.id === snakeId);
}

export function snakeHead(snake: Snake): Point {
  return snake.body[0];
}

/** A tail vacates next turn unless it is stacked (the snake grew last turn). */
export function tailVacates(snake: Snake): boolean {
  const n = snake.body.length;
  return n > 1 && !pointsEqual(snake.body[n - 1], snake.body[n - 2]);
}

/**
 * Direction the snake is currently travelling in, from neck to head.
 * Undefined for a single cell snake or one whose neck is stacked under the head.
 */
export function heading(snake: Snake): Direction | undefined {
  if (snake.body.length < 2) return undefined;
  return directionBetween(snake.body[1], snake.body[0]);
}

/** Occupancy grid of every alive body segment, indexed by `cellIndex`. */
export function occupiedCells(state: GameState): Uint8Array {
  const taken = new Uint8Array(state.width * state.height);
  for (const snake of aliveSnakes(state)) {
    for (const p of snake.body) {
      if (inBounds(state, p)) taken[cellIndex(state, p)] = 1;
    }
  }
  return taken;
}

/**
 * Occupancy grid of the cells that stay blocked next turn: every alive body
 * segment except tails that will move away.
 */
export function blockedCells(state: GameState): Uint8Array {
  const blocked = new Uint8Array(state.width * state.height);
  for (const snake of aliveSnakes(state)) {
    const keep = tailVacates(snake) ? snake.body.length - 1 : snake.body.length;
    for (let i = 0; i < keep; i++) {
      const p = snake.body[i];
      if (inBounds(state, p)) blocked[cellIndex(state, p)] = 1;
    }
  }
  return blocked;
}

/** Moves that do not immediately run into a wall or a body. Head to head is not considered. */
export function safeMoves(state: GameState, snakeId: string): Direction[] {
  const snake = findSnake(state, snakeId);
  if (!snake || snake.status !== "alive") return [];
  const blocked = blockedCells(state);
  const head = snakeHead(snake);
  return DIRECTIONS.filter((d) => {
    const next = movePoint(head, d);
    return inBounds(state, next) && blocked[cellIndex(state, next)] === 0;
  });
}

export function isMoveSafe(
  state: GameState,
  snakeId: string,
  direction: Direction
): boolean {
  return safeMoves(state, snakeId).includes(direction);
}

export function hasHazard(state: GameState, point: Point): boolean {
  return state.hazards.some((h) => pointsEqual(h, point));
}
