import { manhattan } from "../game/board";
import { bfsDistance, floodFill } from "../game/grid";
import { aliveSnakes, blockedCells, findSnake, snakeHead } from "../game/state";
import { GameState, Snake } from "../game/types";

export interface HeuristicWeights {
  /** Reachable share of the board. */
  space: number;
  /** Penalty when the reachable area is smaller than the snake. */
  trap: number;
  food: number;
  health: number;
  /** Relative length against opponents. */
  length: number;
  /** Opponents whose head is within this distance count fully in the length term. */
  aggressionRadius: number;
}

export const DEFAULT_WEIGHTS: HeuristicWeights = {
  space: 10,
  trap: 20,
  food: 2,
  health: 5,
  length: 1,
  aggressionRadius: 3,
};

export const WIN_SCORE = 1_000_000;
export const LOSS_SCORE = -1_000_000;

export function resolveWeights(weights: Partial<HeuristicWeights> = {}): HeuristicWeights {
  return { ...DEFAULT_WEIGHTS, ...weights };
}

function reachable(state: GameState, snake: Snake): number {
  return floodFill(state, blockedCells(state), snakeHead(snake));
}

/** Share of the board the snake can still reach, in [0, 1]. */
export function spaceScore(state: GameState, snake: Snake): number {
  return reachable(state, snake) / (state.width * state.height);
}

/** In [-1, 0]: how far the reachable area falls short of the snake's length. */
export function trapScore(state: GameState, snake: Snake): number {
  const area = reachable(state, snake);
  const length = snake.body.length;
  return area >= length ? 0 : -(1 - area / length);
}

/**
 * Inverse path distance to the nearest food, scaled from 1x at full health
 * up to 2x when starving. Zero when no food can be reached.
 */
export function foodScore(state: GameState, snake: Snake): number {
  const distance = bfsDistance(
    state,
    blockedCells(state),
    snakeHead(snake),
    state.food
  );
  if (distance === undefined) return 0;
  const max = state.rules.initialHealth;
  const urgency = 1 + (max - snake.health) / max;
  return urgency / (1 + distance);
}

export function healthScore(state: GameState, snake: Snake): number {
  const missing = 1 - snake.health / state.rules.initialHealth;
  return -(missing * missing);
}

export function lengthScore(
  state: GameState,
  snake: Snake,
  aggressionRadius: number = DEFAULT_WEIGHTS.aggressionRadius
): number {
  const head = snakeHead(snake);
  let total = 0;
  for (const other of aliveSnakes(state)) {
    if (other.id === snake.id) continue;
    const diff = Math.max(-3, Math.min(3, snake.body.length - other.body.length));
    const near = manhattan(head, snakeHead(other)) <= aggressionRadius;
    total += (diff / 3) * (near ? 1 : 0.5);
  }
  return total;
}

/**
 * Scores `state` for `snakeId`; higher is better. An eliminated or missing
 * snake scores `LOSS_SCORE`, the last snake standing `WIN_SCORE`.
 */
export function score(
  state: GameState,
  snakeId: string,
  weights: HeuristicWeights = DEFAULT_WEIGHTS
): number {
  const snake = findSnake(state, snakeId);
  if (!snake || snake.status !== "alive") return LOSS_SCORE;

  const alive = aliveSnakes(state);
  if (alive.length === 1 && state.snakes.length > 1) return WIN_SCORE;

  return (
    weights.space * spaceScore(state, snake) +
    weights.trap * trapScore(state, snake) +
    weights.food * foodScore(state, snake) +
    weights.health * healthScore(state, snake) +
    weights.length * lengthScore(state, snake, weights.aggressionRadius)
  );
}
