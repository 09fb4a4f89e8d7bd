import { manhattan } from "../game/board";
import { createGameState, createSnake } from "../game/state";
import { GameState, Point, RulesParameters } from "../game/types";
import { GameRequest, SnakeSnapshot } from "./schemas";

export interface SnapshotOptions {
  /** Opponents kept when the board is crowded, nearest to you first. */
  maxOpponents?: number;
}

const DEFAULT_MAX_OPPONENTS = 3;

function rulesFromRequest(request: GameRequest): Partial<RulesParameters> {
  const ruleset = request.game.ruleset;
  const settings = ruleset?.settings;
  const rules: Partial<RulesParameters> = {};
  if (settings?.foodSpawnChance !== undefined) {
    rules.foodSpawnChance = settings.foodSpawnChance / 100;
  }
  if (settings?.minimumFood !== undefined) {
    rules.minFood = settings.minimumFood;
  }
  if (settings?.hazardDamagePerTurn !== undefined) {
    rules.hazardDamage = settings.hazardDamagePerTurn;
  }
  if (ruleset?.name === "royale" && settings?.royale?.shrinkEveryNTurns) {
    rules.shrinkEveryNTurns = settings.royale.shrinkEveryNTurns;
  }
  return rules;
}

function bodyDistance(body: Point[], head: Point): number {
  return Math.min(...body.map((p) => manhattan(p, head)));
}

/**
 * Builds the state the agent searches from a move request. `you` is always
 * the first snake; on crowded boards only the opponents whose bodies come
 * closest to your head are kept.
 */
export function stateFromRequest(
  request: GameRequest,
  options: SnapshotOptions = {}
): GameState {
  const maxOpponents = options.maxOpponents ?? DEFAULT_MAX_OPPONENTS;
  const you = request.board.snakes.find((s) => s.id === request.you.id) ?? request.you;
  const head = you.body[0];

  let opponents = request.board.snakes.filter((s) => s.id !== you.id);
  if (opponents.length > maxOpponents) {
    opponents = opponents
      .map((snake, index) => ({ snake, index, distance: bodyDistance(snake.body, head) }))
      .sort((a, b) => a.distance - b.distance || a.index - b.index)
      .slice(0, maxOpponents)
      .map((entry) => entry.snake);
  }

  const toSnake = (s: SnakeSnapshot) =>
    createSnake(s.id, s.body, s.health, s.name || s.id);

  return createGameState({
    id: request.game.id,
    turn: request.turn,
    width: request.board.width,
    height: request.board.height,
    snakes: [toSnake(you), ...opponents.map(toSnake)],
    food: request.board.food,
    hazards: request.board.hazards,
    rules: rulesFromRequest(request),
  });
}
