import { pick, Rng } from "../game/random";
import { safeMoves } from "../game/state";
import { Direction, DIRECTIONS, GameState } from "../game/types";

/**
 * Uniform over the moves that do not run straight into a wall or body;
 * uniform over all four when every move is fatal.
 */
export function randomMove(state: GameState, snakeId: string, rng: Rng): Direction {
  return pick(rng, safeMoves(state, snakeId)) ?? pick(rng, DIRECTIONS) ?? "up";
}
