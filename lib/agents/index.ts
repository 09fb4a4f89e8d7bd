import { ContractViolationError } from "../errors";
import { createRng } from "../game/random";
import { findSnake } from "../game/state";
import { Direction, GameState } from "../game/types";
import { randomMove } from "./random";
import { searchMove, SearchResult } from "./search";
import { Agent, AgentConfig } from "./types";

/** Above this size in either dimension the search is skipped for random play. */
export const MAX_BOARD_SIZE = 19;

/**
 * Binds a config to its own random stream for one game. A Random config's
 * own seed is used when no seed is given.
 */
export function createAgent(config: AgentConfig, seed?: number): Agent {
  const configSeed = config.kind === "random" ? config.seed : undefined;
  return { config, rng: createRng(seed ?? configSeed).rng };
}

export type MoveDecision = Pick<SearchResult, "move"> & Partial<SearchResult>;

/**
 * Chooses a move for `snakeId` before `deadline` (epoch milliseconds).
 * Throws `ContractViolationError` when the snake is missing or eliminated.
 */
export function decideMove(
  agent: Agent,
  state: GameState,
  snakeId: string,
  deadline: number
): MoveDecision {
  const snake = findSnake(state, snakeId);
  if (!snake) {
    throw new ContractViolationError(`Snake ${snakeId} is not in game ${state.id}`);
  }
  if (snake.status !== "alive") {
    throw new ContractViolationError(`Snake ${snakeId} was eliminated on turn ${snake.eliminatedOnTurn}`);
  }

  const { config } = agent;
  if (state.width > MAX_BOARD_SIZE || state.height > MAX_BOARD_SIZE) {
    return { move: randomMove(state, snakeId, agent.rng) };
  }

  switch (config.kind) {
    case "astar":
      return searchMove(state, snakeId, config, deadline);
    case "random":
      return { move: randomMove(state, snakeId, agent.rng) };
  }
}

export function chooseMove(
  agent: Agent,
  state: GameState,
  snakeId: string,
  deadline: number
): Direction {
  return decideMove(agent, state, snakeId, deadline).move;
}

export * from "./types";
