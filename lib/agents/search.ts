import { ContractViolationError } from "../errors";
import { manhattan, movePoint, pointsEqual } from "../game/board";
import { advance, defaultMove } from "../game/engine";
import { aStar, floodFill } from "../game/grid";
import { Rng } from "../game/random";
import {
  aliveSnakes,
  blockedCells,
  findSnake,
  safeMoves,
  snakeHead,
} from "../game/state";
import { Direction, DIRECTIONS, GameState, MoveSet, Snake } from "../game/types";
import { LOSS_SCORE, score, WIN_SCORE } from "./evaluator";
import { StarAgentConfig } from "./types";

export interface SearchResult {
  move: Direction;
  /** Deepest look-ahead that finished for every root move. */
  depth: number;
  score: number;
  expansions: number;
  timedOut: boolean;
}

// Hypothetical turns never spawn food, so the only draw left is the royale
// side pick, which is pinned.
const HYPOTHETICAL_RNG: Rng = () => 0;

interface SearchContext {
  me: string;
  config: StarAgentConfig;
  deadline: number;
  adversaries: string[];
  greedy: string[];
  solo: boolean;
  expansions: number;
}

/** First step of the A* path to the closest food (by straight-line distance). */
export function foodDirection(state: GameState, snake: Snake): Direction | undefined {
  const head = snakeHead(snake);
  let nearest = state.food[0];
  if (!nearest) return undefined;
  for (const f of state.food) {
    if (manhattan(head, f) < manhattan(head, nearest)) nearest = f;
  }
  const path = aStar(state, blockedCells(state), head, nearest);
  if (!path || path.length < 2) return undefined;
  return DIRECTIONS.find((d) => pointsEqual(movePoint(head, d), path[1]));
}

/** Moves next to the head of an opponent at least as long, where a head to head would be lost. */
function headToHeadRisk(state: GameState, snake: Snake, direction: Direction): boolean {
  const target = movePoint(snakeHead(snake), direction);
  return aliveSnakes(state).some(
    (other) =>
      other.id !== snake.id &&
      other.body.length >= snake.body.length &&
      manhattan(snakeHead(other), target) === 1
  );
}

/**
 * Candidate moves in tie-break order: `preferred` first, then moves without
 * head to head risk, then the A* step toward food, then up, right, down, left.
 * Falls back to all four directions when no move is safe.
 */
export function orderMoves(
  state: GameState,
  snake: Snake,
  preferred?: Direction
): Direction[] {
  const safe = safeMoves(state, snake.id);
  const candidates = safe.length > 0 ? safe : [...DIRECTIONS];
  const toFood = foodDirection(state, snake);
  const rank = (d: Direction) => [
    d === preferred ? 0 : 1,
    headToHeadRisk(state, snake, d) ? 1 : 0,
    d === toFood ? 0 : 1,
    DIRECTIONS.indexOf(d),
  ];
  return candidates.sort((a, b) => {
    const ra = rank(a);
    const rb = rank(b);
    for (let i = 0; i < ra.length; i++) {
      if (ra[i] !== rb[i]) return ra[i] - rb[i];
    }
    return 0;
  });
}

/** An opponent's fixed policy: the safe move that leaves it the most room. */
export function greedyMove(state: GameState, snakeId: string): Direction | undefined {
  const snake = findSnake(state, snakeId);
  if (!snake || snake.status !== "alive") return undefined;
  const moves = safeMoves(state, snakeId);
  if (moves.length === 0) return defaultMove(snake);

  const blocked = blockedCells(state);
  let best = moves[0];
  let bestArea = -1;
  for (const d of moves) {
    const area = floodFill(state, blocked, movePoint(snakeHead(snake), d));
    if (area > bestArea) {
      best = d;
      bestArea = area;
    }
  }
  return best;
}

function opponentResponses(state: GameState, ctx: SearchContext): MoveSet[] {
  const fixed: MoveSet = {};
  for (const id of ctx.greedy) {
    const move = greedyMove(state, id);
    if (move) fixed[id] = move;
  }

  let responses: MoveSet[] = [fixed];
  for (const id of ctx.adversaries) {
    const snake = findSnake(state, id);
    if (!snake || snake.status !== "alive") continue;
    const safe = safeMoves(state, id);
    const options = safe.length > 0 ? safe : [defaultMove(snake)];
    responses = responses.flatMap((r) => options.map((d) => ({ ...r, [id]: d })));
  }
  return responses;
}

function terminalValue(state: GameState, ctx: SearchContext, ply: number): number | undefined {
  const me = findSnake(state, ctx.me);
  if (!me || me.status !== "alive") return LOSS_SCORE + ply;
  if (state.isGameOver && state.winnerId === ctx.me && !ctx.solo) {
    return WIN_SCORE - ply;
  }
  return undefined;
}

function timeUp(ctx: SearchContext): boolean {
  return Date.now() >= ctx.deadline;
}

function searchMax(
  state: GameState,
  depth: number,
  ply: number,
  ctx: SearchContext
): number | undefined {
  const me = findSnake(state, ctx.me);
  if (!me) return LOSS_SCORE + ply;
  if (depth === 0 || state.isGameOver) {
    return score(state, ctx.me, ctx.config.weights);
  }

  let best = -Infinity;
  for (const move of orderMoves(state, me)) {
    const value = searchMin(state, move, depth, ply, ctx);
    if (value === undefined) return undefined;
    if (value > best) best = value;
  }
  return best;
}

function searchMin(
  state: GameState,
  move: Direction,
  depth: number,
  ply: number,
  ctx: SearchContext
): number | undefined {
  let worst = Infinity;
  for (const response of opponentResponses(state, ctx)) {
    if (timeUp(ctx)) return undefined;
    ctx.expansions++;

    let { state: next } = advance(
      state,
      { ...response, [ctx.me]: move },
      HYPOTHETICAL_RNG,
      { spawnFood: false }
    );
    if (ctx.solo && next.isGameOver && next.winnerId === ctx.me) {
      // Alone on the board the game never ends in a win; keep looking ahead.
      next = { ...next, isGameOver: false, winnerId: undefined };
    }

    const value =
      terminalValue(next, ctx, ply + 1) ?? searchMax(next, depth - 1, ply + 1, ctx);
    if (value === undefined) return undefined;
    if (value < worst) worst = value;
  }
  return worst;
}

/**
 * Anytime iterative deepening. A legal move is known before the first
 * expansion and improved after every root move that finishes; when the
 * deadline passes the best move so far is returned.
 */
export function searchMove(
  state: GameState,
  snakeId: string,
  config: StarAgentConfig,
  deadline: number
): SearchResult {
  const me = findSnake(state, snakeId);
  if (!me || me.status !== "alive") {
    throw new ContractViolationError(`Snake ${snakeId} is not alive`);
  }

  const head = snakeHead(me);
  const opponents = aliveSnakes(state)
    .filter((s) => s.id !== snakeId)
    .sort((a, b) => manhattan(head, snakeHead(a)) - manhattan(head, snakeHead(b)))
    .map((s) => s.id);

  const ctx: SearchContext = {
    me: snakeId,
    config,
    deadline,
    adversaries: opponents.slice(0, config.searchedOpponents),
    greedy: opponents.slice(config.searchedOpponents),
    solo: opponents.length === 0,
    expansions: 0,
  };

  let best = orderMoves(state, me)[0];
  let bestScore = -Infinity;
  let completed = 0;

  for (let depth = 1; depth <= config.depth; depth++) {
    let depthBest: Direction | undefined;
    let depthScore = -Infinity;
    let aborted = false;

    for (const move of orderMoves(state, me, best)) {
      const value = searchMin(state, move, depth, 0, ctx);
      if (value === undefined) {
        aborted = true;
        break;
      }
      if (depthBest === undefined || value > depthScore) {
        depthBest = move;
        depthScore = value;
      }
    }

    // The previous best is searched first, so a partial pass only replaces
    // it with a move that scored higher at the new depth.
    if (depthBest !== undefined) {
      best = depthBest;
      bestScore = depthScore;
    }
    if (aborted) {
      return { move: best, depth: completed, score: bestScore, expansions: ctx.expansions, timedOut: true };
    }
    completed = depth;

    if (Math.abs(bestScore) >= WIN_SCORE / 2) break;
  }

  return { move: best, depth: completed, score: bestScore, expansions: ctx.expansions, timedOut: false };
}
