import { ContractViolationError } from "../errors";
import {
  cellIndex,
  inBounds,
  isPointInList,
  movePoint,
  pointKey,
  pointsEqual,
} from "./board";
import { createRng, randomInt, Rng } from "./random";
import {
  aliveSnakes,
  createGameState,
  createSnake,
  hasHazard,
  heading,
  occupiedCells,
  resolveRules,
} from "./state";
import {
  Board,
  Direction,
  EliminationReason,
  GameState,
  Move,
  MoveSet,
  Point,
  RulesParameters,
  Snake,
  TurnResult,
  Verdict,
} from "./types";

export interface AdvanceOptions {
  /** Hypothetical futures in a search do not invent food. Defaults to true. */
  spawnFood?: boolean;
}

interface MovedSnake {
  snake: Snake;
  body: Point[];
  health: number;
}

/**
 * The move applied to a living snake the caller gave no move for: it keeps
 * going straight, or up when it has no heading yet.
 */
export function defaultMove(snake: Snake): Direction {
  return heading(snake) ?? "up";
}

/**
 * Applies one simultaneous turn. The input state is left untouched; every
 * collection in the returned state is new.
 */
export function advance(
  state: GameState,
  moves: MoveSet,
  rng: Rng,
  options: AdvanceOptions = {}
): TurnResult {
  if (state.isGameOver) {
    throw new ContractViolationError(
      `Game ${state.id} is over at turn ${state.turn}`
    );
  }

  const { rules } = state;
  const turn = state.turn + 1;
  const alive = aliveSnakes(state);
  const foodKeys = new Set(state.food.map(pointKey));
  const eaten = new Set<string>();

  const moved: MovedSnake[] = alive.map((snake) => {
    const direction = moves[snake.id] ?? defaultMove(snake);
    const head = movePoint(snake.body[0], direction);
    const eats = foodKeys.has(pointKey(head));

    const body = [head, ...snake.body];
    if (!eats) {
      body.pop();
    }

    let health = snake.health - 1;
    if (hasHazard(state, head)) {
      health -= rules.hazardDamage;
    }
    if (eats) {
      health = rules.initialHealth;
      eaten.add(pointKey(head));
    }
    health = Math.min(rules.initialHealth, Math.max(0, health));

    return { snake, body, health };
  });

  const eliminations = findEliminations(state, moved);

  const movedById = new Map(moved.map((m) => [m.snake.id, m]));
  const snakes = state.snakes.map((snake): Snake => {
    const next = movedById.get(snake.id);
    if (!next) return snake;

    const reason = eliminations.get(snake.id);
    if (reason) {
      return {
        ...snake,
        body: next.body,
        health: 0,
        status: "eliminated",
        eliminationReason: reason,
        eliminatedOnTurn: turn,
      };
    }
    return { ...snake, body: next.body, health: next.health };
  });

  let next: GameState = {
    ...state,
    turn,
    snakes,
    food: state.food.filter((f) => !eaten.has(pointKey(f))),
    hazards: [...state.hazards],
  };

  if (options.spawnFood !== false) {
    next = { ...next, food: spawnFood(next, rng, true) };
  }

  if (shouldShrink(rules, turn, eliminations.size)) {
    next = { ...next, hazards: shrink(next, rng) };
  }

  const verdict = computeVerdict(next);
  if (verdict.kind !== "ongoing") {
    next.isGameOver = true;
    if (verdict.kind === "winner") {
      next.winnerId = verdict.snakeId;
    }
  }

  return { state: next, verdict };
}

function findEliminations(
  state: Board,
  moved: MovedSnake[]
): Map<string, EliminationReason> {
  const eliminations = new Map<string, EliminationReason>();

  for (const m of moved) {
    if (!inBounds(state, m.body[0])) {
      eliminations.set(m.snake.id, "out-of-bounds");
    } else if (m.health <= 0) {
      eliminations.set(m.snake.id, "starvation");
    }
  }

  // Bodies block for the whole turn, even those of snakes that leave the
  // board or starve on it. Only snakes still standing meet head to head.
  const contenders = moved.filter((m) => !eliminations.has(m.snake.id));
  const collisions = new Map<string, EliminationReason>();

  for (const m of contenders) {
    const head = m.body[0];

    if (isPointInList(head, m.body.slice(1))) {
      collisions.set(m.snake.id, "self-collision");
      continue;
    }

    const hitBody = moved.some(
      (other) =>
        other.snake.id !== m.snake.id &&
        isPointInList(head, other.body.slice(1))
    );
    if (hitBody) {
      collisions.set(m.snake.id, "body-collision");
      continue;
    }

    const lostHeadToHead = contenders.some(
      (other) =>
        other.snake.id !== m.snake.id &&
        pointsEqual(head, other.body[0]) &&
        other.body.length >= m.body.length
    );
    if (lostHeadToHead) {
      collisions.set(m.snake.id, "head-to-head-collision");
    }
  }

  collisions.forEach((reason, id) => eliminations.set(id, reason));
  return eliminations;
}

export function computeVerdict(state: GameState): Verdict {
  const remaining = aliveSnakes(state);
  if (remaining.length === 1) {
    return { kind: "winner", snakeId: remaining[0].id };
  }
  if (remaining.length === 0) {
    return { kind: "draw" };
  }
  if (state.rules.maxTurns > 0 && state.turn >= state.rules.maxTurns) {
    return { kind: "draw" };
  }
  return { kind: "ongoing" };
}

function freeCells(state: GameState): Point[] {
  const taken = occupiedCells(state);
  for (const f of state.food) {
    taken[cellIndex(state, f)] = 1;
  }

  const cells: Point[] = [];
  for (let y = 0; y < state.height; y++) {
    for (let x = 0; x < state.width; x++) {
      if (taken[y * state.width + x] === 0) cells.push({ x, y });
    }
  }
  return cells;
}

/**
 * Tops the board up to `minFood`, then rolls once for an extra piece.
 * Returns the new food list; cells are drawn through `rng` only.
 */
export function spawnFood(state: GameState, rng: Rng, allowChance: boolean): Point[] {
  const food = [...state.food];
  const free = freeCells(state);

  const place = () => {
    if (free.length === 0) return;
    const [cell] = free.splice(randomInt(rng, free.length), 1);
    food.push(cell);
  };

  while (food.length < state.rules.minFood && free.length > 0) {
    place();
  }

  if (allowChance && rng() < state.rules.foodSpawnChance) {
    place();
  }

  return food;
}

function shouldShrink(
  rules: RulesParameters,
  turn: number,
  eliminated: number
): boolean {
  if (rules.shrinkEveryNTurns <= 0) return false;
  if (rules.shrinkOnEliminationOnly) return eliminated > 0;
  return turn % rules.shrinkEveryNTurns === 0;
}

interface SafeArea {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/** The rectangle left after peeling every edge row and column that is fully hazard. */
export function safeArea(state: GameState): SafeArea {
  const hazards = new Set(state.hazards.map(pointKey));
  const area: SafeArea = {
    minX: 0,
    maxX: state.width - 1,
    minY: 0,
    maxY: state.height - 1,
  };

  const column = (x: number) => {
    for (let y = area.minY; y <= area.maxY; y++) {
      if (!hazards.has(pointKey({ x, y }))) return false;
    }
    return true;
  };
  const row = (y: number) => {
    for (let x = area.minX; x <= area.maxX; x++) {
      if (!hazards.has(pointKey({ x, y }))) return false;
    }
    return true;
  };

  let changed = true;
  while (changed && area.minX <= area.maxX && area.minY <= area.maxY) {
    changed = false;
    if (column(area.minX)) {
      area.minX++;
      changed = true;
    } else if (column(area.maxX)) {
      area.maxX--;
      changed = true;
    } else if (row(area.minY)) {
      area.minY++;
      changed = true;
    } else if (row(area.maxY)) {
      area.maxY--;
      changed = true;
    }
  }
  return area;
}

/** Turns one random edge line of the safe area into hazard (royale). */
function shrink(state: GameState, rng: Rng): Point[] {
  const area = safeArea(state);
  const hazards = [...state.hazards];
  if (area.minX >= area.maxX && area.minY >= area.maxY) return hazards;

  const line: Point[] = [];
  switch (randomInt(rng, 4)) {
    case 0:
      for (let y = area.minY; y <= area.maxY; y++) line.push({ x: area.minX, y });
      break;
    case 1:
      for (let y = area.minY; y <= area.maxY; y++) line.push({ x: area.maxX, y });
      break;
    case 2:
      for (let x = area.minX; x <= area.maxX; x++) line.push({ x, y: area.minY });
      break;
    default:
      for (let x = area.minX; x <= area.maxX; x++) line.push({ x, y: area.maxY });
      break;
  }

  for (const p of line) {
    if (!isPointInList(p, hazards)) hazards.push(p);
  }
  return hazards;
}

/**
 * Start cells for up to eight snakes: the four corners inset by one, listed
 * so that two snakes start diagonally opposite, then the edge midpoints.
 */
export function startPositions(board: Board): Point[] {
  const { width, height } = board;
  const midX = Math.floor(width / 2);
  const midY = Math.floor(height / 2);
  return [
    { x: 1, y: 1 },
    { x: width - 2, y: height - 2 },
    { x: 1, y: height - 2 },
    { x: width - 2, y: 1 },
    { x: midX, y: 1 },
    { x: midX, y: height - 2 },
    { x: 1, y: midY },
    { x: width - 2, y: midY },
  ];
}

export interface Player {
  id: string;
  name?: string;
}

export interface LayoutOptions extends Board {
  rules?: Partial<RulesParameters>;
  initialLength?: number;
  id?: string;
}

/**
 * Places stacked snakes on their start cells, one food in the centre when
 * it is free, then tops food up to `minFood` through `rng`.
 */
export function createInitialState(
  players: Player[],
  options: LayoutOptions,
  rng: Rng
): GameState {
  const positions = startPositions(options);
  if (players.length > positions.length) {
    throw new ContractViolationError(
      `At most ${positions.length} snakes can be placed, got ${players.length}`
    );
  }

  const rules = resolveRules(options.rules);
  const length = options.initialLength ?? 3;
  const snakes = players.map((p, index) => {
    const start = positions[index];
    return createSnake(
      p.id,
      Array.from({ length }, () => ({ ...start })),
      rules.initialHealth,
      p.name ?? `Snake ${index + 1}`
    );
  });

  const centre = {
    x: Math.floor(options.width / 2),
    y: Math.floor(options.height / 2),
  };
  const centreTaken = snakes.some((s) => isPointInList(centre, s.body));

  const state = createGameState({
    id: options.id,
    width: options.width,
    height: options.height,
    snakes,
    food: centreTaken ? [] : [centre],
    rules,
  });
  return { ...state, food: spawnFood(state, rng, false) };
}

/** Stateful driver over `advance` for callers that play one game at a time. */
export class GameEngine {
  private state: GameState;
  private readonly rng: Rng;
  private readonly options: LayoutOptions;
  private verdict: Verdict = { kind: "ongoing" };

  constructor(options: LayoutOptions, seed?: number) {
    this.options = options;
    this.rng = createRng(seed).rng;
    this.state = createGameState({
      width: options.width,
      height: options.height,
      snakes: [],
      rules: options.rules,
    });
  }

  public initializeGame(players: Player[]) {
    this.state = createInitialState(players, this.options, this.rng);
    this.verdict = { kind: "ongoing" };
  }

  public getState(): GameState {
    return this.state;
  }

  public getVerdict(): Verdict {
    return this.verdict;
  }

  public nextTurn(moves: Move[]): Verdict {
    const set: MoveSet = {};
    for (const move of moves) {
      set[move.snakeId] = move.direction;
    }
    const result = advance(this.state, set, this.rng);
    this.state = result.state;
    this.verdict = result.verdict;
    return result.verdict;
  }
}
