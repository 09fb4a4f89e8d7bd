export type Point = {
  x: number;
  y: number;
};

export type Direction = "up" | "down" | "left" | "right";

/** Fixed enumeration order for every deterministic walk over moves. */
export const DIRECTIONS: readonly Direction[] = ["up", "right", "down", "left"];

export type SnakeStatus = "alive" | "eliminated";

export type EliminationReason =
  | "self-collision"
  | "body-collision"
  | "head-to-head-collision"
  | "out-of-bounds"
  | "starvation";

export interface Snake {
  id: string;
  name: string;
  body: Point[]; // head first
  health: number;
  status: SnakeStatus;
  eliminationReason?: EliminationReason;
  eliminatedOnTurn?: number;
}

export interface RulesParameters {
  initialHealth: number;
  foodSpawnChance: number; // 0-1
  minFood: number;
  hazardDamage: number;
  shrinkEveryNTurns: number; // 0 disables royale shrinking
  shrinkOnEliminationOnly: boolean;
  maxTurns: number; // 0 means unlimited
}

export interface Board {
  width: number;
  height: number;
}

export interface GameState extends Board {
  id: string;
  turn: number;
  snakes: Snake[];
  food: Point[];
  hazards: Point[];
  rules: RulesParameters;
  isGameOver: boolean;
  winnerId?: string;
}

export type Verdict =
  | { kind: "ongoing" }
  | { kind: "winner"; snakeId: string }
  | { kind: "draw" };

/** One direction per living snake, keyed by snake id. */
export type MoveSet = Partial<Record<string, Direction>>;

export interface Move {
  snakeId: string;
  direction: Direction;
}

export interface TurnResult {
  state: GameState;
  verdict: Verdict;
}
