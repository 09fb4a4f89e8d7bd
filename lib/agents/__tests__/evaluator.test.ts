import { describe, expect, it } from "vitest";
import { parseBoard } from "../../game/notation";
import { createGameState, createSnake } from "../../game/state";
import { GameState, Point } from "../../game/types";
import {
  DEFAULT_WEIGHTS,
  foodScore,
  healthScore,
  lengthScore,
  LOSS_SCORE,
  resolveWeights,
  score,
  spaceScore,
  trapScore,
  WIN_SCORE,
} from "../evaluator";

function diagram(text: string): GameState {
  const state = parseBoard(text);
  if (!state) throw new Error("bad board");
  return state;
}

const line = (y: number, xs: number[]): Point[] => xs.map((x) => ({ x, y }));

describe("spaceScore", () => {
  it("is the reachable share of the board", () => {
    const state = diagram(`
      . . .
      . . .
      0 < .`);
    expect(spaceScore(state, state.snakes[0])).toBeCloseTo(7 / 9);
    expect(trapScore(state, state.snakes[0])).toBe(0);
  });
});

describe("trapScore", () => {
  it("grows with the shortfall of room against length", () => {
    const state = diagram(`
      . . . . .
      . . . . .
      . . . . .
      . . . . .
      0 < < < <`);
    const snake = { ...state.snakes[0], body: [...state.snakes[0].body, ...line(1, [4, 3, 2, 1, 0]), { x: 0, y: 2 }] };
    const boxed: GameState = { ...state, snakes: [snake] };
    // Head in the corner under its own second row.
    expect(trapScore(boxed, snake)).toBe(-1);
  });
});

describe("foodScore", () => {
  const state = diagram(`
    . . . . .
    0 < < . o`);

  it("is the inverse path distance at full health", () => {
    expect(foodScore(state, state.snakes[0])).toBeCloseTo(1 / 7);
  });

  it("doubles towards starvation", () => {
    const hungry = { ...state.snakes[0], health: 50 };
    expect(foodScore(state, hungry)).toBeCloseTo(1.5 / 7);
  });

  it("is zero without reachable food", () => {
    expect(foodScore({ ...state, food: [] }, state.snakes[0])).toBe(0);
  });
});

describe("healthScore", () => {
  it("penalises missing health quadratically", () => {
    const state = diagram(`0 < .`);
    expect(healthScore(state, { ...state.snakes[0], health: 50 })).toBeCloseTo(-0.25);
    expect(healthScore(state, state.snakes[0])).toBeCloseTo(0);
  });
});

describe("lengthScore", () => {
  const long = createSnake("long", line(0, [4, 3, 2, 1, 0]));

  it("counts nearby opponents fully", () => {
    const short = createSnake("short", line(2, [4, 5, 6]));
    const state = createGameState({ width: 11, height: 11, snakes: [long, short] });
    expect(lengthScore(state, long)).toBeCloseTo(2 / 3);
    expect(lengthScore(state, short)).toBeCloseTo(-2 / 3);
  });

  it("halves distant opponents", () => {
    const short = createSnake("short", line(10, [10, 9, 8]));
    const state = createGameState({ width: 11, height: 11, snakes: [long, short] });
    expect(lengthScore(state, long)).toBeCloseTo(1 / 3);
  });
});

describe("score", () => {
  const a = createSnake("a", line(0, [2, 1, 0]));
  const b = createSnake("b", line(4, [2, 1, 0]));

  it("is the loss score for an eliminated or missing snake", () => {
    const state = createGameState({
      width: 5,
      height: 5,
      snakes: [a, { ...b, status: "eliminated" }],
    });
    expect(score(state, "b")).toBe(LOSS_SCORE);
    expect(score(state, "nobody")).toBe(LOSS_SCORE);
  });

  it("is the win score for the last snake standing", () => {
    const state = createGameState({
      width: 5,
      height: 5,
      snakes: [a, { ...b, status: "eliminated" }],
    });
    expect(score(state, "a")).toBe(WIN_SCORE);
  });

  it("weighs each term", () => {
    const state = diagram(`
      . . .
      . . .
      0 < .`);
    const spaceOnly = { space: 1, trap: 0, food: 0, health: 0, length: 0, aggressionRadius: 0 };
    expect(score(state, "0", spaceOnly)).toBeCloseTo(7 / 9);
  });

  it("fills missing weights from the defaults", () => {
    expect(resolveWeights({ food: 7 })).toEqual({ ...DEFAULT_WEIGHTS, food: 7 });
  });
});
