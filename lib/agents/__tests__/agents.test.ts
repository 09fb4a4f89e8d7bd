import { describe, expect, it } from "vitest";
import { ContractViolationError } from "../../errors";
import { advance } from "../../game/engine";
import { createRng } from "../../game/random";
import { createGameState, createSnake } from "../../game/state";
import { Direction, DIRECTIONS, GameState, Point } from "../../game/types";
import {
  chooseMove,
  createAgent,
  decideMove,
  describeAgent,
  randomAgent,
  starAgent,
} from "../index";
import { score } from "../evaluator";
import { orderMoves, searchMove } from "../search";

const FAR_FUTURE = Number.MAX_SAFE_INTEGER;

const path = (...cells: [number, number][]): Point[] => cells.map(([x, y]) => ({ x, y }));

// A long snake coiled around a 9x6 board: food straight up, a dead end to the left.
function coiled(): GameState {
  const body = path(
    [3, 0], [4, 0], [5, 0], [6, 0], [7, 0], [8, 0],
    [8, 1], [8, 2], [8, 3], [8, 4], [8, 5],
    [7, 5], [6, 5], [5, 5], [4, 5], [3, 5], [2, 5], [1, 5], [0, 5],
    [0, 4], [0, 3], [0, 2], [0, 1], [0, 0],
    [1, 0], [1, 1], [2, 1], [2, 2], [1, 2]
  );
  return createGameState({
    width: 9,
    height: 6,
    snakes: [createSnake("me", body)],
    food: [{ x: 3, y: 1 }],
    rules: { minFood: 0, foodSpawnChance: 0 },
  });
}

describe("AStar agent", () => {
  it("heads for the open food rather than the dead end", () => {
    const result = searchMove(coiled(), "me", starAgent({ depth: 2 }), FAR_FUTURE);
    expect(result.move).toBe("up");
    expect(result.depth).toBe(2);
    expect(result.timedOut).toBe(false);
  });

  it("scores the food-ward state above the dead end", () => {
    const state = coiled();
    const { state: towardFood } = advance(state, { me: "up" }, createRng(1).rng);
    const { state: deadEnd } = advance(state, { me: "left" }, createRng(1).rng);

    expect(score(towardFood, "me")).toBeCloseTo(10 * (24 / 54) - 20 * 0.2);
    expect(score(deadEnd, "me")).toBeCloseTo(-20.0005);
    expect(score(towardFood, "me")).toBeGreaterThan(score(deadEnd, "me"));
  });

  it("still answers when the deadline has already passed", () => {
    const result = searchMove(coiled(), "me", starAgent({ depth: 4 }), 0);
    expect(result.move).toBe("up");
    expect(result.depth).toBe(0);
    expect(result.timedOut).toBe(true);
  });

  it("ranks safe moves toward food first", () => {
    const state = coiled();
    expect(orderMoves(state, state.snakes[0])).toEqual(["up", "left"]);
    expect(orderMoves(state, state.snakes[0], "left")).toEqual(["left", "up"]);
  });

  it("returns within its time budget", () => {
    const state = createGameState({
      width: 11,
      height: 11,
      snakes: [
        createSnake("me", path([1, 1], [1, 1], [1, 1])),
        createSnake("them", path([9, 9], [9, 9], [9, 9])),
      ],
      food: [{ x: 5, y: 5 }],
    });
    const budget = 30;
    const started = Date.now();
    const result = searchMove(state, "me", starAgent({ depth: 12 }), started + budget);

    expect(Date.now() - started).toBeLessThan(budget + 50);
    expect(DIRECTIONS).toContain(result.move);
  });

  it("refuses to search for an eliminated snake", () => {
    const state = coiled();
    const dead: GameState = { ...state, snakes: [{ ...state.snakes[0], status: "eliminated" }] };
    expect(() => searchMove(dead, "me", starAgent(), FAR_FUTURE)).toThrow(ContractViolationError);
  });
});

describe("agents when every move is fatal", () => {
  const enclosed = createGameState({
    width: 3,
    height: 3,
    snakes: [
      createSnake("me", path([0, 0], [1, 0], [2, 0], [2, 1], [1, 1], [0, 1], [0, 2], [1, 2], [2, 2])),
    ],
  });

  it.each([starAgent({ depth: 3 }), randomAgent(1)])("%o still names a direction", (config) => {
    const move = chooseMove(createAgent(config, 1), enclosed, "me", FAR_FUTURE);
    expect(DIRECTIONS).toContain(move);
  });
});

describe("Random agent", () => {
  function play(seed: number): Direction[] {
    const agent = createAgent(randomAgent(seed));
    const rng = createRng(seed).rng;
    let state = createGameState({
      width: 11,
      height: 11,
      snakes: [
        createSnake("me", path([5, 5], [5, 4], [5, 3])),
        createSnake("drifter", path([0, 8], [0, 9], [0, 10])),
      ],
      rules: { minFood: 0, foodSpawnChance: 0 },
    });
    const moves: Direction[] = [];
    for (let i = 0; i < 20; i++) {
      const move = chooseMove(agent, state, "me", FAR_FUTURE);
      moves.push(move);
      const { state: next } = advance(state, { me: move }, rng);
      if (next.isGameOver) break;
      state = next;
    }
    return moves;
  }

  it("replays the same moves for the same seed", () => {
    expect(play(11)).toEqual(play(11));
  });

  it("only picks safe moves while one exists", () => {
    const state = createGameState({
      width: 3,
      height: 1,
      snakes: [createSnake("me", path([1, 0], [0, 0], [0, 0]))],
    });
    for (let seed = 0; seed < 10; seed++) {
      expect(chooseMove(createAgent(randomAgent(seed)), state, "me", FAR_FUTURE)).toBe("right");
    }
  });
});

describe("decideMove", () => {
  it("plays randomly on boards too large to search", () => {
    const state = createGameState({
      width: 21,
      height: 21,
      snakes: [createSnake("me", path([10, 10], [10, 9], [10, 8]))],
    });
    const decision = decideMove(createAgent(starAgent(), 3), state, "me", FAR_FUTURE);
    expect(decision.depth).toBeUndefined();
    expect(DIRECTIONS).toContain(decision.move);
  });

  it("rejects a snake that is not in the game", () => {
    expect(() => decideMove(createAgent(randomAgent()), coiled(), "ghost", FAR_FUTURE)).toThrow(
      ContractViolationError
    );
  });
});

describe("describeAgent", () => {
  it("names each agent kind", () => {
    expect(describeAgent(starAgent({ depth: 3 }))).toBe("AStar(depth=3)");
    expect(describeAgent(randomAgent())).toBe("Random");
    expect(describeAgent(randomAgent(9))).toBe("Random(seed=9)");
  });
});
