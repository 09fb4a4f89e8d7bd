import { describe, expect, it } from "vitest";
import { GameRequest, GameRequestSchema, SnakeSnapshot } from "../schemas";
import { stateFromRequest } from "../snapshot";

function snake(id: string, ...cells: [number, number][]): SnakeSnapshot {
  return { id, name: "", health: 80, body: cells.map(([x, y]) => ({ x, y })) };
}

function requestWith(snakes: SnakeSnapshot[], ruleset?: unknown): GameRequest {
  const you = snakes.find((s) => s.id === "me");
  return GameRequestSchema.parse({
    game: { id: "game-7", ruleset },
    turn: 12,
    board: { width: 11, height: 11, food: [{ x: 6, y: 6 }], hazards: [{ x: 0, y: 10 }], snakes },
    you,
  });
}

const me = snake("me", [0, 0], [0, 1], [0, 2]);

describe("stateFromRequest", () => {
  it("copies the board and puts you first", () => {
    const other = { ...snake("other", [9, 9], [9, 8], [9, 7]), name: "Other" };
    const state = stateFromRequest(requestWith([other, me]));

    expect(state.id).toBe("game-7");
    expect(state.turn).toBe(12);
    expect(state.food).toEqual([{ x: 6, y: 6 }]);
    expect(state.hazards).toEqual([{ x: 0, y: 10 }]);
    expect(state.snakes.map((s) => [s.id, s.name, s.health])).toEqual([
      ["me", "me", 80],
      ["other", "Other", 80],
    ]);
  });

  it("keeps the opponents closest to your head on a crowded board", () => {
    const state = stateFromRequest(
      requestWith([
        me,
        snake("a", [9, 9], [9, 8], [9, 7]),
        snake("b", [2, 0], [3, 0], [4, 0]),
        snake("c", [5, 5], [5, 6], [5, 7]),
        snake("d", [1, 3], [1, 4], [1, 5]),
        snake("e", [10, 0], [10, 1], [10, 2]),
      ])
    );
    expect(state.snakes.map((s) => s.id)).toEqual(["me", "b", "d", "c"]);
  });

  it("maps ruleset settings onto rules", () => {
    const state = stateFromRequest(
      requestWith([me], {
        name: "royale",
        settings: {
          foodSpawnChance: 25,
          minimumFood: 2,
          hazardDamagePerTurn: 10,
          royale: { shrinkEveryNTurns: 5 },
        },
      })
    );
    expect(state.rules).toMatchObject({
      foodSpawnChance: 0.25,
      minFood: 2,
      hazardDamage: 10,
      shrinkEveryNTurns: 5,
    });
  });

  it("ignores the royale shrink outside royale games", () => {
    const state = stateFromRequest(
      requestWith([me], { name: "standard", settings: { royale: { shrinkEveryNTurns: 5 } } })
    );
    expect(state.rules.shrinkEveryNTurns).toBe(0);
  });
});
