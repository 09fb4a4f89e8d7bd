import { describe, expect, it } from "vitest";
import { createRng, deriveSeed, pick, randomInt } from "../random";

describe("createRng", () => {
  it("replays the same stream for the same seed", () => {
    const a = createRng(7);
    const b = createRng(7);
    const draws = (rng: () => number) => Array.from({ length: 5 }, () => rng());

    expect(a.seed).toBe(7);
    expect(draws(a.rng)).toEqual(draws(b.rng));
  });

  it("reports the seed it drew when none is given", () => {
    const { rng, seed } = createRng();
    expect(rng()).toBe(createRng(seed).rng());
  });

  it("stays within [0, 1)", () => {
    const { rng } = createRng(123);
    for (let i = 0; i < 1000; i++) {
      const n = rng();
      expect(n >= 0 && n < 1).toBe(true);
    }
  });
});

describe("helpers", () => {
  it("draws integers below the bound", () => {
    const { rng } = createRng(3);
    for (let i = 0; i < 100; i++) {
      expect(randomInt(rng, 4)).toBeLessThan(4);
    }
  });

  it("picks nothing from an empty list", () => {
    expect(pick(createRng(1).rng, [])).toBeUndefined();
    expect(pick(createRng(1).rng, ["only"])).toBe("only");
  });

  it("derives distinct seeds per index", () => {
    expect(deriveSeed(42, 0)).toBe(deriveSeed(42, 0));
    expect(deriveSeed(42, 0)).not.toBe(deriveSeed(42, 1));
    expect(deriveSeed(42, 1, 0)).not.toBe(deriveSeed(42, 1, 1));
  });
});
