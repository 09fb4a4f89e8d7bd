/** A function that returns a pseudo-random number in [0, 1). */
export type Rng = () => number;

function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Create a seeded RNG. If no seed is provided one is drawn from
 * `Math.random`, and returned so the run can be replayed.
 */
export function createRng(seed?: number): { rng: Rng; seed: number } {
  const actual = seed ?? Math.floor(Math.random() * 0xffffffff);
  return { rng: mulberry32(actual), seed: actual >>> 0 };
}

export function randomInt(rng: Rng, bound: number): number {
  return Math.floor(rng() * bound);
}

export function pick<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(rng, items.length)];
}

/** Mixes a base seed with indices into an independent 32-bit seed. */
export function deriveSeed(base: number, ...parts: number[]): number {
  let h = base >>> 0;
  for (const part of parts) {
    h = Math.imul(h ^ (part >>> 0), 0x9e3779b1) >>> 0;
    h ^= h >>> 16;
  }
  return h >>> 0;
}
