export const INITIAL_RATING = 1200;
const K = 32;

/**
 * Pairwise Elo update for one finished game. `ranks[i]` is the placing of
 * player i (1 is best, equal ranks draw). Returns new ratings, rounded.
 */
export function updateRatings(ratings: readonly number[], ranks: readonly number[]): number[] {
  const changes = ratings.map(() => 0);

  for (let i = 0; i < ratings.length; i++) {
    for (let j = i + 1; j < ratings.length; j++) {
      const ra = ratings[i];
      const rb = ratings[j];

      const expectedA = 1 / (1 + Math.pow(10, (rb - ra) / 400));
      const expectedB = 1 / (1 + Math.pow(10, (ra - rb) / 400));

      // Rank 1 is better than rank 2.
      let scoreA = 0.5;
      if (ranks[i] < ranks[j]) scoreA = 1;
      else if (ranks[i] > ranks[j]) scoreA = 0;
      const scoreB = 1 - scoreA;

      changes[i] += K * (scoreA - expectedA);
      changes[j] += K * (scoreB - expectedB);
    }
  }

  return ratings.map((r, i) => Math.round(r + changes[i]));
}

/** Winner ranks first and everyone else shares second; a draw ranks all first. */
export function ranksFor(players: number, winner: number | null): number[] {
  return Array.from({ length: players }, (_, i) =>
    winner === null || winner === i ? 1 : 2
  );
}
