import { setImmediate as yieldToLoop } from "node:timers/promises";
import { chooseMove, createAgent } from "../agents";
import { AgentConfig, describeAgent } from "../agents/types";
import { advance, createInitialState } from "../game/engine";
import { createRng, deriveSeed } from "../game/random";
import { aliveSnakes } from "../game/state";
import { MoveSet, RulesParameters, Verdict } from "../game/types";
import { INITIAL_RATING, ranksFor, updateRatings } from "./elo";

export interface SimulationOptions {
  /** One snake per config, in this order. */
  agents: AgentConfig[];
  games: number;
  rules?: Partial<RulesParameters>;
  width?: number;
  height?: number;
  seed?: number;
  moveTimeoutMs?: number;
  /** Turn limit for games whose rules set none. */
  maxTurns?: number;
  /** Games in flight at once. */
  concurrency?: number;
}

export interface GameOutcome {
  game: number;
  /** Index into `agents`, or null for a draw. */
  winner: number | null;
  turns: number;
  seed: number;
}

export interface SimulationResult {
  games: number;
  wins: number[];
  draws: number;
  ratings: number[];
  outcomes: GameOutcome[];
  seed: number;
}

const DEFAULTS = {
  width: 11,
  height: 11,
  moveTimeoutMs: 100,
  maxTurns: 1000,
  concurrency: 4,
};

const snakeId = (slot: number) => `agent-${slot}`;

/**
 * Plays one game to its verdict. Rules and each agent draw from their own
 * streams derived from `baseSeed` and the game index, so a game replays
 * identically whatever else runs beside it.
 */
export async function runGame(
  options: SimulationOptions,
  game: number,
  baseSeed: number
): Promise<GameOutcome> {
  const seed = deriveSeed(baseSeed, game);
  const { rng } = createRng(seed);
  const rules: Partial<RulesParameters> = {
    ...options.rules,
    maxTurns: options.rules?.maxTurns || options.maxTurns || DEFAULTS.maxTurns,
  };
  const moveTimeoutMs = options.moveTimeoutMs ?? DEFAULTS.moveTimeoutMs;

  const agents = options.agents.map((config, slot) =>
    createAgent(
      config,
      config.kind === "random" && config.seed !== undefined
        ? deriveSeed(config.seed, game, slot)
        : deriveSeed(seed, slot + 1)
    )
  );

  let state = createInitialState(
    options.agents.map((config, slot) => ({
      id: snakeId(slot),
      name: describeAgent(config),
    })),
    {
      width: options.width ?? DEFAULTS.width,
      height: options.height ?? DEFAULTS.height,
      rules,
      id: `game-${game}`,
    },
    rng
  );

  let verdict: Verdict = { kind: "ongoing" };
  while (verdict.kind === "ongoing") {
    const moves: MoveSet = {};
    for (const snake of aliveSnakes(state)) {
      const slot = state.snakes.indexOf(snake);
      moves[snake.id] = chooseMove(
        agents[slot],
        state,
        snake.id,
        Date.now() + moveTimeoutMs
      );
    }
    ({ state, verdict } = advance(state, moves, rng));
    await yieldToLoop();
  }

  const final = verdict;
  const winner =
    final.kind === "winner"
      ? state.snakes.findIndex((s) => s.id === final.snakeId)
      : null;
  return { game, winner, turns: state.turn, seed };
}

/**
 * Runs `games` independent games, at most `concurrency` at a time, and
 * sums the outcomes. Wins plus draws always equal the game count.
 */
export async function simulate(options: SimulationOptions): Promise<SimulationResult> {
  const { seed } = createRng(options.seed);
  const outcomes: GameOutcome[] = new Array(options.games);
  const concurrency = Math.max(1, options.concurrency ?? DEFAULTS.concurrency);

  let next = 0;
  const worker = async () => {
    while (next < options.games) {
      const game = next++;
      outcomes[game] = await runGame(options, game, seed);
    }
  };
  await Promise.all(
    Array.from({ length: Math.min(concurrency, options.games) }, worker)
  );

  const players = options.agents.length;
  const wins = outcomes.reduce(
    (acc, o) => (o.winner === null ? acc : acc.map((w, i) => (i === o.winner ? w + 1 : w))),
    options.agents.map(() => 0)
  );
  const draws = outcomes.filter((o) => o.winner === null).length;
  const ratings = outcomes.reduce(
    (acc, o) => updateRatings(acc, ranksFor(players, o.winner)),
    options.agents.map(() => INITIAL_RATING)
  );

  return { games: options.games, wins, draws, ratings, outcomes, seed };
}

/** "name: wins/total" per agent, then draws. */
export function formatSummary(result: SimulationResult, agents: AgentConfig[]): string {
  const lines = agents.map(
    (config, i) =>
      `${i}. ${describeAgent(config)}: ${result.wins[i]}/${result.games} (rating ${result.ratings[i]})`
  );
  lines.push(`draws: ${result.draws}/${result.games}`);
  return lines.join("\n");
}
