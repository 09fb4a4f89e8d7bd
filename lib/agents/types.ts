import { Rng } from "../game/random";
import { DEFAULT_WEIGHTS, HeuristicWeights, resolveWeights } from "./evaluator";

export interface StarAgentConfig {
  kind: "astar";
  /** Plies of look-ahead; each ply is one move for every snake. */
  depth: number;
  weights: HeuristicWeights;
  /** Nearest opponents searched adversarially; the rest move greedily. */
  searchedOpponents: number;
}

export interface RandomAgentConfig {
  kind: "random";
  seed?: number;
}

export type AgentConfig = StarAgentConfig | RandomAgentConfig;

export const DEFAULT_STAR_CONFIG: StarAgentConfig = {
  kind: "astar",
  depth: 4,
  weights: DEFAULT_WEIGHTS,
  searchedOpponents: 1,
};

export function starAgent(
  overrides: {
    depth?: number;
    weights?: Partial<HeuristicWeights>;
    searchedOpponents?: number;
  } = {}
): StarAgentConfig {
  return {
    kind: "astar",
    depth: overrides.depth ?? DEFAULT_STAR_CONFIG.depth,
    weights: resolveWeights(overrides.weights),
    searchedOpponents:
      overrides.searchedOpponents ?? DEFAULT_STAR_CONFIG.searchedOpponents,
  };
}

export function randomAgent(seed?: number): RandomAgentConfig {
  return seed === undefined ? { kind: "random" } : { kind: "random", seed };
}

/** An agent config bound to the random stream it draws from for one game. */
export interface Agent {
  readonly config: AgentConfig;
  readonly rng: Rng;
}

export function describeAgent(config: AgentConfig): string {
  switch (config.kind) {
    case "astar":
      return `AStar(depth=${config.depth})`;
    case "random":
      return config.seed === undefined ? "Random" : `Random(seed=${config.seed})`;
  }
}
