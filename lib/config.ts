import { z } from "zod";
import { AgentConfig, DEFAULT_STAR_CONFIG } from "./agents/types";
import { AgentDescriptorSchema } from "./api/schemas";

const EnvSchema = z.object({
  // Subtracted from the game timeout to leave room for the round trip.
  LATENCY_MS: z.coerce.number().int().min(0).default(200),
  AGENT_CONFIG: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "error"]).default("info"),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface AppConfig {
  latencyMs: number;
  agent: AgentConfig;
  logLevel: LogLevel;
}

/** Parses a JSON agent descriptor such as `{"AStar":{"depth":3}}`. */
export function parseAgentConfig(text: string): AgentConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Agent config is not valid JSON: ${text}`, { cause: error });
  }
  const result = AgentDescriptorSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid agent config: ${result.error.message}`);
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid environment: ${result.error.message}`);
  }
  const { LATENCY_MS, AGENT_CONFIG, LOG_LEVEL } = result.data;
  return {
    latencyMs: LATENCY_MS,
    agent: AGENT_CONFIG ? parseAgentConfig(AGENT_CONFIG) : DEFAULT_STAR_CONFIG,
    logLevel: LOG_LEVEL,
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  cached ??= loadConfig();
  return cached;
}
