import { createAgent } from "../agents";
import { Agent, AgentConfig } from "../agents/types";

/** Games whose end call never arrives are dropped oldest first past this many. */
export const MAX_SESSIONS = 256;

// One agent instance (and random stream) per running game, oldest first.
const agents = new Map<string, Agent>();

export function startSession(gameId: string, config: AgentConfig): Agent {
  const agent = createAgent(config);
  agents.delete(gameId);
  agents.set(gameId, agent);

  while (agents.size > MAX_SESSIONS) {
    const oldest = agents.keys().next();
    if (oldest.done) break;
    agents.delete(oldest.value);
  }
  return agent;
}

/** The game's agent, created on first use when the start call was missed. */
export function sessionAgent(gameId: string, config: AgentConfig): Agent {
  return agents.get(gameId) ?? startSession(gameId, config);
}

export function endSession(gameId: string): boolean {
  return agents.delete(gameId);
}

export function activeSessions(): number {
  return agents.size;
}
