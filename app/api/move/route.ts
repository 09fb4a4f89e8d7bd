import { decideMove } from "@/lib/agents";
import { readGameRequest } from "@/lib/api/request";
import { MoveResponseSchema } from "@/lib/api/schemas";
import { sessionAgent } from "@/lib/api/sessions";
import { stateFromRequest } from "@/lib/api/snapshot";
import { getConfig } from "@/lib/config";
import { isMoveSafe } from "@/lib/game/state";

export async function POST(req: Request) {
  const parsed = await readGameRequest(req);
  if (!parsed.success) {
    return parsed.response;
  }

  try {
    const request = parsed.data;
    const config = getConfig();

    const state = stateFromRequest(request);
    const agent = sessionAgent(request.game.id, config.agent);
    const budget = Math.max(0, request.game.timeout - config.latencyMs);
    const decision = decideMove(agent, state, request.you.id, Date.now() + budget);

    if (config.logLevel === "debug") {
      console.debug(
        `Game ${request.game.id} turn ${request.turn}: ${decision.move}`,
        {
          depth: decision.depth,
          score: decision.score,
          expansions: decision.expansions,
          safe: isMoveSafe(state, request.you.id, decision.move),
        }
      );
    }

    return Response.json(MoveResponseSchema.parse({ move: decision.move }));
  } catch (error) {
    console.error("Move error:", error);
    return Response.json({ error: "Failed to choose move" }, { status: 500 });
  }
}
