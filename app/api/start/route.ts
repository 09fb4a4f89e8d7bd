import { readGameRequest } from "@/lib/api/request";
import { startSession } from "@/lib/api/sessions";
import { getConfig } from "@/lib/config";

export async function POST(req: Request) {
  const parsed = await readGameRequest(req);
  if (!parsed.success) {
    return parsed.response;
  }

  const { game, board } = parsed.data;
  startSession(game.id, getConfig().agent);
  console.info(
    `Game ${game.id} started: ${board.width}x${board.height}, ${board.snakes.length} snakes`
  );
  return Response.json({});
}
