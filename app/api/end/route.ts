import { readGameRequest } from "@/lib/api/request";
import { endSession } from "@/lib/api/sessions";

export async function POST(req: Request) {
  const parsed = await readGameRequest(req);
  if (!parsed.success) {
    return parsed.response;
  }

  const { game, board, you, turn } = parsed.data;
  endSession(game.id);

  const survivors = board.snakes;
  let outcome = "draw";
  if (survivors.length === 1) {
    outcome = survivors[0].id === you.id ? "won" : "lost";
  } else if (!survivors.some((s) => s.id === you.id)) {
    outcome = "lost";
  }
  console.info(`Game ${game.id} ended on turn ${turn}: ${outcome}`);
  return Response.json({});
}
