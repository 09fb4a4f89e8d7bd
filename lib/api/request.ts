import { GameRequest, GameRequestSchema } from "./schemas";

export type ParsedRequest =
  | { success: true; data: GameRequest }
  | { success: false; response: Response };

/** Reads and validates a game request body, answering 400 when it is malformed. */
export async function readGameRequest(req: Request): Promise<ParsedRequest> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return {
      success: false,
      response: Response.json({ error: "Request body is not JSON" }, { status: 400 }),
    };
  }

  const parseResult = GameRequestSchema.safeParse(body);
  if (!parseResult.success) {
    return {
      success: false,
      response: Response.json(
        { error: "Invalid request body", details: parseResult.error.issues },
        { status: 400 }
      ),
    };
  }
  return { success: true, data: parseResult.data };
}
