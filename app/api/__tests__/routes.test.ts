import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DIRECTIONS } from "@/lib/game/types";
import { activeSessions } from "@/lib/api/sessions";
import { POST as end } from "../end/route";
import { POST as move } from "../move/route";
import { GET as info } from "../route";
import { POST as start } from "../start/route";

const me = {
  id: "me",
  name: "Me",
  health: 90,
  body: [
    { x: 5, y: 5 },
    { x: 5, y: 4 },
    { x: 5, y: 3 },
  ],
};
const them = {
  id: "them",
  name: "Them",
  health: 90,
  body: [
    { x: 1, y: 9 },
    { x: 1, y: 8 },
    { x: 1, y: 7 },
  ],
};

function gameRequest(gameId: string, snakes = [me, them]) {
  return {
    game: { id: gameId, timeout: 250 },
    turn: 4,
    board: { width: 11, height: 11, food: [{ x: 8, y: 8 }], snakes },
    you: me,
  };
}

function post(body: unknown): Request {
  return new Request("http://localhost/move", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GET /", () => {
  it("describes the snake", async () => {
    const res = await info();
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ apiversion: "1", color: "#6A4C93", version: "0.1.0" });
  });
});

describe("POST /move", () => {
  it("answers with a direction", async () => {
    const res = await move(post(gameRequest("move-ok")));
    expect(res.status).toBe(200);

    const body: unknown = await res.json();
    expect(body).toEqual({ move: expect.any(String) });
    const direction = typeof body === "object" && body !== null && "move" in body ? body.move : undefined;
    expect(DIRECTIONS).toContain(direction);
  });

  it("rejects a body that fails validation", async () => {
    const res = await move(post({ game: { id: "bad" } }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "Invalid request body" });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await move(post("not json"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body is not JSON" });
  });
});

describe("POST /start and /end", () => {
  it("opens and closes a session per game", async () => {
    const before = activeSessions();

    expect((await start(post(gameRequest("session-1")))).status).toBe(200);
    expect(activeSessions()).toBe(before + 1);

    const res = await end(post(gameRequest("session-1", [me])));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({});
    expect(activeSessions()).toBe(before);
    expect(console.info).toHaveBeenLastCalledWith("Game session-1 ended on turn 4: won");
  });
});
