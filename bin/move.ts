import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { createAgent, decideMove, describeAgent, DEFAULT_STAR_CONFIG } from "@/lib/agents";
import { GameRequestSchema } from "@/lib/api/schemas";
import { stateFromRequest } from "@/lib/api/snapshot";
import { parseAgentConfig } from "@/lib/config";
import { renderBoard } from "@/lib/game/notation";

const USAGE = `Simulate a move for an agent.

Usage: move [options] <request-json>

Options:
  --file <path>      read the game request from a file instead
  --config <json>    agent descriptor, e.g. '{"AStar":{"depth":3}}'
  --latency <ms>     time subtracted from the game timeout (default 200)
  --print            print the board before moving
  -h, --help         show this help`;

function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      file: { type: "string" },
      config: { type: "string" },
      latency: { type: "string", default: "200" },
      print: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const text = values.file ? readFileSync(values.file, "utf8") : positionals[0];
  if (values.help || !text) {
    console.info(USAGE);
    process.exitCode = values.help ? 0 : 1;
    return;
  }

  const parsed = GameRequestSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    console.error("Invalid game request:", parsed.error.issues);
    process.exitCode = 1;
    return;
  }

  const config = values.config ? parseAgentConfig(values.config) : DEFAULT_STAR_CONFIG;
  const latency = Number(values.latency);
  const request = parsed.data;
  const state = stateFromRequest(request);

  console.info(describeAgent(config));
  if (values.print) {
    console.info(renderBoard(state));
  }

  const started = Date.now();
  const budget = Math.max(0, request.game.timeout - latency);
  const decision = decideMove(createAgent(config), state, request.you.id, started + budget);
  console.info(
    `Step: ${decision.move} (${Date.now() - started} ms` +
      (decision.depth === undefined ? ")" : `, depth ${decision.depth}, ${decision.expansions} expansions)`)
  );
}

try {
  main();
} catch (error) {
  console.error("Move failed:", error);
  process.exitCode = 1;
}
