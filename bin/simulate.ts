import { parseArgs } from "node:util";
import { DEFAULT_STAR_CONFIG, randomAgent } from "@/lib/agents";
import { parseAgentConfig } from "@/lib/config";
import { formatSummary, simulate } from "@/lib/simulator/simulate";

const USAGE = `Play games between agents and report their wins.

Usage: simulate [options]

Options:
  --agent <json>       agent descriptor, repeat once per snake
                       (default: '{"AStar":{}}' against '{"Random":{}}')
  --games <n>          number of games (default 10)
  --width <n>          board width (default 11)
  --height <n>         board height (default 11)
  --seed <n>           base seed for replayable runs
  --timeout <ms>       time per move (default 100)
  --max-turns <n>      turn limit per game (default 1000)
  --concurrency <n>    games in flight at once (default 4)
  -h, --help           show this help`;

function integer(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new Error(`--${name} must be an integer, got ${value}`);
  }
  return n;
}

async function main() {
  const { values } = parseArgs({
    options: {
      agent: { type: "string", multiple: true },
      games: { type: "string", default: "10" },
      width: { type: "string" },
      height: { type: "string" },
      seed: { type: "string" },
      timeout: { type: "string" },
      "max-turns": { type: "string" },
      concurrency: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.info(USAGE);
    return;
  }

  const agents = values.agent?.map(parseAgentConfig) ?? [DEFAULT_STAR_CONFIG, randomAgent()];
  const games = integer(values.games, "games") ?? 10;

  const started = Date.now();
  const result = await simulate({
    agents,
    games,
    width: integer(values.width, "width"),
    height: integer(values.height, "height"),
    seed: integer(values.seed, "seed"),
    moveTimeoutMs: integer(values.timeout, "timeout"),
    maxTurns: integer(values["max-turns"], "max-turns"),
    concurrency: integer(values.concurrency, "concurrency"),
  });

  console.info(formatSummary(result, agents));
  console.info(`seed ${result.seed}, ${Date.now() - started} ms`);
}

main().catch((error: unknown) => {
  console.error("Simulation failed:", error);
  process.exitCode = 1;
});
