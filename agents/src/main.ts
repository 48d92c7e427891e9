import { log } from "shared";
import { ArenaClient } from "./client.js";
import { config, parseAgentList } from "./config.js";
import { POLICIES } from "./policies.js";
import { runAgent } from "./run.js";

const entries = parseAgentList(config.agents);
const client = new ArenaClient(config.arenaUrl);
const controller = new AbortController();

function shutdown(signal: string) {
  if (controller.signal.aborted) return;
  log.info(`Received ${signal}, stopping agents...`);
  controller.abort();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

log.info("Starting agents", { arenaUrl: config.arenaUrl, count: entries.length });

const results = await Promise.allSettled(
  entries.map((entry) =>
    runAgent(client, POLICIES[entry.policy](), {
      playerId: entry.playerId,
      name: entry.name,
      stepMs: config.stepMs,
      signal: controller.signal,
    })
  )
);

results.forEach((result, i) => {
  const playerId = entries[i].playerId;
  if (result.status === "fulfilled") {
    log.info("Agent finished", { playerId, outcome: result.value });
  } else {
    log.error("Agent failed", { playerId, error: String(result.reason) });
    process.exitCode = 1;
  }
});
