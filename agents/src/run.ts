import { log } from "shared";
import { ArenaRequestError } from "./client.js";
import type { ArenaClient } from "./client.js";
import type { Agent, AgentAction } from "./policies.js";

/** The calls the loop makes; ArenaClient satisfies it */
export type ArenaApi = Pick<
  ArenaClient,
  "register" | "unregister" | "getPlayers" | "getEnvironment" | "move" | "rotate" | "fire" | "shield"
>;

export type RunOutcome = "game_over" | "eliminated" | "removed" | "aborted" | "max_steps";

export interface RunOptions {
  playerId: string;
  name?: string;
  /** Pause between steps; the server advances every 100 ms */
  stepMs?: number;
  radius?: number;
  maxSteps?: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Rejections that leave the agent free to try something else next step */
const RECOVERABLE = new Set(["illegal_move", "shield_already_used", "rate_limited"]);

function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

async function perform(api: ArenaApi, playerId: string, action: AgentAction): Promise<void> {
  switch (action.type) {
    case "move":
      await api.move(playerId);
      return;
    case "rotate":
      await api.rotate(playerId, action.direction);
      return;
    case "fire":
      await api.fire(playerId);
      return;
    case "shield":
      await api.shield(playerId);
      return;
    case "idle":
      return;
  }
}

/**
 * Register, then observe-decide-act until the game ends, the ship is out,
 * or the signal aborts. The player is unregistered on every exit path.
 */
export async function runAgent(api: ArenaApi, agent: Agent, options: RunOptions): Promise<RunOutcome> {
  const { playerId, signal } = options;
  const stepMs = options.stepMs ?? 100;
  const sleep = options.sleep ?? sleepUnlessAborted;

  const agentLog = log.child({ playerId, policy: agent.name });

  await api.register(playerId, options.name);
  agentLog.info("Agent registered");

  try {
    for (let step = 0; options.maxSteps === undefined || step < options.maxSteps; step++) {
      if (signal?.aborted) return "aborted";

      const { players } = await api.getPlayers();
      const self = players[playerId];
      if (!self) return "removed";
      if (!self.active) return "eliminated";

      const environment = await api.getEnvironment(playerId, options.radius);
      if (environment.game_over) return "game_over";

      const action = agent.decide({ self, environment, step });
      try {
        await perform(api, playerId, action);
      } catch (err) {
        if (!(err instanceof ArenaRequestError)) throw err;
        if (err.code === "game_over") return "game_over";
        if (err.code === "inactive_player") return "eliminated";
        if (!RECOVERABLE.has(err.code)) throw err;
        agentLog.debug("Action rejected", { action: action.type, error: err.code });
      }

      await sleep(stepMs, signal);
    }
    return "max_steps";
  } finally {
    try {
      await api.unregister(playerId);
      agentLog.info("Agent unregistered");
    } catch (err) {
      agentLog.warn("Unregister failed", { error: err });
    }
  }
}
