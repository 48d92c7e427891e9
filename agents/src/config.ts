/** Environment-driven agent runner configuration */
import { PlayerIdSchema } from "shared";
import { isPolicyName } from "./policies.js";
import type { PolicyName } from "./policies.js";

function envInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined) return fallback;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function envStr(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export interface AgentEntry {
  policy: PolicyName;
  playerId: string;
  name?: string;
}

/** Parse `policy:player_id[:name]` entries separated by commas */
export function parseAgentList(value: string): AgentEntry[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const [policy = "", playerId = "", ...rest] = entry.split(":");
      const policyName = policy.trim();
      if (!isPolicyName(policyName)) {
        throw new Error(`Invalid agent '${entry}': unknown policy '${policyName}'`);
      }
      const idResult = PlayerIdSchema.safeParse(playerId);
      if (!idResult.success) {
        throw new Error(`Invalid agent '${entry}': player id must be 1-32 characters`);
      }
      const name = rest.join(":").trim();
      return { policy: policyName, playerId: idResult.data, name: name || undefined };
    });
}

export const config = {
  /** Base URL of the arena HTTP API */
  arenaUrl: envStr("ARENA_URL", "http://localhost:8000"),

  /** Agents to start, as `policy:player_id[:name]` */
  agents: envStr("AGENTS", "wall:wall-1:Wally,random:random-1:Rando"),

  /** Milliseconds between agent steps */
  stepMs: envInt("STEP_MS", 100),
};
