/** Environment-driven server configuration with sensible defaults */
import { HTTP_PORT, TICK_MS, WS_PORT } from "shared";
import { DEFAULT_MAP } from "./maps.js";

function envInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined) return fallback;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function envStr(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export const config = {
  /** Host to bind to (0.0.0.0 for production, localhost for dev) */
  host: envStr("HOST", "0.0.0.0"),

  /** HTTP action API port */
  httpPort: envInt("HTTP_PORT", HTTP_PORT),

  /** WebSocket spectator feed port */
  wsPort: envInt("WS_PORT", WS_PORT),

  /** Node environment */
  nodeEnv: envStr("NODE_ENV", "development"),

  /** Milliseconds between advance steps */
  tickMs: envInt("TICK_MS", TICK_MS),

  /** Map file name under server/maps (without .json) */
  arenaMap: envStr("ARENA_MAP", DEFAULT_MAP),

  /** Token bucket size per player_id */
  rateLimitBurst: envInt("RATE_LIMIT_BURST", 10),

  /** Tokens refilled per player_id per second */
  rateLimitPerSec: envInt("RATE_LIMIT_PER_SEC", 5),

  /** Overrides the environment's default log level when set */
  logLevel: envStr("LOG_LEVEL", ""),

  get isDev(): boolean {
    return this.nodeEnv === "development";
  },
};
