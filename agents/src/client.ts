/**
 * ArenaClient - typed HTTP client for the arena action API.
 *
 * Usage:
 *   const client = new ArenaClient("http://localhost:8000");
 *   await client.register("alpha", "Alpha");
 *   await client.rotate("alpha", "right");
 *   const env = await client.getEnvironment("alpha", 5);
 *
 * Every response is checked against the shared zod schemas; error bodies
 * surface as ArenaRequestError carrying the server's error code.
 */

import {
  EnvironmentViewSchema,
  ErrorResponseSchema,
  GameStateViewSchema,
  PlayerStateViewSchema,
  StatsViewSchema,
  log,
} from "shared";
import type {
  EnvironmentView,
  ErrorCode,
  GameStateView,
  PlayerStateView,
  StatsView,
  Turn,
} from "shared";
import type { ZodType, ZodTypeDef } from "zod";

export type ClientErrorCode = ErrorCode | "network_error" | "bad_response";

export class ArenaRequestError extends Error {
  constructor(
    readonly code: ClientErrorCode,
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = "ArenaRequestError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Failures worth another registration attempt */
const RETRYABLE: ReadonlySet<ClientErrorCode> = new Set(["network_error", "rate_limited", "internal_error"]);

export interface ArenaClientOptions {
  fetchImpl?: typeof fetch;
  registerAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ArenaClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly registerAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(baseUrl: string, options: ArenaClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.registerAttempts = options.registerAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Register, retrying transient failures with a fixed delay */
  async register(playerId: string, name?: string): Promise<GameStateView> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.post("/register", { player_id: playerId, name });
      } catch (err) {
        const retryable = err instanceof ArenaRequestError && RETRYABLE.has(err.code);
        if (!retryable || attempt >= this.registerAttempts) throw err;
        log.warn("Registration failed, retrying", {
          playerId,
          attempt,
          error: err.code,
          delayMs: this.retryDelayMs,
        });
        await this.sleep(this.retryDelayMs);
      }
    }
  }

  unregister(playerId: string): Promise<GameStateView> {
    return this.post("/unregister", { player_id: playerId });
  }

  move(playerId: string): Promise<GameStateView> {
    return this.post("/move", { player_id: playerId });
  }

  rotate(playerId: string, direction: Turn): Promise<GameStateView> {
    return this.post("/rotate", { player_id: playerId, direction });
  }

  fire(playerId: string): Promise<GameStateView> {
    return this.post("/fire", { player_id: playerId });
  }

  shield(playerId: string): Promise<GameStateView> {
    return this.post("/shield", { player_id: playerId });
  }

  getState(): Promise<GameStateView> {
    return this.request("GET", "/state", GameStateViewSchema);
  }

  getPlayers(): Promise<PlayerStateView> {
    return this.request("GET", "/state/players", PlayerStateViewSchema);
  }

  getEnvironment(playerId: string, radius?: number): Promise<EnvironmentView> {
    const params = new URLSearchParams({ player_id: playerId });
    if (radius !== undefined) params.set("radius", String(radius));
    return this.request("GET", `/state/environment?${params.toString()}`, EnvironmentViewSchema);
  }

  getStats(): Promise<StatsView> {
    return this.request("GET", "/stats", StatsViewSchema);
  }

  private post(path: string, body: Record<string, unknown>): Promise<GameStateView> {
    return this.request("POST", path, GameStateViewSchema, body);
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: Record<string, unknown>
  ): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: body ? { "Content-Type": "application/json" } : undefined,
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (err) {
      throw new ArenaRequestError("network_error", `${method} ${path} failed: ${String(err)}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ArenaRequestError("bad_response", `${method} ${path}: response is not JSON`, response.status);
    }

    if (!response.ok) {
      const parsed = ErrorResponseSchema.safeParse(payload);
      if (parsed.success) {
        throw new ArenaRequestError(parsed.data.error, parsed.data.detail ?? parsed.data.error, response.status);
      }
      throw new ArenaRequestError("bad_response", `${method} ${path}: HTTP ${response.status}`, response.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ArenaRequestError("bad_response", `${method} ${path}: ${parsed.error.message}`, response.status);
    }
    return parsed.data;
  }
}
