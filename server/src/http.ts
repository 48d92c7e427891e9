import http from "node:http";
import {
  EnvironmentQuerySchema,
  PlayerActionRequestSchema,
  RegisterRequestSchema,
  RotateRequestSchema,
  TICK_RATE,
  log,
} from "shared";
import type { ErrorCode, ErrorResponse } from "shared";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { Arena } from "./arena.js";
import { ArenaError, RateLimitError, ValidationError } from "./errors.js";
import { TokenBucketLimiter } from "./rate-limit.js";
import { config } from "./config.js";

const startTime = Date.now();

export interface ApiRequest {
  method: string;
  url: string;
  body: string;
}

export interface ApiResponse {
  status: number;
  body: string;
  contentType: string;
}

export type RequestHandler = (req: ApiRequest) => ApiResponse;

function json(status: number, payload: unknown): ApiResponse {
  return { status, body: JSON.stringify(payload), contentType: "application/json" };
}

function failure(status: number, error: ErrorCode, detail?: string): ApiResponse {
  const payload: ErrorResponse = { ok: false, error, detail };
  return json(status, payload);
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) throw new ValidationError(formatIssues(result.error));
  return result.data;
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk) => (body += chunk));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

/**
 * Pure router over the arena: method, path and raw body in, status and JSON
 * (or CSV) out. The node:http server below is a thin shell around it.
 */
export function createRequestHandler(arena: Arena, limiter?: TokenBucketLimiter): RequestHandler {
  function throttle(playerId: string): void {
    if (!limiter || limiter.take(playerId)) return;
    const retryAfterMs = limiter.retryAfterMs(playerId);
    log.warn("HTTP rate limit hit", { playerId, retryAfterMs });
    throw new RateLimitError(playerId, retryAfterMs);
  }

  function handlePost(path: string, data: unknown): ApiResponse | null {
    switch (path) {
      case "/register": {
        const req = parseWith(RegisterRequestSchema, data);
        throttle(req.player_id);
        return json(200, arena.register(req.player_id, req.name));
      }
      case "/unregister": {
        const req = parseWith(PlayerActionRequestSchema, data);
        throttle(req.player_id);
        return json(200, arena.unregister(req.player_id));
      }
      case "/move": {
        const req = parseWith(PlayerActionRequestSchema, data);
        throttle(req.player_id);
        return json(200, arena.move(req.player_id));
      }
      case "/rotate": {
        const req = parseWith(RotateRequestSchema, data);
        throttle(req.player_id);
        return json(200, arena.rotate(req.player_id, req.direction));
      }
      case "/fire": {
        const req = parseWith(PlayerActionRequestSchema, data);
        throttle(req.player_id);
        return json(200, arena.fire(req.player_id));
      }
      case "/shield": {
        const req = parseWith(PlayerActionRequestSchema, data);
        throttle(req.player_id);
        return json(200, arena.shield(req.player_id));
      }
      case "/restart":
        return json(200, arena.restart());
      default:
        return null;
    }
  }

  function handleGet(path: string, query: URLSearchParams): ApiResponse | null {
    switch (path) {
      case "/healthz": {
        const metrics = arena.tickMetrics;
        return json(200, {
          ok: true,
          uptimeSec: Math.floor((Date.now() - startTime) / 1000),
          gameId: arena.gameId,
          players: arena.activeCount,
          gameOver: arena.gameOver,
          tickRateTarget: TICK_RATE,
          tickRateObserved: Math.round(metrics.observedTickRate * 10) / 10,
          maxTickMs: metrics.maxTickMs,
          totalTicks: metrics.totalTicks,
        });
      }
      case "/state":
        return json(200, arena.getState());
      case "/state/players":
        return json(200, arena.getPlayerState());
      case "/state/environment": {
        const q = parseWith(EnvironmentQuerySchema, Object.fromEntries(query));
        return json(200, arena.getEnvironmentState(q.player_id, q.radius));
      }
      case "/stats":
        if (query.get("format") === "csv") {
          return { status: 200, body: arena.getStatsCsv(), contentType: "text/csv" };
        }
        return json(200, arena.getStats());
      default:
        return null;
    }
  }

  return (req) => {
    const url = new URL(req.url, "http://localhost");
    const path = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, "") : url.pathname;

    try {
      let res: ApiResponse | null = null;
      if (req.method === "GET") {
        res = handleGet(path, url.searchParams);
      } else if (req.method === "POST") {
        let data: unknown;
        try {
          data = req.body.trim() === "" ? {} : JSON.parse(req.body);
        } catch {
          return failure(400, "invalid_json", "Request body is not valid JSON");
        }
        res = handlePost(path, data);
      }
      return res ?? failure(404, "unknown_route", `No route for ${req.method} ${path}`);
    } catch (err) {
      if (err instanceof ArenaError) {
        return json(err.status, err.toJSON());
      }
      log.error("Unhandled HTTP error", { method: req.method, path, error: String(err) });
      return failure(500, "internal_error");
    }
  };
}

export function createHTTPServer(
  port: number,
  arena: Arena,
  limiter: TokenBucketLimiter = new TokenBucketLimiter(config.rateLimitBurst, config.rateLimitPerSec)
): http.Server {
  const handle = createRequestHandler(arena, limiter);

  const server = http.createServer(async (req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    let body = "";
    try {
      body = req.method === "POST" ? await readBody(req) : "";
    } catch (err) {
      log.warn("Failed to read request body", { error: String(err) });
      res.writeHead(400, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: false, error: "invalid_request", detail: "Unreadable body" }));
      return;
    }

    const result = handle({ method: req.method ?? "GET", url: req.url ?? "/", body });
    res.writeHead(result.status, { "Content-Type": result.contentType });
    res.end(result.body);
  });

  // Periodic cleanup of idle rate limit buckets
  const pruneTimer = setInterval(() => limiter.prune(), 60_000);
  server.on("close", () => clearInterval(pruneTimer));

  server.listen(port, config.host);
  return server;
}
