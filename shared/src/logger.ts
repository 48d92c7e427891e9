/**
 * Structured logger shared by the arena server and the agents.
 * Lines read `ISO | LEVEL | message | key=value ...`; `gameId`, `playerId`
 * and `tick` tie a line to a match, a ship and an advance step.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  gameId?: string;
  playerId?: string;
  tick?: number;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  /** Logger that stamps `base` onto every line; per-call keys win */
  child(base: LogContext): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value);
}

function formatLog(level: LogLevel, msg: string, ctx?: LogContext): string {
  const parts = [new Date().toISOString(), level.toUpperCase().padEnd(5), msg];

  if (ctx) {
    const entries = Object.entries(ctx).filter(([, v]) => v !== undefined);
    if (entries.length > 0) {
      parts.push(entries.map(([k, v]) => `${k}=${formatValue(v)}`).join(" "));
    }
  }

  return parts.join(" | ");
}

function createLogger(base?: LogContext): Logger {
  const merge = (ctx?: LogContext): LogContext | undefined => (base ? { ...base, ...ctx } : ctx);
  return {
    debug(msg, ctx) {
      if (shouldLog("debug")) console.log(formatLog("debug", msg, merge(ctx)));
    },
    info(msg, ctx) {
      if (shouldLog("info")) console.log(formatLog("info", msg, merge(ctx)));
    },
    warn(msg, ctx) {
      if (shouldLog("warn")) console.warn(formatLog("warn", msg, merge(ctx)));
    },
    error(msg, ctx) {
      if (shouldLog("error")) console.error(formatLog("error", msg, merge(ctx)));
    },
    child(extra) {
      return createLogger({ ...base, ...extra });
    },
  };
}

export const log: Logger = createLogger();
