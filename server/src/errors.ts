import type { ErrorCode } from "shared";

export type ErrorMetadata = Record<string, string | number | boolean | undefined>;

/** Base class for every rule violation surfaced to a caller */
export class ArenaError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly metadata?: ErrorMetadata;

  constructor(message: string, code: ErrorCode, status: number, metadata?: ErrorMetadata) {
    super(message);
    this.name = "ArenaError";
    this.code = code;
    this.status = status;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return { ok: false as const, error: this.code, detail: this.message };
  }
}

export class ValidationError extends ArenaError {
  constructor(detail: string, metadata?: ErrorMetadata) {
    super(detail, "invalid_request", 400, metadata);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ArenaError {
  constructor(playerId: string) {
    super(`Unknown player '${playerId}'`, "not_found", 404, { playerId });
    this.name = "NotFoundError";
  }
}

export class CapacityError extends ArenaError {
  constructor(detail: string, metadata?: ErrorMetadata) {
    super(detail, "capacity_full", 409, metadata);
    this.name = "CapacityError";
  }
}

export class DuplicateIdError extends ArenaError {
  constructor(playerId: string) {
    super(`Player '${playerId}' is already registered`, "duplicate_id", 409, { playerId });
    this.name = "DuplicateIdError";
  }
}

export class IllegalMoveError extends ArenaError {
  constructor(playerId: string, reason: "wall" | "bounds", x: number, y: number) {
    super(
      reason === "wall" ? `Cell (${x}, ${y}) is a wall` : `Cell (${x}, ${y}) is outside the arena`,
      "illegal_move",
      409,
      { playerId, reason, x, y }
    );
    this.name = "IllegalMoveError";
  }
}

export class InactivePlayerError extends ArenaError {
  constructor(playerId: string) {
    super(`Player '${playerId}' has been eliminated`, "inactive_player", 409, { playerId });
    this.name = "InactivePlayerError";
  }
}

export class ShieldAlreadyUsedError extends ArenaError {
  constructor(playerId: string) {
    super(`Player '${playerId}' has already used their shield`, "shield_already_used", 409, { playerId });
    this.name = "ShieldAlreadyUsedError";
  }
}

export class GameOverError extends ArenaError {
  constructor() {
    super("Game is over. Register to start a new game.", "game_over", 409);
    this.name = "GameOverError";
  }
}

export class RateLimitError extends ArenaError {
  constructor(key: string, retryAfterMs: number) {
    super(`Too many requests for '${key}'`, "rate_limited", 429, { key, retryAfterMs });
    this.name = "RateLimitError";
  }
}
