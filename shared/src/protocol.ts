import { z } from "zod";
import {
  ENVIRONMENT_MAX_RADIUS,
  ENVIRONMENT_RADIUS,
  PLAYER_ID_MAX_LENGTH,
  PLAYER_NAME_MAX_LENGTH,
} from "./constants.js";

// --- Base schemas ---

export const PositionSchema = z.tuple([z.number().int(), z.number().int()]);
export type Position = z.infer<typeof PositionSchema>;

export const RotationSchema = z.union([z.literal(0), z.literal(90), z.literal(180), z.literal(270)]);

export const TurnSchema = z.enum(["left", "right"]);

export const PlayerIdSchema = z.string().trim().min(1).max(PLAYER_ID_MAX_LENGTH);

// --- Agent → Server ---

export const RegisterRequestSchema = z.object({
  player_id: PlayerIdSchema,
  // blank names fall back to "Player N" on the server
  name: z.string().trim().max(PLAYER_NAME_MAX_LENGTH).optional(),
});
export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;

/** Body of unregister / move / fire / shield */
export const PlayerActionRequestSchema = z.object({
  player_id: PlayerIdSchema,
});
export type PlayerActionRequest = z.infer<typeof PlayerActionRequestSchema>;

export const RotateRequestSchema = z.object({
  player_id: PlayerIdSchema,
  direction: TurnSchema,
});
export type RotateRequest = z.infer<typeof RotateRequestSchema>;

export const EnvironmentQuerySchema = z.object({
  player_id: PlayerIdSchema,
  radius: z.coerce.number().int().min(0).max(ENVIRONMENT_MAX_RADIUS).default(ENVIRONMENT_RADIUS),
});
export type EnvironmentQuery = z.infer<typeof EnvironmentQuerySchema>;

// --- Server → Agent: views ---

export const PlayerViewSchema = z.object({
  position: PositionSchema,
  rotation: RotationSchema,
  lives: z.number().int().min(0),
  shield_active: z.boolean(),
  shield_available: z.boolean(),
  active: z.boolean(),
  name: z.string(),
});
export type PlayerView = z.infer<typeof PlayerViewSchema>;

export const LaserViewSchema = z.object({
  position: PositionSchema,
  direction: RotationSchema,
  owner_id: z.string(),
});
export type LaserView = z.infer<typeof LaserViewSchema>;

export const GameStateViewSchema = z.object({
  game_id: z.string(),
  tick: z.number().int(),
  players: z.record(z.string(), PlayerViewSchema),
  walls: z.array(PositionSchema),
  mines: z.array(PositionSchema),
  lasers: z.array(LaserViewSchema),
  game_over: z.boolean(),
  winner: z.string().nullable(),
});
export type GameStateView = z.infer<typeof GameStateViewSchema>;

export const PlayerStateViewSchema = z.object({
  players: z.record(z.string(), PlayerViewSchema),
});
export type PlayerStateView = z.infer<typeof PlayerStateViewSchema>;

/** Hazards as [dx, dy] offsets from the requesting player */
export const EnvironmentViewSchema = z.object({
  walls: z.array(PositionSchema),
  mines: z.array(PositionSchema),
  lasers: z.array(PositionSchema),
  game_over: z.boolean(),
});
export type EnvironmentView = z.infer<typeof EnvironmentViewSchema>;

export const PlayerStatsSchema = z.object({
  player_id: z.string(),
  seconds_survived: z.number(),
  laser_hits: z.number().int(),
  lives_lost: z.number().int(),
  is_last_surviving: z.boolean(),
});
export type PlayerStats = z.infer<typeof PlayerStatsSchema>;

export const StatsViewSchema = z.object({
  game_id: z.string(),
  players: z.array(PlayerStatsSchema),
});
export type StatsView = z.infer<typeof StatsViewSchema>;

// --- Errors ---

export const ErrorCodeSchema = z.enum([
  "invalid_request",
  "invalid_json",
  "not_found",
  "capacity_full",
  "duplicate_id",
  "illegal_move",
  "inactive_player",
  "shield_already_used",
  "game_over",
  "rate_limited",
  "unknown_route",
  "internal_error",
]);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ErrorResponseSchema = z.object({
  ok: z.literal(false),
  error: ErrorCodeSchema,
  detail: z.string().optional(),
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// --- Server → Spectator (WebSocket feed) ---

export const SnapshotMessageSchema = z.object({
  v: z.literal(1),
  type: z.literal("snapshot"),
  tick: z.number().int(),
  state: GameStateViewSchema,
});
export type SnapshotMessage = z.infer<typeof SnapshotMessageSchema>;

export const FeedErrorMessageSchema = z.object({
  v: z.literal(1),
  type: z.literal("feed_error"),
  error: z.string(),
});
export type FeedErrorMessage = z.infer<typeof FeedErrorMessageSchema>;

export const FeedMessageSchema = z.discriminatedUnion("type", [
  SnapshotMessageSchema,
  FeedErrorMessageSchema,
]);
export type FeedMessage = z.infer<typeof FeedMessageSchema>;
