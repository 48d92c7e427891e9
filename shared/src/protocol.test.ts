import { describe, it, expect } from "vitest";
import {
  PositionSchema,
  RotationSchema,
  RegisterRequestSchema,
  RotateRequestSchema,
  PlayerActionRequestSchema,
  EnvironmentQuerySchema,
  GameStateViewSchema,
  EnvironmentViewSchema,
  ErrorResponseSchema,
  SnapshotMessageSchema,
  FeedMessageSchema,
} from "./protocol.js";

const sampleState = {
  game_id: "g-1",
  tick: 3,
  players: {
    alpha: {
      position: [4, 5],
      rotation: 90,
      lives: 5,
      shield_active: false,
      shield_available: true,
      active: true,
      name: "Alpha",
    },
  },
  walls: [[0, 1]],
  mines: [[2, 2]],
  lasers: [{ position: [5, 5], direction: 90, owner_id: "alpha" }],
  game_over: false,
  winner: null,
};

describe("PositionSchema", () => {
  it("accepts integer pairs", () => {
    expect(PositionSchema.parse([3, -2])).toEqual([3, -2]);
  });

  it("rejects fractional or short tuples", () => {
    expect(() => PositionSchema.parse([1.5, 0])).toThrow();
    expect(() => PositionSchema.parse([1])).toThrow();
  });
});

describe("RotationSchema", () => {
  it("accepts cardinal headings only", () => {
    expect(RotationSchema.parse(270)).toBe(270);
    expect(() => RotationSchema.parse(45)).toThrow();
    expect(() => RotationSchema.parse(360)).toThrow();
  });
});

describe("RegisterRequestSchema", () => {
  it("accepts id with optional name", () => {
    expect(RegisterRequestSchema.parse({ player_id: "p1" })).toEqual({ player_id: "p1" });
    expect(RegisterRequestSchema.parse({ player_id: "p1", name: "Ace" })).toEqual({
      player_id: "p1",
      name: "Ace",
    });
  });

  it("trims ids and rejects blank ones", () => {
    expect(RegisterRequestSchema.parse({ player_id: "  p1 " }).player_id).toBe("p1");
    expect(() => RegisterRequestSchema.parse({ player_id: "   " })).toThrow();
  });

  it("rejects overlong names", () => {
    expect(() => RegisterRequestSchema.parse({ player_id: "p1", name: "x".repeat(21) })).toThrow();
  });

  it("lets blank names through for the server default", () => {
    expect(RegisterRequestSchema.parse({ player_id: "p1", name: "  " })).toEqual({ player_id: "p1", name: "" });
  });
});

describe("RotateRequestSchema", () => {
  it("accepts left and right", () => {
    expect(RotateRequestSchema.parse({ player_id: "p1", direction: "left" }).direction).toBe("left");
  });

  it("rejects other directions", () => {
    expect(() => RotateRequestSchema.parse({ player_id: "p1", direction: "up" })).toThrow();
  });
});

describe("PlayerActionRequestSchema", () => {
  it("requires player_id", () => {
    expect(() => PlayerActionRequestSchema.parse({})).toThrow();
  });
});

describe("EnvironmentQuerySchema", () => {
  it("defaults radius to 5", () => {
    expect(EnvironmentQuerySchema.parse({ player_id: "p1" })).toEqual({ player_id: "p1", radius: 5 });
  });

  it("coerces query-string radius", () => {
    expect(EnvironmentQuerySchema.parse({ player_id: "p1", radius: "3" }).radius).toBe(3);
  });

  it("rejects negative or huge radius", () => {
    expect(() => EnvironmentQuerySchema.parse({ player_id: "p1", radius: "-1" })).toThrow();
    expect(() => EnvironmentQuerySchema.parse({ player_id: "p1", radius: "31" })).toThrow();
  });
});

describe("GameStateViewSchema", () => {
  it("accepts a full state view", () => {
    expect(GameStateViewSchema.parse(sampleState)).toEqual(sampleState);
  });

  it("rejects negative lives", () => {
    const bad = {
      ...sampleState,
      players: { alpha: { ...sampleState.players.alpha, lives: -1 } },
    };
    expect(() => GameStateViewSchema.parse(bad)).toThrow();
  });
});

describe("EnvironmentViewSchema", () => {
  it("accepts relative offsets", () => {
    const env = { walls: [[-1, 0]], mines: [], lasers: [[0, 2]], game_over: false };
    expect(EnvironmentViewSchema.parse(env)).toEqual(env);
  });
});

describe("ErrorResponseSchema", () => {
  it("accepts known error codes", () => {
    const body = { ok: false, error: "illegal_move", detail: "blocked by wall" };
    expect(ErrorResponseSchema.parse(body)).toEqual(body);
  });

  it("rejects unknown codes", () => {
    expect(() => ErrorResponseSchema.parse({ ok: false, error: "oops" })).toThrow();
  });
});

describe("SnapshotMessageSchema", () => {
  it("accepts a snapshot carrying the state view", () => {
    const msg = { v: 1, type: "snapshot", tick: 3, state: sampleState };
    expect(SnapshotMessageSchema.parse(msg)).toEqual(msg);
  });

  it("rejects wrong version", () => {
    expect(() => SnapshotMessageSchema.parse({ v: 2, type: "snapshot", tick: 3, state: sampleState })).toThrow();
  });
});

describe("FeedMessageSchema", () => {
  it("discriminates on type", () => {
    const parsed = FeedMessageSchema.parse({ v: 1, type: "feed_error", error: "read_only" });
    expect(parsed.type).toBe("feed_error");
  });
});
