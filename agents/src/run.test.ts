import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { EnvironmentView, GameStateView, PlayerStateView, PlayerView } from "shared";
import { ArenaRequestError } from "./client.js";
import { WallFollowingAgent } from "./policies.js";
import type { Agent, AgentAction } from "./policies.js";
import { runAgent } from "./run.js";
import type { ArenaApi } from "./run.js";

const state: GameStateView = {
  game_id: "game-1",
  tick: 0,
  players: {},
  walls: [],
  mines: [],
  lasers: [],
  game_over: false,
  winner: null,
};

const self: PlayerView = {
  position: [10, 10],
  rotation: 0,
  lives: 5,
  shield_active: false,
  shield_available: true,
  active: true,
  name: "Alpha",
};

const openEnv: EnvironmentView = { walls: [], mines: [], lasers: [], game_over: false };

function fakeApi() {
  return {
    register: vi.fn(async (_playerId: string, _name?: string) => state),
    unregister: vi.fn(async (_playerId: string) => state),
    getPlayers: vi.fn(async (): Promise<PlayerStateView> => ({ players: { a: self } })),
    getEnvironment: vi.fn(async (_playerId: string, _radius?: number): Promise<EnvironmentView> => openEnv),
    move: vi.fn(async (_playerId: string) => state),
    rotate: vi.fn(async (_playerId: string, _direction: "left" | "right") => state),
    fire: vi.fn(async (_playerId: string) => state),
    shield: vi.fn(async (_playerId: string) => state),
  } satisfies ArenaApi;
}

function scripted(...actions: AgentAction[]): Agent {
  let i = 0;
  return {
    name: "scripted",
    decide: () => actions[Math.min(i++, actions.length - 1)],
  };
}

const noSleep = async () => {};

describe("runAgent", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers, acts each step and unregisters", async () => {
    const api = fakeApi();
    const sleep = vi.fn(noSleep);
    const outcome = await runAgent(api, scripted({ type: "rotate", direction: "left" }, { type: "fire" }, { type: "move" }), {
      playerId: "a",
      name: "Alpha",
      maxSteps: 3,
      sleep,
    });

    expect(outcome).toBe("max_steps");
    expect(api.register).toHaveBeenCalledWith("a", "Alpha");
    expect(api.rotate).toHaveBeenCalledWith("a", "left");
    expect(api.fire).toHaveBeenCalledTimes(1);
    expect(api.move).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(api.unregister).toHaveBeenCalledWith("a");
  });

  it("passes the step counter to the agent", async () => {
    const api = fakeApi();
    const steps: number[] = [];
    const agent: Agent = {
      name: "recorder",
      decide: ({ step }) => {
        steps.push(step);
        return { type: "idle" };
      },
    };
    await runAgent(api, agent, { playerId: "a", maxSteps: 3, sleep: noSleep });
    expect(steps).toEqual([0, 1, 2]);
  });

  it("stops when the game is over", async () => {
    const api = fakeApi();
    api.getEnvironment.mockResolvedValue({ ...openEnv, game_over: true });
    const outcome = await runAgent(api, scripted({ type: "move" }), { playerId: "a", sleep: noSleep });
    expect(outcome).toBe("game_over");
    expect(api.move).not.toHaveBeenCalled();
    expect(api.unregister).toHaveBeenCalledTimes(1);
  });

  it("stops once eliminated", async () => {
    const api = fakeApi();
    api.getPlayers.mockResolvedValue({ players: { a: { ...self, lives: 0, active: false } } });
    expect(await runAgent(api, scripted({ type: "move" }), { playerId: "a", sleep: noSleep })).toBe("eliminated");
  });

  it("stops when the player disappears from the roster", async () => {
    const api = fakeApi();
    api.getPlayers.mockResolvedValue({ players: {} });
    expect(await runAgent(api, scripted({ type: "move" }), { playerId: "a", sleep: noSleep })).toBe("removed");
  });

  it("shrugs off rejected moves", async () => {
    const api = fakeApi();
    api.move.mockRejectedValueOnce(new ArenaRequestError("illegal_move", "Cell (0, 5) is a wall", 409));
    const outcome = await runAgent(api, scripted({ type: "move" }), { playerId: "a", maxSteps: 2, sleep: noSleep });
    expect(outcome).toBe("max_steps");
    expect(api.move).toHaveBeenCalledTimes(2);
  });

  it("treats a game_over rejection as the end", async () => {
    const api = fakeApi();
    api.fire.mockRejectedValue(new ArenaRequestError("game_over", "Game is over.", 409));
    expect(await runAgent(api, scripted({ type: "fire" }), { playerId: "a", sleep: noSleep })).toBe("game_over");
  });

  it("unregisters even when an unexpected error escapes", async () => {
    const api = fakeApi();
    api.move.mockRejectedValue(new ArenaRequestError("internal_error", "boom", 500));
    await expect(runAgent(api, scripted({ type: "move" }), { playerId: "a", sleep: noSleep })).rejects.toThrow("boom");
    expect(api.unregister).toHaveBeenCalledWith("a");
  });

  it("logs instead of failing when unregister fails", async () => {
    const api = fakeApi();
    api.unregister.mockRejectedValue(new ArenaRequestError("not_found", "Unknown player 'a'", 404));
    const outcome = await runAgent(api, scripted({ type: "move" }), { playerId: "a", maxSteps: 1, sleep: noSleep });
    expect(outcome).toBe("max_steps");
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("stops when aborted", async () => {
    const api = fakeApi();
    const controller = new AbortController();
    const sleep = vi.fn(async () => {
      controller.abort();
    });
    const outcome = await runAgent(api, scripted({ type: "move" }), {
      playerId: "a",
      signal: controller.signal,
      sleep,
    });
    expect(outcome).toBe("aborted");
    expect(api.move).toHaveBeenCalledTimes(1);
    expect(api.unregister).toHaveBeenCalledTimes(1);
  });

  it("drives a real policy", async () => {
    const api = fakeApi();
    api.getEnvironment.mockResolvedValue({ ...openEnv, walls: [[0, -1]] });
    await runAgent(api, new WallFollowingAgent(), { playerId: "a", maxSteps: 1, sleep: noSleep });
    expect(api.rotate).toHaveBeenCalledWith("a", "right");
  });
});
