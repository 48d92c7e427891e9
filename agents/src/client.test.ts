import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { GameStateView } from "shared";
import { ArenaClient, ArenaRequestError } from "./client.js";

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

function jsonResponse(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

async function captureError(promise: Promise<unknown>): Promise<ArenaRequestError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ArenaRequestError) return err;
    throw err;
  }
  throw new Error("expected the request to fail");
}

describe("ArenaClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts actions as JSON", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(200, state));
    const client = new ArenaClient("http://arena.test/", { fetchImpl });

    await expect(client.register("a", "Alpha")).resolves.toEqual(state);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://arena.test/register");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"player_id":"a","name":"Alpha"}');
  });

  it("sends the rotation direction", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(200, state));
    await new ArenaClient("http://arena.test", { fetchImpl }).rotate("a", "left");
    expect(fetchImpl.mock.calls[0][1]?.body).toBe('{"player_id":"a","direction":"left"}');
  });

  it("builds the environment query", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse(200, { walls: [[1, 0]], mines: [], lasers: [], game_over: false })
    );
    const client = new ArenaClient("http://arena.test", { fetchImpl });

    const env = await client.getEnvironment("a", 3);
    expect(env.walls).toEqual([[1, 0]]);
    expect(fetchImpl.mock.calls[0][0]).toBe("http://arena.test/state/environment?player_id=a&radius=3");
  });

  it("turns error bodies into coded errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse(409, { ok: false, error: "illegal_move", detail: "Cell (0, 5) is a wall" })
    );
    const err = await captureError(new ArenaClient("http://arena.test", { fetchImpl }).move("a"));
    expect(err.code).toBe("illegal_move");
    expect(err.status).toBe(409);
    expect(err.message).toBe("Cell (0, 5) is a wall");
  });

  it("rejects responses that do not match the schema", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(200, { players: "nope" }));
    const err = await captureError(new ArenaClient("http://arena.test", { fetchImpl }).getState());
    expect(err.code).toBe("bad_response");
  });

  it("rejects bodies that are not JSON", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("<html>", { status: 502 }));
    const err = await captureError(new ArenaClient("http://arena.test", { fetchImpl }).getState());
    expect(err.code).toBe("bad_response");
    expect(err.status).toBe(502);
  });

  it("reports network failures", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    const err = await captureError(new ArenaClient("http://arena.test", { fetchImpl }).fire("a"));
    expect(err.code).toBe("network_error");
    expect(err.status).toBeNull();
  });

  describe("register retries", () => {
    it("retries transient failures after a delay", async () => {
      const fetchImpl = vi
        .fn<typeof fetch>()
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValueOnce(jsonResponse(429, { ok: false, error: "rate_limited" }))
        .mockResolvedValueOnce(jsonResponse(200, state));
      const sleep = vi.fn(async (_ms: number) => {});
      const client = new ArenaClient("http://arena.test", { fetchImpl, sleep });

      await expect(client.register("a")).resolves.toEqual(state);
      expect(fetchImpl).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[1000], [1000]]);
    });

    it("gives up after three attempts", async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      });
      const sleep = vi.fn(async (_ms: number) => {});
      const client = new ArenaClient("http://arena.test", { fetchImpl, sleep });

      const err = await captureError(client.register("a"));
      expect(err.code).toBe("network_error");
      expect(fetchImpl).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it("does not retry rule violations", async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        jsonResponse(409, { ok: false, error: "duplicate_id", detail: "Player 'a' is already registered" })
      );
      const sleep = vi.fn(async (_ms: number) => {});
      const client = new ArenaClient("http://arena.test", { fetchImpl, sleep });

      const err = await captureError(client.register("a"));
      expect(err.code).toBe("duplicate_id");
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});
