import { describe, it, expect } from "vitest";
import { config, parseAgentList } from "./config.js";

describe("parseAgentList", () => {
  it("reads policy, id and optional name", () => {
    expect(parseAgentList("wall:alpha:Alpha, random:beta")).toEqual([
      { policy: "wall", playerId: "alpha", name: "Alpha" },
      { policy: "random", playerId: "beta", name: undefined },
    ]);
  });

  it("keeps colons inside the name", () => {
    expect(parseAgentList("wall:alpha:A:B")[0].name).toBe("A:B");
  });

  it("skips empty entries", () => {
    expect(parseAgentList(" , ,")).toEqual([]);
  });

  it("rejects unknown policies and missing ids", () => {
    expect(() => parseAgentList("sniper:alpha")).toThrow("unknown policy 'sniper'");
    expect(() => parseAgentList("wall")).toThrow("player id must be 1-32 characters");
  });
});

describe("config", () => {
  it("has sensible defaults", () => {
    expect(config.arenaUrl).toBe("http://localhost:8000");
    expect(config.stepMs).toBe(100);
    expect(parseAgentList(config.agents).map((s) => s.policy)).toEqual(["wall", "random"]);
  });
});
