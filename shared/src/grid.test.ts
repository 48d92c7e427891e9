import { describe, it, expect } from "vitest";
import {
  unitVector,
  translate,
  turn,
  inBounds,
  samePos,
  offset,
  chebyshev,
  manhattan,
  posKey,
  toTuple,
  fromTuple,
} from "./grid.js";

describe("unitVector", () => {
  it("points up at 0 and clockwise from there", () => {
    expect(unitVector(0)).toEqual({ x: 0, y: -1 });
    expect(unitVector(90)).toEqual({ x: 1, y: 0 });
    expect(unitVector(180)).toEqual({ x: 0, y: 1 });
    expect(unitVector(270)).toEqual({ x: -1, y: 0 });
  });

  it("returns a fresh object", () => {
    const v = unitVector(90);
    v.x = 99;
    expect(unitVector(90)).toEqual({ x: 1, y: 0 });
  });
});

describe("translate", () => {
  it("moves one cell by default", () => {
    expect(translate({ x: 5, y: 5 }, 0)).toEqual({ x: 5, y: 4 });
  });

  it("moves several cells", () => {
    expect(translate({ x: 5, y: 5 }, 270, 3)).toEqual({ x: 2, y: 5 });
  });
});

describe("turn", () => {
  it("cycles right through all headings", () => {
    expect(turn(0, "right")).toBe(90);
    expect(turn(90, "right")).toBe(180);
    expect(turn(180, "right")).toBe(270);
    expect(turn(270, "right")).toBe(0);
  });

  it("wraps left from 0 to 270", () => {
    expect(turn(0, "left")).toBe(270);
    expect(turn(270, "left")).toBe(180);
  });
});

describe("inBounds", () => {
  it("accepts the grid corners and rejects just outside", () => {
    expect(inBounds({ x: 0, y: 0 }, 30, 20)).toBe(true);
    expect(inBounds({ x: 29, y: 19 }, 30, 20)).toBe(true);
    expect(inBounds({ x: 30, y: 0 }, 30, 20)).toBe(false);
    expect(inBounds({ x: 0, y: -1 }, 30, 20)).toBe(false);
  });
});

describe("distances and offsets", () => {
  it("computes relative offsets", () => {
    expect(offset({ x: 10, y: 10 }, { x: 7, y: 12 })).toEqual({ x: -3, y: 2 });
  });

  it("measures chebyshev and manhattan distance", () => {
    expect(chebyshev({ x: 0, y: 0 }, { x: 3, y: -5 })).toBe(5);
    expect(manhattan({ x: 0, y: 0 }, { x: 3, y: -5 })).toBe(8);
  });

  it("compares positions structurally", () => {
    expect(samePos({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(true);
    expect(samePos({ x: 1, y: 2 }, { x: 2, y: 1 })).toBe(false);
  });
});

describe("wire conversion", () => {
  it("keys and tuples round out the helpers", () => {
    expect(posKey({ x: 4, y: 7 })).toBe("4,7");
    expect(toTuple({ x: 4, y: 7 })).toEqual([4, 7]);
    expect(fromTuple([4, 7])).toEqual({ x: 4, y: 7 });
  });
});
