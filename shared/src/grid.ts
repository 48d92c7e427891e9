/** Integer grid primitives. x grows right, y grows down. */

export interface GridPos {
  x: number;
  y: number;
}

/** Degrees clockwise from "up". */
export type Rotation = 0 | 90 | 180 | 270;
export type Turn = "left" | "right";

const UNIT_VECTORS: Record<Rotation, GridPos> = {
  0: { x: 0, y: -1 },
  90: { x: 1, y: 0 },
  180: { x: 0, y: 1 },
  270: { x: -1, y: 0 },
};

const RIGHT_OF: Record<Rotation, Rotation> = { 0: 90, 90: 180, 180: 270, 270: 0 };
const LEFT_OF: Record<Rotation, Rotation> = { 0: 270, 90: 0, 180: 90, 270: 180 };

export function unitVector(rotation: Rotation): GridPos {
  const v = UNIT_VECTORS[rotation];
  return { x: v.x, y: v.y };
}

export function translate(pos: GridPos, rotation: Rotation, steps: number = 1): GridPos {
  const v = UNIT_VECTORS[rotation];
  return { x: pos.x + v.x * steps, y: pos.y + v.y * steps };
}

export function turn(rotation: Rotation, direction: Turn): Rotation {
  return direction === "right" ? RIGHT_OF[rotation] : LEFT_OF[rotation];
}

export function inBounds(pos: GridPos, width: number, height: number): boolean {
  return pos.x >= 0 && pos.x < width && pos.y >= 0 && pos.y < height;
}

export function samePos(a: GridPos, b: GridPos): boolean {
  return a.x === b.x && a.y === b.y;
}

/** `to` expressed relative to `from` */
export function offset(from: GridPos, to: GridPos): GridPos {
  return { x: to.x - from.x, y: to.y - from.y };
}

export function chebyshev(a: GridPos, b: GridPos): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function manhattan(a: GridPos, b: GridPos): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/** Stable key for Set/Map lookups */
export function posKey(pos: GridPos): string {
  return `${pos.x},${pos.y}`;
}

export function toTuple(pos: GridPos): [number, number] {
  return [pos.x, pos.y];
}

export function fromTuple([x, y]: readonly [number, number]): GridPos {
  return { x, y };
}
