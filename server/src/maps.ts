import fs from "node:fs";
import { z } from "zod";
import { MAX_ACTIVE_PLAYERS, fromTuple, inBounds, posKey } from "shared";
import type { GridPos } from "shared";
import { ValidationError } from "./errors.js";

/** Arena layout as stored in server/maps/*.json */
const CellSchema = z.tuple([z.number().int(), z.number().int()]);

export const MapFileSchema = z.object({
  name: z.string().min(1),
  width: z.number().int().min(3).max(200),
  height: z.number().int().min(3).max(200),
  /** Row of the top border; the bundled maps keep row 0 clear above it */
  borderTopRow: z.number().int().min(0).default(0),
  walls: z.array(CellSchema).default([]),
  mines: z.array(CellSchema).default([]),
  spawns: z.array(CellSchema).min(MAX_ACTIVE_PLAYERS),
});
export type MapFile = z.input<typeof MapFileSchema>;

export interface ArenaMap {
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly walls: readonly GridPos[];
  readonly wallKeys: ReadonlySet<string>;
  readonly mines: readonly GridPos[];
  readonly spawns: readonly GridPos[];
}

export const DEFAULT_MAP = "diagonals";

const MAP_NAME_PATTERN = /^[a-z0-9_-]+$/;
const MAPS_DIR = new URL("../maps/", import.meta.url);

/** Validate a map definition and expand its border walls */
export function buildMap(raw: unknown): ArenaMap {
  const parsed = MapFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid map: ${parsed.error.message}`);
  }
  const def = parsed.data;
  const { width, height } = def;

  const walls = new Map<string, GridPos>();
  const addWall = (pos: GridPos) => {
    if (!inBounds(pos, width, height)) {
      throw new ValidationError(`Map '${def.name}': wall (${pos.x}, ${pos.y}) is out of bounds`);
    }
    walls.set(posKey(pos), pos);
  };

  for (let x = 0; x < width; x++) {
    addWall({ x, y: def.borderTopRow });
    addWall({ x, y: height - 1 });
  }
  for (let y = 0; y < height; y++) {
    addWall({ x: 0, y });
    addWall({ x: width - 1, y });
  }
  for (const w of def.walls) addWall(fromTuple(w));

  // rows above the top border are outside the walled arena
  const isOpen = (pos: GridPos) =>
    inBounds(pos, width, height) && pos.y > def.borderTopRow && !walls.has(posKey(pos));

  const mines = def.mines.map(fromTuple);
  const mineKeys = new Set<string>();
  for (const m of mines) {
    const key = posKey(m);
    if (!isOpen(m)) {
      throw new ValidationError(`Map '${def.name}': mine (${m.x}, ${m.y}) is not on an open cell`);
    }
    mineKeys.add(key);
  }

  const spawns = def.spawns.map(fromTuple);
  const spawnKeys = new Set<string>();
  for (const s of spawns) {
    const key = posKey(s);
    if (!isOpen(s) || mineKeys.has(key) || spawnKeys.has(key)) {
      throw new ValidationError(`Map '${def.name}': spawn (${s.x}, ${s.y}) is not a free open cell`);
    }
    spawnKeys.add(key);
  }

  return {
    name: def.name,
    width,
    height,
    walls: Array.from(walls.values()),
    wallKeys: new Set(walls.keys()),
    mines,
    spawns,
  };
}

export function listMaps(): string[] {
  return fs
    .readdirSync(MAPS_DIR)
    .filter((f) => f.endsWith(".json"))
    .map((f) => f.slice(0, -".json".length))
    .sort();
}

export function loadMap(name: string = DEFAULT_MAP): ArenaMap {
  if (!MAP_NAME_PATTERN.test(name)) {
    throw new ValidationError(`Invalid map name '${name}'`);
  }
  const file = new URL(`${name}.json`, MAPS_DIR);
  if (!fs.existsSync(file)) {
    throw new ValidationError(`Unknown map '${name}'. Available: ${listMaps().join(", ")}`);
  }
  return buildMap(JSON.parse(fs.readFileSync(file, "utf8")));
}
