import { v4 as uuid } from "uuid";
import { posKey } from "shared";
import type { GridPos, Rotation, Turn } from "shared";
import type { ArenaMap } from "./maps.js";

export interface Spaceship {
  id: string;
  name: string;
  position: GridPos;
  rotation: Rotation;
  lives: number;
  /** Cached flag; damage checks re-derive it from shieldExpiresAt */
  shieldActive: boolean;
  shieldUsed: boolean;
  shieldExpiresAt: number | null;
  active: boolean;
  joinedAt: number;
  eliminatedAt: number | null;
}

export interface Laser {
  /** Monotonic per game, doubles as creation order */
  id: number;
  position: GridPos;
  direction: Rotation;
  ownerId: string;
  /** Cells the laser may still travel */
  range: number;
}

export interface Mine {
  id: number;
  position: GridPos;
}

export interface World {
  readonly gameId: string;
  readonly map: ArenaMap;
  tick: number;
  /** Insertion order drives tie-breaks and default naming */
  players: Map<string, Spaceship>;
  lasers: Laser[];
  mines: Mine[];
  /** Set once two players have been active at the same time */
  armed: boolean;
  gameOver: boolean;
  winner: string | null;
  nextLaserId: number;
}

export type LaserExpiry = "range" | "bounds" | "wall";

/** Everything a committed action changed, in resolution order */
export type ArenaEvent =
  | { type: "player_joined"; playerId: string; name: string }
  | { type: "player_left"; playerId: string }
  | { type: "ship_moved"; playerId: string; x: number; y: number }
  | { type: "ship_rotated"; playerId: string; direction: Turn; rotation: Rotation }
  | { type: "laser_fired"; laserId: number; playerId: string }
  | { type: "laser_hit"; laserId: number; ownerId: string; targetId: string; absorbed: boolean; livesLost: number }
  | { type: "laser_expired"; laserId: number; ownerId: string; reason: LaserExpiry }
  | { type: "mine_detonated"; mineId: number; laserId: number; ownerId: string }
  | { type: "mine_triggered"; mineId: number; playerId: string; absorbed: boolean; livesLost: number }
  | { type: "ship_eliminated"; playerId: string }
  | { type: "shield_raised"; playerId: string; expiresAt: number }
  | { type: "shield_expired"; playerId: string }
  | { type: "game_restarted" }
  | { type: "game_over"; winner: string | null };

export function createWorld(map: ArenaMap, gameId: string = uuid()): World {
  return {
    gameId,
    map,
    tick: 0,
    players: new Map(),
    lasers: [],
    mines: map.mines.map((pos, i) => ({ id: i + 1, position: { x: pos.x, y: pos.y } })),
    armed: false,
    gameOver: false,
    winner: null,
    nextLaserId: 1,
  };
}

/** Deep copy of everything mutable; the map is immutable and shared */
export function cloneWorld(world: World): World {
  return {
    ...world,
    players: new Map(
      Array.from(world.players, ([id, ship]): [string, Spaceship] => [
        id,
        { ...ship, position: { ...ship.position } },
      ])
    ),
    lasers: world.lasers.map((l) => ({ ...l, position: { ...l.position } })),
    mines: world.mines.map((m) => ({ ...m, position: { ...m.position } })),
  };
}

export function isWall(map: ArenaMap, pos: GridPos): boolean {
  return map.wallKeys.has(posKey(pos));
}

export function activeShips(world: World): Spaceship[] {
  return Array.from(world.players.values()).filter((s) => s.active);
}

export function countActive(world: World): number {
  let count = 0;
  for (const ship of world.players.values()) {
    if (ship.active) count++;
  }
  return count;
}
