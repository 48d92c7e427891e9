import { chebyshev, offset, toTuple } from "shared";
import type {
  EnvironmentView,
  GameStateView,
  GridPos,
  PlayerStateView,
  PlayerView,
  Position,
} from "shared";
import { isShieldUp } from "./ship.js";
import type { Spaceship, World } from "./world.js";

export function playerView(ship: Spaceship, now: number): PlayerView {
  return {
    position: toTuple(ship.position),
    rotation: ship.rotation,
    lives: ship.lives,
    shield_active: ship.active && isShieldUp(ship, now),
    shield_available: !ship.shieldUsed,
    active: ship.active,
    name: ship.name,
  };
}

function playersRecord(world: World, now: number): Record<string, PlayerView> {
  const players: Record<string, PlayerView> = {};
  for (const [id, ship] of world.players) {
    players[id] = playerView(ship, now);
  }
  return players;
}

export function gameStateView(world: World, now: number): GameStateView {
  return {
    game_id: world.gameId,
    tick: world.tick,
    players: playersRecord(world, now),
    walls: world.map.walls.map(toTuple),
    mines: world.mines.map((m) => toTuple(m.position)),
    lasers: world.lasers.map((l) => ({
      position: toTuple(l.position),
      direction: l.direction,
      owner_id: l.ownerId,
    })),
    game_over: world.gameOver,
    winner: world.winner,
  };
}

export function playerStateView(world: World, now: number): PlayerStateView {
  return { players: playersRecord(world, now) };
}

/** Hazards within `radius` (Chebyshev, inclusive) as offsets from the ship */
export function environmentView(world: World, ship: Spaceship, radius: number): EnvironmentView {
  const near = (positions: readonly GridPos[]): Position[] =>
    positions
      .filter((p) => chebyshev(ship.position, p) <= radius)
      .map((p) => toTuple(offset(ship.position, p)));

  return {
    walls: near(world.map.walls),
    mines: near(world.mines.map((m) => m.position)),
    lasers: near(world.lasers.map((l) => l.position)),
    game_over: world.gameOver,
  };
}
