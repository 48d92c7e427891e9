import {
  INITIAL_LIVES,
  INITIAL_ROTATION,
  SHIELD_DURATION_MS,
  inBounds,
  translate,
  turn,
} from "shared";
import type { GridPos, Turn } from "shared";
import {
  IllegalMoveError,
  InactivePlayerError,
  ShieldAlreadyUsedError,
} from "./errors.js";
import { isWall } from "./world.js";
import type { Laser, Spaceship } from "./world.js";
import type { ArenaMap } from "./maps.js";

export interface DamageOutcome {
  /** True when an up shield took the hit */
  absorbed: boolean;
  livesLost: number;
  /** True only on the hit that took the ship to zero */
  eliminated: boolean;
}

export function createShip(id: string, name: string, position: GridPos, now: number): Spaceship {
  return {
    id,
    name,
    position: { x: position.x, y: position.y },
    rotation: INITIAL_ROTATION,
    lives: INITIAL_LIVES,
    shieldActive: false,
    shieldUsed: false,
    shieldExpiresAt: null,
    active: true,
    joinedAt: now,
    eliminatedAt: null,
  };
}

/** Cell one step ahead, if the ship may enter it */
export function moveTarget(ship: Spaceship, map: ArenaMap): GridPos {
  const target = translate(ship.position, ship.rotation);
  if (!inBounds(target, map.width, map.height)) {
    throw new IllegalMoveError(ship.id, "bounds", target.x, target.y);
  }
  if (isWall(map, target)) {
    throw new IllegalMoveError(ship.id, "wall", target.x, target.y);
  }
  return target;
}

export function rotateShip(ship: Spaceship, direction: Turn): void {
  ship.rotation = turn(ship.rotation, direction);
}

/** New laser one cell ahead of the ship, heading where the ship faces */
export function spawnLaser(ship: Spaceship, id: number, range: number): Laser {
  if (!ship.active) throw new InactivePlayerError(ship.id);
  return {
    id,
    position: translate(ship.position, ship.rotation),
    direction: ship.rotation,
    ownerId: ship.id,
    range,
  };
}

export function activateShield(ship: Spaceship, now: number): void {
  if (ship.shieldUsed) throw new ShieldAlreadyUsedError(ship.id);
  ship.shieldActive = true;
  ship.shieldUsed = true;
  ship.shieldExpiresAt = now + SHIELD_DURATION_MS;
}

export function isShieldUp(ship: Spaceship, now: number): boolean {
  return ship.shieldExpiresAt !== null && now < ship.shieldExpiresAt;
}

export function applyDamage(ship: Spaceship, amount: number, now: number): DamageOutcome {
  if (isShieldUp(ship, now)) {
    return { absorbed: true, livesLost: 0, eliminated: false };
  }

  const before = ship.lives;
  ship.lives = Math.max(0, ship.lives - amount);

  let eliminated = false;
  if (ship.lives === 0 && ship.active) {
    ship.active = false;
    ship.shieldActive = false;
    ship.eliminatedAt = now;
    eliminated = true;
  }

  return { absorbed: false, livesLost: before - ship.lives, eliminated };
}
