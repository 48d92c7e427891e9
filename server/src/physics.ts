import { LASER_DAMAGE, MINE_DAMAGE, inBounds, samePos, translate } from "shared";
import type { GridPos } from "shared";
import { activeShips, isWall } from "./world.js";
import type { ArenaEvent, Laser, Mine, Spaceship, World } from "./world.js";
import { applyDamage, isShieldUp, moveTarget, spawnLaser } from "./ship.js";

// Rule resolution over a draft world. A throw rejects the whole action;
// the caller discards the draft, so partial writes never escape.

/** Ids that count as targets for one resolution pass */
function targetsAtPassStart(world: World): Set<string> {
  return new Set(activeShips(world).map((s) => s.id));
}

function hitWithLaser(laser: Laser, target: Spaceship, now: number, events: ArenaEvent[]): void {
  const outcome = applyDamage(target, LASER_DAMAGE, now);
  events.push({
    type: "laser_hit",
    laserId: laser.id,
    ownerId: laser.ownerId,
    targetId: target.id,
    absorbed: outcome.absorbed,
    livesLost: outcome.livesLost,
  });
  if (outcome.eliminated) events.push({ type: "ship_eliminated", playerId: target.id });
}

function triggerMine(mine: Mine, ship: Spaceship, now: number, events: ArenaEvent[]): void {
  const outcome = applyDamage(ship, MINE_DAMAGE, now);
  events.push({
    type: "mine_triggered",
    mineId: mine.id,
    playerId: ship.id,
    absorbed: outcome.absorbed,
    livesLost: outcome.livesLost,
  });
  if (outcome.eliminated) events.push({ type: "ship_eliminated", playerId: ship.id });
}

/**
 * Resolve a laser entering `cell`. Returns true when the laser is consumed
 * (it left the grid, hit a wall, detonated a mine, or struck a ship).
 */
function resolveLaserCell(
  world: World,
  laser: Laser,
  cell: GridPos,
  targets: ReadonlySet<string>,
  now: number,
  events: ArenaEvent[]
): boolean {
  const { map } = world;
  if (!inBounds(cell, map.width, map.height)) {
    events.push({ type: "laser_expired", laserId: laser.id, ownerId: laser.ownerId, reason: "bounds" });
    return true;
  }
  if (isWall(map, cell)) {
    events.push({ type: "laser_expired", laserId: laser.id, ownerId: laser.ownerId, reason: "wall" });
    return true;
  }

  const mineIndex = world.mines.findIndex((m) => samePos(m.position, cell));
  if (mineIndex >= 0) {
    const mine = world.mines[mineIndex];
    world.mines.splice(mineIndex, 1);
    events.push({ type: "mine_detonated", mineId: mine.id, laserId: laser.id, ownerId: laser.ownerId });
    return true;
  }

  for (const ship of world.players.values()) {
    if (ship.id === laser.ownerId || !targets.has(ship.id)) continue;
    if (!samePos(ship.position, cell)) continue;
    hitWithLaser(laser, ship, now, events);
    return true;
  }

  return false;
}

/** First spawn point with no active ship on it */
export function findSpawn(world: World): GridPos | undefined {
  const occupied = activeShips(world).map((s) => s.position);
  return world.map.spawns.find((spawn) => !occupied.some((p) => samePos(p, spawn)));
}

/**
 * Hazards on the ship's current cell: mines first, then lasers it did not
 * fire. Everything found applies and is consumed in the same pass.
 */
export function resolveShipHazards(world: World, ship: Spaceship, now: number): ArenaEvent[] {
  const events: ArenaEvent[] = [];
  if (!ship.active) return events;

  const mines: Mine[] = [];
  for (const mine of world.mines) {
    if (samePos(mine.position, ship.position)) {
      triggerMine(mine, ship, now, events);
    } else {
      mines.push(mine);
    }
  }
  world.mines = mines;

  const lasers: Laser[] = [];
  for (const laser of world.lasers) {
    if (laser.ownerId !== ship.id && samePos(laser.position, ship.position)) {
      hitWithLaser(laser, ship, now, events);
    } else {
      lasers.push(laser);
    }
  }
  world.lasers = lasers;

  return events;
}

export function applyMove(world: World, ship: Spaceship, now: number): ArenaEvent[] {
  const target = moveTarget(ship, world.map);
  ship.position = target;
  return [
    { type: "ship_moved", playerId: ship.id, x: target.x, y: target.y },
    ...resolveShipHazards(world, ship, now),
  ];
}

/** Spawn a laser ahead of the ship; a blocked spawn cell absorbs it at once */
export function fireLaser(world: World, ship: Spaceship, range: number, now: number): ArenaEvent[] {
  const laser = spawnLaser(ship, world.nextLaserId, range);
  world.nextLaserId++;

  const events: ArenaEvent[] = [{ type: "laser_fired", laserId: laser.id, playerId: ship.id }];
  const consumed = resolveLaserCell(world, laser, laser.position, targetsAtPassStart(world), now, events);
  if (!consumed) world.lasers.push(laser);
  return events;
}

/** Move every laser one cell, oldest first */
export function stepLasers(world: World, now: number): ArenaEvent[] {
  const events: ArenaEvent[] = [];
  const targets = targetsAtPassStart(world);
  const survivors: Laser[] = [];

  for (const laser of world.lasers) {
    if (laser.range <= 0) {
      events.push({ type: "laser_expired", laserId: laser.id, ownerId: laser.ownerId, reason: "range" });
      continue;
    }
    const next = translate(laser.position, laser.direction);
    if (resolveLaserCell(world, laser, next, targets, now, events)) continue;
    laser.position = next;
    laser.range--;
    survivors.push(laser);
  }

  world.lasers = survivors;
  return events;
}

export function resolveMineContacts(world: World, now: number): ArenaEvent[] {
  const events: ArenaEvent[] = [];
  for (const ship of activeShips(world)) {
    const remaining: Mine[] = [];
    for (const mine of world.mines) {
      if (samePos(mine.position, ship.position)) {
        triggerMine(mine, ship, now, events);
      } else {
        remaining.push(mine);
      }
    }
    world.mines = remaining;
  }
  return events;
}

export function expireShields(world: World, now: number): ArenaEvent[] {
  const events: ArenaEvent[] = [];
  for (const ship of world.players.values()) {
    if (ship.shieldActive && !isShieldUp(ship, now)) {
      ship.shieldActive = false;
      events.push({ type: "shield_expired", playerId: ship.id });
    }
  }
  return events;
}

/** Arm once two ships are live together; end when at most one remains */
export function evaluateGameOver(world: World): ArenaEvent[] {
  if (world.gameOver) return [];
  const active = activeShips(world);
  if (!world.armed && active.length >= 2) world.armed = true;
  if (!world.armed || active.length > 1) return [];

  world.gameOver = true;
  world.winner = active.length === 1 ? active[0].id : null;
  return [{ type: "game_over", winner: world.winner }];
}
