import { ENVIRONMENT_RADIUS, LASER_RANGE, MAX_ACTIVE_PLAYERS, TICK_MS, log } from "shared";
import type {
  EnvironmentView,
  GameStateView,
  PlayerStateView,
  StatsView,
  Turn,
} from "shared";
import {
  ArenaError,
  CapacityError,
  DuplicateIdError,
  GameOverError,
  InactivePlayerError,
  NotFoundError,
  ValidationError,
} from "./errors.js";
import { DEFAULT_MAP, loadMap } from "./maps.js";
import type { ArenaMap } from "./maps.js";
import {
  applyMove,
  evaluateGameOver,
  expireShields,
  findSpawn,
  fireLaser,
  resolveMineContacts,
  resolveShipHazards,
  stepLasers,
} from "./physics.js";
import { activateShield, createShip, rotateShip } from "./ship.js";
import { MatchStats } from "./stats.js";
import { environmentView, gameStateView, playerStateView } from "./views.js";
import { cloneWorld, countActive, createWorld } from "./world.js";
import type { ArenaEvent, Spaceship, World } from "./world.js";

export interface ArenaOptions {
  map?: ArenaMap;
  /** Milliseconds; injected by tests for deterministic shields */
  clock?: () => number;
  laserRange?: number;
}

/** Tick drift tracking for observability */
export interface TickMetrics {
  observedTickRate: number;
  maxTickMs: number;
  totalTicks: number;
}

export type TickListener = (state: GameStateView) => void;

type Mutation = (draft: World, now: number) => ArenaEvent[];

/**
 * Owns the authoritative world. Every mutation runs against a private draft
 * and is published with a single assignment, so readers only ever see a
 * complete world and a rejected action leaves no trace.
 */
export class Arena {
  readonly map: ArenaMap;
  readonly stats = new MatchStats();
  private world: World;
  private readonly clock: () => number;
  private readonly laserRange: number;
  private tickListeners: Set<TickListener> = new Set();

  private tickInterval: ReturnType<typeof setInterval> | null = null;
  private _tickMetrics: TickMetrics = { observedTickRate: 0, maxTickMs: 0, totalTicks: 0 };
  private _tickDurations: number[] = [];
  private _metricsWindowStart = 0;
  private _ticksInWindow = 0;

  constructor(options: ArenaOptions = {}) {
    this.map = options.map ?? loadMap(DEFAULT_MAP);
    this.clock = options.clock ?? Date.now;
    this.laserRange = options.laserRange ?? LASER_RANGE;
    this.world = createWorld(this.map);
    this.stats.sync(this.world.gameId);
  }

  get gameId(): string {
    return this.world.gameId;
  }

  get gameOver(): boolean {
    return this.world.gameOver;
  }

  get activeCount(): number {
    return countActive(this.world);
  }

  get running(): boolean {
    return this.tickInterval !== null;
  }

  get tickMetrics(): TickMetrics {
    return { ...this._tickMetrics };
  }

  // --- Mutations ---

  register(playerId: string, name?: string): GameStateView {
    const id = playerId.trim();
    if (id.length === 0) throw new ValidationError("player_id must not be empty");

    // A finished game is replaced by a fresh one in the same transaction
    const base = this.world.gameOver ? createWorld(this.map) : undefined;

    this.commit("register", id, (draft, now) => {
      const active = countActive(draft);
      if (active >= MAX_ACTIVE_PLAYERS) {
        throw new CapacityError(`Arena is full (${MAX_ACTIVE_PLAYERS} active players)`, { playerId: id });
      }
      if (draft.players.has(id)) throw new DuplicateIdError(id);

      const spawn = findSpawn(draft);
      if (!spawn) throw new CapacityError("No free spawn point", { playerId: id });

      const displayName = name?.trim() || `Player ${active + 1}`;
      const ship = createShip(id, displayName, spawn, now);
      draft.players.set(id, ship);
      return [
        { type: "player_joined", playerId: id, name: displayName },
        ...resolveShipHazards(draft, ship, now),
      ];
    }, { base });

    return this.getState();
  }

  /** Also accepted after game over so agents can leave cleanly */
  unregister(playerId: string): GameStateView {
    this.commit("unregister", playerId, (draft) => {
      if (!draft.players.delete(playerId)) throw new NotFoundError(playerId);
      return [{ type: "player_left", playerId }];
    });
    return this.getState();
  }

  move(playerId: string): GameStateView {
    this.commit("move", playerId, (draft, now) => applyMove(draft, this.actingShip(draft, playerId), now));
    return this.getState();
  }

  rotate(playerId: string, direction: Turn): GameStateView {
    if (direction !== "left" && direction !== "right") {
      throw new ValidationError("direction must be 'left' or 'right'", { playerId });
    }
    this.commit("rotate", playerId, (draft) => {
      const ship = this.actingShip(draft, playerId);
      rotateShip(ship, direction);
      return [{ type: "ship_rotated", playerId, direction, rotation: ship.rotation }];
    });
    return this.getState();
  }

  fire(playerId: string): GameStateView {
    this.commit("fire", playerId, (draft, now) =>
      fireLaser(draft, this.actingShip(draft, playerId), this.laserRange, now)
    );
    return this.getState();
  }

  shield(playerId: string): GameStateView {
    this.commit("shield", playerId, (draft, now) => {
      const ship = this.actingShip(draft, playerId);
      activateShield(ship, now);
      return [{ type: "shield_raised", playerId, expiresAt: ship.shieldExpiresAt ?? now }];
    });
    return this.getState();
  }

  /** One advance step: shields, lasers, mines, then the game-over check */
  advance(now: number = this.clock()): GameStateView {
    if (!this.world.gameOver) {
      this.commit("advance", undefined, (draft, at) => {
        draft.tick++;
        return [
          ...expireShields(draft, at),
          ...stepLasers(draft, at),
          ...resolveMineContacts(draft, at),
        ];
      }, { now });
    }
    return this.getState(now);
  }

  restart(): GameStateView {
    this.commit("restart", undefined, () => [{ type: "game_restarted" }], {
      base: createWorld(this.map),
    });
    return this.getState();
  }

  // --- Reads ---

  getState(now: number = this.clock()): GameStateView {
    return gameStateView(this.world, now);
  }

  getPlayerState(now: number = this.clock()): PlayerStateView {
    return playerStateView(this.world, now);
  }

  getEnvironmentState(playerId: string, radius?: number): EnvironmentView {
    const ship = this.world.players.get(playerId);
    if (!ship) throw new NotFoundError(playerId);
    return environmentView(this.world, ship, radius ?? ENVIRONMENT_RADIUS);
  }

  getStats(now: number = this.clock()): StatsView {
    return this.stats.getSummary(now);
  }

  getStatsCsv(now: number = this.clock()): string {
    return this.stats.toCsv(now);
  }

  // --- Tick loop ---

  /** Subscribe to post-advance snapshots; returns an unsubscribe function */
  onTick(listener: TickListener): () => void {
    this.tickListeners.add(listener);
    return () => {
      this.tickListeners.delete(listener);
    };
  }

  start(tickMs: number = TICK_MS): void {
    if (this.tickInterval) return;

    this._metricsWindowStart = Date.now();
    this._ticksInWindow = 0;
    const targetRate = 1000 / tickMs;

    this.tickInterval = setInterval(() => {
      const tickStart = Date.now();

      const state = this.advance();
      for (const listener of this.tickListeners) {
        try {
          listener(state);
        } catch (err) {
          log.error("Tick listener failed", { gameId: this.gameId, error: String(err) });
        }
      }

      const tickEnd = Date.now();
      this._tickDurations.push(tickEnd - tickStart);
      this._ticksInWindow++;
      this._tickMetrics.totalTicks++;

      // Update metrics every ~1 second
      const windowElapsed = tickEnd - this._metricsWindowStart;
      if (windowElapsed >= 1000) {
        this._tickMetrics.observedTickRate = (this._ticksInWindow / windowElapsed) * 1000;
        this._tickMetrics.maxTickMs = Math.max(...this._tickDurations);
        this._tickDurations = [];
        this._ticksInWindow = 0;
        this._metricsWindowStart = tickEnd;

        if (this._tickMetrics.observedTickRate < targetRate * 0.8) {
          log.warn("Tick rate drift", {
            gameId: this.gameId,
            observed: Math.round(this._tickMetrics.observedTickRate * 10) / 10,
            target: targetRate,
          });
        }
      }
    }, tickMs);

    log.info("Tick loop started", { gameId: this.gameId, tickMs });
  }

  stop(): void {
    if (!this.tickInterval) return;
    clearInterval(this.tickInterval);
    this.tickInterval = null;
    log.info("Tick loop stopped", { gameId: this.gameId });
  }

  // --- Internals ---

  /** Lookup order: unknown id, finished game, eliminated ship */
  private actingShip(draft: World, playerId: string): Spaceship {
    const ship = draft.players.get(playerId);
    if (!ship) throw new NotFoundError(playerId);
    if (draft.gameOver) throw new GameOverError();
    if (!ship.active) throw new InactivePlayerError(playerId);
    return ship;
  }

  private commit(
    action: string,
    playerId: string | undefined,
    mutate: Mutation,
    options: { base?: World; now?: number } = {}
  ): void {
    const now = options.now ?? this.clock();
    const draft = options.base ?? cloneWorld(this.world);

    let events: ArenaEvent[];
    try {
      events = mutate(draft, now);
    } catch (err) {
      if (err instanceof ArenaError) {
        log.debug("Action rejected", { gameId: this.gameId, playerId, action, error: err.code });
      }
      throw err;
    }
    events.push(...evaluateGameOver(draft));

    this.world = draft;
    this.stats.sync(draft.gameId);
    this.stats.record(events, now);
    this.logEvents(action, events);
  }

  private logEvents(action: string, events: readonly ArenaEvent[]): void {
    const gameId = this.gameId;
    for (const event of events) {
      switch (event.type) {
        case "player_joined":
          log.info("Player registered", { gameId, playerId: event.playerId, name: event.name });
          break;
        case "player_left":
          log.info("Player unregistered", { gameId, playerId: event.playerId });
          break;
        case "ship_eliminated":
          log.info("Ship eliminated", { gameId, playerId: event.playerId });
          break;
        case "game_restarted":
          log.info("Game restarted", { gameId });
          break;
        case "game_over":
          log.info("Game over", { gameId, winner: event.winner ?? "none", tick: this.world.tick });
          break;
        default:
          log.debug(event.type, { gameId, action, ...event });
      }
    }
  }
}
