import { GRID_HEIGHT, GRID_WIDTH, chebyshev, inBounds, translate, unitVector } from "shared";
import type { EnvironmentView, PlayerView, Position, Turn } from "shared";

export type AgentAction =
  | { type: "move" }
  | { type: "rotate"; direction: Turn }
  | { type: "fire" }
  | { type: "shield" }
  | { type: "idle" };

/** What an agent sees before each step */
export interface Observation {
  self: PlayerView;
  environment: EnvironmentView;
  /** Steps taken so far, starting at 0 */
  step: number;
}

export interface Agent {
  readonly name: string;
  decide(observation: Observation): AgentAction;
}

function contains(cells: readonly Position[], dx: number, dy: number): boolean {
  return cells.some(([x, y]) => x === dx && y === dy);
}

function laserWithin(env: EnvironmentView, distance: number): boolean {
  return env.lasers.some(([dx, dy]) => chebyshev({ x: 0, y: 0 }, { x: dx, y: dy }) <= distance);
}

function canShield(self: PlayerView): boolean {
  return self.shield_available && !self.shield_active;
}

export interface WallFollowingOptions {
  /** Fire on every Nth step */
  fireEvery?: number;
  gridWidth?: number;
  gridHeight?: number;
}

/**
 * Drives straight until something blocks the cell ahead, then turns right.
 * Fires on a fixed cadence and raises its shield when a laser gets close.
 */
export class WallFollowingAgent implements Agent {
  readonly name = "wall-follower";
  private readonly fireEvery: number;
  private readonly gridWidth: number;
  private readonly gridHeight: number;

  constructor(options: WallFollowingOptions = {}) {
    this.fireEvery = options.fireEvery ?? 20;
    this.gridWidth = options.gridWidth ?? GRID_WIDTH;
    this.gridHeight = options.gridHeight ?? GRID_HEIGHT;
  }

  decide({ self, environment, step }: Observation): AgentAction {
    if (canShield(self) && laserWithin(environment, 1)) {
      return { type: "shield" };
    }

    if (step > 0 && step % this.fireEvery === 0) {
      return { type: "fire" };
    }

    return this.isBlockedAhead(self, environment) ? { type: "rotate", direction: "right" } : { type: "move" };
  }

  private isBlockedAhead(self: PlayerView, env: EnvironmentView): boolean {
    const { x: dx, y: dy } = unitVector(self.rotation);
    if (contains(env.walls, dx, dy) || contains(env.mines, dx, dy)) return true;

    const [x, y] = self.position;
    return !inBounds(translate({ x, y }, self.rotation), this.gridWidth, this.gridHeight);
  }
}

type Choice = "move" | "left" | "right" | "fire" | "shield";

const DEFAULT_WEIGHTS: Record<Choice, number> = {
  move: 5,
  left: 2,
  right: 2,
  fire: 3,
  shield: 1,
};

/** Weighted random play; the rng is injected so runs can be replayed */
export class RandomAgent implements Agent {
  readonly name = "random";
  private readonly weights: Record<Choice, number>;

  constructor(
    private readonly rng: () => number = Math.random,
    weights: Partial<Record<Choice, number>> = {}
  ) {
    this.weights = { ...DEFAULT_WEIGHTS, ...weights };
  }

  decide({ self }: Observation): AgentAction {
    const choices: Choice[] = ["move", "left", "right", "fire"];
    if (canShield(self)) choices.push("shield");

    const total = choices.reduce((sum, c) => sum + this.weights[c], 0);
    if (total <= 0) return { type: "idle" };

    let roll = this.rng() * total;
    for (const choice of choices) {
      roll -= this.weights[choice];
      if (roll < 0) return toAction(choice);
    }
    return toAction(choices[choices.length - 1]);
  }
}

function toAction(choice: Choice): AgentAction {
  switch (choice) {
    case "left":
    case "right":
      return { type: "rotate", direction: choice };
    case "move":
      return { type: "move" };
    case "fire":
      return { type: "fire" };
    case "shield":
      return { type: "shield" };
  }
}

export const POLICIES = {
  wall: () => new WallFollowingAgent(),
  random: () => new RandomAgent(),
} satisfies Record<string, () => Agent>;

export type PolicyName = keyof typeof POLICIES;

export function isPolicyName(value: string): value is PolicyName {
  return Object.prototype.hasOwnProperty.call(POLICIES, value);
}
