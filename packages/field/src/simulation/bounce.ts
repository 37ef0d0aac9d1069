import type { SeededRandom } from "@lawnsim/contracts";
import {
  angleOf,
  directionFromAngle,
  directionsEqual,
  reverse,
  rotateClockwise,
  translate,
} from "../core/geometry/operations";
import { COMPASS_8, type Direction, type Point } from "../core/geometry/types";
import { BounceKind } from "./cutting-mode";
import type { Robot } from "./robot";

const FULL_TURN = 2 * Math.PI;
const DEGREE = Math.PI / 180;

/** First angle tried by the angular bounce, in degrees past the current heading. */
export const ANGULAR_START = 25;
export const ANGULAR_STEP_MIN = 15;
export const ANGULAR_STEP_MAX = 25;

export interface BounceContext {
  readonly robot: Robot;
  /** Same acceptance rule as a forward move. */
  canEnter(target: Point, direction: Direction): boolean;
}

export interface BounceDecision {
  readonly heading: Direction;
  readonly angle: number;
  /** Cell entered straight away, before resuming forward moves. */
  readonly sidestep: Point | null;
}

/**
 * Picks the new heading once the robot has backed off an obstacle.
 */
export interface BounceStrategy {
  readonly kind: BounceKind;
  redirect(ctx: BounceContext): BounceDecision;
}

/**
 * One eighth of a turn clockwise: E, SE, S, SW, W, NW, N, NE, E.
 */
export class DeflectBounce implements BounceStrategy {
  readonly kind = BounceKind.Deflect;

  redirect({ robot }: BounceContext): BounceDecision {
    const index = COMPASS_8.findIndex((d) => directionsEqual(d, robot.heading));
    const heading = COMPASS_8[(index + 1) % COMPASS_8.length] ?? COMPASS_8[0];
    return { heading, angle: angleOf(heading), sidestep: null };
  }
}

/**
 * Sweeps clockwise from 25 degrees past the heading in random 15-25 degree
 * increments, snapping each angle to the nearest neighbour cell. Falls back
 * to reversing when a full turn finds nothing.
 */
export class AngularBounce implements BounceStrategy {
  readonly kind = BounceKind.Angular;

  constructor(private readonly rng: SeededRandom) {}

  redirect({ robot, canEnter }: BounceContext): BounceDecision {
    let swept = ANGULAR_START;
    while (swept < 360) {
      const angle = (robot.angle + swept * DEGREE) % FULL_TURN;
      const heading = directionFromAngle(angle);
      if (canEnter(translate(robot.position, heading), heading)) {
        return { heading, angle, sidestep: null };
      }
      swept += this.rng.uniform(ANGULAR_STEP_MIN, ANGULAR_STEP_MAX);
    }

    const heading = reverse(robot.heading);
    return { heading, angle: angleOf(heading), sidestep: null };
  }
}

/**
 * Reverses and shifts one lane sideways. The lane side is kept between
 * bounces so the robot sweeps the field in parallel strips, and flips
 * when that side is blocked.
 */
export class PingPongBounce implements BounceStrategy {
  readonly kind = BounceKind.PingPong;
  private lane: Direction | null = null;

  redirect({ robot, canEnter }: BounceContext): BounceDecision {
    const heading = reverse(robot.heading);
    const preferred = this.lane ?? rotateClockwise(robot.heading);

    for (const side of [preferred, reverse(preferred)]) {
      const target = translate(robot.position, side);
      if (canEnter(target, side)) {
        this.lane = side;
        return { heading, angle: angleOf(heading), sidestep: target };
      }
    }
    return { heading, angle: angleOf(heading), sidestep: null };
  }
}

export function createBounceStrategy(kind: BounceKind, rng: SeededRandom): BounceStrategy {
  switch (kind) {
    case BounceKind.Deflect:
      return new DeflectBounce();
    case BounceKind.Angular:
      return new AngularBounce(rng);
    case BounceKind.PingPong:
      return new PingPongBounce();
  }
}
