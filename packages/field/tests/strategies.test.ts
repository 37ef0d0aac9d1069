import { SeededRandom } from "@lawnsim/contracts";
import { describe, expect, it, vi } from "vitest";
import { COMPASS_8, type Direction, type Point } from "../src/core/geometry";
import {
  AngularBounce,
  createBounceStrategy,
  DeflectBounce,
  PingPongBounce,
} from "../src/simulation/bounce";
import { BounceKind, MovementKind, parseCuttingMode } from "../src/simulation/cutting-mode";
import { createMovementStrategy, RandomMovement, SystematicMovement } from "../src/simulation/movement";
import { Robot } from "../src/simulation/robot";

function robotAt(position: Point, heading: Direction): Robot {
  const robot = new Robot(position, { speed: 1, cuttingDiameter: 1, autonomy: 10 });
  robot.face(heading);
  return robot;
}

const anywhere = () => true;

describe("parseCuttingMode", () => {
  it("splits movement and bounce", () => {
    expect(parseCuttingMode("random-ping-pong").getOrThrow()).toEqual({
      movement: MovementKind.Random,
      bounce: BounceKind.PingPong,
    });
    expect(parseCuttingMode("systematic-deflect").getOrThrow()).toEqual({
      movement: MovementKind.Systematic,
      bounce: BounceKind.Deflect,
    });
  });

  it("rejects unknown parts", () => {
    const result = parseCuttingMode("zigzag-deflect");
    expect(result.error.code).toBe("CUTTING_MODE_INVALID");
    expect(result.error.message).toBe('Unknown cutting mode "zigzag-deflect"');
    expect(parseCuttingMode("random").isErr()).toBe(true);
    expect(parseCuttingMode("random-").isErr()).toBe(true);
  });
});

describe("movement strategies", () => {
  it("tries the compass in fixed order when systematic", () => {
    expect(new SystematicMovement().firstMoveOrder()).toEqual(COMPASS_8);
  });

  it("shuffles every direction once when random", () => {
    const order = new RandomMovement(new SeededRandom(4)).firstMoveOrder();
    expect(order).toHaveLength(8);
    expect(new Set(order.map((d) => `${d.x},${d.y}`)).size).toBe(8);
  });

  it("is built from its kind", () => {
    const rng = new SeededRandom(1);
    expect(createMovementStrategy(MovementKind.Random, rng).kind).toBe("random");
    expect(createMovementStrategy(MovementKind.Systematic, rng).kind).toBe("systematic");
  });
});

describe("DeflectBounce", () => {
  it("turns one eighth clockwise", () => {
    const bounce = new DeflectBounce();
    const turned = COMPASS_8.map(
      (d) => bounce.redirect({ robot: robotAt({ x: 2, y: 2 }, d), canEnter: anywhere }).heading,
    );
    expect(turned).toEqual([
      { x: 1, y: 1 },
      { x: 0, y: 1 },
      { x: -1, y: 1 },
      { x: -1, y: 0 },
      { x: -1, y: -1 },
      { x: 0, y: -1 },
      { x: 1, y: -1 },
      { x: 1, y: 0 },
    ]);
  });
});

describe("AngularBounce", () => {
  it("sweeps until a neighbour can be entered", () => {
    const robot = robotAt({ x: 2, y: 2 }, { x: 1, y: 0 });
    const decision = new AngularBounce(new SeededRandom(9)).redirect({
      robot,
      canEnter: (_target, d) => d.x === 0 && d.y === 1,
    });

    expect(decision.heading).toEqual({ x: 0, y: 1 });
    expect(decision.angle).toBeGreaterThan(Math.PI / 3);
    expect(decision.angle).toBeLessThanOrEqual((2 * Math.PI) / 3);
    expect(decision.sidestep).toBeNull();
  });

  it("reverses after a fruitless full turn", () => {
    const rng = new SeededRandom(9);
    const spy = vi.spyOn(rng, "uniform");
    const decision = new AngularBounce(rng).redirect({
      robot: robotAt({ x: 2, y: 2 }, { x: 1, y: 0 }),
      canEnter: () => false,
    });

    expect(decision.heading).toEqual({ x: -1, y: 0 });
    expect(spy.mock.calls.length).toBeGreaterThanOrEqual(14);
    expect(spy.mock.calls.length).toBeLessThanOrEqual(23);
  });
});

describe("PingPongBounce", () => {
  it("reverses and keeps shifting lanes the same way", () => {
    const bounce = new PingPongBounce();

    const first = bounce.redirect({ robot: robotAt({ x: 2, y: 2 }, { x: 1, y: 0 }), canEnter: anywhere });
    expect(first.heading).toEqual({ x: -1, y: 0 });
    expect(first.sidestep).toEqual({ x: 2, y: 3 });

    const second = bounce.redirect({ robot: robotAt({ x: 0, y: 3 }, { x: -1, y: 0 }), canEnter: anywhere });
    expect(second.heading).toEqual({ x: 1, y: 0 });
    expect(second.sidestep).toEqual({ x: 0, y: 4 });
  });

  it("flips the lane when that side is blocked", () => {
    const bounce = new PingPongBounce();
    const decision = bounce.redirect({
      robot: robotAt({ x: 2, y: 4 }, { x: 1, y: 0 }),
      canEnter: (target) => target.y < 4,
    });
    expect(decision.sidestep).toEqual({ x: 2, y: 3 });
  });

  it("turns in place when neither side is free", () => {
    const decision = new PingPongBounce().redirect({
      robot: robotAt({ x: 2, y: 2 }, { x: 0, y: 1 }),
      canEnter: () => false,
    });
    expect(decision.heading).toEqual({ x: 0, y: -1 });
    expect(decision.sidestep).toBeNull();
  });

  it("is built from its kind", () => {
    expect(createBounceStrategy(BounceKind.PingPong, new SeededRandom(1))).toBeInstanceOf(
      PingPongBounce,
    );
  });
});
