import type { SeededRandom } from "@lawnsim/contracts";
import { COMPASS_8, type Direction } from "../core/geometry/types";
import { MovementKind } from "./cutting-mode";

/**
 * Decides the order in which the first move tries the eight compass directions.
 * Directions are drawn without replacement.
 */
export interface MovementStrategy {
  readonly kind: MovementKind;
  firstMoveOrder(): readonly Direction[];
}

export class RandomMovement implements MovementStrategy {
  readonly kind = MovementKind.Random;

  constructor(private readonly rng: SeededRandom) {}

  firstMoveOrder(): readonly Direction[] {
    return this.rng.shuffle(COMPASS_8);
  }
}

/** East first, then clockwise. */
export class SystematicMovement implements MovementStrategy {
  readonly kind = MovementKind.Systematic;

  firstMoveOrder(): readonly Direction[] {
    return COMPASS_8;
  }
}

export function createMovementStrategy(kind: MovementKind, rng: SeededRandom): MovementStrategy {
  switch (kind) {
    case MovementKind.Random:
      return new RandomMovement(rng);
    case MovementKind.Systematic:
      return new SystematicMovement();
  }
}
