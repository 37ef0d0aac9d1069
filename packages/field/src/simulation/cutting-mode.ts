import { Err, Ok, type Result, SimulationError } from "@lawnsim/contracts";

export const MovementKind = {
  Random: "random",
  Systematic: "systematic",
} as const;

export type MovementKind = (typeof MovementKind)[keyof typeof MovementKind];

export const BounceKind = {
  Deflect: "deflect",
  Angular: "angular",
  PingPong: "ping-pong",
} as const;

export type BounceKind = (typeof BounceKind)[keyof typeof BounceKind];

export interface CuttingMode {
  readonly movement: MovementKind;
  readonly bounce: BounceKind;
}

const MOVEMENT_KINDS: readonly string[] = Object.values(MovementKind);
const BOUNCE_KINDS: readonly string[] = Object.values(BounceKind);

function isMovementKind(value: string): value is MovementKind {
  return MOVEMENT_KINDS.includes(value);
}

function isBounceKind(value: string): value is BounceKind {
  return BOUNCE_KINDS.includes(value);
}

/**
 * Split "<movement>-<bounce>", e.g. "random-ping-pong"
 */
export function parseCuttingMode(mode: string): Result<CuttingMode, SimulationError> {
  const dash = mode.indexOf("-");
  const movement = dash < 0 ? mode : mode.slice(0, dash);
  const bounce = dash < 0 ? "" : mode.slice(dash + 1);

  if (!isMovementKind(movement) || !isBounceKind(bounce)) {
    return Err(SimulationError.cuttingModeInvalid(mode));
  }
  return Ok({ movement, bounce });
}
