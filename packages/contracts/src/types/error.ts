/**
 * Error codes raised or returned by the simulation packages.
 */
export type SimulationErrorCode =
  | "CONFIG_INVALID"
  | "CUTTING_MODE_INVALID"
  | "SEED_INVALID"
  | "SNAPSHOT_INVALID"
  | "GENERATION_FAILED"
  | "BASE_STATION_UNAVAILABLE"
  | "ROBOT_START_UNREACHABLE";

/**
 * Unified error type for field generation and coverage runs.
 *
 * @example
 * ```typescript
 * throw SimulationError.robotStartUnreachable({ x: 4, y: 7 });
 * ```
 */
export class SimulationError extends Error {
  override readonly name = "SimulationError";

  constructor(
    public readonly code: SimulationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SimulationError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): SimulationError {
    return new SimulationError("CONFIG_INVALID", message, details);
  }

  static cuttingModeInvalid(mode: string): SimulationError {
    return new SimulationError(
      "CUTTING_MODE_INVALID",
      `Unknown cutting mode "${mode}"`,
      { mode },
    );
  }

  static seedInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): SimulationError {
    return new SimulationError("SEED_INVALID", message, details);
  }

  static snapshotInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): SimulationError {
    return new SimulationError("SNAPSHOT_INVALID", message, details);
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): SimulationError {
    return new SimulationError("GENERATION_FAILED", message, details);
  }

  static baseStationUnavailable(strategy: string): SimulationError {
    return new SimulationError(
      "BASE_STATION_UNAVAILABLE",
      `No valid base station cell found by ${strategy}`,
      { strategy },
    );
  }

  static robotStartUnreachable(position: {
    x: number;
    y: number;
  }): SimulationError {
    return new SimulationError(
      "ROBOT_START_UNREACHABLE",
      `Robot cannot leave (${position.x}, ${position.y}): every direction is blocked`,
      { x: position.x, y: position.y },
    );
  }

  static isSimulationError(error: unknown): error is SimulationError {
    return error instanceof SimulationError;
  }

  toJSON(): {
    name: string;
    code: SimulationErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
