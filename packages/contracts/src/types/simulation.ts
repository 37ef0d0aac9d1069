/**
 * Per-stage seeds. Each generation stage draws from its own stream so
 * changing how much randomness one stage consumes leaves the others intact.
 */
export interface SimulationSeed {
  readonly primary: number;
  readonly area: number;
  readonly obstacles: number;
  readonly station: number;
  readonly robot: number;
  readonly version: string;
}

export interface CellPosition {
  readonly x: number;
  readonly y: number;
}

/**
 * Coverage snapshot handed to the exporter at the end of every mowing cycle.
 * `counts[y][x]` is the cut count of the grass at that cell (0 on obstacles).
 */
export interface CycleReport {
  readonly mapIndex: number;
  readonly repetition: number;
  readonly cycle: number;
  readonly strategy: string;
  readonly counts: number[][];
  readonly mowedTassels: number;
  readonly mowableTassels: number;
  readonly coverage: number;
  readonly maxCutCount: number;
  /** Seconds of robot time spent in this cycle. */
  readonly elapsed: number;
}

export interface CycleExporter {
  exportCycle(report: CycleReport): void;
}

/**
 * Minimal logging surface; `console` satisfies it.
 */
export interface SimulationLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}
