/**
 * ASCII Field Renderer
 *
 * Renders fields and coverage counters as text for debugging.
 *
 * @example
 * ```typescript
 * const result = generateField(config, createSeed(12345));
 * if (result.success) {
 *   console.info(renderFieldAscii(result.artifact.grid));
 * }
 * ```
 */

import { MarkerKind, type ResourceMarker } from "@lawnsim/contracts";
import type { Point } from "../core/geometry/types";
import type { GridModel } from "../core/grid/grid-model";

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AsciiCharset {
  readonly empty: string;
  readonly grass: string;
  readonly isolatedArea: string;
  readonly opening: string;
  readonly square: string;
  readonly circle: string;
  readonly guideline: string;
  readonly baseStation: string;
  readonly robot: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  empty: " ",
  grass: "·",
  isolatedArea: "▒",
  opening: "◌",
  square: "█",
  circle: "●",
  guideline: "░",
  baseStation: "⌂",
  robot: "R",
};

/**
 * Plain charset for terminals without unicode support
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  empty: " ",
  grass: ".",
  isolatedArea: "%",
  opening: "o",
  square: "#",
  circle: "O",
  guideline: "+",
  baseStation: "B",
  robot: "R",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Row numbers on the left and a column ruler on top. */
  readonly showCoordinates?: boolean;
  /** Draw the robot over whatever is at this cell. */
  readonly robot?: Point;
}

// Highest priority first
const PRIORITY: readonly MarkerKind[] = [
  MarkerKind.BaseStation,
  MarkerKind.SquaredBlockedArea,
  MarkerKind.CircledBlockedArea,
  MarkerKind.Opening,
  MarkerKind.IsolatedArea,
  MarkerKind.GuideLine,
  MarkerKind.GrassTassel,
];

function charFor(kind: MarkerKind, charset: AsciiCharset): string {
  switch (kind) {
    case MarkerKind.BaseStation:
      return charset.baseStation;
    case MarkerKind.SquaredBlockedArea:
      return charset.square;
    case MarkerKind.CircledBlockedArea:
      return charset.circle;
    case MarkerKind.Opening:
      return charset.opening;
    case MarkerKind.IsolatedArea:
      return charset.isolatedArea;
    case MarkerKind.GuideLine:
      return charset.guideline;
    case MarkerKind.GrassTassel:
      return charset.grass;
  }
}

function cellChar(markers: readonly ResourceMarker[], charset: AsciiCharset): string {
  for (const kind of PRIORITY) {
    if (markers.some((m) => m.kind === kind)) return charFor(kind, charset);
  }
  return charset.empty;
}

function withCoordinates(rows: readonly string[], width: number): string[] {
  let ruler = "    ";
  for (let x = 0; x < width; x += 10) {
    ruler += x.toString().padEnd(10);
  }
  return [ruler.trimEnd(), ...rows.map((row, y) => `${y.toString().padStart(3)} ${row}`)];
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render a field, one line per row
 */
export function renderFieldAscii(grid: GridModel, options: RenderOptions = {}): string {
  const { charset = DEFAULT_CHARSET, showCoordinates = false, robot } = options;

  const rows: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let line = "";
    for (let x = 0; x < grid.width; x++) {
      line +=
        robot && robot.x === x && robot.y === y
          ? charset.robot
          : cellChar(grid.markersAt({ x, y }), charset);
    }
    rows.push(line);
  }

  return (showCoordinates ? withCoordinates(rows, grid.width) : rows).join("\n");
}

/**
 * Render a cut-count matrix: "." for uncut, digits 1-9, "+" above nine
 */
export function renderCoverageAscii(counts: readonly (readonly number[])[]): string {
  return counts
    .map((row) => row.map((n) => (n <= 0 ? "." : n > 9 ? "+" : n.toString())).join(""))
    .join("\n");
}
