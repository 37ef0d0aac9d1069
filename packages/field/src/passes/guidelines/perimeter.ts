import { Markers } from "@lawnsim/contracts";
import { traceLine } from "../../core/geometry/bresenham";
import type { Point } from "../../core/geometry/types";
import type { GridModel } from "../../core/grid/grid-model";

/**
 * Border cells, each once: top row left to right, bottom row, then the
 * left and right columns top to bottom.
 */
export function perimeterCells(grid: GridModel): Point[] {
  const { width, height } = grid;
  const out: Point[] = [];

  for (let x = 0; x < width; x++) out.push({ x, y: 0 });
  if (height > 1) {
    for (let x = 0; x < width; x++) out.push({ x, y: height - 1 });
  }
  for (let y = 1; y < height - 1; y++) out.push({ x: 0, y });
  if (width > 1) {
    for (let y = 1; y < height - 1; y++) out.push({ x: width - 1, y });
  }
  return out;
}

/**
 * Lay a guideline on every passable border cell.
 * @returns the cells that received one
 */
export function tracePerimeter(grid: GridModel): Point[] {
  return perimeterCells(grid).filter((p) => grid.place(Markers.guideLine(), p.x, p.y));
}

/**
 * Rasterize a line between two cells and mark it as guideline.
 * Impassable cells along the way are crossed but left unmarked.
 *
 * @returns every cell of the line, endpoints included
 */
export function drawGuideline(grid: GridModel, from: Point, to: Point): Point[] {
  const path = traceLine(from, to);
  for (const p of path) {
    grid.place(Markers.guideLine(), p.x, p.y);
  }
  return path;
}
