import { MarkerKind, Markers, SeededRandom } from "@lawnsim/contracts";
import { describe, expect, it, vi } from "vitest";
import { GridModel } from "../src/core/grid/grid-model";
import { placeSquareObstacle } from "../src/passes/area/obstacles";
import {
  connectClusterToPerimeter,
  nearestPair,
  outlineCluster,
} from "../src/passes/guidelines/connect-clusters";
import { routeGuidelines } from "../src/passes/guidelines/pass";
import { drawGuideline, perimeterCells, tracePerimeter } from "../src/passes/guidelines/perimeter";

function squareAt(grid: GridModel, x: number, y: number) {
  const rng = new SeededRandom(1);
  vi.spyOn(rng, "range").mockReturnValueOnce(x).mockReturnValueOnce(y);
  const cluster = placeSquareObstacle(grid, rng, { widthCells: 1, heightCells: 1 });
  if (!cluster) throw new Error(`no square at (${x}, ${y})`);
  return cluster;
}

describe("perimeter", () => {
  it("lists every border cell once", () => {
    const cells = perimeterCells(new GridModel(10, 10));
    expect(cells).toHaveLength(36);
    expect(new Set(cells.map((p) => `${p.x},${p.y}`)).size).toBe(36);
    expect(cells.slice(0, 2)).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
    ]);
    expect(cells[10]).toEqual({ x: 0, y: 9 });
    expect(cells[20]).toEqual({ x: 0, y: 1 });
    expect(cells[35]).toEqual({ x: 9, y: 8 });
  });

  it("handles a single row", () => {
    expect(perimeterCells(new GridModel(4, 1))).toHaveLength(4);
  });

  it("skips impassable border cells when tracing", () => {
    const grid = new GridModel(10, 10);
    grid.place(Markers.square(0), 0, 5);
    expect(tracePerimeter(grid)).toHaveLength(35);
    expect(grid.has({ x: 0, y: 5 }, MarkerKind.GuideLine)).toBe(false);
  });
});

describe("drawGuideline", () => {
  it("crosses obstacles without marking them", () => {
    const grid = new GridModel(5, 5);
    grid.place(Markers.square(0), 2, 2);
    const path = drawGuideline(grid, { x: 0, y: 2 }, { x: 4, y: 2 });

    expect(path).toHaveLength(5);
    expect(grid.positionsOf(MarkerKind.GuideLine)).toEqual([
      { x: 0, y: 2 },
      { x: 1, y: 2 },
      { x: 3, y: 2 },
      { x: 4, y: 2 },
    ]);
  });
});

describe("nearestPair", () => {
  it("keeps the first minimum along the perimeter", () => {
    const pair = nearestPair(
      [{ x: 2, y: 2 }],
      [
        { x: 2, y: 0 },
        { x: 0, y: 2 },
      ],
    );
    expect(pair).toEqual({ anchor: { x: 2, y: 2 }, target: { x: 2, y: 0 }, distanceSquared: 4 });
  });

  it("returns null without anchors", () => {
    expect(nearestPair([], [{ x: 0, y: 0 }])).toBeNull();
  });
});

describe("connectClusterToPerimeter", () => {
  it("draws the shortest line to the border", () => {
    const grid = new GridModel(10, 10);
    const cluster = squareAt(grid, 6, 5);
    const connection = connectClusterToPerimeter(grid, cluster, perimeterCells(grid));

    expect(connection).toEqual({
      clusterId: 0,
      anchor: { x: 7, y: 4 },
      target: { x: 9, y: 4 },
      path: [
        { x: 7, y: 4 },
        { x: 8, y: 4 },
        { x: 9, y: 4 },
      ],
    });
    expect(grid.has({ x: 8, y: 4 }, MarkerKind.GuideLine)).toBe(true);
  });

  it("leaves clusters that already touch the border", () => {
    const grid = new GridModel(10, 10);
    const cluster = squareAt(grid, 0, 5);
    expect(connectClusterToPerimeter(grid, cluster, perimeterCells(grid))).toBeNull();
  });

  it("rings a cluster with guidelines", () => {
    const grid = new GridModel(10, 10);
    const cluster = squareAt(grid, 4, 4);
    expect(outlineCluster(grid, cluster)).toBe(8);
    expect(grid.neighborhood({ x: 4, y: 4 }).every((p) => grid.has(p, MarkerKind.GuideLine))).toBe(
      true,
    );
  });
});

describe("routeGuidelines", () => {
  it("traces the border and links every inner cluster", () => {
    const grid = new GridModel(12, 12);
    const clusters = [squareAt(grid, 3, 3), squareAt(grid, 8, 7)];
    const report = routeGuidelines({ type: "field-state", id: "test", grid, isolatedArea: null, clusters });

    expect(report.perimeterCells).toBe(44);
    expect(report.connections.map((c) => c.clusterId)).toEqual([0, 1]);
    for (const cluster of clusters) {
      for (const anchor of cluster.anchors) {
        expect(grid.has(anchor, MarkerKind.GuideLine)).toBe(true);
      }
    }
  });
});
