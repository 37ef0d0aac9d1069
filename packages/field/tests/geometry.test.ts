import { describe, expect, it } from "vitest";
import {
  COMPASS_8,
  corners,
  directionFromAngle,
  euclideanDistance,
  reverse,
  rotateClockwise,
  traceLine,
  translate,
} from "../src/core/geometry";

describe("traceLine", () => {
  it("rasterizes a shallow line", () => {
    expect(traceLine({ x: 0, y: 0 }, { x: 3, y: 1 })).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 1 },
      { x: 3, y: 1 },
    ]);
  });

  it("walks a vertical line cell by cell", () => {
    expect(traceLine({ x: 2, y: 0 }, { x: 2, y: 3 })).toEqual([
      { x: 2, y: 0 },
      { x: 2, y: 1 },
      { x: 2, y: 2 },
      { x: 2, y: 3 },
    ]);
  });

  it("returns the single cell of a degenerate segment", () => {
    expect(traceLine({ x: 4, y: 4 }, { x: 4, y: 4 })).toEqual([{ x: 4, y: 4 }]);
  });

  it("includes both endpoints and stays 8-connected", () => {
    const from = { x: 9, y: 1 };
    const to = { x: 0, y: 6 };
    const path = traceLine(from, to);

    expect(path[0]).toEqual(from);
    expect(path[path.length - 1]).toEqual(to);
    for (let i = 1; i < path.length; i++) {
      const a = path[i - 1];
      const b = path[i];
      if (!a || !b) throw new Error("path has holes");
      expect(Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y))).toBe(1);
    }
    expect(path).toHaveLength(10);
  });
});

describe("operations", () => {
  it("lists the corners clockwise from the origin", () => {
    expect(corners({ width: 4, height: 3 })).toEqual([
      { x: 0, y: 0 },
      { x: 3, y: 0 },
      { x: 3, y: 2 },
      { x: 0, y: 2 },
    ]);
  });

  it("snaps angles to compass steps", () => {
    expect(directionFromAngle(0)).toEqual({ x: 1, y: 0 });
    expect(directionFromAngle(Math.PI / 4)).toEqual({ x: 1, y: 1 });
    expect(directionFromAngle(Math.PI / 2)).toEqual({ x: 0, y: 1 });
    expect(directionFromAngle(Math.PI)).toEqual({ x: -1, y: 0 });
  });

  it("turns and reverses directions", () => {
    expect(rotateClockwise({ x: 1, y: 0 })).toEqual({ x: 0, y: 1 });
    expect(rotateClockwise({ x: 0, y: 1 })).toEqual({ x: -1, y: 0 });
    expect(reverse({ x: 1, y: -1 })).toEqual({ x: -1, y: 1 });
  });

  it("translates by several steps", () => {
    expect(translate({ x: 2, y: 2 }, { x: -1, y: 1 }, 2)).toEqual({ x: 0, y: 4 });
    expect(euclideanDistance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });

  it("orders the compass east first, clockwise", () => {
    expect(COMPASS_8.map((d) => `${d.x},${d.y}`)).toEqual([
      "1,0",
      "1,1",
      "0,1",
      "-1,1",
      "-1,0",
      "-1,-1",
      "0,-1",
      "1,-1",
    ]);
  });
});
