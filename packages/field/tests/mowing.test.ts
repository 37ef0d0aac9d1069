import { Markers } from "@lawnsim/contracts";
import { describe, expect, it } from "vitest";
import { GridModel } from "../src/core/grid/grid-model";
import {
  backoffSteps,
  cutAround,
  cuttingRadius,
  mowingTime,
  passesNeeded,
} from "../src/simulation/mowing";

describe("mowingTime", () => {
  it("takes one second per unit tassel at unit speed", () => {
    expect(mowingTime({ tasselDim: 1, cuttingDiameter: 1, speed: 1 })).toBe(1);
  });

  it("accounts for the strips a narrow blade needs", () => {
    expect(passesNeeded(0.25, 0.2)).toBe(2);
    // 2 passes over 0.25 / 0.2 = 2.5 units of travel at 0.5 units per second
    expect(mowingTime({ tasselDim: 0.5, cuttingDiameter: 0.2, speed: 0.5 })).toBeCloseTo(5);
  });

  it("gets cheaper with a wider blade", () => {
    const narrow = mowingTime({ tasselDim: 2, cuttingDiameter: 1, speed: 1 });
    const wide = mowingTime({ tasselDim: 2, cuttingDiameter: 2, speed: 1 });
    // 4 passes over 4 / 1 units against 2 passes over 4 / 2
    expect(narrow).toBe(16);
    expect(wide).toBe(4);
  });
});

describe("cutting geometry", () => {
  it("derives the radius and back-off in cells", () => {
    expect(cuttingRadius({ tasselDim: 1, cuttingDiameter: 1 })).toBe(0);
    expect(cuttingRadius({ tasselDim: 1, cuttingDiameter: 3 })).toBe(1);
    expect(cuttingRadius({ tasselDim: 0.5, cuttingDiameter: 2 })).toBe(2);
    expect(backoffSteps({ tasselDim: 1, cuttingDiameter: 2.5 })).toBe(3);
  });

  it("cuts the Von Neumann neighbourhood", () => {
    const grid = new GridModel(3, 3);
    grid.forEachCell((p) => grid.place(Markers.grass(), p.x, p.y));

    expect(cutAround(grid, { x: 0, y: 0 }, 1)).toBe(3);
    expect(grid.grassAt({ x: 0, y: 0 })?.cutCount).toBe(1);
    expect(grid.grassAt({ x: 1, y: 0 })?.cutCount).toBe(1);
    expect(grid.grassAt({ x: 0, y: 1 })?.cutCount).toBe(1);
    expect(grid.grassAt({ x: 1, y: 1 })?.cutCount).toBe(0);
  });

  it("skips cells without grass", () => {
    const grid = new GridModel(3, 3);
    grid.place(Markers.grass(), 1, 1);
    grid.place(Markers.square(0), 1, 0);
    expect(cutAround(grid, { x: 1, y: 1 }, 1)).toBe(1);
  });
});
