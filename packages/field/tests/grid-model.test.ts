import { MarkerKind, Markers } from "@lawnsim/contracts";
import { describe, expect, it } from "vitest";
import { GridModel } from "../src/core/grid/grid-model";

describe("GridModel", () => {
  describe("construction", () => {
    it("rejects empty or fractional sizes", () => {
      expect(() => new GridModel(0, 5)).toThrow("Invalid grid dimensions: 0x5");
      expect(() => new GridModel(2.5, 5)).toThrow("Invalid grid dimensions: 2.5x5");
    });

    it("starts with no markers", () => {
      const grid = new GridModel(4, 3);
      let total = 0;
      grid.forEachCell((_, markers) => {
        total += markers.length;
      });
      expect(total).toBe(0);
    });
  });

  describe("bounds", () => {
    it("treats out-of-range reads as empty", () => {
      const grid = new GridModel(3, 3);
      expect(grid.markersAt({ x: -1, y: 0 })).toEqual([]);
      expect(grid.has({ x: 3, y: 0 }, MarkerKind.GrassTassel)).toBe(false);
      expect(grid.containsAny({ x: 0, y: 9 }, [MarkerKind.GuideLine])).toBe(false);
    });

    it("refuses out-of-range writes", () => {
      const grid = new GridModel(3, 3);
      expect(grid.place(Markers.grass(), 3, 0)).toBe(false);
      expect(grid.place(Markers.grass(), 0, -1)).toBe(false);
    });

    it("counts out-of-range cells as impassable", () => {
      const grid = new GridModel(3, 3);
      expect(grid.isImpassable({ x: -1, y: 1 })).toBe(true);
      expect(grid.isImpassable({ x: 1, y: 1 })).toBe(false);
    });

    it("recognises border cells", () => {
      const grid = new GridModel(4, 4);
      expect(grid.isBorder({ x: 0, y: 2 })).toBe(true);
      expect(grid.isBorder({ x: 3, y: 3 })).toBe(true);
      expect(grid.isBorder({ x: 1, y: 2 })).toBe(false);
      expect(grid.isBorder({ x: 4, y: 0 })).toBe(false);
    });
  });

  describe("placement rules", () => {
    it("keeps one marker per kind on a cell", () => {
      const grid = new GridModel(3, 3);
      expect(grid.place(Markers.grass(), 1, 1)).toBe(true);
      expect(grid.place(Markers.grass(5), 1, 1)).toBe(false);
      expect(grid.grassAt({ x: 1, y: 1 })?.cutCount).toBe(0);
    });

    it("keeps obstacle kinds apart from each other and the isolated area", () => {
      const grid = new GridModel(3, 3);
      expect(grid.place(Markers.square(0), 0, 0)).toBe(true);
      expect(grid.place(Markers.circle(1, 2), 0, 0)).toBe(false);
      expect(grid.place(Markers.isolatedArea(), 0, 0)).toBe(false);

      expect(grid.place(Markers.isolatedArea(), 2, 2)).toBe(true);
      expect(grid.place(Markers.square(0), 2, 2)).toBe(false);
    });

    it("refuses grass on obstacles", () => {
      const grid = new GridModel(3, 3);
      grid.place(Markers.square(0), 1, 0);
      expect(grid.place(Markers.grass(), 1, 0)).toBe(false);
    });

    it("refuses guidelines on impassable cells", () => {
      const grid = new GridModel(3, 3);
      grid.place(Markers.square(0), 0, 0);
      grid.place(Markers.isolatedArea(), 1, 0);
      grid.place(Markers.isolatedArea(), 2, 0);
      grid.place(Markers.opening(), 2, 0);

      expect(grid.place(Markers.guideLine(), 0, 0)).toBe(false);
      expect(grid.place(Markers.guideLine(), 1, 0)).toBe(false);
      expect(grid.place(Markers.guideLine(), 2, 0)).toBe(true);
    });

    it("holds a single base station", () => {
      const grid = new GridModel(3, 3);
      expect(grid.baseStation()).toBeNull();
      expect(grid.place(Markers.baseStation(), 1, 1)).toBe(true);
      expect(grid.place(Markers.baseStation(), 2, 2)).toBe(false);
      expect(grid.baseStation()).toEqual({ x: 1, y: 1 });
    });
  });

  describe("positionsOf", () => {
    it("lists cells in row-major order", () => {
      const grid = new GridModel(3, 3);
      grid.place(Markers.guideLine(), 2, 0);
      grid.place(Markers.guideLine(), 0, 2);
      grid.place(Markers.guideLine(), 1, 0);
      expect(grid.positionsOf(MarkerKind.GuideLine)).toEqual([
        { x: 1, y: 0 },
        { x: 2, y: 0 },
        { x: 0, y: 2 },
      ]);
    });
  });

  describe("neighborhood", () => {
    it("clips the Moore ring at a corner", () => {
      const grid = new GridModel(5, 5);
      expect(grid.neighborhood({ x: 0, y: 0 })).toEqual([
        { x: 1, y: 0 },
        { x: 0, y: 1 },
        { x: 1, y: 1 },
      ]);
    });

    it("returns the Von Neumann diamond with its centre", () => {
      const grid = new GridModel(5, 5);
      expect(grid.neighborhood({ x: 2, y: 2 }, { moore: false, includeCenter: true })).toEqual([
        { x: 2, y: 1 },
        { x: 1, y: 2 },
        { x: 2, y: 2 },
        { x: 3, y: 2 },
        { x: 2, y: 3 },
      ]);
    });

    it("grows with the radius", () => {
      const grid = new GridModel(7, 7);
      expect(grid.neighborhood({ x: 3, y: 3 }, { radius: 2 })).toHaveLength(24);
      expect(grid.neighborhood({ x: 3, y: 3 }, { radius: 2, moore: false })).toHaveLength(12);
    });
  });

  describe("clusters", () => {
    it("tracks members and hands out fresh ids", () => {
      const grid = new GridModel(6, 6);
      grid.place(Markers.square(0), 1, 1);
      grid.place(Markers.square(0), 2, 1);
      grid.place(Markers.circle(1, 1), 4, 4);

      expect(grid.nextClusterId()).toBe(2);
      expect(grid.clusterCells(0)).toEqual([
        { x: 1, y: 1 },
        { x: 2, y: 1 },
      ]);
      expect(grid.listClusters().map((c) => c.id)).toEqual([0, 1]);
      expect(grid.largestCluster()?.id).toBe(0);
    });

    it("breaks size ties towards the lowest id", () => {
      const grid = new GridModel(6, 6);
      grid.place(Markers.square(3), 0, 0);
      grid.place(Markers.square(1), 5, 5);
      expect(grid.largestCluster()?.id).toBe(1);
    });

    it("has no largest cluster on an empty field", () => {
      expect(new GridModel(2, 2).largestCluster()).toBeNull();
    });
  });

  describe("clone", () => {
    it("copies markers without sharing grass counters", () => {
      const grid = new GridModel(3, 3);
      grid.place(Markers.grass(), 0, 0);
      grid.place(Markers.square(4), 2, 2);
      grid.place(Markers.baseStation(), 1, 1);

      const copy = grid.clone();
      const grass = copy.grassAt({ x: 0, y: 0 });
      if (grass) grass.cutCount = 7;

      expect(grid.grassAt({ x: 0, y: 0 })?.cutCount).toBe(0);
      expect(copy.grassAt({ x: 0, y: 0 })?.cutCount).toBe(7);
      expect(copy.baseStation()).toEqual({ x: 1, y: 1 });
      expect(copy.clusterCells(4)).toEqual([{ x: 2, y: 2 }]);
      expect(copy.nextClusterId()).toBe(5);
    });
  });
});
