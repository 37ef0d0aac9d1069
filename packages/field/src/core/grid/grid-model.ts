import {
  type GrassTasselMarker,
  MarkerKind,
  OBSTACLE_KINDS,
  type ResourceMarker,
  isObstacleMarker,
} from "@lawnsim/contracts";
import type { Point } from "../geometry/types";

export interface NeighborhoodOptions {
  /** Moore (Chebyshev) when true, Von Neumann (Manhattan) otherwise. Default: true */
  readonly moore?: boolean;
  /** Default: 1 */
  readonly radius?: number;
  /** Default: false */
  readonly includeCenter?: boolean;
}

export interface Cluster {
  readonly id: number;
  readonly cells: readonly Point[];
}

/**
 * Field of tassels, each holding at most one marker per kind.
 *
 * Every accessor is bounds-checked: out-of-range reads return empty results
 * and out-of-range writes return false.
 *
 * Placement rules:
 * - obstacle markers exclude each other and the isolated area
 * - guidelines and the base station are refused on impassable cells
 * - only one base station per field
 * - grass is refused on obstacles
 */
export class GridModel {
  readonly width: number;
  readonly height: number;
  private readonly cells: ResourceMarker[][];
  private readonly clusters = new Map<number, Point[]>();
  private station: Point | null = null;
  private clusterCounter = 0;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.cells = Array.from({ length: width * height }, () => []);
  }

  // ===========================================================================
  // BOUNDS
  // ===========================================================================

  withinBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  contains(p: Point): boolean {
    return this.withinBounds(p.x, p.y);
  }

  isBorder(p: Point): boolean {
    return (
      this.contains(p) &&
      (p.x === 0 || p.y === 0 || p.x === this.width - 1 || p.y === this.height - 1)
    );
  }

  // ===========================================================================
  // MARKERS
  // ===========================================================================

  /**
   * Put a marker on a cell.
   * @returns false when out of bounds or refused by the placement rules
   */
  place(marker: ResourceMarker, x: number, y: number): boolean {
    if (!this.withinBounds(x, y)) return false;

    const p = { x, y };
    const markers = this.cellAt(p);
    if (markers.some((m) => m.kind === marker.kind)) return false;

    switch (marker.kind) {
      case MarkerKind.SquaredBlockedArea:
      case MarkerKind.CircledBlockedArea:
        if (this.containsAny(p, [...OBSTACLE_KINDS, MarkerKind.IsolatedArea])) {
          return false;
        }
        break;
      case MarkerKind.IsolatedArea:
      case MarkerKind.GrassTassel:
        if (this.containsAny(p, OBSTACLE_KINDS)) return false;
        break;
      case MarkerKind.Opening:
        if (this.containsAny(p, OBSTACLE_KINDS)) return false;
        break;
      case MarkerKind.GuideLine:
        if (this.isImpassable(p)) return false;
        break;
      case MarkerKind.BaseStation:
        if (this.station !== null || this.isImpassable(p)) return false;
        break;
    }

    markers.push(marker);

    if (isObstacleMarker(marker)) {
      const members = this.clusters.get(marker.clusterId);
      if (members) {
        members.push(p);
      } else {
        this.clusters.set(marker.clusterId, [p]);
      }
      this.clusterCounter = Math.max(this.clusterCounter, marker.clusterId + 1);
    } else if (marker.kind === MarkerKind.BaseStation) {
      this.station = p;
    }
    return true;
  }

  markersAt(p: Point): readonly ResourceMarker[] {
    return this.contains(p) ? this.cellAt(p) : [];
  }

  has(p: Point, kind: MarkerKind): boolean {
    return this.markersAt(p).some((m) => m.kind === kind);
  }

  /**
   * False for out-of-bounds positions
   */
  containsAny(p: Point, kinds: readonly MarkerKind[]): boolean {
    return this.markersAt(p).some((m) => kinds.includes(m.kind));
  }

  /**
   * Obstacle cells, and isolated-area cells without an opening.
   * Out-of-bounds positions count as impassable.
   */
  isImpassable(p: Point): boolean {
    if (!this.contains(p)) return true;
    if (this.containsAny(p, OBSTACLE_KINDS)) return true;
    return this.has(p, MarkerKind.IsolatedArea) && !this.has(p, MarkerKind.Opening);
  }

  grassAt(p: Point): GrassTasselMarker | undefined {
    for (const marker of this.markersAt(p)) {
      if (marker.kind === MarkerKind.GrassTassel) return marker;
    }
    return undefined;
  }

  /**
   * Row-major list of the cells holding a marker of this kind
   */
  positionsOf(kind: MarkerKind): Point[] {
    const out: Point[] = [];
    this.forEachCell((p, markers) => {
      if (markers.some((m) => m.kind === kind)) out.push(p);
    });
    return out;
  }

  forEachCell(fn: (p: Point, markers: readonly ResourceMarker[]) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        fn({ x, y }, this.cellAt({ x, y }));
      }
    }
  }

  // ===========================================================================
  // SPATIAL QUERIES
  // ===========================================================================

  /**
   * In-bounds cells around p, row-major, clipped to the grid
   */
  neighborhood(p: Point, options: NeighborhoodOptions = {}): Point[] {
    const moore = options.moore ?? true;
    const radius = options.radius ?? 1;
    const includeCenter = options.includeCenter ?? false;
    const out: Point[] = [];

    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        if (dx === 0 && dy === 0 && !includeCenter) continue;
        if (!moore && Math.abs(dx) + Math.abs(dy) > radius) continue;
        const q = { x: p.x + dx, y: p.y + dy };
        if (this.contains(q)) out.push(q);
      }
    }
    return out;
  }

  // ===========================================================================
  // CLUSTERS AND STATION
  // ===========================================================================

  /**
   * Fresh id for a new obstacle cluster
   */
  nextClusterId(): number {
    return this.clusterCounter++;
  }

  clusterCells(id: number): readonly Point[] {
    return this.clusters.get(id) ?? [];
  }

  /**
   * Clusters ordered by id
   */
  listClusters(): Cluster[] {
    return [...this.clusters.entries()]
      .sort(([a], [b]) => a - b)
      .map(([id, cells]) => ({ id, cells }));
  }

  /**
   * Cluster with the most cells; the lowest id wins ties
   */
  largestCluster(): Cluster | null {
    let best: Cluster | null = null;
    for (const cluster of this.listClusters()) {
      if (!best || cluster.cells.length > best.cells.length) best = cluster;
    }
    return best;
  }

  baseStation(): Point | null {
    return this.station;
  }

  /**
   * Deep copy; grass counters are not shared
   */
  clone(): GridModel {
    const copy = new GridModel(this.width, this.height);
    this.forEachCell((p, markers) => {
      for (const marker of markers) {
        copy.place({ ...marker }, p.x, p.y);
      }
    });
    copy.clusterCounter = this.clusterCounter;
    return copy;
  }

  private cellAt(p: Point): ResourceMarker[] {
    const cell = this.cells[p.y * this.width + p.x];
    if (!cell) {
      throw new Error(`Cell (${p.x}, ${p.y}) outside ${this.width}x${this.height} grid`);
    }
    return cell;
  }
}
