import { Markers } from "@lawnsim/contracts";
import { KdTree } from "../../core/data-structures/kd-tree";
import type { Point } from "../../core/geometry/types";
import type { GridModel } from "../../core/grid/grid-model";
import type { ObstacleCluster } from "../../pipeline/types";
import { drawGuideline } from "./perimeter";

export interface ClusterConnection {
  readonly clusterId: number;
  readonly anchor: Point;
  readonly target: Point;
  readonly path: readonly Point[];
}

/**
 * Anchor/perimeter pair with the smallest Euclidean distance.
 * Perimeter cells are scanned in order and the first minimum wins.
 */
export function nearestPair(
  anchors: readonly Point[],
  perimeter: readonly Point[],
): { anchor: Point; target: Point; distanceSquared: number } | null {
  if (anchors.length === 0) return null;

  const tree = KdTree.build(anchors);
  let best: { anchor: Point; target: Point; distanceSquared: number } | null = null;

  for (const target of perimeter) {
    const hit = tree.nearest(target);
    if (!hit) continue;
    if (!best || hit.distanceSquared < best.distanceSquared) {
      best = { anchor: hit.point, target, distanceSquared: hit.distanceSquared };
    }
  }
  return best;
}

/**
 * Join a cluster's guideline ring to the border by the shortest straight line.
 *
 * @returns null when the cluster has no usable anchor or already touches the border
 */
export function connectClusterToPerimeter(
  grid: GridModel,
  cluster: ObstacleCluster,
  perimeter: readonly Point[],
): ClusterConnection | null {
  const anchors = cluster.anchors.filter((p) => !grid.isImpassable(p));
  if (anchors.length === 0 || anchors.some((p) => grid.isBorder(p))) return null;

  const targets = perimeter.filter((p) => !grid.isImpassable(p));
  const pair = nearestPair(anchors, targets.length > 0 ? targets : perimeter);
  if (!pair) return null;

  return {
    clusterId: cluster.id,
    anchor: pair.anchor,
    target: pair.target,
    path: drawGuideline(grid, pair.anchor, pair.target),
  };
}

/**
 * Guideline on every free anchor around a cluster
 * @returns number of guideline cells placed
 */
export function outlineCluster(grid: GridModel, cluster: ObstacleCluster): number {
  let placed = 0;
  for (const p of cluster.anchors) {
    if (grid.place(Markers.guideLine(), p.x, p.y)) placed++;
  }
  return placed;
}
