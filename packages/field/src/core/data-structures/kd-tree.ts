import type { Point } from "../geometry/types";

interface KdNode {
  readonly point: Point;
  /** Insertion order, used to break distance ties. */
  readonly index: number;
  readonly axis: 0 | 1;
  left: KdNode | null;
  right: KdNode | null;
}

export interface NearestResult {
  readonly point: Point;
  readonly index: number;
  readonly distanceSquared: number;
}

/**
 * Static 2-d tree over integer points for nearest-neighbour queries.
 *
 * Built once by median splitting, so queries run in O(log n) on average.
 * Equidistant candidates resolve to the one inserted first.
 *
 * @example
 * ```typescript
 * const tree = KdTree.build(anchors);
 * const hit = tree.nearest({ x: 0, y: 5 });
 * ```
 */
export class KdTree {
  private readonly root: KdNode | null;
  readonly size: number;

  private constructor(root: KdNode | null, size: number) {
    this.root = root;
    this.size = size;
  }

  static build(points: readonly Point[]): KdTree {
    const indexed = points.map((point, index) => ({ point, index }));
    return new KdTree(buildNode(indexed, 0), points.length);
  }

  nearest(query: Point): NearestResult | null {
    if (!this.root) return null;

    let best: NearestResult | null = null;

    const visit = (node: KdNode | null): void => {
      if (!node) return;

      const dx = node.point.x - query.x;
      const dy = node.point.y - query.y;
      const distanceSquared = dx * dx + dy * dy;
      if (
        best === null ||
        distanceSquared < best.distanceSquared ||
        (distanceSquared === best.distanceSquared && node.index < best.index)
      ) {
        best = { point: node.point, index: node.index, distanceSquared };
      }

      const delta = node.axis === 0 ? query.x - node.point.x : query.y - node.point.y;
      const near = delta < 0 ? node.left : node.right;
      const far = delta < 0 ? node.right : node.left;

      visit(near);
      // <= so that equidistant points on the far side still compete on index
      if (best === null || delta * delta <= best.distanceSquared) {
        visit(far);
      }
    };

    visit(this.root);
    return best;
  }
}

function buildNode(
  items: Array<{ point: Point; index: number }>,
  depth: number,
): KdNode | null {
  if (items.length === 0) return null;

  const axis: 0 | 1 = depth % 2 === 0 ? 0 : 1;
  items.sort((a, b) =>
    axis === 0
      ? a.point.x - b.point.x || a.index - b.index
      : a.point.y - b.point.y || a.index - b.index,
  );

  const median = items.length >> 1;
  const pivot = items[median];
  if (!pivot) return null;

  return {
    point: pivot.point,
    index: pivot.index,
    axis,
    left: buildNode(items.slice(0, median), depth + 1),
    right: buildNode(items.slice(median + 1), depth + 1),
  };
}
