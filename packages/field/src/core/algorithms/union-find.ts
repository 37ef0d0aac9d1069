/**
 * Disjoint-set forest with path compression and union by rank.
 * Groups obstacle cells of preset fields into clusters.
 *
 * @example
 * ```typescript
 * const uf = new UnionFind(4);
 * uf.union(0, 1);
 * uf.connected(0, 1); // true
 * uf.connected(0, 2); // false
 * ```
 */
export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
  }

  /**
   * Root of the set holding x. Elements outside the forest are their own root.
   */
  find(x: number): number {
    let root = x;
    let next = this.parent[root];
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent[root];
    }

    let node = x;
    while (node !== root) {
      const up = this.parent[node];
      if (up === undefined) break;
      this.parent[node] = root;
      node = up;
    }
    return root;
  }

  /**
   * @returns false when x and y already share a set
   */
  union(x: number, y: number): boolean {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return false;

    const rankX = this.rank[rootX];
    const rankY = this.rank[rootY];
    if (rankX === undefined || rankY === undefined) return false;

    if (rankX < rankY) {
      this.parent[rootX] = rootY;
    } else if (rankX > rankY) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX] = rankX + 1;
    }
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}
