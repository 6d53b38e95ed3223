// ---------------------------------------------------------------------------
// Uniform spatial hash over packed 3D positions: radius-bounded k-NN and
// nearest-point lookups.
// ---------------------------------------------------------------------------

import { boundsDiagonal, computeBounds } from './types.js';

/**
 * Bucket points into cubic cells keyed by integer cell coordinates.
 *
 * Lookups only visit cells that can contain a closer point than the best
 * found so far, so cost depends on local density rather than cloud size.
 */
export class SpatialGrid {
  readonly cellSize: number;
  private readonly positions: Float64Array;
  private readonly cells = new Map<string, number[]>();
  private readonly minCell: [number, number, number];
  private readonly maxCell: [number, number, number];

  constructor(positions: Float64Array, cellSize: number) {
    if (!(cellSize > 0)) {
      throw new RangeError(`cellSize must be positive, got ${cellSize}`);
    }
    this.positions = positions;
    this.cellSize = cellSize;

    const n = positions.length / 3;
    for (let i = 0; i < n; i++) {
      const key = this.keyOf(positions[i * 3]!, positions[i * 3 + 1]!, positions[i * 3 + 2]!);
      const bucket = this.cells.get(key);
      if (bucket) bucket.push(i);
      else this.cells.set(key, [i]);
    }

    const { min, max } = computeBounds(positions);
    this.minCell = [
      Math.floor(min.x / cellSize),
      Math.floor(min.y / cellSize),
      Math.floor(min.z / cellSize),
    ];
    this.maxCell = [
      Math.floor(max.x / cellSize),
      Math.floor(max.y / cellSize),
      Math.floor(max.z / cellSize),
    ];
  }

  /**
   * Pick a cell size so that cells hold roughly `pointsPerCell` points
   * on average, assuming the cloud fills its bounding box. Flat axes
   * (extent under 0.1% of the diagonal) are left out, so planar and
   * linear clouds get cells sized to their real dimensionality.
   */
  static forCloud(positions: Float64Array, pointsPerCell = 8): SpatialGrid {
    const n = positions.length / 3;
    const bounds = computeBounds(positions);
    const diagonal = boundsDiagonal(bounds);
    if (n === 0 || diagonal === 0) return new SpatialGrid(positions, 1);

    const extents = [
      bounds.max.x - bounds.min.x,
      bounds.max.y - bounds.min.y,
      bounds.max.z - bounds.min.z,
    ].filter((e) => e > diagonal * 1e-3);
    const measure = extents.reduce((acc, e) => acc * e, 1);
    const cellSize = Math.pow((measure * pointsPerCell) / n, 1 / extents.length);
    return new SpatialGrid(positions, Math.max(cellSize, diagonal * 1e-6));
  }

  get size(): number {
    return this.positions.length / 3;
  }

  /** Index of the point nearest to (x, y, z), or -1 for an empty grid. */
  nearest(x: number, y: number, z: number): number {
    if (this.size === 0) return -1;

    const cx = Math.floor(x / this.cellSize);
    const cy = Math.floor(y / this.cellSize);
    const cz = Math.floor(z / this.cellSize);
    const ringLimit = this.ringLimitFrom(cx, cy, cz);

    let best = -1;
    let bestSq = Infinity;

    for (let ring = 0; ring <= ringLimit; ring++) {
      // Points in ring r are at least (r - 1) cells from the query.
      const reach = Math.max(0, ring - 1) * this.cellSize;
      if (best >= 0 && reach * reach >= bestSq) break;

      this.forEachInRing(cx, cy, cz, ring, (idx) => {
        const d = this.sqDistTo(idx, x, y, z);
        if (d < bestSq) {
          bestSq = d;
          best = idx;
        }
      });
    }

    return best;
  }

  /**
   * Up to `k` nearest neighbours of point `index` within `radius`,
   * closest first. The point itself is excluded.
   *
   * Rings are visited outward from the point's cell and the search stops
   * once no unvisited cell can beat the current k-th distance, so a large
   * radius over a fine grid costs no more than the neighbourhood it needs.
   */
  kNearest(index: number, k: number, radius: number): number[] {
    if (k <= 0) return [];
    const px = this.positions[index * 3]!;
    const py = this.positions[index * 3 + 1]!;
    const pz = this.positions[index * 3 + 2]!;
    const radiusSq = radius * radius;

    const cx = Math.floor(px / this.cellSize);
    const cy = Math.floor(py / this.cellSize);
    const cz = Math.floor(pz / this.cellSize);
    const ringLimit = Math.min(
      Math.floor(radius / this.cellSize) + 1,
      this.ringLimitFrom(cx, cy, cz),
    );

    // Bounded top-k, ascending by squared distance.
    const ids: number[] = [];
    const dists: number[] = [];

    for (let ring = 0; ring <= ringLimit; ring++) {
      const reach = Math.max(0, ring - 1) * this.cellSize;
      const reachSq = reach * reach;
      if (reachSq > radiusSq) break;
      if (ids.length === k && reachSq >= dists[k - 1]!) break;

      this.forEachInRing(cx, cy, cz, ring, (idx) => {
        if (idx === index) return;
        const d = this.sqDistTo(idx, px, py, pz);
        if (d > radiusSq) return;
        if (ids.length === k && d >= dists[k - 1]!) return;

        let at = ids.length === k ? k - 1 : ids.length;
        while (at > 0 && dists[at - 1]! > d) {
          ids[at] = ids[at - 1]!;
          dists[at] = dists[at - 1]!;
          at--;
        }
        ids[at] = idx;
        dists[at] = d;
      });
    }

    return ids;
  }

  /** Chebyshev ring that covers every occupied cell from (cx, cy, cz). */
  private ringLimitFrom(cx: number, cy: number, cz: number): number {
    return Math.max(
      Math.abs(cx - this.minCell[0]), Math.abs(cx - this.maxCell[0]),
      Math.abs(cy - this.minCell[1]), Math.abs(cy - this.maxCell[1]),
      Math.abs(cz - this.minCell[2]), Math.abs(cz - this.maxCell[2]),
    );
  }

  private keyOf(x: number, y: number, z: number): string {
    return `${Math.floor(x / this.cellSize)},${Math.floor(y / this.cellSize)},${Math.floor(z / this.cellSize)}`;
  }

  private sqDistTo(idx: number, x: number, y: number, z: number): number {
    const dx = this.positions[idx * 3]! - x;
    const dy = this.positions[idx * 3 + 1]! - y;
    const dz = this.positions[idx * 3 + 2]! - z;
    return dx * dx + dy * dy + dz * dz;
  }

  /** Visit every point in cells at Chebyshev distance exactly `ring`. */
  private forEachInRing(
    cx: number,
    cy: number,
    cz: number,
    ring: number,
    visit: (idx: number) => void,
  ): void {
    for (let ix = cx - ring; ix <= cx + ring; ix++) {
      for (let iy = cy - ring; iy <= cy + ring; iy++) {
        const onShellXY = Math.abs(ix - cx) === ring || Math.abs(iy - cy) === ring;
        // Interior columns only contribute their two caps.
        const step = onShellXY || ring === 0 ? 1 : 2 * ring;
        for (let iz = cz - ring; iz <= cz + ring; iz += step) {
          const bucket = this.cells.get(`${ix},${iy},${iz}`);
          if (!bucket) continue;
          for (const idx of bucket) visit(idx);
        }
      }
    }
  }
}
