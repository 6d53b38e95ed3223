// ---------------------------------------------------------------------------
// Normal estimation: PCA over a radius-bounded k-NN neighbourhood, then
// consistent orientation by propagation across the neighbour graph.
// ---------------------------------------------------------------------------

import type { PointCloud } from './types.js';
import { SpatialGrid } from './spatial-grid.js';

/** Neighbourhood used for both estimation and orientation. */
export interface NormalSearchParams {
  /** Maximum neighbours per point. */
  k: number;
  /** Neighbours farther than this are ignored. */
  radius: number;
}

/**
 * Estimate per-point normals using PCA on each point's neighbourhood.
 *
 * The normal is the eigenvector of the neighbourhood covariance with the
 * smallest eigenvalue. Points with fewer than two neighbours in range get
 * +Z. Sign is arbitrary; use {@link orientNormals} afterwards.
 *
 * @returns Packed per-point normals, length `cloud.count * 3`.
 */
export function estimateNormals(
  cloud: PointCloud,
  params: NormalSearchParams,
  grid: SpatialGrid = SpatialGrid.forCloud(cloud.positions),
): Float64Array {
  const n = cloud.count;
  const pos = cloud.positions;
  const normals = new Float64Array(n * 3);

  for (let i = 0; i < n; i++) {
    const pi = i * 3;
    const neighbours = grid.kNearest(i, params.k, params.radius);

    if (neighbours.length < 2) {
      normals[pi + 2] = 1;
      continue;
    }

    // Centroid over the point and its neighbours.
    let cx = pos[pi]!, cy = pos[pi + 1]!, cz = pos[pi + 2]!;
    for (const ni of neighbours) {
      cx += pos[ni * 3]!;
      cy += pos[ni * 3 + 1]!;
      cz += pos[ni * 3 + 2]!;
    }
    const m = neighbours.length + 1;
    cx /= m;
    cy /= m;
    cz /= m;

    let c00 = 0, c01 = 0, c02 = 0;
    let c11 = 0, c12 = 0, c22 = 0;
    const accumulate = (j: number): void => {
      const dx = pos[j * 3]! - cx;
      const dy = pos[j * 3 + 1]! - cy;
      const dz = pos[j * 3 + 2]! - cz;
      c00 += dx * dx;
      c01 += dx * dy;
      c02 += dx * dz;
      c11 += dy * dy;
      c12 += dy * dz;
      c22 += dz * dz;
    };
    accumulate(i);
    for (const ni of neighbours) accumulate(ni);

    const normal = smallestEigenvector3x3(c00, c01, c02, c11, c12, c22);
    normals[pi] = normal[0]!;
    normals[pi + 1] = normal[1]!;
    normals[pi + 2] = normal[2]!;
  }

  return normals;
}

/**
 * Orient normals consistently by breadth-first propagation.
 *
 * Each connected component of the neighbour graph is seeded at its highest
 * point, whose normal is flipped to point up (+Z); neighbours whose normal
 * disagrees with the current point's are flipped in turn.
 *
 * @returns A new array; the input is left untouched.
 */
export function orientNormals(
  cloud: PointCloud,
  normals: Float64Array,
  params: NormalSearchParams,
  grid: SpatialGrid = SpatialGrid.forCloud(cloud.positions),
): Float64Array {
  const n = cloud.count;
  const pos = cloud.positions;
  const out = Float64Array.from(normals);
  if (n < 2) return out;

  // Seeds in descending z so each component starts from its top.
  const order = Array.from({ length: n }, (_, i) => i);
  order.sort((a, b) => pos[b * 3 + 2]! - pos[a * 3 + 2]!);

  const visited = new Uint8Array(n);
  const queue = new Uint32Array(n);

  for (const seed of order) {
    if (visited[seed]) continue;

    if (out[seed * 3 + 2]! < 0) flip(out, seed);
    visited[seed] = 1;
    let head = 0;
    let tail = 0;
    queue[tail++] = seed;

    while (head < tail) {
      const cur = queue[head++]!;
      const ci = cur * 3;
      for (const ni of grid.kNearest(cur, params.k, params.radius)) {
        if (visited[ni]) continue;
        visited[ni] = 1;
        const nii = ni * 3;
        const dot = out[ci]! * out[nii]! + out[ci + 1]! * out[nii + 1]! + out[ci + 2]! * out[nii + 2]!;
        if (dot < 0) flip(out, ni);
        queue[tail++] = ni;
      }
    }
  }

  return out;
}

function flip(normals: Float64Array, i: number): void {
  normals[i * 3] = -normals[i * 3]!;
  normals[i * 3 + 1] = -normals[i * 3 + 1]!;
  normals[i * 3 + 2] = -normals[i * 3 + 2]!;
}

/**
 * Eigenvector for the smallest eigenvalue of a real symmetric 3x3 matrix.
 *
 * Eigenvalues come from the trigonometric solution of the characteristic
 * cubic; the eigenvector is the cross product of two rows of (M - λI).
 *
 * Matrix:  [a, b, c]
 *          [b, d, e]
 *          [c, e, f]
 */
export function smallestEigenvector3x3(
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
): Float64Array {
  const p1 = b * b + c * c + e * e;

  if (p1 < 1e-30) {
    // Diagonal: the smallest diagonal entry picks the axis.
    const eigs = [a, d, f];
    let minIdx = 0;
    if (eigs[1]! < eigs[0]!) minIdx = 1;
    if (eigs[2]! < eigs[minIdx]!) minIdx = 2;
    const result = new Float64Array(3);
    result[minIdx] = 1;
    return result;
  }

  const q = (a + d + f) / 3;
  const p2 = (a - q) * (a - q) + (d - q) * (d - q) + (f - q) * (f - q) + 2 * p1;
  const p = Math.sqrt(p2 / 6);

  const invP = 1 / p;
  const b00 = (a - q) * invP;
  const b01 = b * invP;
  const b02 = c * invP;
  const b11 = (d - q) * invP;
  const b12 = e * invP;
  const b22 = (f - q) * invP;

  const detB =
    b00 * (b11 * b22 - b12 * b12) -
    b01 * (b01 * b22 - b12 * b02) +
    b02 * (b01 * b12 - b11 * b02);

  const r = Math.max(-1, Math.min(1, detB / 2));
  const phi = Math.acos(r) / 3;
  const smallest = q + 2 * p * Math.cos(phi + (2 * Math.PI) / 3);

  const m00 = a - smallest, m01 = b, m02 = c;
  const m10 = b, m11 = d - smallest, m12 = e;
  const m20 = c, m21 = e, m22 = f - smallest;

  const candidates: Array<[number, number, number]> = [
    [m01 * m12 - m02 * m11, m02 * m10 - m00 * m12, m00 * m11 - m01 * m10],
    [m01 * m22 - m02 * m21, m02 * m20 - m00 * m22, m00 * m21 - m01 * m20],
    [m11 * m22 - m12 * m21, m12 * m20 - m10 * m22, m10 * m21 - m11 * m20],
  ];

  // Largest cross product is the best-conditioned.
  let bestLen = 0;
  let best: [number, number, number] = [0, 0, 1];
  for (const v of candidates) {
    const len = Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
    if (len > bestLen) {
      bestLen = len;
      best = v;
    }
  }

  const result = new Float64Array(3);
  if (bestLen < 1e-15) {
    result[2] = 1;
    return result;
  }
  result[0] = best[0] / bestLen;
  result[1] = best[1] / bestLen;
  result[2] = best[2] / bestLen;
  return result;
}
