// ---------------------------------------------------------------------------
// Density trimming for surface reconstruction output
// ---------------------------------------------------------------------------

import type { Mesh } from './types.js';
import { compact } from './decimation.js';

/**
 * Value at quantile `q` in [0,1], linearly interpolated between the two
 * nearest order statistics. NaN for an empty input.
 */
export function quantile(values: ArrayLike<number>, q: number): number {
  if (values.length === 0) return NaN;
  const sorted = Float64Array.from(values).sort();
  const pos = Math.min(Math.max(q, 0), 1) * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const frac = pos - lo;
  return sorted[lo]! + (sorted[hi]! - sorted[lo]!) * frac;
}

export interface DensityTrimResult {
  mesh: Mesh;
  threshold: number;
  removedVertices: number;
}

/**
 * Drop vertices whose density falls strictly below the `q` quantile,
 * together with every face touching them.
 */
export function trimLowDensity(mesh: Mesh, density: Float64Array, q: number): DensityTrimResult {
  if (density.length !== mesh.vertexCount) {
    throw new RangeError(
      `density has ${density.length} values for ${mesh.vertexCount} vertices`,
    );
  }
  const threshold = quantile(density, q);
  if (Number.isNaN(threshold)) return { mesh, threshold, removedVertices: 0 };

  const removed = new Uint8Array(mesh.vertexCount);
  let removedVertices = 0;
  for (let i = 0; i < mesh.vertexCount; i++) {
    if (density[i]! < threshold) {
      removed[i] = 1;
      removedVertices++;
    }
  }
  if (removedVertices === 0) return { mesh, threshold, removedVertices };

  const keep: number[] = [];
  for (let f = 0; f < mesh.triangleCount; f++) {
    if (
      !removed[mesh.indices[f * 3]!] &&
      !removed[mesh.indices[f * 3 + 1]!] &&
      !removed[mesh.indices[f * 3 + 2]!]
    ) {
      keep.push(f);
    }
  }
  return {
    mesh: compact(mesh.vertices, mesh.indices, keep, mesh.colors),
    threshold,
    removedVertices,
  };
}
