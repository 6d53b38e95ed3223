// ---------------------------------------------------------------------------
// Vertex colouring from a source point cloud
// ---------------------------------------------------------------------------

import type { Mesh, PointCloud } from './types.js';
import { SpatialGrid } from './spatial-grid.js';

/** Fallback colour when the cloud carries none. */
export const NEUTRAL_GRAY = 0.5;

/**
 * Give every mesh vertex the colour of its nearest cloud point.
 * Without cloud colours every vertex gets {@link NEUTRAL_GRAY}.
 *
 * @returns Packed RGB in [0,1], length `mesh.vertexCount * 3`.
 */
export function transferColors(
  mesh: Mesh,
  cloud: PointCloud,
  grid?: SpatialGrid,
): Float64Array {
  const out = new Float64Array(mesh.vertexCount * 3);
  const source = cloud.colors;
  if (!source || cloud.count === 0) {
    out.fill(NEUTRAL_GRAY);
    return out;
  }

  const index = grid ?? SpatialGrid.forCloud(cloud.positions);
  for (let i = 0; i < mesh.vertexCount; i++) {
    const nearest = index.nearest(
      mesh.vertices[i * 3]!,
      mesh.vertices[i * 3 + 1]!,
      mesh.vertices[i * 3 + 2]!,
    );
    out[i * 3] = source[nearest * 3]!;
    out[i * 3 + 1] = source[nearest * 3 + 1]!;
    out[i * 3 + 2] = source[nearest * 3 + 2]!;
  }
  return out;
}
