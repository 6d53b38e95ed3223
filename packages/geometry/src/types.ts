// ---------------------------------------------------------------------------
// @photomesh/geometry — point cloud and mesh types
// ---------------------------------------------------------------------------

/** 3D vector. */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** A 3D point cloud with optional per-point attributes. */
export interface PointCloud {
  /** Point positions, packed as [x0,y0,z0, x1,y1,z1, ...]. */
  positions: Float64Array;
  /** Per-point colours, packed as [r0,g0,b0, ...] (optional, values in [0,1]). */
  colors?: Float64Array;
  /** Per-point normals, packed as [nx0,ny0,nz0, ...] (optional). */
  normals?: Float64Array;
  /** Number of points. */
  count: number;
}

/** A triangle mesh with optional per-vertex attributes. */
export interface Mesh {
  /** Vertex positions, packed as [x0,y0,z0, x1,y1,z1, ...]. */
  vertices: Float64Array;
  /** Triangle index buffer (3 indices per triangle). */
  indices: Uint32Array;
  /** Vertex colours, packed as [r0,g0,b0, ...] (optional, values in [0,1]). */
  colors?: Float64Array;
  /** Number of vertices. */
  vertexCount: number;
  /** Number of triangles. */
  triangleCount: number;
}

/** Axis-aligned bounding box. */
export interface Bounds {
  min: Vector3;
  max: Vector3;
}

/** Configuration for Quadric Error Metric (QEM) mesh decimation. */
export interface QEMConfig {
  /** Maximum allowed geometric error per collapse. */
  maxError?: number;
  /** Whether to keep mesh boundary vertices in place. */
  preserveBoundary?: boolean;
}

/** Build a Mesh from packed buffers, filling in the counts. */
export function createMesh(
  vertices: Float64Array,
  indices: Uint32Array,
  colors?: Float64Array,
): Mesh {
  return {
    vertices,
    indices,
    colors,
    vertexCount: vertices.length / 3,
    triangleCount: indices.length / 3,
  };
}

/** Compute the axis-aligned bounds of packed positions. */
export function computeBounds(positions: Float64Array): Bounds {
  const min = { x: Infinity, y: Infinity, z: Infinity };
  const max = { x: -Infinity, y: -Infinity, z: -Infinity };
  for (let i = 0; i < positions.length; i += 3) {
    const x = positions[i]!;
    const y = positions[i + 1]!;
    const z = positions[i + 2]!;
    if (x < min.x) min.x = x;
    if (y < min.y) min.y = y;
    if (z < min.z) min.z = z;
    if (x > max.x) max.x = x;
    if (y > max.y) max.y = y;
    if (z > max.z) max.z = z;
  }
  return { min, max };
}

/** Length of the bounding-box diagonal. Zero for an empty set. */
export function boundsDiagonal(bounds: Bounds): number {
  const dx = bounds.max.x - bounds.min.x;
  const dy = bounds.max.y - bounds.min.y;
  const dz = bounds.max.z - bounds.min.z;
  const d = Math.sqrt(dx * dx + dy * dy + dz * dz);
  return Number.isFinite(d) ? d : 0;
}
