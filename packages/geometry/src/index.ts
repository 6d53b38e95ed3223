// ---------------------------------------------------------------------------
// @photomesh/geometry — point cloud and mesh processing
// ---------------------------------------------------------------------------

export type { Vector3, PointCloud, Mesh, Bounds, QEMConfig } from './types.js';
export { createMesh, computeBounds, boundsDiagonal } from './types.js';

export { SpatialGrid } from './spatial-grid.js';

export type { NormalSearchParams } from './normals.js';
export { estimateNormals, orientNormals, smallestEigenvector3x3 } from './normals.js';

export type {
  PlyFormat,
  PlyScalarType,
  PlyProperty,
  PlyElement,
  PlyHeader,
  PlyElementData,
  PlyData,
  PlyMesh,
  PlyWriteInput,
} from './ply.js';
export {
  PlyParseError,
  parsePlyHeader,
  plyElementCount,
  plyMinimumBodyBytes,
  parsePly,
  readPointCloud,
  readMesh,
  encodePly,
} from './ply.js';

export {
  computeQuadricError,
  buildQuadricMatrices,
  decimateMesh,
  decimateToBudget,
  keepLargestTriangles,
  triangleArea,
  compact,
} from './decimation.js';

export type { DensityTrimResult } from './density.js';
export { quantile, trimLowDensity } from './density.js';

export { NEUTRAL_GRAY, transferColors } from './colors.js';
