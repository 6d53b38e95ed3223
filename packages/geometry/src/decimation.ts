// ---------------------------------------------------------------------------
// QEM edge-collapse decimation with a hard triangle budget
// ---------------------------------------------------------------------------

import type { Mesh, QEMConfig, Vector3 } from './types.js';
import { createMesh } from './types.js';

// ---------------------------------------------------------------------------
// Quadrics
// ---------------------------------------------------------------------------

/**
 * Evaluate v^T Q v for a symmetric 4x4 quadric (row-major, 16 entries)
 * with v = [x, y, z, 1].
 */
export function computeQuadricError(v: Vector3, Q: Float64Array): number {
  const { x, y, z } = v;
  return (
    Q[0]! * x * x +
    2 * Q[1]! * x * y +
    2 * Q[2]! * x * z +
    2 * Q[3]! * x +
    Q[5]! * y * y +
    2 * Q[6]! * y * z +
    2 * Q[7]! * y +
    Q[10]! * z * z +
    2 * Q[11]! * z +
    Q[15]!
  );
}

/**
 * Per-vertex quadrics: each vertex accumulates p·p^T for the plane
 * p = [a, b, c, d] of every incident face. Degenerate faces contribute
 * nothing.
 */
export function buildQuadricMatrices(vertices: Float64Array, indices: Uint32Array): Float64Array[] {
  const nVertices = vertices.length / 3;
  const nTriangles = indices.length / 3;

  const quadrics: Float64Array[] = [];
  for (let i = 0; i < nVertices; i++) quadrics.push(new Float64Array(16));

  for (let f = 0; f < nTriangles; f++) {
    const i0 = indices[f * 3]!;
    const i1 = indices[f * 3 + 1]!;
    const i2 = indices[f * 3 + 2]!;

    const v0x = vertices[i0 * 3]!, v0y = vertices[i0 * 3 + 1]!, v0z = vertices[i0 * 3 + 2]!;
    const e1x = vertices[i1 * 3]! - v0x;
    const e1y = vertices[i1 * 3 + 1]! - v0y;
    const e1z = vertices[i1 * 3 + 2]! - v0z;
    const e2x = vertices[i2 * 3]! - v0x;
    const e2y = vertices[i2 * 3 + 1]! - v0y;
    const e2z = vertices[i2 * 3 + 2]! - v0z;

    let a = e1y * e2z - e1z * e2y;
    let b = e1z * e2x - e1x * e2z;
    let c = e1x * e2y - e1y * e2x;
    const len = Math.sqrt(a * a + b * b + c * c);
    if (len < 1e-15) continue;
    a /= len;
    b /= len;
    c /= len;
    const d = -(a * v0x + b * v0y + c * v0z);

    const p = [a, b, c, d];
    for (const vi of [i0, i1, i2]) {
      const Q = quadrics[vi]!;
      for (let r = 0; r < 4; r++) {
        for (let col = 0; col < 4; col++) {
          Q[r * 4 + col] = Q[r * 4 + col]! + p[r]! * p[col]!;
        }
      }
    }
  }

  return quadrics;
}

// ---------------------------------------------------------------------------
// Edge collapse
// ---------------------------------------------------------------------------

interface EdgeEntry {
  v0: number;
  v1: number;
  error: number;
  optimal: Vector3;
}

/**
 * One greedy pass of QEM edge collapse towards `targetTriangles`.
 *
 * Edge costs are computed once per pass; the collapse position is the
 * cheapest of the two endpoints and the midpoint. Vertex colours are
 * averaged on collapse. Unreferenced vertices are dropped from the result.
 */
export function decimateMesh(mesh: Mesh, targetTriangles: number, config?: QEMConfig): Mesh {
  const maxError = config?.maxError ?? Infinity;
  const preserveBoundary = config?.preserveBoundary ?? false;

  const nVertices = mesh.vertexCount;
  const nTriangles = mesh.triangleCount;
  const target = Math.max(1, Math.floor(targetTriangles));
  if (nTriangles <= target) return mesh;

  const positions: Vector3[] = [];
  for (let i = 0; i < nVertices; i++) {
    positions.push({
      x: mesh.vertices[i * 3]!,
      y: mesh.vertices[i * 3 + 1]!,
      z: mesh.vertices[i * 3 + 2]!,
    });
  }
  const colors = mesh.colors ? Float64Array.from(mesh.colors) : undefined;
  const faces = Uint32Array.from(mesh.indices);

  const faceAlive = new Uint8Array(nTriangles);
  let liveFaceCount = 0;
  const vertexFaces: number[][] = Array.from({ length: nVertices }, () => []);
  for (let f = 0; f < nTriangles; f++) {
    const a = faces[f * 3]!, b = faces[f * 3 + 1]!, c = faces[f * 3 + 2]!;
    if (a === b || b === c || a === c) continue;
    faceAlive[f] = 1;
    liveFaceCount++;
    vertexFaces[a]!.push(f);
    vertexFaces[b]!.push(f);
    vertexFaces[c]!.push(f);
  }

  const representative = new Uint32Array(nVertices);
  for (let i = 0; i < nVertices; i++) representative[i] = i;
  const find = (v: number): number => {
    while (representative[v]! !== v) {
      representative[v] = representative[representative[v]!]!;
      v = representative[v]!;
    }
    return v;
  };

  const quadrics = buildQuadricMatrices(mesh.vertices, mesh.indices);

  const edgeKeys = new Set<string>();
  const edgeUses = new Map<string, number>();
  const edgeList: EdgeEntry[] = [];
  for (let f = 0; f < nTriangles; f++) {
    if (!faceAlive[f]) continue;
    for (let e = 0; e < 3; e++) {
      const a = faces[f * 3 + e]!;
      const b = faces[f * 3 + ((e + 1) % 3)]!;
      const key = a < b ? `${a}_${b}` : `${b}_${a}`;
      edgeUses.set(key, (edgeUses.get(key) ?? 0) + 1);
      if (edgeKeys.has(key)) continue;
      edgeKeys.add(key);
      edgeList.push(edgeCost(a, b));
    }
  }

  const boundary = new Uint8Array(nVertices);
  if (preserveBoundary) {
    for (const [key, uses] of edgeUses) {
      if (uses !== 1) continue;
      const [a, b] = key.split('_');
      boundary[Number(a)] = 1;
      boundary[Number(b)] = 1;
    }
  }

  function edgeCost(v0: number, v1: number): EdgeEntry {
    const Q0 = quadrics[v0]!;
    const Q1 = quadrics[v1]!;
    const Qsum = new Float64Array(16);
    for (let i = 0; i < 16; i++) Qsum[i] = Q0[i]! + Q1[i]!;

    const p0 = positions[v0]!;
    const p1 = positions[v1]!;
    const mid: Vector3 = { x: (p0.x + p1.x) * 0.5, y: (p0.y + p1.y) * 0.5, z: (p0.z + p1.z) * 0.5 };

    let optimal = mid;
    let error = computeQuadricError(mid, Qsum);
    const err0 = computeQuadricError(p0, Qsum);
    if (err0 < error) {
      error = err0;
      optimal = p0;
    }
    const err1 = computeQuadricError(p1, Qsum);
    if (err1 < error) {
      error = err1;
      optimal = p1;
    }
    return { v0, v1, error, optimal };
  }

  edgeList.sort((a, b) => a.error - b.error);

  for (const edge of edgeList) {
    if (liveFaceCount <= target) break;
    if (edge.error > maxError) break;

    const rv0 = find(edge.v0);
    const rv1 = find(edge.v1);
    if (rv0 === rv1) continue;
    if (boundary[rv0] || boundary[rv1]) continue;

    representative[rv1] = rv0;
    positions[rv0] = edge.optimal;
    if (colors) {
      for (let k = 0; k < 3; k++) {
        colors[rv0 * 3 + k] = (colors[rv0 * 3 + k]! + colors[rv1 * 3 + k]!) * 0.5;
      }
    }
    const Q0 = quadrics[rv0]!;
    const Q1 = quadrics[rv1]!;
    for (let i = 0; i < 16; i++) Q0[i] = Q0[i]! + Q1[i]!;

    // Only faces touching rv1 change; every live face references
    // representatives only, so remapping rv1 -> rv0 is enough.
    const moved = vertexFaces[rv1]!;
    for (const f of moved) {
      if (!faceAlive[f]) continue;
      for (let k = 0; k < 3; k++) {
        if (faces[f * 3 + k] === rv1) faces[f * 3 + k] = rv0;
      }
      const a = faces[f * 3]!, b = faces[f * 3 + 1]!, c = faces[f * 3 + 2]!;
      if (a === b || b === c || a === c) {
        faceAlive[f] = 0;
        liveFaceCount--;
      }
    }
    vertexFaces[rv0]!.push(...moved);
    vertexFaces[rv1] = [];
  }

  const keep: number[] = [];
  for (let f = 0; f < nTriangles; f++) if (faceAlive[f]) keep.push(f);

  const flat = new Float64Array(nVertices * 3);
  for (let i = 0; i < nVertices; i++) {
    const p = positions[i]!;
    flat[i * 3] = p.x;
    flat[i * 3 + 1] = p.y;
    flat[i * 3 + 2] = p.z;
  }
  return compact(flat, faces, keep, colors);
}

/**
 * Reduce `mesh` to at most `maxTriangles` triangles.
 *
 * Runs QEM passes while they make progress; if collapses stall above the
 * budget (e.g. on meshes made of disconnected triangles) the largest
 * triangles are kept. Meshes already within budget are returned as is.
 */
export function decimateToBudget(
  mesh: Mesh,
  maxTriangles: number,
  config?: QEMConfig,
  maxPasses = 4,
): Mesh {
  const budget = Math.max(0, Math.floor(maxTriangles));
  if (mesh.triangleCount <= budget) return mesh;

  let current = mesh;
  for (let pass = 0; pass < maxPasses && current.triangleCount > budget; pass++) {
    const next = decimateMesh(current, budget, config);
    if (next.triangleCount >= current.triangleCount) break;
    current = next;
  }

  return current.triangleCount > budget ? keepLargestTriangles(current, budget) : current;
}

/** Keep the `count` triangles with the largest area. */
export function keepLargestTriangles(mesh: Mesh, count: number): Mesh {
  const areas = new Float64Array(mesh.triangleCount);
  for (let f = 0; f < mesh.triangleCount; f++) {
    areas[f] = triangleArea(mesh.vertices, mesh.indices, f);
  }
  const order = Array.from({ length: mesh.triangleCount }, (_, f) => f);
  order.sort((a, b) => areas[b]! - areas[a]! || a - b);
  const keep = order.slice(0, Math.max(0, count)).sort((a, b) => a - b);
  return compact(mesh.vertices, mesh.indices, keep, mesh.colors);
}

/** Area of triangle `f`. */
export function triangleArea(vertices: Float64Array, indices: Uint32Array, f: number): number {
  const i0 = indices[f * 3]! * 3;
  const i1 = indices[f * 3 + 1]! * 3;
  const i2 = indices[f * 3 + 2]! * 3;
  const e1x = vertices[i1]! - vertices[i0]!;
  const e1y = vertices[i1 + 1]! - vertices[i0 + 1]!;
  const e1z = vertices[i1 + 2]! - vertices[i0 + 2]!;
  const e2x = vertices[i2]! - vertices[i0]!;
  const e2y = vertices[i2 + 1]! - vertices[i0 + 1]!;
  const e2z = vertices[i2 + 2]! - vertices[i0 + 2]!;
  const cx = e1y * e2z - e1z * e2y;
  const cy = e1z * e2x - e1x * e2z;
  const cz = e1x * e2y - e1y * e2x;
  return 0.5 * Math.sqrt(cx * cx + cy * cy + cz * cz);
}

/**
 * Build a mesh from the listed faces, renumbering vertices in first-use
 * order and dropping the rest.
 */
export function compact(
  vertices: Float64Array,
  indices: Uint32Array,
  faceIds: readonly number[],
  colors?: Float64Array,
): Mesh {
  const remap = new Map<number, number>();
  const outVertices: number[] = [];
  const outColors: number[] = [];
  const outIndices = new Uint32Array(faceIds.length * 3);

  const indexOf = (v: number): number => {
    const existing = remap.get(v);
    if (existing !== undefined) return existing;
    const idx = outVertices.length / 3;
    outVertices.push(vertices[v * 3]!, vertices[v * 3 + 1]!, vertices[v * 3 + 2]!);
    if (colors) outColors.push(colors[v * 3]!, colors[v * 3 + 1]!, colors[v * 3 + 2]!);
    remap.set(v, idx);
    return idx;
  };

  faceIds.forEach((f, i) => {
    outIndices[i * 3] = indexOf(indices[f * 3]!);
    outIndices[i * 3 + 1] = indexOf(indices[f * 3 + 1]!);
    outIndices[i * 3 + 2] = indexOf(indices[f * 3 + 2]!);
  });

  return createMesh(
    Float64Array.from(outVertices),
    outIndices,
    colors ? Float64Array.from(outColors) : undefined,
  );
}
