import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  buildQuadricMatrices,
  computeQuadricError,
  decimateMesh,
  decimateToBudget,
  keepLargestTriangles,
  triangleArea,
} from '../decimation.js';
import { createMesh } from '../types.js';
import type { Mesh } from '../types.js';

/** n x n quads in the z = 0 plane, two triangles per quad. */
function planeMesh(n: number, withColors = false): Mesh {
  const side = n + 1;
  const vertices = new Float64Array(side * side * 3);
  for (let i = 0; i < side; i++) {
    for (let j = 0; j < side; j++) {
      const v = (i * side + j) * 3;
      vertices[v] = i;
      vertices[v + 1] = j;
    }
  }
  const indices: number[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      const a = i * side + j;
      const b = a + 1;
      const c = a + side;
      const d = c + 1;
      indices.push(a, c, d, a, d, b);
    }
  }
  const colors = withColors ? new Float64Array(side * side * 3).fill(0.25) : undefined;
  return createMesh(vertices, Uint32Array.from(indices), colors);
}

describe('quadrics', () => {
  it('measures squared distance to the face plane', () => {
    const Q = buildQuadricMatrices(
      new Float64Array([0, 0, 0, 1, 0, 0, 0, 1, 0]),
      new Uint32Array([0, 1, 2]),
    );
    expect(Q).toHaveLength(3);
    expect(computeQuadricError({ x: 0.3, y: 0.3, z: 2 }, Q[0]!)).toBeCloseTo(4, 12);
    expect(computeQuadricError({ x: 5, y: -2, z: 0 }, Q[1]!)).toBeCloseTo(0, 12);
  });

  it('skips degenerate faces', () => {
    const Q = buildQuadricMatrices(
      new Float64Array([0, 0, 0, 1, 0, 0, 2, 0, 0]),
      new Uint32Array([0, 1, 2]),
    );
    expect(Array.from(Q[0]!).every((q) => q === 0)).toBe(true);
  });
});

describe('decimateMesh', () => {
  it('reduces a plane towards the target', () => {
    const mesh = planeMesh(8);
    const out = decimateMesh(mesh, 40);
    expect(out.triangleCount).toBeLessThan(mesh.triangleCount);
    expect(out.triangleCount).toBeGreaterThan(0);
    for (const i of out.indices) expect(i).toBeLessThan(out.vertexCount);
  });

  it('returns the input when already under target', () => {
    const mesh = planeMesh(2);
    expect(decimateMesh(mesh, 100)).toBe(mesh);
  });

  it('keeps colours aligned with vertices', () => {
    const out = decimateMesh(planeMesh(6, true), 20);
    expect(out.colors).toHaveLength(out.vertexCount * 3);
    expect(out.colors?.[0]).toBe(0.25);
  });

  it('leaves boundary vertices in place when asked', () => {
    const out = decimateMesh(planeMesh(4), 1, { preserveBoundary: true });
    // Every boundary vertex of the 5x5 grid keeps integer coordinates on the rim.
    let onRim = 0;
    for (let v = 0; v < out.vertexCount; v++) {
      const x = out.vertices[v * 3]!;
      const y = out.vertices[v * 3 + 1]!;
      if (x === 0 || x === 4 || y === 0 || y === 4) onRim++;
    }
    expect(onRim).toBe(16);
  });
});

describe('decimateToBudget', () => {
  it('is a no-op within budget', () => {
    const mesh = planeMesh(3);
    expect(decimateToBudget(mesh, 18)).toBe(mesh);
  });

  it('never exceeds the budget', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 8 }), fc.integer({ min: 1, max: 60 }), (n, budget) => {
        const out = decimateToBudget(planeMesh(n), budget);
        expect(out.triangleCount).toBeLessThanOrEqual(budget);
        for (const i of out.indices) expect(i).toBeLessThan(out.vertexCount);
      }),
      { numRuns: 40 },
    );
  });

  it('stops at the error bound and then trims by area', () => {
    // Two triangles in perpendicular planes sharing no vertex: any collapse
    // within a triangle is free, so use an error bound of -1 to forbid all.
    const mesh = createMesh(
      new Float64Array([0, 0, 0, 1, 0, 0, 0, 1, 0, 5, 0, 0, 5, 2, 0, 5, 0, 2]),
      new Uint32Array([0, 1, 2, 3, 4, 5]),
    );
    const out = decimateToBudget(mesh, 1, { maxError: -1 });
    expect(out.triangleCount).toBe(1);
    expect(triangleArea(out.vertices, out.indices, 0)).toBe(2);
  });
});

describe('keepLargestTriangles', () => {
  it('keeps the largest faces in their original order', () => {
    const vertices: number[] = [];
    const indices: number[] = [];
    [1, 3, 2].forEach((s, i) => {
      const x = i * 10;
      vertices.push(x, 0, 0, x + s, 0, 0, x, s, 0);
      indices.push(i * 3, i * 3 + 1, i * 3 + 2);
    });
    const out = keepLargestTriangles(
      createMesh(Float64Array.from(vertices), Uint32Array.from(indices)),
      2,
    );
    expect(out.triangleCount).toBe(2);
    expect(out.vertexCount).toBe(6);
    expect(triangleArea(out.vertices, out.indices, 0)).toBe(4.5);
    expect(triangleArea(out.vertices, out.indices, 1)).toBe(2);
  });
});
