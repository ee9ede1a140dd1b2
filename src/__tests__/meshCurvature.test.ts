import { describe, expect, it } from 'vitest';
import { computeMeanCurvature } from '../utils/meshCurvature';
import { createMeshData } from '../utils/meshUtils';
import { gridMesh } from './helpers/meshBuilders';

/**
 * Two triangles folded along the edge 1-2; p3 sits `drop` below the plane
 * of the first triangle.
 */
function foldedPair(drop: number) {
  return createMeshData(
    [0, 0, 0, 1, 0, 0, 0, 1, 0, 1, 1, -drop],
    [0, 1, 2, 2, 1, 3]
  );
}

// Fold angle atan(√2), shared edge √2, star area 0.5 + √3/2
const FOLD_CURVATURE = (3 * Math.SQRT2 * Math.atan(Math.SQRT2)) / (4 * (0.5 + Math.sqrt(3) / 2));

describe('computeMeanCurvature', () => {
  it('is zero on a flat grid', () => {
    const curvature = computeMeanCurvature(gridMesh(3, 3));
    expect(curvature.length).toBe(16);
    for (const value of curvature) {
      expect(Math.abs(value)).toBeLessThan(1e-12);
    }
  });

  it('is positive along a ridge', () => {
    const curvature = computeMeanCurvature(foldedPair(1));
    expect(curvature[1]).toBeCloseTo(FOLD_CURVATURE, 10);
    expect(curvature[2]).toBeCloseTo(FOLD_CURVATURE, 10);
  });

  it('is negative along a valley', () => {
    const curvature = computeMeanCurvature(foldedPair(-1));
    expect(curvature[1]).toBeCloseTo(-FOLD_CURVATURE, 10);
    expect(curvature[2]).toBeCloseTo(-FOLD_CURVATURE, 10);
  });

  it('ignores boundary edges', () => {
    const curvature = computeMeanCurvature(foldedPair(1));
    expect(curvature[0]).toBe(0);
    expect(curvature[3]).toBe(0);
  });

  it('gives unreferenced vertices zero', () => {
    const mesh = createMeshData([0, 0, 0, 1, 0, 0, 0, 1, 0, 5, 5, 5], [0, 1, 2]);
    expect(computeMeanCurvature(mesh)[3]).toBe(0);
  });
});
