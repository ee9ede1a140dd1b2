import { describe, expect, it } from 'vitest';
import { clusterConnectedFaces } from '../utils/faceClusters';
import { concatMeshes, gridMesh } from './helpers/meshBuilders';

describe('clusterConnectedFaces', () => {
  it('joins faces sharing an edge', () => {
    const { clusterIds, clusterFaceCounts } = clusterConnectedFaces(
      Uint32Array.from([0, 1, 2, 2, 1, 3, 4, 5, 6]),
      7
    );
    expect(Array.from(clusterIds)).toEqual([0, 0, 1]);
    expect(Array.from(clusterFaceCounts)).toEqual([2, 1]);
  });

  it('keeps faces touching at a single vertex apart', () => {
    const { clusterIds } = clusterConnectedFaces(Uint32Array.from([0, 1, 2, 0, 3, 4]), 5);
    expect(Array.from(clusterIds)).toEqual([0, 1]);
  });

  it('numbers clusters by their lowest face index', () => {
    const { clusterIds, clusterFaceCounts } = clusterConnectedFaces(
      Uint32Array.from([0, 1, 2, 5, 6, 7, 2, 1, 3]),
      8
    );
    expect(Array.from(clusterIds)).toEqual([0, 1, 0]);
    expect(Array.from(clusterFaceCounts)).toEqual([2, 1]);
  });

  it('finds both sheets of a two-part mesh', () => {
    const mesh = concatMeshes(gridMesh(3, 3), gridMesh(1, 1, 10));
    const { clusterIds, clusterFaceCounts } = clusterConnectedFaces(mesh.triangles, mesh.vertexCount);
    expect(Array.from(clusterFaceCounts)).toEqual([18, 2]);
    expect(clusterIds[17]).toBe(0);
    expect(clusterIds[18]).toBe(1);
  });
});
