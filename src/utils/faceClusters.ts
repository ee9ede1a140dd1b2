/**
 * Face Connected Components
 *
 * Partitions faces into edge-connected components. Two faces belong to the
 * same cluster when they share an edge (two vertex indices); faces touching
 * only at a vertex stay apart.
 */

import { edgeKey, logResult } from './meshUtils';

export interface FaceClusters {
  /** Cluster id of each face, dense 0..clusterCount-1 */
  clusterIds: Uint32Array;
  /** Number of faces in each cluster */
  clusterFaceCounts: Uint32Array;
}

/**
 * Cluster faces with union-find (path compression + union by size).
 * Cluster ids follow the order of each cluster's lowest face index.
 */
export function clusterConnectedFaces(triangles: Uint32Array, vertexCount: number): FaceClusters {
  const faceCount = Math.floor(triangles.length / 3);

  const parent = new Uint32Array(faceCount);
  const size = new Uint32Array(faceCount).fill(1);
  for (let f = 0; f < faceCount; f++) {
    parent[f] = f;
  }

  function find(x: number): number {
    let root = x;
    while (parent[root] !== root) root = parent[root];
    while (parent[x] !== root) {
      const next = parent[x];
      parent[x] = root;
      x = next;
    }
    return root;
  }

  function union(a: number, b: number): void {
    let rootA = find(a);
    let rootB = find(b);
    if (rootA === rootB) return;
    if (size[rootA] < size[rootB]) {
      [rootA, rootB] = [rootB, rootA];
    }
    parent[rootB] = rootA;
    size[rootA] += size[rootB];
  }

  // First face seen on each edge; later faces on the same edge join it
  const edgeOwner = new Map<number, number>();
  for (let f = 0; f < faceCount; f++) {
    const a = triangles[f * 3];
    const b = triangles[f * 3 + 1];
    const c = triangles[f * 3 + 2];

    for (const [v1, v2] of [[a, b], [b, c], [c, a]] as [number, number][]) {
      const key = edgeKey(v1, v2, vertexCount);
      const owner = edgeOwner.get(key);
      if (owner === undefined) {
        edgeOwner.set(key, f);
      } else {
        union(owner, f);
      }
    }
  }

  const clusterIds = new Uint32Array(faceCount);
  const idByRoot = new Map<number, number>();
  const counts: number[] = [];

  for (let f = 0; f < faceCount; f++) {
    const root = find(f);
    let id = idByRoot.get(root);
    if (id === undefined) {
      id = counts.length;
      idByRoot.set(root, id);
      counts.push(0);
    }
    clusterIds[f] = id;
    counts[id]++;
  }

  logResult('Face clusters', { faces: faceCount, clusters: counts.length });

  return { clusterIds, clusterFaceCounts: Uint32Array.from(counts) };
}
