/**
 * Face Classification
 *
 * Derives per-face reasons from the vertex reasons, then prunes islands:
 * preliminarily kept faces outside the largest kept connected component.
 *
 * A face takes the numeric maximum of its three vertex codes. The ordering
 * Curvature < Variance < Border is an artifact of code assignment, not a
 * severity ranking; it is kept as is.
 */

import { FaceReason } from './removalReasons';
import { logDebug, logResult } from './meshUtils';

// ============================================================================
// AGGREGATION
// ============================================================================

/**
 * faceReason[f] = max(reason[v1], reason[v2], reason[v3])
 */
export function aggregateFaceReasons(triangles: Uint32Array, vertexReasons: Uint8Array): Uint8Array {
  const faceCount = Math.floor(triangles.length / 3);
  const faceReasons = new Uint8Array(faceCount);

  for (let f = 0; f < faceCount; f++) {
    const r1 = vertexReasons[triangles[f * 3]];
    const r2 = vertexReasons[triangles[f * 3 + 1]];
    const r3 = vertexReasons[triangles[f * 3 + 2]];
    faceReasons[f] = Math.max(r1, r2, r3);
  }

  return faceReasons;
}

// ============================================================================
// ISLANDS
// ============================================================================

/**
 * Cluster holding the most preliminarily kept faces, ties to the lowest id.
 * Returns null when no face is kept.
 */
export function largestKeptCluster(faceReasons: Uint8Array, clusterIds: Uint32Array): number | null {
  const keptCounts = new Map<number, number>();
  for (let f = 0; f < faceReasons.length; f++) {
    if (faceReasons[f] !== FaceReason.Kept) continue;
    const id = clusterIds[f];
    keptCounts.set(id, (keptCounts.get(id) ?? 0) + 1);
  }

  let best: number | null = null;
  let bestCount = 0;
  for (const [id, count] of keptCounts) {
    if (count > bestCount || (count === bestCount && best !== null && id < best)) {
      best = id;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Mark preliminarily kept faces outside the largest kept cluster as Island.
 * Faces that already carry a reason are left untouched. Returns the number of
 * faces marked (0 when nothing is kept).
 */
export function markIslands(faceReasons: Uint8Array, clusterIds: Uint32Array): number {
  const largest = largestKeptCluster(faceReasons, clusterIds);
  if (largest === null) {
    logDebug('Island stage skipped: no face survived the vertex stages');
    return 0;
  }

  let marked = 0;
  for (let f = 0; f < faceReasons.length; f++) {
    if (faceReasons[f] === FaceReason.Kept && clusterIds[f] !== largest) {
      faceReasons[f] = FaceReason.Island;
      marked++;
    }
  }

  logResult('Island stage', { marked, largestCluster: largest });
  return marked;
}
