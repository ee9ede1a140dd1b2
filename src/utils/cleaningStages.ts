/**
 * Vertex Cleaning Stages
 *
 * Each stage writes into the shared vertex reason buffer and only ever moves a
 * vertex out of Kept: a vertex marked by an earlier stage keeps its reason.
 * Every stage returns how many vertices it marked.
 */

import type { AdjacencyGraph } from './meshAdjacency';
import { VertexReason } from './removalReasons';
import { dilateRings } from './ringDilation';
import { logResult } from './meshUtils';

export interface CurvatureThresholds {
  high: number;
  low: number;
}

// ============================================================================
// STAGE 1: CURVATURE
// ============================================================================

/**
 * Mark vertices whose curvature lies above `high` or below `low`.
 */
export function markCurvatureOutliers(
  reasons: Uint8Array,
  curvature: ArrayLike<number>,
  { high, low }: CurvatureThresholds
): number {
  let marked = 0;
  for (let v = 0; v < reasons.length; v++) {
    const value = curvature[v];
    if ((value > high || value < low) && reasons[v] === VertexReason.Kept) {
      reasons[v] = VertexReason.Curvature;
      marked++;
    }
  }

  logResult('Curvature stage', { marked, high, low });
  return marked;
}

// ============================================================================
// STAGE 2: LOCAL VARIANCE
// ============================================================================

/**
 * Population variance of the curvature of v's direct neighbors (v excluded).
 * A vertex without neighbors has variance 0.
 */
export function neighborCurvatureVariance(
  graph: AdjacencyGraph,
  curvature: ArrayLike<number>,
  vertex: number
): number {
  const start = graph.offsets[vertex];
  const end = graph.offsets[vertex + 1];
  const count = end - start;
  if (count === 0) return 0;

  let sum = 0;
  for (let i = start; i < end; i++) {
    sum += curvature[graph.neighbors[i]];
  }
  const mean = sum / count;

  let squared = 0;
  for (let i = start; i < end; i++) {
    const d = curvature[graph.neighbors[i]] - mean;
    squared += d * d;
  }
  return squared / count;
}

/**
 * Mark still-kept vertices whose neighborhood curvature variance exceeds
 * `threshold`.
 */
export function markVarianceOutliers(
  reasons: Uint8Array,
  curvature: ArrayLike<number>,
  graph: AdjacencyGraph,
  threshold: number
): number {
  let marked = 0;
  for (let v = 0; v < reasons.length; v++) {
    if (reasons[v] !== VertexReason.Kept) continue;
    if (neighborCurvatureVariance(graph, curvature, v) > threshold) {
      reasons[v] = VertexReason.Variance;
      marked++;
    }
  }

  logResult('Variance stage', { marked, threshold });
  return marked;
}

// ============================================================================
// STAGE 3: BORDER
// ============================================================================

/**
 * Mark still-kept vertices within `rings` hops of a border seed.
 * `rings = 0` marks the seeds themselves.
 */
export function markBorderRegion(
  reasons: Uint8Array,
  graph: AdjacencyGraph,
  seeds: Iterable<number>,
  rings: number
): number {
  const { mask, size } = dilateRings(graph, seeds, rings);

  let marked = 0;
  for (let v = 0; v < reasons.length; v++) {
    if (mask[v] && reasons[v] === VertexReason.Kept) {
      reasons[v] = VertexReason.Border;
      marked++;
    }
  }

  logResult('Border stage', { marked, rings, region: size });
  return marked;
}
