/**
 * Ring Dilation
 *
 * Grows a seed vertex set one adjacency hop per ring. After k rings the mask
 * holds exactly the vertices within graph distance ≤ k of a seed. Each ring
 * only expands the frontier added by the previous ring, so a single ring
 * never chains more than one hop.
 */

import type { AdjacencyGraph } from './meshAdjacency';

export interface RingDilationResult {
  /** 1 for vertices within `rings` hops of a seed */
  mask: Uint8Array;
  /** Hop distance from the nearest seed, -1 outside the mask */
  distance: Int32Array;
  /** Number of vertices in the mask */
  size: number;
}

/**
 * Dilate a seed set by `rings` hops over the adjacency graph.
 * Seeds outside 0..vertexCount-1 are the caller's responsibility to reject.
 */
export function dilateRings(
  graph: AdjacencyGraph,
  seeds: Iterable<number>,
  rings: number
): RingDilationResult {
  const mask = new Uint8Array(graph.vertexCount);
  const distance = new Int32Array(graph.vertexCount).fill(-1);

  let frontier: number[] = [];
  for (const seed of seeds) {
    if (mask[seed]) continue;
    mask[seed] = 1;
    distance[seed] = 0;
    frontier.push(seed);
  }
  let size = frontier.length;

  for (let ring = 1; ring <= rings && frontier.length > 0; ring++) {
    const next: number[] = [];
    for (const vertex of frontier) {
      const start = graph.offsets[vertex];
      const end = graph.offsets[vertex + 1];
      for (let i = start; i < end; i++) {
        const neighbor = graph.neighbors[i];
        if (mask[neighbor]) continue;
        mask[neighbor] = 1;
        distance[neighbor] = ring;
        next.push(neighbor);
      }
    }
    size += next.length;
    frontier = next;
  }

  return { mask, distance, size };
}
