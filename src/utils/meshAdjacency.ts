/**
 * Vertex Adjacency
 *
 * Flattened (CSR) vertex-to-neighbor graph. Neighbors of vertex v live in
 * neighbors[offsets[v] .. offsets[v + 1]), sorted ascending without
 * duplicates or self loops. The graph is symmetric and read-only once built.
 */

import { InputError } from './meshErrors';

export class AdjacencyGraph {
  public readonly vertexCount: number;
  public readonly offsets: Uint32Array;
  public readonly neighbors: Uint32Array;

  constructor(vertexCount: number, offsets: Uint32Array, neighbors: Uint32Array) {
    if (offsets.length !== vertexCount + 1) {
      throw new InputError([`offsets length ${offsets.length} != vertexCount + 1 (${vertexCount + 1})`]);
    }
    this.vertexCount = vertexCount;
    this.offsets = offsets;
    this.neighbors = neighbors;
    this.validate();
  }

  /**
   * Check the CSR layout, then that every neighbor is in range, not the
   * vertex itself, and lists the vertex back.
   */
  private validate(): void {
    const { vertexCount, offsets, neighbors } = this;
    const layoutIssues: string[] = [];

    if (offsets[0] !== 0) {
      layoutIssues.push(`offsets[0] is ${offsets[0]}, expected 0`);
    }
    if (offsets[vertexCount] !== neighbors.length) {
      layoutIssues.push(`offsets[${vertexCount}] is ${offsets[vertexCount]}, neighbors length is ${neighbors.length}`);
    }
    for (let v = 0; v < vertexCount; v++) {
      if (offsets[v + 1] < offsets[v]) {
        layoutIssues.push(`offsets decrease at vertex ${v}`);
      }
    }
    // Neighbor ranges cannot be read from a broken layout
    if (layoutIssues.length > 0) {
      throw new InputError(layoutIssues);
    }

    const issues: string[] = [];
    for (let v = 0; v < vertexCount; v++) {
      for (let i = offsets[v]; i < offsets[v + 1]; i++) {
        const n = neighbors[i];
        if (n >= vertexCount) {
          issues.push(`vertex ${v} lists neighbor ${n} outside 0..${vertexCount - 1}`);
        } else if (n === v) {
          issues.push(`vertex ${v} lists itself as a neighbor`);
        } else if (!this.neighborsOf(n).includes(v)) {
          issues.push(`vertex ${v} lists ${n} but ${n} does not list ${v}`);
        }
      }
    }
    if (issues.length > 0) {
      throw new InputError(issues);
    }
  }

  /**
   * Build the graph from a flat triangle index array.
   * Every vertex gets an entry; vertices no face references have no neighbors.
   */
  static fromTriangles(triangles: Uint32Array, vertexCount: number): AdjacencyGraph {
    const faceCount = Math.floor(triangles.length / 3);

    const neighborSets: Set<number>[] = new Array(vertexCount);
    for (let i = 0; i < vertexCount; i++) {
      neighborSets[i] = new Set();
    }

    const link = (a: number, b: number) => {
      if (a === b) return;
      neighborSets[a].add(b);
      neighborSets[b].add(a);
    };

    for (let f = 0; f < faceCount; f++) {
      const a = triangles[f * 3];
      const b = triangles[f * 3 + 1];
      const c = triangles[f * 3 + 2];
      if (a >= vertexCount || b >= vertexCount || c >= vertexCount) {
        throw new InputError([`face ${f} references a vertex outside 0..${vertexCount - 1}`]);
      }
      link(a, b);
      link(b, c);
      link(c, a);
    }

    return AdjacencyGraph.fromSets(neighborSets);
  }

  /**
   * Build the graph from explicit per-vertex neighbor lists.
   * The lists must be symmetric and in range.
   */
  static fromNeighborLists(lists: ReadonlyArray<Iterable<number>>): AdjacencyGraph {
    const vertexCount = lists.length;
    const neighborSets = lists.map((list) => new Set(list));
    const issues: string[] = [];

    for (let v = 0; v < vertexCount; v++) {
      for (const n of neighborSets[v]) {
        if (!Number.isInteger(n) || n < 0 || n >= vertexCount) {
          issues.push(`vertex ${v} lists neighbor ${n} outside 0..${vertexCount - 1}`);
        } else if (n === v) {
          issues.push(`vertex ${v} lists itself as a neighbor`);
        } else if (!neighborSets[n].has(v)) {
          issues.push(`vertex ${v} lists ${n} but ${n} does not list ${v}`);
        }
      }
    }
    if (issues.length > 0) {
      throw new InputError(issues);
    }

    return AdjacencyGraph.fromSets(neighborSets);
  }

  private static fromSets(neighborSets: Set<number>[]): AdjacencyGraph {
    const vertexCount = neighborSets.length;

    const offsets = new Uint32Array(vertexCount + 1);
    let total = 0;
    for (let i = 0; i < vertexCount; i++) {
      offsets[i] = total;
      total += neighborSets[i].size;
    }
    offsets[vertexCount] = total;

    const neighbors = new Uint32Array(total);
    for (let i = 0; i < vertexCount; i++) {
      const sorted = Uint32Array.from(neighborSets[i]).sort();
      neighbors.set(sorted, offsets[i]);
    }

    return new AdjacencyGraph(vertexCount, offsets, neighbors);
  }

  degree(vertex: number): number {
    return this.offsets[vertex + 1] - this.offsets[vertex];
  }

  /** Neighbors of a vertex as a view into the shared neighbor array */
  neighborsOf(vertex: number): Uint32Array {
    return this.neighbors.subarray(this.offsets[vertex], this.offsets[vertex + 1]);
  }

  /** Total number of undirected edges */
  get edgeCount(): number {
    return this.neighbors.length / 2;
  }
}
