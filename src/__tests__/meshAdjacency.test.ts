import { describe, expect, it } from 'vitest';
import { AdjacencyGraph } from '../utils/meshAdjacency';
import { InputError } from '../utils/meshErrors';
import { gridMesh } from './helpers/meshBuilders';

describe('AdjacencyGraph.fromTriangles', () => {
  const grid = gridMesh(2, 2);
  const graph = AdjacencyGraph.fromTriangles(grid.triangles, grid.vertexCount);

  it('lists sorted neighbors from shared faces', () => {
    expect(Array.from(graph.neighborsOf(4))).toEqual([0, 1, 3, 5, 7, 8]);
    expect(Array.from(graph.neighborsOf(0))).toEqual([1, 3, 4]);
    expect(Array.from(graph.neighborsOf(2))).toEqual([1, 5]);
    expect(Array.from(graph.neighborsOf(8))).toEqual([4, 5, 7]);
  });

  it('counts every undirected edge once', () => {
    expect(graph.edgeCount).toBe(16);
    expect(graph.degree(4)).toBe(6);
    expect(graph.offsets[graph.vertexCount]).toBe(32);
  });

  it('is symmetric', () => {
    for (let v = 0; v < graph.vertexCount; v++) {
      for (const n of graph.neighborsOf(v)) {
        expect(Array.from(graph.neighborsOf(n))).toContain(v);
      }
    }
  });

  it('gives unreferenced vertices no neighbors', () => {
    const isolated = AdjacencyGraph.fromTriangles(Uint32Array.from([0, 1, 2]), 4);
    expect(isolated.degree(3)).toBe(0);
    expect(isolated.neighborsOf(3).length).toBe(0);
  });

  it('drops self loops from collapsed faces', () => {
    const collapsed = AdjacencyGraph.fromTriangles(Uint32Array.from([0, 0, 1]), 2);
    expect(Array.from(collapsed.neighborsOf(0))).toEqual([1]);
    expect(Array.from(collapsed.neighborsOf(1))).toEqual([0]);
  });

  it('rejects faces referencing missing vertices', () => {
    expect(() => AdjacencyGraph.fromTriangles(Uint32Array.from([0, 1, 5]), 3)).toThrow(InputError);
  });
});

describe('AdjacencyGraph.fromNeighborLists', () => {
  it('sorts and deduplicates neighbor lists', () => {
    const graph = AdjacencyGraph.fromNeighborLists([[2, 1, 1], [0], [0]]);
    expect(Array.from(graph.neighborsOf(0))).toEqual([1, 2]);
    expect(graph.edgeCount).toBe(2);
  });

  it('reports asymmetric lists', () => {
    try {
      AdjacencyGraph.fromNeighborLists([[1], []]);
      expect.unreachable('asymmetric lists must be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(InputError);
      if (error instanceof InputError) {
        expect(error.issues).toEqual(['vertex 0 lists 1 but 1 does not list 0']);
      }
    }
  });

  it('reports self loops and out-of-range neighbors', () => {
    try {
      AdjacencyGraph.fromNeighborLists([[0], [7]]);
      expect.unreachable('invalid lists must be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(InputError);
      if (error instanceof InputError) {
        expect(error.issues).toEqual([
          'vertex 0 lists itself as a neighbor',
          'vertex 1 lists neighbor 7 outside 0..1',
        ]);
      }
    }
  });
});

describe('AdjacencyGraph constructor', () => {
  it('accepts a valid CSR layout', () => {
    const graph = new AdjacencyGraph(3, Uint32Array.from([0, 1, 3, 4]), Uint32Array.from([1, 0, 2, 1]));
    expect(Array.from(graph.neighborsOf(1))).toEqual([0, 2]);
  });

  it('rejects out-of-range and one-sided neighbors', () => {
    try {
      new AdjacencyGraph(3, Uint32Array.from([0, 2, 4, 6]), Uint32Array.from([1, 99, 0, 2, 1, 0]));
      expect.unreachable('malformed graphs must be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(InputError);
      if (error instanceof InputError) {
        expect(error.issues).toEqual([
          'vertex 0 lists neighbor 99 outside 0..2',
          'vertex 2 lists 0 but 0 does not list 2',
        ]);
      }
    }
  });

  it('rejects self loops', () => {
    expect(() => new AdjacencyGraph(2, Uint32Array.from([0, 1, 1]), Uint32Array.from([0]))).toThrow(
      'vertex 0 lists itself as a neighbor'
    );
  });

  it('rejects offsets that do not span the neighbor array', () => {
    try {
      new AdjacencyGraph(2, Uint32Array.from([1, 0, 3]), Uint32Array.from([1, 0]));
      expect.unreachable('broken offsets must be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(InputError);
      if (error instanceof InputError) {
        expect(error.issues).toEqual([
          'offsets[0] is 1, expected 0',
          'offsets[2] is 3, neighbors length is 2',
          'offsets decrease at vertex 0',
        ]);
      }
    }
  });
});
