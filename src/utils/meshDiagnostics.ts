/**
 * Mesh Diagnostics & Border Seeds
 *
 * Edge-use analysis of an indexed scan mesh. Scans are open surfaces, so the
 * boundary edges (used by a single face) trace the scan rim; non-manifold
 * edges and vertices mark stitching artifacts. Their vertices seed the border
 * cleaning stage.
 */

import * as THREE from 'three';
import type { MeshData } from './meshUtils';
import { edgeKey } from './meshUtils';

export interface MeshDiagnostics {
  vertexCount: number;
  faceCount: number;
  boundaryEdges: number;
  nonManifoldEdges: number;
  nonManifoldVertices: number;
  degenerateFaces: number;
  isolatedVertices: number;
  isClosed: boolean;
  isManifold: boolean;
  issues: string[];
}

export interface BorderSeedOptions {
  /** Include endpoints of edges used by exactly one face */
  boundaryEdges?: boolean;
  /** Include endpoints of edges used by more than two faces */
  nonManifoldEdges?: boolean;
  /** Include vertices whose faces do not form a single fan */
  nonManifoldVertices?: boolean;
}

interface EdgeUse {
  a: number;
  b: number;
  count: number;
}

// ============================================================================
// EDGE & FAN ANALYSIS
// ============================================================================

function countEdgeUses(mesh: MeshData): Map<number, EdgeUse> {
  const { triangles, faceCount, vertexCount } = mesh;
  const edges = new Map<number, EdgeUse>();

  for (let f = 0; f < faceCount; f++) {
    const a = triangles[f * 3];
    const b = triangles[f * 3 + 1];
    const c = triangles[f * 3 + 2];

    for (const [v1, v2] of [[a, b], [b, c], [c, a]] as [number, number][]) {
      const key = edgeKey(v1, v2, vertexCount);
      const use = edges.get(key);
      if (use) {
        use.count++;
      } else {
        edges.set(key, { a: Math.min(v1, v2), b: Math.max(v1, v2), count: 1 });
      }
    }
  }

  return edges;
}

/**
 * Vertex-to-face incidence in CSR form
 */
function buildVertexFaces(mesh: MeshData): { offsets: Uint32Array; faces: Uint32Array } {
  const { triangles, faceCount, vertexCount } = mesh;
  const offsets = new Uint32Array(vertexCount + 1);

  for (let i = 0; i < faceCount * 3; i++) {
    offsets[triangles[i] + 1]++;
  }
  for (let v = 0; v < vertexCount; v++) {
    offsets[v + 1] += offsets[v];
  }

  const cursor = offsets.slice(0, vertexCount);
  const faces = new Uint32Array(faceCount * 3);
  for (let f = 0; f < faceCount; f++) {
    for (let k = 0; k < 3; k++) {
      const v = triangles[f * 3 + k];
      faces[cursor[v]++] = f;
    }
  }

  return { offsets, faces };
}

/**
 * Vertices whose incident faces split into more than one edge-connected fan
 * (e.g. two surface sheets touching at a single vertex).
 */
export function findNonManifoldVertices(mesh: MeshData): number[] {
  const { triangles, vertexCount } = mesh;
  const { offsets, faces } = buildVertexFaces(mesh);
  const result: number[] = [];

  for (let v = 0; v < vertexCount; v++) {
    const start = offsets[v];
    const count = offsets[v + 1] - start;
    if (count < 2) continue;

    // Local union-find over the faces around v
    const parent = new Int32Array(count);
    for (let i = 0; i < count; i++) parent[i] = i;
    const find = (x: number): number => {
      while (parent[x] !== x) {
        parent[x] = parent[parent[x]];
        x = parent[x];
      }
      return x;
    };

    // Faces sharing the spoke (v, u) belong to the same fan
    const spokeOwner = new Map<number, number>();
    for (let i = 0; i < count; i++) {
      const f = faces[start + i];
      for (let k = 0; k < 3; k++) {
        const u = triangles[f * 3 + k];
        if (u === v) continue;
        const owner = spokeOwner.get(u);
        if (owner === undefined) {
          spokeOwner.set(u, i);
        } else {
          const rootA = find(owner);
          const rootB = find(i);
          if (rootA !== rootB) parent[rootA] = rootB;
        }
      }
    }

    const root = find(0);
    for (let i = 1; i < count; i++) {
      if (find(i) !== root) {
        result.push(v);
        break;
      }
    }
  }

  return result;
}

// ============================================================================
// BORDER SEEDS
// ============================================================================

/**
 * Seed vertices for border dilation, sorted ascending.
 */
export function findBorderSeedVertices(mesh: MeshData, options: BorderSeedOptions = {}): number[] {
  const {
    boundaryEdges = true,
    nonManifoldEdges = true,
    nonManifoldVertices = true,
  } = options;

  const seeds = new Set<number>();

  if (boundaryEdges || nonManifoldEdges) {
    for (const { a, b, count } of countEdgeUses(mesh).values()) {
      if ((boundaryEdges && count === 1) || (nonManifoldEdges && count > 2)) {
        seeds.add(a);
        seeds.add(b);
      }
    }
  }

  if (nonManifoldVertices) {
    for (const v of findNonManifoldVertices(mesh)) {
      seeds.add(v);
    }
  }

  return Array.from(seeds).sort((x, y) => x - y);
}

// ============================================================================
// DIAGNOSTICS
// ============================================================================

/**
 * Analyze a mesh for common scan issues
 */
export function analyzeMesh(mesh: MeshData): MeshDiagnostics {
  const { positions, triangles, vertexCount, faceCount } = mesh;
  const issues: string[] = [];

  let boundaryEdges = 0;
  let nonManifoldEdges = 0;
  for (const { count } of countEdgeUses(mesh).values()) {
    if (count === 1) {
      boundaryEdges++;
    } else if (count > 2) {
      nonManifoldEdges++;
    }
  }

  const nonManifoldVertices = findNonManifoldVertices(mesh).length;

  // Detect degenerate faces (zero area)
  let degenerateFaces = 0;
  const v0 = new THREE.Vector3();
  const v1 = new THREE.Vector3();
  const v2 = new THREE.Vector3();
  const edge1 = new THREE.Vector3();
  const edge2 = new THREE.Vector3();
  const cross = new THREE.Vector3();

  for (let f = 0; f < faceCount; f++) {
    v0.fromArray(positions, triangles[f * 3] * 3);
    v1.fromArray(positions, triangles[f * 3 + 1] * 3);
    v2.fromArray(positions, triangles[f * 3 + 2] * 3);
    edge1.subVectors(v1, v0);
    edge2.subVectors(v2, v0);
    cross.crossVectors(edge1, edge2);
    if (cross.length() * 0.5 < 1e-10) {
      degenerateFaces++;
    }
  }

  // Detect isolated vertices (not referenced by any face)
  const referenced = new Uint8Array(vertexCount);
  for (let i = 0; i < faceCount * 3; i++) {
    referenced[triangles[i]] = 1;
  }
  let isolatedVertices = 0;
  for (let v = 0; v < vertexCount; v++) {
    if (!referenced[v]) isolatedVertices++;
  }

  if (boundaryEdges > 0) {
    issues.push(`${boundaryEdges} boundary edges (open surface)`);
  }
  if (nonManifoldEdges > 0) {
    issues.push(`${nonManifoldEdges} non-manifold edges`);
  }
  if (nonManifoldVertices > 0) {
    issues.push(`${nonManifoldVertices} non-manifold vertices`);
  }
  if (degenerateFaces > 0) {
    issues.push(`${degenerateFaces} degenerate (zero-area) faces`);
  }
  if (isolatedVertices > 0) {
    issues.push(`${isolatedVertices} isolated vertices`);
  }

  const isClosed = boundaryEdges === 0;
  const isManifold = nonManifoldEdges === 0 && nonManifoldVertices === 0;

  return {
    vertexCount,
    faceCount,
    boundaryEdges,
    nonManifoldEdges,
    nonManifoldVertices,
    degenerateFaces,
    isolatedVertices,
    isClosed,
    isManifold,
    issues,
  };
}

/**
 * Three-line scan summary. An open rim is normal for a scan, so only the
 * remaining problems are listed as defects.
 */
export function formatDiagnostics(diagnostics: MeshDiagnostics): string {
  const topology = diagnostics.isManifold ? 'manifold' : 'non-manifold';
  const rim = diagnostics.isClosed ? 'closed' : `open, ${diagnostics.boundaryEdges} rim edges`;

  const defects = ([
    [diagnostics.nonManifoldEdges, 'non-manifold edges'],
    [diagnostics.nonManifoldVertices, 'non-manifold vertices'],
    [diagnostics.degenerateFaces, 'degenerate faces'],
    [diagnostics.isolatedVertices, 'isolated vertices'],
  ] as const)
    .filter(([count]) => count > 0)
    .map(([count, label]) => `${count} ${label}`);

  return [
    `Mesh: ${diagnostics.vertexCount} vertices, ${diagnostics.faceCount} faces`,
    `Topology: ${topology}, ${rim}`,
    `Defects: ${defects.length > 0 ? defects.join(', ') : 'none'}`,
  ].join('\n');
}
