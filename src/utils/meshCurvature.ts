/**
 * Mean Curvature
 *
 * Discrete per-vertex mean curvature from edge dihedral angles:
 *
 *   H(v) = 3 * Σ_{e ∋ v} |e| θ_e / (4 * A(v))
 *
 * θ_e is the signed angle between the normals of the two faces sharing e
 * (positive where the surface folds away from the normal side, i.e. convex),
 * A(v) the total area of the faces around v. Boundary and non-manifold edges
 * contribute nothing.
 */

import * as THREE from 'three';
import type { MeshData } from './meshUtils';
import { edgeKey, logResult, logTiming } from './meshUtils';

interface EdgeRecord {
  /** Edge start as oriented in the first face that used it */
  from: number;
  to: number;
  faces: number[];
}

/**
 * Face normals (unit, zero for degenerate faces) and areas
 */
function computeFaceFrames(mesh: MeshData): { normals: Float64Array; areas: Float64Array } {
  const { positions, triangles, faceCount } = mesh;
  const normals = new Float64Array(faceCount * 3);
  const areas = new Float64Array(faceCount);

  const vA = new THREE.Vector3();
  const vB = new THREE.Vector3();
  const vC = new THREE.Vector3();
  const edge1 = new THREE.Vector3();
  const edge2 = new THREE.Vector3();
  const normal = new THREE.Vector3();

  for (let f = 0; f < faceCount; f++) {
    vA.fromArray(positions, triangles[f * 3] * 3);
    vB.fromArray(positions, triangles[f * 3 + 1] * 3);
    vC.fromArray(positions, triangles[f * 3 + 2] * 3);

    edge1.subVectors(vB, vA);
    edge2.subVectors(vC, vA);
    normal.crossVectors(edge1, edge2);
    const length = normal.length();
    areas[f] = length * 0.5;
    if (length > 0) normal.divideScalar(length);

    normals[f * 3] = normal.x;
    normals[f * 3 + 1] = normal.y;
    normals[f * 3 + 2] = normal.z;
  }

  return { normals, areas };
}

function collectEdges(mesh: MeshData): Map<number, EdgeRecord> {
  const { triangles, faceCount, vertexCount } = mesh;
  const edges = new Map<number, EdgeRecord>();

  for (let f = 0; f < faceCount; f++) {
    for (let k = 0; k < 3; k++) {
      const from = triangles[f * 3 + k];
      const to = triangles[f * 3 + ((k + 1) % 3)];
      const key = edgeKey(from, to, vertexCount);
      const record = edges.get(key);
      if (record) {
        record.faces.push(f);
      } else {
        edges.set(key, { from, to, faces: [f] });
      }
    }
  }

  return edges;
}

/**
 * Whether face f traverses the edge from → to in its winding order
 */
function usesEdgeForward(triangles: Uint32Array, face: number, from: number, to: number): boolean {
  for (let k = 0; k < 3; k++) {
    if (triangles[face * 3 + k] === from && triangles[face * 3 + ((k + 1) % 3)] === to) {
      return true;
    }
  }
  return false;
}

/**
 * Compute the mean curvature of every vertex.
 * Vertices without incident faces (or only zero-area faces) get 0.
 */
export function computeMeanCurvature(mesh: MeshData): Float64Array {
  const startTime = performance.now();
  const { positions, triangles, vertexCount, faceCount } = mesh;

  const { normals, areas } = computeFaceFrames(mesh);
  const edges = collectEdges(mesh);

  const angleSum = new Float64Array(vertexCount);
  const starArea = new Float64Array(vertexCount);

  for (let f = 0; f < faceCount; f++) {
    starArea[triangles[f * 3]] += areas[f];
    starArea[triangles[f * 3 + 1]] += areas[f];
    starArea[triangles[f * 3 + 2]] += areas[f];
  }

  const n1 = new THREE.Vector3();
  const n2 = new THREE.Vector3();
  const axis = new THREE.Vector3();
  const crossed = new THREE.Vector3();
  const pFrom = new THREE.Vector3();
  const pTo = new THREE.Vector3();
  let interiorEdges = 0;

  for (const { from, to, faces } of edges.values()) {
    if (faces.length !== 2) continue;
    interiorEdges++;

    const [f1, f2] = faces;
    n1.fromArray(normals, f1 * 3);
    n2.fromArray(normals, f2 * 3);
    // Consistently wound neighbors traverse the shared edge in opposite directions
    if (usesEdgeForward(triangles, f2, from, to)) {
      n2.negate();
    }

    pFrom.fromArray(positions, from * 3);
    pTo.fromArray(positions, to * 3);
    axis.subVectors(pTo, pFrom);
    const length = axis.length();
    if (length === 0) continue;
    axis.divideScalar(length);

    crossed.crossVectors(n1, n2);
    const theta = Math.atan2(crossed.dot(axis), n1.dot(n2));

    angleSum[from] += length * theta;
    angleSum[to] += length * theta;
  }

  const curvature = new Float64Array(vertexCount);
  let min = Infinity;
  let max = -Infinity;
  for (let v = 0; v < vertexCount; v++) {
    curvature[v] = starArea[v] > 0 ? (3 * angleSum[v]) / (4 * starArea[v]) : 0;
    if (curvature[v] < min) min = curvature[v];
    if (curvature[v] > max) max = curvature[v];
  }

  logResult('Mean curvature', {
    vertices: vertexCount,
    interiorEdges,
    min: vertexCount > 0 ? min.toFixed(4) : 'n/a',
    max: vertexCount > 0 ? max.toFixed(4) : 'n/a',
  });
  logTiming('Mean curvature', startTime);

  return curvature;
}
