/**
 * Mesh Utilities
 *
 * Shared utilities for scan cleaning:
 * - Level-gated console logging used by every stage
 * - MeshData: flat vertex/triangle arrays consumed by the classifiers
 * - Conversion between MeshData and Three.js BufferGeometry
 */

import * as THREE from 'three';

// ============================================================================
// LOGGING
// ============================================================================

export type LogLevel = 'silent' | 'info' | 'debug';

let LOG_LEVEL: LogLevel = 'info';

/** Set the process-wide log level */
export function setLogLevel(level: LogLevel): void {
  LOG_LEVEL = level;
}

export function logInfo(...args: unknown[]): void {
  if (LOG_LEVEL !== 'silent') {
    console.log(...args);
  }
}

/** Conditional debug log - only logs at 'debug' level */
export function logDebug(...args: unknown[]): void {
  if (LOG_LEVEL === 'debug') {
    console.log(...args);
  }
}

/**
 * Log a one-line summary of a computation step, e.g.
 * `[Variance stage] marked=12 thresh=0.001`
 */
export function logResult(label: string, values: Record<string, unknown>): void {
  if (LOG_LEVEL === 'silent') return;
  const parts = Object.entries(values).map(([key, value]) => `${key}=${String(value)}`);
  console.log(`[${label}] ${parts.join(' ')}`);
}

export function logTiming(label: string, startTime: number): void {
  logDebug(`${label} took ${(performance.now() - startTime).toFixed(1)}ms`);
}

// ============================================================================
// MESH DATA
// ============================================================================

/**
 * Indexed triangle mesh in flat-array form.
 * Vertex `v` is at positions[3v..3v+2]; face `f` is triangles[3f..3f+2].
 */
export interface MeshData {
  positions: Float32Array;
  triangles: Uint32Array;
  vertexCount: number;
  faceCount: number;
}

/**
 * Build MeshData from plain arrays (tests, callers with their own loader)
 */
export function createMeshData(
  positions: ArrayLike<number>,
  triangles: ArrayLike<number>
): MeshData {
  return {
    positions: Float32Array.from(positions),
    triangles: Uint32Array.from(triangles),
    vertexCount: Math.floor(positions.length / 3),
    faceCount: Math.floor(triangles.length / 3),
  };
}

/**
 * Extract MeshData from an indexed BufferGeometry.
 * Non-indexed geometry is treated as triangle soup (vertex i*3..i*3+2 form face i).
 */
export function geometryToMeshData(geometry: THREE.BufferGeometry): MeshData {
  const position = geometry.getAttribute('position');
  const vertexCount = position ? position.count : 0;

  const positions = new Float32Array(vertexCount * 3);
  for (let i = 0; i < vertexCount; i++) {
    positions[i * 3] = position.getX(i);
    positions[i * 3 + 1] = position.getY(i);
    positions[i * 3 + 2] = position.getZ(i);
  }

  const index = geometry.getIndex();
  let triangles: Uint32Array;
  if (index) {
    triangles = new Uint32Array(index.count - (index.count % 3));
    for (let i = 0; i < triangles.length; i++) {
      triangles[i] = index.getX(i);
    }
  } else {
    triangles = new Uint32Array(vertexCount - (vertexCount % 3));
    for (let i = 0; i < triangles.length; i++) {
      triangles[i] = i;
    }
  }

  return { positions, triangles, vertexCount, faceCount: triangles.length / 3 };
}

/**
 * Create an indexed BufferGeometry from MeshData
 */
export function meshDataToGeometry(mesh: MeshData): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(mesh.positions, 3));
  geometry.setIndex(new THREE.BufferAttribute(mesh.triangles, 1));
  geometry.computeBoundingBox();
  geometry.computeBoundingSphere();
  return geometry;
}

/**
 * Undirected edge key for vertex indices a, b.
 * Unique while vertexCount² stays below 2^53.
 */
export function edgeKey(a: number, b: number, vertexCount: number): number {
  return a < b ? a * vertexCount + b : b * vertexCount + a;
}
