/**
 * Mesh Loader
 *
 * Reads scan meshes (.ply, .stl) into MeshData. STL files are triangle soup,
 * so their vertices are merged into an indexed mesh before topology is used.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as THREE from 'three';
import { PLYLoader, STLLoader, mergeVertices } from 'three-stdlib';
import { LoadError } from './meshErrors';
import type { MeshData } from './meshUtils';
import { geometryToMeshData, logDebug, logInfo } from './meshUtils';

export type MeshFormat = 'ply' | 'stl';

const FORMATS_BY_EXTENSION: Record<string, MeshFormat> = {
  '.ply': 'ply',
  '.stl': 'stl',
};

export function detectMeshFormat(path: string): MeshFormat | null {
  return FORMATS_BY_EXTENSION[extname(path).toLowerCase()] ?? null;
}

/**
 * Merge coincident STL vertices. Normals and colors are per-face in STL and
 * would keep vertices apart, so only positions are kept.
 */
function indexTriangleSoup(geometry: THREE.BufferGeometry): THREE.BufferGeometry {
  const soup = new THREE.BufferGeometry();
  soup.setAttribute('position', geometry.getAttribute('position'));

  soup.computeBoundingBox();
  const size = new THREE.Vector3();
  soup.boundingBox?.getSize(size);
  const meshScale = Math.max(size.x, size.y, size.z);

  // Tolerance relative to mesh size with a floor for tiny meshes
  const mergeTolerance = Math.max(meshScale * 0.000001, 1e-6);
  const merged = mergeVertices(soup, mergeTolerance);
  logDebug(`Merged STL vertices: ${soup.getAttribute('position').count} -> ${merged.getAttribute('position').count}`);
  return merged;
}

/**
 * Parse an in-memory mesh file.
 * `source` only labels errors.
 */
export function parseMeshBuffer(buffer: ArrayBuffer, format: MeshFormat, source = '<buffer>'): MeshData {
  let geometry: THREE.BufferGeometry;
  try {
    if (format === 'ply') {
      geometry = new PLYLoader().parse(buffer);
    } else {
      geometry = indexTriangleSoup(new STLLoader().parse(buffer));
    }
  } catch (error) {
    throw new LoadError(`Corrupt ${format.toUpperCase()} data`, source, error);
  }

  // Both loaders index real faces; an unindexed result is a bare vertex list
  const hasFaces = geometry.getIndex() !== null;
  const mesh = geometryToMeshData(geometry);
  geometry.dispose();

  if (mesh.vertexCount === 0) {
    throw new LoadError('No vertices found in mesh', source);
  }
  if (!hasFaces || mesh.faceCount === 0) {
    // Point clouds would need surface reconstruction first
    throw new LoadError('No triangles found in mesh (point cloud input is not supported)', source);
  }

  return mesh;
}

/**
 * Load a .ply or .stl mesh file
 */
export async function loadMeshFile(path: string): Promise<MeshData> {
  const format = detectMeshFormat(path);
  if (!format) {
    throw new LoadError(`Unsupported mesh format '${extname(path) || '(none)'}'`, path);
  }

  logInfo(`Loading mesh from ${path}...`);

  let file: Buffer;
  try {
    file = await readFile(path);
  } catch (error) {
    throw new LoadError('Cannot read mesh file', path, error);
  }

  const buffer = new ArrayBuffer(file.byteLength);
  new Uint8Array(buffer).set(file);
  const mesh = parseMeshBuffer(buffer, format, path);
  logInfo(`Loaded ${mesh.vertexCount} vertices, ${mesh.faceCount} faces`);
  return mesh;
}
