/**
 * Mesh Cleaning Pipeline
 *
 * Classifies every vertex and face of a scan mesh as kept or removed for a
 * reason. Stages run in a fixed order over one vertex reason buffer:
 *
 * 1. Curvature outliers
 * 2. Neighborhood curvature variance
 * 3. Rings around the scan border
 * then faces take the max of their vertex codes, and
 * 4. Kept faces outside the largest kept component become islands
 *
 * Inputs are validated up front; nothing is computed for invalid input.
 */

import { AdjacencyGraph } from './meshAdjacency';
import type { CleaningConfig, CleaningConfigInput } from './cleaningConfig';
import { resolveCleaningConfig } from './cleaningConfig';
import { markBorderRegion, markCurvatureOutliers, markVarianceOutliers } from './cleaningStages';
import { aggregateFaceReasons, markIslands } from './faceClassification';
import type { FaceClusters } from './faceClusters';
import { clusterConnectedFaces } from './faceClusters';
import { computeMeanCurvature } from './meshCurvature';
import { findBorderSeedVertices } from './meshDiagnostics';
import type { BorderSeedOptions } from './meshDiagnostics';
import { InputError } from './meshErrors';
import type { MeshData } from './meshUtils';
import { logDebug, logInfo, logResult, logTiming } from './meshUtils';
import type { ReasonCounts } from './removalReasons';
import { countReasons } from './removalReasons';

// ============================================================================
// TYPES
// ============================================================================

export interface CleaningInputs {
  /** Flat triangle vertex indices, length 3F */
  triangles: Uint32Array;
  vertexCount: number;
  /** One curvature value per vertex */
  curvature: ArrayLike<number>;
  adjacency: AdjacencyGraph;
  /** Boundary / non-manifold vertices seeding the border stage */
  borderSeeds: Iterable<number>;
  /** Required when island removal is enabled */
  clusters?: FaceClusters;
}

export type StageName = 'curvature' | 'variance' | 'border' | 'islands';

export interface StageReport {
  stage: StageName;
  enabled: boolean;
  /** Vertices (stages 1-3) or faces (islands) newly marked */
  marked: number;
}

export interface CleaningResult {
  vertexReasons: Uint8Array;
  faceReasons: Uint8Array;
  stages: StageReport[];
  summary: {
    vertices: ReasonCounts;
    faces: ReasonCounts;
  };
}

// ============================================================================
// VALIDATION
// ============================================================================

function validateInputs(inputs: CleaningInputs, config: CleaningConfig): number[] {
  const { triangles, vertexCount, curvature, adjacency, clusters } = inputs;
  const issues: string[] = [];

  if (!Number.isInteger(vertexCount) || vertexCount <= 0) {
    issues.push(`mesh has no vertices (vertexCount=${vertexCount})`);
  }
  if (triangles.length === 0) {
    issues.push('mesh has no triangles');
  }
  if (triangles.length % 3 !== 0) {
    issues.push(`triangle index array length ${triangles.length} is not a multiple of 3`);
  }
  if (issues.length > 0) {
    throw new InputError(issues);
  }

  const faceCount = triangles.length / 3;

  for (let i = 0; i < triangles.length; i++) {
    if (triangles[i] >= vertexCount) {
      issues.push(`face ${Math.floor(i / 3)} references vertex ${triangles[i]} (vertexCount=${vertexCount})`);
      break;
    }
  }
  if (curvature.length !== vertexCount) {
    issues.push(`curvature length ${curvature.length} != vertex count ${vertexCount}`);
  }
  if (adjacency.vertexCount !== vertexCount) {
    issues.push(`adjacency covers ${adjacency.vertexCount} vertices, mesh has ${vertexCount}`);
  }

  const seeds: number[] = [];
  for (const seed of inputs.borderSeeds) {
    if (!Number.isInteger(seed) || seed < 0 || seed >= vertexCount) {
      issues.push(`border seed ${seed} outside 0..${vertexCount - 1}`);
    } else {
      seeds.push(seed);
    }
  }

  if (clusters) {
    if (clusters.clusterIds.length !== faceCount) {
      issues.push(`cluster id length ${clusters.clusterIds.length} != face count ${faceCount}`);
    } else {
      for (let f = 0; f < faceCount; f++) {
        if (clusters.clusterIds[f] >= clusters.clusterFaceCounts.length) {
          issues.push(`face ${f} has cluster id ${clusters.clusterIds[f]} with no cluster count entry`);
          break;
        }
      }
    }
  } else if (config.removeIslands) {
    issues.push('island removal is enabled but no face clusters were provided');
  }

  if (issues.length > 0) {
    throw new InputError(issues);
  }
  return seeds;
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Run the cleaning stages over precomputed inputs.
 */
export function runCleaningPipeline(
  inputs: CleaningInputs,
  configInput: CleaningConfigInput = {}
): CleaningResult {
  const config = resolveCleaningConfig(configInput);
  const seeds = validateInputs(inputs, config);
  const startTime = performance.now();

  const { triangles, vertexCount, curvature, adjacency } = inputs;
  const vertexReasons = new Uint8Array(vertexCount);
  const stages: StageReport[] = [];

  stages.push({
    stage: 'curvature',
    enabled: config.cleanByCurvature,
    marked: config.cleanByCurvature
      ? markCurvatureOutliers(vertexReasons, curvature, {
          high: config.curvHighThresh,
          low: config.curvLowThresh,
        })
      : 0,
  });

  stages.push({
    stage: 'variance',
    enabled: config.cleanByVariance,
    marked: config.cleanByVariance
      ? markVarianceOutliers(vertexReasons, curvature, adjacency, config.varianceThresh)
      : 0,
  });

  stages.push({
    stage: 'border',
    enabled: config.cleanBorders,
    marked: config.cleanBorders
      ? markBorderRegion(vertexReasons, adjacency, seeds, config.borderRings)
      : 0,
  });

  const faceReasons = aggregateFaceReasons(triangles, vertexReasons);

  let islandsMarked = 0;
  if (config.removeIslands && inputs.clusters) {
    islandsMarked = markIslands(faceReasons, inputs.clusters.clusterIds);
  }
  stages.push({ stage: 'islands', enabled: config.removeIslands, marked: islandsMarked });

  for (const report of stages) {
    if (!report.enabled) logDebug(`Stage '${report.stage}' disabled`);
  }

  const summary = {
    vertices: countReasons(vertexReasons),
    faces: countReasons(faceReasons),
  };
  logResult('Cleaning summary', {
    keptVertices: summary.vertices.Kept,
    vertices: vertexCount,
    keptFaces: summary.faces.Kept,
    faces: faceReasons.length,
  });
  logTiming('Cleaning pipeline', startTime);

  return { vertexReasons, faceReasons, stages, summary };
}

export interface CleanMeshOverrides {
  /** Externally computed curvature (defaults to discrete mean curvature) */
  curvature?: ArrayLike<number>;
  /** Externally detected border seeds (defaults to boundary + non-manifold vertices) */
  borderSeeds?: Iterable<number>;
  borderSeedOptions?: BorderSeedOptions;
}

/**
 * Compute adjacency, curvature, border seeds and face clusters for a mesh,
 * then run the cleaning pipeline.
 */
export function cleanMesh(
  mesh: MeshData,
  configInput: CleaningConfigInput = {},
  overrides: CleanMeshOverrides = {}
): CleaningResult {
  const config = resolveCleaningConfig(configInput);
  if (mesh.vertexCount === 0 || mesh.faceCount === 0) {
    throw new InputError([`mesh is empty (vertices=${mesh.vertexCount}, faces=${mesh.faceCount})`]);
  }

  logInfo(`Cleaning mesh: ${mesh.vertexCount} vertices, ${mesh.faceCount} faces`);

  const adjacency = AdjacencyGraph.fromTriangles(mesh.triangles, mesh.vertexCount);
  const curvature = overrides.curvature ?? computeMeanCurvature(mesh);
  const borderSeeds = overrides.borderSeeds ?? findBorderSeedVertices(mesh, overrides.borderSeedOptions);
  const clusters = config.removeIslands
    ? clusterConnectedFaces(mesh.triangles, mesh.vertexCount)
    : undefined;

  return runCleaningPipeline(
    {
      triangles: mesh.triangles,
      vertexCount: mesh.vertexCount,
      curvature,
      adjacency,
      borderSeeds,
      clusters,
    },
    config
  );
}
