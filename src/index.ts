export { cleanMesh, runCleaningPipeline } from './utils/meshCleaning';
export type {
  CleanMeshOverrides,
  CleaningInputs,
  CleaningResult,
  StageName,
  StageReport,
} from './utils/meshCleaning';
export {
  markBorderRegion,
  markCurvatureOutliers,
  markVarianceOutliers,
  neighborCurvatureVariance,
} from './utils/cleaningStages';
export type { CurvatureThresholds } from './utils/cleaningStages';
export { aggregateFaceReasons, largestKeptCluster, markIslands } from './utils/faceClassification';
export { dilateRings } from './utils/ringDilation';
export type { RingDilationResult } from './utils/ringDilation';
export { AdjacencyGraph } from './utils/meshAdjacency';
export { computeMeanCurvature } from './utils/meshCurvature';
export {
  analyzeMesh,
  findBorderSeedVertices,
  findNonManifoldVertices,
  formatDiagnostics,
} from './utils/meshDiagnostics';
export type { BorderSeedOptions, MeshDiagnostics } from './utils/meshDiagnostics';
export { clusterConnectedFaces } from './utils/faceClusters';
export type { FaceClusters } from './utils/faceClusters';
export {
  CleaningConfigSchema,
  DEFAULT_CLEANING_CONFIG,
  loadCleaningConfig,
  readCleaningConfigFile,
  resolveCleaningConfig,
} from './utils/cleaningConfig';
export type { CleaningConfig, CleaningConfigInput } from './utils/cleaningConfig';
export { detectMeshFormat, loadMeshFile, parseMeshBuffer } from './utils/meshLoader';
export type { MeshFormat } from './utils/meshLoader';
export { buildCleaningReport, getOutputPath, writeCleaningReport } from './utils/cleaningReport';
export type { CleaningReport, OutputPathOptions } from './utils/cleaningReport';
export {
  FACE_REASON_KEYS,
  FaceReason,
  REASON_COLORS,
  REASON_LABELS,
  VertexReason,
  countReasons,
  reasonLegend,
} from './utils/removalReasons';
export type { FaceReasonKey, ReasonCounts, ReasonLegendEntry } from './utils/removalReasons';
export { ConfigError, InputError, LoadError, ScanMeshError } from './utils/meshErrors';
export {
  createMeshData,
  geometryToMeshData,
  meshDataToGeometry,
  setLogLevel,
} from './utils/meshUtils';
export type { LogLevel, MeshData } from './utils/meshUtils';
