/**
 * Cleaning Report
 *
 * JSON export of a cleaning run: final reason codes, per-stage counts and the
 * code legend a renderer needs to color faces.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { CleaningConfig } from './cleaningConfig';
import type { CleaningResult, StageReport } from './meshCleaning';
import type { ReasonCounts, ReasonLegendEntry } from './removalReasons';
import { reasonLegend } from './removalReasons';
import { logInfo } from './meshUtils';

export interface CleaningReport {
  source: string;
  generatedAt: string;
  config: CleaningConfig;
  vertexCount: number;
  faceCount: number;
  stages: StageReport[];
  summary: {
    vertices: ReasonCounts;
    faces: ReasonCounts;
  };
  legend: ReasonLegendEntry[];
  vertexReasons: number[];
  faceReasons: number[];
}

export function buildCleaningReport(
  result: CleaningResult,
  options: { source: string; config: CleaningConfig; generatedAt?: Date }
): CleaningReport {
  return {
    source: options.source,
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    config: options.config,
    vertexCount: result.vertexReasons.length,
    faceCount: result.faceReasons.length,
    stages: result.stages,
    summary: result.summary,
    legend: reasonLegend(),
    vertexReasons: Array.from(result.vertexReasons),
    faceReasons: Array.from(result.faceReasons),
  };
}

export interface OutputPathOptions {
  outputDir?: string;
  /** Optional subdirectory grouping outputs of one kind */
  outputType?: string;
  fileType?: string;
}

/**
 * Output file path for an input mesh: `<outputDir>[/<outputType>]/<folder>_<name>.<fileType>`,
 * where folder is the input's parent directory name. Inputs without a parent
 * directory map to `<name>.<fileType>`.
 */
export function getOutputPath(inputPath: string, options: OutputPathOptions = {}): string {
  const { outputDir = 'out', outputType, fileType = 'json' } = options;
  const directory = outputType ? join(outputDir, outputType) : outputDir;

  const name = basename(inputPath, extname(inputPath));
  const folder = basename(dirname(inputPath));
  const fileName = folder && folder !== '.' && folder !== '/'
    ? `${folder}_${name}.${fileType}`
    : `${name}.${fileType}`;

  return join(directory, fileName);
}

export async function writeCleaningReport(outPath: string, report: CleaningReport): Promise<void> {
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, JSON.stringify(report, null, 2) + '\n', 'utf8');
  logInfo(`Wrote cleaning report to ${outPath}`);
}
