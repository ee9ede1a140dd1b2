import type { CleaningConfigInput } from '../utils/cleaningConfig';
import { ConfigError } from '../utils/meshErrors';
import type { LogLevel } from '../utils/meshUtils';

export const USAGE =
  'Usage: tsx src/cli/index.ts --mesh <file.ply|file.stl> [--config <config.json>] [--out <report.json>] ' +
  '[--out-dir <dir>] [--curv-high <n>] [--curv-low <n>] [--variance <n>] [--border-rings <n>] ' +
  '[--no-curvature] [--no-variance] [--no-borders] [--no-islands] [--verbose] [--quiet]';

export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) continue;
    const key = a.slice(2);
    const val = argv[i + 1];
    // Negative numbers are values, not flags
    if (val === undefined || (val.startsWith('--') && Number.isNaN(Number(val)))) {
      out[key] = 'true';
    } else {
      out[key] = val;
      i++;
    }
  }
  return out;
}

export interface CliOptions {
  meshPath: string;
  configPath?: string;
  outPath?: string;
  outDir: string;
  logLevel: LogLevel;
  /** Flag overrides, applied on top of the config file */
  overrides: CleaningConfigInput;
}

const NUMERIC_FLAGS = {
  'curv-high': 'curvHighThresh',
  'curv-low': 'curvLowThresh',
  variance: 'varianceThresh',
  'border-rings': 'borderRings',
} as const;

const DISABLE_FLAGS = {
  'no-curvature': 'cleanByCurvature',
  'no-variance': 'cleanByVariance',
  'no-borders': 'cleanBorders',
  'no-islands': 'removeIslands',
} as const;

/**
 * Turn parsed arguments into CLI options. Throws ConfigError on a missing mesh
 * path or a non-numeric threshold.
 */
export function toCliOptions(args: Record<string, string>): CliOptions {
  const meshPath = args['mesh'];
  if (!meshPath || meshPath === 'true') {
    throw new ConfigError(['--mesh <path> is required']);
  }

  const overrides: CleaningConfigInput = {};
  const issues: string[] = [];

  for (const [flag, key] of Object.entries(NUMERIC_FLAGS)) {
    const raw = args[flag];
    if (raw === undefined) continue;
    const value = Number(raw);
    if (raw === 'true' || Number.isNaN(value)) {
      issues.push(`--${flag} expects a number, got '${raw}'`);
    } else {
      overrides[key] = value;
    }
  }

  for (const [flag, key] of Object.entries(DISABLE_FLAGS)) {
    if (args[flag] === 'true') {
      overrides[key] = false;
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  let logLevel: LogLevel = 'info';
  if (args['quiet'] === 'true') logLevel = 'silent';
  if (args['verbose'] === 'true') logLevel = 'debug';

  return {
    meshPath,
    configPath: args['config'],
    outPath: args['out'],
    outDir: args['out-dir'] ?? 'out',
    logLevel,
    overrides,
  };
}
