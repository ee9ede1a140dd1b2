/**
 * Cleaning Configuration
 *
 * Stage toggles and thresholds, validated with zod. Missing options fall back
 * to the defaults tuned for back-surface scans.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './meshErrors';

export const CleaningConfigSchema = z
  .object({
    /** Stage 1: absolute curvature */
    cleanByCurvature: z.boolean().default(true),
    curvHighThresh: z.number().finite().default(0.05),
    curvLowThresh: z.number().finite().default(-0.1),
    /** Stage 2: neighborhood curvature variance */
    cleanByVariance: z.boolean().default(true),
    varianceThresh: z.number().finite().default(0.001),
    /** Stage 3: rings around the scan border */
    cleanBorders: z.boolean().default(true),
    borderRings: z.number().int().nonnegative().default(5),
    /** Stage 4: faces outside the largest kept component */
    removeIslands: z.boolean().default(true),
  })
  .strict();

export type CleaningConfig = z.infer<typeof CleaningConfigSchema>;

export type CleaningConfigInput = z.input<typeof CleaningConfigSchema>;

export const DEFAULT_CLEANING_CONFIG: CleaningConfig = CleaningConfigSchema.parse({});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Fill defaults and validate. Throws ConfigError listing every issue.
 */
export function resolveCleaningConfig(input: unknown = {}): CleaningConfig {
  const result = CleaningConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), result.error);
  }
  return result.data;
}

/**
 * Read a partial configuration from a JSON file (defaults not yet applied).
 */
export async function readCleaningConfigFile(path: string): Promise<CleaningConfigInput> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError([`cannot read config file ${path}`], error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError([`config file ${path} is not valid JSON`], error);
  }

  const result = CleaningConfigSchema.partial().safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), result.error);
  }
  return result.data;
}

/**
 * Read, default and validate a JSON configuration file.
 */
export async function loadCleaningConfig(path: string): Promise<CleaningConfig> {
  return resolveCleaningConfig(await readCleaningConfigFile(path));
}
