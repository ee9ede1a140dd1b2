import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CLEANING_CONFIG,
  loadCleaningConfig,
  readCleaningConfigFile,
  resolveCleaningConfig,
} from '../utils/cleaningConfig';
import { ConfigError } from '../utils/meshErrors';

function configIssues(input: unknown): string[] {
  try {
    resolveCleaningConfig(input);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

async function writeTempFile(name: string, contents: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'scan-mesh-qc-'));
  const path = join(dir, name);
  await writeFile(path, contents, 'utf8');
  return path;
}

describe('resolveCleaningConfig', () => {
  it('fills every default', () => {
    expect(resolveCleaningConfig()).toEqual({
      cleanByCurvature: true,
      curvHighThresh: 0.05,
      curvLowThresh: -0.1,
      cleanByVariance: true,
      varianceThresh: 0.001,
      cleanBorders: true,
      borderRings: 5,
      removeIslands: true,
    });
    expect(DEFAULT_CLEANING_CONFIG).toEqual(resolveCleaningConfig({}));
  });

  it('keeps supplied values', () => {
    const config = resolveCleaningConfig({ borderRings: 0, removeIslands: false });
    expect(config.borderRings).toBe(0);
    expect(config.removeIslands).toBe(false);
    expect(config.curvHighThresh).toBe(0.05);
  });

  it('rejects negative and fractional ring counts', () => {
    expect(configIssues({ borderRings: -1 })[0]).toMatch(/^borderRings: /);
    expect(configIssues({ borderRings: 1.5 })[0]).toMatch(/^borderRings: /);
  });

  it('rejects wrongly typed options', () => {
    expect(configIssues({ cleanBorders: 'yes' })[0]).toMatch(/^cleanBorders: /);
  });

  it('rejects unknown options', () => {
    expect(configIssues({ borderWidth: 3 })[0]).toMatch(/^\(root\): /);
  });
});

describe('config files', () => {
  it('reads a partial config without applying defaults', async () => {
    const path = await writeTempFile('cleaning.json', '{ "varianceThresh": 0.01 }');
    expect(await readCleaningConfigFile(path)).toEqual({ varianceThresh: 0.01 });
  });

  it('loads and defaults a config file', async () => {
    const path = await writeTempFile('cleaning.json', '{ "cleanBorders": false }');
    const config = await loadCleaningConfig(path);
    expect(config.cleanBorders).toBe(false);
    expect(config.borderRings).toBe(5);
  });

  it('rejects malformed JSON', async () => {
    const path = await writeTempFile('broken.json', '{ "borderRings": ');
    await expect(readCleaningConfigFile(path)).rejects.toThrow(`config file ${path} is not valid JSON`);
  });

  it('rejects invalid values in the file', async () => {
    const path = await writeTempFile('bad.json', '{ "borderRings": -2 }');
    await expect(readCleaningConfigFile(path)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a missing file', async () => {
    const path = join(tmpdir(), 'scan-mesh-qc-missing', 'none.json');
    await expect(readCleaningConfigFile(path)).rejects.toThrow(`cannot read config file ${path}`);
  });
});
