import { parseArgs, toCliOptions, USAGE } from './args';
import type { CliOptions } from './args';
import { readCleaningConfigFile, resolveCleaningConfig } from '../utils/cleaningConfig';
import type { CleaningConfigInput } from '../utils/cleaningConfig';
import { buildCleaningReport, getOutputPath, writeCleaningReport } from '../utils/cleaningReport';
import { cleanMesh } from '../utils/meshCleaning';
import { analyzeMesh, formatDiagnostics } from '../utils/meshDiagnostics';
import { ConfigError } from '../utils/meshErrors';
import { loadMeshFile } from '../utils/meshLoader';
import { logInfo, setLogLevel } from '../utils/meshUtils';

function readOptions(): CliOptions {
  try {
    return toCliOptions(parseArgs(process.argv.slice(2)));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const options = readOptions();
  setLogLevel(options.logLevel);

  const fileConfig: CleaningConfigInput = options.configPath
    ? await readCleaningConfigFile(options.configPath)
    : {};
  const config = resolveCleaningConfig({ ...fileConfig, ...options.overrides });

  const mesh = await loadMeshFile(options.meshPath);
  logInfo('Mesh diagnostics:\n' + formatDiagnostics(analyzeMesh(mesh)));

  const result = cleanMesh(mesh, config);

  const outPath = options.outPath ?? getOutputPath(options.meshPath, {
    outputDir: options.outDir,
    outputType: 'clean',
  });
  await writeCleaningReport(outPath, buildCleaningReport(result, { source: options.meshPath, config }));

  const { vertices, faces } = result.summary;
  logInfo(
    `Kept ${vertices.Kept}/${mesh.vertexCount} vertices, ${faces.Kept}/${mesh.faceCount} faces ` +
    `(curvature ${faces.Curvature}, variance ${faces.Variance}, border ${faces.Border}, islands ${faces.Island})`
  );
}

main().catch((err) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
