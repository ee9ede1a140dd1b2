/**
 * Error types for scan mesh cleaning.
 *
 * Input shape violations fail fast before any stage runs; loading and
 * configuration failures carry the offending path or issues.
 */

/**
 * Base error class for all scan cleaning errors.
 */
export class ScanMeshError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanMeshError';
  }
}

/**
 * Pipeline inputs violate their contract (empty mesh, length mismatch,
 * out-of-range index). Contains every problem found.
 */
export class InputError extends ScanMeshError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid cleaning input: ${issues.join('; ')}`);
    this.name = 'InputError';
    this.issues = issues;
  }
}

/**
 * A mesh file could not be read or parsed.
 */
export class LoadError extends ScanMeshError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message}: ${path}`, cause === undefined ? undefined : { cause });
    this.name = 'LoadError';
    this.path = path;
  }
}

/**
 * Cleaning configuration failed validation.
 */
export class ConfigError extends ScanMeshError {
  readonly issues: string[];

  constructor(issues: string[], cause?: unknown) {
    super(`Invalid cleaning config: ${issues.join('; ')}`, cause === undefined ? undefined : { cause });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
