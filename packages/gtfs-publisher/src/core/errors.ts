/**
 * GTFS Publisher Error Types
 *
 * Structured error classes for the import pipeline. Validation errors abort
 * before any remote call is made; remote errors are captured per task and
 * surface together once every task has resolved.
 *
 * Malformed numeric or color fields are not errors: they degrade to defaults.
 */

// ============================================================================
// Validation
// ============================================================================

/**
 * Thrown when a bundle is missing required files. Nothing has been uploaded.
 */
export class GtfsValidationError extends Error {
  constructor(public readonly missingFiles: readonly string[]) {
    super(`Invalid GTFS format. Missing required files: ${missingFiles.join(', ')}. No files were uploaded.`);
    this.name = 'GtfsValidationError';
  }
}

/**
 * Thrown when environment configuration fails validation
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(`${message}: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Remote Calls
// ============================================================================

/**
 * A portal or feature service call failed.
 *
 * Covers transport failures, non-2xx statuses, `{ error }` response bodies,
 * unexpected response shapes and rejected feature edits.
 */
export class RemoteCallError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly code?: number,
    public readonly details: readonly string[] = []
  ) {
    super(`${operation} failed: ${message}`);
    this.name = 'RemoteCallError';
  }
}

/**
 * The portal returned generated rows out of order or with a different count.
 *
 * Positional matching is only valid while the pairing key lines up, so this
 * is a data-correctness failure rather than something to repair.
 */
export class CoordinateOrderError extends Error {
  constructor(
    public readonly expectedRow: number,
    public readonly receivedRow: number | null
  ) {
    super(
      receivedRow === null
        ? `Generated output is missing row ${expectedRow}`
        : `Generated output out of order: expected row ${expectedRow}, received row ${receivedRow}`
    );
    this.name = 'CoordinateOrderError';
  }
}

// ============================================================================
// Task Graph
// ============================================================================

/**
 * A task was not run because one of its dependencies failed.
 *
 * The message is the upstream failure reason so cascaded failures read the
 * same as the root cause.
 */
export class DependencyFailedError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly dependencyId: string,
    public readonly rootCause: Error
  ) {
    super(rootCause.message);
    this.name = 'DependencyFailedError';
  }
}

export interface ChunkFailure {
  readonly chunkIndex: number;
  readonly reason: string;
}

/**
 * One or more chunks of a fanned-out step failed. Raised only after every
 * chunk has finished.
 */
export class ChunkUploadError extends Error {
  constructor(
    public readonly totalChunks: number,
    public readonly failures: readonly ChunkFailure[]
  ) {
    super(
      `${failures.length} of ${totalChunks} chunks failed (` +
        failures.map((f) => `chunk ${f.chunkIndex}: ${f.reason}`).join('; ') +
        ')'
    );
    this.name = 'ChunkUploadError';
  }
}

/**
 * Raised by the importer once every task has resolved and at least one failed
 */
export class ImportFailedError extends Error {
  constructor(public readonly failures: readonly string[]) {
    super(failures.join('\n'));
    this.name = 'ImportFailedError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
