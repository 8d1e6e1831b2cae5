/**
 * Error taxonomy for the tuner stores.
 *
 * StorageError propagates to the caller. ConfigCorruptError is recovered by
 * the parameter store, which falls back to catalog defaults.
 */

export type StorageOperation = 'read' | 'write';

/**
 * Thrown when the metrics log or the parameter file cannot be read or written
 * (permission denied, disk full, path is a directory, ...).
 */
export class StorageError extends Error {
  readonly operation: StorageOperation;
  readonly path: string;

  constructor(operation: StorageOperation, path: string, cause?: unknown) {
    super(`Storage ${operation} failed for ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
    this.path = path;
  }
}

/**
 * Thrown when the persisted parameter file is not valid JSON or does not
 * match the parameter catalog.
 */
export class ConfigCorruptError extends Error {
  readonly path: string;
  readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`Parameter file ${path} is corrupt: ${issues.join('; ')}`);
    this.name = 'ConfigCorruptError';
    this.path = path;
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  if (err === undefined) return 'unknown error';
  return err instanceof Error ? err.message : String(err);
}

/** Node fs errors carry a string `code` (ENOENT, EACCES, ...). */
export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
