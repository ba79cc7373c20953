// Domain-specific error types for the retention engine

/**
 * Base error class for all retention errors
 */
export abstract class RetentionError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input or configuration
 */
export class ValidationError extends RetentionError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Persisted store data exists but is not a valid collection.
 * Never auto-repaired: the file is left untouched for the operator.
 */
export class CorruptStoreError extends RetentionError {
  readonly code = 'CORRUPT_STORE';
  readonly exitCode = 3;

  constructor(public readonly filePath: string, public readonly issues: string[]) {
    super(`Store file is corrupt: ${filePath}${issues.length > 0 ? ` (${issues.join('; ')})` : ''}`, {
      filePath,
      issues
    });
  }
}

/**
 * Requested status change does not forward-follow the current status
 */
export class InvalidTransitionError extends RetentionError {
  readonly code = 'INVALID_TRANSITION';
  readonly exitCode = 2;

  constructor(public readonly recordId: string, public readonly from: string, public readonly to: string) {
    super(`Invalid status transition for ${recordId}: ${from} -> ${to}`, { recordId, from, to });
  }
}

/**
 * Not found errors
 */
export class NotFoundError extends RetentionError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Persist/flush failures
 */
export class StorageError extends RetentionError {
  readonly code = 'STORAGE_ERROR';
  readonly exitCode = 1;
}

/**
 * Per-file failure during a sweep. Recorded in the sweep report, never thrown out of it.
 */
export class ArtifactIOError extends RetentionError {
  readonly code = 'ARTIFACT_IO';
  readonly exitCode = 1;

  constructor(public readonly path: string, public readonly reason: string) {
    super(`${path}: ${reason}`, { path, reason });
  }
}

/**
 * Node's errno code of a filesystem failure, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
