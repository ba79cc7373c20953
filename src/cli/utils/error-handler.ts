// CLI error handling utilities

import {
  RetentionError,
  ValidationError,
  CorruptStoreError,
  NotFoundError,
  InvalidTransitionError
} from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof CorruptStoreError) {
    const issues = error.issues.map(issue => `\n  - ${issue}`).join('');
    return `Corrupt store: ${error.filePath}${issues}\nThe file was left untouched. Repair or move it before retrying.`;
  }

  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    const details = error.context?.issues;
    const issues = Array.isArray(details)
      ? details.map(issue => `\n  - ${String(issue)}`).join('')
      : '';
    return `Validation Error${field}: ${error.message}${issues}`;
  }

  if (error instanceof InvalidTransitionError) {
    return `Invalid Transition: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof RetentionError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: the error's own code for domain errors, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof RetentionError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}
