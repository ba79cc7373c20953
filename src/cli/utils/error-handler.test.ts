// Tests for CLI error formatting

import { describe, it, expect } from 'vitest';
import { exitCodeFor, formatError } from './error-handler.js';
import {
  CorruptStoreError,
  InvalidTransitionError,
  NotFoundError,
  StorageError,
  ValidationError
} from '../../core/errors.js';

describe('formatError', () => {
  it('should list the issues of a corrupt store', () => {
    const error = new CorruptStoreError('/data/campaign_plans.json', ['0.status: Invalid enum value']);

    expect(formatError(error)).toBe(
      'Corrupt store: /data/campaign_plans.json\n' +
      '  - 0.status: Invalid enum value\n' +
      'The file was left untouched. Repair or move it before retrying.'
    );
  });

  it('should include the field and issues of a validation error', () => {
    const error = new ValidationError('Invalid configuration in retention.yaml', 'config', {
      issues: ['history.maxTotal: Number must be greater than 0']
    });

    expect(formatError(error)).toBe(
      'Validation Error (field: config): Invalid configuration in retention.yaml\n' +
      '  - history.maxTotal: Number must be greater than 0'
    );
  });

  it('should label other domain errors', () => {
    expect(formatError(new InvalidTransitionError('plan-1', 'draft', 'completed')))
      .toBe('Invalid Transition: Invalid status transition for plan-1: draft -> completed');
    expect(formatError(new NotFoundError('Plan', 'plan-1'))).toBe('Not Found: Plan not found: plan-1');
    expect(formatError(new StorageError('disk full'))).toBe('Error [STORAGE_ERROR]: disk full');
  });

  it('should handle foreign errors and values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Unknown error: boom');
  });
});

describe('exitCodeFor', () => {
  it('should map error types to exit codes', () => {
    expect(exitCodeFor(new ValidationError('bad'))).toBe(2);
    expect(exitCodeFor(new CorruptStoreError('store.json', []))).toBe(3);
    expect(exitCodeFor(new NotFoundError('Plan', 'plan-1'))).toBe(4);
    expect(exitCodeFor(new StorageError('disk full'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});
