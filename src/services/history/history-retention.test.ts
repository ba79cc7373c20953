/**
 * Tests for two-tier history retention
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { trimHistory, HistoryRetentionPolicy } from './history-retention.js';
import { Logger, LogLevel } from '../../core/logger.js';
import type { HistoryRecord } from '../../models/record.js';

const silent = new Logger({ level: LogLevel.SILENT });

function record(id: string, groupKey: string, minute: number): HistoryRecord {
  return {
    id,
    groupKey,
    createdAt: new Date(Date.UTC(2026, 0, 1, 0, minute)),
    payload: {}
  };
}

const ids = (records: readonly HistoryRecord[]) => records.map(r => r.id);

describe('trimHistory', () => {
  it('should keep everything under both caps', () => {
    const records = [record('a1', 'A', 1), record('b1', 'B', 2)];
    const result = trimHistory(records, { maxPerGroup: 5, maxTotal: 5 });

    expect(ids(result.kept)).toEqual(['a1', 'b1']);
    expect(result.removedByGroup).toBe(0);
    expect(result.removedGlobally).toBe(0);
  });

  it('should apply the per-group cap before the global cap', () => {
    const records = [
      record('b1', 'B', 1),
      record('a1', 'A', 2),
      record('a2', 'A', 3),
      record('a3', 'A', 4)
    ];

    const result = trimHistory(records, { maxPerGroup: 2, maxTotal: 3 });

    expect(ids(result.kept)).toEqual(['b1', 'a2', 'a3']);
    expect(result.removedByGroup).toBe(1);
    expect(result.removedGlobally).toBe(0);
  });

  it('should drop the oldest records across groups for the global cap', () => {
    const records = [
      record('a1', 'A', 1),
      record('b1', 'B', 2),
      record('a2', 'A', 3),
      record('b2', 'B', 4)
    ];

    const result = trimHistory(records, { maxPerGroup: 10, maxTotal: 2 });

    expect(ids(result.kept)).toEqual(['a2', 'b2']);
    expect(result.removedGlobally).toBe(2);
  });

  it('should break timestamp ties by insertion order', () => {
    const records = [record('first', 'A', 5), record('second', 'A', 5), record('third', 'A', 5)];
    const result = trimHistory(records, { maxPerGroup: 1, maxTotal: 10 });

    expect(ids(result.kept)).toEqual(['third']);
  });

  it('should keep survivors in insertion order', () => {
    const records = [record('late', 'A', 9), record('early', 'A', 1), record('middle', 'A', 5)];
    const result = trimHistory(records, { maxPerGroup: 2, maxTotal: 10 });

    expect(ids(result.kept)).toEqual(['late', 'middle']);
  });

  /**
   * After trimming, every group and the total are within their caps, survivors are a
   * subsequence of the input, and nothing is dropped that the caps did not require.
   */
  it('should satisfy both caps for any collection', () => {
    const arbRecords = fc.array(
      fc.record({
        groupKey: fc.constantFrom('A', 'B', 'C', 'D'),
        minute: fc.integer({ min: 0, max: 50 })
      }),
      { maxLength: 80 }
    );

    fc.assert(
      fc.property(
        arbRecords,
        fc.integer({ min: 1, max: 10 }),
        fc.integer({ min: 1, max: 30 }),
        (entries, maxPerGroup, maxTotal) => {
          const records = entries.map((entry, i) => record(`r${i}`, entry.groupKey, entry.minute));
          const { kept } = trimHistory(records, { maxPerGroup, maxTotal });

          const perGroup = new Map<string, number>();
          for (const r of records) perGroup.set(r.groupKey, (perGroup.get(r.groupKey) ?? 0) + 1);
          const expectedSize = Math.min(
            maxTotal,
            [...perGroup.values()].reduce((sum, count) => sum + Math.min(count, maxPerGroup), 0)
          );

          expect(kept).toHaveLength(expectedSize);
          for (const groupKey of perGroup.keys()) {
            expect(kept.filter(r => r.groupKey === groupKey).length).toBeLessThanOrEqual(maxPerGroup);
          }

          const positions = kept.map(r => records.indexOf(r));
          expect([...positions].sort((a, b) => a - b)).toEqual(positions);
        }
      )
    );
  });
});

describe('HistoryRetentionPolicy', () => {
  it('should fill unset thresholds from the defaults', () => {
    const policy = new HistoryRetentionPolicy({ maxTotal: 100 }, silent);
    expect(policy.config).toEqual({ maxPerGroup: 50, maxTotal: 100 });
  });

  it('should trim on afterWrite', () => {
    const policy = new HistoryRetentionPolicy({ maxPerGroup: 1 }, silent);
    const kept = policy.afterWrite([record('a1', 'A', 1), record('a2', 'A', 2)]);

    expect(ids(kept)).toEqual(['a2']);
  });
});
