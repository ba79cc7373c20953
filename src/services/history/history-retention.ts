/**
 * History Retention Policy
 *
 * Two-tier cap on interaction history: per group first, then global.
 * Per-group trimming always completes before the global trim, so one busy group
 * cannot consume the global budget before its own excess is removed.
 */

import type { StoredRecord, HistoryRecord } from '../../models/record.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import type { RetentionPolicy } from '../storage/record-store.js';
import { oldestFirst } from '../storage/ordering.js';

export interface HistoryRetentionConfig {
  /** Records kept per group key */
  maxPerGroup: number;
  /** Records kept across all groups */
  maxTotal: number;
}

export const DEFAULT_HISTORY_RETENTION: HistoryRetentionConfig = {
  maxPerGroup: 50,
  maxTotal: 500
};

export interface HistoryTrimResult<R> {
  kept: R[];
  removedByGroup: number;
  removedGlobally: number;
}

/**
 * Drops the oldest records (by createdAt, then insertion order) until every group is at
 * most `maxPerGroup` and the whole collection at most `maxTotal`. Survivors keep their
 * original order.
 */
export function trimHistory<R extends StoredRecord>(
  records: readonly R[],
  config: HistoryRetentionConfig
): HistoryTrimResult<R> {
  const order = oldestFirst(records);
  const dropped = new Set<number>();

  const excess = new Map<string, number>();
  for (const record of records) {
    excess.set(record.groupKey, (excess.get(record.groupKey) ?? 0) + 1);
  }
  for (const [groupKey, count] of excess) {
    excess.set(groupKey, Math.max(0, count - config.maxPerGroup));
  }

  for (const index of order) {
    const groupKey = records[index].groupKey;
    const remaining = excess.get(groupKey) ?? 0;
    if (remaining > 0) {
      dropped.add(index);
      excess.set(groupKey, remaining - 1);
    }
  }
  const removedByGroup = dropped.size;

  let total = records.length - dropped.size;
  for (const index of order) {
    if (total <= config.maxTotal) break;
    if (dropped.has(index)) continue;
    dropped.add(index);
    total--;
  }

  return {
    kept: records.filter((_, index) => !dropped.has(index)),
    removedByGroup,
    removedGlobally: dropped.size - removedByGroup
  };
}

/**
 * Retention policy for history stores
 */
export class HistoryRetentionPolicy implements RetentionPolicy<HistoryRecord> {
  readonly name = 'history';
  readonly config: HistoryRetentionConfig;

  constructor(config: Partial<HistoryRetentionConfig> = {}, private readonly logger: Logger = defaultLogger) {
    this.config = { ...DEFAULT_HISTORY_RETENTION, ...config };
  }

  afterWrite(records: readonly HistoryRecord[]): HistoryRecord[] {
    const { kept, removedByGroup, removedGlobally } = trimHistory(records, this.config);

    if (removedByGroup > 0 || removedGlobally > 0) {
      this.logger.info('History cleanup', { removedByGroup, removedGlobally, remaining: kept.length });
    }

    return kept;
  }
}
