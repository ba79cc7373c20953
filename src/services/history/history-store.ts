// History store: interaction records kept for downstream variety checks

import type { HistoryRecord, HistoryDraft } from '../../models/record.js';
import { HistoryCollectionSchema, encodeHistoryRecord } from '../../core/schemas.js';
import { RecordStore, type RecordStoreOptions, type RecordIdentity } from '../storage/record-store.js';
import { type HistoryRetentionConfig, HistoryRetentionPolicy } from './history-retention.js';

export interface HistoryStoreOptions extends RecordStoreOptions {
  retention?: Partial<HistoryRetentionConfig>;
}

/**
 * Summary counts for reporting
 */
export interface HistoryStats extends HistoryRetentionConfig {
  totalEntries: number;
  entriesByGroup: Record<string, number>;
}

/**
 * Interaction history with two-tier retention applied on every append
 */
export class HistoryStore extends RecordStore<HistoryRecord, HistoryDraft> {
  protected readonly idPrefix = 'hist';
  protected readonly recordLabel = 'History record';
  protected readonly schema = HistoryCollectionSchema;
  protected readonly policy: HistoryRetentionPolicy;

  constructor(options: HistoryStoreOptions) {
    super(options);
    this.policy = new HistoryRetentionPolicy(options.retention, this.logger);
  }

  /**
   * Creates and opens a history store
   */
  static async open(filePath: string, options: Omit<HistoryStoreOptions, 'filePath'> = {}): Promise<HistoryStore> {
    const store = new HistoryStore({ ...options, filePath });
    await store.open();
    return store;
  }

  /**
   * String values of the given payload fields across the group's `limit` most recent
   * records, oldest first. Non-string values are skipped.
   */
  recentValues(groupKey: string, fields: readonly string[], limit = 10): Record<string, string[]> {
    const recent = [...this.query(groupKey, limit)];
    const summary: Record<string, string[]> = {};

    for (const field of fields) {
      summary[field] = recent
        .map(record => record.payload[field])
        .filter((value): value is string => typeof value === 'string');
    }

    return summary;
  }

  stats(): HistoryStats {
    return {
      totalEntries: this.count(),
      entriesByGroup: this.groups(),
      ...this.policy.config
    };
  }

  protected materialize(draft: HistoryDraft, identity: RecordIdentity): HistoryRecord {
    return {
      id: identity.id,
      groupKey: draft.groupKey,
      createdAt: identity.createdAt,
      payload: draft.payload
    };
  }

  protected encode(record: HistoryRecord): unknown {
    return encodeHistoryRecord(record);
  }
}
