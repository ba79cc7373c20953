// Base record interface

import type { JsonObject } from './types.js';

/**
 * Base interface for every record held by a record store
 */
export interface StoredRecord {
  /** Unique within its store, time-derived */
  readonly id: string;
  /** Partition used for retention accounting (e.g. brand name) */
  readonly groupKey: string;
  /** Creation timestamp, immutable once persisted */
  readonly createdAt: Date;
}

/**
 * Input accepted by `append`: identity fields are optional and assigned by the store
 */
export type RecordDraft<R extends StoredRecord> = Omit<R, 'id' | 'createdAt'> & {
  id?: string;
  createdAt?: Date;
};

/**
 * One completed interaction (e.g. an email send), kept for variety checks downstream
 */
export interface HistoryRecord extends StoredRecord {
  readonly payload: JsonObject;
}

export type HistoryDraft = RecordDraft<HistoryRecord>;
