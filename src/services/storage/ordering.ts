// Age ordering shared by every retention pass

import type { StoredRecord } from '../../models/record.js';

/**
 * Indices of `records`, oldest first by createdAt. Equal timestamps keep
 * insertion order (lower index first).
 */
export function oldestFirst(records: readonly StoredRecord[]): number[] {
  return records
    .map((_, index) => index)
    .sort((a, b) => {
      const delta = records[a].createdAt.getTime() - records[b].createdAt.getTime();
      return delta !== 0 ? delta : a - b;
    });
}

/**
 * Copy of `records` in chronological order (same tie-break as oldestFirst)
 */
export function chronological<R extends StoredRecord>(records: readonly R[]): R[] {
  return oldestFirst(records).map(index => records[index]);
}

/**
 * Record counts per group key
 */
export function countByGroup(records: readonly StoredRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.groupKey, (counts.get(record.groupKey) ?? 0) + 1);
  }
  return counts;
}
