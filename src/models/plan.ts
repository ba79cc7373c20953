// Plan record model

import type { StoredRecord, RecordDraft } from './record.js';
import type { JsonObject, StoredPlanStatus } from './types.js';

/**
 * A planned sub-unit (e.g. one email of a campaign); directive content is opaque
 */
export interface PlanSlot {
  /** Unique within the plan, contiguous from 1 */
  readonly slotNumber: number;
  readonly directive: JsonObject;
}

/**
 * Plan record with a forward-only status lifecycle
 */
export interface PlanRecord extends StoredRecord {
  readonly status: StoredPlanStatus;
  /** Always >= createdAt; drives age-based transitions */
  readonly statusChangedAt: Date;
  readonly slots: readonly PlanSlot[];
  readonly payload: JsonObject;
}

/**
 * New plans start as drafts unless the caller imports an existing plan
 */
export type PlanDraft = Omit<RecordDraft<PlanRecord>, 'status' | 'statusChangedAt' | 'payload'> & {
  status?: StoredPlanStatus;
  statusChangedAt?: Date;
  payload?: JsonObject;
};
