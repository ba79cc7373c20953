// Zod schemas for persisted store data

import { z } from 'zod';
import type { HistoryRecord } from '../models/record.js';
import type { PlanRecord, PlanSlot } from '../models/plan.js';
import { PLAN_STATUSES } from '../models/types.js';

/**
 * ISO-8601 timestamp, decoded to a Date
 */
export const TimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Invalid ISO-8601 timestamp' })
  .transform(value => new Date(value));

/**
 * Plan status enum (every lifecycle state)
 */
export const PlanStatusSchema = z.enum(PLAN_STATUSES);

/**
 * Statuses a persisted plan may carry
 */
export const StoredPlanStatusSchema = PlanStatusSchema.exclude(['deleted']);

/**
 * Opaque structured payload
 */
export const PayloadSchema = z.record(z.unknown());

/**
 * True when slot numbers are exactly 1..n, in any order
 */
export function hasContiguousSlotNumbers(slotNumbers: readonly number[]): boolean {
  const sorted = [...slotNumbers].sort((a, b) => a - b);
  return sorted.every((value, index) => value === index + 1);
}

/**
 * History record as written to disk
 */
export const PersistedHistoryRecordSchema = z
  .object({
    id: z.string().min(1, 'id is required'),
    group_key: z.string().min(1, 'group_key is required'),
    created_at: TimestampSchema,
    payload: PayloadSchema
  })
  .transform((raw): HistoryRecord => ({
    id: raw.id,
    groupKey: raw.group_key,
    createdAt: raw.created_at,
    payload: raw.payload
  }));

/**
 * Plan slot as written to disk
 */
export const PersistedPlanSlotSchema = z
  .object({
    slot_number: z.number().int().positive(),
    directive: PayloadSchema
  })
  .transform((raw): PlanSlot => ({ slotNumber: raw.slot_number, directive: raw.directive }));

/**
 * Plan record as written to disk
 */
export const PersistedPlanRecordSchema = z
  .object({
    id: z.string().min(1, 'id is required'),
    group_key: z.string().min(1, 'group_key is required'),
    created_at: TimestampSchema,
    status: StoredPlanStatusSchema,
    status_changed_at: TimestampSchema,
    slots: z.array(PersistedPlanSlotSchema),
    payload: PayloadSchema.default({})
  })
  .superRefine((plan, ctx) => {
    if (plan.status_changed_at.getTime() < plan.created_at.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'status_changed_at precedes created_at',
        path: ['status_changed_at']
      });
    }
    if (!hasContiguousSlotNumbers(plan.slots.map(slot => slot.slotNumber))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'slot numbers must be unique and contiguous from 1',
        path: ['slots']
      });
    }
  })
  .transform((raw): PlanRecord => ({
    id: raw.id,
    groupKey: raw.group_key,
    createdAt: raw.created_at,
    status: raw.status,
    statusChangedAt: raw.status_changed_at,
    slots: raw.slots,
    payload: raw.payload
  }));

export const HistoryCollectionSchema = z.array(PersistedHistoryRecordSchema);
export const PlanCollectionSchema = z.array(PersistedPlanRecordSchema);

/**
 * Encoders (model -> persisted JSON shape)
 */
export function encodeHistoryRecord(record: HistoryRecord): Record<string, unknown> {
  return {
    id: record.id,
    group_key: record.groupKey,
    created_at: record.createdAt.toISOString(),
    payload: record.payload
  };
}

export function encodePlanRecord(plan: PlanRecord): Record<string, unknown> {
  return {
    id: plan.id,
    group_key: plan.groupKey,
    created_at: plan.createdAt.toISOString(),
    status: plan.status,
    status_changed_at: plan.statusChangedAt.toISOString(),
    slots: plan.slots.map(slot => ({ slot_number: slot.slotNumber, directive: slot.directive })),
    payload: plan.payload
  };
}

/**
 * Flattens zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError, limit = 5): string[] {
  return error.issues.slice(0, limit).map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
