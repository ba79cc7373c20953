// Tests for persisted store schemas

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  HistoryCollectionSchema,
  PlanCollectionSchema,
  encodeHistoryRecord,
  encodePlanRecord,
  formatIssues,
  hasContiguousSlotNumbers
} from './schemas.js';
import type { PlanRecord } from '../models/plan.js';

const persistedPlan = {
  id: 'plan-20260101T000000000Z-0000',
  group_key: 'Acme',
  created_at: '2026-01-01T00:00:00.000Z',
  status: 'approved',
  status_changed_at: '2026-01-02T00:00:00.000Z',
  slots: [
    { slot_number: 2, directive: { topic: 'follow-up' } },
    { slot_number: 1, directive: { topic: 'launch' } }
  ],
  payload: { name: 'Spring launch' }
};

describe('schemas', () => {
  describe('HistoryCollectionSchema', () => {
    it('should decode snake_case records into models', () => {
      const result = HistoryCollectionSchema.parse([
        {
          id: 'hist-1',
          group_key: 'Acme',
          created_at: '2026-03-01T10:00:00.000Z',
          payload: { subject: 'Hello' }
        }
      ]);

      expect(result).toEqual([
        {
          id: 'hist-1',
          groupKey: 'Acme',
          createdAt: new Date('2026-03-01T10:00:00.000Z'),
          payload: { subject: 'Hello' }
        }
      ]);
    });

    it('should reject records without a group key', () => {
      const result = HistoryCollectionSchema.safeParse([
        { id: 'hist-1', created_at: '2026-03-01T10:00:00.000Z', payload: {} }
      ]);

      expect(result.success).toBe(false);
    });

    it('should reject timestamps that are not ISO-8601', () => {
      const result = HistoryCollectionSchema.safeParse([
        { id: 'hist-1', group_key: 'Acme', created_at: 'yesterday', payload: {} }
      ]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toEqual(['0.created_at: Invalid ISO-8601 timestamp']);
      }
    });
  });

  describe('PlanCollectionSchema', () => {
    it('should decode plans and default a missing payload', () => {
      const withoutPayload: Record<string, unknown> = { ...persistedPlan };
      delete withoutPayload.payload;
      const [plan] = PlanCollectionSchema.parse([withoutPayload]);

      expect(plan.status).toBe('approved');
      expect(plan.statusChangedAt).toEqual(new Date('2026-01-02T00:00:00.000Z'));
      expect(plan.slots).toEqual([
        { slotNumber: 2, directive: { topic: 'follow-up' } },
        { slotNumber: 1, directive: { topic: 'launch' } }
      ]);
      expect(plan.payload).toEqual({});
    });

    it('should reject a persisted deleted status', () => {
      const result = PlanCollectionSchema.safeParse([{ ...persistedPlan, status: 'deleted' }]);
      expect(result.success).toBe(false);
    });

    it('should reject a status change before creation', () => {
      const result = PlanCollectionSchema.safeParse([
        { ...persistedPlan, status_changed_at: '2025-12-31T00:00:00.000Z' }
      ]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toEqual(['0.status_changed_at: status_changed_at precedes created_at']);
      }
    });

    it('should reject slot numbers with gaps', () => {
      const result = PlanCollectionSchema.safeParse([
        { ...persistedPlan, slots: [{ slot_number: 1, directive: {} }, { slot_number: 3, directive: {} }] }
      ]);

      expect(result.success).toBe(false);
    });
  });

  describe('encoders', () => {
    it('should encode a plan back to its persisted shape', () => {
      const plan: PlanRecord = PlanCollectionSchema.parse([persistedPlan])[0];
      expect(encodePlanRecord(plan)).toEqual(persistedPlan);
    });

    it('should encode history timestamps as ISO strings', () => {
      const encoded = encodeHistoryRecord({
        id: 'hist-1',
        groupKey: 'Acme',
        createdAt: new Date('2026-03-01T10:00:00Z'),
        payload: {}
      });

      expect(encoded.created_at).toBe('2026-03-01T10:00:00.000Z');
    });
  });

  describe('hasContiguousSlotNumbers', () => {
    it('should accept an empty slot list', () => {
      expect(hasContiguousSlotNumbers([])).toBe(true);
    });

    it('should reject duplicates', () => {
      expect(hasContiguousSlotNumbers([1, 1, 2])).toBe(false);
    });

    it('should accept any permutation of 1..n', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 30 }), fc.integer(), (n, seed) => {
          const numbers = Array.from({ length: n }, (_, i) => i + 1);
          const shuffled = [...numbers].sort((a, b) => ((a * seed) % 7) - ((b * seed) % 7));
          return hasContiguousSlotNumbers(shuffled);
        })
      );
    });
  });

  describe('formatIssues', () => {
    it('should cap the number of lines', () => {
      const result = HistoryCollectionSchema.safeParse(
        Array.from({ length: 10 }, () => ({ id: '', group_key: '', created_at: 'x', payload: {} }))
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error, 2)).toHaveLength(2);
      }
    });
  });
});
