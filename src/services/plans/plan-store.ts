// Plan store: plan records with a forward-only status lifecycle

import type { PlanDraft, PlanRecord, PlanSlot } from '../../models/plan.js';
import type { PlanStatus, StoredPlanStatus } from '../../models/types.js';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../../core/errors.js';
import { PlanCollectionSchema, encodePlanRecord, hasContiguousSlotNumbers } from '../../core/schemas.js';
import { latest } from '../../core/time.js';
import { RecordStore, type RecordStoreOptions, type RecordIdentity } from '../storage/record-store.js';
import { canTransition, type PlanLifecycleConfig } from './plan-lifecycle.js';
import { PlanRetentionPolicy } from './plan-retention.js';

export interface PlanStoreOptions extends RecordStoreOptions {
  lifecycle?: Partial<PlanLifecycleConfig>;
}

export interface PlanListOptions {
  /** Include archived plans (default: false) */
  includeArchived?: boolean;
}

/**
 * Summary counts for reporting
 */
export interface PlanStats extends PlanLifecycleConfig {
  totalPlans: number;
  plansByGroup: Record<string, number>;
  plansByStatus: Partial<Record<StoredPlanStatus, number>>;
}

/**
 * Plan store. Every mutation first catches up overdue age transitions, then applies the
 * requested change, then enforces the per-group active cap, then persists.
 */
export class PlanStore extends RecordStore<PlanRecord, PlanDraft> {
  protected readonly idPrefix = 'plan';
  protected readonly recordLabel = 'Plan';
  protected readonly schema = PlanCollectionSchema;
  protected readonly policy: PlanRetentionPolicy;

  constructor(options: PlanStoreOptions) {
    super(options);
    this.policy = new PlanRetentionPolicy(options.lifecycle, this.logger);
  }

  /**
   * Creates and opens a plan store
   */
  static async open(filePath: string, options: Omit<PlanStoreOptions, 'filePath'> = {}): Promise<PlanStore> {
    const store = new PlanStore({ ...options, filePath });
    await store.open();
    return store;
  }

  /**
   * @throws NotFoundError if the plan is absent or deleted
   */
  get(id: string): PlanRecord {
    const plan = this.find(id);
    if (!plan) {
      throw new NotFoundError('Plan', id);
    }
    return plan;
  }

  /**
   * Moves a plan to the direct successor of its current status. Moving to `deleted`
   * removes the plan.
   *
   * @throws NotFoundError if the plan is absent (including removed by the age sweep)
   * @throws InvalidTransitionError if `newStatus` does not directly follow the current status
   */
  async updateStatus(id: string, newStatus: PlanStatus): Promise<void> {
    const from = await this.mutate((plans, now) => {
      const index = this.indexOf(plans, id);
      const current = plans[index];

      if (!canTransition(current.status, newStatus)) {
        throw new InvalidTransitionError(id, current.status, newStatus);
      }

      if (newStatus === 'deleted') {
        return { records: plans.filter(plan => plan.id !== id), result: current.status };
      }

      const updated: PlanRecord = {
        ...current,
        status: newStatus,
        statusChangedAt: latest(now, current.createdAt)
      };

      return { records: plans.map(plan => (plan.id === id ? updated : plan)), result: current.status };
    });

    this.logger.info('Plan status updated', { id, from, to: newStatus });
  }

  /**
   * Replaces the slots of a plan (e.g. after an external edit was imported)
   *
   * @throws ValidationError if slot numbers are not contiguous from 1
   */
  async replaceSlots(id: string, slots: readonly PlanSlot[]): Promise<PlanRecord> {
    assertSlots(slots);

    return this.mutate(plans => {
      const index = this.indexOf(plans, id);
      const updated: PlanRecord = { ...plans[index], slots: [...slots] };
      return { records: plans.map(plan => (plan.id === id ? updated : plan)), result: updated };
    });
  }

  /**
   * Plans of a group, newest first
   */
  listByGroup(groupKey: string, options: PlanListOptions = {}): PlanRecord[] {
    const plans = [...this.query(groupKey, Number.MAX_SAFE_INTEGER)];
    return plans
      .filter(plan => options.includeArchived || plan.status !== 'archived')
      .reverse();
  }

  /**
   * @throws NotFoundError if the plan or the slot does not exist
   */
  getSlot(id: string, slotNumber: number): PlanSlot {
    const slot = this.get(id).slots.find(candidate => candidate.slotNumber === slotNumber);
    if (!slot) {
      throw new NotFoundError('Plan slot', `${id}#${slotNumber}`);
    }
    return slot;
  }

  stats(): PlanStats {
    const plansByStatus: Partial<Record<StoredPlanStatus, number>> = {};
    for (const plan of this.all()) {
      plansByStatus[plan.status] = (plansByStatus[plan.status] ?? 0) + 1;
    }

    return {
      totalPlans: this.count(),
      plansByGroup: this.groups(),
      plansByStatus,
      ...this.policy.config
    };
  }

  protected materialize(draft: PlanDraft, identity: RecordIdentity): PlanRecord {
    assertSlots(draft.slots);

    const statusChangedAt = draft.statusChangedAt ?? identity.createdAt;
    if (statusChangedAt.getTime() < identity.createdAt.getTime()) {
      throw new ValidationError('statusChangedAt must not precede createdAt', 'statusChangedAt');
    }

    return {
      id: identity.id,
      groupKey: draft.groupKey,
      createdAt: identity.createdAt,
      status: draft.status ?? 'draft',
      statusChangedAt,
      slots: [...draft.slots],
      payload: draft.payload ?? {}
    };
  }

  protected encode(plan: PlanRecord): unknown {
    return encodePlanRecord(plan);
  }

  private indexOf(plans: readonly PlanRecord[], id: string): number {
    const index = plans.findIndex(plan => plan.id === id);
    if (index === -1) {
      throw new NotFoundError('Plan', id);
    }
    return index;
  }
}

function assertSlots(slots: readonly PlanSlot[]): void {
  if (!hasContiguousSlotNumbers(slots.map(slot => slot.slotNumber))) {
    throw new ValidationError('Slot numbers must be unique and contiguous from 1', 'slots');
  }
}
