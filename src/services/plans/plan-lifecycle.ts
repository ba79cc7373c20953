/**
 * Plan lifecycle: the forward-only status machine and the retention passes built on it.
 *
 *   draft -> approved -> in_progress -> completed -> archived -> deleted
 *
 * Caller-driven transitions go one step at a time. `completed -> archived` and
 * `archived -> deleted` also happen automatically by age, evaluated lazily whenever the
 * store is written. Everything here is pure: no clock, no I/O.
 */

import type { PlanRecord } from '../../models/plan.js';
import { ACTIVE_PLAN_STATUSES, type PlanStatus } from '../../models/types.js';
import { ageMs, daysToMs, latest } from '../../core/time.js';
import { oldestFirst } from '../storage/ordering.js';

export interface PlanLifecycleConfig {
  /** Plans in an active status kept per group */
  maxActivePerGroup: number;
  /** Days after completion before a plan is archived */
  archiveAfterDays: number;
  /** Days after archival before a plan is deleted */
  deleteAfterDays: number;
}

export const DEFAULT_PLAN_LIFECYCLE: PlanLifecycleConfig = {
  maxActivePerGroup: 10,
  archiveAfterDays: 90,
  deleteAfterDays: 365
};

/**
 * Allowed successors of each status
 */
export const PLAN_TRANSITIONS: Readonly<Record<PlanStatus, readonly PlanStatus[]>> = {
  draft: ['approved'],
  approved: ['in_progress'],
  in_progress: ['completed'],
  completed: ['archived'],
  archived: ['deleted'],
  deleted: []
};

export function canTransition(from: PlanStatus, to: PlanStatus): boolean {
  return PLAN_TRANSITIONS[from].includes(to);
}

export function isActiveStatus(status: PlanStatus): boolean {
  return ACTIVE_PLAN_STATUSES.includes(status);
}

export interface LifecycleResult {
  plans: PlanRecord[];
  /** IDs moved from completed to archived */
  archived: string[];
  /** IDs removed after their archive period */
  deleted: string[];
}

/**
 * Applies every age-based transition that has fallen due by `now`, in order.
 *
 * An archived plan's statusChangedAt is the moment archival fell due rather than `now`,
 * so a store left idle for longer than both periods goes straight through
 * completed -> archived -> deleted in a single pass.
 */
export function applyLifecycle(
  plans: readonly PlanRecord[],
  now: Date,
  config: Pick<PlanLifecycleConfig, 'archiveAfterDays' | 'deleteAfterDays'>
): LifecycleResult {
  const archiveMs = daysToMs(config.archiveAfterDays);
  const deleteMs = daysToMs(config.deleteAfterDays);
  const result: LifecycleResult = { plans: [], archived: [], deleted: [] };

  for (const plan of plans) {
    let current = plan;

    if (current.status === 'completed' && ageMs(current.statusChangedAt, now) >= archiveMs) {
      current = {
        ...current,
        status: 'archived',
        statusChangedAt: new Date(current.statusChangedAt.getTime() + archiveMs)
      };
      result.archived.push(current.id);
    }

    if (current.status === 'archived' && ageMs(current.statusChangedAt, now) >= deleteMs) {
      result.deleted.push(current.id);
      continue;
    }

    result.plans.push(current);
  }

  return result;
}

export interface ActiveCapResult {
  plans: PlanRecord[];
  /** IDs forced from an active status to archived */
  archived: string[];
}

/**
 * Keeps at most `maxActivePerGroup` active plans per group by archiving the oldest
 * (by createdAt, then insertion order). Archived plans stay recoverable until their
 * delete period runs out.
 */
export function enforceActiveCap(
  plans: readonly PlanRecord[],
  now: Date,
  maxActivePerGroup: number
): ActiveCapResult {
  const excess = new Map<string, number>();
  for (const plan of plans) {
    if (isActiveStatus(plan.status)) {
      excess.set(plan.groupKey, (excess.get(plan.groupKey) ?? 0) + 1);
    }
  }
  for (const [groupKey, count] of excess) {
    excess.set(groupKey, Math.max(0, count - maxActivePerGroup));
  }

  const forced = new Set<number>();
  for (const index of oldestFirst(plans)) {
    const plan = plans[index];
    const remaining = excess.get(plan.groupKey) ?? 0;
    if (remaining > 0 && isActiveStatus(plan.status)) {
      forced.add(index);
      excess.set(plan.groupKey, remaining - 1);
    }
  }

  const archived: string[] = [];
  const result = plans.map((plan, index) => {
    if (!forced.has(index)) return plan;
    archived.push(plan.id);
    return { ...plan, status: 'archived' as const, statusChangedAt: latest(now, plan.createdAt) };
  });

  return { plans: result, archived };
}
