// Core type definitions for the retention engine

// Plan lifecycle statuses, in lifecycle order
export const PLAN_STATUSES = ['draft', 'approved', 'in_progress', 'completed', 'archived', 'deleted'] as const;
export type PlanStatus = (typeof PLAN_STATUSES)[number];

// A deleted plan is removed from its store, so it is never persisted
export type StoredPlanStatus = Exclude<PlanStatus, 'deleted'>;

// Statuses that count against the per-group active cap
export const ACTIVE_PLAN_STATUSES: readonly PlanStatus[] = ['draft', 'approved', 'in_progress', 'completed'];

export type JsonObject = Record<string, unknown>;
