export * from './plan-lifecycle.js';
export * from './plan-retention.js';
export * from './plan-store.js';
