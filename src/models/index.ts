// Export all domain models

export * from './types.js';
export * from './record.js';
export * from './plan.js';
