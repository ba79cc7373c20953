export * from './history-retention.js';
export * from './history-store.js';
