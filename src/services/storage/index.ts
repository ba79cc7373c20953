// Storage services

export * from './record-store.js';
export * from './atomic-file.js';
export * from './write-lock.js';
export * from './ordering.js';
