// Export all services

export * from './id-generator.js';
export * from './storage/index.js';
export * from './history/index.js';
export * from './plans/index.js';
export * from './config/config-service.js';
export * from './sweeper/artifact-sweeper.js';
export * from './usage/usage-reporter.js';
