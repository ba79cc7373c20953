// Public API of the retention engine

export * from './models/index.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/schemas.js';
export * from './core/time.js';
export * from './services/index.js';
