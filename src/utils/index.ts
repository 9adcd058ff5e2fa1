export * from './errors.js';
export * from './logger.js';
export * from './async-helpers.js';
