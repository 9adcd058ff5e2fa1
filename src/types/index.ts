export * from './metrics.js';
export * from './endpoints.js';
