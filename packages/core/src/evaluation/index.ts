export * from './evaluation-cache.js';
export * from './scheduler.js';
