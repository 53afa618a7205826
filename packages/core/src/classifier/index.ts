/**
 * Classification exports
 */

export * from './thresholds.js';
export * from './material.js';
export * from './exchange.js';
export * from './sacrifice-detector.js';
export * from './problem-diagnoser.js';
export * from './miss-detector.js';
export * from './move-classifier.js';
