/**
 * Pipeline exports
 */

export * from './game-analyzer.js';
export * from './summary.js';
