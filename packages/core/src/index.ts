/**
 * @movegrade/core - Move quality classification
 *
 * This package contains the analysis pipeline:
 * - Parallel position evaluation into a per-game cache
 * - Opening book lookups
 * - Move classification with structural diagnosis
 */

export const VERSION = '0.1.0';

// Re-export types
export * from './types/index.js';
export * from './errors.js';

// Re-export classifier utilities
export * from './classifier/index.js';

// Re-export evaluation scheduling
export * from './evaluation/index.js';

export * from './book/opening-book.js';

// Re-export pipeline
export * from './pipeline/index.js';
