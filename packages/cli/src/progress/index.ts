/**
 * Progress module exports
 */

export type { AnalysisPhase, ServiceStatus, RunSummary, ProgressReporterOptions } from './reporter.js';
export { ProgressReporter, createPipelineProgressCallback } from './reporter.js';
export { PHASE_NAMES } from './types.js';
export {
  formatConfigDisplay,
  formatDuration,
  formatFileSize,
  formatPawns,
  formatPercentage,
} from './formatters.js';
