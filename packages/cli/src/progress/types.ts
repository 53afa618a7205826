/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Phases of a CLI run
 */
export type AnalysisPhase =
  | 'initializing'
  | 'parsing'
  | 'evaluation'
  | 'classification'
  | 'rendering'
  | 'complete';

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<AnalysisPhase, string> = {
  initializing: 'Checking engine and book',
  parsing: 'Parsing PGN',
  evaluation: 'Evaluating positions',
  classification: 'Classifying moves',
  rendering: 'Rendering output',
  complete: 'Complete',
};

/**
 * Health of an external dependency
 */
export interface ServiceStatus {
  name: string;
  healthy: boolean;
  latencyMs?: number;
  /** Extra detail shown after the name, e.g. the engine's id */
  detail?: string;
  error?: string;
}

/**
 * Totals printed at the end of a run
 */
export interface RunSummary {
  gamesAnalyzed: number;
  movesAnalyzed: number;
  failedEvaluations: number;
  /** Moves labelled brilliant, miss, inaccuracy, mistake or blunder */
  reviewMoves: number;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
}
