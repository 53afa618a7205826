/**
 * Classification thresholds
 *
 * Values are in centipawns (cp) unless stated otherwise.
 */

import type { LossLabel } from '../types/analysis.js';

/**
 * Tunable limits used by the move classifier
 */
export interface ClassificationThresholds {
  /** Maximum loss for each label; anything above `mistake` is a blunder */
  best: number;
  excellent: number;
  good: number;
  inaccuracy: number;
  mistake: number;
  /** Losses are clamped to [0, maxLoss] so mate scores do not distort the scale */
  maxLoss: number;
  /** Signed loss band in which a move can be a miss (inclusive) */
  missBand: [number, number];
  /** Advantage the mover must already hold for a miss */
  missAdvantage: number;
  /** Minimum value (pawns) of a piece the best move captures for a miss */
  missCaptureValue: number;
  /** A position stops being competitive above this advantage for the mover */
  competitiveLimit: number;
  /** After a brilliant sacrifice the mover may be at most this far behind */
  brilliantFloor: number;
  /** Stalemating costs nothing when |evalBefore| is below this */
  stalemateBalanced: number;
  /** Fixed loss for stalemating from an unbalanced position */
  stalemateLoss: number;
  /** Plies (from the start of the game) that may be book moves */
  bookPlies: number;
}

export const DEFAULT_THRESHOLDS: ClassificationThresholds = {
  best: 0,
  excellent: 10,
  good: 30,
  inaccuracy: 80,
  mistake: 200,
  maxLoss: 800,
  missBand: [50, 200],
  missAdvantage: 100,
  missCaptureValue: 3,
  competitiveLimit: 500,
  brilliantFloor: 100,
  stalemateBalanced: 200,
  stalemateLoss: 150,
  bookPlies: 10,
};

/**
 * Merge partial overrides onto the defaults
 */
export function resolveThresholds(overrides: Partial<ClassificationThresholds> = {}): ClassificationThresholds {
  return { ...DEFAULT_THRESHOLDS, ...overrides };
}

/**
 * Clamp a raw loss into [0, maxLoss]
 */
export function clampLoss(loss: number, thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS): number {
  return Math.min(Math.max(loss, 0), thresholds.maxLoss);
}

/**
 * Look up a clamped loss in the threshold table
 */
export function labelForLoss(loss: number, thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS): LossLabel {
  if (loss <= thresholds.best) return 'best';
  if (loss <= thresholds.excellent) return 'excellent';
  if (loss <= thresholds.good) return 'good';
  if (loss <= thresholds.inaccuracy) return 'inaccuracy';
  if (loss <= thresholds.mistake) return 'mistake';
  return 'blunder';
}
