/**
 * Move Classification Logic
 *
 * One label per move, decided in a fixed order where the first matching
 * rule wins:
 *
 * 1. checkmate        -> best
 * 2. book             -> book
 * 3. only legal reply -> forced
 * 4. missing score    -> unknown
 * 5. miss             -> miss
 * 6. loss table       -> best .. blunder
 * 7. sacrifice upgrade of best/excellent -> brilliant
 */

import type { ChessPosition, MoveDetail, Side } from '@movegrade/pgn';

import type { LossLabel, MoveQuality, ProblemDiagnosis } from '../types/analysis.js';

import { pieceName, landedPiece } from './material.js';
import { isMiss, signedLoss } from './miss-detector.js';
import { diagnose } from './problem-diagnoser.js';
import { isSacrifice } from './sacrifice-detector.js';
import {
  clampLoss,
  DEFAULT_THRESHOLDS,
  labelForLoss,
  type ClassificationThresholds,
} from './thresholds.js';

/**
 * Everything the classifier needs to know about one move
 */
export interface MoveContext {
  positionBefore: ChessPosition;
  positionAfter: ChessPosition;
  move: MoveDetail;
  /** Centipawns from White's perspective, null when evaluation failed */
  evalBefore: number | null;
  evalAfter: number | null;
  /** Engine's preferred move in the position before, UCI */
  bestMove: string | null;
  /** Book lookup result for this move */
  isBook: boolean;
}

/**
 * Result of move classification
 */
export interface ClassificationResult {
  quality: MoveQuality;
  comment: string;
  /** Clamped loss in centipawns, null when it cannot be computed */
  cpLoss: number | null;
  /** Set when the label came from the loss table and it is bad */
  diagnosis: ProblemDiagnosis | null;
}

const LABEL_COMMENTS: Record<'best' | 'excellent' | 'good', string> = {
  best: 'Best move.',
  excellent: 'Excellent move.',
  good: 'Good move.',
};

const SEVERITY_COMMENTS: Record<'inaccuracy' | 'mistake' | 'blunder', string> = {
  inaccuracy: 'An inaccuracy; there was a more precise move.',
  mistake: 'A mistake that worsens the position.',
  blunder: 'A blunder that throws away the position.',
};

export const CHECKMATE_COMMENT = 'Perfect finishing move: checkmate.';
export const BOOK_COMMENT = 'Known opening theory.';
export const FORCED_COMMENT = 'Only legal move.';
export const UNKNOWN_COMMENT = 'Evaluation unavailable for this move.';

/**
 * Loss of a move in centipawns, clamped to [0, maxLoss].
 *
 * Delivering stalemate costs nothing from a roughly level position and a
 * fixed amount otherwise.
 */
export function computeCpLoss(
  evalBefore: number,
  evalAfter: number,
  sideToMove: Side,
  deliversStalemate: boolean,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS,
): number {
  if (deliversStalemate) {
    return Math.abs(evalBefore) < thresholds.stalemateBalanced ? 0 : thresholds.stalemateLoss;
  }
  return clampLoss(signedLoss(evalBefore, evalAfter, sideToMove), thresholds);
}

/**
 * Upgrade a best/excellent label to brilliant for a sound sacrifice.
 * Any other label passes through untouched.
 */
export function applyBrilliantUpgrade<L extends LossLabel>(
  label: L,
  sacrifice: boolean,
  evalBefore: number,
  evalAfter: number,
  sideToMove: Side,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS,
): L | 'brilliant' {
  if ((label !== 'best' && label !== 'excellent') || !sacrifice) {
    return label;
  }

  const advantageBefore = sideToMove === 'w' ? evalBefore : -evalBefore;
  if (advantageBefore > thresholds.competitiveLimit) {
    return label;
  }

  const holds =
    sideToMove === 'w' ? evalAfter >= -thresholds.brilliantFloor : evalAfter <= thresholds.brilliantFloor;
  return holds ? 'brilliant' : label;
}

function isForced(position: ChessPosition): boolean {
  return position.isCheck() && position.getLegalMoves().length === 1;
}

function bestMoveSan(context: MoveContext): string | undefined {
  if (!context.bestMove || context.bestMove === context.move.uci) return undefined;
  return context.positionBefore.findMoveByUci(context.bestMove)?.san;
}

/**
 * Classify a single move
 */
export function classifyMove(
  context: MoveContext,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS,
): ClassificationResult {
  const { positionBefore, positionAfter, move, evalBefore, evalAfter } = context;
  const side = move.color;

  const cpLoss =
    evalBefore !== null && evalAfter !== null
      ? computeCpLoss(evalBefore, evalAfter, side, positionAfter.isStalemate(), thresholds)
      : null;

  if (positionAfter.isCheckmate()) {
    return { quality: 'best', comment: CHECKMATE_COMMENT, cpLoss: 0, diagnosis: null };
  }

  if (context.isBook) {
    return { quality: 'book', comment: BOOK_COMMENT, cpLoss, diagnosis: null };
  }

  if (isForced(positionBefore)) {
    return { quality: 'forced', comment: FORCED_COMMENT, cpLoss, diagnosis: null };
  }

  if (evalBefore === null || evalAfter === null || cpLoss === null) {
    return { quality: 'unknown', comment: UNKNOWN_COMMENT, cpLoss: null, diagnosis: null };
  }

  if (isMiss(positionBefore, context.bestMove, move, evalBefore, evalAfter, side, thresholds)) {
    const better = bestMoveSan(context);
    return {
      quality: 'miss',
      comment: better ? `Missed ${better}, which kept a clear edge.` : 'Missed a stronger continuation.',
      cpLoss,
      diagnosis: null,
    };
  }

  const label = labelForLoss(cpLoss, thresholds);

  if (label === 'inaccuracy' || label === 'mistake' || label === 'blunder') {
    const diagnosis = diagnose(positionBefore, move, positionAfter);
    const better = bestMoveSan(context);
    const comment = diagnosis?.description ?? (better ? `${better} was better.` : SEVERITY_COMMENTS[label]);
    return { quality: label, comment, cpLoss, diagnosis };
  }

  const upgraded = applyBrilliantUpgrade(
    label,
    label === 'best' || label === 'excellent' ? isSacrifice(positionBefore, move) : false,
    evalBefore,
    evalAfter,
    side,
    thresholds,
  );
  if (upgraded === 'brilliant') {
    return {
      quality: 'brilliant',
      comment: `Brilliant ${pieceName(landedPiece(move))} sacrifice.`,
      cpLoss,
      diagnosis: null,
    };
  }

  return { quality: upgraded, comment: LABEL_COMMENTS[upgraded], cpLoss, diagnosis: null };
}
