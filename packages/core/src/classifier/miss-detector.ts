/**
 * Miss detection
 *
 * A miss is a moderate slip in a position that offered something concrete:
 * either the mover was already clearly better or the engine's move won
 * material outright. Moves that hang a piece are left to the loss table.
 */

import type { ChessPosition, MoveDetail, Side } from '@movegrade/pgn';

import { capturedValue } from './material.js';
import { hangsPiece } from './problem-diagnoser.js';
import { DEFAULT_THRESHOLDS, type ClassificationThresholds } from './thresholds.js';

/**
 * Signed loss for the side to move: positive when the move made things worse
 */
export function signedLoss(evalBefore: number, evalAfter: number, sideToMove: Side): number {
  const sign = sideToMove === 'w' ? 1 : -1;
  return sign * (evalBefore - evalAfter);
}

/**
 * Decide whether a move missed a clear opportunity
 *
 * @param bestMove - Engine's preferred move in UCI, if known
 * @param evalBefore - Centipawns from White's perspective before the move
 * @param evalAfter - Centipawns from White's perspective after the move
 */
export function isMiss(
  positionBefore: ChessPosition,
  bestMove: string | null,
  playedMove: MoveDetail,
  evalBefore: number | null,
  evalAfter: number | null,
  sideToMove: Side,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS,
): boolean {
  if (evalBefore === null || evalAfter === null) {
    return false;
  }

  const loss = signedLoss(evalBefore, evalAfter, sideToMove);
  const [low, high] = thresholds.missBand;
  if (loss < low || loss > high) {
    return false;
  }

  const advantage = sideToMove === 'w' ? evalBefore : -evalBefore;
  const bestCapture = bestMove ? positionBefore.findMoveByUci(bestMove) : undefined;
  const opportunity =
    advantage >= thresholds.missAdvantage ||
    (bestCapture !== undefined && capturedValue(bestCapture) >= thresholds.missCaptureValue);
  if (!opportunity) {
    return false;
  }

  return !hangsPiece(positionBefore, playedMove, positionBefore.afterMove(playedMove));
}
