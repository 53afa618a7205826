/**
 * Sacrifice detection
 *
 * A sacrifice leaves material en prise for less than it is worth. Even
 * trades are recognised first so that a recapturable exchange of equal
 * pieces never counts.
 */

import type { ChessPosition, MoveDetail } from '@movegrade/pgn';

import { inspectSquare } from './exchange.js';
import { capturedValue, MINOR_PIECE_VALUE, movedValue } from './material.js';

/** Net material (pawns) a move must put at risk to be a sacrifice */
const SACRIFICE_MARGIN = 2;

/**
 * Decide whether a move sacrifices material
 *
 * @param positionBefore - Position the move is played from
 * @param move - A legal move in that position
 */
export function isSacrifice(positionBefore: ChessPosition, move: MoveDetail): boolean {
  const moved = movedValue(move);
  const captured = capturedValue(move);

  const positionAfter = positionBefore.afterMove(move);
  const { cheapestAttacker, defenders } = inspectSquare(positionAfter, move.to, move.color);

  if (!cheapestAttacker) {
    return false;
  }

  // Even trade
  if (cheapestAttacker.value === moved && captured === 0) {
    return false;
  }

  const defended = defenders.length > 0;

  // Piece left en prise
  if (!defended && captured === 0 && moved >= MINOR_PIECE_VALUE) {
    return true;
  }

  // Cheaper attacker wins material even after recapture
  if (cheapestAttacker.value < moved && moved - cheapestAttacker.value - captured >= SACRIFICE_MARGIN) {
    return true;
  }

  // Capture that gives back more than it takes
  return captured > 0 && captured - moved <= -SACRIFICE_MARGIN && !defended;
}
