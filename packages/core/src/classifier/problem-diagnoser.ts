/**
 * Problem Diagnoser
 *
 * Explains why a weak move is weak by looking at the board rather than the
 * evaluation. Checks run in priority order and the first match wins.
 */

import { opponentOf } from '@movegrade/pgn';
import type { ChessPosition, MoveDetail } from '@movegrade/pgn';

import type { ProblemDiagnosis } from '../types/analysis.js';

import { inspectSquare } from './exchange.js';
import {
  capturedValue,
  landedPiece,
  MINOR_PIECE_VALUE,
  movedValue,
  pieceName,
  pieceValue,
} from './material.js';

type ProblemCheck = (
  positionBefore: ChessPosition,
  move: MoveDetail,
  positionAfter: ChessPosition,
) => ProblemDiagnosis | null;

/** Minimum net loss (pawns) for an exchange to count as a bad trade */
const BAD_TRADE_MARGIN = 2;

const allowsCheckmate: ProblemCheck = (_before, _move, after) => {
  for (const reply of after.getLegalMoveDetails()) {
    if (after.afterMove(reply).isCheckmate()) {
      return {
        kind: 'allows_checkmate',
        description: `Allows checkmate with ${reply.san}.`,
        materialLost: 0,
      };
    }
  }
  return null;
};

// Legal moves never match; this only guards a positionAfter supplied from outside
const walkedIntoCheck: ProblemCheck = (_before, move, after) => {
  const king = after.findKing(move.color);
  if (!king) return null;

  const [checker] = after.getAttackers(king, opponentOf(move.color));
  if (checker === undefined) return null;

  const piece = after.getPiece(checker);
  const name = piece ? pieceName(piece.type) : 'piece';
  return {
    kind: 'walked_into_check',
    description: `Leaves the king in check from the ${name} on ${checker}.`,
    materialLost: 0,
  };
};

const hangingPiece: ProblemCheck = (_before, move, after) => {
  const { attackers, defenders } = inspectSquare(after, move.to, move.color);
  const loss = movedValue(move) - capturedValue(move);
  if (attackers.length === 0 || defenders.length > 0 || loss <= 0) {
    return null;
  }

  const name = pieceName(landedPiece(move));
  const description = move.captured
    ? `Hangs the ${name} on ${move.to}; taking the ${pieceName(move.captured)} only partly makes up for it.`
    : `Hangs the ${name} on ${move.to}.`;
  return { kind: 'hanging_piece', description, materialLost: loss };
};

const badTrade: ProblemCheck = (_before, move, after) => {
  const { cheapestAttacker, defenders } = inspectSquare(after, move.to, move.color);
  if (!cheapestAttacker || defenders.length === 0) return null;

  const moved = movedValue(move);
  if (cheapestAttacker.value >= moved) return null;

  const loss = moved - cheapestAttacker.value - capturedValue(move);
  if (loss < BAD_TRADE_MARGIN) return null;

  return {
    kind: 'bad_trade',
    description: `The ${pieceName(landedPiece(move))} on ${move.to} can be won by the ${pieceName(cheapestAttacker.type)} on ${cheapestAttacker.square}.`,
    materialLost: loss,
  };
};

const leavesPieceHanging: ProblemCheck = (before, move, after) => {
  let worst: { square: string; value: number; name: string } | null = null;

  for (const piece of after.getAllPieces()) {
    if (piece.color !== move.color || piece.square === move.to) continue;

    const value = pieceValue(piece.type);
    if (value < MINOR_PIECE_VALUE) continue;

    // Only pieces that stood still and used to be covered
    const previous = before.getPiece(piece.square);
    if (!previous || previous.type !== piece.type || previous.color !== piece.color) continue;
    if (before.getAttackers(piece.square, move.color).length === 0) continue;

    const { attackers, defenders } = inspectSquare(after, piece.square, move.color);
    if (attackers.length === 0 || defenders.length > 0) continue;

    if (!worst || value > worst.value) {
      worst = { square: piece.square, value, name: pieceName(piece.type) };
    }
  }

  if (!worst) return null;
  return {
    kind: 'leaves_piece_hanging',
    description: `Leaves the ${worst.name} on ${worst.square} undefended.`,
    materialLost: worst.value,
  };
};

const missedCapture: ProblemCheck = (before, move) => {
  const captured = capturedValue(move);
  const enemy = opponentOf(move.color);
  let best: { square: string; value: number; name: string } | null = null;

  for (const alternative of before.getLegalMoveDetails(move.from)) {
    if (!alternative.captured || alternative.uci === move.uci) continue;

    const value = pieceValue(alternative.captured);
    if (value <= captured) continue;
    if (before.getAttackers(alternative.to, enemy).length > 0) continue;

    if (!best || value > best.value) {
      best = { square: alternative.to, value, name: pieceName(alternative.captured) };
    }
  }

  if (!best) return null;
  return {
    kind: 'missed_capture',
    description: `Misses the undefended ${best.name} on ${best.square}.`,
    materialLost: best.value - captured,
  };
};

const CHECKS: readonly ProblemCheck[] = [
  allowsCheckmate,
  walkedIntoCheck,
  hangingPiece,
  badTrade,
  leavesPieceHanging,
  missedCapture,
];

/**
 * Find the most important structural problem with a move
 *
 * @returns The first matching diagnosis, or null when nothing is wrong on the board
 */
export function diagnose(
  positionBefore: ChessPosition,
  move: MoveDetail,
  positionAfter: ChessPosition,
): ProblemDiagnosis | null {
  for (const check of CHECKS) {
    const diagnosis = check(positionBefore, move, positionAfter);
    if (diagnosis) return diagnosis;
  }
  return null;
}

/**
 * Does the move put material en prise, either the moved piece or another one?
 */
export function hangsPiece(positionBefore: ChessPosition, move: MoveDetail, positionAfter: ChessPosition): boolean {
  return (
    hangingPiece(positionBefore, move, positionAfter) !== null ||
    leavesPieceHanging(positionBefore, move, positionAfter) !== null
  );
}
