/**
 * Piece values
 *
 * Values are in pawns. They drive sacrifice detection and the problem
 * diagnoser, never the evaluation itself.
 */

import type { ChessPosition, MoveDetail, PieceType } from '@movegrade/pgn';

/**
 * Standard piece values in pawns
 */
export const PIECE_VALUES: Record<PieceType, number> = {
  p: 1,
  n: 3,
  b: 3,
  r: 5,
  q: 9,
  k: 0, // king (never traded)
};

const PIECE_NAMES: Record<PieceType, string> = {
  p: 'pawn',
  n: 'knight',
  b: 'bishop',
  r: 'rook',
  q: 'queen',
  k: 'king',
};

/** Value from which a piece counts as minor or greater */
export const MINOR_PIECE_VALUE = 3;

export function pieceValue(type: PieceType): number {
  return PIECE_VALUES[type];
}

export function pieceName(type: PieceType): string {
  return PIECE_NAMES[type];
}

/**
 * Value of whatever stands on a square (0 when empty)
 */
export function valueAt(position: ChessPosition, square: string): number {
  const piece = position.getPiece(square);
  return piece ? pieceValue(piece.type) : 0;
}

/**
 * The piece standing on the destination after the move (promotion applied)
 */
export function landedPiece(move: MoveDetail): PieceType {
  return move.promotion ?? move.piece;
}

/**
 * Value of the piece after the move lands, promotion included
 */
export function movedValue(move: MoveDetail): number {
  return pieceValue(landedPiece(move));
}

/**
 * Value of the piece the move captured (0 for quiet moves)
 */
export function capturedValue(move: MoveDetail): number {
  return move.captured ? pieceValue(move.captured) : 0;
}
