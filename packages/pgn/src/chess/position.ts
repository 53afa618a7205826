import { Chess, type Move, type Square } from 'chess.js';

import { InvalidFenError, InvalidMoveError } from '../errors.js';

/** Side to move */
export type Side = 'w' | 'b';

/** Piece letter as used in FEN (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * A piece on the board
 */
export interface PieceInfo {
  type: PieceType;
  color: Side;
}

/**
 * A piece together with the square it stands on
 */
export interface LocatedPiece extends PieceInfo {
  square: string;
}

/**
 * A legal move, described relative to the position it is played from
 */
export interface MoveDetail {
  /** Standard Algebraic Notation (e.g. "Nxe5+") */
  san: string;
  /** UCI notation (e.g. "g1f3", "e7e8q") */
  uci: string;
  from: string;
  to: string;
  color: Side;
  piece: PieceType;
  captured?: PieceType;
  promotion?: PieceType;
}

/**
 * Result of applying a move to a position
 */
export interface MoveResult extends MoveDetail {
  /** FEN before the move was made */
  fenBefore: string;
  /** FEN after the move was made */
  fenAfter: string;
}

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const UCI_MOVE_PATTERN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

const SQUARE_NAMES: ReadonlySet<string> = new Set(
  Array.from('abcdefgh').flatMap((file) => Array.from('12345678').map((rank) => `${file}${rank}`)),
);

/**
 * Check that a string names a board square
 */
export function isSquare(value: string): value is Square {
  return SQUARE_NAMES.has(value);
}

/**
 * Check whether a move token is written in UCI notation
 */
export function isUciMove(token: string): boolean {
  return UCI_MOVE_PATTERN.test(token);
}

/**
 * Canonical position fingerprint: placement, side to move, castling rights
 * and en-passant square. Move counters are dropped so that transpositions
 * share one fingerprint.
 *
 * @throws InvalidFenError if the FEN has fewer than four fields
 */
export function toFingerprint(fen: string): string {
  const parts = fen.trim().split(/\s+/);
  if (parts.length < 4) {
    throw new InvalidFenError(fen);
  }
  return parts.slice(0, 4).join(' ');
}

/**
 * The opposing side
 */
export function opponentOf(side: Side): Side {
  return side === 'w' ? 'b' : 'w';
}

function toMoveDetail(move: Move): MoveDetail {
  const detail: MoveDetail = {
    san: move.san,
    uci: `${move.from}${move.to}${move.promotion ?? ''}`,
    from: move.from,
    to: move.to,
    color: move.color,
    piece: move.piece,
  };
  if (move.captured) detail.captured = move.captured;
  if (move.promotion) detail.promotion = move.promotion;
  return detail;
}

function requireSquare(square: string): Square {
  if (!isSquare(square)) {
    throw new RangeError(`Invalid square: ${square}`);
  }
  return square;
}

/**
 * A chess position wrapper around chess.js
 *
 * This is the rules oracle for the rest of the project: legality, SAN
 * rendering, check/mate/stalemate detection and attack-set queries all
 * go through it.
 */
export class ChessPosition {
  private chess: Chess;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(fen);
      }
    } else {
      this.chess = new Chess();
    }
  }

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  /**
   * Get the current position as a FEN string
   */
  fen(): string {
    return this.chess.fen();
  }

  /**
   * Transposition-safe identifier of this position
   */
  fingerprint(): string {
    return toFingerprint(this.chess.fen());
  }

  /**
   * Apply a move given in SAN or UCI notation, mutating this position
   * @throws InvalidMoveError if the move is not legal
   */
  move(notation: string): MoveResult {
    const fenBefore = this.chess.fen();
    let applied: Move;
    try {
      if (isUciMove(notation)) {
        const moveObj: { from: string; to: string; promotion?: string } = {
          from: notation.slice(0, 2),
          to: notation.slice(2, 4),
        };
        const promotion = notation.slice(4);
        if (promotion) {
          moveObj.promotion = promotion;
        }
        applied = this.chess.move(moveObj);
      } else {
        applied = this.chess.move(notation);
      }
    } catch {
      // chess.js throws a plain Error for illegal moves
      throw new InvalidMoveError(notation, fenBefore);
    }
    return {
      ...toMoveDetail(applied),
      fenBefore,
      fenAfter: this.chess.fen(),
    };
  }

  /**
   * Return the position reached by a move, leaving this one untouched
   * @throws InvalidMoveError if the move is not legal
   */
  afterMove(move: string | MoveDetail): ChessPosition {
    const next = this.clone();
    next.move(typeof move === 'string' ? move : move.uci);
    return next;
  }

  /**
   * Get all legal moves in SAN notation
   */
  getLegalMoves(): string[] {
    return this.chess.moves();
  }

  /**
   * Get all legal moves with full detail, optionally only those from one square
   */
  getLegalMoveDetails(fromSquare?: string): MoveDetail[] {
    const moves =
      fromSquare === undefined
        ? this.chess.moves({ verbose: true })
        : this.chess.moves({ verbose: true, square: requireSquare(fromSquare) });
    return moves.map(toMoveDetail);
  }

  /**
   * Find the legal move matching a UCI string
   */
  findMoveByUci(uci: string): MoveDetail | undefined {
    return this.getLegalMoveDetails().find((m) => m.uci === uci);
  }

  /**
   * Get whose turn it is
   */
  turn(): Side {
    return this.chess.turn();
  }

  /**
   * Check if the current side is in check
   */
  isCheck(): boolean {
    return this.chess.isCheck();
  }

  /**
   * Check if the current side is checkmated
   */
  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  /**
   * Check if the position is stalemate
   */
  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  /**
   * Create a copy of this position
   */
  clone(): ChessPosition {
    return new ChessPosition(this.fen());
  }

  /**
   * Convert a UCI move to SAN notation
   * @throws InvalidMoveError if the move is not legal
   */
  uciToSan(uci: string): string {
    const move = this.findMoveByUci(uci);
    if (!move) {
      throw new InvalidMoveError(uci, this.fen());
    }
    return move.san;
  }

  /**
   * Convert a SAN move to UCI notation
   * @throws InvalidMoveError if the move is not legal
   */
  sanToUci(san: string): string {
    return this.afterMoveResult(san).uci;
  }

  /**
   * Get the piece at a square
   * @returns Piece or undefined if the square is empty
   */
  getPiece(square: string): PieceInfo | undefined {
    const piece = this.chess.get(requireSquare(square));
    if (!piece) return undefined;
    return { type: piece.type, color: piece.color };
  }

  /**
   * Squares holding pieces of `byColor` that attack the given square.
   * The occupant of the square does not matter, so this also answers
   * "who defends this piece" when asked for the occupant's own colour.
   */
  getAttackers(square: string, byColor: Side): string[] {
    return this.chess.attackers(requireSquare(square), byColor);
  }

  /**
   * Find the king of a side
   */
  findKing(color: Side): string | undefined {
    return this.getAllPieces().find((p) => p.type === 'k' && p.color === color)?.square;
  }

  /**
   * Get all pieces on the board
   */
  getAllPieces(): LocatedPiece[] {
    const pieces: LocatedPiece[] = [];
    for (const row of this.chess.board()) {
      for (const piece of row) {
        if (piece) {
          pieces.push({ square: piece.square, type: piece.type, color: piece.color });
        }
      }
    }
    return pieces;
  }

  private afterMoveResult(notation: string): MoveResult {
    return this.clone().move(notation);
  }
}
