import { InvalidMoveError, ParseError } from '../errors.js';

import { ChessPosition, STARTING_FEN } from './position.js';
import type { MoveDetail, Side } from './position.js';

/**
 * A move as it was played in the game, with the positions around it
 */
export interface PlayedMove extends MoveDetail {
  /** Zero-based half-move index */
  ply: number;
  /** Full-move number shown in PGN (1. e4 e5 2. ...) */
  moveNumber: number;
  color: Side;
  fenBefore: string;
  fenAfter: string;
}

/**
 * The induced position sequence of a move list
 */
export interface EnumeratedGame {
  startFen: string;
  /** `moves.length + 1` FENs, starting with `startFen` */
  positions: string[];
  moves: PlayedMove[];
}

/**
 * Replay a move list from a start position and record every position reached.
 *
 * Moves may be written in SAN or UCI. The full-move number is read from the
 * start FEN so that games starting from a set-up position number their moves
 * correctly.
 *
 * @throws InvalidFenError if `startFen` is malformed
 * @throws InvalidMoveError on the first illegal move, naming its ply
 */
export function enumeratePositions(moves: readonly string[], startFen?: string): EnumeratedGame {
  const position = new ChessPosition(startFen ?? STARTING_FEN);
  const initialFen = position.fen();
  const positions: string[] = [initialFen];
  const played: PlayedMove[] = [];

  let moveNumber = fullMoveNumber(initialFen);

  moves.forEach((token, ply) => {
    const notation = token.trim();
    const fenBefore = position.fen();
    let detail: MoveDetail;
    try {
      detail = position.move(notation);
    } catch (err) {
      if (err instanceof ParseError) {
        throw new InvalidMoveError(notation, fenBefore, ply);
      }
      throw err;
    }

    const fenAfter = position.fen();
    played.push({ ...detail, ply, moveNumber, fenBefore, fenAfter });
    positions.push(fenAfter);

    if (detail.color === 'b') {
      moveNumber++;
    }
  });

  return { startFen: initialFen, positions, moves: played };
}

function fullMoveNumber(fen: string): number {
  const field = fen.split(' ')[5];
  const parsed = field === undefined ? NaN : parseInt(field, 10);
  return Number.isNaN(parsed) || parsed < 1 ? 1 : parsed;
}
