/**
 * @movegrade/pgn - chess rules and game input
 *
 * This package handles:
 * - The rules oracle (a thin wrapper over chess.js)
 * - PGN parsing (headers and main-line moves)
 * - Replaying a move list into its position sequence
 */

export const VERSION = '0.1.0';

export { parsePgnString as parsePgn } from './parser/pgn-parser.js';
export type { GameMetadata, ParsedGame } from './parser/pgn-parser.js';

export {
  ChessPosition,
  STARTING_FEN,
  enumeratePositions,
  isSquare,
  isUciMove,
  opponentOf,
  toFingerprint,
} from './chess/index.js';
export type {
  EnumeratedGame,
  LocatedPiece,
  MoveDetail,
  MoveResult,
  PieceInfo,
  PieceType,
  PlayedMove,
  Side,
} from './chess/index.js';

export { ParseError, InvalidFenError, InvalidMoveError } from './errors.js';
