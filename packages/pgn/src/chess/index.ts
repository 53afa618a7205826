export {
  ChessPosition,
  STARTING_FEN,
  isSquare,
  isUciMove,
  opponentOf,
  toFingerprint,
} from './position.js';
export type { LocatedPiece, MoveDetail, MoveResult, PieceInfo, PieceType, Side } from './position.js';

export { enumeratePositions } from './enumerator.js';
export type { EnumeratedGame, PlayedMove } from './enumerator.js';
