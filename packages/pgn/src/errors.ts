/**
 * Error thrown when game input cannot be turned into a move sequence.
 * Fatal for the game being analyzed.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(message);
    this.name = 'ParseError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ParseError);
    }
  }
}

/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends ParseError {
  constructor(public readonly fen: string) {
    super(`Invalid FEN: ${fen}`);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when a move is not legal in the position it is played from
 */
export class InvalidMoveError extends ParseError {
  constructor(
    public readonly move: string,
    public readonly fen: string,
    public readonly ply?: number,
  ) {
    super(
      ply !== undefined
        ? `Illegal move "${move}" at ply ${ply + 1} in position: ${fen}`
        : `Illegal move "${move}" in position: ${fen}`,
    );
    this.name = 'InvalidMoveError';
  }
}
