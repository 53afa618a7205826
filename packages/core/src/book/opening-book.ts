/**
 * Opening Book Oracle
 */

import { toFingerprint } from '@movegrade/pgn';

import { DEFAULT_THRESHOLDS } from '../classifier/thresholds.js';

/**
 * Position lookup backing the oracle (the SQLite book client in production)
 */
export interface BookSource {
  hasPosition(fen: string): boolean;
}

export interface OpeningBookOptions {
  /** Plies with an index below this may be book (default: 10) */
  maxPly?: number;
  /** Called once, on the first failed lookup */
  onError?: (error: Error) => void;
}

/**
 * Answers "is this a book move?" for one game.
 *
 * A move is book when the position it reaches is in the book. Answers are
 * memoized per fingerprint. After the first lookup failure the source is
 * no longer consulted and every answer is false.
 */
export class OpeningBookOracle {
  private readonly memo = new Map<string, boolean>();
  private readonly maxPly: number;
  private readonly onError: (error: Error) => void;
  private failed = false;

  constructor(
    private readonly source: BookSource | null,
    options: OpeningBookOptions = {},
  ) {
    this.maxPly = options.maxPly ?? DEFAULT_THRESHOLDS.bookPlies;
    this.onError = options.onError ?? ((error) => console.warn(`Opening book unavailable: ${error.message}`));
  }

  /**
   * @param ply - Zero-based half-move index of the move
   * @param fenAfter - Position reached by the move
   */
  isBookMove(ply: number, fenAfter: string): boolean {
    if (!this.source || ply >= this.maxPly) {
      return false;
    }

    const key = toFingerprint(fenAfter);
    const known = this.memo.get(key);
    if (known !== undefined) {
      return known;
    }

    const result = this.lookup(fenAfter);
    this.memo.set(key, result);
    return result;
  }

  /** Whether a lookup has failed during this game */
  get degraded(): boolean {
    return this.failed;
  }

  private lookup(fen: string): boolean {
    if (!this.source || this.failed) return false;
    try {
      return this.source.hasPosition(fen);
    } catch (err) {
      this.failed = true;
      this.onError(err instanceof Error ? err : new Error(String(err)));
      return false;
    }
  }
}
