/**
 * Opening book client
 */

import { toFingerprint } from '@movegrade/pgn';

import { QueryError } from '../errors.js';
import { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';

/**
 * Default configuration for the book client
 */
export const DEFAULT_BOOK_CONFIG: DatabaseClientConfig = {
  dbPath: 'book.db',
  readonly: true,
  timeoutMs: 5000,
};

/**
 * A position known to opening theory
 */
export interface BookEntry {
  /** Position fingerprint (first four FEN fields) */
  fingerprint: string;
  eco: string;
  /** Name of the opening line the position belongs to */
  name: string;
  /** Shallowest ply at which the position was seen */
  ply: number;
}

interface RawBookRow {
  epd: string;
  eco: string;
  name: string;
  ply: number;
}

const SELECT_ENTRY = 'SELECT epd, eco, name, ply FROM book_positions WHERE epd = ?';
const SELECT_EXISTS = 'SELECT 1 AS found FROM book_positions WHERE epd = ? LIMIT 1';

/**
 * Client for the opening book database
 */
export class BookClient extends BaseDatabaseClient {
  constructor(config: Partial<DatabaseClientConfig> = {}) {
    super({
      ...DEFAULT_BOOK_CONFIG,
      ...config,
    });
  }

  /**
   * Check whether a position is part of the book.
   *
   * @param fen - Full FEN or fingerprint of the position
   * @throws DatabaseNotFoundError if the book file is missing
   * @throws QueryError if the lookup fails
   */
  hasPosition(fen: string): boolean {
    const db = this.ensureConnected();
    try {
      const row = db.prepare<[string], { found: number }>(SELECT_EXISTS).get(toFingerprint(fen));
      return row !== undefined;
    } catch (err) {
      throw new QueryError(`Book lookup failed: ${errorMessage(err)}`, SELECT_EXISTS);
    }
  }

  /**
   * Look up the book entry for a position
   *
   * @param fen - Full FEN or fingerprint of the position
   * @returns The entry or undefined if the position is not in the book
   */
  getEntry(fen: string): BookEntry | undefined {
    const db = this.ensureConnected();
    let row: RawBookRow | undefined;
    try {
      row = db.prepare<[string], RawBookRow>(SELECT_ENTRY).get(toFingerprint(fen));
    } catch (err) {
      throw new QueryError(`Book lookup failed: ${errorMessage(err)}`, SELECT_ENTRY);
    }
    if (!row) return undefined;
    return { fingerprint: row.epd, eco: row.eco, name: row.name, ply: row.ply };
  }

  /**
   * Number of positions in the book
   */
  size(): number {
    const db = this.ensureConnected();
    const row = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM book_positions').get();
    return row?.n ?? 0;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
