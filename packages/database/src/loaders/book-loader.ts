/**
 * Opening book loader
 *
 * Builds the book database from tab-separated opening lists.
 * TSV format: eco \t name \t pgn [\t anything else]
 *
 * Every position reached within `maxPlies` of each line is stored under its
 * fingerprint, so lookups match transpositions as well.
 */

import * as fs from 'node:fs';

import { ChessPosition, ParseError } from '@movegrade/pgn';
import BetterSqlite3 from 'better-sqlite3';

/**
 * Options for building a book database
 */
export interface BookLoaderOptions {
  /** TSV files to read */
  sources: string[];
  /** Output database path (created or extended) */
  dbPath: string;
  /** Deepest ply stored per line (default: 20) */
  maxPlies?: number;
  /** Called for every skipped line or missing file */
  onWarning?: (message: string) => void;
}

/**
 * Counts reported after a load
 */
export interface BookLoadStats {
  files: number;
  lines: number;
  skipped: number;
  positions: number;
}

export const DEFAULT_MAX_BOOK_PLIES = 20;

interface OpeningRow {
  eco: string;
  name: string;
  pgn: string;
}

function createSchema(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS book_positions (
      epd TEXT PRIMARY KEY,
      eco TEXT NOT NULL,
      name TEXT NOT NULL,
      ply INTEGER NOT NULL
    );
  `);
}

/**
 * Parse a TSV line into opening data
 */
export function parseTsvLine(line: string): OpeningRow | null {
  const parts = line.split('\t');
  const [eco, name, pgn] = parts;
  if (eco === undefined || name === undefined || pgn === undefined) {
    return null;
  }
  if (!eco.trim() || !pgn.trim()) {
    return null;
  }
  return { eco: eco.trim(), name: name.trim(), pgn: pgn.trim() };
}

/**
 * Split PGN move text into SAN tokens, dropping move numbers and results
 */
export function pgnToSanMoves(pgn: string): string[] {
  return pgn
    .replace(/\d+\.(\.\.)?/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0 && !/^(1-0|0-1|1\/2-1\/2|\*)$/.test(token));
}

/**
 * Build (or extend) a book database from TSV opening lists
 */
export function loadBookDatabase(options: BookLoaderOptions): BookLoadStats {
  const maxPlies = options.maxPlies ?? DEFAULT_MAX_BOOK_PLIES;
  const warn = options.onWarning ?? ((message: string) => console.warn(message));
  const stats: BookLoadStats = { files: 0, lines: 0, skipped: 0, positions: 0 };

  const db = new BetterSqlite3(options.dbPath);

  try {
    createSchema(db);

    // Intermediate positions keep whichever line reached them first;
    // the final position of a line is named after that line.
    const insertPassing = db.prepare(
      'INSERT OR IGNORE INTO book_positions (epd, eco, name, ply) VALUES (?, ?, ?, ?)',
    );
    const upsertFinal = db.prepare(`
      INSERT INTO book_positions (epd, eco, name, ply) VALUES (?, ?, ?, ?)
      ON CONFLICT(epd) DO UPDATE SET eco = excluded.eco, name = excluded.name,
        ply = MIN(book_positions.ply, excluded.ply)
    `);

    const loadLine = db.transaction((row: OpeningRow): void => {
      const moves = pgnToSanMoves(row.pgn).slice(0, maxPlies);
      const position = new ChessPosition();
      const fingerprints: string[] = [];
      for (const san of moves) {
        position.move(san);
        fingerprints.push(position.fingerprint());
      }
      fingerprints.forEach((fingerprint, index) => {
        const stmt = index === fingerprints.length - 1 ? upsertFinal : insertPassing;
        stmt.run(fingerprint, row.eco, row.name, index + 1);
      });
    });

    for (const source of options.sources) {
      if (!fs.existsSync(source)) {
        warn(`Book source not found: ${source}`);
        continue;
      }
      stats.files++;

      const lines = fs.readFileSync(source, 'utf-8').split(/\r?\n/);
      lines.forEach((line, index) => {
        if (!line.trim() || (index === 0 && line.startsWith('eco\t'))) {
          return;
        }
        stats.lines++;

        const row = parseTsvLine(line);
        if (!row) {
          stats.skipped++;
          warn(`Skipping malformed line ${index + 1} in ${source}`);
          return;
        }

        try {
          loadLine(row);
        } catch (err) {
          if (!(err instanceof ParseError)) throw err;
          stats.skipped++;
          warn(`Skipping line ${index + 1} in ${source}: ${err.message}`);
        }
      });
    }

    const count = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM book_positions').get();
    stats.positions = count?.n ?? 0;
    db.exec('ANALYZE');
  } finally {
    db.close();
  }

  return stats;
}
