import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { ChessPosition } from '@movegrade/pgn';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BookClient, DEFAULT_BOOK_CONFIG } from '../clients/book.js';
import { DatabaseError, DatabaseNotFoundError } from '../errors.js';
import { loadBookDatabase, parseTsvLine, pgnToSanMoves } from '../loaders/book-loader.js';

const SAMPLE_TSV = [
  'eco\tname\tpgn',
  "C20\tKing's Pawn Game\t1. e4 e5",
  "C40\tKing's Knight Opening\t1. e4 e5 2. Nf3",
  'B00\tBroken Line\t1. e4 e4',
  'A00\tno moves column',
  "D00\tQueen's Pawn Game\t1. d4 d5",
  '',
].join('\n');

function fenAfter(...moves: string[]): string {
  const position = new ChessPosition();
  for (const move of moves) {
    position.move(move);
  }
  return position.fen();
}

describe('book loader helpers', () => {
  it('splits TSV lines', () => {
    expect(parseTsvLine('C20\tOpen Game\t1. e4 e5')).toEqual({
      eco: 'C20',
      name: 'Open Game',
      pgn: '1. e4 e5',
    });
    expect(parseTsvLine('C20\tOpen Game')).toBeNull();
  });

  it('strips move numbers and results', () => {
    expect(pgnToSanMoves('1. e4 e5 2. Nf3 Nc6 3.Bb5 *')).toEqual(['e4', 'e5', 'Nf3', 'Nc6', 'Bb5']);
    expect(pgnToSanMoves('1... c5 2. Nf3')).toEqual(['c5', 'Nf3']);
  });
});

describe('opening book', () => {
  let tmpDir: string;
  let sourcePath: string;
  let dbPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'movegrade-book-'));
    sourcePath = path.join(tmpDir, 'openings.tsv');
    dbPath = path.join(tmpDir, 'book.db');
    fs.writeFileSync(sourcePath, SAMPLE_TSV);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('loadBookDatabase', () => {
    it('stores every position of every legal line', () => {
      const warnings: string[] = [];
      const stats = loadBookDatabase({
        sources: [sourcePath],
        dbPath,
        onWarning: (message) => warnings.push(message),
      });

      expect(stats).toEqual({ files: 1, lines: 5, skipped: 2, positions: 5 });
      expect(warnings).toHaveLength(2);
      expect(warnings[0]).toContain('line 4');
      expect(warnings[1]).toBe(`Skipping malformed line 5 in ${sourcePath}`);
    });

    it('limits lines to maxPlies', () => {
      const stats = loadBookDatabase({
        sources: [sourcePath],
        dbPath,
        maxPlies: 1,
        onWarning: vi.fn(),
      });

      // Only 1. e4 and 1. d4 survive the cut
      expect(stats.positions).toBe(2);
    });

    it('warns about missing source files', () => {
      const onWarning = vi.fn();
      const stats = loadBookDatabase({
        sources: [path.join(tmpDir, 'missing.tsv')],
        dbPath,
        onWarning,
      });

      expect(stats.files).toBe(0);
      expect(onWarning).toHaveBeenCalledWith(`Book source not found: ${path.join(tmpDir, 'missing.tsv')}`);
    });
  });

  describe('BookClient', () => {
    beforeEach(() => {
      loadBookDatabase({ sources: [sourcePath], dbPath, onWarning: vi.fn() });
    });

    it('recognises positions reached by book lines', () => {
      const client = new BookClient({ dbPath });

      expect(client.hasPosition(fenAfter('e4'))).toBe(true);
      expect(client.hasPosition(fenAfter('e4', 'e5', 'Nf3'))).toBe(true);
      expect(client.hasPosition(fenAfter('d4', 'd5'))).toBe(true);
      client.close();
    });

    it('does not know positions outside the book', () => {
      const client = new BookClient({ dbPath });

      expect(client.hasPosition(new ChessPosition().fen())).toBe(false);
      expect(client.hasPosition(fenAfter('e4', 'c5'))).toBe(false);
      client.close();
    });

    it('names a position after the line that ends there', () => {
      const client = new BookClient({ dbPath });

      expect(client.getEntry(fenAfter('e4', 'e5'))).toMatchObject({
        eco: 'C20',
        name: "King's Pawn Game",
        ply: 2,
      });
      expect(client.getEntry(fenAfter('e4', 'e5', 'Nf3'))?.eco).toBe('C40');
      expect(client.getEntry(fenAfter('e4', 'c5'))).toBeUndefined();
      client.close();
    });

    it('ignores move counters when matching', () => {
      const client = new BookClient({ dbPath });
      const [placement, side, castling, ep] = fenAfter('d4').split(' ');

      expect(client.hasPosition(`${placement} ${side} ${castling} ${ep} 7 30`)).toBe(true);
      client.close();
    });

    it('reports its size', () => {
      const client = new BookClient({ dbPath });
      expect(client.size()).toBe(5);
      client.close();
    });

    it('connects lazily', () => {
      const client = new BookClient({ dbPath });

      expect(client.isConnected).toBe(false);
      client.hasPosition(fenAfter('e4'));
      expect(client.isConnected).toBe(true);
      client.close();
      expect(client.isConnected).toBe(false);
    });

    it('resolves relative paths against the data directory', () => {
      const client = new BookClient({ dbPath: 'book.db', dataDir: tmpDir });

      expect(client.hasPosition(fenAfter('e4'))).toBe(true);
      client.close();
    });
  });

  describe('missing database', () => {
    it('throws DatabaseNotFoundError on first lookup', () => {
      const client = new BookClient({ dbPath: path.join(tmpDir, 'nonexistent.db') });

      expect(() => client.hasPosition(fenAfter('e4'))).toThrow(DatabaseNotFoundError);
      expect(() => client.getEntry(fenAfter('e4'))).toThrow(DatabaseError);
      client.close();
    });

    it('uses book.db as the default file name', () => {
      expect(new BookClient().dbPath).toBe(DEFAULT_BOOK_CONFIG.dbPath);
      expect(DEFAULT_BOOK_CONFIG.dbPath).toBe('book.db');
    });
  });
});
