import { describe, it, expect } from 'vitest';

import {
  ChessPosition,
  STARTING_FEN,
  InvalidFenError,
  InvalidMoveError,
  isSquare,
  isUciMove,
  toFingerprint,
} from '../index.js';

describe('ChessPosition', () => {
  describe('construction', () => {
    it('creates starting position by default', () => {
      const pos = new ChessPosition();
      expect(pos.fen()).toBe(STARTING_FEN);
    });

    it('creates position from FEN', () => {
      const fen = 'r1bqkb1r/pppp1ppp/2n2n2/4p3/2B1P3/5N2/PPPP1PPP/RNBQK2R w KQkq - 4 4';
      expect(ChessPosition.fromFen(fen).fen()).toBe(fen);
    });

    it('throws InvalidFenError for invalid FEN', () => {
      expect(() => new ChessPosition('invalid')).toThrow(InvalidFenError);
      expect(() => ChessPosition.fromFen('8/8/8 w - -')).toThrow(InvalidFenError);
    });
  });

  describe('move', () => {
    it('applies SAN moves and reports the surrounding positions', () => {
      const pos = new ChessPosition();
      const result = pos.move('Nf3');

      expect(result.san).toBe('Nf3');
      expect(result.uci).toBe('g1f3');
      expect(result.piece).toBe('n');
      expect(result.color).toBe('w');
      expect(result.fenBefore).toBe(STARTING_FEN);
      expect(result.fenAfter).toBe('rnbqkbnr/pppppppp/8/8/8/5N2/PPPPPPPP/RNBQKB1R b KQkq - 1 1');
    });

    it('applies UCI moves', () => {
      const pos = new ChessPosition();
      const result = pos.move('g1f3');

      expect(result.san).toBe('Nf3');
      expect(pos.turn()).toBe('b');
    });

    it('records captures', () => {
      const pos = ChessPosition.fromFen('rnbqkbnr/ppp1pppp/8/3p4/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2');
      const result = pos.move('exd5');

      expect(result.captured).toBe('p');
      expect(result.uci).toBe('e4d5');
    });

    it('handles castling', () => {
      const pos = ChessPosition.fromFen('r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R3K2R w KQkq - 0 1');
      const result = pos.move('O-O');

      expect(result.uci).toBe('e1g1');
      expect(result.fenAfter).toContain('R4RK1');
    });

    it('handles promotion in both notations', () => {
      const fen = '8/P7/8/8/8/8/8/K6k w - - 0 1';

      const bySan = ChessPosition.fromFen(fen).move('a8=Q');
      expect(bySan.san).toBe('a8=Q+');
      expect(bySan.promotion).toBe('q');
      expect(bySan.uci).toBe('a7a8q');

      const byUci = ChessPosition.fromFen(fen).move('a7a8n');
      expect(byUci.san).toBe('a8=N');
      expect(byUci.promotion).toBe('n');
    });

    it('throws InvalidMoveError for illegal moves', () => {
      const pos = new ChessPosition();

      expect(() => pos.move('e5')).toThrow(InvalidMoveError);
      expect(() => pos.move('e2e5')).toThrow(InvalidMoveError);
      expect(() => pos.move('invalid')).toThrow(InvalidMoveError);
      expect(pos.fen()).toBe(STARTING_FEN);
    });
  });

  describe('afterMove', () => {
    it('leaves the original position untouched', () => {
      const pos = new ChessPosition();
      const next = pos.afterMove('e4');

      expect(pos.fen()).toBe(STARTING_FEN);
      expect(next.turn()).toBe('b');
      expect(next.getPiece('e4')).toEqual({ type: 'p', color: 'w' });
    });
  });

  describe('legal moves', () => {
    it('lists 20 moves from the starting position', () => {
      const pos = new ChessPosition();
      expect(pos.getLegalMoves()).toHaveLength(20);
      expect(pos.getLegalMoveDetails()).toHaveLength(20);
    });

    it('filters detailed moves by origin square', () => {
      const pos = new ChessPosition();
      const moves = pos.getLegalMoveDetails('g1').map((m) => m.uci);

      expect(moves.sort()).toEqual(['g1f3', 'g1h3']);
    });

    it('returns no moves when checkmated', () => {
      const pos = ChessPosition.fromFen('rnb1kbnr/pppp1ppp/8/4p3/6Pq/5P2/PPPPP2P/RNBQKBNR w KQkq - 1 3');

      expect(pos.getLegalMoves()).toHaveLength(0);
      expect(pos.isCheckmate()).toBe(true);
      expect(pos.isCheck()).toBe(true);
    });
  });

  describe('game state', () => {
    it('detects stalemate', () => {
      const pos = ChessPosition.fromFen('7k/5Q2/6K1/8/8/8/8/8 b - - 0 1');

      expect(pos.isStalemate()).toBe(true);
      expect(pos.isCheckmate()).toBe(false);
    });
  });

  describe('notation conversion', () => {
    it('converts between UCI and SAN', () => {
      const pos = new ChessPosition();

      expect(pos.uciToSan('e2e4')).toBe('e4');
      expect(pos.sanToUci('Nc3')).toBe('b1c3');
      expect(() => pos.uciToSan('e2e5')).toThrow(InvalidMoveError);
    });
  });

  describe('board queries', () => {
    it('finds attackers of a square', () => {
      // Knight on f3 reaches e5, the bishop on b5 does not
      const pos = ChessPosition.fromFen('4k3/8/8/1B2p3/8/5N2/8/4K3 w - - 0 1');

      expect(pos.getAttackers('e5', 'w')).toEqual(['f3']);
      expect(pos.getAttackers('e5', 'b')).toEqual([]);
    });

    it('finds defenders by asking for the occupant colour', () => {
      const pos = ChessPosition.fromFen('4k3/3p4/8/4p3/8/8/8/4K3 w - - 0 1');

      expect(pos.getAttackers('e5', 'b')).toEqual([]);
      expect(pos.getAttackers('e6', 'b')).toEqual(['d7']);
    });

    it('returns undefined for empty squares', () => {
      const pos = new ChessPosition();

      expect(pos.getPiece('e4')).toBeUndefined();
      expect(pos.getPiece('d8')).toEqual({ type: 'q', color: 'b' });
    });

    it('rejects invalid squares', () => {
      const pos = new ChessPosition();
      expect(() => pos.getPiece('z9')).toThrow(RangeError);
    });

    it('lists pieces and finds kings', () => {
      const pos = new ChessPosition();

      expect(pos.getAllPieces()).toHaveLength(32);
      expect(pos.findKing('w')).toBe('e1');
      expect(pos.findKing('b')).toBe('e8');
    });
  });

  describe('fingerprint', () => {
    it('drops the move counters', () => {
      const a = ChessPosition.fromFen('4k3/8/8/8/8/8/8/4K2R w K - 0 1');
      const b = ChessPosition.fromFen('4k3/8/8/8/8/8/8/4K2R w K - 12 40');

      expect(a.fingerprint()).toBe('4k3/8/8/8/8/8/8/4K2R w K -');
      expect(a.fingerprint()).toBe(b.fingerprint());
    });

    it('rejects FENs with missing fields', () => {
      expect(() => toFingerprint('8/8/8/8/8/8/8/8 w')).toThrow(InvalidFenError);
    });
  });
});

describe('notation helpers', () => {
  it('recognises squares', () => {
    expect(isSquare('a1')).toBe(true);
    expect(isSquare('h8')).toBe(true);
    expect(isSquare('i1')).toBe(false);
    expect(isSquare('a9')).toBe(false);
  });

  it('recognises UCI moves', () => {
    expect(isUciMove('e2e4')).toBe(true);
    expect(isUciMove('e7e8q')).toBe(true);
    expect(isUciMove('exd5')).toBe(false);
    expect(isUciMove('O-O')).toBe(false);
  });
});
