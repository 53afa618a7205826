import { ChessPosition } from '@movegrade/pgn';
import { describe, it, expect } from 'vitest';

import { diagnose, hangsPiece } from '../problem-diagnoser.js';

function play(fen: string, san: string): Parameters<typeof diagnose> {
  const before = new ChessPosition(fen);
  const move = before.clone().move(san);
  return [before, move, before.afterMove(move)];
}

describe('Problem Diagnoser', () => {
  it('should report a move that allows mate in one', () => {
    // 1. f3 e5 2. g4??
    const diagnosis = diagnose(...play('rnbqkbnr/pppp1ppp/8/4p3/8/5P2/PPPPP1PP/RNBQKBNR w KQkq - 0 2', 'g4'));

    expect(diagnosis).toEqual({
      kind: 'allows_checkmate',
      description: 'Allows checkmate with Qh4#.',
      materialLost: 0,
    });
  });

  it('should report a piece moved onto an attacked, undefended square', () => {
    const diagnosis = diagnose(...play('4k3/8/8/4p3/8/8/8/2B1K3 w - - 0 1', 'Bf4'));

    expect(diagnosis).toEqual({
      kind: 'hanging_piece',
      description: 'Hangs the bishop on f4.',
      materialLost: 3,
    });
  });

  it('should mention the captured piece when a grab hangs the capturer', () => {
    const diagnosis = diagnose(...play('4k3/8/4p3/3p4/8/2N5/8/4K3 w - - 0 1', 'Nxd5'));

    expect(diagnosis?.kind).toBe('hanging_piece');
    expect(diagnosis?.description).toBe('Hangs the knight on d5; taking the pawn only partly makes up for it.');
    expect(diagnosis?.materialLost).toBe(2);
  });

  it('should report a defended piece that a cheaper attacker wins', () => {
    const diagnosis = diagnose(...play('4k3/8/2p5/8/4P3/8/8/3RK3 w - - 0 1', 'Rd5'));

    expect(diagnosis).toEqual({
      kind: 'bad_trade',
      description: 'The rook on d5 can be won by the pawn on c6.',
      materialLost: 4,
    });
  });

  it('should report a defender walking away from a piece', () => {
    // d3 covered the e4 knight; after d4 the e8 rook takes it for free
    const diagnosis = diagnose(...play('4r1k1/8/8/8/4N3/3P4/8/6K1 w - - 0 1', 'd4'));

    expect(diagnosis).toEqual({
      kind: 'leaves_piece_hanging',
      description: 'Leaves the knight on e4 undefended.',
      materialLost: 3,
    });
  });

  it('should report an undefended piece the moved piece could have taken', () => {
    const diagnosis = diagnose(...play('4k3/8/8/3r4/8/2N5/8/4K3 w - - 0 1', 'Nb1'));

    expect(diagnosis).toEqual({
      kind: 'missed_capture',
      description: 'Misses the undefended rook on d5.',
      materialLost: 5,
    });
  });

  it('should return null when nothing is wrong on the board', () => {
    expect(diagnose(...play('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1', 'e4'))).toBeNull();
  });

  it('should never report a legal move as leaving the king in check', () => {
    const fen = '4k3/8/8/8/8/8/r7/4K3 w - - 0 1';
    const moves = new ChessPosition(fen).getLegalMoveDetails();

    expect(moves.map((move) => move.san).sort()).toEqual(['Kd1', 'Kf1']);
    for (const move of moves) {
      expect(diagnose(...play(fen, move.san))?.kind).not.toBe('walked_into_check');
    }
  });

  describe('hangsPiece', () => {
    it('should detect the moved piece hanging', () => {
      expect(hangsPiece(...play('4k3/8/8/4p3/8/8/8/2B1K3 w - - 0 1', 'Bf4'))).toBe(true);
    });

    it('should detect another piece left hanging', () => {
      expect(hangsPiece(...play('4r1k1/8/8/8/4N3/3P4/8/6K1 w - - 0 1', 'd4'))).toBe(true);
    });

    it('should ignore safe moves', () => {
      expect(hangsPiece(...play('4k3/8/8/3r4/8/2N5/8/4K3 w - - 0 1', 'Nxd5'))).toBe(false);
    });
  });
});
