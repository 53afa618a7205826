import { ChessPosition, STARTING_FEN } from '@movegrade/pgn';
import { describe, it, expect } from 'vitest';

import { isMiss, signedLoss } from '../miss-detector.js';

function missed(fen: string, san: string, bestMove: string | null, before: number, after: number): boolean {
  const position = new ChessPosition(fen);
  const move = position.clone().move(san);
  return isMiss(position, bestMove, move, before, after, move.color);
}

describe('signedLoss', () => {
  it('should be positive when the mover made things worse', () => {
    expect(signedLoss(100, 40, 'w')).toBe(60);
    expect(signedLoss(-100, -40, 'b')).toBe(60);
  });

  it('should be negative when the mover improved', () => {
    expect(signedLoss(0, 50, 'w')).toBe(-50);
  });
});

describe('isMiss', () => {
  it('should flag a moderate slip from a clearly better position', () => {
    expect(missed(STARTING_FEN, 'e4', 'd2d4', 150, 80)).toBe(true);
  });

  it('should ignore losses outside the band', () => {
    expect(missed(STARTING_FEN, 'e4', 'd2d4', 150, 140)).toBe(false);
    expect(missed(STARTING_FEN, 'e4', 'd2d4', 150, -100)).toBe(false);
  });

  it('should require an opportunity', () => {
    expect(missed(STARTING_FEN, 'e4', 'd2d4', 20, -40)).toBe(false);
  });

  it('should flag passing up a best move that wins a piece', () => {
    expect(missed('4k3/8/8/3r4/8/2N5/8/4K3 w - - 0 1', 'Nb1', 'c3d5', 0, -100)).toBe(true);
  });

  it('should leave moves that hang material to the loss table', () => {
    expect(missed('4k3/8/8/4p3/8/8/8/2B1K3 w - - 0 1', 'Bf4', 'c1d2', 150, 50)).toBe(false);
  });

  it('should never flag when an evaluation is missing', () => {
    const position = new ChessPosition();
    const move = position.clone().move('e4');
    expect(isMiss(position, 'd2d4', move, null, 80, 'w')).toBe(false);
  });
});
