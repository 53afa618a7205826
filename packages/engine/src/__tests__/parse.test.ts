import { describe, it, expect } from 'vitest';

import {
  MATE_SCORE,
  parseBestMove,
  parseInfoLine,
  selectPrincipalScore,
  toWhitePerspective,
} from '../uci/parse.js';
import type { InfoLine } from '../uci/parse.js';

const isInfo = (info: InfoLine | null): info is InfoLine => info !== null;

describe('parseInfoLine', () => {
  it('reads depth, score and principal variation', () => {
    expect(parseInfoLine('info depth 18 seldepth 24 multipv 1 score cp 34 nodes 1000 pv e2e4 e7e5')).toEqual({
      depth: 18,
      multipv: 1,
      score: { kind: 'cp', value: 34 },
      pv: ['e2e4', 'e7e5'],
    });
  });

  it('reads mate scores and bounds', () => {
    expect(parseInfoLine('info depth 9 score mate -2 upperbound pv h7h8')).toEqual({
      depth: 9,
      score: { kind: 'mate', value: -2 },
      bound: 'upper',
      pv: ['h7h8'],
    });
  });

  it('stops at free text', () => {
    expect(parseInfoLine('info string NNUE evaluation using nn.nnue depth 5')).toEqual({ pv: [] });
  });

  it('ignores other lines', () => {
    expect(parseInfoLine('bestmove e2e4')).toBeNull();
    expect(parseInfoLine('readyok')).toBeNull();
  });
});

describe('parseBestMove', () => {
  it('reads the move and ponder move', () => {
    expect(parseBestMove('bestmove e2e4 ponder e7e5')).toEqual({ bestMove: 'e2e4', ponder: 'e7e5' });
    expect(parseBestMove('bestmove g1f3')).toEqual({ bestMove: 'g1f3' });
  });

  it('maps "(none)" to null', () => {
    expect(parseBestMove('bestmove (none)')).toEqual({ bestMove: null });
  });

  it('ignores other lines', () => {
    expect(parseBestMove('info depth 1')).toBeNull();
  });
});

describe('selectPrincipalScore', () => {
  it('takes the deepest line of the first variation', () => {
    const infos = [
      parseInfoLine('info depth 10 multipv 1 score cp 20 pv e2e4'),
      parseInfoLine('info depth 12 multipv 2 score cp 90 pv d2d4'),
      parseInfoLine('info depth 12 multipv 1 score cp 25 pv e2e4'),
      parseInfoLine('info depth 11 multipv 1 score cp 30 pv e2e4'),
    ].filter(isInfo);

    expect(selectPrincipalScore(infos)).toEqual({ kind: 'cp', value: 25 });
  });

  it('prefers exact scores over bounds', () => {
    const infos = [
      parseInfoLine('info depth 14 score cp 40 pv e2e4'),
      parseInfoLine('info depth 15 score cp 80 lowerbound pv e2e4'),
    ].filter(isInfo);

    expect(selectPrincipalScore(infos)).toEqual({ kind: 'cp', value: 40 });
  });

  it('returns null without scored lines', () => {
    expect(selectPrincipalScore([])).toBeNull();
  });
});

describe('toWhitePerspective', () => {
  it('keeps white-to-move scores', () => {
    expect(toWhitePerspective({ kind: 'cp', value: 35 }, 'w')).toBe(35);
  });

  it('negates black-to-move scores', () => {
    expect(toWhitePerspective({ kind: 'cp', value: 35 }, 'b')).toBe(-35);
    expect(toWhitePerspective({ kind: 'cp', value: -120 }, 'b')).toBe(120);
    expect(toWhitePerspective({ kind: 'cp', value: 0 }, 'b')).toBe(0);
  });

  it('encodes mates as the mate score less the distance', () => {
    expect(toWhitePerspective({ kind: 'mate', value: 3 }, 'w')).toBe(9997);
    expect(toWhitePerspective({ kind: 'mate', value: -1 }, 'w')).toBe(-9999);
    expect(toWhitePerspective({ kind: 'mate', value: 2 }, 'b')).toBe(-9998);
    expect(toWhitePerspective({ kind: 'mate', value: -4 }, 'b')).toBe(9996);
  });

  it('ranks a slower mate below a faster one', () => {
    expect(toWhitePerspective({ kind: 'mate', value: 5 }, 'w')).toBeLessThan(
      toWhitePerspective({ kind: 'mate', value: 1 }, 'w'),
    );
  });

  it('treats mate 0 as the side to move being mated', () => {
    expect(toWhitePerspective({ kind: 'mate', value: 0 }, 'w')).toBe(-MATE_SCORE);
    expect(toWhitePerspective({ kind: 'mate', value: 0 }, 'b')).toBe(MATE_SCORE);
  });
});
