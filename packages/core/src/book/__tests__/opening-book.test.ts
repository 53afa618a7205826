import { STARTING_FEN } from '@movegrade/pgn';
import { createMockBook } from '@movegrade/test-utils';
import { describe, it, expect, vi } from 'vitest';

import { OpeningBookOracle } from '../opening-book.js';

const AFTER_E4 = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';

describe('OpeningBookOracle', () => {
  it('should answer from the position reached by the move', () => {
    const oracle = new OpeningBookOracle(createMockBook([AFTER_E4]));

    expect(oracle.isBookMove(0, AFTER_E4)).toBe(true);
    expect(oracle.isBookMove(0, STARTING_FEN)).toBe(false);
  });

  it('should not consult the book past the ply limit', () => {
    const book = createMockBook([AFTER_E4]);
    const oracle = new OpeningBookOracle(book, { maxPly: 10 });

    expect(oracle.isBookMove(10, AFTER_E4)).toBe(false);
    expect(book.hasPosition).not.toHaveBeenCalled();
  });

  it('should memoize answers per position', () => {
    const book = createMockBook([AFTER_E4]);
    const oracle = new OpeningBookOracle(book);

    oracle.isBookMove(0, AFTER_E4);
    oracle.isBookMove(2, 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 2 2');
    expect(book.hasPosition).toHaveBeenCalledTimes(1);
  });

  it('should report a failing book once and stop asking', () => {
    const book = createMockBook([], { failing: true });
    const onError = vi.fn();
    const oracle = new OpeningBookOracle(book, { onError });

    expect(oracle.isBookMove(0, AFTER_E4)).toBe(false);
    expect(oracle.isBookMove(1, STARTING_FEN)).toBe(false);
    expect(oracle.degraded).toBe(true);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(book.hasPosition).toHaveBeenCalledTimes(1);
  });

  it('should treat a missing book as empty', () => {
    expect(new OpeningBookOracle(null).isBookMove(0, AFTER_E4)).toBe(false);
  });
});
