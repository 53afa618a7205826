/**
 * Custom assertions for game analysis validation
 */

import { MOVE_QUALITIES } from '@movegrade/core';
import type { GameAnalysis, MoveQuality } from '@movegrade/core';
import { expect } from 'vitest';

/**
 * Assert move qualities by ply number
 */
export function assertMoveQualities(analysis: GameAnalysis, expected: Record<number, MoveQuality>): void {
  for (const [ply, quality] of Object.entries(expected)) {
    const entry = analysis.entries.find((candidate) => candidate.ply === Number(ply));
    expect(entry, `No entry at ply ${ply}`).toBeDefined();
    expect(entry?.quality, `Unexpected quality at ply ${ply}`).toBe(quality);
  }
}

/**
 * Assert the number of moves with a quality, per side
 */
export function assertQualityCount(
  analysis: GameAnalysis,
  quality: MoveQuality,
  expected: { white?: number; black?: number },
): void {
  if (expected.white !== undefined) {
    expect(analysis.summary.white[quality], `White ${quality} count`).toBe(expected.white);
  }
  if (expected.black !== undefined) {
    expect(analysis.summary.black[quality], `Black ${quality} count`).toBe(expected.black);
  }
}

/**
 * Structural validation shared by every analysis result
 */
export function assertValidAnalysis(analysis: GameAnalysis): void {
  analysis.entries.forEach((entry, i) => {
    expect(entry.ply, `Invalid ply at position ${i}`).toBe(i + 1);
    expect(MOVE_QUALITIES).toContain(entry.quality);
    expect(entry.comment.length, `Missing comment at ply ${entry.ply}`).toBeGreaterThan(0);
    if (entry.cpLoss !== null) {
      expect(entry.cpLoss).toBeGreaterThanOrEqual(0);
      expect(entry.cpLoss).toBeLessThanOrEqual(800);
    }
  });

  const counted = MOVE_QUALITIES.reduce(
    (sum, quality) => sum + analysis.summary.white[quality] + analysis.summary.black[quality],
    0,
  );
  expect(counted, 'Summary counts must cover every entry').toBe(analysis.entries.length);
  expect(analysis.failedEvaluations).toBeLessThanOrEqual(analysis.evaluatedPositions);
}
