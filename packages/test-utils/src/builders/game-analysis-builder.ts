/**
 * Fluent builder for GameAnalysis test data
 */

import { summarizeGame } from '@movegrade/core';
import type { AnalysisEntry, GameAnalysis, MoveQuality } from '@movegrade/core';

/**
 * Default entry: a level, best-quality move
 */
export function analysisEntry(overrides: Partial<AnalysisEntry> = {}): AnalysisEntry {
  return {
    ply: 1,
    move: 'e4',
    quality: 'best',
    isBook: false,
    comment: 'Best move.',
    evalBefore: 0.2,
    evalAfter: 0.2,
    bestMove: null,
    cpLoss: 0,
    ...overrides,
  };
}

/**
 * Fluent builder for creating GameAnalysis instances. The summary is
 * always recomputed from the entries.
 */
export class GameAnalysisBuilder {
  private entries: AnalysisEntry[] = [];
  private evaluatedPositions: number | undefined;
  private failedEvaluations = 0;

  /**
   * Append a move; its ply follows the last one
   */
  addMove(move: string, quality: MoveQuality, overrides: Partial<AnalysisEntry> = {}): this {
    this.entries.push(analysisEntry({ ply: this.entries.length + 1, move, quality, ...overrides }));
    return this;
  }

  /**
   * Set all entries
   */
  withEntries(entries: AnalysisEntry[]): this {
    this.entries = entries.map((entry) => ({ ...entry }));
    return this;
  }

  withEvaluatedPositions(count: number): this {
    this.evaluatedPositions = count;
    return this;
  }

  withFailedEvaluations(count: number): this {
    this.failedEvaluations = count;
    return this;
  }

  /**
   * Build the final GameAnalysis
   */
  build(): GameAnalysis {
    const entries = this.entries.map((entry) => ({ ...entry }));
    return {
      entries,
      summary: summarizeGame(entries),
      evaluatedPositions: this.evaluatedPositions ?? entries.length + 1,
      failedEvaluations: this.failedEvaluations,
    };
  }
}

/**
 * Factory function for creating a builder
 */
export function gameAnalysis(): GameAnalysisBuilder {
  return new GameAnalysisBuilder();
}
