/**
 * Write-once evaluation cache keyed by position fingerprint
 */

import { toFingerprint } from '@movegrade/pgn';

import type { EvaluationRecord } from '../types/analysis.js';

/**
 * Maps position fingerprints to engine records.
 *
 * The first record written for a fingerprint wins; transposed positions
 * therefore share one record. Keys may be given as full FENs or as
 * fingerprints.
 */
export class EvaluationCache {
  private readonly records = new Map<string, EvaluationRecord>();

  /**
   * Store a record unless the position already has one
   *
   * @returns false when the write was ignored
   */
  set(position: string, record: EvaluationRecord): boolean {
    const key = toFingerprint(position);
    if (this.records.has(key)) {
      return false;
    }
    this.records.set(key, { score: record.score, bestMove: record.bestMove });
    return true;
  }

  get(position: string): EvaluationRecord | undefined {
    return this.records.get(toFingerprint(position));
  }

  has(position: string): boolean {
    return this.records.has(toFingerprint(position));
  }

  get size(): number {
    return this.records.size;
  }

  /** Number of positions whose evaluation failed */
  get failedCount(): number {
    let failed = 0;
    for (const record of this.records.values()) {
      if (record.score === null) failed++;
    }
    return failed;
  }

  fingerprints(): string[] {
    return [...this.records.keys()];
  }
}
