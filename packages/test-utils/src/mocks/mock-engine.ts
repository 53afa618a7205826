/**
 * Scripted position evaluator for testing
 *
 * Implements the PositionEvaluator interface used by the game analyzer
 */

import type { EvaluationRecord } from '@movegrade/core';
import { toFingerprint } from '@movegrade/pgn';
import { vi } from 'vitest';

export interface MockEngineConfig {
  /** Predefined records, keyed by FEN or fingerprint */
  responses?: Map<string, EvaluationRecord>;
  /** Record returned when no response matches */
  defaultRecord?: EvaluationRecord;
  /** Simulate latency in milliseconds */
  latencyMs?: number;
  /** Positions (FEN or fingerprint) whose evaluation throws */
  failureFens?: Set<string>;
}

/**
 * Default evaluation: a level position with no preferred move
 */
export const DEFAULT_ENGINE_RECORD: EvaluationRecord = {
  score: 0,
  bestMove: null,
};

function byFingerprint<T>(entries: Iterable<[string, T]>): Map<string, T> {
  const keyed = new Map<string, T>();
  for (const [position, value] of entries) {
    keyed.set(toFingerprint(position), value);
  }
  return keyed;
}

/**
 * Create a mock evaluator. Lookups go through the position fingerprint,
 * so move counters in the FEN never matter.
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockEngine(config: MockEngineConfig = {}) {
  const { defaultRecord = DEFAULT_ENGINE_RECORD, latencyMs = 0 } = config;
  const responses = byFingerprint(config.responses ?? []);
  const failures = new Set([...(config.failureFens ?? [])].map(toFingerprint));

  const evaluate = vi.fn(
    async (fen: string, _depth: number, signal?: AbortSignal): Promise<EvaluationRecord> => {
      if (latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, latencyMs));
      }
      if (signal?.aborted) {
        return { score: null, bestMove: null };
      }

      const key = toFingerprint(fen);
      if (failures.has(key)) {
        throw new Error(`Engine evaluation failed for position: ${fen}`);
      }
      return { ...(responses.get(key) ?? defaultRecord) };
    },
  );

  return {
    evaluate,
    // For test inspection
    _calls: {
      // eslint-disable-next-line @typescript-eslint/explicit-function-return-type
      evaluate: () => evaluate.mock.calls,
    },
  };
}

export type MockEngine = ReturnType<typeof createMockEngine>;

/**
 * Create an in-memory opening book holding the given positions
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockBook(positions: Iterable<string> = [], options: { failing?: boolean } = {}) {
  const known = new Set([...positions].map(toFingerprint));
  const hasPosition = vi.fn((fen: string): boolean => {
    if (options.failing) {
      throw new Error('Opening book is unreadable');
    }
    return known.has(toFingerprint(fen));
  });
  return { hasPosition };
}

export type MockBook = ReturnType<typeof createMockBook>;
