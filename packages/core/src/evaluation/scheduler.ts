/**
 * Parallel Evaluation Scheduler
 *
 * Scores every distinct position of a game with a bounded pool of workers
 * and fills a fresh write-once cache. One failed task never affects its
 * siblings; the call resolves only once every task has finished.
 */

import * as os from 'node:os';

import { toFingerprint } from '@movegrade/pgn';

import { AnalysisCancelledError } from '../errors.js';
import type { EvaluationRecord, PositionEvaluator } from '../types/analysis.js';

import { EvaluationCache } from './evaluation-cache.js';

export interface SchedulerOptions {
  /** Search depth passed to the evaluator */
  depth: number;
  /** Maximum parallel evaluations (default: available parallelism) */
  concurrency?: number;
  signal?: AbortSignal;
  /** Called after each finished task */
  onProgress?: (completed: number, total: number) => void;
  /** Called when the evaluator throws */
  onError?: (error: Error, fen: string) => void;
}

const FAILED_RECORD: EvaluationRecord = { score: null, bestMove: null };

/**
 * Default worker count
 */
export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Distinct positions in first-seen order, keyed by fingerprint
 */
export function distinctPositions(fens: readonly string[]): string[] {
  const seen = new Map<string, string>();
  for (const fen of fens) {
    const key = toFingerprint(fen);
    if (!seen.has(key)) {
      seen.set(key, fen);
    }
  }
  return [...seen.values()];
}

/**
 * Evaluate all positions and return the completed cache
 *
 * @throws AnalysisCancelledError if the signal aborts before every task is done
 */
export async function evaluatePositions(
  fens: readonly string[],
  evaluator: PositionEvaluator,
  options: SchedulerOptions,
): Promise<EvaluationCache> {
  const { depth, signal } = options;
  if (signal?.aborted) {
    throw new AnalysisCancelledError();
  }

  const cache = new EvaluationCache();
  const queue = distinctPositions(fens);
  const total = queue.length;
  const workerCount = Math.min(Math.max(1, options.concurrency || defaultConcurrency()), total);

  let next = 0;
  let completed = 0;

  const runTask = async (fen: string): Promise<EvaluationRecord> => {
    try {
      return await evaluator.evaluate(fen, depth, signal);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      options.onError?.(error, fen);
      return FAILED_RECORD;
    }
  };

  const worker = async (): Promise<void> => {
    while (next < queue.length) {
      if (signal?.aborted) return;
      const fen = queue[next++];
      if (fen === undefined) return;

      const record = await runTask(fen);
      // Results finishing after cancellation are discarded
      if (signal?.aborted) return;

      cache.set(fen, record);
      completed++;
      options.onProgress?.(completed, total);
    }
  };

  const workers = Promise.all(Array.from({ length: workerCount }, () => worker()));

  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => reject(new AnalysisCancelledError());
    signal?.addEventListener('abort', onAbort, { once: true });
    workers.then(
      () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      },
      (err: unknown) => {
        signal?.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });

  if (signal?.aborted) {
    throw new AnalysisCancelledError();
  }
  return cache;
}
