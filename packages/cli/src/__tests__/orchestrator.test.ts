/**
 * Orchestrator tests with a scripted engine and in-memory book
 */

import type { EvaluationRecord, PositionEvaluator } from '@movegrade/core';
import { STARTING_FEN, enumeratePositions } from '@movegrade/pgn';
import { createMockBook, createMockEngine, loadPgnSync, type MockEngine } from '@movegrade/test-utils';
import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { AnalysisError, CancelledError, PgnError } from '../errors/index.js';
import { orchestrateAnalysis } from '../orchestrator/orchestrator.js';
import { renderJson } from '../output/render.js';
import { ProgressReporter } from '../progress/reporter.js';

const AFTER_E4 = enumeratePositions(['e4']).positions[1] ?? '';

const SCHOLARS_MATE = ['e4', 'e5', 'Bc4', 'Nc6', 'Qh5', 'Nf6', 'Qxf7#'];

function scholarsMateEngine(): MockEngine {
  const { positions } = enumeratePositions(SCHOLARS_MATE);
  const script: EvaluationRecord[] = [
    { score: 20, bestMove: 'e2e4' },
    { score: 30, bestMove: 'e7e5' },
    { score: 30, bestMove: 'g1f3' },
    { score: 25, bestMove: 'g8f6' },
    { score: 30, bestMove: 'd1h5' },
    { score: 20, bestMove: 'g7g6' },
    { score: 10000, bestMove: 'h5f7' },
    { score: 10000, bestMove: null },
  ];
  const responses = new Map<string, EvaluationRecord>();
  positions.forEach((fen, i) => {
    const record = script[i];
    if (record) responses.set(fen, record);
  });
  return createMockEngine({ responses, latencyMs: 1 });
}

/**
 * Delay each call by an amount chosen from its call index
 */
function staggered(engine: PositionEvaluator, delayFor: (call: number) => number): PositionEvaluator {
  let calls = 0;
  return {
    async evaluate(fen, depth, signal) {
      const delay = delayFor(calls++);
      await new Promise((resolve) => setTimeout(resolve, delay));
      return engine.evaluate(fen, depth, signal);
    },
  };
}

function silentReporter(): ProgressReporter {
  return new ProgressReporter({ silent: true });
}

describe('orchestrateAnalysis', () => {
  it('should analyze every move of a game', async () => {
    const engine = createMockEngine();

    const { results, stats } = await orchestrateAnalysis(
      loadPgnSync('scholars-mate.pgn'),
      DEFAULT_CONFIG,
      { evaluator: engine, book: null },
      silentReporter(),
    );

    expect(results).toHaveLength(1);
    expect(results[0]?.game.metadata.white).toBe('Player One');
    expect(results[0]?.analysis.entries.map((entry) => entry.move)).toEqual([
      'e4',
      'e5',
      'Bc4',
      'Nc6',
      'Qh5',
      'Nf6',
      'Qxf7#',
    ]);
    expect(results[0]?.analysis.entries.every((entry) => entry.quality === 'best')).toBe(true);
    expect(stats).toEqual({ gamesAnalyzed: 1, movesAnalyzed: 7, failedEvaluations: 0, reviewMoves: 0 });
    // seven moves lead through eight distinct positions
    expect(engine.evaluate).toHaveBeenCalledTimes(8);
  });

  it('should pass the configured depth to the engine', async () => {
    const engine = createMockEngine();
    const config = { ...DEFAULT_CONFIG, analysis: { ...DEFAULT_CONFIG.analysis, depth: 12 } };

    await orchestrateAnalysis('1. e4 *', config, { evaluator: engine, book: null }, silentReporter());

    expect(engine.evaluate.mock.calls.map((call) => call[1])).toEqual([12, 12]);
  });

  it('should analyze every game of the input', async () => {
    const { results, stats } = await orchestrateAnalysis(
      loadPgnSync('two-games.pgn'),
      DEFAULT_CONFIG,
      { evaluator: createMockEngine(), book: null },
      silentReporter(),
    );

    expect(results.map((result) => result.game.metadata.white)).toEqual(['Alpha', 'Beta']);
    expect(stats.gamesAnalyzed).toBe(2);
    expect(stats.movesAnalyzed).toBe(5);
  });

  it('should mark book moves from the book service', async () => {
    const { results } = await orchestrateAnalysis(
      '1. e4 e5 *',
      DEFAULT_CONFIG,
      { evaluator: createMockEngine(), book: createMockBook([AFTER_E4]) },
      silentReporter(),
    );

    expect(results[0]?.analysis.entries.map((entry) => entry.quality)).toEqual(['book', 'best']);
  });

  it('should count failed evaluations', async () => {
    const engine = createMockEngine({ failureFens: new Set([STARTING_FEN]) });

    const { results, stats } = await orchestrateAnalysis(
      '1. e4 *',
      DEFAULT_CONFIG,
      { evaluator: engine, book: null },
      silentReporter(),
    );

    expect(results[0]?.analysis.entries[0]?.quality).toBe('unknown');
    expect(stats.failedEvaluations).toBe(1);
  });

  it('should give byte-identical output whatever order evaluations finish in', async () => {
    const pgn = loadPgnSync('scholars-mate.pgn');
    const config = { ...DEFAULT_CONFIG, analysis: { ...DEFAULT_CONFIG.analysis, workers: 4 } };
    const book = createMockBook([AFTER_E4]);

    // later calls finish first on the first run, in call order on the second
    const first = await orchestrateAnalysis(
      pgn,
      config,
      { evaluator: staggered(scholarsMateEngine(), (call) => 16 - 2 * call), book },
      silentReporter(),
    );
    const second = await orchestrateAnalysis(
      pgn,
      config,
      { evaluator: staggered(scholarsMateEngine(), (call) => call), book },
      silentReporter(),
    );

    expect(first.results[0]?.analysis.entries.map((entry) => entry.quality)).toEqual([
      'book',
      'best',
      'excellent',
      'excellent',
      'excellent',
      'blunder',
      'best',
    ]);
    expect(JSON.stringify(second.results)).toBe(JSON.stringify(first.results));
    expect(renderJson(second.results)).toBe(renderJson(first.results));
  });

  it('should report an illegal move with its game number', async () => {
    const pgn = '[White "A"]\n[Black "B"]\n\n1. e4 e5 2. Ke3 *';

    const error = await orchestrateAnalysis(
      pgn,
      DEFAULT_CONFIG,
      { evaluator: createMockEngine(), book: null },
      silentReporter(),
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PgnError);
    expect(error).toMatchObject({ gameNumber: 1 });
  });

  it('should fail on input without games', async () => {
    await expect(
      orchestrateAnalysis('', DEFAULT_CONFIG, { evaluator: createMockEngine(), book: null }, silentReporter()),
    ).rejects.toThrow(AnalysisError);
  });

  it('should turn cancellation into exit status 130', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await orchestrateAnalysis(
      '1. e4 *',
      DEFAULT_CONFIG,
      { evaluator: createMockEngine(), book: null },
      silentReporter(),
      controller.signal,
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ exitCode: 130 });
  });
});
