/**
 * Main orchestrator that runs every game of a PGN input through the analyzer
 */

import {
  AnalysisCancelledError,
  createGameAnalyzer,
  selectMovesForReview,
  type GameAnalysis,
} from '@movegrade/core';
import { ParseError, parsePgn, type ParsedGame } from '@movegrade/pgn';

import type { MovegradeConfig } from '../config/schema.js';
import { AnalysisError, CancelledError, PgnError } from '../errors/index.js';
import type { ProgressReporter, RunSummary } from '../progress/reporter.js';
import { createPipelineProgressCallback } from '../progress/reporter.js';

import type { Services } from './services.js';

/**
 * Analysis result for a single game
 */
export interface GameResult {
  game: ParsedGame;
  analysis: GameAnalysis;
}

export interface OrchestrationResult {
  results: GameResult[];
  stats: RunSummary;
}

function parseInput(pgnInput: string, reporter: ProgressReporter): ParsedGame[] {
  reporter.startPhase('parsing');
  let games: ParsedGame[];
  try {
    games = parsePgn(pgnInput);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Failed to parse PGN';
    reporter.failPhase('parsing', message);
    if (error instanceof ParseError) {
      throw new PgnError(error.message, error.line, error.column);
    }
    throw new PgnError(message);
  }
  reporter.completePhase('parsing', `${games.length} game(s)`);
  return games;
}

/**
 * Orchestrate the full analysis of a PGN input
 *
 * Games are analyzed one after another; positions inside a game are
 * evaluated in parallel by the analyzer.
 *
 * @throws PgnError if the input cannot be parsed or a game has an illegal move
 * @throws CancelledError if the signal aborts
 */
export async function orchestrateAnalysis(
  pgnInput: string,
  config: MovegradeConfig,
  services: Services,
  reporter: ProgressReporter,
  signal?: AbortSignal,
): Promise<OrchestrationResult> {
  const games = parseInput(pgnInput, reporter);
  if (games.length === 0) {
    throw new AnalysisError('No games found in PGN input');
  }

  const analyzer = createGameAnalyzer({
    evaluator: services.evaluator,
    book: services.book,
    config: { depth: config.analysis.depth, concurrency: config.analysis.workers },
    thresholds: { bookPlies: config.analysis.bookPlies },
    onProgress: createPipelineProgressCallback(reporter),
    onEvaluationError: (error, fen) => reporter.warnSafe(`Evaluation failed for ${fen}: ${error.message}`),
    onBookError: (error) => reporter.warnSafe(`Opening book unavailable for this game: ${error.message}`),
  });

  const results: GameResult[] = [];
  const stats: RunSummary = { gamesAnalyzed: 0, movesAnalyzed: 0, failedEvaluations: 0, reviewMoves: 0 };

  for (const [index, game] of games.entries()) {
    reporter.startGame(index, games.length, game.metadata.white, game.metadata.black, game.moves.length);

    let analysis: GameAnalysis;
    try {
      analysis = await analyzer.analyze({ moves: game.moves, startFen: game.startFen }, signal);
    } catch (error) {
      reporter.stop();
      if (error instanceof AnalysisCancelledError) {
        throw new CancelledError();
      }
      if (error instanceof ParseError) {
        throw new PgnError(error.message, error.line, error.column, index + 1);
      }
      throw new AnalysisError(error instanceof Error ? error.message : String(error), index + 1);
    }

    results.push({ game, analysis });
    stats.gamesAnalyzed++;
    stats.movesAnalyzed += analysis.entries.length;
    stats.failedEvaluations += analysis.failedEvaluations;
    stats.reviewMoves += selectMovesForReview(analysis.entries).length;

    reporter.completeGame(index, games.length);
  }

  return { results, stats };
}
