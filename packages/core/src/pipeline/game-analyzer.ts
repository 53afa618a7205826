/**
 * Game Analyzer
 *
 * Coordinates the analysis of one game:
 * 1. Enumerate positions (illegal input fails here, before any engine work)
 * 2. Evaluate every distinct position in parallel into a fresh cache
 * 3. Classify each move in ply order against the complete cache
 * 4. Summarize labels and phase ratings per side
 */

import { ChessPosition, enumeratePositions } from '@movegrade/pgn';
import type { PlayedMove, Side } from '@movegrade/pgn';

import { OpeningBookOracle, type BookSource } from '../book/opening-book.js';
import { classifyMove } from '../classifier/move-classifier.js';
import { resolveThresholds, type ClassificationThresholds } from '../classifier/thresholds.js';
import { EvaluationCache } from '../evaluation/evaluation-cache.js';
import { distinctPositions, evaluatePositions } from '../evaluation/scheduler.js';
import type { AnalysisEntry, EvaluationRecord, GameAnalysis, PositionEvaluator } from '../types/analysis.js';

import { summarizeGame } from './summary.js';

/**
 * Input: a move list (SAN or UCI) and an optional set-up position
 */
export interface GameInput {
  moves: readonly string[];
  startFen?: string;
}

/**
 * Analysis configuration
 */
export interface GameAnalyzerConfig {
  /** Engine search depth (default 18) */
  depth?: number;
  /** Parallel evaluations; 0 means available parallelism (default 0) */
  concurrency?: number;
}

const DEFAULT_CONFIG: Required<GameAnalyzerConfig> = {
  depth: 18,
  concurrency: 0,
};

export type AnalysisPhase = 'evaluation' | 'classification';

/**
 * Analysis progress callback
 */
export type ProgressCallback = (phase: AnalysisPhase, current: number, total: number) => void;

export interface GameAnalyzerOptions {
  evaluator: PositionEvaluator;
  /** Opening book; without one no move is book */
  book?: BookSource | null;
  config?: GameAnalyzerConfig;
  thresholds?: Partial<ClassificationThresholds>;
  onProgress?: ProgressCallback;
  /** Called when the evaluator throws for a position */
  onEvaluationError?: (error: Error, fen: string) => void;
  /** Called once per game when the book cannot be read */
  onBookError?: (error: Error) => void;
}

const MISSING_RECORD: EvaluationRecord = { score: null, bestMove: null };

function toPawns(score: number | null): number | null {
  return score === null ? null : Math.round(score) / 100;
}

/**
 * Analyzes games one at a time. Every call builds its own cache and book
 * memo, so nothing leaks from one game into the next.
 */
export class GameAnalyzer {
  private readonly evaluator: PositionEvaluator;
  private readonly book: BookSource | null;
  private readonly config: Required<GameAnalyzerConfig>;
  private readonly thresholds: ClassificationThresholds;
  private readonly options: GameAnalyzerOptions;

  constructor(options: GameAnalyzerOptions) {
    this.options = options;
    this.evaluator = options.evaluator;
    this.book = options.book ?? null;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.thresholds = resolveThresholds(options.thresholds);
  }

  /**
   * Run the full analysis of one game
   *
   * @throws ParseError if the move list is illegal
   * @throws AnalysisCancelledError if the signal aborts during evaluation
   */
  async analyze(game: GameInput, signal?: AbortSignal): Promise<GameAnalysis> {
    const enumerated = enumeratePositions(game.moves, game.startFen);

    // Phase 1: evaluation (blocks until every position is done or failed)
    this.reportProgress('evaluation', 0, distinctPositions(enumerated.positions).length);
    const cache = await evaluatePositions(enumerated.positions, this.evaluator, {
      depth: this.config.depth,
      concurrency: this.config.concurrency,
      signal,
      onProgress: (completed, total) => this.reportProgress('evaluation', completed, total),
      onError: this.options.onEvaluationError,
    });

    // Phase 2: classification
    const oracle = new OpeningBookOracle(this.book, {
      maxPly: this.thresholds.bookPlies,
      onError: this.options.onBookError,
    });

    const entries: AnalysisEntry[] = [];
    const total = enumerated.moves.length;
    this.reportProgress('classification', 0, total);
    for (const move of enumerated.moves) {
      entries.push(this.classify(move, cache, oracle));
      this.reportProgress('classification', entries.length, total);
    }

    return {
      entries,
      summary: summarizeGame(entries, firstMover(enumerated.startFen)),
      evaluatedPositions: cache.size,
      failedEvaluations: cache.failedCount,
    };
  }

  private classify(move: PlayedMove, cache: EvaluationCache, oracle: OpeningBookOracle): AnalysisEntry {
    const positionBefore = ChessPosition.fromFen(move.fenBefore);
    const positionAfter = ChessPosition.fromFen(move.fenAfter);
    const before = cache.get(move.fenBefore) ?? MISSING_RECORD;
    const after = cache.get(move.fenAfter) ?? MISSING_RECORD;
    const isBook = oracle.isBookMove(move.ply, move.fenAfter);

    const result = classifyMove(
      {
        positionBefore,
        positionAfter,
        move,
        evalBefore: before.score,
        evalAfter: after.score,
        bestMove: before.bestMove,
        isBook,
      },
      this.thresholds,
    );

    const bestMove =
      before.bestMove && before.bestMove !== move.uci
        ? (positionBefore.findMoveByUci(before.bestMove)?.san ?? null)
        : null;

    return {
      ply: move.ply + 1,
      move: move.san,
      quality: result.quality,
      isBook,
      comment: result.comment,
      evalBefore: toPawns(before.score),
      evalAfter: toPawns(after.score),
      bestMove,
      cpLoss: result.cpLoss,
    };
  }

  private reportProgress(phase: AnalysisPhase, current: number, total: number): void {
    this.options.onProgress?.(phase, current, total);
  }
}

function firstMover(startFen: string): Side {
  return startFen.split(' ')[1] === 'b' ? 'b' : 'w';
}

/**
 * Create a game analyzer
 */
export function createGameAnalyzer(options: GameAnalyzerOptions): GameAnalyzer {
  return new GameAnalyzer(options);
}
