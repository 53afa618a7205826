/**
 * Position evaluator backed by a UCI engine
 */

import { EngineError } from './errors.js';
import { spawnTransport, type TransportFactory } from './transport.js';
import { toWhitePerspective } from './uci/parse.js';
import { UciEngine } from './uci/uci-engine.js';

/**
 * Engine process configuration
 */
export interface EngineConfig {
  /** Engine binary (looked up on PATH when not absolute) */
  path: string;
  threads: number;
  hashMb: number;
  /** Search timeout per position */
  timeoutMs: number;
  readyTimeoutMs: number;
  quitGraceMs: number;
}

/**
 * Default configuration: one thread and a small hash so that many
 * evaluations can run side by side
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  path: 'stockfish',
  threads: 1,
  hashMb: 64,
  timeoutMs: 60000,
  readyTimeoutMs: 10000,
  quitGraceMs: 2000,
};

/**
 * Score and preferred move for one position.
 * Score in centipawns from White's point of view, mate in n as ±(10000 - n).
 * A null score means the evaluation failed.
 */
export interface EvaluationRecord {
  score: number | null;
  bestMove: string | null;
}

export interface EngineHealth {
  healthy: boolean;
  name?: string;
  latencyMs: number;
  error?: string;
}

export interface EvaluatorOptions {
  /** Replaces process spawning, mainly for tests */
  transportFactory?: TransportFactory;
  /** Called for every failed evaluation */
  onError?: (error: EngineError, fen: string) => void;
}

const FAILED: EvaluationRecord = { score: null, bestMove: null };

function sideToMove(fen: string): 'w' | 'b' {
  return fen.trim().split(/\s+/)[1] === 'b' ? 'b' : 'w';
}

function toEngineError(err: unknown): EngineError {
  if (err instanceof EngineError) return err;
  return new EngineError(err instanceof Error ? err.message : String(err));
}

/**
 * Evaluates positions with a fresh engine process per call.
 *
 * Engine failures never throw: they are reported through `onError` and
 * the call resolves with a null record.
 */
export class UciEvaluator {
  private readonly config: EngineConfig;
  private readonly transportFactory: TransportFactory;
  private readonly onError: (error: EngineError, fen: string) => void;

  constructor(config: Partial<EngineConfig> = {}, options: EvaluatorOptions = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.transportFactory = options.transportFactory ?? (() => spawnTransport(this.config.path));
    this.onError =
      options.onError ?? ((error, fen) => console.warn(`Evaluation failed for ${fen}: ${error.message}`));
  }

  get enginePath(): string {
    return this.config.path;
  }

  /**
   * Evaluate a position to a fixed depth
   *
   * @param fen - Position in FEN notation
   * @param depth - Search depth in plies
   * @param signal - Aborting stops the search; the call then resolves with a null record
   */
  async evaluate(fen: string, depth: number, signal?: AbortSignal): Promise<EvaluationRecord> {
    const engine = this.createEngine();
    try {
      await engine.start(signal);
      const result = await engine.search(fen, depth, this.config.timeoutMs, signal);
      if (result.score === null) {
        throw new EngineError(`Engine returned no score at depth ${depth}`);
      }
      return {
        score: toWhitePerspective(result.score, sideToMove(fen)),
        bestMove: result.bestMove,
      };
    } catch (err) {
      if (!signal?.aborted) {
        this.onError(toEngineError(err), fen);
      }
      return { ...FAILED };
    } finally {
      await engine.quit();
    }
  }

  /**
   * Start an engine and complete the handshake
   */
  async healthCheck(): Promise<EngineHealth> {
    const startTime = Date.now();
    const engine = this.createEngine();
    try {
      await engine.start();
      const health: EngineHealth = { healthy: true, latencyMs: Date.now() - startTime };
      if (engine.name) health.name = engine.name;
      return health;
    } catch (err) {
      return {
        healthy: false,
        latencyMs: Date.now() - startTime,
        error: toEngineError(err).message,
      };
    } finally {
      await engine.quit();
    }
  }

  private createEngine(): UciEngine {
    return new UciEngine(this.transportFactory(), {
      threads: this.config.threads,
      hashMb: this.config.hashMb,
      readyTimeoutMs: this.config.readyTimeoutMs,
      quitGraceMs: this.config.quitGraceMs,
    });
  }
}
