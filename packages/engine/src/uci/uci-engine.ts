/**
 * UCI protocol session over an engine transport
 */

import {
  EngineAbortedError,
  EngineError,
  EngineProcessError,
  EngineTimeoutError,
} from '../errors.js';
import type { EngineTransport } from '../transport.js';

import { parseBestMove, parseInfoLine, selectPrincipalScore } from './parse.js';
import type { InfoLine, UciScore } from './parse.js';

export interface UciEngineOptions {
  threads: number;
  hashMb: number;
  /** Timeout for `uci` and `isready` round trips */
  readyTimeoutMs: number;
  /** How long `quit` may take before the process is killed */
  quitGraceMs: number;
}

export interface SearchResult {
  score: UciScore | null;
  bestMove: string | null;
  infos: InfoLine[];
}

interface PendingCommand {
  accept: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * One engine process, one command in flight at a time.
 *
 * Not reusable after `quit()` or after the process dies.
 */
export class UciEngine {
  private pending: PendingCommand | undefined;
  private exited = false;
  private exitError: EngineProcessError | undefined;
  private exitWaiters: Array<() => void> = [];
  private engineName: string | undefined;

  constructor(
    private readonly transport: EngineTransport,
    private readonly options: UciEngineOptions,
  ) {
    transport.onLine((line) => this.handleLine(line));
    transport.onExit((code, error) => this.handleExit(code, error));
  }

  /**
   * Engine name reported by `id name`, once the handshake is done
   */
  get name(): string | undefined {
    return this.engineName;
  }

  get isRunning(): boolean {
    return !this.exited;
  }

  /**
   * Handshake, configure and wait until the engine is ready
   */
  async start(signal?: AbortSignal): Promise<void> {
    await this.exchange(
      'uci',
      (line) => {
        if (line.startsWith('id name ')) {
          this.engineName = line.slice('id name '.length).trim();
        }
        return line === 'uciok';
      },
      this.options.readyTimeoutMs,
      'handshake',
      signal,
    );

    this.send(`setoption name Threads value ${this.options.threads}`);
    this.send(`setoption name Hash value ${this.options.hashMb}`);
    await this.isReady(signal);
  }

  async isReady(signal?: AbortSignal): Promise<void> {
    await this.exchange('isready', (line) => line === 'readyok', this.options.readyTimeoutMs, 'isready', signal);
  }

  /**
   * Search a position to a fixed depth.
   * On timeout or abort the engine is told to `stop` and the call rejects.
   */
  async search(fen: string, depth: number, timeoutMs: number, signal?: AbortSignal): Promise<SearchResult> {
    this.send(`position fen ${fen}`);

    const infos: InfoLine[] = [];
    const terminal = await this.exchange(
      `go depth ${depth}`,
      (line) => {
        const info = parseInfoLine(line);
        if (info) {
          infos.push(info);
          return false;
        }
        return line.startsWith('bestmove');
      },
      timeoutMs,
      'search',
      signal,
      () => this.send('stop'),
    );

    return {
      score: selectPrincipalScore(infos),
      bestMove: parseBestMove(terminal)?.bestMove ?? null,
      infos,
    };
  }

  /**
   * Ask the engine to quit, killing it if it does not exit within the grace period.
   * Never rejects.
   */
  async quit(): Promise<void> {
    if (this.exited) return;
    this.send('quit');
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.transport.kill();
        resolve();
      }, this.options.quitGraceMs);
      this.exitWaiters.push(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  private send(command: string): void {
    if (!this.exited) {
      this.transport.send(command);
    }
  }

  /**
   * Send a command and resolve with the first line `accept` returns true for
   */
  private exchange(
    command: string,
    accept: (line: string) => boolean,
    timeoutMs: number,
    operation: string,
    signal?: AbortSignal,
    onInterrupt?: () => void,
  ): Promise<string> {
    if (this.exited) {
      return Promise.reject(this.exitError ?? new EngineProcessError('Engine process is not running'));
    }
    if (this.pending) {
      return Promise.reject(new EngineError(`Cannot send "${command}" while another command is pending`));
    }
    if (signal?.aborted) {
      return Promise.reject(new EngineAbortedError());
    }

    return new Promise<string>((resolve, reject) => {
      const settle = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.pending = undefined;
      };
      const onAbort = (): void => {
        settle();
        onInterrupt?.();
        reject(new EngineAbortedError());
      };
      const timer = setTimeout(() => {
        settle();
        onInterrupt?.();
        reject(new EngineTimeoutError(operation, timeoutMs));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending = {
        accept,
        resolve: (line) => {
          settle();
          resolve(line);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      };
      this.send(command);
    });
  }

  private handleLine(raw: string): void {
    const line = raw.trim();
    if (line && this.pending?.accept(line)) {
      this.pending.resolve(line);
    }
  }

  private handleExit(code: number | null, error?: Error): void {
    this.exited = true;
    const detail = error ? `: ${error.message}` : '';
    this.exitError = new EngineProcessError(`Engine process exited (code ${code ?? 'none'})${detail}`, code);
    this.pending?.reject(this.exitError);
    for (const waiter of this.exitWaiters.splice(0)) {
      waiter();
    }
  }
}
