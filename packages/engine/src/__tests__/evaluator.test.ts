import { describe, it, expect, vi } from 'vitest';

import { EngineError, EngineProcessError, EngineTimeoutError } from '../errors.js';
import { UciEvaluator } from '../evaluator.js';
import type { EngineConfig } from '../evaluator.js';

import { ScriptedTransport, engineScript } from './fake-transport.js';
import type { ScriptHandler } from './fake-transport.js';

const WHITE_TO_MOVE = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';
const BLACK_TO_MOVE = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';
// Fool's mate: White is checkmated
const WHITE_MATED = 'rnb1kbnr/pppp1ppp/8/4p3/6Pq/5P2/PPPPP2P/RNBQKBNR w KQkq - 1 3';

function setup(handler: ScriptHandler, config: Partial<EngineConfig> = {}) {
  const transports: ScriptedTransport[] = [];
  const onError = vi.fn<(error: EngineError, fen: string) => void>();
  const evaluator = new UciEvaluator(config, {
    onError,
    transportFactory: () => {
      const transport = new ScriptedTransport(handler);
      transports.push(transport);
      return transport;
    },
  });
  return { evaluator, transports, onError };
}

describe('UciEvaluator', () => {
  describe('evaluate', () => {
    it('runs the handshake and a fixed-depth search', async () => {
      const { evaluator, transports } = setup(
        engineScript({
          search: ['info depth 10 score cp 35 pv e2e4', 'info depth 12 score cp 42 pv e2e4 e7e5', 'bestmove e2e4 ponder e7e5'],
        }),
      );

      const record = await evaluator.evaluate(WHITE_TO_MOVE, 12);

      expect(record).toEqual({ score: 42, bestMove: 'e2e4' });
      expect(transports).toHaveLength(1);
      expect(transports[0]?.sent).toEqual([
        'uci',
        'setoption name Threads value 1',
        'setoption name Hash value 64',
        'isready',
        `position fen ${WHITE_TO_MOVE}`,
        'go depth 12',
        'quit',
      ]);
    });

    it('passes configured threads and hash to the engine', async () => {
      const { evaluator, transports } = setup(engineScript(), { threads: 2, hashMb: 128 });

      await evaluator.evaluate(WHITE_TO_MOVE, 8);

      expect(transports[0]?.sent).toContain('setoption name Threads value 2');
      expect(transports[0]?.sent).toContain('setoption name Hash value 128');
    });

    it('converts black-to-move scores to White perspective', async () => {
      const { evaluator } = setup(engineScript({ search: ['info depth 5 score cp 50 pv e7e5', 'bestmove e7e5'] }));

      expect(await evaluator.evaluate(BLACK_TO_MOVE, 5)).toEqual({ score: -50, bestMove: 'e7e5' });
    });

    it('encodes mates by distance', async () => {
      const { evaluator } = setup(engineScript({ search: ['info depth 20 score mate 3 pv d8h4', 'bestmove d8h4'] }));

      expect(await evaluator.evaluate(BLACK_TO_MOVE, 20)).toEqual({ score: -9997, bestMove: 'd8h4' });
    });

    it('returns a null best move for a mated position', async () => {
      const { evaluator, onError } = setup(engineScript({ search: ['info depth 0 score mate 0', 'bestmove (none)'] }));

      expect(await evaluator.evaluate(WHITE_MATED, 18)).toEqual({ score: -10000, bestMove: null });
      expect(onError).not.toHaveBeenCalled();
    });

    it('starts a fresh engine for every call', async () => {
      const { evaluator, transports } = setup(engineScript());

      await evaluator.evaluate(WHITE_TO_MOVE, 4);
      await evaluator.evaluate(BLACK_TO_MOVE, 4);

      expect(transports).toHaveLength(2);
    });
  });

  describe('failures', () => {
    it('returns a null record when the engine dies mid-search', async () => {
      const base = engineScript();
      const { evaluator, onError } = setup((command, io) => {
        if (command.startsWith('go')) {
          io.exit(1, new Error('segmentation fault'));
          return;
        }
        base(command, io);
      });

      expect(await evaluator.evaluate(WHITE_TO_MOVE, 10)).toEqual({ score: null, bestMove: null });
      expect(onError).toHaveBeenCalledTimes(1);
      const error = onError.mock.calls[0]?.[0];
      expect(error).toBeInstanceOf(EngineProcessError);
      expect(error?.message).toBe('Engine process exited (code 1): segmentation fault');
      expect(onError.mock.calls[0]?.[1]).toBe(WHITE_TO_MOVE);
    });

    it('stops a search that exceeds the timeout', async () => {
      const { evaluator, transports, onError } = setup(engineScript({ silent: ['go'] }), { timeoutMs: 20 });

      expect(await evaluator.evaluate(WHITE_TO_MOVE, 30)).toEqual({ score: null, bestMove: null });
      expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(EngineTimeoutError);
      expect(transports[0]?.sent.slice(-2)).toEqual(['stop', 'quit']);
    });

    it('kills an engine that ignores quit', async () => {
      const { evaluator, transports, onError } = setup(engineScript({ silent: ['uci', 'quit'] }), {
        readyTimeoutMs: 20,
        quitGraceMs: 10,
      });

      expect(await evaluator.evaluate(WHITE_TO_MOVE, 10)).toEqual({ score: null, bestMove: null });
      expect(onError.mock.calls[0]?.[0]?.message).toBe('Engine handshake timed out after 20ms');
      expect(transports[0]?.killed).toBe(true);
    });

    it('reports searches that produce no score', async () => {
      const { evaluator, onError } = setup(engineScript({ search: ['bestmove e2e4'] }));

      expect(await evaluator.evaluate(WHITE_TO_MOVE, 12)).toEqual({ score: null, bestMove: null });
      expect(onError.mock.calls[0]?.[0]?.message).toBe('Engine returned no score at depth 12');
    });

    it('abandons an aborted search without reporting an error', async () => {
      const controller = new AbortController();
      const base = engineScript();
      const { evaluator, transports, onError } = setup((command, io) => {
        if (command.startsWith('go')) {
          controller.abort();
          return;
        }
        base(command, io);
      });

      expect(await evaluator.evaluate(WHITE_TO_MOVE, 10, controller.signal)).toEqual({
        score: null,
        bestMove: null,
      });
      expect(onError).not.toHaveBeenCalled();
      expect(transports[0]?.sent).toContain('stop');
    });

    it('does not start a search when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const { evaluator, transports } = setup(engineScript());

      expect(await evaluator.evaluate(WHITE_TO_MOVE, 10, controller.signal)).toEqual({
        score: null,
        bestMove: null,
      });
      expect(transports[0]?.sent).not.toContain('uci');
    });
  });

  describe('healthCheck', () => {
    it('reports the engine name', async () => {
      const { evaluator } = setup(engineScript({ name: 'Fakefish 16' }));

      const health = await evaluator.healthCheck();

      expect(health.healthy).toBe(true);
      expect(health.name).toBe('Fakefish 16');
      expect(health.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('reports a binary that cannot be started', async () => {
      const { evaluator } = setup((_command, io) => io.exit(null, new Error('spawn stockfish ENOENT')));

      const health = await evaluator.healthCheck();

      expect(health.healthy).toBe(false);
      expect(health.error).toBe('Engine process exited (code none): spawn stockfish ENOENT');
    });
  });
});
