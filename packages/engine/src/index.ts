/**
 * @movegrade/engine - UCI engine access
 *
 * One engine process per evaluation, scores normalised to White's view.
 */

export const VERSION = '0.1.0';

export {
  UciEvaluator,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineHealth,
  type EvaluationRecord,
  type EvaluatorOptions,
} from './evaluator.js';

export { UciEngine, type SearchResult, type UciEngineOptions } from './uci/uci-engine.js';

export {
  MATE_SCORE,
  parseBestMove,
  parseInfoLine,
  selectPrincipalScore,
  toWhitePerspective,
  type BestMoveLine,
  type InfoLine,
  type UciScore,
} from './uci/parse.js';

export {
  spawnTransport,
  type EngineTransport,
  type ExitListener,
  type LineListener,
  type TransportFactory,
} from './transport.js';

export {
  EngineError,
  EngineAbortedError,
  EngineProcessError,
  EngineTimeoutError,
} from './errors.js';
