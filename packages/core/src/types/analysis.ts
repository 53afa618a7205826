/**
 * Analysis type definitions
 */

// ============================================================================
// Quality labels
// ============================================================================

/**
 * Move quality labels, from best to worst, plus the `unknown` fallback
 */
export type MoveQuality =
  | 'brilliant'
  | 'best'
  | 'excellent'
  | 'good'
  | 'book'
  | 'forced'
  | 'miss'
  | 'inaccuracy'
  | 'mistake'
  | 'blunder'
  | 'unknown';

export const MOVE_QUALITIES: readonly MoveQuality[] = [
  'brilliant',
  'best',
  'excellent',
  'good',
  'book',
  'forced',
  'miss',
  'inaccuracy',
  'mistake',
  'blunder',
  'unknown',
];

/**
 * Labels that come out of the loss threshold table
 */
export type LossLabel = 'best' | 'excellent' | 'good' | 'inaccuracy' | 'mistake' | 'blunder';

// ============================================================================
// Engine evaluation
// ============================================================================

/**
 * Engine output for one position.
 *
 * `score` is in centipawns from White's perspective with mate in n
 * encoded as ±(10000 - n); null means the evaluation failed. `bestMove` is UCI.
 */
export interface EvaluationRecord {
  score: number | null;
  bestMove: string | null;
}

/**
 * Anything that can score a position. The UCI evaluator is the production
 * implementation; tests use a scripted fake.
 */
export interface PositionEvaluator {
  evaluate(fen: string, depth: number, signal?: AbortSignal): Promise<EvaluationRecord>;
}

// ============================================================================
// Diagnosis
// ============================================================================

export type ProblemKind =
  | 'allows_checkmate'
  | 'walked_into_check'
  | 'hanging_piece'
  | 'bad_trade'
  | 'leaves_piece_hanging'
  | 'missed_capture';

/**
 * Structural reason a move is weak
 */
export interface ProblemDiagnosis {
  kind: ProblemKind;
  description: string;
  /** Material given away, in pawns */
  materialLost: number;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Per-move analysis result
 */
export interface AnalysisEntry {
  /** Half-move number, 1 for the first move of the game */
  ply: number;
  /** Move in SAN */
  move: string;
  quality: MoveQuality;
  isBook: boolean;
  comment: string;
  /** Evaluation before the move, in pawns from White's perspective */
  evalBefore: number | null;
  /** Evaluation after the move, in pawns from White's perspective */
  evalAfter: number | null;
  /** Engine's preferred move in SAN, when it differs from the played move */
  bestMove: string | null;
  /** Clamped centipawn loss, null when it cannot be computed */
  cpLoss: number | null;
}

export type QualityCounts = Record<MoveQuality, number>;

export interface QualitySummary {
  white: QualityCounts;
  black: QualityCounts;
}

export type GamePhase = 'opening' | 'middlegame' | 'endgame';

export const GAME_PHASES: readonly GamePhase[] = ['opening', 'middlegame', 'endgame'];

/**
 * How cleanly a side played a phase. Null when the side made no move in it.
 */
export type PhaseRating = 'excellent' | 'good' | 'ok' | 'poor';

export type PhaseRatings = Record<GamePhase, PhaseRating | null>;

export interface PhaseSummary {
  white: PhaseRatings;
  black: PhaseRatings;
}

export interface GameSummary extends QualitySummary {
  phases: PhaseSummary;
}

/**
 * Result of analyzing one game
 */
export interface GameAnalysis {
  entries: AnalysisEntry[];
  summary: GameSummary;
  /** Distinct positions sent to the engine */
  evaluatedPositions: number;
  /** Positions whose evaluation failed */
  failedEvaluations: number;
}
