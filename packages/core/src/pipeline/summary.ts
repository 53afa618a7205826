/**
 * Per-side quality counts, phase ratings and review selection
 */

import type { Side } from '@movegrade/pgn';

import type {
  AnalysisEntry,
  GamePhase,
  GameSummary,
  MoveQuality,
  PhaseRating,
  PhaseRatings,
  PhaseSummary,
  QualityCounts,
  QualitySummary,
} from '../types/analysis.js';

/**
 * Labels worth a second look after the game
 */
export const REVIEW_QUALITIES: ReadonlySet<MoveQuality> = new Set<MoveQuality>([
  'brilliant',
  'miss',
  'inaccuracy',
  'mistake',
  'blunder',
]);

/**
 * Plies played before each phase ends: the opening is the first ten moves
 * of each side, the middlegame runs to move thirty.
 */
export const PHASE_BOUNDARIES = {
  openingEnd: 20,
  middlegameEnd: 60,
} as const;

/**
 * Severity of each weak label when rating a phase
 */
const BADNESS: Partial<Record<MoveQuality, number>> = {
  blunder: 3,
  mistake: 2,
  miss: 1.5,
  inaccuracy: 1,
};

export function emptyQualityCounts(): QualityCounts {
  return {
    brilliant: 0,
    best: 0,
    excellent: 0,
    good: 0,
    book: 0,
    forced: 0,
    miss: 0,
    inaccuracy: 0,
    mistake: 0,
    blunder: 0,
    unknown: 0,
  };
}

function sideOf(entry: AnalysisEntry, firstMover: Side): Side {
  const byFirstMover = (entry.ply - 1) % 2 === 0;
  if (byFirstMover) return firstMover;
  return firstMover === 'w' ? 'b' : 'w';
}

export function phaseOf(ply: number): GamePhase {
  if (ply <= PHASE_BOUNDARIES.openingEnd) return 'opening';
  if (ply <= PHASE_BOUNDARIES.middlegameEnd) return 'middlegame';
  return 'endgame';
}

/**
 * Count labels per side
 *
 * @param firstMover - Side that played ply 1 (White unless the game starts from a set-up position)
 */
export function summarizeQualities(entries: readonly AnalysisEntry[], firstMover: Side = 'w'): QualitySummary {
  const summary: QualitySummary = { white: emptyQualityCounts(), black: emptyQualityCounts() };
  for (const entry of entries) {
    const counts = sideOf(entry, firstMover) === 'w' ? summary.white : summary.black;
    counts[entry.quality]++;
  }
  return summary;
}

/**
 * Rate one side's play in one phase from its labels.
 *
 * Book moves are left out of the average, and a phase played entirely
 * from the book rates excellent.
 */
export function ratePhase(qualities: readonly MoveQuality[]): PhaseRating | null {
  if (qualities.length === 0) return null;

  const played = qualities.filter((quality) => quality !== 'book');
  if (played.length === 0) return 'excellent';

  const badness = played.reduce((sum, quality) => sum + (BADNESS[quality] ?? 0), 0) / played.length;
  if (badness >= 1.5) return 'poor';
  if (badness >= 0.8) return 'ok';
  if (badness >= 0.3) return 'good';
  return 'excellent';
}

function emptyPhaseQualities(): Record<GamePhase, MoveQuality[]> {
  return { opening: [], middlegame: [], endgame: [] };
}

function ratePhases(byPhase: Record<GamePhase, MoveQuality[]>): PhaseRatings {
  return {
    opening: ratePhase(byPhase.opening),
    middlegame: ratePhase(byPhase.middlegame),
    endgame: ratePhase(byPhase.endgame),
  };
}

/**
 * Rate each side's opening, middlegame and endgame
 */
export function summarizePhases(entries: readonly AnalysisEntry[], firstMover: Side = 'w'): PhaseSummary {
  const white = emptyPhaseQualities();
  const black = emptyPhaseQualities();
  for (const entry of entries) {
    const bySide = sideOf(entry, firstMover) === 'w' ? white : black;
    bySide[phaseOf(entry.ply)].push(entry.quality);
  }
  return { white: ratePhases(white), black: ratePhases(black) };
}

export function summarizeGame(entries: readonly AnalysisEntry[], firstMover: Side = 'w'): GameSummary {
  return {
    ...summarizeQualities(entries, firstMover),
    phases: summarizePhases(entries, firstMover),
  };
}

/**
 * Entries that deserve commentary, in ply order
 */
export function selectMovesForReview(entries: readonly AnalysisEntry[]): AnalysisEntry[] {
  return entries.filter((entry) => REVIEW_QUALITIES.has(entry.quality));
}
