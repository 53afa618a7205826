/**
 * Rendering of analysis results as JSON or plain text
 */

import { Chalk, type ChalkInstance } from 'chalk';

import {
  GAME_PHASES,
  MOVE_QUALITIES,
  selectMovesForReview,
  type AnalysisEntry,
  type GameSummary,
  type MoveQuality,
  type PhaseRatings,
  type QualityCounts,
} from '@movegrade/core';
import { enumeratePositions, type GameMetadata, type ParsedGame, type PlayedMove } from '@movegrade/pgn';

import type { GameResult } from '../orchestrator/orchestrator.js';
import { formatPawns } from '../progress/formatters.js';

export interface RenderOptions {
  /** Only include moves worth reviewing */
  reviewOnly?: boolean;
  /** Color quality labels (text output only) */
  color?: boolean;
}

/**
 * One game as it appears in JSON output
 */
export interface GameReport {
  metadata: GameMetadata;
  startFen?: string;
  summary: GameSummary;
  evaluatedPositions: number;
  failedEvaluations: number;
  moves: AnalysisEntry[];
}

function selectEntries(result: GameResult, reviewOnly: boolean): AnalysisEntry[] {
  return reviewOnly ? selectMovesForReview(result.analysis.entries) : result.analysis.entries;
}

export function toGameReport(result: GameResult, options: RenderOptions = {}): GameReport {
  const report: GameReport = {
    metadata: result.game.metadata,
    summary: result.analysis.summary,
    evaluatedPositions: result.analysis.evaluatedPositions,
    failedEvaluations: result.analysis.failedEvaluations,
    moves: selectEntries(result, options.reviewOnly ?? false),
  };
  if (result.game.startFen) report.startFen = result.game.startFen;
  return report;
}

/**
 * Render all games as a pretty-printed JSON array
 */
export function renderJson(results: readonly GameResult[], options: RenderOptions = {}): string {
  return `${JSON.stringify(
    results.map((result) => toGameReport(result, options)),
    null,
    2,
  )}\n`;
}

function qualityStyle(chalk: ChalkInstance, quality: MoveQuality): (text: string) => string {
  switch (quality) {
    case 'brilliant':
      return chalk.cyan.bold;
    case 'best':
    case 'excellent':
      return chalk.green;
    case 'miss':
    case 'inaccuracy':
      return chalk.yellow;
    case 'mistake':
      return chalk.red;
    case 'blunder':
      return chalk.red.bold;
    case 'book':
    case 'forced':
    case 'unknown':
      return chalk.dim;
    case 'good':
      return (text) => text;
  }
}

function moveLabel(move: PlayedMove | undefined, ply: number): string {
  if (!move) return `#${ply}`;
  return move.color === 'w' ? `${move.moveNumber}.` : `${move.moveNumber}...`;
}

/**
 * "2 book, 1 best" for the labels that occur, in label order
 */
export function formatCounts(counts: QualityCounts): string {
  const parts = MOVE_QUALITIES.filter((quality) => counts[quality] > 0).map(
    (quality) => `${counts[quality]} ${quality}`,
  );
  return parts.length > 0 ? parts.join(', ') : 'no moves';
}

/**
 * "opening excellent, middlegame poor" for the phases a side played
 */
export function formatPhaseRatings(ratings: PhaseRatings): string {
  const parts = GAME_PHASES.flatMap((phase) => {
    const rating = ratings[phase];
    return rating ? [`${phase} ${rating}`] : [];
  });
  return parts.length > 0 ? parts.join(', ') : 'no moves';
}

function gameHeader(game: ParsedGame): string[] {
  const { white, black, result, event, date } = game.metadata;
  const lines = [`${white} vs ${black} (${result})`];
  const context = [event, date].filter((part): part is string => Boolean(part));
  if (context.length > 0) lines.push(context.join(', '));
  return lines;
}

function renderGameText(result: GameResult, options: RenderOptions, chalk: ChalkInstance): string[] {
  const played = enumeratePositions(result.game.moves, result.game.startFen).moves;
  const lines = [...gameHeader(result.game), ''];

  for (const entry of selectEntries(result, options.reviewOnly ?? false)) {
    const label = moveLabel(played[entry.ply - 1], entry.ply);
    const quality = qualityStyle(chalk, entry.quality)(entry.quality);
    const evals = `${formatPawns(entry.evalBefore)} -> ${formatPawns(entry.evalAfter)}`;
    const comment = entry.comment ? ` ${entry.comment}` : '';
    lines.push(`${label} ${entry.move} (${quality}) ${evals}${comment}`);
  }

  lines.push('');
  lines.push(`White: ${formatCounts(result.analysis.summary.white)}`);
  lines.push(`Black: ${formatCounts(result.analysis.summary.black)}`);
  lines.push(`White phases: ${formatPhaseRatings(result.analysis.summary.phases.white)}`);
  lines.push(`Black phases: ${formatPhaseRatings(result.analysis.summary.phases.black)}`);
  return lines;
}

/**
 * Render all games as readable text, one move per line
 */
export function renderText(results: readonly GameResult[], options: RenderOptions = {}): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const blocks = results.map((result) => renderGameText(result, options, chalk).join('\n'));
  return `${blocks.join('\n\n')}\n`;
}
