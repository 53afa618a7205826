/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { MovegradeConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: MovegradeConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Analysis:'));
  lines.push(`  Profile: ${config.analysis.profile}`);
  lines.push(`  Depth: ${config.analysis.depth}`);
  lines.push(`  Workers: ${config.analysis.workers === 0 ? 'auto' : config.analysis.workers}`);
  lines.push(`  Book plies: ${config.analysis.bookPlies}`);
  lines.push('');

  lines.push(chalk.dim('Engine:'));
  lines.push(`  Path: ${config.engine.path}`);
  lines.push(`  Threads: ${config.engine.threads}`);
  lines.push(`  Hash: ${config.engine.hashMb} MB`);
  lines.push(`  Timeout: ${formatDuration(config.engine.timeoutMs)}`);
  lines.push('');

  lines.push(chalk.dim('Book:'));
  lines.push(`  Path: ${config.book.path ?? chalk.yellow('none')}`);
  lines.push('');

  lines.push(chalk.dim('Output:'));
  lines.push(`  Format: ${config.output.format}`);
  lines.push(`  Review only: ${config.output.reviewOnly ? 'yes' : 'no'}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format a percentage
 * @returns Formatted percentage like "42%"
 */
export function formatPercentage(current: number, total: number): string {
  if (total <= 0) {
    return '0%';
  }
  return `${Math.round((current / total) * 100)}%`;
}

/** Scores at or beyond this many pawns are mates */
const MATE_PAWNS = 90;

/**
 * Format an evaluation in pawns with its sign, e.g. "+0.35", "-1.20" or "+M3"
 */
export function formatPawns(pawns: number | null): string {
  if (pawns === null) return '?';
  if (Math.abs(pawns) >= MATE_PAWNS) {
    // mate in n comes through as 100 pawns less n hundredths
    const distance = Math.round((100 - Math.abs(pawns)) * 100);
    const mate = distance > 0 ? `M${distance}` : 'M';
    return pawns > 0 ? `+${mate}` : `-${mate}`;
  }
  const text = Math.abs(pawns).toFixed(2);
  return pawns < 0 ? `-${text}` : `+${text}`;
}
