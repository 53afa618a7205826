/**
 * Progress reporter with ora spinners
 *
 * Everything goes to stderr so that stdout carries only the analysis.
 */

import chalk from 'chalk';
import ora, { type Color, type Ora } from 'ora';

import type { AnalysisPhase as PipelinePhase } from '@movegrade/core';

import { formatDuration, formatPercentage } from './formatters.js';
import {
  type AnalysisPhase,
  type ColorFunctions,
  type ProgressReporterOptions,
  type RunSummary,
  type ServiceStatus,
  PHASE_NAMES,
} from './types.js';

export type { AnalysisPhase, ServiceStatus, ProgressReporterOptions, RunSummary } from './types.js';

function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private phaseStartTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private currentPhaseName: string = '';
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  private write(line: string): void {
    console.error(line);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    this.write(this.c.bold(`movegrade v${version}`));
    this.write('');
  }

  /**
   * Start the overall run clock
   */
  startAnalysis(): void {
    this.startTime = Date.now();
  }

  /**
   * Report engine and book health check results
   */
  reportServiceStatus(services: ServiceStatus[]): void {
    if (this.silent) return;

    this.write(this.c.dim('Checking services...'));
    for (const service of services) {
      const status = service.healthy ? this.c.green('✓') : this.c.red('✗');
      const detail = service.detail ? ` ${this.c.dim(`(${service.detail})`)}` : '';
      const latency = service.latencyMs !== undefined ? this.c.dim(` - ${service.latencyMs}ms`) : '';
      const error = service.error ? this.c.red(` (${service.error})`) : '';

      this.write(`  ${status} ${service.name}${detail}${latency}${error}`);
    }
    this.write('');
  }

  /**
   * Start analyzing a game
   */
  startGame(gameIndex: number, totalGames: number, white: string, black: string, totalPlies: number): void {
    if (this.silent) return;

    const gameLabel = totalGames > 1 ? `game ${gameIndex + 1}/${totalGames}` : 'game';
    this.write(this.c.bold(`Analyzing ${gameLabel}: ${white} vs ${black} (${totalPlies} plies)`));
  }

  /**
   * Start a new phase
   */
  startPhase(phase: AnalysisPhase): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    this.currentPhaseName = PHASE_NAMES[phase];

    if (this.spinner) {
      this.spinner.stop();
    }

    // only pass a color when colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: this.currentPhaseName,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update phase progress with a counter
   */
  updateProgress(current: number, total: number): void {
    if (this.silent || !this.spinner) return;
    const percentage = this.c.dim(` (${formatPercentage(current, total)})`);
    this.spinner.text = `${this.currentPhaseName}... ${current}/${total}${percentage}`;
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: AnalysisPhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const phaseName = PHASE_NAMES[phase];
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';

    if (this.spinner) {
      this.spinner.succeed(`${phaseName}${detailStr}${durationStr}`);
      this.spinner = null;
    } else {
      this.write(`  ${this.c.green('✓')} ${phaseName}${detailStr}${durationStr}`);
    }
  }

  /**
   * Fail a phase
   */
  failPhase(phase: AnalysisPhase, error: string): void {
    if (this.silent) return;

    const phaseName = PHASE_NAMES[phase];

    if (this.spinner) {
      this.spinner.fail(`${phaseName}: ${error}`);
      this.spinner = null;
    } else {
      this.write(`  ${this.c.red('✗')} ${phaseName}: ${error}`);
    }
  }

  /**
   * Complete a game analysis
   */
  completeGame(_gameIndex: number, totalGames: number): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }

    if (totalGames > 1) {
      this.write('');
    }
  }

  /**
   * Print the final summary
   */
  printSummary(stats: RunSummary): void {
    if (this.silent) return;

    const totalTime = Date.now() - this.startTime;

    this.write('');
    this.write(this.c.bold('Summary:'));
    this.write(`  Games analyzed: ${stats.gamesAnalyzed}`);
    this.write(`  Moves classified: ${stats.movesAnalyzed}`);
    this.write(`  Moves to review: ${stats.reviewMoves}`);
    if (stats.failedEvaluations > 0) {
      this.write(`  Failed evaluations: ${this.c.yellow(String(stats.failedEvaluations))}`);
    }
    this.write(`  Total time: ${formatDuration(totalTime)}`);
  }

  /**
   * Print output file location
   */
  printOutputLocation(outputPath: string): void {
    if (this.silent) return;
    this.write('');
    this.write(`Output written to: ${this.c.cyan(outputPath)}`);
  }

  /**
   * Print a message (respects silent setting)
   */
  printMessage(message: string): void {
    if (this.silent) return;
    this.write(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    this.write(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message safely while a spinner is active.
   * The spinner is stopped for the warning and then restarted.
   */
  warnSafe(message: string): void {
    if (this.silent) return;

    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      this.write(this.c.yellow(`  ⚠ ${message}`));
      this.spinner.start(currentText);
    } else {
      this.write(this.c.yellow(`⚠ ${message}`));
    }
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    if (this.silent) return;
    this.write(this.c.red(`✗ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Check if colors are enabled
   */
  hasColors(): boolean {
    return this.useColor;
  }
}

/**
 * Create a progress callback for the game analyzer.
 * A phase is completed when the next one starts, or when classification
 * reaches its total.
 */
export function createPipelineProgressCallback(
  reporter: ProgressReporter,
): (phase: PipelinePhase, current: number, total: number) => void {
  let currentPhase: PipelinePhase | null = null;

  return (phase, current, total) => {
    if (phase !== currentPhase) {
      if (currentPhase) {
        reporter.completePhase(currentPhase);
      }
      currentPhase = phase;
      reporter.startPhase(phase);
    }

    if (total > 0) {
      reporter.updateProgress(current, total);
    }

    if (phase === 'classification' && current === total) {
      reporter.completePhase('classification');
      currentPhase = null;
    }
  };
}
