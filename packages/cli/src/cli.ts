/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';
import { validateCliOptions } from './config/validation.js';

export const VERSION = '0.1.0';

/**
 * Profile descriptions for help text
 */
const PROFILE_HELP = `Analysis profile:
    quick    - Fast analysis (depth 12)
    standard - Balanced analysis (depth 18) [default]
    deep     - Thorough analysis (depth 22)`;

/**
 * Format descriptions for help text
 */
const FORMAT_HELP = `Output format:
    json - One object per game with summary and per-move entries [default]
    text - One line per move followed by per-side counts`;

/**
 * Parse a non-negative integer option
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('movegrade')
    .description('Classify every move of a chess game by how much it costs against engine best play')
    .version(VERSION);

  // No defaults on options that config files and the environment can also set,
  // otherwise the flag value would always win
  program
    .command('analyze')
    .description('Analyze the games of a PGN file and label every move')
    .option('-i, --input <file>', 'Input PGN file (default: stdin)')
    .option('-o, --output <file>', 'Output file (default: stdout)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-p, --profile <profile>', PROFILE_HELP)
    .option('-d, --depth <plies>', 'Engine search depth, overrides the profile', parseInteger)
    .option('-w, --workers <count>', 'Parallel engine processes (0 = one per CPU)', parseInteger)
    .option('-e, --engine <path>', 'UCI engine binary (default: stockfish)')
    .option('-b, --book <file>', 'Opening book database built with build-book')
    .option('-f, --format <format>', FORMAT_HELP)
    .option('-r, --review-only', 'Only list brilliant moves, misses, inaccuracies, mistakes and blunders')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--dry-run', 'Validate setup and configuration without running analysis')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to keep startup light for --help
      const { analyzeCommand } = await import('./commands/analyze.js');
      await analyzeCommand(options);
    });

  program
    .command('build-book')
    .description('Build an opening book database from tab-separated opening lists (eco, name, pgn)')
    .argument('<files...>', 'TSV files to import')
    .requiredOption('-o, --output <file>', 'Database file to write')
    .option('--max-plies <plies>', 'Deepest ply stored per opening line', parseInteger)
    .option('--no-color', 'Disable colored output')
    .action(async (files: string[], options: Record<string, unknown>) => {
      const { buildBookCommand } = await import('./commands/build-book.js');
      buildBookCommand(files, options);
    });

  return program;
}

/**
 * Parse CLI options from command options object
 *
 * @throws ConfigValidationError if an option has an invalid value
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  return validateCliOptions(options);
}
