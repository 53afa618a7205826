/**
 * Error handling utilities
 */

import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, ServiceError } from './cli-errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError || error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Exit code for an error: the CLI error's own code, 2 for invalid
 * configuration, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) return error.exitCode;
  if (error instanceof ConfigValidationError) return 2;
  return 1;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async function with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

const SERVICE_SUGGESTIONS: Record<string, string> = {
  Engine: 'Install Stockfish, or point --engine (or MOVEGRADE_ENGINE_PATH) at a UCI engine binary',
  'Opening book': `Build one with 'movegrade build-book <tsv files> -o <db>', or drop --book`,
};

/**
 * Create a service error with helpful suggestion
 */
export function createServiceError(serviceName: string, detail: string, originalError?: Error): ServiceError {
  const message = `${detail}${originalError ? ` (${originalError.message})` : ''}`;
  return new ServiceError(serviceName, message, SERVICE_SUGGESTIONS[serviceName]);
}
