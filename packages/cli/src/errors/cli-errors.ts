/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return withSuggestion(`Error: ${this.message}`, this.suggestion);
  }
}

function withSuggestion(headline: string, suggestion?: string): string {
  return suggestion ? `${headline}\n\nSuggestion: ${suggestion}` : headline;
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Output file error
 */
export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'OutputError';
  }
}

/**
 * An external dependency (engine binary, book database) is unusable
 */
export class ServiceError extends CliError {
  constructor(
    public readonly serviceName: string,
    message: string,
    suggestion?: string,
  ) {
    super(message, suggestion);
    this.name = 'ServiceError';
  }

  override format(): string {
    return withSuggestion(`Error [${this.serviceName}]: ${this.message}`, this.suggestion);
  }
}

/**
 * Analysis pipeline error
 */
export class AnalysisError extends CliError {
  constructor(
    message: string,
    public readonly gameNumber?: number,
  ) {
    super(message);
    this.name = 'AnalysisError';
  }

  override format(): string {
    const prefix = this.gameNumber !== undefined ? `Error in game ${this.gameNumber}` : 'Error';
    return `${prefix}: ${this.message}`;
  }
}

/**
 * The user interrupted the run; exits with the conventional SIGINT status
 */
export class CancelledError extends CliError {
  constructor() {
    super('Analysis cancelled', undefined, 130);
    this.name = 'CancelledError';
  }
}

/**
 * Unreadable PGN or an illegal move in a game
 */
export class PgnError extends CliError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly gameNumber?: number,
  ) {
    super(message);
    this.name = 'PgnError';
  }

  override format(): string {
    const location: string[] = [];
    if (this.gameNumber !== undefined) location.push(`game ${this.gameNumber}`);
    if (this.line !== undefined) location.push(`line ${this.line}`);
    if (this.column !== undefined) location.push(`column ${this.column}`);
    const suffix = location.length > 0 ? ` (${location.join(', ')})` : '';
    return `PGN Error${suffix}: ${this.message}`;
  }
}
