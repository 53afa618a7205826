/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  ServiceError,
  AnalysisError,
  CancelledError,
  PgnError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, exitCodeFor, handleError, withErrorHandling, createServiceError } from './handler.js';
