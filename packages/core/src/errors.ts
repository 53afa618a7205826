/**
 * Error classes for the analysis pipeline
 */

/**
 * The caller cancelled an analysis. No partial result is produced.
 */
export class AnalysisCancelledError extends Error {
  constructor(message = 'Analysis cancelled') {
    super(message);
    this.name = 'AnalysisCancelledError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnalysisCancelledError);
    }
  }
}
