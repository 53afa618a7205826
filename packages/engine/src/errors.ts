/**
 * Error classes for engine operations
 */

/**
 * Base error class for engine errors
 */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }
}

/**
 * The engine did not answer a command in time
 */
export class EngineTimeoutError extends EngineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Engine ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * The engine process could not be started or exited unexpectedly
 */
export class EngineProcessError extends EngineError {
  constructor(
    message: string,
    public readonly exitCode?: number | null,
  ) {
    super(message);
    this.name = 'EngineProcessError';
  }
}

/**
 * The caller cancelled the running command
 */
export class EngineAbortedError extends EngineError {
  constructor() {
    super('Engine command aborted');
    this.name = 'EngineAbortedError';
  }
}
