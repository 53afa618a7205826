/**
 * Error classes for opening book storage
 */

/**
 * Base error class for database errors
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly dbPath?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatabaseError);
    }
  }
}

/**
 * The book file does not exist
 */
export class DatabaseNotFoundError extends DatabaseError {
  constructor(dbPath: string) {
    super(`Opening book not found: ${dbPath}`, dbPath);
    this.name = 'DatabaseNotFoundError';
  }
}

/**
 * SQLite rejected a statement
 */
export class QueryError extends DatabaseError {
  constructor(
    message: string,
    public readonly query?: string,
  ) {
    super(message);
    this.name = 'QueryError';
  }
}

/**
 * The book file exists but could not be opened
 */
export class ConnectionError extends DatabaseError {
  constructor(dbPath: string, cause?: unknown) {
    super(`Failed to open opening book at ${dbPath}${describeCause(cause)}`, dbPath);
    this.name = 'ConnectionError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `: ${cause.message}`;
  if (cause === undefined) return '';
  return `: ${String(cause)}`;
}
