/**
 * @movegrade/database - opening book storage
 *
 * This package provides:
 * - A read-only client answering "is this position book?"
 * - A loader that builds the book from TSV opening lists
 */

export const VERSION = '0.1.0';

export {
  BaseDatabaseClient,
  BookClient,
  DEFAULT_BOOK_CONFIG,
  type BookEntry,
  type DatabaseClientConfig,
} from './clients/index.js';

export {
  loadBookDatabase,
  parseTsvLine,
  pgnToSanMoves,
  DEFAULT_MAX_BOOK_PLIES,
  type BookLoaderOptions,
  type BookLoadStats,
} from './loaders/book-loader.js';

export { DatabaseError, DatabaseNotFoundError, QueryError, ConnectionError } from './errors.js';
