/**
 * Database client exports
 */

export { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';
export { BookClient, DEFAULT_BOOK_CONFIG, type BookEntry } from './book.js';
