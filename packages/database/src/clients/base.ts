/**
 * Base database client with lazy connection management
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import Database from 'better-sqlite3';

import { ConnectionError, DatabaseNotFoundError } from '../errors.js';

/**
 * Configuration for database client connections
 */
export interface DatabaseClientConfig {
  /** Path to the database file (relative to the data directory or absolute) */
  dbPath: string;
  /** Whether to open in read-only mode (default: true) */
  readonly?: boolean;
  /** Busy timeout in milliseconds */
  timeoutMs?: number;
  /** Directory relative paths are resolved against (default: ./data) */
  dataDir?: string;
}

/**
 * Base class for SQLite database clients
 */
export abstract class BaseDatabaseClient {
  protected db: Database.Database | null = null;
  protected readonly config: Required<DatabaseClientConfig>;

  constructor(config: DatabaseClientConfig) {
    this.config = {
      dbPath: config.dbPath,
      readonly: config.readonly ?? true,
      timeoutMs: config.timeoutMs ?? 5000,
      dataDir: config.dataDir ?? path.resolve(process.cwd(), 'data'),
    };
  }

  /**
   * Resolve the full database path
   */
  protected getFullDbPath(): string {
    if (path.isAbsolute(this.config.dbPath)) {
      return this.config.dbPath;
    }
    return path.join(this.config.dataDir, this.config.dbPath);
  }

  /**
   * Open the database on first use
   */
  protected ensureConnected(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const fullPath = this.getFullDbPath();
    if (!fs.existsSync(fullPath)) {
      throw new DatabaseNotFoundError(fullPath);
    }

    try {
      this.db = new Database(fullPath, {
        readonly: this.config.readonly,
        fileMustExist: true,
        timeout: this.config.timeoutMs,
      });
      return this.db;
    } catch (err) {
      throw new ConnectionError(fullPath, err);
    }
  }

  /**
   * Close the database connection
   */
  public close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Get the configured database path
   */
  public get dbPath(): string {
    return this.config.dbPath;
  }

  /**
   * Check if the database is currently connected
   */
  public get isConnected(): boolean {
    return this.db !== null;
  }
}
