/**
 * Database Connection Module
 *
 * Opens the SQLite handle, applies the schema, and converts driver failures
 * into PersistenceError so the transport answers 503 instead of 500.
 *
 * @module db/connection
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { PersistenceError } from '../api/errors.js';
import { logger } from '../utils/logger.js';
import { SCHEMA_SQL } from './schema.js';

/**
 * Open a database at `path` (or `:memory:`) and apply the schema
 */
export function openDatabase(path: string): Database.Database {
  // For file-based SQLite, ensure data directory exists
  if (path !== ':memory:') {
    const dbDir = dirname(path);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      logger.info({ path: dbDir }, 'Created database directory');
    }
  }

  const db = new Database(path);

  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA_SQL);
  logger.info({ path }, 'Database connection established');

  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}

/**
 * Check if an error was raised by the SQLite driver
 */
export function isSqliteError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && error.name === 'SqliteError' && 'code' in error;
}

/**
 * Run a storage operation, surfacing driver failures as PersistenceError.
 *
 * Errors that are not from the driver (typed API errors thrown inside a
 * transaction, for instance) pass through untouched.
 */
export function withPersistence<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (isSqliteError(error)) {
      logger.error({ error, operation, code: error.code }, 'Storage operation failed');
      throw new PersistenceError();
    }
    throw error;
  }
}

/**
 * Run `fn` inside a transaction. Commits on return, rolls back on throw.
 */
export function runInTransaction<T>(db: Database.Database, operation: string, fn: () => T): T {
  return withPersistence(operation, () => db.transaction(fn)());
}

export type { Database };
