/**
 * SQLite database connection.
 *
 * One process-wide connection, replaceable for tests via setDb().
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { randomUUID } from 'crypto';
import { getConfig, resolvePath } from '../config/engine-config.js';
import { runMigrations } from './migrations.js';
import { StoreUnavailableError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

let db: Database.Database | null = null;
let customDb: Database.Database | null = null;

/**
 * Set a custom database instance (for testing).
 *
 * When set, `getDb()` returns this instance instead of opening one.
 * Use `resetDb()` to clear it.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   const testDb = new Database(':memory:');
 *   runMigrations(testDb);
 *   setDb(testDb);
 * });
 *
 * afterEach(() => {
 *   resetDb();
 * });
 * ```
 */
export function setDb(database: Database.Database): void {
  customDb = database;
}

/**
 * Clear any custom database and close the singleton connection.
 */
export function resetDb(): void {
  customDb = null;
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Open (or create) a database at `path` with WAL, foreign keys and the
 * current schema.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let database: Database.Database;
  try {
    database = new Database(path);
  } catch (error) {
    throw new StoreUnavailableError(`Cannot open database at ${path}`, 'DB_CONNECTION_FAILED', error);
  }

  database.pragma('foreign_keys = ON');
  database.pragma('journal_mode = WAL');
  database.pragma('busy_timeout = 5000');
  runMigrations(database);

  return database;
}

/**
 * Return the database connection.
 *
 * Priority:
 * 1. Custom database set via `setDb()`
 * 2. Existing singleton connection
 * 3. New connection to `dbPath` or the configured path
 */
export function getDb(dbPath?: string): Database.Database {
  if (customDb) {
    return customDb;
  }

  if (db) {
    return db;
  }

  const resolvedPath = resolvePath(dbPath ?? getConfig().dbPath);
  db = openDatabase(resolvedPath);
  log.debug('Database opened', { path: resolvedPath });

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * True when a table (or virtual table) named `name` exists.
 */
export function tableExists(database: Database.Database, name: string): boolean {
  const row = database
    .prepare(`SELECT 1 AS present FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(name);
  return row !== undefined;
}

/**
 * Generate a unique id.
 */
export function generateId(): string {
  return randomUUID();
}
