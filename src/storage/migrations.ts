/**
 * Schema application and version tracking.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { loadSchemaStatements, type SchemaFile } from './schema-loader.js';

/** Version recorded after the core schema is applied */
export const SCHEMA_VERSION = 1;

/**
 * Execute every statement of a schema file. All statements are idempotent
 * (IF NOT EXISTS), so re-running on an existing database is a no-op.
 */
export function applySchemaFile(database: Database.Database, file: SchemaFile): void {
  const statements = loadSchemaStatements(file);
  const apply = database.transaction(() => {
    for (const statement of statements) {
      database.exec(statement);
    }
  });
  apply();
}

/**
 * Current schema version, 0 for a fresh database.
 */
export function getSchemaVersion(database: Database.Database): number {
  const table = database
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
    .get();
  if (!table) return 0;

  const row = database.prepare('SELECT MAX(version) as version FROM schema_version').get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

/**
 * Bring the core schema up to SCHEMA_VERSION.
 */
export function runMigrations(database: Database.Database): void {
  const currentVersion = getSchemaVersion(database);

  applySchemaFile(database, 'schema.sql');

  if (currentVersion < SCHEMA_VERSION) {
    database
      .prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)')
      .run(SCHEMA_VERSION);
  }
}
