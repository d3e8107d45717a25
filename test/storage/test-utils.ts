/**
 * Test utilities for storage layer tests.
 * Provides an in-memory database with the production schema.
 *
 * ```typescript
 * let db: Database.Database;
 *
 * beforeEach(() => {
 *   db = createTestDb();
 *   setupTestDb(db);  // Sets db for all store modules
 * });
 *
 * afterEach(() => {
 *   teardownTestDb(db);
 * });
 * ```
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { setDb, resetDb } from '../../src/storage/db.js';
import { runMigrations } from '../../src/storage/migrations.js';
import { createGraphTables, insertGraph } from '../../src/storage/graph-store.js';
import { createImageTables, insertImages } from '../../src/storage/image-store.js';
import { insertDocuments } from '../../src/storage/document-store.js';
import type { DocumentInput, Entity, ImageInput, RelationshipInput } from '../../src/storage/types.js';

/**
 * In-memory database with the core schema (documents, memories). Graph and
 * image tables are left out, as on a fresh install.
 */
export function createTestDb(): Database.Database {
  const db = new Database(':memory:');
  runMigrations(db);
  return db;
}

export function setupTestDb(db: Database.Database): void {
  setDb(db);
}

export function teardownTestDb(db: Database.Database): void {
  resetDb();
  db.close();
}

export function seedDocuments(docs: DocumentInput[]): void {
  insertDocuments(docs);
}

export function entity(id: string, text: string, overrides: Partial<Entity> = {}): Entity {
  return {
    id,
    text,
    type: 'CONDITION',
    confidence: 1,
    sourceDocumentId: null,
    ...overrides,
  };
}

export function edge(
  sourceEntityId: string,
  targetEntityId: string,
  relationType: string = 'related_to',
  confidence: number | null = null,
): RelationshipInput {
  return { sourceEntityId, targetEntityId, relationType, confidence };
}

/**
 * Create the graph tables and load a graph.
 */
export function seedGraph(entities: Entity[], relationships: RelationshipInput[] = []): void {
  createGraphTables();
  insertGraph(entities, relationships);
}

/**
 * Create the image table and load images.
 */
export function seedImages(images: ImageInput[]): void {
  createImageTables();
  insertImages(images);
}
