/**
 * Knowledge graph persistence: entities and typed relationships.
 *
 * The tables are not part of the core schema. They appear once the graph
 * build step calls createGraphTables(), and hasGraphTables() lets readers
 * tell "no graph" apart from "no match".
 */

import { getDb, tableExists } from './db.js';
import { applySchemaFile } from './migrations.js';
import {
  isEntityType,
  type Entity,
  type EntityType,
  type Relationship,
  type RelationshipInput,
} from './types.js';

export const GRAPH_TABLES = ['entities', 'entity_relationships'] as const;

interface EntityRow {
  id: string;
  text: string;
  type: string;
  confidence: number;
  source_document_id: string | null;
}

interface RelationshipRow {
  id: number;
  source_entity_id: string;
  target_entity_id: string;
  relation_type: string;
  confidence: number | null;
}

function rowToEntity(row: EntityRow): Entity {
  if (!isEntityType(row.type)) {
    throw new Error(`Entity ${row.id} has unknown type ${row.type}`);
  }
  return {
    id: row.id,
    text: row.text,
    type: row.type,
    confidence: row.confidence,
    sourceDocumentId: row.source_document_id,
  };
}

function rowToRelationship(row: RelationshipRow): Relationship {
  return {
    id: row.id,
    sourceEntityId: row.source_entity_id,
    targetEntityId: row.target_entity_id,
    relationType: row.relation_type,
    confidence: row.confidence,
  };
}

const ENTITY_COLUMNS = 'id, text, type, confidence, source_document_id';
const RELATIONSHIP_COLUMNS =
  'id, source_entity_id, target_entity_id, relation_type, confidence';

export function hasGraphTables(db: ReturnType<typeof getDb> = getDb()): boolean {
  return GRAPH_TABLES.every((name) => tableExists(db, name));
}

export function createGraphTables(db: ReturnType<typeof getDb> = getDb()): void {
  applySchemaFile(db, 'graph-schema.sql');
}

/**
 * Lower-cased words longer than two characters, in first-seen order. A term
 * without such words falls back to the whole trimmed term.
 */
export function extractKeywords(term: string): string[] {
  const words = term
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((w) => w.length > 2);
  const unique = [...new Set(words)];
  if (unique.length > 0) return unique;
  const trimmed = term.trim().toLowerCase();
  return trimmed ? [trimmed] : [];
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export function insertEntity(entity: Entity): void {
  const db = getDb();
  db.prepare(
    `
    INSERT OR REPLACE INTO entities (id, text, type, confidence, source_document_id)
    VALUES (?, ?, ?, ?, ?)
  `,
  ).run(entity.id, entity.text, entity.type, entity.confidence, entity.sourceDocumentId);
}

export function insertRelationship(rel: RelationshipInput): number {
  const db = getDb();
  const result = db
    .prepare(
      `
    INSERT INTO entity_relationships
      (source_entity_id, target_entity_id, relation_type, confidence, source_document_id)
    VALUES (?, ?, ?, ?, ?)
  `,
    )
    .run(
      rel.sourceEntityId,
      rel.targetEntityId,
      rel.relationType,
      rel.confidence ?? null,
      rel.sourceDocumentId ?? null,
    );
  return Number(result.lastInsertRowid);
}

/**
 * Insert entities and relationships in one transaction.
 */
export function insertGraph(entities: Entity[], relationships: RelationshipInput[]): void {
  const db = getDb();
  const insertAll = db.transaction(() => {
    for (const entity of entities) insertEntity(entity);
    for (const rel of relationships) insertRelationship(rel);
  });
  insertAll();
}

export function getEntity(id: string): Entity | null {
  const db = getDb();
  const row = db.prepare(`SELECT ${ENTITY_COLUMNS} FROM entities WHERE id = ?`).get(id) as
    | EntityRow
    | undefined;
  return row ? rowToEntity(row) : null;
}

export function getEntitiesByIds(ids: string[]): Map<string, Entity> {
  const result = new Map<string, Entity>();
  if (ids.length === 0) return result;
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(`SELECT ${ENTITY_COLUMNS} FROM entities WHERE id IN (${placeholders})`)
    .all(...ids) as EntityRow[];
  for (const row of rows) {
    result.set(row.id, rowToEntity(row));
  }
  return result;
}

/**
 * Entities whose text contains any keyword of `term`, most confident
 * first, id ascending on ties.
 */
export function findEntitiesByTerm(term: string, limit: number): Entity[] {
  const keywords = extractKeywords(term);
  if (keywords.length === 0 || limit <= 0) return [];

  const db = getDb();
  const clauses = keywords.map(() => `LOWER(text) LIKE ? ESCAPE '\\'`).join(' OR ');
  const rows = db
    .prepare(
      `SELECT ${ENTITY_COLUMNS} FROM entities
       WHERE ${clauses}
       ORDER BY confidence DESC, id ASC
       LIMIT ?`,
    )
    .all(...keywords.map((k) => `%${escapeLike(k)}%`), limit) as EntityRow[];
  return rows.map(rowToEntity);
}

/**
 * Every relationship touching any of `ids`, as source or target, in id
 * order.
 */
export function getRelationshipsFor(ids: string[]): Relationship[] {
  if (ids.length === 0) return [];
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(
      `SELECT ${RELATIONSHIP_COLUMNS} FROM entity_relationships
       WHERE source_entity_id IN (${placeholders}) OR target_entity_id IN (${placeholders})
       ORDER BY id`,
    )
    .all(...ids, ...ids) as RelationshipRow[];
  return rows.map(rowToRelationship);
}

/**
 * Relationships whose both endpoints are in `ids`.
 */
export function getRelationshipsAmong(ids: string[]): Relationship[] {
  if (ids.length === 0) return [];
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(
      `SELECT ${RELATIONSHIP_COLUMNS} FROM entity_relationships
       WHERE source_entity_id IN (${placeholders}) AND target_entity_id IN (${placeholders})
       ORDER BY id`,
    )
    .all(...ids, ...ids) as RelationshipRow[];
  return rows.map(rowToRelationship);
}

export interface ConfidenceBucket {
  label: string;
  min: number;
  max: number;
  count: number;
}

export interface DegreeEntry {
  entity: Entity;
  degree: number;
}

export interface GraphStatistics {
  totalEntities: number;
  totalRelationships: number;
  byType: Record<EntityType, number>;
  confidenceBuckets: ConfidenceBucket[];
  relationTypes: Record<string, number>;
  mostConnected: DegreeEntry[];
}

const BUCKETS: ReadonlyArray<{ label: string; min: number; max: number }> = [
  { label: '0.00-0.25', min: 0, max: 0.25 },
  { label: '0.25-0.50', min: 0.25, max: 0.5 },
  { label: '0.50-0.75', min: 0.5, max: 0.75 },
  { label: '0.75-1.00', min: 0.75, max: 1 },
];

/**
 * Aggregate counts over the entity set. No traversal.
 */
export function getGraphStatistics(topN: number = 5): GraphStatistics {
  const db = getDb();

  const totalEntities = (
    db.prepare('SELECT COUNT(*) as count FROM entities').get() as { count: number }
  ).count;
  const totalRelationships = (
    db.prepare('SELECT COUNT(*) as count FROM entity_relationships').get() as { count: number }
  ).count;

  const byType: Record<EntityType, number> = {
    SYMPTOM: 0,
    CONDITION: 0,
    MEDICATION: 0,
    PROCEDURE: 0,
    ANATOMY: 0,
    OBSERVATION: 0,
    TEMPORAL: 0,
  };
  const typeRows = db
    .prepare('SELECT type, COUNT(*) as count FROM entities GROUP BY type')
    .all() as Array<{ type: string; count: number }>;
  for (const row of typeRows) {
    if (isEntityType(row.type)) byType[row.type] = row.count;
  }

  // Last bucket is closed so confidence 1.0 is counted
  const confidenceBuckets = BUCKETS.map((b, i) => {
    const upper = i === BUCKETS.length - 1 ? 'confidence <= ?' : 'confidence < ?';
    const row = db
      .prepare(`SELECT COUNT(*) as count FROM entities WHERE confidence >= ? AND ${upper}`)
      .get(b.min, b.max) as { count: number };
    return { ...b, count: row.count };
  });

  const relationTypes: Record<string, number> = {};
  const relRows = db
    .prepare(
      `SELECT relation_type, COUNT(*) as count FROM entity_relationships
       GROUP BY relation_type ORDER BY count DESC, relation_type`,
    )
    .all() as Array<{ relation_type: string; count: number }>;
  for (const row of relRows) {
    relationTypes[row.relation_type] = row.count;
  }

  const degreeRows = db
    .prepare(
      `SELECT e.id, e.text, e.type, e.confidence, e.source_document_id, COUNT(r.id) as degree
       FROM entities e
       JOIN entity_relationships r ON r.source_entity_id = e.id OR r.target_entity_id = e.id
       GROUP BY e.id
       ORDER BY degree DESC, e.id
       LIMIT ?`,
    )
    .all(topN) as Array<EntityRow & { degree: number }>;
  const mostConnected = degreeRows.map((row) => ({ entity: rowToEntity(row), degree: row.degree }));

  return { totalEntities, totalRelationships, byType, confidenceBuckets, relationTypes, mostConnected };
}
