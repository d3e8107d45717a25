/**
 * Persistence for agent memories.
 *
 * Memories change only through explicit calls: insert, updateMemoryContent,
 * deleteMemory. Recall bookkeeping (use count, last used) is the one
 * side effect of reading.
 */

import { getDb, generateId } from './db.js';
import { serializeEmbedding } from '../utils/vector-math.js';
import { isMemoryKind, parseMetadata, type MemoryKind, type MemoryRecord } from './types.js';

interface MemoryRow {
  id: string;
  content: string;
  kind: string;
  metadata: string | null;
  use_count: number;
  created_at: string;
  updated_at: string;
  last_used_at: string | null;
}

function rowToMemory(row: MemoryRow): MemoryRecord {
  if (!isMemoryKind(row.kind)) {
    throw new Error(`Memory ${row.id} has unknown kind ${row.kind}`);
  }
  return {
    id: row.id,
    content: row.content,
    kind: row.kind,
    metadata: parseMetadata(row.metadata),
    useCount: row.use_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastUsedAt: row.last_used_at,
  };
}

const MEMORY_COLUMNS =
  'id, content, kind, metadata, use_count, created_at, updated_at, last_used_at';

export interface NewMemory {
  content: string;
  kind: MemoryKind;
  embedding: number[];
  embeddingModel: string;
  metadata?: Record<string, unknown>;
}

/**
 * Store a memory and return its id. Duplicates are allowed.
 */
export function insertMemory(memory: NewMemory, now: Date = new Date()): string {
  const db = getDb();
  const id = generateId();
  const timestamp = now.toISOString();
  db.prepare(
    `
    INSERT INTO memories
      (id, content, kind, embedding, embedding_model, metadata, use_count, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, 0, ?, ?)
  `,
  ).run(
    id,
    memory.content,
    memory.kind,
    serializeEmbedding(memory.embedding),
    memory.embeddingModel,
    memory.metadata ? JSON.stringify(memory.metadata) : null,
    timestamp,
    timestamp,
  );
  return id;
}

export function getMemory(id: string): MemoryRecord | null {
  const db = getDb();
  const row = db.prepare(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE id = ?`).get(id) as
    | MemoryRow
    | undefined;
  return row ? rowToMemory(row) : null;
}

export function getMemoriesByIds(ids: string[]): Map<string, MemoryRecord> {
  const result = new Map<string, MemoryRecord>();
  if (ids.length === 0) return result;
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(`SELECT ${MEMORY_COLUMNS} FROM memories WHERE id IN (${placeholders})`)
    .all(...ids) as MemoryRow[];
  for (const row of rows) {
    result.set(row.id, rowToMemory(row));
  }
  return result;
}

/**
 * Replace content and embedding. Returns false for an unknown id.
 */
export function updateMemoryContent(
  id: string,
  content: string,
  embedding: number[],
  embeddingModel: string,
  now: Date = new Date(),
): boolean {
  const db = getDb();
  const result = db
    .prepare(
      `UPDATE memories SET content = ?, embedding = ?, embedding_model = ?, updated_at = ?
       WHERE id = ?`,
    )
    .run(content, serializeEmbedding(embedding), embeddingModel, now.toISOString(), id);
  return result.changes > 0;
}

export function deleteMemory(id: string): boolean {
  const db = getDb();
  const result = db.prepare('DELETE FROM memories WHERE id = ?').run(id);
  return result.changes > 0;
}

/**
 * Bump use count and last-used time of recalled memories.
 */
export function markMemoriesUsed(ids: string[], now: Date = new Date()): void {
  if (ids.length === 0) return;
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  db.prepare(
    `UPDATE memories SET use_count = use_count + 1, last_used_at = ?
     WHERE id IN (${placeholders})`,
  ).run(now.toISOString(), ...ids);
}

export interface MemoryCounts {
  total: number;
  byKind: Record<MemoryKind, number>;
  mostUsed: MemoryRecord[];
}

export function getMemoryCounts(topN: number = 5): MemoryCounts {
  const db = getDb();
  const byKind: Record<MemoryKind, number> = { correction: 0, preference: 0, fact: 0 };
  const rows = db
    .prepare('SELECT kind, COUNT(*) as count FROM memories GROUP BY kind')
    .all() as Array<{ kind: string; count: number }>;
  let total = 0;
  for (const row of rows) {
    total += row.count;
    if (isMemoryKind(row.kind)) byKind[row.kind] = row.count;
  }

  const mostUsed = (
    db
      .prepare(
        `SELECT ${MEMORY_COLUMNS} FROM memories
         WHERE use_count > 0
         ORDER BY use_count DESC, last_used_at DESC, id
         LIMIT ?`,
      )
      .all(topN) as MemoryRow[]
  ).map(rowToMemory);

  return { total, byKind, mostUsed };
}
