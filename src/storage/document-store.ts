/**
 * Document persistence.
 */

import { getDb } from './db.js';
import { serializeEmbedding } from '../utils/vector-math.js';
import { parseMetadata, type DocumentInput, type StoredDocument } from './types.js';

interface DocumentRow {
  id: string;
  patient_id: string | null;
  resource_type: string;
  document_date: string | null;
  text: string;
  metadata: string | null;
  created_at: string;
}

function rowToDocument(row: DocumentRow): StoredDocument {
  return {
    id: row.id,
    patientId: row.patient_id,
    resourceType: row.resource_type,
    documentDate: row.document_date,
    text: row.text,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
  };
}

const DOCUMENT_COLUMNS =
  'id, patient_id, resource_type, document_date, text, metadata, created_at';

/**
 * Insert a document. An existing id is left unchanged (documents are
 * immutable once ingested); returns false in that case.
 */
export function insertDocument(doc: DocumentInput): boolean {
  const db = getDb();
  const result = db
    .prepare(
      `
    INSERT OR IGNORE INTO documents
      (id, patient_id, resource_type, document_date, text, embedding, embedding_model, metadata)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `,
    )
    .run(
      doc.id,
      doc.patientId ?? null,
      doc.resourceType ?? 'DocumentReference',
      doc.documentDate ?? null,
      doc.text,
      doc.embedding ? serializeEmbedding(doc.embedding) : null,
      doc.embedding ? (doc.embeddingModel ?? null) : null,
      doc.metadata ? JSON.stringify(doc.metadata) : null,
    );
  return result.changes > 0;
}

/**
 * Insert many documents in one transaction. Returns the number inserted.
 */
export function insertDocuments(docs: DocumentInput[]): number {
  const db = getDb();
  const insertAll = db.transaction((batch: DocumentInput[]) => {
    let inserted = 0;
    for (const doc of batch) {
      if (insertDocument(doc)) inserted++;
    }
    return inserted;
  });
  return insertAll(docs);
}

/**
 * Attach (or replace) an embedding on an existing document.
 */
export function setDocumentEmbedding(id: string, embedding: number[], model: string): boolean {
  const db = getDb();
  const result = db
    .prepare('UPDATE documents SET embedding = ?, embedding_model = ? WHERE id = ?')
    .run(serializeEmbedding(embedding), model, id);
  return result.changes > 0;
}

export function getDocument(id: string): StoredDocument | null {
  const db = getDb();
  const row = db.prepare(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = ?`).get(id) as
    | DocumentRow
    | undefined;
  return row ? rowToDocument(row) : null;
}

/**
 * Fetch documents by id. Missing ids are skipped; order follows `ids`.
 */
export function getDocumentsByIds(ids: string[]): StoredDocument[] {
  if (ids.length === 0) return [];
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id IN (${placeholders})`)
    .all(...ids) as DocumentRow[];

  const byId = new Map(rows.map((r) => [r.id, rowToDocument(r)]));
  const ordered: StoredDocument[] = [];
  for (const id of ids) {
    const doc = byId.get(id);
    if (doc) ordered.push(doc);
  }
  return ordered;
}

/**
 * Documents that have no embedding yet, in id order.
 */
export function getDocumentsWithoutEmbedding(limit: number): StoredDocument[] {
  const db = getDb();
  const rows = db
    .prepare(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE embedding IS NULL ORDER BY id LIMIT ?`)
    .all(limit) as DocumentRow[];
  return rows.map(rowToDocument);
}

export function getDocumentCount(): number {
  const db = getDb();
  const row = db.prepare('SELECT COUNT(*) as count FROM documents').get() as { count: number };
  return row.count;
}

export function getPatientCount(): number {
  const db = getDb();
  const row = db
    .prepare('SELECT COUNT(DISTINCT patient_id) as count FROM documents WHERE patient_id IS NOT NULL')
    .get() as { count: number };
  return row.count;
}

/**
 * Map of document id → patient id for the given documents.
 */
export function getPatientIdsForDocuments(ids: string[]): Map<string, string | null> {
  const result = new Map<string, string | null>();
  if (ids.length === 0) return result;
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(`SELECT id, patient_id FROM documents WHERE id IN (${placeholders})`)
    .all(...ids) as Array<{ id: string; patient_id: string | null }>;
  for (const row of rows) {
    result.set(row.id, row.patient_id);
  }
  return result;
}

/**
 * First `length` characters of `text` with whitespace collapsed.
 */
export function makePreview(text: string, length: number = 200): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.length > length ? `${collapsed.slice(0, length)}...` : collapsed;
}
