/**
 * Medical image records and their multimodal embeddings.
 */

import { getDb, tableExists } from './db.js';
import { applySchemaFile } from './migrations.js';
import { serializeEmbedding } from '../utils/vector-math.js';
import type { ImageInput, ImageRecord } from './types.js';

interface ImageRow {
  id: string;
  subject_id: string;
  study_id: string | null;
  view_position: string | null;
  image_path: string | null;
  patient_id: string | null;
  document_id: string | null;
}

function rowToImage(row: ImageRow): ImageRecord {
  return {
    id: row.id,
    subjectId: row.subject_id,
    studyId: row.study_id,
    viewPosition: row.view_position,
    imagePath: row.image_path,
    patientId: row.patient_id,
    documentId: row.document_id,
  };
}

const IMAGE_COLUMNS = 'id, subject_id, study_id, view_position, image_path, patient_id, document_id';

export function hasImageTables(db: ReturnType<typeof getDb> = getDb()): boolean {
  return tableExists(db, 'images');
}

export function createImageTables(db: ReturnType<typeof getDb> = getDb()): void {
  applySchemaFile(db, 'image-schema.sql');
}

export function insertImage(image: ImageInput): void {
  const db = getDb();
  db.prepare(
    `
    INSERT OR REPLACE INTO images
      (id, subject_id, study_id, view_position, image_path, patient_id, document_id, embedding, embedding_model)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `,
  ).run(
    image.id,
    image.subjectId,
    image.studyId ?? null,
    image.viewPosition ?? null,
    image.imagePath ?? null,
    image.patientId ?? null,
    image.documentId ?? null,
    image.embedding ? serializeEmbedding(image.embedding) : null,
    image.embedding ? (image.embeddingModel ?? null) : null,
  );
}

export function insertImages(images: ImageInput[]): void {
  const db = getDb();
  const insertAll = db.transaction((batch: ImageInput[]) => {
    for (const image of batch) insertImage(image);
  });
  insertAll(images);
}

/**
 * Fetch images by id. Order follows `ids`; missing ids are skipped.
 */
export function getImagesByIds(ids: string[]): ImageRecord[] {
  if (ids.length === 0) return [];
  const db = getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(`SELECT ${IMAGE_COLUMNS} FROM images WHERE id IN (${placeholders})`)
    .all(...ids) as ImageRow[];
  const byId = new Map(rows.map((r) => [r.id, rowToImage(r)]));
  return ids.flatMap((id) => {
    const image = byId.get(id);
    return image ? [image] : [];
  });
}

export function getImageCount(): number {
  const db = getDb();
  const row = db.prepare('SELECT COUNT(*) as count FROM images').get() as { count: number };
  return row.count;
}
