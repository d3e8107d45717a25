/**
 * Tests for loading notes, graphs and images from files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3-multiple-ciphers';
import {
  collectDocuments,
  embedPendingDocuments,
  importGraphFile,
  importImageFile,
  ingestFhirFile,
} from '../../src/ingest/ingest.js';
import { getDocument } from '../../src/storage/document-store.js';
import { getEntity, getRelationshipsFor, hasGraphTables } from '../../src/storage/graph-store.js';
import { getImagesByIds } from '../../src/storage/image-store.js';
import { DOCUMENT_VECTORS, VectorStore } from '../../src/storage/vector-store.js';
import { IngestionError } from '../../src/utils/errors.js';
import { createTestDb, seedDocuments, setupTestDb, teardownTestDb } from '../storage/test-utils.js';
import { FakeEmbeddingProvider } from '../retrieval/test-services.js';

const hex = (text: string) => Buffer.from(text, 'utf8').toString('hex');

function docRef(id: string, text: string, patient = 'p1'): Record<string, unknown> {
  return {
    resourceType: 'DocumentReference',
    id,
    subject: { reference: `Patient/${patient}` },
    content: [{ attachment: { data: hex(text) } }],
  };
}

describe('ingest', () => {
  let db: Database.Database;
  let dir: string;

  beforeEach(() => {
    db = createTestDb();
    setupTestDb(db);
    dir = mkdtempSync(join(tmpdir(), 'cgr-ingest-'));
  });

  afterEach(() => {
    teardownTestDb(db);
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, value: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(value));
    return path;
  }

  describe('collectDocuments', () => {
    it('separates documents, other resources and invalid references', () => {
      const result = collectDocuments([
        docRef('d1', 'Cough for three days.'),
        { resourceType: 'Patient', id: 'p1' },
        { resourceType: 'DocumentReference', id: 'd2', content: [{ attachment: {} }] },
      ]);

      expect(result.documents.map((d) => d.id)).toEqual(['d1']);
      expect(result.skipped).toBe(1);
      expect(result.invalid).toEqual([{ index: 2, reason: 'DocumentReference d2 has no attachment data' }]);
    });
  });

  describe('ingestFhirFile', () => {
    it('stores decoded notes and counts what it skipped', async () => {
      const path = writeJson('bundle.json', {
        resourceType: 'Bundle',
        entry: [
          { resource: docRef('d1', 'Cough for three days.') },
          { resource: { resourceType: 'Observation', id: 'o1' } },
          { resource: docRef('d2', 'Fever resolved.', 'p2') },
        ],
      });

      const result = await ingestFhirFile(path);

      expect(result).toEqual({ resources: 3, documents: 2, inserted: 2, duplicates: 0, skipped: 1, invalid: [] });
      expect(getDocument('d2')).toMatchObject({ text: 'Fever resolved.', patientId: 'p2' });
    });

    it('leaves existing documents untouched on re-ingest', async () => {
      const path = writeJson('notes.json', [docRef('d1', 'Cough for three days.')]);

      await ingestFhirFile(path);
      const again = await ingestFhirFile(path);

      expect(again).toMatchObject({ inserted: 0, duplicates: 1 });
    });

    it('fails with FILE_READ_FAILED for a missing file', async () => {
      const error = await ingestFhirFile(join(dir, 'missing.json')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IngestionError);
      expect(error).toMatchObject({ code: 'FILE_READ_FAILED' });
    });
  });

  describe('embedPendingDocuments', () => {
    beforeEach(() => {
      seedDocuments([
        { id: 'a', text: 'one' },
        { id: 'b', text: 'two' },
        { id: 'c', text: 'three' },
      ]);
    });

    it('embeds every pending document in batches', async () => {
      const embedder = new FakeEmbeddingProvider({}, 'fake-text', 3, 'embedding', [0.1, 0.2, 0.3]);
      const progress: number[] = [];

      const result = await embedPendingDocuments(embedder, 2, (n) => progress.push(n));

      expect(result).toEqual({ embedded: 3 });
      expect(progress).toEqual([2, 3]);
      expect(embedder.calls).toEqual([
        { texts: ['one', 'two'], purpose: 'passage' },
        { texts: ['three'], purpose: 'passage' },
      ]);
      expect(new VectorStore(DOCUMENT_VECTORS).stats()).toEqual({ total: 3, degenerate: 0, missing: 0 });
    });

    it('stops with a reason when the model is unavailable', async () => {
      const embedder = new FakeEmbeddingProvider();
      embedder.down = true;

      const result = await embedPendingDocuments(embedder);

      expect(result).toEqual({ embedded: 0, stoppedReason: 'Embedding model fake-text unavailable: offline' });
    });
  });

  describe('importGraphFile', () => {
    it('creates the graph tables and loads entities and relationships', async () => {
      const path = writeJson('graph.json', {
        entities: [
          { id: 'e1', text: 'pneumonia', type: 'CONDITION', source_document_id: 'd1' },
          { id: 'e2', text: 'amoxicillin', type: 'MEDICATION', confidence: 0.8 },
        ],
        relationships: [{ source_entity_id: 'e2', target_entity_id: 'e1', relation_type: 'treats' }],
      });

      const counts = await importGraphFile(path);

      expect(counts).toEqual({ entities: 2, relationships: 1 });
      expect(hasGraphTables()).toBe(true);
      expect(getEntity('e1')).toEqual({
        id: 'e1',
        text: 'pneumonia',
        type: 'CONDITION',
        confidence: 1,
        sourceDocumentId: 'd1',
      });
      expect(getRelationshipsFor(['e1'])).toEqual([
        { id: 1, sourceEntityId: 'e2', targetEntityId: 'e1', relationType: 'treats', confidence: null },
      ]);
    });

    it('rejects an unknown entity type', async () => {
      const path = writeJson('graph.json', { entities: [{ id: 'e1', text: 'x', type: 'GENE' }] });

      await expect(importGraphFile(path)).rejects.toMatchObject({ code: 'RESOURCE_INVALID' });
      expect(hasGraphTables()).toBe(false);
    });

    it('rejects a file that is not JSON', async () => {
      const path = join(dir, 'graph.json');
      writeFileSync(path, 'entities: []');

      await expect(importGraphFile(path)).rejects.toThrow(`${path} is not valid JSON`);
    });
  });

  describe('importImageFile', () => {
    it('loads image records tagged with the embedding model', async () => {
      const path = writeJson('images.json', [
        { id: 'i1', subject_id: 's1', view_position: 'PA', embedding: [1, 0, 0] },
        { id: 'i2', subject_id: 's2' },
      ]);

      const counts = await importImageFile(path, 'fake-image');

      expect(counts).toEqual({ images: 2 });
      expect(getImagesByIds(['i1', 'i2']).map((i) => [i.id, i.viewPosition])).toEqual([
        ['i1', 'PA'],
        ['i2', null],
      ]);
      const row = db.prepare('SELECT embedding_model FROM images WHERE id = ?').get('i1') as {
        embedding_model: string | null;
      };
      expect(row.embedding_model).toBe('fake-image');
    });
  });
});
