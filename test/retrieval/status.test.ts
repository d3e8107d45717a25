/**
 * Tests for store statistics and health reporting.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3-multiple-ciphers';
import { checkHealth, collectStats } from '../../src/retrieval/status.js';
import { setDb } from '../../src/storage/db.js';
import { createTestDb, entity, seedDocuments, seedGraph, seedImages, setupTestDb, teardownTestDb } from '../storage/test-utils.js';
import { makeServices } from './test-services.js';

const ENV = { NVIDIA_API_KEY: 'test-secret' };

describe('status', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    setupTestDb(db);
    seedDocuments([
      { id: 'd1', text: 'one', patientId: 'p1', embedding: [1, 0, 0], embeddingModel: 'fake-text' },
      { id: 'd2', text: 'two', patientId: 'p1' },
      { id: 'd3', text: 'three', patientId: 'p2' },
    ]);
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  describe('collectStats', () => {
    it('reports absent graph and images as null', () => {
      const stats = collectStats();

      expect(stats.documents).toBe(3);
      expect(stats.patients).toBe(2);
      expect(stats.documentVectors).toEqual({ total: 3, degenerate: 0, missing: 2 });
      expect(stats.graph).toBeNull();
      expect(stats.images).toBeNull();
      expect(stats.memories.total).toBe(0);
    });

    it('includes graph and image counts once built', () => {
      seedGraph([entity('e1', 'cough')]);
      seedImages([{ id: 'i1', subjectId: 's1', embedding: [0, 0, 0], embeddingModel: 'fake-image' }]);

      const stats = collectStats();

      expect(stats.graph?.totalEntities).toBe(1);
      expect(stats.images).toEqual({ count: 1, vectors: { total: 1, degenerate: 1, missing: 0 } });
    });
  });

  describe('checkHealth', () => {
    it('is degraded while optional stores are missing', () => {
      const report = checkHealth(makeServices(), ENV);

      expect(report).toEqual({
        status: 'degraded',
        checks: {
          database: true,
          knowledgeGraph: false,
          imageStore: false,
          textEmbedding: true,
          imageEmbedding: true,
        },
      });
    });

    it('is healthy when everything is provisioned', () => {
      seedGraph([entity('e1', 'cough')]);
      seedImages([]);

      expect(checkHealth(makeServices(), ENV).status).toBe('healthy');
    });

    it('reports embeddings as down without an API key', () => {
      const report = checkHealth(makeServices(), {});

      expect(report.checks.textEmbedding).toBe(false);
      expect(report.checks.imageEmbedding).toBe(false);
    });

    it('is unhealthy when the database cannot be queried', () => {
      const closed = new Database(':memory:');
      closed.close();
      setDb(closed);

      const report = checkHealth(makeServices(), ENV);

      setDb(db);
      expect(report.status).toBe('unhealthy');
      expect(report.checks.database).toBe(false);
      expect(report.error).toBeDefined();
    });
  });
});
