/**
 * Tests for knowledge graph traversal and search.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import {
  getEntityRelationships,
  getEntityStatistics,
  rankReached,
  searchKnowledgeGraph,
  traverseGraph,
  type GraphSource,
} from '../../src/retrieval/graph-search.js';
import type { Entity, Relationship } from '../../src/storage/types.js';
import { CapabilityUnavailableError, InvalidInputError } from '../../src/utils/errors.js';
import { createTestDb, edge, entity, seedDocuments, seedGraph, setupTestDb, teardownTestDb } from '../storage/test-utils.js';
import { makeConfig, makeServices } from './test-services.js';
import { DEFAULT_CONFIG } from '../../src/config/engine-config.js';

/** In-memory graph for traversal tests. */
function memoryGraph(entities: Entity[], edges: Array<Omit<Relationship, 'id'>>): GraphSource {
  const byId = new Map(entities.map((e) => [e.id, e]));
  const rels: Relationship[] = edges.map((e, i) => ({ ...e, id: i + 1 }));
  return {
    entitiesByIds: (ids) => new Map(ids.flatMap((id) => {
      const e = byId.get(id);
      return e ? [[id, e] as const] : [];
    })),
    relationshipsFor: (ids) =>
      rels.filter((r) => ids.includes(r.sourceEntityId) || ids.includes(r.targetEntityId)),
  };
}

function rel(source: string, target: string, confidence: number | null = null): Omit<Relationship, 'id'> {
  return { sourceEntityId: source, targetEntityId: target, relationType: 'related_to', confidence };
}

describe('traverseGraph', () => {
  it('visits a self-looping seed once', () => {
    const a = entity('A', 'chest pain');
    const reached = traverseGraph([a], 3, memoryGraph([a], [rel('A', 'A')]));

    expect(reached).toHaveLength(1);
    expect(reached[0].hops).toBe(0);
  });

  it('terminates on a cycle and reports each entity once', () => {
    const entities = [entity('A', 'a'), entity('B', 'b'), entity('C', 'c')];
    const graph = memoryGraph(entities, [rel('A', 'B'), rel('B', 'C'), rel('C', 'A')]);

    const reached = traverseGraph([entities[0]], 3, graph);
    const hops = Object.fromEntries(reached.map((r) => [r.entity.id, r.hops]));

    expect(hops).toEqual({ A: 0, B: 1, C: 1 });
  });

  it('follows only outgoing edges when asked', () => {
    const entities = [entity('A', 'a'), entity('B', 'b'), entity('C', 'c')];
    const graph = memoryGraph(entities, [rel('A', 'B'), rel('B', 'C'), rel('C', 'A')]);

    const reached = traverseGraph([entities[0]], 3, graph, { direction: 'outgoing' });
    const hops = Object.fromEntries(reached.map((r) => [r.entity.id, r.hops]));

    expect(hops).toEqual({ A: 0, B: 1, C: 2 });
  });

  it('keeps the higher-confidence path into an entity', () => {
    const entities = [entity('S', 's'), entity('X', 'x'), entity('Y', 'y'), entity('T', 't')];
    const graph = memoryGraph(entities, [
      rel('S', 'X', 0.9),
      rel('S', 'Y', 0.5),
      rel('X', 'T', 0.5),
      rel('Y', 'T', 1.0),
    ]);

    const t = traverseGraph([entities[0]], 2, graph).find((r) => r.entity.id === 'T');

    expect(t?.hops).toBe(2);
    expect(t?.pathConfidence).toBe(0.5);
    expect(t?.path.map((p) => p.entityId)).toEqual(['S', 'Y', 'T']);
    expect(t?.path[2].via).toEqual({ relationType: 'related_to', direction: 'outgoing', edgeConfidence: 1 });
  });

  it('breaks equal-confidence paths by the smaller predecessor id', () => {
    const entities = [entity('S', 's'), entity('A', 'a'), entity('B', 'b'), entity('T', 't')];
    const graph = memoryGraph(entities, [rel('S', 'B'), rel('S', 'A'), rel('B', 'T'), rel('A', 'T')]);

    const t = traverseGraph([entities[0]], 2, graph).find((r) => r.entity.id === 'T');

    expect(t?.path.map((p) => p.entityId)).toEqual(['S', 'A', 'T']);
  });

  it('returns only the seeds at zero hops', () => {
    const entities = [entity('A', 'a'), entity('B', 'b')];
    const reached = traverseGraph([entities[0]], 0, memoryGraph(entities, [rel('A', 'B')]));

    expect(reached.map((r) => r.entity.id)).toEqual(['A']);
  });

  it('multiplies entity confidence into the path', () => {
    const entities = [entity('A', 'a', { confidence: 0.8 }), entity('B', 'b', { confidence: 0.5 })];
    const b = traverseGraph([entities[0]], 1, memoryGraph(entities, [rel('A', 'B', 0.5)])).find(
      (r) => r.entity.id === 'B',
    );

    expect(b?.pathConfidence).toBeCloseTo(0.8 * 0.5 * 0.5, 12);
    expect(b?.seedId).toBe('A');
  });
});

describe('rankReached', () => {
  it('discounts by hop and orders by score, hops, then id', () => {
    const entities = [entity('S', 's'), entity('X', 'x'), entity('Y', 'y')];
    const reached = traverseGraph([entities[0]], 1, memoryGraph(entities, [rel('S', 'Y'), rel('S', 'X')]));

    const ranked = rankReached(reached, 0.5);

    expect(ranked.map((r) => [r.entity.id, r.score, r.rank])).toEqual([
      ['S', 1, 1],
      ['X', 0.5, 2],
      ['Y', 0.5, 3],
    ]);
  });
});

describe('graph search against the store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    setupTestDb(db);
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  it('reports the graph capability as unavailable when no graph was built', async () => {
    const error = await searchKnowledgeGraph(makeServices(), { seedTerm: 'pain' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CapabilityUnavailableError);
    expect(error).toMatchObject({ capability: 'knowledge_graph' });
  });

  it('rejects bad arguments before touching the store', async () => {
    const services = makeServices();

    await expect(searchKnowledgeGraph(services, { seedTerm: 'pain', maxHops: 4 })).rejects.toThrow(
      InvalidInputError,
    );
    await expect(searchKnowledgeGraph(services, { seedTerm: 'pain', seedEntityId: 'e1' })).rejects.toThrow(
      InvalidInputError,
    );
    await expect(searchKnowledgeGraph(services, {})).rejects.toThrow(InvalidInputError);
  });

  it('returns an empty result when no entity matches', async () => {
    seedGraph([entity('e1', 'pneumonia')]);

    const result = await searchKnowledgeGraph(makeServices(), { seedTerm: 'fracture' });

    expect(result.entities).toEqual([]);
    expect(result.reachedCount).toBe(0);
  });

  it('expands from term seeds and groups entities by source document', async () => {
    seedGraph(
      [
        entity('e1', 'chest pain', { type: 'SYMPTOM', sourceDocumentId: 'doc-1' }),
        entity('e2', 'myocardial infarction', { sourceDocumentId: 'doc-2' }),
        entity('e3', 'aspirin', { type: 'MEDICATION', sourceDocumentId: 'doc-2' }),
      ],
      [edge('e1', 'e2', 'indicates', 0.8), edge('e3', 'e2', 'treats', 0.9)],
    );

    const result = await searchKnowledgeGraph(makeServices(), { seedTerm: 'chest pain', maxHops: 2 });

    expect(result.seedIds).toEqual(['e1']);
    expect(result.entities.map((e) => [e.entity.id, e.hops])).toEqual([
      ['e1', 0],
      ['e2', 1],
      ['e3', 2],
    ]);
    expect(result.entities[1].score).toBeCloseTo(0.8 * 0.5, 12);
    expect(result.entities[2].score).toBeCloseTo(0.8 * 0.9 * 0.25, 12);
    expect(result.linkedDocuments).toEqual([
      { key: 'doc-1', bestRank: 1, bestScore: 1, entityIds: ['e1'] },
      { key: 'doc-2', bestRank: 2, bestScore: result.entities[1].score, entityIds: ['e2', 'e3'] },
    ]);
    expect(result.reconciliationKey).toBe('document');
  });

  it('groups by patient when reconciling by patient', async () => {
    seedDocuments([
      { id: 'doc-1', text: 'note one', patientId: 'p1' },
      { id: 'doc-2', text: 'note two', patientId: 'p1' },
    ]);
    seedGraph([
      entity('e1', 'cough', { sourceDocumentId: 'doc-1' }),
      entity('e2', 'cough syrup', { sourceDocumentId: 'doc-2', confidence: 0.5 }),
    ]);
    const services = makeServices({
      config: makeConfig({ fusion: { ...DEFAULT_CONFIG.fusion, reconciliationKey: 'patient' } }),
    });

    const result = await searchKnowledgeGraph(services, { seedTerm: 'cough', maxHops: 0 });

    expect(result.linkedDocuments).toEqual([{ key: 'p1', bestRank: 1, bestScore: 1, entityIds: ['e1', 'e2'] }]);
  });

  it('truncates to limit but reports everything reached', async () => {
    seedGraph(
      [entity('a', 'alpha'), entity('b', 'beta'), entity('c', 'gamma')],
      [edge('a', 'b'), edge('a', 'c')],
    );

    const result = await searchKnowledgeGraph(makeServices(), { seedEntityId: 'a', maxHops: 1, limit: 2 });

    expect(result.entities.map((e) => e.entity.id)).toEqual(['a', 'b']);
    expect(result.reachedCount).toBe(3);
  });

  it('answers an unknown entity id with an empty result', async () => {
    seedGraph([entity('a', 'alpha')]);

    const relationships = await getEntityRelationships(makeServices(), 'missing');

    expect(relationships).toEqual({ found: false, entity: null, connected: [], relationships: [], maxHops: 1 });
  });

  it('lists connected entities and the edges among them', async () => {
    seedGraph(
      [entity('a', 'alpha'), entity('b', 'beta'), entity('c', 'gamma')],
      [edge('a', 'b', 'causes'), edge('b', 'c', 'causes'), edge('a', 'a', 'self')],
    );

    const result = await getEntityRelationships(makeServices(), 'a', 1);

    expect(result.found).toBe(true);
    expect(result.connected.map((c) => [c.entity.id, c.rank])).toEqual([['b', 1]]);
    expect(result.relationships.map((r) => [r.sourceEntityId, r.targetEntityId])).toEqual([
      ['a', 'b'],
      ['a', 'a'],
    ]);
  });

  it('computes statistics without traversal', async () => {
    seedGraph(
      [entity('a', 'alpha', { type: 'SYMPTOM', confidence: 0.3 }), entity('b', 'beta', { confidence: 1 })],
      [edge('a', 'b', 'causes')],
    );

    const stats = await getEntityStatistics();

    expect(stats.totalEntities).toBe(2);
    expect(stats.totalRelationships).toBe(1);
    expect(stats.byType.SYMPTOM).toBe(1);
    expect(stats.byType.CONDITION).toBe(1);
    expect(stats.confidenceBuckets.map((b) => b.count)).toEqual([0, 1, 0, 1]);
    expect(stats.relationTypes).toEqual({ causes: 1 });
  });
});
