/**
 * Knowledge graph search: seed lookup, bounded multi-hop traversal, and
 * read-only statistics.
 *
 * Traversal is iterative and layer by layer. A node enters the visited set
 * the moment it is chosen for the next layer, so cycles (self-loops
 * included) can never re-enqueue it, and every entity is scored exactly
 * once, at the hop count where it was first reached.
 *
 * Path confidence multiplies the seed's confidence by, per hop, the edge
 * confidence (1 when absent) and the reached entity's confidence. Among
 * same-layer candidates for one entity the higher path confidence wins,
 * then the lexically smaller predecessor id. The final score discounts path
 * confidence by `hopDecay^hops`.
 */

import {
  findEntitiesByTerm,
  getEntitiesByIds,
  getEntity,
  getGraphStatistics,
  getRelationshipsAmong,
  getRelationshipsFor,
  hasGraphTables,
  type GraphStatistics,
} from '../storage/graph-store.js';
import { getPatientIdsForDocuments } from '../storage/document-store.js';
import type { Entity, Relationship } from '../storage/types.js';
import type { ReconciliationKey, TraversalDirection } from '../config/engine-config.js';
import { callStore } from '../storage/store-call.js';
import { CapabilityUnavailableError, InvalidInputError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { RetrievalServices } from './services.js';
import { checkIntRange, requireText } from './validation.js';

const log = createLogger('graph-search');

export const DEFAULT_GRAPH_LIMIT = 20;
export const MAX_GRAPH_LIMIT = 100;

/**
 * The reads traversal needs. The default reads the store; tests may pass
 * an in-memory graph.
 */
export interface GraphSource {
  entitiesByIds(ids: string[]): Map<string, Entity>;
  /** Every edge with an endpoint in `ids` */
  relationshipsFor(ids: string[]): Relationship[];
}

export const storeGraphSource: GraphSource = {
  entitiesByIds: getEntitiesByIds,
  relationshipsFor: getRelationshipsFor,
};

/** One hop of a path, from the previous entity to `entityId`. */
export interface PathStep {
  entityId: string;
  entityText: string;
  /** Absent on the seed */
  via?: {
    relationType: string;
    /** outgoing: previous → this; incoming: this → previous */
    direction: 'outgoing' | 'incoming';
    edgeConfidence: number | null;
  };
}

export interface ReachedEntity {
  entity: Entity;
  hops: number;
  pathConfidence: number;
  seedId: string;
  /** Seed first, this entity last */
  path: PathStep[];
}

interface Reach {
  entity: Entity;
  hops: number;
  pathConfidence: number;
  predecessor: string | null;
  via: PathStep['via'];
  seedId: string;
}

interface Candidate {
  from: string;
  to: string;
  edge: Relationship;
  direction: 'outgoing' | 'incoming';
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface TraverseOptions {
  direction?: TraversalDirection;
}

/**
 * Breadth-first expansion from `seeds` up to `maxHops` edges away.
 *
 * Returns every reached entity (seeds at hop 0) with its best path.
 */
export function traverseGraph(
  seeds: Entity[],
  maxHops: number,
  source: GraphSource,
  options: TraverseOptions = {},
): ReachedEntity[] {
  const direction = options.direction ?? 'both';
  const best = new Map<string, Reach>();
  const visited = new Set<string>();

  for (const seed of seeds) {
    if (visited.has(seed.id)) continue;
    visited.add(seed.id);
    best.set(seed.id, {
      entity: seed,
      hops: 0,
      pathConfidence: seed.confidence,
      predecessor: null,
      via: undefined,
      seedId: seed.id,
    });
  }

  let frontier = [...visited].sort(compareIds);

  for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
    const frontierSet = new Set(frontier);
    const candidates: Candidate[] = [];

    for (const edge of source.relationshipsFor(frontier)) {
      if (frontierSet.has(edge.sourceEntityId) && !visited.has(edge.targetEntityId)) {
        candidates.push({
          from: edge.sourceEntityId,
          to: edge.targetEntityId,
          edge,
          direction: 'outgoing',
        });
      }
      if (
        direction === 'both' &&
        frontierSet.has(edge.targetEntityId) &&
        !visited.has(edge.sourceEntityId)
      ) {
        candidates.push({
          from: edge.targetEntityId,
          to: edge.sourceEntityId,
          edge,
          direction: 'incoming',
        });
      }
    }

    if (candidates.length === 0) break;

    const targets = source.entitiesByIds([...new Set(candidates.map((c) => c.to))]);
    const layer = new Map<string, Reach>();

    for (const c of candidates) {
      const target = targets.get(c.to);
      const from = best.get(c.from);
      if (!target || !from) continue;

      const pathConfidence = from.pathConfidence * (c.edge.confidence ?? 1) * target.confidence;
      const current = layer.get(c.to);
      const better =
        !current ||
        pathConfidence > current.pathConfidence ||
        (pathConfidence === current.pathConfidence &&
          current.predecessor !== null &&
          compareIds(c.from, current.predecessor) < 0);

      if (better) {
        layer.set(c.to, {
          entity: target,
          hops: hop,
          pathConfidence,
          predecessor: c.from,
          via: {
            relationType: c.edge.relationType,
            direction: c.direction,
            edgeConfidence: c.edge.confidence,
          },
          seedId: from.seedId,
        });
      }
    }

    // Mark before the next layer is expanded
    for (const [id, reach] of layer) {
      visited.add(id);
      best.set(id, reach);
    }
    frontier = [...layer.keys()].sort(compareIds);
  }

  return [...best.values()].map((reach) => ({
    entity: reach.entity,
    hops: reach.hops,
    pathConfidence: reach.pathConfidence,
    seedId: reach.seedId,
    path: buildPath(reach, best),
  }));
}

function buildPath(reach: Reach, best: Map<string, Reach>): PathStep[] {
  const steps: PathStep[] = [];
  let current: Reach | undefined = reach;
  while (current) {
    const step: PathStep = { entityId: current.entity.id, entityText: current.entity.text };
    if (current.via) step.via = current.via;
    steps.push(step);
    current = current.predecessor === null ? undefined : best.get(current.predecessor);
  }
  return steps.reverse();
}

export interface ScoredEntity extends ReachedEntity {
  score: number;
  rank: number;
}

/**
 * Score reached entities and order them: score desc, hops asc, id asc.
 */
export function rankReached(reached: ReachedEntity[], hopDecay: number): ScoredEntity[] {
  return reached
    .map((r) => ({ ...r, score: r.pathConfidence * Math.pow(hopDecay, r.hops), rank: 0 }))
    .sort(
      (a, b) => b.score - a.score || a.hops - b.hops || compareIds(a.entity.id, b.entity.id),
    )
    .map((r, i) => ({ ...r, rank: i + 1 }));
}

/**
 * Entities grouped under the key used for cross-source fusion.
 */
export interface LinkedDocument {
  /** Document id, or patient id when reconciling by patient */
  key: string;
  /** Rank of the best entity pointing here (1-based) */
  bestRank: number;
  bestScore: number;
  entityIds: string[];
}

/**
 * Group ranked entities by their source document (or that document's
 * patient), ordered by each group's best entity.
 */
export function groupByReconciliationKey(
  ranked: ScoredEntity[],
  key: ReconciliationKey,
  patientOf: (documentIds: string[]) => Map<string, string | null>,
): LinkedDocument[] {
  const documentIds = [
    ...new Set(ranked.flatMap((r) => (r.entity.sourceDocumentId ? [r.entity.sourceDocumentId] : []))),
  ];
  const patients = key === 'patient' ? patientOf(documentIds) : new Map<string, string | null>();

  const groups = new Map<string, LinkedDocument>();
  for (const r of ranked) {
    const documentId = r.entity.sourceDocumentId;
    if (!documentId) continue;
    const groupKey = key === 'patient' ? (patients.get(documentId) ?? null) : documentId;
    if (!groupKey) continue;

    const existing = groups.get(groupKey);
    if (existing) {
      existing.entityIds.push(r.entity.id);
    } else {
      groups.set(groupKey, {
        key: groupKey,
        bestRank: r.rank,
        bestScore: r.score,
        entityIds: [r.entity.id],
      });
    }
  }
  return [...groups.values()];
}

export interface GraphSearchRequest {
  seedTerm?: string;
  seedEntityId?: string;
  maxHops?: number;
  limit?: number;
}

export interface GraphSearchResult {
  entities: ScoredEntity[];
  seedIds: string[];
  linkedDocuments: LinkedDocument[];
  reconciliationKey: ReconciliationKey;
  /** Entities reached before `limit` was applied */
  reachedCount: number;
  maxHops: number;
}

function validateGraphSearch(
  request: GraphSearchRequest,
  services: RetrievalServices,
): { seed: { term: string } | { entityId: string }; maxHops: number; limit: number } {
  const { graph } = services.config;
  const hasTerm = request.seedTerm !== undefined && request.seedTerm.trim() !== '';
  const hasId = request.seedEntityId !== undefined && request.seedEntityId.trim() !== '';
  if (hasTerm === hasId) {
    throw new InvalidInputError('Provide exactly one of query or entity_id', 'query');
  }
  const maxHops = checkIntRange(request.maxHops ?? graph.defaultHops, 0, graph.maxHops, 'max_hops');
  const limit = checkIntRange(request.limit ?? DEFAULT_GRAPH_LIMIT, 1, MAX_GRAPH_LIMIT, 'limit');
  const seed = hasTerm
    ? { term: requireText(request.seedTerm, 'query') }
    : { entityId: requireText(request.seedEntityId, 'entity_id') };
  return { seed, maxHops, limit };
}

function assertGraphAvailable(): void {
  if (!hasGraphTables()) {
    throw new CapabilityUnavailableError(
      'knowledge_graph',
      'Knowledge graph has not been built (entities/entity_relationships tables missing)',
    );
  }
}

/**
 * Search the knowledge graph from a term or an entity id.
 */
export async function searchKnowledgeGraph(
  services: RetrievalServices,
  request: GraphSearchRequest,
): Promise<GraphSearchResult> {
  const { seed, maxHops, limit } = validateGraphSearch(request, services);
  const { graph, fusion } = services.config;

  return callStore('knowledge graph search', 'GRAPH_QUERY_FAILED', () => {
    assertGraphAvailable();

    let seeds: Entity[];
    if ('term' in seed) {
      seeds = findEntitiesByTerm(seed.term, graph.maxSeedEntities);
    } else {
      const entity = getEntity(seed.entityId);
      seeds = entity ? [entity] : [];
    }

    const empty: GraphSearchResult = {
      entities: [],
      seedIds: [],
      linkedDocuments: [],
      reconciliationKey: fusion.reconciliationKey,
      reachedCount: 0,
      maxHops,
    };
    if (seeds.length === 0) return empty;

    const reached = traverseGraph(seeds, maxHops, storeGraphSource, { direction: graph.direction });
    const ranked = rankReached(reached, graph.hopDecay).slice(0, limit);

    log.debug('Traversal complete', { seeds: seeds.length, reached: reached.length, maxHops });

    return {
      entities: ranked,
      seedIds: seeds.map((s) => s.id),
      linkedDocuments: groupByReconciliationKey(
        ranked,
        fusion.reconciliationKey,
        getPatientIdsForDocuments,
      ),
      reconciliationKey: fusion.reconciliationKey,
      reachedCount: reached.length,
      maxHops,
    };
  });
}

export interface EntityRelationshipsResult {
  found: boolean;
  entity: Entity | null;
  /** Reached entities other than the queried one, ranked */
  connected: ScoredEntity[];
  /** Edges among the queried entity and everything reached */
  relationships: Relationship[];
  maxHops: number;
}

/**
 * Entities connected to `entityId` within `maxHops`, plus the edges between
 * them. An unknown id is a normal, empty answer.
 */
export async function getEntityRelationships(
  services: RetrievalServices,
  entityId: string,
  maxHops: number = 1,
): Promise<EntityRelationshipsResult> {
  const id = requireText(entityId, 'entity_id');
  const { graph } = services.config;
  const hops = checkIntRange(maxHops, 1, graph.maxHops, 'max_hops');

  return callStore('entity relationships', 'GRAPH_QUERY_FAILED', () => {
    assertGraphAvailable();

    const entity = getEntity(id);
    if (!entity) {
      return { found: false, entity: null, connected: [], relationships: [], maxHops: hops };
    }

    const reached = traverseGraph([entity], hops, storeGraphSource, { direction: graph.direction });
    const ranked = rankReached(reached, graph.hopDecay)
      .filter((r) => r.entity.id !== id)
      .map((r, i) => ({ ...r, rank: i + 1 }));
    const relationships = getRelationshipsAmong(reached.map((r) => r.entity.id));

    return { found: true, entity, connected: ranked, relationships, maxHops: hops };
  });
}

/**
 * Counts per entity type and confidence bucket.
 */
export async function getEntityStatistics(): Promise<GraphStatistics> {
  return callStore('entity statistics', 'GRAPH_QUERY_FAILED', () => {
    assertGraphAvailable();
    return getGraphStatistics();
  });
}
