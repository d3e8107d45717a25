/**
 * Hybrid search: documents, knowledge graph and (optionally) images run
 * concurrently, are reconciled onto one key, and fused with RRF.
 *
 * A failing source never fails the search. Its outcome is recorded in
 * provenance and it contributes no list.
 */

import { getDocumentsByIds, getPatientIdsForDocuments, makePreview } from '../storage/document-store.js';
import type { StoredDocument } from '../storage/types.js';
import type { ReconciliationKey } from '../config/engine-config.js';
import { callStore } from '../storage/store-call.js';
import { CapabilityUnavailableError, StoreUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { searchDocuments, type DocumentSearchResult } from './document-search.js';
import { MAX_GRAPH_LIMIT, searchKnowledgeGraph, type GraphSearchResult } from './graph-search.js';
import { searchImages, type ImageSearchResult } from './image-search.js';
import { dedupeByKey, fuseRankedLists, type RankedList, type SourceContribution } from './rrf.js';
import type { RetrievalServices } from './services.js';
import { checkIntRange, checkNumberRange, requireText } from './validation.js';

const log = createLogger('hybrid-search');

export const DEFAULT_HYBRID_LIMIT = 10;
export const MAX_HYBRID_LIMIT = 50;

export type HybridSource = 'documents' | 'knowledge_graph' | 'images';
export type SourceStatus = 'ok' | 'capability_unavailable' | 'error';

export interface SourceProvenance {
  source: HybridSource;
  status: SourceStatus;
  /** Items this source put into fusion, after reconciliation */
  count: number;
  note?: string;
  code?: string;
}

export interface HybridSearchRequest {
  query: string;
  patientId?: string;
  includeImages?: boolean;
  limit?: number;
  k?: number;
}

export interface HybridHit {
  /** Document id or patient id, per reconciliationKey */
  key: string;
  rank: number;
  rrfScore: number;
  contributingSources: SourceContribution[];
  documentId: string | null;
  patientId: string | null;
  preview: string | null;
}

export interface HybridSearchResult {
  results: HybridHit[];
  reconciliationKey: ReconciliationKey;
  k: number;
  /** Per-source reconciled ranked lists, as fed to fusion */
  sourceLists: Record<HybridSource, string[]>;
  provenance: SourceProvenance[];
}

type Outcome<T> = { ok: true; value: T } | { ok: false; provenance: SourceProvenance };

function toOutcome<T>(source: HybridSource, settled: PromiseSettledResult<T>): Outcome<T> {
  if (settled.status === 'fulfilled') return { ok: true, value: settled.value };
  const error: unknown = settled.reason;
  if (error instanceof CapabilityUnavailableError) {
    return {
      ok: false,
      provenance: { source, status: 'capability_unavailable', count: 0, note: error.message, code: error.code },
    };
  }
  log.warn('Source failed', { source, error: errorMessage(error) });
  const provenance: SourceProvenance = { source, status: 'error', count: 0, note: errorMessage(error) };
  if (error instanceof StoreUnavailableError) provenance.code = 'STORE_UNAVAILABLE';
  return { ok: false, provenance };
}

function documentKeys(result: DocumentSearchResult, key: ReconciliationKey): string[] {
  const hits = dedupeByKey(result.documents, (d) => (key === 'patient' ? d.patientId : d.documentId));
  return hits.map((h) => h.key);
}

function graphKeys(
  result: GraphSearchResult,
  patientId: string | undefined,
  patientOf: Map<string, string | null>,
): string[] {
  const keys = result.linkedDocuments.map((l) => l.key);
  if (!patientId) return keys;
  if (result.reconciliationKey === 'patient') return keys.filter((k) => k === patientId);
  return keys.filter((k) => patientOf.get(k) === patientId);
}

function imageKeys(result: ImageSearchResult, key: ReconciliationKey): string[] {
  const hits = dedupeByKey(result.images, (image) =>
    key === 'patient' ? (image.patientId ?? image.subjectId) : image.documentId,
  );
  return hits.map((h) => h.key);
}

export async function hybridSearch(
  services: RetrievalServices,
  request: HybridSearchRequest,
): Promise<HybridSearchResult> {
  const query = requireText(request.query, 'query');
  const limit = checkIntRange(request.limit ?? DEFAULT_HYBRID_LIMIT, 1, MAX_HYBRID_LIMIT, 'limit');
  const k = checkNumberRange(request.k ?? services.config.fusion.rrfK, 0, Number.MAX_SAFE_INTEGER, 'k');
  const patientId = request.patientId?.trim() || undefined;
  const includeImages = request.includeImages ?? false;
  const key = services.config.fusion.reconciliationKey;

  const [docSettled, graphSettled, imageSettled] = await Promise.allSettled([
    searchDocuments(services, { query, patientId, limit }),
    searchKnowledgeGraph(services, {
      seedTerm: query,
      limit: Math.min(limit * services.config.fusion.candidateMultiplier, MAX_GRAPH_LIMIT),
    }),
    includeImages
      ? searchImages(services, { query, patientId, limit })
      : Promise.resolve(null),
  ]);

  const lists: RankedList[] = [];
  const provenance: SourceProvenance[] = [];
  const sourceLists: Record<HybridSource, string[]> = { documents: [], knowledge_graph: [], images: [] };

  const record = (source: HybridSource, keys: string[], note?: string): void => {
    sourceLists[source] = keys;
    lists.push({ source, items: keys.map((itemId) => ({ itemId })) });
    const entry: SourceProvenance = { source, status: 'ok', count: keys.length };
    if (note) entry.note = note;
    provenance.push(entry);
  };

  const docs = toOutcome('documents', docSettled);
  if (docs.ok) {
    record('documents', documentKeys(docs.value, key), docs.value.degradedReason);
  } else {
    provenance.push(docs.provenance);
  }

  const graph = toOutcome('knowledge_graph', graphSettled);
  if (graph.ok) {
    const linked = graph.value.linkedDocuments.map((l) => l.key);
    const patientOf =
      patientId && key === 'document'
        ? await callStore('document patients', 'DOCUMENT_QUERY_FAILED', () =>
            getPatientIdsForDocuments(linked),
          )
        : new Map<string, string | null>();
    record('knowledge_graph', graphKeys(graph.value, patientId, patientOf));
  } else {
    provenance.push(graph.provenance);
  }

  if (includeImages) {
    const images = toOutcome('images', imageSettled);
    if (!images.ok) {
      provenance.push(images.provenance);
    } else if (images.value) {
      record('images', imageKeys(images.value, key));
    }
  }

  const fused = fuseRankedLists(lists, { k }).slice(0, limit);
  const results = await describe(fused, key);

  log.debug('Hybrid search fused', {
    sources: provenance.map((p) => `${p.source}:${p.status}`).join(','),
    results: results.length,
  });

  return { results, reconciliationKey: key, k, sourceLists, provenance };
}

/**
 * Attach document/patient ids and a preview to fused keys.
 */
async function describe(
  fused: ReturnType<typeof fuseRankedLists>,
  key: ReconciliationKey,
): Promise<HybridHit[]> {
  const base = fused.map((f, i) => ({
    key: f.itemId,
    rank: i + 1,
    rrfScore: f.rrfScore,
    contributingSources: f.contributingSources,
  }));

  if (key === 'patient') {
    return base.map((b) => ({ ...b, documentId: null, patientId: b.key, preview: null }));
  }

  const docs = await callStore('document fetch', 'DOCUMENT_QUERY_FAILED', () =>
    getDocumentsByIds(base.map((b) => b.key)),
  );
  const byId = new Map<string, StoredDocument>(docs.map((d) => [d.id, d]));
  return base.map((b) => {
    const doc = byId.get(b.key);
    return {
      ...b,
      documentId: b.key,
      patientId: doc?.patientId ?? null,
      preview: doc ? makePreview(doc.text) : null,
    };
  });
}
