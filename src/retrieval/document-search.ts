/**
 * Document search over decoded clinical notes.
 *
 * Pipeline: validate → FTS5 candidates → embed query → cosine over the
 * candidates' stored vectors → RRF(lexical, vector) → top `limit`.
 *
 * When no query embedding can be had the lexical order is returned as is,
 * with `mode: 'lexical'` and the reason recorded.
 */

import { KeywordStore } from '../storage/keyword-store.js';
import { DOCUMENT_VECTORS, VectorStore } from '../storage/vector-store.js';
import { getDocument, getDocumentsByIds, makePreview } from '../storage/document-store.js';
import type { StoredDocument } from '../storage/types.js';
import { callStore } from '../storage/store-call.js';
import { CapabilityUnavailableError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { fuseRankedLists, type RankedList } from './rrf.js';
import type { RetrievalServices } from './services.js';
import { checkDateRange, checkIntRange, normalizeDate, requireText } from './validation.js';

const log = createLogger('document-search');

export const DEFAULT_DOCUMENT_LIMIT = 10;
export const MAX_DOCUMENT_LIMIT = 50;

export interface DocumentSearchRequest {
  query: string;
  patientId?: string;
  /** Inclusive, YYYY-MM-DD */
  dateFrom?: string;
  /** Inclusive, YYYY-MM-DD */
  dateTo?: string;
  limit?: number;
}

export interface DocumentHit {
  documentId: string;
  patientId: string | null;
  documentDate: string | null;
  /** RRF score in hybrid mode, BM25 score in lexical mode */
  score: number;
  lexicalRank: number;
  lexicalScore: number;
  vectorRank?: number;
  vectorSimilarity?: number;
  preview: string;
}

export type DocumentSearchMode = 'hybrid' | 'lexical';

export interface DocumentSearchResult {
  documents: DocumentHit[];
  mode: DocumentSearchMode;
  /** Why vector re-ranking was skipped */
  degradedReason?: string;
  candidateCount: number;
}

interface ValidRequest {
  query: string;
  patientId?: string;
  dateFrom?: string;
  dateTo?: string;
  limit: number;
}

export function validateDocumentSearch(request: DocumentSearchRequest): ValidRequest {
  const query = requireText(request.query, 'query');
  const limit = checkIntRange(request.limit ?? DEFAULT_DOCUMENT_LIMIT, 1, MAX_DOCUMENT_LIMIT, 'limit');
  const dateFrom = normalizeDate(request.dateFrom, 'date_from');
  const dateTo = normalizeDate(request.dateTo, 'date_to');
  checkDateRange(dateFrom, dateTo);
  const patientId = request.patientId?.trim() || undefined;
  return { query, patientId, dateFrom, dateTo, limit };
}

/**
 * Embed the query, or explain why not.
 */
async function tryEmbedQuery(
  services: RetrievalServices,
  query: string,
): Promise<{ vector: number[]; modelId: string } | { reason: string }> {
  const embedder = services.textEmbedder;
  if (!embedder) {
    return { reason: 'no text embedding provider configured' };
  }
  try {
    return { vector: await embedder.embed(query, 'query'), modelId: embedder.modelId };
  } catch (error) {
    if (error instanceof CapabilityUnavailableError) {
      log.warn('Query embedding unavailable, using lexical order', { error: error.message });
      return { reason: error.message };
    }
    throw error;
  }
}

export async function searchDocuments(
  services: RetrievalServices,
  request: DocumentSearchRequest,
): Promise<DocumentSearchResult> {
  const { query, patientId, dateFrom, dateTo, limit } = validateDocumentSearch(request);
  const { fusion } = services.config;
  const candidateLimit = limit * Math.max(1, fusion.candidateMultiplier);

  const keywordStore = new KeywordStore();
  const candidates = await callStore('document keyword search', 'DOCUMENT_QUERY_FAILED', () =>
    keywordStore.search(query, candidateLimit, { patientId, dateFrom, dateTo }),
  );

  const lexicalOnly = (reason: string | undefined): Promise<DocumentSearchResult> =>
    assemble(
      candidates.slice(0, limit).map((c, i) => ({
        id: c.id,
        score: c.score,
        lexicalRank: i + 1,
        lexicalScore: c.score,
      })),
      'lexical',
      reason,
      candidates.length,
    );

  if (candidates.length === 0) {
    return { documents: [], mode: 'lexical', candidateCount: 0 };
  }

  const embedded = await tryEmbedQuery(services, query);
  if ('reason' in embedded) {
    return lexicalOnly(embedded.reason);
  }

  const vectorStore = new VectorStore(DOCUMENT_VECTORS);
  const vectorHits = await callStore('document vector scoring', 'DOCUMENT_QUERY_FAILED', () =>
    vectorStore.search(embedded.vector, {
      limit: candidates.length,
      ids: candidates.map((c) => c.id),
      filters: { embedding_model: embedded.modelId },
    }),
  );

  if (vectorHits.length === 0) {
    return lexicalOnly('no stored embeddings for the matching documents');
  }

  const lists: RankedList[] = [
    {
      source: 'lexical',
      weight: fusion.lexicalWeight,
      items: candidates.map((c) => ({ itemId: c.id, rawScore: c.score })),
    },
    {
      source: 'vector',
      weight: fusion.vectorWeight,
      items: vectorHits.map((h) => ({ itemId: h.id, rawScore: h.similarity })),
    },
  ];
  const fused = fuseRankedLists(lists, { k: fusion.rrfK }).slice(0, limit);

  const lexicalById = new Map(candidates.map((c, i) => [c.id, { rank: i + 1, score: c.score }]));
  const vectorById = new Map(vectorHits.map((h, i) => [h.id, { rank: i + 1, similarity: h.similarity }]));

  return assemble(
    fused.flatMap((f) => {
      const lexical = lexicalById.get(f.itemId);
      if (!lexical) return [];
      const vector = vectorById.get(f.itemId);
      return [
        {
          id: f.itemId,
          score: f.rrfScore,
          lexicalRank: lexical.rank,
          lexicalScore: lexical.score,
          vectorRank: vector?.rank,
          vectorSimilarity: vector?.similarity,
        },
      ];
    }),
    'hybrid',
    undefined,
    candidates.length,
  );
}

interface Ranked {
  id: string;
  score: number;
  lexicalRank: number;
  lexicalScore: number;
  vectorRank?: number;
  vectorSimilarity?: number;
}

async function assemble(
  ranked: Ranked[],
  mode: DocumentSearchMode,
  degradedReason: string | undefined,
  candidateCount: number,
): Promise<DocumentSearchResult> {
  const docs = await callStore('document fetch', 'DOCUMENT_QUERY_FAILED', () =>
    getDocumentsByIds(ranked.map((r) => r.id)),
  );
  const byId = new Map<string, StoredDocument>(docs.map((d) => [d.id, d]));

  const documents: DocumentHit[] = ranked.flatMap((r) => {
    const doc = byId.get(r.id);
    if (!doc) return [];
    const hit: DocumentHit = {
      documentId: r.id,
      patientId: doc.patientId,
      documentDate: doc.documentDate,
      score: r.score,
      lexicalRank: r.lexicalRank,
      lexicalScore: r.lexicalScore,
      preview: makePreview(doc.text),
    };
    if (r.vectorRank !== undefined) hit.vectorRank = r.vectorRank;
    if (r.vectorSimilarity !== undefined) hit.vectorSimilarity = r.vectorSimilarity;
    return [hit];
  });

  const result: DocumentSearchResult = { documents, mode, candidateCount };
  if (degradedReason) result.degradedReason = degradedReason;
  return result;
}

/**
 * Full text and metadata of one document, or null when unknown.
 */
export async function getDocumentDetails(documentId: string): Promise<StoredDocument | null> {
  const id = requireText(documentId, 'document_id');
  return callStore('document fetch', 'DOCUMENT_QUERY_FAILED', () => getDocument(id));
}
