/**
 * Agent memory: remember, recall, forget.
 *
 * A memory is embedded when written. Recall ranks by cosine similarity and
 * never fails the caller: with no embedding provider it reports an empty,
 * degraded result instead.
 */

import { MEMORY_VECTORS, VectorStore } from '../storage/vector-store.js';
import {
  deleteMemory,
  getMemoriesByIds,
  getMemory,
  getMemoryCounts,
  insertMemory,
  markMemoriesUsed,
  updateMemoryContent,
  type MemoryCounts,
} from '../storage/memory-store.js';
import type { MemoryKind, MemoryRecord } from '../storage/types.js';
import { callStore } from '../storage/store-call.js';
import { CapabilityUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { RetrievalServices } from './services.js';
import { checkIntRange, checkNumberRange, requireText } from './validation.js';

const log = createLogger('memory');

export const DEFAULT_RECALL_LIMIT = 5;
export const MAX_RECALL_LIMIT = 50;
export const MAX_MEMORY_LENGTH = 4000;

function requireEmbedder(services: RetrievalServices) {
  const embedder = services.textEmbedder;
  if (!embedder) {
    throw new CapabilityUnavailableError('embedding', 'No text embedding provider configured');
  }
  return embedder;
}

function checkContent(content: string): string {
  const text = requireText(content, 'content');
  checkIntRange(text.length, 1, MAX_MEMORY_LENGTH, 'content length');
  return text;
}

/**
 * Embed and store a memory. Returns the new id.
 */
export async function remember(
  services: RetrievalServices,
  content: string,
  kind: MemoryKind,
  metadata?: Record<string, unknown>,
  now: Date = new Date(),
): Promise<string> {
  const text = checkContent(content);
  const embedder = requireEmbedder(services);
  const embedding = await embedder.embed(text, 'passage');

  const id = await callStore('memory insert', 'MEMORY_WRITE_FAILED', () =>
    insertMemory({ content: text, kind, embedding, embeddingModel: embedder.modelId, metadata }, now),
  );
  log.info('Memory stored', { id, kind });
  return id;
}

export interface RecallOptions {
  limit?: number;
  kind?: MemoryKind;
  minSimilarity?: number;
}

export interface RecalledMemory extends MemoryRecord {
  similarity: number;
}

export interface RecallResult {
  memories: RecalledMemory[];
  degraded: boolean;
  reason?: string;
}

export async function recall(
  services: RetrievalServices,
  query: string,
  options: RecallOptions = {},
  now: Date = new Date(),
): Promise<RecallResult> {
  const text = requireText(query, 'query');
  const limit = checkIntRange(options.limit ?? DEFAULT_RECALL_LIMIT, 1, MAX_RECALL_LIMIT, 'limit');
  const minSimilarity = checkNumberRange(
    options.minSimilarity ?? services.config.memory.recallMinSimilarity,
    -1,
    1,
    'min_similarity',
  );

  const embedder = services.textEmbedder;
  if (!embedder) {
    return { memories: [], degraded: true, reason: 'no text embedding provider configured' };
  }

  let vector: number[];
  try {
    vector = await embedder.embed(text, 'query');
  } catch (error) {
    if (!(error instanceof CapabilityUnavailableError)) throw error;
    log.warn('Recall degraded', { error: error.message });
    return { memories: [], degraded: true, reason: error.message };
  }

  const store = new VectorStore(MEMORY_VECTORS);
  const memories = await callStore('memory recall', 'MEMORY_QUERY_FAILED', () => {
    const hits = store.search(vector, {
      limit,
      minSimilarity,
      filters: { kind: options.kind, embedding_model: embedder.modelId },
    });
    const records = getMemoriesByIds(hits.map((h) => h.id));
    markMemoriesUsed(
      hits.map((h) => h.id),
      now,
    );
    return hits.flatMap((hit): RecalledMemory[] => {
      const record = records.get(hit.id);
      if (!record) return [];
      return [
        {
          ...record,
          useCount: record.useCount + 1,
          lastUsedAt: now.toISOString(),
          similarity: hit.similarity,
        },
      ];
    });
  });

  return { memories, degraded: false };
}

export async function forget(memoryId: string): Promise<boolean> {
  const id = requireText(memoryId, 'memory_id');
  const deleted = await callStore('memory delete', 'MEMORY_WRITE_FAILED', () => deleteMemory(id));
  if (deleted) log.info('Memory deleted', { id });
  return deleted;
}

/**
 * Replace a memory's content and re-embed it. Returns null for an unknown id.
 */
export async function updateMemory(
  services: RetrievalServices,
  memoryId: string,
  content: string,
  now: Date = new Date(),
): Promise<MemoryRecord | null> {
  const id = requireText(memoryId, 'memory_id');
  const text = checkContent(content);
  const embedder = requireEmbedder(services);

  const existing = await callStore('memory fetch', 'MEMORY_QUERY_FAILED', () => getMemory(id));
  if (!existing) return null;

  const embedding = await embedder.embed(text, 'passage');
  return callStore('memory update', 'MEMORY_WRITE_FAILED', () => {
    updateMemoryContent(id, text, embedding, embedder.modelId, now);
    return getMemory(id);
  });
}

export async function getMemoryStats(): Promise<MemoryCounts> {
  return callStore('memory stats', 'MEMORY_QUERY_FAILED', () => getMemoryCounts());
}

const KIND_LABELS: Record<MemoryKind, string> = {
  correction: 'Correction',
  preference: 'Preference',
  fact: 'Fact',
};

/**
 * Render recalled memories as a context block for the model. Empty input
 * gives an empty string.
 */
export function formatMemoryContext(memories: RecalledMemory[]): string {
  if (memories.length === 0) return '';
  const lines = memories.map((m) => `- [${KIND_LABELS[m.kind]}] ${m.content}`);
  return ['Relevant memories from earlier sessions:', ...lines].join('\n');
}

/**
 * Recall for a new question, keeping only memories above the auto-recall
 * floor. Any failure yields an empty list.
 */
export async function autoRecall(
  services: RetrievalServices,
  question: string,
): Promise<RecalledMemory[]> {
  const { memory } = services.config;
  try {
    const result = await recall(services, question, {
      limit: memory.autoRecallLimit,
      minSimilarity: memory.autoRecallMinSimilarity,
    });
    return result.memories;
  } catch (error) {
    log.warn('Auto-recall failed', { error: errorMessage(error) });
    return [];
  }
}
