/**
 * Store statistics and health, shared by the `health` RPC and the CLI.
 */

import { getDb } from '../storage/db.js';
import { getDocumentCount, getPatientCount } from '../storage/document-store.js';
import { hasGraphTables, getGraphStatistics, type GraphStatistics } from '../storage/graph-store.js';
import { getImageCount, hasImageTables } from '../storage/image-store.js';
import { getMemoryCounts, type MemoryCounts } from '../storage/memory-store.js';
import { DOCUMENT_VECTORS, IMAGE_VECTORS, VectorStore, type VectorStats } from '../storage/vector-store.js';
import { errorMessage } from '../utils/errors.js';
import type { RetrievalServices } from './services.js';

export interface EngineStats {
  documents: number;
  patients: number;
  documentVectors: VectorStats;
  /** Null when no graph has been built */
  graph: GraphStatistics | null;
  /** Null when no image store exists */
  images: { count: number; vectors: VectorStats } | null;
  memories: MemoryCounts;
}

export function collectStats(): EngineStats {
  const graph = hasGraphTables() ? getGraphStatistics() : null;
  const images = hasImageTables()
    ? { count: getImageCount(), vectors: new VectorStore(IMAGE_VECTORS).stats() }
    : null;
  return {
    documents: getDocumentCount(),
    patients: getPatientCount(),
    documentVectors: new VectorStore(DOCUMENT_VECTORS).stats(),
    graph,
    images,
    memories: getMemoryCounts(),
  };
}

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthReport {
  status: HealthState;
  checks: {
    database: boolean;
    knowledgeGraph: boolean;
    imageStore: boolean;
    textEmbedding: boolean;
    imageEmbedding: boolean;
  };
  error?: string;
}

/**
 * Database reachability and which optional capabilities are provisioned.
 * Embedding checks only report whether a provider and its API key exist;
 * no request is sent.
 */
export function checkHealth(
  services: RetrievalServices,
  env: Record<string, string | undefined> = process.env,
): HealthReport {
  const keyPresent = Boolean(env[services.config.embedding.apiKeyEnv]);
  const checks = {
    database: false,
    knowledgeGraph: false,
    imageStore: false,
    textEmbedding: services.textEmbedder !== null && keyPresent,
    imageEmbedding: services.imageEmbedder !== null && keyPresent,
  };

  try {
    getDb().prepare('SELECT 1').get();
    checks.database = true;
    checks.knowledgeGraph = hasGraphTables();
    checks.imageStore = hasImageTables();
  } catch (error) {
    return { status: 'unhealthy', checks, error: errorMessage(error) };
  }

  const allUp = Object.values(checks).every(Boolean);
  return { status: allUp ? 'healthy' : 'degraded', checks };
}
