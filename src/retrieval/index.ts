/**
 * Retrieval exports.
 */

export { createRetrievalServices } from './services.js';
export type { RetrievalServices } from './services.js';

// Documents
export { searchDocuments, getDocumentDetails, validateDocumentSearch } from './document-search.js';
export type { DocumentSearchRequest, DocumentSearchResult, DocumentHit, DocumentSearchMode } from './document-search.js';

// Knowledge graph
export {
  searchKnowledgeGraph,
  getEntityRelationships,
  getEntityStatistics,
  traverseGraph,
  rankReached,
  groupByReconciliationKey,
  storeGraphSource,
} from './graph-search.js';
export type {
  GraphSearchRequest,
  GraphSearchResult,
  GraphSource,
  EntityRelationshipsResult,
  LinkedDocument,
  PathStep,
  ReachedEntity,
  ScoredEntity,
} from './graph-search.js';

// Images
export { searchImages, confidenceLevel } from './image-search.js';
export type { ImageSearchRequest, ImageSearchResult, ImageHit, ConfidenceLevel } from './image-search.js';

// Memory
export { remember, recall, forget, updateMemory, getMemoryStats, autoRecall, formatMemoryContext } from './memory.js';
export type { RecallOptions, RecallResult, RecalledMemory } from './memory.js';

// Fusion
export { fuseRankedLists, dedupeByKey, DEFAULT_K } from './rrf.js';
export type { RankedItem, RankedList, FusedResult, SourceContribution, FuseOptions } from './rrf.js';
export { hybridSearch } from './hybrid-search.js';
export type { HybridSearchRequest, HybridSearchResult, HybridHit, SourceProvenance } from './hybrid-search.js';

// Status
export { collectStats, checkHealth } from './status.js';
export type { EngineStats, HealthReport, HealthState } from './status.js';
