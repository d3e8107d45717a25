/**
 * Storage layer exports.
 */

// Database
export { getDb, setDb, resetDb, closeDb, openDatabase, tableExists, generateId } from './db.js';
export { runMigrations, getSchemaVersion, SCHEMA_VERSION } from './migrations.js';
export { callStore } from './store-call.js';
export type { StoreCallOptions } from './store-call.js';

// Types
export { ENTITY_TYPES, MEMORY_KINDS, isEntityType, isMemoryKind } from './types.js';
export type {
  StoredDocument,
  DocumentInput,
  EntityType,
  Entity,
  Relationship,
  RelationshipInput,
  ImageRecord,
  ImageInput,
  MemoryKind,
  MemoryRecord,
} from './types.js';

// Document store
export {
  insertDocument,
  insertDocuments,
  setDocumentEmbedding,
  getDocument,
  getDocumentsByIds,
  getDocumentsWithoutEmbedding,
  getDocumentCount,
  getPatientCount,
  getPatientIdsForDocuments,
  makePreview,
} from './document-store.js';

// Knowledge graph
export {
  GRAPH_TABLES,
  hasGraphTables,
  createGraphTables,
  insertEntity,
  insertRelationship,
  insertGraph,
  getEntity,
  getEntitiesByIds,
  findEntitiesByTerm,
  getRelationshipsFor,
  getRelationshipsAmong,
  getGraphStatistics,
} from './graph-store.js';
export type { GraphStatistics, ConfidenceBucket, DegreeEntry } from './graph-store.js';

// Images
export { hasImageTables, createImageTables, insertImage, insertImages, getImagesByIds, getImageCount } from './image-store.js';

// Memories
export {
  insertMemory,
  getMemory,
  getMemoriesByIds,
  updateMemoryContent,
  deleteMemory,
  markMemoriesUsed,
  getMemoryCounts,
} from './memory-store.js';
export type { NewMemory, MemoryCounts } from './memory-store.js';

// Search indexes
export { KeywordStore, sanitizeQuery } from './keyword-store.js';
export type { KeywordSearchResult, KeywordSearchFilters } from './keyword-store.js';
export { VectorStore, DOCUMENT_VECTORS, IMAGE_VECTORS, MEMORY_VECTORS } from './vector-store.js';
export type { VectorTableSpec, VectorSearchOptions, VectorHit, VectorStats } from './vector-store.js';
