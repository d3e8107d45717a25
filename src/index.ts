/**
 * Clinical GraphRAG
 *
 * Retrieval over clinical notes, a medical knowledge graph, imaging
 * embeddings and agent memory, fused with reciprocal rank fusion, plus a
 * bounded tool-using agent loop.
 *
 * @packageDocumentation
 */

export { VERSION } from './version.js';

// Configuration
export { DEFAULT_CONFIG, getConfig, setConfig, resetConfig, validateConfig } from './config/engine-config.js';
export type { EngineConfig, AgentSettings, LlmSettings, ReconciliationKey } from './config/engine-config.js';
export { loadConfig, loadEngineConfig, toRuntimeConfig, validateExternalConfig } from './config/loader.js';
export type { ExternalConfig, LoadConfigOptions } from './config/loader.js';

// Storage
export * from './storage/index.js';

// Embeddings
export { OpenAiEmbeddingProvider, CachingEmbeddingProvider, createEmbeddingProviders } from './models/embedding-provider.js';
export type { EmbeddingProvider, EmbedPurpose } from './models/embedding-provider.js';
export { MODEL_REGISTRY, getModel } from './models/model-registry.js';

// Ingestion
export * from './ingest/index.js';

// Retrieval
export * from './retrieval/index.js';

// Tools and MCP
export * from './mcp/index.js';

// Agent
export * from './agent/index.js';

// Errors
export {
  GraphRagError,
  CapabilityUnavailableError,
  InvalidInputError,
  StoreUnavailableError,
  EmbeddingError,
  ConfigError,
  IngestionError,
} from './utils/errors.js';
