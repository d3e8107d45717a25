/**
 * Shared dependencies handed to every retrieval operation.
 */

import { getConfig, type EngineConfig } from '../config/engine-config.js';
import {
  createEmbeddingProviders,
  type EmbeddingProvider,
} from '../models/embedding-provider.js';

export interface RetrievalServices {
  config: EngineConfig;
  /** Text model for notes, queries and memories; null when not provisioned */
  textEmbedder: EmbeddingProvider | null;
  /** Multimodal model for image search; null when not provisioned */
  imageEmbedder: EmbeddingProvider | null;
}

/**
 * Build services from configuration, with embedding providers talking to
 * the configured endpoint.
 */
export function createRetrievalServices(config: EngineConfig = getConfig()): RetrievalServices {
  const providers = createEmbeddingProviders(config.embedding);
  return { config, textEmbedder: providers.text, imageEmbedder: providers.image };
}
