/**
 * Embedding providers.
 *
 * The retrieval code only sees the EmbeddingProvider interface. The default
 * implementation talks to an OpenAI-compatible endpoint (NVIDIA NIM hosts
 * both the text and the multimodal model), and any failure to obtain a
 * usable vector is raised as CapabilityUnavailableError so callers can
 * degrade instead of crash.
 */

import OpenAI from 'openai';
import type { ModelConfig } from './model-registry.js';
import type { EmbeddingSettings } from '../config/engine-config.js';
import { getModel } from './model-registry.js';
import {
  CapabilityUnavailableError,
  EmbeddingError,
  errorMessage,
  type Capability,
} from '../utils/errors.js';
import { isDegenerate } from '../utils/vector-math.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedding');

/** Asymmetric models embed questions and stored passages differently. */
export type EmbedPurpose = 'query' | 'passage';

export interface EmbeddingProvider {
  /** Registry id, stored beside vectors */
  readonly modelId: string;
  readonly dims: number;
  /** Capability reported when this provider cannot produce a vector */
  readonly capability: Capability;
  embed(text: string, purpose?: EmbedPurpose): Promise<number[]>;
  embedBatch(texts: string[], purpose?: EmbedPurpose): Promise<number[][]>;
}

/**
 * Check a vector returned by a provider.
 */
export function checkVector(model: ModelConfig, vector: number[]): number[] {
  if (vector.length !== model.dims) {
    throw new EmbeddingError(
      `${model.id} returned ${vector.length} dimensions, expected ${model.dims}`,
      'DIMENSION_MISMATCH',
    );
  }
  if (isDegenerate(vector)) {
    throw new EmbeddingError(`${model.id} returned a degenerate vector`, 'DEGENERATE_EMBEDDING');
  }
  return vector;
}

type NimEmbeddingParams = OpenAI.EmbeddingCreateParams & {
  input_type?: EmbedPurpose;
  truncate?: 'NONE' | 'START' | 'END';
};

/** The part of the OpenAI client the provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(params: NimEmbeddingParams): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
  };
}

export interface OpenAiProviderOptions {
  baseUrl: string;
  /** Undefined means "not provisioned" */
  apiKey: string | undefined;
  timeoutMs: number;
  /** Injected client (tests) */
  client?: EmbeddingsClient;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dims: number;
  readonly capability: Capability;
  private readonly client: EmbeddingsClient | null;

  constructor(
    private readonly model: ModelConfig,
    options: OpenAiProviderOptions,
  ) {
    this.modelId = model.id;
    this.dims = model.dims;
    this.capability = model.modality === 'multimodal' ? 'image_embedding' : 'embedding';

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 2,
      });
    } else {
      this.client = null;
    }
  }

  async embed(text: string, purpose: EmbedPurpose = 'query'): Promise<number[]> {
    const [vector] = await this.embedBatch([text], purpose);
    return vector;
  }

  async embedBatch(texts: string[], purpose: EmbedPurpose = 'query'): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (!this.client) {
      throw new CapabilityUnavailableError(
        this.capability,
        `No API key configured for embedding model ${this.modelId}`,
      );
    }

    const params: NimEmbeddingParams = {
      model: this.model.providerModel,
      input: texts,
      encoding_format: 'float',
    };
    if (this.model.usesInputType) {
      params.input_type = purpose;
      params.truncate = 'END';
    }

    try {
      const response = await this.client.embeddings.create(params);
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== texts.length) {
        throw new EmbeddingError(
          `${this.modelId} returned ${ordered.length} embeddings for ${texts.length} inputs`,
        );
      }
      return ordered.map((d) => checkVector(this.model, d.embedding));
    } catch (error) {
      log.warn('Embedding request failed', { model: this.modelId, error: errorMessage(error) });
      throw new CapabilityUnavailableError(
        this.capability,
        `Embedding model ${this.modelId} unavailable: ${errorMessage(error)}`,
        error,
      );
    }
  }
}

/**
 * LRU cache in front of another provider. Embeddings are a pure function
 * of (model, purpose, text), so caching them cannot serve stale results.
 */
export class CachingEmbeddingProvider implements EmbeddingProvider {
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly capacity: number = 1000,
  ) {}

  get modelId(): string {
    return this.inner.modelId;
  }

  get dims(): number {
    return this.inner.dims;
  }

  get capability(): Capability {
    return this.inner.capability;
  }

  get size(): number {
    return this.cache.size;
  }

  private key(text: string, purpose: EmbedPurpose): string {
    return `${purpose}\u0000${text}`;
  }

  private remember(key: string, vector: number[]): void {
    if (this.capacity <= 0) return;
    this.cache.delete(key);
    this.cache.set(key, vector);
    while (this.cache.size > this.capacity) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  async embed(text: string, purpose: EmbedPurpose = 'query'): Promise<number[]> {
    const [vector] = await this.embedBatch([text], purpose);
    return vector;
  }

  async embedBatch(texts: string[], purpose: EmbedPurpose = 'query'): Promise<number[][]> {
    const results: Array<number[] | undefined> = texts.map((text) => {
      const key = this.key(text, purpose);
      const hit = this.cache.get(key);
      if (hit) this.remember(key, hit);
      return hit;
    });

    const missing = texts.filter((_, i) => results[i] === undefined);
    if (missing.length > 0) {
      const fresh = await this.inner.embedBatch(missing, purpose);
      let next = 0;
      for (let i = 0; i < texts.length; i++) {
        if (results[i] === undefined) {
          const vector = fresh[next++];
          results[i] = vector;
          this.remember(this.key(texts[i], purpose), vector);
        }
      }
    }

    return results.map((v) => v ?? []);
  }
}

export interface EmbeddingProviders {
  text: EmbeddingProvider;
  image: EmbeddingProvider;
}

/**
 * Build the text and image providers from configuration. API keys are read
 * from the environment variable the settings name.
 */
export function createEmbeddingProviders(
  settings: EmbeddingSettings,
  env: Record<string, string | undefined> = process.env,
): EmbeddingProviders {
  const apiKey = env[settings.apiKeyEnv];
  const build = (modelId: string): EmbeddingProvider =>
    new CachingEmbeddingProvider(
      new OpenAiEmbeddingProvider(getModel(modelId), {
        baseUrl: settings.baseUrl,
        apiKey,
        timeoutMs: settings.timeoutMs,
      }),
      settings.queryCacheSize,
    );

  return { text: build(settings.textModel), image: build(settings.imageModel) };
}
