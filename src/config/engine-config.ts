/**
 * Runtime configuration for the retrieval engine and agent loop.
 */

/** How cross-source results are reconciled before fusion. */
export type ReconciliationKey = 'document' | 'patient';

/** Which edges the graph traversal follows from a node. */
export type TraversalDirection = 'both' | 'outgoing';

export interface EmbeddingSettings {
  /** OpenAI-compatible endpoint (NVIDIA NIM by default) */
  baseUrl: string;
  /** Environment variable holding the API key */
  apiKeyEnv: string;
  /** Registry id of the text model used for notes, queries and memories */
  textModel: string;
  /** Registry id of the multimodal model used for image search */
  imageModel: string;
  /** Per-request timeout */
  timeoutMs: number;
  /** Query embeddings kept in the in-process LRU */
  queryCacheSize: number;
}

export interface LlmSettings {
  model: string;
  maxTokens: number;
  apiKeyEnv: string;
}

export interface AgentSettings {
  /** Tool-execution rounds before the loop stops */
  maxIterations: number;
  /** Wall-clock budget for one question */
  timeBudgetMs: number;
  /** Deadline for a single tool call */
  toolTimeoutMs: number;
  /** Recall memories before the first model decision */
  autoRecall: boolean;
}

export interface GraphSettings {
  /** Hard upper bound on max_hops */
  maxHops: number;
  /** max_hops when the caller gives none */
  defaultHops: number;
  /** Seed entities taken from a term lookup */
  maxSeedEntities: number;
  /** Score multiplier per hop, in (0, 1] */
  hopDecay: number;
  direction: TraversalDirection;
}

export interface FusionSettings {
  /** RRF dampening constant */
  rrfK: number;
  reconciliationKey: ReconciliationKey;
  /** RRF weight of the lexical list when re-ranking documents */
  lexicalWeight: number;
  /** RRF weight of the vector list when re-ranking documents */
  vectorWeight: number;
  /** Lexical candidates fetched per requested result */
  candidateMultiplier: number;
}

export interface ImageSettings {
  minSimilarity: number;
}

export interface MemorySettings {
  autoRecallLimit: number;
  autoRecallMinSimilarity: number;
  recallMinSimilarity: number;
}

export interface StoreSettings {
  retries: number;
  retryDelayMs: number;
}

/**
 * Fully-resolved configuration. Produced by `toRuntimeConfig()`.
 */
export interface EngineConfig {
  dbPath: string;
  embedding: EmbeddingSettings;
  llm: LlmSettings;
  agent: AgentSettings;
  graph: GraphSettings;
  fusion: FusionSettings;
  images: ImageSettings;
  memory: MemorySettings;
  store: StoreSettings;
}

export const DEFAULT_CONFIG: EngineConfig = {
  dbPath: '~/.clinical-graphrag/graphrag.db',
  embedding: {
    baseUrl: 'https://integrate.api.nvidia.com/v1',
    apiKeyEnv: 'NVIDIA_API_KEY',
    textModel: 'nv-embedqa-e5-v5',
    imageModel: 'nvclip',
    timeoutMs: 15_000,
    queryCacheSize: 1000,
  },
  llm: {
    model: 'claude-3-5-haiku-20241022',
    maxTokens: 2048,
    apiKeyEnv: 'ANTHROPIC_API_KEY',
  },
  agent: {
    maxIterations: 8,
    timeBudgetMs: 60_000,
    toolTimeoutMs: 20_000,
    autoRecall: true,
  },
  graph: {
    maxHops: 3,
    defaultHops: 2,
    maxSeedEntities: 10,
    hopDecay: 0.5,
    direction: 'both',
  },
  fusion: {
    rrfK: 60,
    reconciliationKey: 'document',
    lexicalWeight: 1.0,
    vectorWeight: 1.0,
    candidateMultiplier: 3,
  },
  images: {
    minSimilarity: 0,
  },
  memory: {
    autoRecallLimit: 5,
    autoRecallMinSimilarity: 0.6,
    recallMinSimilarity: 0.3,
  },
  store: {
    retries: 2,
    retryDelayMs: 100,
  },
};

/**
 * Resolve ~ to the home directory.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Validate runtime configuration values.
 */
export function validateConfig(config: EngineConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.agent.maxIterations) || config.agent.maxIterations < 1) {
    errors.push('agent.maxIterations must be a positive integer');
  }
  if (config.agent.timeBudgetMs <= 0) {
    errors.push('agent.timeBudgetMs must be positive');
  }
  if (config.agent.toolTimeoutMs <= 0) {
    errors.push('agent.toolTimeoutMs must be positive');
  }
  if (!Number.isInteger(config.graph.maxHops) || config.graph.maxHops < 0) {
    errors.push('graph.maxHops must be a non-negative integer');
  }
  if (config.graph.defaultHops > config.graph.maxHops) {
    errors.push('graph.defaultHops must not exceed graph.maxHops');
  }
  if (config.graph.hopDecay <= 0 || config.graph.hopDecay > 1) {
    errors.push('graph.hopDecay must be in (0, 1]');
  }
  if (!Number.isFinite(config.fusion.rrfK) || config.fusion.rrfK < 0) {
    errors.push('fusion.rrfK must be a non-negative number');
  }
  if (config.fusion.candidateMultiplier < 1) {
    errors.push('fusion.candidateMultiplier must be at least 1');
  }
  if (config.store.retries < 0) {
    errors.push('store.retries must be >= 0');
  }

  return errors;
}

let activeConfig: EngineConfig = DEFAULT_CONFIG;

/**
 * Get the active runtime configuration, optionally with section overrides.
 */
export function getConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...activeConfig, ...overrides };
}

/**
 * Replace the active configuration (CLI startup, tests).
 */
export function setConfig(config: EngineConfig): void {
  activeConfig = config;
}

export function resetConfig(): void {
  activeConfig = DEFAULT_CONFIG;
}
