/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (CGR_*)
 * 3. Project config file (./clinical-graphrag.config.json)
 * 4. User config file (~/.clinical-graphrag/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG, resolvePath, validateConfig, type EngineConfig } from './engine-config.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

export const PROJECT_CONFIG_FILE = 'clinical-graphrag.config.json';
export const USER_CONFIG_PATH = '~/.clinical-graphrag/config.json';

/** Shape of config files and CLI overrides. Every field is optional. */
export const ExternalConfigSchema = z
  .object({
    storage: z.object({ dbPath: z.string().min(1).optional() }).strict().optional(),
    embedding: z
      .object({
        baseUrl: z.string().url().optional(),
        apiKeyEnv: z.string().min(1).optional(),
        textModel: z.string().min(1).optional(),
        imageModel: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
        queryCacheSize: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
    llm: z
      .object({
        model: z.string().min(1).optional(),
        maxTokens: z.number().int().positive().optional(),
        apiKeyEnv: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    agent: z
      .object({
        maxIterations: z.number().int().optional(),
        timeBudgetMs: z.number().optional(),
        toolTimeoutMs: z.number().optional(),
        autoRecall: z.boolean().optional(),
      })
      .strict()
      .optional(),
    graph: z
      .object({
        maxHops: z.number().int().optional(),
        defaultHops: z.number().int().min(0).optional(),
        maxSeedEntities: z.number().int().positive().optional(),
        hopDecay: z.number().optional(),
        direction: z.enum(['both', 'outgoing']).optional(),
      })
      .strict()
      .optional(),
    fusion: z
      .object({
        rrfK: z.number().optional(),
        reconciliationKey: z.enum(['document', 'patient']).optional(),
        lexicalWeight: z.number().min(0).optional(),
        vectorWeight: z.number().min(0).optional(),
        candidateMultiplier: z.number().int().optional(),
      })
      .strict()
      .optional(),
    images: z
      .object({ minSimilarity: z.number().min(-1).max(1).optional() })
      .strict()
      .optional(),
    memory: z
      .object({
        autoRecallLimit: z.number().int().min(0).optional(),
        autoRecallMinSimilarity: z.number().min(-1).max(1).optional(),
        recallMinSimilarity: z.number().min(-1).max(1).optional(),
      })
      .strict()
      .optional(),
    store: z
      .object({
        retries: z.number().int().optional(),
        retryDelayMs: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ExternalConfig = z.infer<typeof ExternalConfigSchema>;

/** Defaults expressed in the external shape */
export const EXTERNAL_DEFAULTS: ExternalConfig = {
  storage: { dbPath: DEFAULT_CONFIG.dbPath },
  embedding: { ...DEFAULT_CONFIG.embedding },
  llm: { ...DEFAULT_CONFIG.llm },
  agent: { ...DEFAULT_CONFIG.agent },
  graph: { ...DEFAULT_CONFIG.graph },
  fusion: { ...DEFAULT_CONFIG.fusion },
  images: { ...DEFAULT_CONFIG.images },
  memory: { ...DEFAULT_CONFIG.memory },
  store: { ...DEFAULT_CONFIG.store },
};

/**
 * Load and validate a JSON config file. Missing files yield null; a file
 * that exists but is malformed is an error rather than a silent default.
 */
export function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${path}`, 'CONFIG_PARSE_FAILED', error);
  }

  const parsed = ExternalConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config file ${path}: ${issues.join('; ')}`, 'CONFIG_INVALID');
  }

  log.debug('Loaded config file', { path: resolvedPath });
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

function envNumber(env: Env, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`, 'CONFIG_INVALID');
  }
  return parsed;
}

function envBoolean(env: Env, name: string): boolean | undefined {
  const value = envString(env, name);
  return value === undefined ? undefined : value === 'true';
}

function envChoice<T extends string>(env: Env, name: string, choices: readonly T[]): T | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const match = choices.find((c) => c === value);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${choices.join(', ')}`, 'CONFIG_INVALID');
  }
  return match;
}

/** Drop undefined fields so a section with nothing set disappears. */
function compact<T extends object>(section: T): T | undefined {
  const entries = Object.entries(section).filter(([, v]) => v !== undefined);
  return entries.length > 0 ? section : undefined;
}

function definedOnly<T extends object>(section: T | undefined): Partial<T> {
  if (!section) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(section) as Array<keyof T>) {
    if (section[key] !== undefined) result[key] = section[key];
  }
  return result;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with CGR_ and use underscores for nesting.
 * Examples:
 *   CGR_STORAGE_DB_PATH=/data/graphrag.db
 *   CGR_AGENT_MAX_ITERATIONS=6
 *   CGR_FUSION_RECONCILIATION_KEY=patient
 */
export function loadEnvConfig(env: Env = process.env): ExternalConfig {
  const config: ExternalConfig = {
    storage: compact({ dbPath: envString(env, 'CGR_STORAGE_DB_PATH') }),
    embedding: compact({
      baseUrl: envString(env, 'CGR_EMBEDDING_BASE_URL'),
      apiKeyEnv: envString(env, 'CGR_EMBEDDING_API_KEY_ENV'),
      textModel: envString(env, 'CGR_EMBEDDING_TEXT_MODEL'),
      imageModel: envString(env, 'CGR_EMBEDDING_IMAGE_MODEL'),
      timeoutMs: envNumber(env, 'CGR_EMBEDDING_TIMEOUT_MS'),
      queryCacheSize: envNumber(env, 'CGR_EMBEDDING_QUERY_CACHE_SIZE'),
    }),
    llm: compact({
      model: envString(env, 'CGR_LLM_MODEL'),
      maxTokens: envNumber(env, 'CGR_LLM_MAX_TOKENS'),
      apiKeyEnv: envString(env, 'CGR_LLM_API_KEY_ENV'),
    }),
    agent: compact({
      maxIterations: envNumber(env, 'CGR_AGENT_MAX_ITERATIONS'),
      timeBudgetMs: envNumber(env, 'CGR_AGENT_TIME_BUDGET_MS'),
      toolTimeoutMs: envNumber(env, 'CGR_AGENT_TOOL_TIMEOUT_MS'),
      autoRecall: envBoolean(env, 'CGR_AGENT_AUTO_RECALL'),
    }),
    graph: compact({
      maxHops: envNumber(env, 'CGR_GRAPH_MAX_HOPS'),
      defaultHops: envNumber(env, 'CGR_GRAPH_DEFAULT_HOPS'),
      maxSeedEntities: envNumber(env, 'CGR_GRAPH_MAX_SEED_ENTITIES'),
      hopDecay: envNumber(env, 'CGR_GRAPH_HOP_DECAY'),
      direction: envChoice(env, 'CGR_GRAPH_DIRECTION', ['both', 'outgoing'] as const),
    }),
    fusion: compact({
      rrfK: envNumber(env, 'CGR_FUSION_RRF_K'),
      reconciliationKey: envChoice(env, 'CGR_FUSION_RECONCILIATION_KEY', [
        'document',
        'patient',
      ] as const),
      lexicalWeight: envNumber(env, 'CGR_FUSION_LEXICAL_WEIGHT'),
      vectorWeight: envNumber(env, 'CGR_FUSION_VECTOR_WEIGHT'),
      candidateMultiplier: envNumber(env, 'CGR_FUSION_CANDIDATE_MULTIPLIER'),
    }),
    images: compact({ minSimilarity: envNumber(env, 'CGR_IMAGES_MIN_SIMILARITY') }),
    memory: compact({
      autoRecallLimit: envNumber(env, 'CGR_MEMORY_AUTO_RECALL_LIMIT'),
      autoRecallMinSimilarity: envNumber(env, 'CGR_MEMORY_AUTO_RECALL_MIN_SIMILARITY'),
      recallMinSimilarity: envNumber(env, 'CGR_MEMORY_RECALL_MIN_SIMILARITY'),
    }),
    store: compact({
      retries: envNumber(env, 'CGR_STORE_RETRIES'),
      retryDelayMs: envNumber(env, 'CGR_STORE_RETRY_DELAY_MS'),
    }),
  };

  return config;
}

/**
 * Deep merge two configs one section deep, with source overriding target.
 * Undefined fields in the source never erase a target value.
 */
export function deepMerge(target: ExternalConfig, source: ExternalConfig): ExternalConfig {
  return {
    storage: { ...target.storage, ...definedOnly(source.storage) },
    embedding: { ...target.embedding, ...definedOnly(source.embedding) },
    llm: { ...target.llm, ...definedOnly(source.llm) },
    agent: { ...target.agent, ...definedOnly(source.agent) },
    graph: { ...target.graph, ...definedOnly(source.graph) },
    fusion: { ...target.fusion, ...definedOnly(source.fusion) },
    images: { ...target.images, ...definedOnly(source.images) },
    memory: { ...target.memory, ...definedOnly(source.memory) },
    store: { ...target.store, ...definedOnly(source.store) },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  return validateConfig(toRuntimeConfig(config));
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Environment to read instead of process.env */
  env?: Env;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ExternalConfig {
  let config: ExternalConfig = deepMerge({}, EXTERNAL_DEFAULTS);

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? USER_CONFIG_PATH);
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfig = loadConfigFile(
      options.projectConfigPath ?? join(process.cwd(), PROJECT_CONFIG_FILE),
    );
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig(options.env));
  }

  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return config;
}

/**
 * Convert an ExternalConfig to the runtime EngineConfig, filling every gap
 * from DEFAULT_CONFIG.
 */
export function toRuntimeConfig(external: ExternalConfig): EngineConfig {
  return {
    dbPath: external.storage?.dbPath ?? DEFAULT_CONFIG.dbPath,
    embedding: { ...DEFAULT_CONFIG.embedding, ...definedOnly(external.embedding) },
    llm: { ...DEFAULT_CONFIG.llm, ...definedOnly(external.llm) },
    agent: { ...DEFAULT_CONFIG.agent, ...definedOnly(external.agent) },
    graph: { ...DEFAULT_CONFIG.graph, ...definedOnly(external.graph) },
    fusion: { ...DEFAULT_CONFIG.fusion, ...definedOnly(external.fusion) },
    images: { ...DEFAULT_CONFIG.images, ...definedOnly(external.images) },
    memory: { ...DEFAULT_CONFIG.memory, ...definedOnly(external.memory) },
    store: { ...DEFAULT_CONFIG.store, ...definedOnly(external.store) },
  };
}

/**
 * Load, validate and convert in one step. Throws ConfigError listing every
 * validation failure.
 */
export function loadEngineConfig(options: LoadConfigOptions = {}): EngineConfig {
  const runtime = toRuntimeConfig(loadConfig(options));
  const errors = validateConfig(runtime);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
  return runtime;
}
