/**
 * Tests for runtime config validation and the active-config accessors.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  DEFAULT_CONFIG,
  getConfig,
  resetConfig,
  resolvePath,
  setConfig,
  validateConfig,
  type EngineConfig,
} from '../../src/config/engine-config.js';
import { ExternalConfigSchema } from '../../src/config/loader.js';

function withOverrides(overrides: Partial<EngineConfig>): EngineConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
  });

  it('requires a positive integer iteration cap', () => {
    const errors = validateConfig(withOverrides({ agent: { ...DEFAULT_CONFIG.agent, maxIterations: 1.5 } }));

    expect(errors).toEqual(['agent.maxIterations must be a positive integer']);
  });

  it('rejects non-positive budgets', () => {
    const errors = validateConfig(
      withOverrides({ agent: { ...DEFAULT_CONFIG.agent, timeBudgetMs: 0, toolTimeoutMs: -1 } }),
    );

    expect(errors).toEqual(['agent.timeBudgetMs must be positive', 'agent.toolTimeoutMs must be positive']);
  });

  it('bounds the hop decay to (0, 1]', () => {
    expect(validateConfig(withOverrides({ graph: { ...DEFAULT_CONFIG.graph, hopDecay: 1 } }))).toEqual([]);
    expect(validateConfig(withOverrides({ graph: { ...DEFAULT_CONFIG.graph, hopDecay: 0 } }))).toEqual([
      'graph.hopDecay must be in (0, 1]',
    ]);
  });

  it('allows k = 0 but not a negative k', () => {
    expect(validateConfig(withOverrides({ fusion: { ...DEFAULT_CONFIG.fusion, rrfK: 0 } }))).toEqual([]);
    expect(validateConfig(withOverrides({ fusion: { ...DEFAULT_CONFIG.fusion, rrfK: -1 } }))).toEqual([
      'fusion.rrfK must be a non-negative number',
    ]);
  });

  it('rejects negative store retries', () => {
    expect(validateConfig(withOverrides({ store: { retries: -1, retryDelayMs: 0 } }))).toEqual([
      'store.retries must be >= 0',
    ]);
  });
});

describe('ExternalConfigSchema', () => {
  it('accepts a partial config', () => {
    expect(ExternalConfigSchema.safeParse({ images: { minSimilarity: 0.2 } }).success).toBe(true);
  });

  it('rejects an unknown section', () => {
    expect(ExternalConfigSchema.safeParse({ clustering: {} }).success).toBe(false);
  });

  it('rejects an invalid endpoint URL', () => {
    expect(ExternalConfigSchema.safeParse({ embedding: { baseUrl: 'not a url' } }).success).toBe(false);
  });

  it('bounds similarity floors to [-1, 1]', () => {
    expect(ExternalConfigSchema.safeParse({ memory: { recallMinSimilarity: 1.5 } }).success).toBe(false);
  });
});

describe('active config', () => {
  afterEach(() => {
    resetConfig();
    vi.unstubAllEnvs();
  });

  it('returns defaults until replaced', () => {
    expect(getConfig()).toEqual(DEFAULT_CONFIG);

    const custom = withOverrides({ dbPath: ':memory:' });
    setConfig(custom);

    expect(getConfig().dbPath).toBe(':memory:');
    expect(getConfig({ dbPath: 'other.db' }).dbPath).toBe('other.db');
  });

  it('expands ~ to the home directory', () => {
    vi.stubEnv('HOME', '/home/tester');

    expect(resolvePath('~/.clinical-graphrag/graphrag.db')).toBe('/home/tester/.clinical-graphrag/graphrag.db');
    expect(resolvePath('/abs/path.db')).toBe('/abs/path.db');
  });
});
