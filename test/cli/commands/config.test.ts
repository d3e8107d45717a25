/**
 * Tests for the config CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/config/loader.js')>()),
  loadConfig: vi.fn(),
  validateExternalConfig: vi.fn(),
}));

import { configCommand } from '../../../src/cli/commands/config.js';
import { loadConfig, validateExternalConfig } from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/engine-config.js';

const mockLoadConfig = vi.mocked(loadConfig);
const mockValidateExternalConfig = vi.mocked(validateExternalConfig);

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('configCommand', () => {
  it('has correct name and usage', () => {
    expect(configCommand.name).toBe('config');
    expect(configCommand.usage).toBe('cgr config <show|validate> [--resolved]');
  });

  describe('show subcommand', () => {
    it('prints the loaded config as JSON', async () => {
      const external = { agent: { maxIterations: 4 } };
      mockLoadConfig.mockReturnValue(external);

      await configCommand.handler(['show']);

      expect(console.log).toHaveBeenCalledWith(JSON.stringify(external, null, 2));
    });

    it('prints the runtime config with --resolved', async () => {
      mockLoadConfig.mockReturnValue({ agent: { maxIterations: 4 } });

      await configCommand.handler(['show', '--resolved']);

      const expected = { ...DEFAULT_CONFIG, agent: { ...DEFAULT_CONFIG.agent, maxIterations: 4 } };
      expect(console.log).toHaveBeenCalledWith(JSON.stringify(expected, null, 2));
    });
  });

  describe('validate subcommand', () => {
    it('prints success when config is valid', async () => {
      mockLoadConfig.mockReturnValue({});
      mockValidateExternalConfig.mockReturnValue([]);

      await configCommand.handler(['validate']);

      expect(console.log).toHaveBeenCalledWith('Configuration is valid.');
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('lists errors and exits with 3', async () => {
      mockLoadConfig.mockReturnValue({});
      mockValidateExternalConfig.mockReturnValue(['graph.hopDecay must be in (0, 1]']);

      await configCommand.handler(['validate']);

      expect(console.error).toHaveBeenCalledWith('  - graph.hopDecay must be in (0, 1]');
      expect(process.exit).toHaveBeenCalledWith(3);
    });
  });

  it('reports an unknown subcommand', async () => {
    await configCommand.handler(['edit']);

    expect(console.error).toHaveBeenCalledWith('Error: Unknown subcommand: edit');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
