import type { Command } from '../types.js';
import { loadConfig, toRuntimeConfig, validateExternalConfig } from '../../config/loader.js';
import { EXIT_CONFIG, hasFlag, printJson, usageError } from '../utils.js';

const USAGE = 'cgr config <show|validate> [--resolved]';

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: USAGE,
  handler: async (args) => {
    const subcommand = args[0];

    switch (subcommand) {
      case 'show': {
        const config = loadConfig();
        printJson(hasFlag(args, 'resolved') ? toRuntimeConfig(config) : config);
        break;
      }
      case 'validate': {
        const config = loadConfig();
        const errors = validateExternalConfig(config);
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(EXIT_CONFIG);
        }
        break;
      }
      default:
        usageError(subcommand ? `Unknown subcommand: ${subcommand}` : 'Subcommand required', USAGE);
    }
  },
};
