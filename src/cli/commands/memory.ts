import type { Command } from '../types.js';
import { isMemoryKind, MEMORY_KINDS } from '../../storage/types.js';
import { EXIT_ERROR, getFlag, getIntFlag, loadRuntime, positionals, printJson, usageError } from '../utils.js';

const USAGE =
  'cgr memory <remember|recall|forget|stats> [text|id] [--kind <correction|preference|fact>] [--limit <n>]';

export const memoryCommand: Command = {
  name: 'memory',
  description: 'Store, recall and delete agent memories',
  usage: USAGE,
  examples: [
    'cgr memory remember "Prefer troponin trends over single values" --kind preference',
    'cgr memory recall "troponin"',
  ],
  handler: async (args) => {
    const [subcommand, ...rest] = positionals(args, ['kind', 'limit']);
    const text = rest.join(' ');
    const kind = getFlag(args, 'kind');
    if (kind !== undefined && !isMemoryKind(kind)) {
      usageError(`--kind must be one of ${MEMORY_KINDS.join(', ')}`, USAGE);
      return;
    }

    const { services } = loadRuntime();
    const memory = await import('../../retrieval/memory.js');

    switch (subcommand) {
      case 'remember': {
        if (!text) {
          usageError('Memory text required', USAGE);
          return;
        }
        const id = await memory.remember(services, text, kind ?? 'fact');
        console.log(`Stored memory ${id}.`);
        break;
      }
      case 'recall': {
        if (!text) {
          usageError('Query required', USAGE);
          return;
        }
        const result = await memory.recall(services, text, {
          kind,
          limit: getIntFlag(args, 'limit'),
        });
        if (result.degraded) {
          console.error(`Recall unavailable: ${result.reason ?? 'unknown reason'}`);
          process.exit(EXIT_ERROR);
          return;
        }
        printJson(result.memories);
        break;
      }
      case 'forget': {
        if (!text) {
          usageError('Memory id required', USAGE);
          return;
        }
        const deleted = await memory.forget(text);
        console.log(deleted ? `Deleted memory ${text}.` : `No memory ${text}.`);
        break;
      }
      case 'stats':
        printJson(await memory.getMemoryStats());
        break;
      default:
        usageError(subcommand ? `Unknown subcommand: ${subcommand}` : 'Subcommand required', USAGE);
    }
  },
};
