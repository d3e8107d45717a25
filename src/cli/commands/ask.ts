import type { Command } from '../types.js';
import { getIntFlag, hasFlag, loadRuntime, positionals, printJson, usageError } from '../utils.js';

const USAGE = 'cgr ask <question> [--max-iterations <n>] [--json]';

export const askCommand: Command = {
  name: 'ask',
  description: 'Answer a clinical question with the tool-using agent',
  usage: USAGE,
  examples: ['cgr ask "What imaging findings support the pneumonia diagnosis for p1000?"'],
  handler: async (args) => {
    const question = positionals(args, ['max-iterations']).join(' ');
    if (!question) {
      usageError('Question required', USAGE);
      return;
    }
    const maxIterations = getIntFlag(args, 'max-iterations');
    if (maxIterations !== undefined && !(maxIterations >= 1)) {
      usageError('--max-iterations must be a positive integer', USAGE);
      return;
    }

    const { services } = loadRuntime();
    if (maxIterations !== undefined) {
      services.config = { ...services.config, agent: { ...services.config.agent, maxIterations } };
    }
    const { createAgent } = await import('../../agent/index.js');
    const response = await createAgent(services).run(question);

    if (hasFlag(args, 'json')) {
      printJson(response);
      return;
    }

    console.log(response.answer);
    console.log('');
    const notes = [`${response.iterations} tool rounds`, `${response.durationMs} ms`];
    if (response.partial) notes.push(`stopped: ${response.state}`);
    if (response.sourcesUnavailable.length > 0) {
      notes.push(`unavailable: ${response.sourcesUnavailable.join(', ')}`);
    }
    console.log(`(${notes.join('; ')})`);
  },
};
