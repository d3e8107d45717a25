import type { Command } from '../types.js';
import { getFlag, getIntFlag, hasFlag, loadRuntime, positionals, printJson, usageError } from '../utils.js';

const USAGE = 'cgr search <query> [--patient <id>] [--limit <n>] [--images] [--json]';

export const searchCommand: Command = {
  name: 'search',
  description: 'Hybrid search over notes, knowledge graph and images',
  usage: USAGE,
  examples: ['cgr search "chest pain radiating to left arm" --patient p1000 --limit 5'],
  handler: async (args) => {
    const query = positionals(args, ['patient', 'limit']).join(' ');
    if (!query) {
      usageError('Query required', USAGE);
      return;
    }
    const limit = getIntFlag(args, 'limit');
    if (limit !== undefined && Number.isNaN(limit)) {
      usageError('--limit must be an integer', USAGE);
      return;
    }

    const { services } = loadRuntime();
    const { hybridSearch } = await import('../../retrieval/hybrid-search.js');
    const result = await hybridSearch(services, {
      query,
      patientId: getFlag(args, 'patient'),
      includeImages: hasFlag(args, 'images'),
      limit,
    });

    if (hasFlag(args, 'json')) {
      printJson(result);
      return;
    }

    for (const source of result.provenance) {
      const note = source.note ? ` (${source.note})` : '';
      console.log(`${source.source}: ${source.status}, ${source.count} items${note}`);
    }
    console.log('');
    if (result.results.length === 0) {
      console.log('No results.');
      return;
    }
    for (const hit of result.results) {
      const sources = hit.contributingSources.map((c) => `${c.source}#${c.rank}`).join(', ');
      console.log(`${hit.rank}. ${hit.key}  score=${hit.rrfScore.toFixed(4)}  [${sources}]`);
      if (hit.preview) console.log(`   ${hit.preview}`);
    }
  },
};
