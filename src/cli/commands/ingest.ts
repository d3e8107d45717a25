import type { Command } from '../types.js';
import { EXIT_ERROR, getFlag, getIntFlag, hasFlag, loadRuntime, positionals, usageError } from '../utils.js';

const USAGE =
  'cgr ingest [<fhir-file>...] [--graph <file>] [--images <file>] [--no-embed] [--batch-size <n>]';

export const ingestCommand: Command = {
  name: 'ingest',
  description: 'Load FHIR notes, a knowledge graph export or an image manifest',
  usage: USAGE,
  examples: [
    'cgr ingest notes.ndjson',
    'cgr ingest --graph graph.json --images images.json --no-embed',
  ],
  handler: async (args) => {
    const files = positionals(args, ['graph', 'images', 'batch-size']);
    const graphFile = getFlag(args, 'graph');
    const imageFile = getFlag(args, 'images');
    if (files.length === 0 && !graphFile && !imageFile) {
      usageError('Nothing to ingest', USAGE);
      return;
    }
    const batchSize = getIntFlag(args, 'batch-size');
    if (batchSize !== undefined && !(batchSize >= 1)) {
      usageError('--batch-size must be a positive integer', USAGE);
      return;
    }

    const { config, services } = loadRuntime();
    const ingest = await import('../../ingest/index.js');

    for (const file of files) {
      const result = await ingest.ingestFhirFile(file);
      console.log(
        `${file}: ${result.inserted} inserted, ${result.duplicates} already present, ` +
          `${result.skipped} skipped, ${result.invalid.length} invalid`,
      );
      for (const bad of result.invalid) {
        console.log(`  resource ${bad.index}: ${bad.reason}`);
      }
    }

    if (graphFile) {
      const result = await ingest.importGraphFile(graphFile);
      console.log(`${graphFile}: ${result.entities} entities, ${result.relationships} relationships`);
    }

    if (imageFile) {
      const result = await ingest.importImageFile(imageFile, config.embedding.imageModel);
      console.log(`${imageFile}: ${result.images} images`);
    }

    if (files.length > 0 && !hasFlag(args, 'no-embed')) {
      if (!services.textEmbedder) {
        console.log('Embedding skipped: no text embedding provider configured.');
        return;
      }
      const result = await ingest.embedPendingDocuments(services.textEmbedder, batchSize);
      console.log(`Embedded ${result.embedded} documents.`);
      if (result.stoppedReason) {
        console.error(`Embedding stopped early: ${result.stoppedReason}`);
        process.exit(EXIT_ERROR);
      }
    }
  },
};
