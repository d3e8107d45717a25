import type { Command } from '../types.js';
import { EXIT_ERROR, hasFlag, loadRuntime, printJson } from '../utils.js';

export const statsCommand: Command = {
  name: 'stats',
  description: 'Show store statistics',
  usage: 'cgr stats [--json]',
  handler: async (args) => {
    loadRuntime();
    const { collectStats } = await import('../../retrieval/status.js');
    const stats = collectStats();

    if (hasFlag(args, 'json')) {
      printJson(stats);
      return;
    }

    console.log('Store Statistics:');
    console.log(`  Documents: ${stats.documents} (${stats.patients} patients)`);
    console.log(
      `  Document vectors: ${stats.documentVectors.total} (${stats.documentVectors.degenerate} degenerate, ${stats.documentVectors.missing} missing)`,
    );
    if (stats.graph) {
      console.log(`  Entities: ${stats.graph.totalEntities}`);
      console.log(`  Relationships: ${stats.graph.totalRelationships}`);
    } else {
      console.log('  Knowledge graph: not built');
    }
    if (stats.images) {
      console.log(`  Images: ${stats.images.count} (${stats.images.vectors.degenerate} degenerate vectors)`);
    } else {
      console.log('  Images: no image store');
    }
    console.log(`  Memories: ${stats.memories.total}`);
  },
};

export const healthCommand: Command = {
  name: 'health',
  description: 'Check store and provider health',
  usage: 'cgr health [--json]',
  handler: async (args) => {
    const { services } = loadRuntime();
    const { checkHealth } = await import('../../retrieval/status.js');
    const report = checkHealth(services);

    if (hasFlag(args, 'json')) {
      printJson(report);
    } else {
      const mark = (ok: boolean) => (ok ? 'OK' : 'UNAVAILABLE');
      console.log('Health Check:');
      console.log(`  Database: ${mark(report.checks.database)}`);
      console.log(`  Knowledge graph: ${mark(report.checks.knowledgeGraph)}`);
      console.log(`  Image store: ${mark(report.checks.imageStore)}`);
      console.log(`  Text embedding: ${mark(report.checks.textEmbedding)}`);
      console.log(`  Image embedding: ${mark(report.checks.imageEmbedding)}`);
      if (report.error) console.log(`  Error: ${report.error}`);
      console.log('');
      console.log(`Status: ${report.status}`);
    }

    if (report.status === 'unhealthy') process.exit(EXIT_ERROR);
  },
};
