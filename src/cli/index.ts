#!/usr/bin/env node
/**
 * Clinical GraphRAG command-line interface.
 *
 * Usage: cgr <command> [options]
 */

import { run } from './program.js';

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
