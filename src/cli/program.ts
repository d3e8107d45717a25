/**
 * Command registry and dispatch for the `cgr` CLI.
 */

import { VERSION } from '../version.js';
import { GraphRagError, errorMessage, isConfigError } from '../utils/errors.js';
import type { Command } from './types.js';
import { EXIT_CONFIG, EXIT_ERROR, EXIT_USAGE } from './utils.js';
import { askCommand } from './commands/ask.js';
import { configCommand } from './commands/config.js';
import { ingestCommand } from './commands/ingest.js';
import { memoryCommand } from './commands/memory.js';
import { searchCommand } from './commands/search.js';
import { serveCommand } from './commands/serve.js';
import { healthCommand, statsCommand } from './commands/stats.js';

export const commands: Command[] = [
  serveCommand,
  askCommand,
  searchCommand,
  ingestCommand,
  memoryCommand,
  statsCommand,
  healthCommand,
  configCommand,
];

export function showHelp(): void {
  console.log('Clinical GraphRAG');
  console.log('');
  console.log('Usage: cgr <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(10)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version  Show version');
  console.log('  --help     Show help');
  console.log('');
  console.log('Run "cgr <command> --help" for command-specific help.');
}

export function showCommandHelp(command: Command): void {
  console.log(command.description);
  console.log('');
  console.log(`Usage: ${command.usage}`);
  if (command.examples && command.examples.length > 0) {
    console.log('');
    console.log('Examples:');
    for (const example of command.examples) {
      console.log(`  ${example}`);
    }
  }
}

/**
 * Dispatch `argv` (without node and script) to a command.
 */
export async function run(argv: string[]): Promise<void> {
  if (argv[0] === '--version' || argv[0] === '-v') {
    console.log(`cgr ${VERSION}`);
    return;
  }

  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    showHelp();
    return;
  }

  const commandName = argv[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "cgr --help" for available commands.');
    process.exit(EXIT_USAGE);
    return;
  }

  const args = argv.slice(1);
  if (args.includes('--help') || args.includes('-h')) {
    showCommandHelp(command);
    return;
  }

  try {
    await command.handler(args);
  } catch (error) {
    if (isConfigError(error)) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(EXIT_CONFIG);
      return;
    }
    const code = error instanceof GraphRagError ? ` [${error.code}]` : '';
    console.error(`Error${code}: ${errorMessage(error)}`);
    process.exit(EXIT_ERROR);
  }
}
