/**
 * Shared CLI utilities.
 */

import { loadEngineConfig } from '../config/loader.js';
import { setConfig, type EngineConfig } from '../config/engine-config.js';
import { createRetrievalServices, type RetrievalServices } from '../retrieval/services.js';

/** Exit codes shared by every command */
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;

/**
 * Value following `--name`, or undefined when the flag is absent or last.
 */
export function getFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index < 0 || index + 1 >= args.length) return undefined;
  return args[index + 1];
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/**
 * Integer value of `--name`. Returns `fallback` when absent and NaN when the
 * value is not an integer, so callers can report it.
 */
export function getIntFlag(args: string[], name: string, fallback?: number): number | undefined {
  const raw = getFlag(args, name);
  if (raw === undefined) return fallback;
  return /^-?\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
}

/**
 * Arguments that are neither flags nor flag values. `valueFlags` lists the
 * flags that take a value.
 */
export function positionals(args: string[], valueFlags: string[] = []): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (valueFlags.includes(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}

/**
 * Print usage and exit with EXIT_USAGE.
 */
export function usageError(message: string, usage: string): void {
  console.error(`Error: ${message}`);
  console.log(`Usage: ${usage}`);
  process.exit(EXIT_USAGE);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Load configuration (user file, project file, environment), make it the
 * active config, and build the retrieval services.
 */
export function loadRuntime(): { config: EngineConfig; services: RetrievalServices } {
  const config = loadEngineConfig();
  setConfig(config);
  return { config, services: createRetrievalServices(config) };
}
