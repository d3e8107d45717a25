/**
 * Schema SQL loading and statement splitting.
 *
 * Splits a .sql file into individual statements, keeping BEGIN...END blocks
 * (triggers) intact.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** SQL files shipped beside this module */
export type SchemaFile = 'schema.sql' | 'graph-schema.sql' | 'image-schema.sql';

/**
 * Load and parse a schema file into individual statements.
 */
export function loadSchemaStatements(file: SchemaFile = 'schema.sql'): string[] {
  const schema = readFileSync(join(__dirname, file), 'utf-8');
  return splitStatements(schema);
}

/**
 * Split SQL text into individual statements, respecting BEGIN...END blocks.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inTrigger = false;

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();

    // Skip comment lines between statements
    if (!current && (trimmed.startsWith('--') || trimmed === '')) continue;

    current += (current ? '\n' : '') + line;

    if (/\bBEGIN\s*$/i.test(trimmed)) {
      inTrigger = true;
    }

    if (inTrigger && /^END\s*;/i.test(trimmed)) {
      inTrigger = false;
      statements.push(current.trim());
      current = '';
      continue;
    }

    if (!inTrigger && trimmed.endsWith(';')) {
      const stmt = current.trim().replace(/;$/, '').trim();
      if (stmt) statements.push(stmt);
      current = '';
    }
  }

  if (current.trim()) {
    const stmt = current.trim().replace(/;$/, '').trim();
    if (stmt) statements.push(stmt);
  }

  return statements;
}
