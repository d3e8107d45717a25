/**
 * Cosine-similarity search over an embedding column in SQLite.
 *
 * Embeddings are Float32 BLOBs beside the records they describe (documents,
 * images, memories). Every search reads the table afresh: there is no
 * in-memory index, so a changed or deleted record can never be served from
 * a stale copy.
 *
 * ## Usage
 *
 * ```typescript
 * import { VectorStore, IMAGE_VECTORS } from './vector-store.js';
 *
 * const store = new VectorStore(IMAGE_VECTORS);
 * const hits = store.search(queryEmbedding, {
 *   limit: 10,
 *   minSimilarity: 0.5,
 *   filters: { view_position: 'PA' },
 * });
 * // [{ id: 'img-7', similarity: 0.83 }, ...]
 * ```
 *
 * ## Degenerate vectors
 *
 * A stored vector with near-zero magnitude (a failed or mock embedding) is
 * skipped before similarity is computed. So is a vector whose dimension
 * differs from the query's. Neither can appear in results.
 *
 * ## Performance Notes
 *
 * - Search: O(n) brute force over rows passing the SQL filters
 * - Memory: rows are streamed with iterate(), one vector at a time
 *
 * @module storage/vector-store
 */

import { getDb } from './db.js';
import { cosineSimilarity, deserializeEmbedding, isDegenerate } from '../utils/vector-math.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-store');

/**
 * Where a vector table lives and which columns may be filtered on.
 */
export interface VectorTableSpec {
  table: string;
  idColumn: string;
  embeddingColumn: string;
  /** Columns accepted in `filters`; anything else is rejected */
  filterColumns: readonly string[];
}

export const DOCUMENT_VECTORS: VectorTableSpec = {
  table: 'documents',
  idColumn: 'id',
  embeddingColumn: 'embedding',
  filterColumns: ['patient_id', 'embedding_model'],
};

export const IMAGE_VECTORS: VectorTableSpec = {
  table: 'images',
  idColumn: 'id',
  embeddingColumn: 'embedding',
  filterColumns: ['subject_id', 'patient_id', 'view_position', 'embedding_model'],
};

export const MEMORY_VECTORS: VectorTableSpec = {
  table: 'memories',
  idColumn: 'id',
  embeddingColumn: 'embedding',
  filterColumns: ['kind', 'embedding_model'],
};

export interface VectorSearchOptions {
  limit: number;
  /** Drop hits below this cosine similarity */
  minSimilarity?: number;
  /** Exact-match column filters (keys from the table's filterColumns) */
  filters?: Record<string, string | undefined>;
  /** Restrict the search to these ids */
  ids?: string[];
}

export interface VectorHit {
  id: string;
  /** Cosine similarity in [-1, 1] */
  similarity: number;
}

export interface VectorStats {
  total: number;
  degenerate: number;
  missing: number;
}

export class VectorStore {
  constructor(
    private readonly spec: VectorTableSpec,
    private readonly db?: ReturnType<typeof getDb>,
  ) {}

  private getDatabase() {
    return this.db ?? getDb();
  }

  private buildWhere(options: Pick<VectorSearchOptions, 'filters' | 'ids'>): {
    sql: string;
    params: string[];
  } {
    const clauses = [`${this.spec.embeddingColumn} IS NOT NULL`];
    const params: string[] = [];

    for (const [column, value] of Object.entries(options.filters ?? {})) {
      if (value === undefined) continue;
      if (!this.spec.filterColumns.includes(column)) {
        throw new Error(`Column ${column} is not filterable on ${this.spec.table}`);
      }
      clauses.push(`${column} = ?`);
      params.push(value);
    }

    if (options.ids) {
      clauses.push(`${this.spec.idColumn} IN (${options.ids.map(() => '?').join(',') || 'NULL'})`);
      params.push(...options.ids);
    }

    return { sql: clauses.join(' AND '), params };
  }

  /**
   * Rank stored vectors by cosine similarity to `query`, highest first.
   * Equal similarities are ordered by id.
   */
  search(query: number[], options: VectorSearchOptions): VectorHit[] {
    if (options.limit <= 0 || isDegenerate(query)) return [];

    const { sql, params } = this.buildWhere(options);
    const stmt = this.getDatabase().prepare(
      `SELECT ${this.spec.idColumn} AS id, ${this.spec.embeddingColumn} AS embedding
       FROM ${this.spec.table}
       WHERE ${sql}`,
    );

    const minSimilarity = options.minSimilarity ?? -1;
    const hits: VectorHit[] = [];
    let skipped = 0;

    for (const row of stmt.iterate(...params) as IterableIterator<{ id: string; embedding: Buffer }>) {
      const vector = deserializeEmbedding(row.embedding);
      if (vector.length !== query.length || isDegenerate(vector)) {
        skipped++;
        continue;
      }
      const similarity = cosineSimilarity(query, vector);
      if (similarity >= minSimilarity) {
        hits.push({ id: row.id, similarity });
      }
    }

    if (skipped > 0) {
      log.debug('Skipped unusable vectors', { table: this.spec.table, skipped });
    }

    hits.sort((a, b) => b.similarity - a.similarity || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return hits.slice(0, options.limit);
  }

  /**
   * Similarity of `query` to each listed id that has a usable vector.
   */
  similarities(query: number[], ids: string[]): Map<string, number> {
    const result = new Map<string, number>();
    if (ids.length === 0 || isDegenerate(query)) return result;
    for (const hit of this.search(query, { limit: ids.length, ids })) {
      result.set(hit.id, hit.similarity);
    }
    return result;
  }

  /**
   * Counts of rows with a usable, degenerate, or missing vector.
   */
  stats(): VectorStats {
    const db = this.getDatabase();
    const total = (
      db.prepare(`SELECT COUNT(*) as count FROM ${this.spec.table}`).get() as { count: number }
    ).count;

    let withVector = 0;
    let degenerate = 0;
    const stmt = db.prepare(
      `SELECT ${this.spec.embeddingColumn} AS embedding FROM ${this.spec.table}
       WHERE ${this.spec.embeddingColumn} IS NOT NULL`,
    );
    for (const row of stmt.iterate() as IterableIterator<{ embedding: Buffer }>) {
      withVector++;
      if (isDegenerate(deserializeEmbedding(row.embedding))) degenerate++;
    }

    return { total, degenerate, missing: total - withVector };
  }
}
