/**
 * FTS5-backed keyword search over clinical notes.
 *
 * BM25 ranking with porter stemming. Errors propagate: callers decide
 * whether a failing index means "store unavailable".
 */

import { getDb } from './db.js';

export interface KeywordSearchResult {
  id: string;
  patientId: string | null;
  /** Negated bm25(): higher is better */
  score: number;
}

export interface KeywordSearchFilters {
  patientId?: string;
  /** Inclusive lower bound, YYYY-MM-DD */
  dateFrom?: string;
  /** Inclusive upper bound, YYYY-MM-DD */
  dateTo?: string;
}

/**
 * Turn free text into an FTS5 MATCH expression.
 *
 * Each word becomes a quoted term so FTS5 operators in user text are inert;
 * terms are OR-ed so partial matches still rank, with BM25 favouring notes
 * that contain more of them.
 */
export function sanitizeQuery(query: string): string {
  if (!query || !query.trim()) return '';

  const terms = query
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .split(/\s+/)
    .map((t) => t.trim())
    .filter((t) => t.length > 0 && !/^(AND|OR|NOT|NEAR)$/.test(t));

  const unique = [...new Set(terms.map((t) => t.toLowerCase()))];
  if (unique.length === 0) return '';

  return unique.map((t) => `"${t}"`).join(' OR ');
}

export class KeywordStore {
  constructor(private db?: ReturnType<typeof getDb>) {}

  private getDatabase() {
    return this.db ?? getDb();
  }

  /**
   * Full-text search with BM25 ranking. Ties keep a stable id order.
   */
  search(query: string, limit: number, filters: KeywordSearchFilters = {}): KeywordSearchResult[] {
    const sanitized = sanitizeQuery(query);
    if (!sanitized) return [];

    const clauses: string[] = ['documents_fts MATCH ?'];
    const params: Array<string | number> = [sanitized];

    if (filters.patientId) {
      clauses.push('d.patient_id = ?');
      params.push(filters.patientId);
    }
    if (filters.dateFrom) {
      clauses.push('substr(d.document_date, 1, 10) >= ?');
      params.push(filters.dateFrom);
    }
    if (filters.dateTo) {
      clauses.push('substr(d.document_date, 1, 10) <= ?');
      params.push(filters.dateTo);
    }

    const rows = this.getDatabase()
      .prepare(
        `
        SELECT d.id, d.patient_id, bm25(documents_fts) as score
        FROM documents_fts
        JOIN documents d ON d.rowid = documents_fts.rowid
        WHERE ${clauses.join(' AND ')}
        ORDER BY score, d.id
        LIMIT ?
      `,
      )
      .all(...params, limit) as Array<{ id: string; patient_id: string | null; score: number }>;

    // bm25() is negative with lower meaning better; negate for conventional scoring
    return rows.map((r) => ({
      id: r.id,
      patientId: r.patient_id,
      score: -r.score,
    }));
  }
}
