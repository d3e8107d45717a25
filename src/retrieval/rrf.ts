/**
 * Reciprocal Rank Fusion (RRF) for combining ranked lists from different retrieval sources.
 *
 * Lexical relevance, graph path confidence and cosine similarity live on
 * incompatible scales, so only rank position is compared:
 *   score(item) = Sum(weight_i / (k + rank_i))
 *
 * Every fused item carries the per-source ranks and contributions that
 * produced its score.
 */

import { InvalidInputError } from '../utils/errors.js';

export const DEFAULT_K = 60;

/**
 * One entry of a source's ranked list. Rank is implied by position.
 */
export interface RankedItem {
  itemId: string;
  /** Source-native score; kept for provenance, never compared across sources */
  rawScore?: number;
}

/**
 * A ranked list from one retrieval method.
 */
export interface RankedList {
  source: string;
  items: RankedItem[];
  /** Multiplier on this list's contributions (default 1) */
  weight?: number;
}

/**
 * How one source contributed to a fused item.
 */
export interface SourceContribution {
  source: string;
  /** 1-based position in that source's list */
  rank: number;
  rawScore?: number;
  contribution: number;
}

export interface FusedResult {
  itemId: string;
  rrfScore: number;
  /** In input-list order */
  contributingSources: SourceContribution[];
}

export interface FuseOptions {
  /** RRF constant (default 60). Higher values flatten the advantage of top ranks. */
  k?: number;
}

/**
 * Fuse ranked lists using Reciprocal Rank Fusion.
 *
 * Lists are read in the order given and never re-sorted. An id repeated
 * within one list counts only at its first position. Output is sorted by
 * rrfScore descending with ties broken by itemId ascending, so identical
 * input always yields identical output. Each score is summed largest
 * contribution first, so equal sets of contributions give bit-equal scores
 * whatever the list order.
 */
export function fuseRankedLists(lists: RankedList[], options: FuseOptions = {}): FusedResult[] {
  const k = options.k ?? DEFAULT_K;
  if (!Number.isFinite(k) || k < 0) {
    throw new InvalidInputError(`RRF k must be a non-negative number, got ${k}`, 'k');
  }

  const fused = new Map<string, FusedResult>();

  for (const list of lists) {
    const weight = list.weight ?? 1;
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidInputError(`Weight for ${list.source} must be non-negative`, 'weight');
    }

    const seen = new Set<string>();
    for (let i = 0; i < list.items.length; i++) {
      const item = list.items[i];
      if (seen.has(item.itemId)) continue;
      seen.add(item.itemId);

      const rank = i + 1;
      const contribution = weight / (k + rank);
      const entry: SourceContribution = { source: list.source, rank, contribution };
      if (item.rawScore !== undefined) entry.rawScore = item.rawScore;

      const existing = fused.get(item.itemId);
      if (existing) {
        existing.contributingSources.push(entry);
      } else {
        fused.set(item.itemId, {
          itemId: item.itemId,
          rrfScore: 0,
          contributingSources: [entry],
        });
      }
    }
  }

  for (const result of fused.values()) {
    result.rrfScore = sumDescending(result.contributingSources.map((c) => c.contribution));
  }

  return [...fused.values()].sort(compareFused);
}

function sumDescending(values: number[]): number {
  return [...values].sort((a, b) => b - a).reduce((sum, v) => sum + v, 0);
}

function compareFused(a: FusedResult, b: FusedResult): number {
  if (b.rrfScore !== a.rrfScore) return b.rrfScore - a.rrfScore;
  return a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0;
}

/**
 * Keep the first occurrence of each key, preserving order. Used to collapse
 * a list onto a coarser identity (document → patient) before fusion.
 */
export function dedupeByKey<T extends object>(items: T[], key: (item: T) => string | null): Array<T & { key: string }> {
  const seen = new Set<string>();
  const result: Array<T & { key: string }> = [];
  for (const item of items) {
    const k = key(item);
    if (k === null || seen.has(k)) continue;
    seen.add(k);
    result.push({ ...item, key: k });
  }
  return result;
}
