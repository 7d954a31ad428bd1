/**
 * Score fusion for hybrid queries
 *
 * Each side is normalized by its own maximum, then combined as
 * alpha * text + (1 - alpha) * vector. A record found by one side only
 * gets 0 for the other. When a side did not produce results at all (mode
 * excludes it, or it timed out) its weight goes to the side that did.
 *
 * @module services/search/fusion
 */

import { roundTo } from '../../utils/math.js';

export interface ScoredRecord {
  record_id: string;
  score: number;
}

export interface FusedResult {
  record_id: string;
  score: number;
  /** Normalized text score, null when the text side did not match */
  text_score: number | null;
  /** Normalized vector similarity, null when the vector side did not match */
  vector_score: number | null;
}

/**
 * Max score per record divided by the overall max
 */
export function normalizeScores(hits: readonly ScoredRecord[]): Map<string, number> {
  const best = new Map<string, number>();
  for (const hit of hits) {
    const current = best.get(hit.record_id);
    if (current === undefined || hit.score > current) best.set(hit.record_id, hit.score);
  }
  const max = Math.max(0, ...best.values());
  const normalized = new Map<string, number>();
  for (const [id, score] of best) {
    normalized.set(id, max > 0 ? score / max : 0);
  }
  return normalized;
}

/**
 * Deterministic result order: score desc, then id asc
 */
export function compareFused(a: ScoredRecord, b: ScoredRecord): number {
  return b.score - a.score || (a.record_id < b.record_id ? -1 : a.record_id > b.record_id ? 1 : 0);
}

/**
 * Merge text and vector hits
 *
 * @param text - null when the text side produced no result set
 * @param vector - null when the vector side produced no result set
 */
export function fuseResults(
  text: readonly ScoredRecord[] | null,
  vector: readonly ScoredRecord[] | null,
  alpha: number
): FusedResult[] {
  const weight = text === null ? 0 : vector === null ? 1 : alpha;
  const textScores = normalizeScores(text ?? []);
  const vectorScores = normalizeScores(vector ?? []);

  const ids = new Set([...textScores.keys(), ...vectorScores.keys()]);
  const fused: FusedResult[] = [];
  for (const id of ids) {
    const t = textScores.get(id);
    const v = vectorScores.get(id);
    fused.push({
      record_id: id,
      score: roundTo(weight * (t ?? 0) + (1 - weight) * (v ?? 0), 6),
      text_score: t ?? null,
      vector_score: v ?? null,
    });
  }
  return fused.sort(compareFused);
}
