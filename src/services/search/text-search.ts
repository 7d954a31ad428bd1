/**
 * Full-text search over SQLite FTS5
 *
 * Two indexes are searched: record title + preview (records_fts) and full
 * blob bodies (blobs_fts, reached through the record's current pointer).
 * Filters are applied in SQL, before ranking is cut off by LIMIT.
 *
 * Scores are -bm25(), so higher is better and every match is positive.
 *
 * @module services/search/text-search
 */

import type Database from 'better-sqlite3';
import type { QueryFilters } from '../../utils/validation.js';
import { compareFused, type ScoredRecord } from './fusion.js';
import { sanitizeFTS5Query } from './fts-query.js';

interface FilterSQL {
  conditions: string[];
  params: unknown[];
}

/**
 * Record filters as SQL conditions on alias `r`
 */
export function buildRecordFilterSQL(filters: QueryFilters): FilterSQL {
  const conditions: string[] = ["r.status != 'pending'"];
  const params: unknown[] = [];
  if (filters.domain) {
    conditions.push('r.domain = ?');
    params.push(filters.domain);
  }
  if (filters.content_type) {
    conditions.push('r.content_type = ?');
    params.push(filters.content_type);
  }
  if (filters.from) {
    conditions.push('r.created_at >= ?');
    params.push(filters.from);
  }
  if (filters.to) {
    conditions.push('r.created_at <= ?');
    params.push(filters.to);
  }
  return { conditions, params };
}

export class TextSearchService {
  constructor(private readonly db: Database.Database) {}

  /**
   * Best text score per record, best first (ties by id)
   *
   * @throws ValidationError when the query has no searchable terms
   */
  search(query: string, filters: QueryFilters, limit: number): ScoredRecord[] {
    const ftsQuery = sanitizeFTS5Query(query);
    const filter = buildRecordFilterSQL(filters);
    const where = filter.conditions.join(' AND ');

    const recordHits = this.db
      .prepare(
        `SELECT r.id AS record_id, -bm25(records_fts) AS score
         FROM records_fts
         JOIN content_records r ON r.rowid = records_fts.rowid
         WHERE records_fts MATCH ? AND ${where}
         ORDER BY bm25(records_fts) ASC
         LIMIT ?`
      )
      .all(ftsQuery, ...filter.params, limit) as ScoredRecord[];

    const blobHits = this.db
      .prepare(
        `SELECT r.id AS record_id, -bm25(blobs_fts) AS score
         FROM blobs_fts
         JOIN content_blobs b ON b.rowid = blobs_fts.rowid
         JOIN content_records r ON json_extract(r.location_json, '$.full.content_hash') = b.content_hash
         WHERE blobs_fts MATCH ? AND ${where}
         ORDER BY bm25(blobs_fts) ASC
         LIMIT ?`
      )
      .all(ftsQuery, ...filter.params, limit) as ScoredRecord[];

    const best = new Map<string, number>();
    for (const hit of [...recordHits, ...blobHits]) {
      const current = best.get(hit.record_id);
      if (current === undefined || hit.score > current) best.set(hit.record_id, hit.score);
    }
    return [...best.entries()]
      .map(([record_id, score]) => ({ record_id, score }))
      .sort(compareFused)
      .slice(0, limit);
  }
}
