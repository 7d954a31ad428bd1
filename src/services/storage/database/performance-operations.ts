/**
 * Performance sample operations for DatabaseService
 *
 * Samples are append-only; the only delete is the retention sweep.
 */

import Database from 'better-sqlite3';
import type { PerformanceSample } from '../../../models/performance.js';
import { PerformanceSampleRow } from './types.js';
import { rowToSample } from './converters.js';

export interface DomainLatencyStats {
  domain: string;
  sample_count: number;
  mean_latency_ms: number;
  max_latency_ms: number;
}

export function insertSample(db: Database.Database, sample: Omit<PerformanceSample, 'id'>): number {
  const result = db
    .prepare(
      `INSERT INTO performance_samples (
        query_signature, mode, strategy, domain, latency_ms, rows_returned, partial, executed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      sample.query_signature,
      sample.mode,
      sample.strategy,
      sample.domain,
      sample.latency_ms,
      sample.rows_returned,
      sample.partial ? 1 : 0,
      sample.executed_at
    );
  return Number(result.lastInsertRowid);
}

/**
 * Per-domain latency aggregates for samples executed at or after `since`.
 * Samples without a domain filter are grouped under no domain and skipped.
 */
export function getDomainLatencyStats(db: Database.Database, since: string): DomainLatencyStats[] {
  return db
    .prepare(
      `SELECT domain,
              COUNT(*) AS sample_count,
              AVG(latency_ms) AS mean_latency_ms,
              MAX(latency_ms) AS max_latency_ms
       FROM performance_samples
       WHERE executed_at >= ? AND domain IS NOT NULL
       GROUP BY domain
       ORDER BY domain ASC`
    )
    .all(since) as DomainLatencyStats[];
}

export function listSamples(db: Database.Database, limit = 100): PerformanceSample[] {
  const rows = db
    .prepare('SELECT * FROM performance_samples ORDER BY id DESC LIMIT ?')
    .all(limit) as PerformanceSampleRow[];
  return rows.map(rowToSample);
}

export function countSamples(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS cnt FROM performance_samples').get() as { cnt: number };
  return row.cnt;
}

/**
 * Retention sweep: delete samples executed before `cutoff`
 */
export function deleteSamplesBefore(db: Database.Database, cutoff: string): number {
  return db.prepare('DELETE FROM performance_samples WHERE executed_at < ?').run(cutoff).changes;
}
