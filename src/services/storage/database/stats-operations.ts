/**
 * Statistics operations for DatabaseService
 */

import Database from 'better-sqlite3';
import type { RecordStatus, StorageStrategy } from '../../../models/content-record.js';

export interface RecordStats {
  total_records: number;
  by_status: Record<RecordStatus, number>;
  by_strategy: Record<StorageStrategy, number>;
  needs_review: number;
  total_blobs: number;
  blob_bytes: number;
  committed_batches: number;
}

export function getRecordStats(db: Database.Database): RecordStats {
  const statusRows = db
    .prepare('SELECT status, COUNT(*) AS cnt FROM content_records GROUP BY status')
    .all() as Array<{ status: string; cnt: number }>;
  const strategyRows = db
    .prepare('SELECT strategy, COUNT(*) AS cnt FROM content_records GROUP BY strategy')
    .all() as Array<{ strategy: string; cnt: number }>;

  const statusCount = (status: RecordStatus): number =>
    statusRows.find((r) => r.status === status)?.cnt ?? 0;
  const strategyCount = (strategy: StorageStrategy): number =>
    strategyRows.find((r) => r.strategy === strategy)?.cnt ?? 0;

  const by_status: Record<RecordStatus, number> = {
    pending: statusCount('pending'),
    ready: statusCount('ready'),
    degraded: statusCount('degraded'),
    migrating: statusCount('migrating'),
  };
  const by_strategy: Record<StorageStrategy, number> = {
    full_store: strategyCount('full_store'),
    vector_store: strategyCount('vector_store'),
    hybrid: strategyCount('hybrid'),
    specialized_table: strategyCount('specialized_table'),
    metadata_only: strategyCount('metadata_only'),
  };

  const totals = db
    .prepare(
      `SELECT
         (SELECT COUNT(*) FROM content_records) AS total_records,
         (SELECT COUNT(*) FROM content_records WHERE needs_review = 1) AS needs_review,
         (SELECT COUNT(*) FROM content_blobs) AS total_blobs,
         (SELECT COALESCE(SUM(byte_size), 0) FROM content_blobs) AS blob_bytes,
         (SELECT COUNT(*) FROM completion_markers) AS committed_batches`
    )
    .get() as {
    total_records: number;
    needs_review: number;
    total_blobs: number;
    blob_bytes: number;
    committed_batches: number;
  };

  return { ...totals, by_status, by_strategy };
}
