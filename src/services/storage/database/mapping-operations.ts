/**
 * Vector mapping and completion marker operations for DatabaseService
 *
 * Mappings are inserted 'staged' before their points are upserted. The
 * completion marker and the flip to 'committed' happen in one transaction,
 * only after every chunk of the batch was acknowledged.
 */

import Database from 'better-sqlite3';
import type { CompletionMarker, VectorMapping } from '../../../models/storage.js';
import { CompletionMarkerRow, VectorMappingRow } from './types.js';
import { runWithForeignKeyCheck } from './helpers.js';
import { rowToCompletionMarker, rowToVectorMapping } from './converters.js';

/**
 * Insert staged mappings for a batch (all or nothing)
 */
export function insertStagedMappings(
  db: Database.Database,
  mappings: Omit<VectorMapping, 'state'>[]
): number {
  if (mappings.length === 0) return 0;

  const stmt = db.prepare(`
    INSERT INTO vector_mappings (
      point_id, record_id, batch_id, collection, chunk_sequence, dimensions,
      model, word_count, chunk_text, start_offset, state, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'staged', ?)
  `);

  const insertAll = db.transaction((batch: Omit<VectorMapping, 'state'>[]) => {
    for (const m of batch) {
      runWithForeignKeyCheck(
        stmt,
        [
          m.point_id,
          m.record_id,
          m.batch_id,
          m.collection,
          m.chunk_sequence,
          m.dimensions,
          m.model,
          m.word_count,
          m.chunk_text,
          m.start_offset,
          m.created_at,
        ],
        `inserting vector mapping: record "${m.record_id}" does not exist`
      );
    }
    return batch.length;
  });

  return insertAll(mappings);
}

/**
 * Write the completion marker and commit the batch's mappings atomically.
 * Idempotent: an existing marker for the batch is left as is.
 *
 * @returns number of mappings flipped to committed
 */
export function commitBatch(db: Database.Database, marker: CompletionMarker): number {
  const commit = db.transaction(() => {
    db.prepare(
      `INSERT INTO completion_markers (batch_id, record_id, collection, chunk_count, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(batch_id) DO NOTHING`
    ).run(marker.batch_id, marker.record_id, marker.collection, marker.chunk_count, marker.created_at);

    return db
      .prepare(`UPDATE vector_mappings SET state = 'committed' WHERE batch_id = ? AND state = 'staged'`)
      .run(marker.batch_id).changes;
  });
  return commit();
}

export function getMarker(db: Database.Database, batchId: string): CompletionMarker | null {
  const row = db.prepare('SELECT * FROM completion_markers WHERE batch_id = ?').get(batchId) as
    | CompletionMarkerRow
    | undefined;
  return row ? rowToCompletionMarker(row) : null;
}

export function listMarkersForRecord(db: Database.Database, recordId: string): CompletionMarker[] {
  const rows = db
    .prepare('SELECT * FROM completion_markers WHERE record_id = ? ORDER BY created_at ASC')
    .all(recordId) as CompletionMarkerRow[];
  return rows.map(rowToCompletionMarker);
}

export function getMappingsForBatch(db: Database.Database, batchId: string): VectorMapping[] {
  const rows = db
    .prepare('SELECT * FROM vector_mappings WHERE batch_id = ? ORDER BY chunk_sequence ASC')
    .all(batchId) as VectorMappingRow[];
  return rows.map(rowToVectorMapping);
}

export function countCommittedMappings(db: Database.Database, batchId: string): number {
  const row = db
    .prepare(
      `SELECT COUNT(*) AS cnt FROM vector_mappings WHERE batch_id = ? AND state = 'committed'`
    )
    .get(batchId) as { cnt: number };
  return row.cnt;
}

/**
 * Remove a batch's mappings and marker
 */
export function deleteBatch(db: Database.Database, batchId: string): number {
  const remove = db.transaction(() => {
    const removed = db.prepare('DELETE FROM vector_mappings WHERE batch_id = ?').run(batchId).changes;
    db.prepare('DELETE FROM completion_markers WHERE batch_id = ?').run(batchId);
    return removed;
  });
  return remove();
}

/**
 * Batches that have staged mappings, no completion marker, and whose newest
 * mapping is older than `olderThan`.
 */
export function findOrphanBatches(
  db: Database.Database,
  olderThan: string
): Array<{ batch_id: string; record_id: string; collection: string; point_ids: string[] }> {
  const rows = db
    .prepare(
      `SELECT m.batch_id, m.record_id, m.collection, m.point_id
       FROM vector_mappings m
       WHERE m.state = 'staged'
         AND NOT EXISTS (SELECT 1 FROM completion_markers c WHERE c.batch_id = m.batch_id)
         AND m.batch_id IN (
           SELECT batch_id FROM vector_mappings
           GROUP BY batch_id
           HAVING MAX(created_at) < ?
         )
       ORDER BY m.batch_id, m.chunk_sequence`
    )
    .all(olderThan) as Array<{
    batch_id: string;
    record_id: string;
    collection: string;
    point_id: string;
  }>;

  const batches = new Map<
    string,
    { batch_id: string; record_id: string; collection: string; point_ids: string[] }
  >();
  for (const row of rows) {
    let entry = batches.get(row.batch_id);
    if (!entry) {
      entry = {
        batch_id: row.batch_id,
        record_id: row.record_id,
        collection: row.collection,
        point_ids: [],
      };
      batches.set(row.batch_id, entry);
    }
    entry.point_ids.push(row.point_id);
  }
  return [...batches.values()];
}

/**
 * Committed mappings for a set of point ids (query-time visibility filter)
 */
export function getCommittedMappingsByPointIds(
  db: Database.Database,
  pointIds: string[]
): VectorMapping[] {
  if (pointIds.length === 0) return [];
  const results: VectorMapping[] = [];
  for (let i = 0; i < pointIds.length; i += 500) {
    const slice = pointIds.slice(i, i + 500);
    const placeholders = slice.map(() => '?').join(', ');
    const rows = db
      .prepare(
        `SELECT * FROM vector_mappings WHERE state = 'committed' AND point_id IN (${placeholders})`
      )
      .all(...slice) as VectorMappingRow[];
    for (const row of rows) results.push(rowToVectorMapping(row));
  }
  return results;
}

/**
 * Count of batches with staged mappings and no marker (health reporting)
 */
export function countPendingBatches(db: Database.Database): number {
  const row = db
    .prepare(
      `SELECT COUNT(DISTINCT batch_id) AS cnt FROM vector_mappings m
       WHERE state = 'staged'
         AND NOT EXISTS (SELECT 1 FROM completion_markers c WHERE c.batch_id = m.batch_id)`
    )
    .get() as { cnt: number };
  return row.cnt;
}
