/**
 * Full-content blob operations for DatabaseService
 *
 * Blobs are keyed by content hash. Inserts are idempotent, so a retried or
 * repeated write of the same content is a no-op.
 */

import Database from 'better-sqlite3';
import type { FullContentBlob } from '../../../models/storage.js';
import { ContentBlobRow } from './types.js';
import { runWithForeignKeyCheck } from './helpers.js';
import { rowToBlob } from './converters.js';

/**
 * Insert a blob unless one with the same hash (or the same owner) exists.
 *
 * @returns true when a new row was written
 */
export function insertBlob(
  db: Database.Database,
  blob: Omit<FullContentBlob, 'byte_size'>
): boolean {
  const stmt = db.prepare(`
    INSERT INTO content_blobs (content_hash, owner_record_id, body, byte_size, chunks_json, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT DO NOTHING
  `);
  const result = runWithForeignKeyCheck(
    stmt,
    [
      blob.content_hash,
      blob.owner_record_id,
      blob.body,
      Buffer.byteLength(blob.body, 'utf8'),
      blob.chunks === null ? null : JSON.stringify(blob.chunks),
      blob.created_at,
    ],
    `inserting blob: owner record "${blob.owner_record_id}" does not exist`
  );
  return result.changes === 1;
}

export function getBlob(db: Database.Database, contentHash: string): FullContentBlob | null {
  const row = db.prepare('SELECT * FROM content_blobs WHERE content_hash = ?').get(contentHash) as
    | ContentBlobRow
    | undefined;
  return row ? rowToBlob(row) : null;
}

export function blobExists(db: Database.Database, contentHash: string): boolean {
  return db.prepare('SELECT 1 FROM content_blobs WHERE content_hash = ?').get(contentHash) !== undefined;
}

/**
 * Hand ownership of a blob to another record that references it
 */
export function reassignBlobOwner(
  db: Database.Database,
  contentHash: string,
  recordId: string
): void {
  db.prepare('UPDATE content_blobs SET owner_record_id = ? WHERE content_hash = ?').run(
    recordId,
    contentHash
  );
}

/**
 * @returns true when a row was deleted
 */
export function deleteBlob(db: Database.Database, contentHash: string): boolean {
  return db.prepare('DELETE FROM content_blobs WHERE content_hash = ?').run(contentHash).changes === 1;
}
