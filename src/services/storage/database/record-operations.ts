/**
 * Content record operations for DatabaseService
 *
 * Insert, lookup, status and pointer updates, access statistics and
 * annotation writes for content_records.
 */

import Database from 'better-sqlite3';
import type {
  ContentRecord,
  LocationPointer,
  RecordStatus,
  StorageStrategy,
} from '../../../models/content-record.js';
import { DuplicateContentError } from '../../../engine/errors.js';
import { ContentRecordRow, DatabaseError, DatabaseErrorCode, ListRecordsOptions } from './types.js';
import { isUniqueViolation } from './helpers.js';
import { rowToContentRecord, serializeLocation } from './converters.js';

/**
 * Fields supplied when a record is first created
 */
export type NewContentRecord = Omit<
  ContentRecord,
  | 'query_count'
  | 'last_queried_at'
  | 'access_frequency'
  | 'scrape_count'
  | 'needs_review'
  | 'annotations'
  | 'updated_at'
>;

/**
 * Insert a new content record.
 *
 * @throws DuplicateContentError if the source locator is already stored
 */
export function insertRecord(db: Database.Database, record: NewContentRecord): string {
  const stmt = db.prepare(`
    INSERT INTO content_records (
      id, source_locator, title, author, domain, content_type, declared_size,
      content_hash, content_preview, word_count,
      semantic_complexity, topic_coherence, information_density, query_potential,
      strategy, policy_version, confidence, status, needs_review, location_json,
      scrape_count, last_scraped_at, metadata_json, tags_json, keywords_json,
      annotations_json, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?, 1, ?, ?, ?, ?, '{}', ?, ?)
  `);

  try {
    stmt.run(
      record.id,
      record.source_locator,
      record.title,
      record.author,
      record.domain,
      record.content_type,
      record.declared_size,
      record.content_hash,
      record.content_preview,
      record.word_count,
      record.profile.semantic_complexity,
      record.profile.topic_coherence,
      record.profile.information_density,
      record.profile.query_potential,
      record.strategy,
      record.policy_version,
      record.confidence,
      record.status,
      serializeLocation(record.location),
      record.last_scraped_at,
      JSON.stringify(record.metadata),
      JSON.stringify(record.tags),
      JSON.stringify(record.keywords),
      record.created_at,
      record.created_at
    );
  } catch (error) {
    if (isUniqueViolation(error, 'content_records.source_locator')) {
      const existing = getRecordByLocator(db, record.source_locator);
      throw new DuplicateContentError(record.source_locator, existing?.id ?? 'unknown');
    }
    throw error;
  }

  return record.id;
}

/**
 * Replace the content fields of a record left pending by an interrupted
 * ingestion. Returns false when the record is no longer pending.
 */
export function restagePendingRecord(db: Database.Database, record: NewContentRecord): boolean {
  const result = db
    .prepare(
      `UPDATE content_records
       SET title = ?, author = ?, domain = ?, content_type = ?, declared_size = ?,
           content_hash = ?, content_preview = ?, word_count = ?,
           semantic_complexity = ?, topic_coherence = ?, information_density = ?, query_potential = ?,
           strategy = ?, policy_version = ?, confidence = ?, location_json = ?,
           scrape_count = scrape_count + 1, last_scraped_at = ?,
           metadata_json = ?, tags_json = ?, keywords_json = ?, updated_at = ?
       WHERE id = ? AND status = 'pending'`
    )
    .run(
      record.title,
      record.author,
      record.domain,
      record.content_type,
      record.declared_size,
      record.content_hash,
      record.content_preview,
      record.word_count,
      record.profile.semantic_complexity,
      record.profile.topic_coherence,
      record.profile.information_density,
      record.profile.query_potential,
      record.strategy,
      record.policy_version,
      record.confidence,
      serializeLocation(record.location),
      record.last_scraped_at,
      JSON.stringify(record.metadata),
      JSON.stringify(record.tags),
      JSON.stringify(record.keywords),
      record.last_scraped_at,
      record.id
    );
  return result.changes === 1;
}

export function getRecord(db: Database.Database, id: string): ContentRecord | null {
  const row = db.prepare('SELECT * FROM content_records WHERE id = ?').get(id) as
    | ContentRecordRow
    | undefined;
  return row ? rowToContentRecord(row) : null;
}

export function getRecordByLocator(
  db: Database.Database,
  sourceLocator: string
): ContentRecord | null {
  const row = db
    .prepare('SELECT * FROM content_records WHERE source_locator = ?')
    .get(sourceLocator) as ContentRecordRow | undefined;
  return row ? rowToContentRecord(row) : null;
}

/**
 * Fetch many records by id, preserving no particular order
 */
export function getRecordsByIds(db: Database.Database, ids: string[]): ContentRecord[] {
  if (ids.length === 0) return [];
  const results: ContentRecord[] = [];
  // SQLite's default variable limit is 999 in older builds
  for (let i = 0; i < ids.length; i += 500) {
    const slice = ids.slice(i, i + 500);
    const placeholders = slice.map(() => '?').join(', ');
    const rows = db
      .prepare(`SELECT * FROM content_records WHERE id IN (${placeholders})`)
      .all(...slice) as ContentRecordRow[];
    for (const row of rows) results.push(rowToContentRecord(row));
  }
  return results;
}

export function listRecords(
  db: Database.Database,
  options: ListRecordsOptions = {}
): ContentRecord[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options.status) {
    conditions.push('status = ?');
    params.push(options.status);
  }
  if (options.strategy) {
    conditions.push('strategy = ?');
    params.push(options.strategy);
  }
  if (options.domain) {
    conditions.push('domain = ?');
    params.push(options.domain);
  }
  if (options.needsReview !== undefined) {
    conditions.push('needs_review = ?');
    params.push(options.needsReview ? 1 : 0);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const limit = options.limit ?? 100;
  const offset = options.offset ?? 0;

  const rows = db
    .prepare(
      `SELECT * FROM content_records ${where} ORDER BY created_at ASC, id ASC LIMIT ? OFFSET ?`
    )
    .all(...params, limit, offset) as ContentRecordRow[];
  return rows.map(rowToContentRecord);
}

/**
 * Update status (and optionally the pointer) of a record.
 *
 * @throws DatabaseError RECORD_NOT_FOUND if the record doesn't exist
 */
export function updateRecordState(
  db: Database.Database,
  id: string,
  status: RecordStatus,
  now: string,
  location?: LocationPointer
): void {
  const result =
    location === undefined
      ? db
          .prepare('UPDATE content_records SET status = ?, updated_at = ? WHERE id = ?')
          .run(status, now, id)
      : db
          .prepare(
            'UPDATE content_records SET status = ?, location_json = ?, updated_at = ? WHERE id = ?'
          )
          .run(status, serializeLocation(location), now, id);

  if (result.changes === 0) {
    throw new DatabaseError(`Content record ${id} not found`, DatabaseErrorCode.RECORD_NOT_FOUND);
  }
}

/**
 * Atomically replace the pointer (and placement) only if the stored pointer
 * still equals `expected`. Returns false when another writer got there first.
 */
export function compareAndSwapLocation(
  db: Database.Database,
  id: string,
  expected: LocationPointer,
  next: {
    location: LocationPointer;
    status: RecordStatus;
    strategy: StorageStrategy;
    policy_version: number;
    confidence: number;
  },
  now: string
): boolean {
  const result = db
    .prepare(
      `UPDATE content_records
       SET location_json = ?, status = ?, strategy = ?, policy_version = ?, confidence = ?,
           updated_at = ?
       WHERE id = ? AND location_json = ?`
    )
    .run(
      serializeLocation(next.location),
      next.status,
      next.strategy,
      next.policy_version,
      next.confidence,
      now,
      id,
      serializeLocation(expected)
    );
  return result.changes === 1;
}

export function setNeedsReview(
  db: Database.Database,
  id: string,
  needsReview: boolean,
  now: string
): void {
  db.prepare('UPDATE content_records SET needs_review = ?, updated_at = ? WHERE id = ?').run(
    needsReview ? 1 : 0,
    now,
    id
  );
}

/**
 * Merge a re-scrape of an existing source into its record: bump the scrape
 * counter and timestamp, union tags and keywords, shallow-merge metadata.
 */
export function mergeRescrape(
  db: Database.Database,
  id: string,
  patch: { metadata: Record<string, unknown>; tags: string[]; keywords: string[] },
  now: string
): ContentRecord {
  const existing = getRecord(db, id);
  if (!existing) {
    throw new DatabaseError(`Content record ${id} not found`, DatabaseErrorCode.RECORD_NOT_FOUND);
  }

  const tags = [...new Set([...existing.tags, ...patch.tags])];
  const keywords = [...new Set([...existing.keywords, ...patch.keywords])];
  const metadata = { ...existing.metadata, ...patch.metadata };

  db.prepare(
    `UPDATE content_records
     SET scrape_count = scrape_count + 1, last_scraped_at = ?, metadata_json = ?,
         tags_json = ?, keywords_json = ?, updated_at = ?
     WHERE id = ?`
  ).run(now, JSON.stringify(metadata), JSON.stringify(tags), JSON.stringify(keywords), now, id);

  const updated = getRecord(db, id);
  if (!updated) {
    throw new DatabaseError(`Content record ${id} vanished during merge`, DatabaseErrorCode.RECORD_NOT_FOUND);
  }
  return updated;
}

/**
 * Relaxed access-statistics increment. Each id is bumped with a single
 * UPDATE, so concurrent queries may interleave but never lose a row update.
 * access_frequency is queries per day since the record was created.
 */
export function recordAccess(db: Database.Database, ids: string[], now: string): void {
  if (ids.length === 0) return;
  const stmt = db.prepare(
    `UPDATE content_records
     SET query_count = query_count + 1,
         last_queried_at = ?,
         access_frequency = (query_count + 1) / MAX(1.0, julianday(?) - julianday(created_at))
     WHERE id = ?`
  );
  for (const id of ids) {
    stmt.run(now, now, id);
  }
}

/**
 * Store an analysis annotation under the agent's key. Never touches
 * placement or pointer columns.
 */
export function writeAnnotation(
  db: Database.Database,
  id: string,
  agent: string,
  payload: Record<string, unknown>,
  now: string
): void {
  const result = db
    .prepare(
      `UPDATE content_records
       SET annotations_json = json_set(annotations_json, ?, json(?)), updated_at = ?
       WHERE id = ?`
    )
    .run(`$."${agent.replace(/"/g, '')}"`, JSON.stringify({ ...payload, written_at: now }), now, id);

  if (result.changes === 0) {
    throw new DatabaseError(`Content record ${id} not found`, DatabaseErrorCode.RECORD_NOT_FOUND);
  }
}

/**
 * Records whose current pointer references the blob with `contentHash`
 */
export function findRecordIdsReferencingBlob(db: Database.Database, contentHash: string): string[] {
  const rows = db
    .prepare(
      `SELECT id FROM content_records
       WHERE json_extract(location_json, '$.full.content_hash') = ?
       ORDER BY created_at ASC, id ASC`
    )
    .all(contentHash) as Array<{ id: string }>;
  return rows.map((r) => r.id);
}

/**
 * Ready records placed under a policy version older than `policyVersion`
 * that have not yet been compared against it
 */
export function listRecordsBelowPolicyVersion(
  db: Database.Database,
  policyVersion: number,
  limit: number
): ContentRecord[] {
  const rows = db
    .prepare(
      `SELECT * FROM content_records
       WHERE policy_version < ? AND policy_checked_version < ? AND status = 'ready'
       ORDER BY created_at ASC, id ASC LIMIT ?`
    )
    .all(policyVersion, policyVersion, limit) as ContentRecordRow[];
  return rows.map(rowToContentRecord);
}

/**
 * Stamp records as compared against `policyVersion`, so the next listing
 * moves on to records not yet compared.
 */
export function markPolicyChecked(db: Database.Database, ids: string[], policyVersion: number): void {
  if (ids.length === 0) return;
  const stmt = db.prepare('UPDATE content_records SET policy_checked_version = ? WHERE id = ?');
  db.transaction(() => {
    for (const id of ids) stmt.run(policyVersion, id);
  })();
}

/**
 * full_store records whose declared size exceeds `minBytes`
 */
export function listLargeFullStoreRecords(
  db: Database.Database,
  minBytes: number,
  limit: number
): ContentRecord[] {
  const rows = db
    .prepare(
      `SELECT * FROM content_records
       WHERE strategy = 'full_store' AND status = 'ready' AND declared_size > ?
       ORDER BY declared_size DESC, id ASC LIMIT ?`
    )
    .all(minBytes, limit) as ContentRecordRow[];
  return rows.map(rowToContentRecord);
}
