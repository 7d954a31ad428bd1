/**
 * Maintenance operations for DatabaseService
 *
 * Reconciliation jobs, the deferred GC queue and incidents.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { StorageLeg } from '../../../models/content-record.js';
import type {
  GcEntry,
  GcKind,
  Incident,
  IncidentKind,
  ReconciliationJob,
  SpooledContent,
} from '../../../models/maintenance.js';
import { GcEntryRow, IncidentRow, ReconciliationJobRow, SpooledContentRow } from './types.js';
import { rowToGcEntry, rowToIncident, rowToReconciliationJob } from './converters.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RECONCILIATION JOBS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Open a reconciliation job for (record, leg) unless one is already pending.
 *
 * @returns the pending job for (record, leg)
 */
export function enqueueReconciliation(
  db: Database.Database,
  recordId: string,
  leg: StorageLeg,
  maxAttempts: number,
  nextAttemptAt: string,
  lastError: string,
  now: string
): ReconciliationJob {
  const open = db.transaction(() => {
    const existing = getOpenJob(db, recordId, leg);
    if (existing) {
      db.prepare('UPDATE reconciliation_jobs SET last_error = ?, updated_at = ? WHERE id = ?').run(
        lastError,
        now,
        existing.id
      );
      return { ...existing, last_error: lastError, updated_at: now };
    }

    const job: ReconciliationJob = {
      id: uuidv4(),
      record_id: recordId,
      leg,
      attempts: 0,
      max_attempts: maxAttempts,
      next_attempt_at: nextAttemptAt,
      status: 'pending',
      last_error: lastError,
      created_at: now,
      updated_at: now,
    };
    db.prepare(
      `INSERT INTO reconciliation_jobs (
        id, record_id, leg, attempts, max_attempts, next_attempt_at, status, last_error,
        created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      job.id,
      job.record_id,
      job.leg,
      job.attempts,
      job.max_attempts,
      job.next_attempt_at,
      job.status,
      job.last_error,
      job.created_at,
      job.updated_at
    );
    return job;
  });
  return open();
}

export function getOpenJob(
  db: Database.Database,
  recordId: string,
  leg: StorageLeg
): ReconciliationJob | null {
  const row = db
    .prepare(
      `SELECT * FROM reconciliation_jobs WHERE record_id = ? AND leg = ? AND status = 'pending'`
    )
    .get(recordId, leg) as ReconciliationJobRow | undefined;
  return row ? rowToReconciliationJob(row) : null;
}

export function getJob(db: Database.Database, id: string): ReconciliationJob | null {
  const row = db.prepare('SELECT * FROM reconciliation_jobs WHERE id = ?').get(id) as
    | ReconciliationJobRow
    | undefined;
  return row ? rowToReconciliationJob(row) : null;
}

export function listJobsForRecord(db: Database.Database, recordId: string): ReconciliationJob[] {
  const rows = db
    .prepare('SELECT * FROM reconciliation_jobs WHERE record_id = ? ORDER BY created_at ASC, id ASC')
    .all(recordId) as ReconciliationJobRow[];
  return rows.map(rowToReconciliationJob);
}

/**
 * Pending jobs due at or before `now`
 */
export function getDueJobs(db: Database.Database, now: string, limit = 100): ReconciliationJob[] {
  const rows = db
    .prepare(
      `SELECT * FROM reconciliation_jobs
       WHERE status = 'pending' AND next_attempt_at <= ?
       ORDER BY next_attempt_at ASC, id ASC LIMIT ?`
    )
    .all(now, limit) as ReconciliationJobRow[];
  return rows.map(rowToReconciliationJob);
}

export function markJobSucceeded(db: Database.Database, id: string, now: string): void {
  db.prepare(
    `UPDATE reconciliation_jobs
     SET status = 'succeeded', attempts = attempts + 1, last_error = NULL, updated_at = ?
     WHERE id = ?`
  ).run(now, id);
}

/**
 * Record a failed attempt. The job turns fatal once attempts reach max_attempts.
 *
 * @returns the updated job
 */
export function recordJobFailure(
  db: Database.Database,
  id: string,
  error: string,
  nextAttemptAt: string,
  now: string
): ReconciliationJob | null {
  db.prepare(
    `UPDATE reconciliation_jobs
     SET attempts = attempts + 1,
         last_error = ?,
         next_attempt_at = ?,
         status = CASE WHEN attempts + 1 >= max_attempts THEN 'fatal' ELSE 'pending' END,
         updated_at = ?
     WHERE id = ? AND status = 'pending'`
  ).run(error, nextAttemptAt, now, id);
  return getJob(db, id);
}

export function countJobsByStatus(db: Database.Database): { pending: number; fatal: number } {
  const row = db
    .prepare(
      `SELECT
         SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) AS pending,
         SUM(CASE WHEN status = 'fatal' THEN 1 ELSE 0 END) AS fatal
       FROM reconciliation_jobs`
    )
    .get() as { pending: number | null; fatal: number | null };
  return { pending: row.pending ?? 0, fatal: row.fatal ?? 0 };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GC QUEUE
// ═══════════════════════════════════════════════════════════════════════════════

export function enqueueGc(
  db: Database.Database,
  entry: { kind: GcKind; ref: string; record_id: string | null; reason: string; eligible_at: string },
  now: string
): number {
  const result = db
    .prepare(
      `INSERT INTO gc_queue (kind, ref, record_id, reason, eligible_at, status, created_at)
       VALUES (?, ?, ?, ?, ?, 'pending', ?)`
    )
    .run(entry.kind, entry.ref, entry.record_id, entry.reason, entry.eligible_at, now);
  return Number(result.lastInsertRowid);
}

export function getDueGcEntries(db: Database.Database, now: string, limit = 100): GcEntry[] {
  const rows = db
    .prepare(
      `SELECT * FROM gc_queue
       WHERE status = 'pending' AND eligible_at <= ?
       ORDER BY eligible_at ASC, id ASC LIMIT ?`
    )
    .all(now, limit) as GcEntryRow[];
  return rows.map(rowToGcEntry);
}

export function listGcEntries(db: Database.Database, recordId: string): GcEntry[] {
  const rows = db
    .prepare('SELECT * FROM gc_queue WHERE record_id = ? ORDER BY id ASC')
    .all(recordId) as GcEntryRow[];
  return rows.map(rowToGcEntry);
}

export function markGcEntry(db: Database.Database, id: number, status: 'done' | 'failed'): void {
  db.prepare('UPDATE gc_queue SET status = ? WHERE id = ?').run(status, id);
}

export function countPendingGc(db: Database.Database): number {
  const row = db.prepare(`SELECT COUNT(*) AS cnt FROM gc_queue WHERE status = 'pending'`).get() as {
    cnt: number;
  };
  return row.cnt;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INCIDENTS
// ═══════════════════════════════════════════════════════════════════════════════

export function insertIncident(
  db: Database.Database,
  kind: IncidentKind,
  recordId: string | null,
  message: string,
  details: Record<string, unknown>,
  now: string
): Incident {
  const incident: Incident = {
    id: uuidv4(),
    kind,
    record_id: recordId,
    message,
    details,
    resolved: false,
    created_at: now,
  };
  db.prepare(
    `INSERT INTO incidents (id, kind, record_id, message, details_json, resolved, created_at)
     VALUES (?, ?, ?, ?, ?, 0, ?)`
  ).run(incident.id, kind, recordId, message, JSON.stringify(details), now);
  return incident;
}

export function listIncidents(db: Database.Database, openOnly = true): Incident[] {
  const rows = db
    .prepare(
      `SELECT * FROM incidents ${openOnly ? 'WHERE resolved = 0' : ''} ORDER BY created_at ASC, id ASC`
    )
    .all() as IncidentRow[];
  return rows.map(rowToIncident);
}

export function resolveIncident(db: Database.Database, id: string): boolean {
  return db.prepare('UPDATE incidents SET resolved = 1 WHERE id = ?').run(id).changes === 1;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT SPOOL
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Keep the raw text of a record until its outstanding legs are written.
 * A later spool for the same record replaces the earlier one.
 */
export function spoolContent(
  db: Database.Database,
  recordId: string,
  contentHash: string,
  body: string,
  now: string
): void {
  db.prepare(
    `INSERT INTO content_spool (record_id, content_hash, body, created_at)
     VALUES (?, ?, ?, ?)
     ON CONFLICT(record_id) DO UPDATE SET content_hash = excluded.content_hash, body = excluded.body`
  ).run(recordId, contentHash, body, now);
}

export function getSpooledContent(db: Database.Database, recordId: string): SpooledContent | null {
  const row = db.prepare('SELECT * FROM content_spool WHERE record_id = ?').get(recordId) as
    | SpooledContentRow
    | undefined;
  return row ?? null;
}

export function deleteSpooledContent(db: Database.Database, recordId: string): boolean {
  return db.prepare('DELETE FROM content_spool WHERE record_id = ?').run(recordId).changes === 1;
}
