/**
 * Optimization recommendation operations for DatabaseService
 */

import Database from 'better-sqlite3';
import type {
  OptimizationRecommendation,
  RecommendationStatus,
} from '../../../models/performance.js';
import { RecommendationRow } from './types.js';
import { rowToRecommendation } from './converters.js';

const RECOMMENDATION_STATUSES: readonly RecommendationStatus[] = [
  'pending',
  'applied',
  'rejected',
  'failed',
  'expired',
];

export function insertRecommendation(
  db: Database.Database,
  rec: OptimizationRecommendation
): void {
  db.prepare(
    `INSERT INTO optimization_recommendations (
      id, type, target, title, description, params_json, estimated_improvement,
      confidence, status, status_reason, created_at, resolved_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    rec.id,
    rec.type,
    rec.target,
    rec.title,
    rec.description,
    JSON.stringify(rec.params),
    rec.estimated_improvement,
    rec.confidence,
    rec.status,
    rec.status_reason,
    rec.created_at,
    rec.resolved_at
  );
}

export function getRecommendation(
  db: Database.Database,
  id: string
): OptimizationRecommendation | null {
  const row = db.prepare('SELECT * FROM optimization_recommendations WHERE id = ?').get(id) as
    | RecommendationRow
    | undefined;
  return row ? rowToRecommendation(row) : null;
}

export function listRecommendations(
  db: Database.Database,
  status?: RecommendationStatus
): OptimizationRecommendation[] {
  const rows = (
    status
      ? db
          .prepare(
            'SELECT * FROM optimization_recommendations WHERE status = ? ORDER BY created_at ASC, id ASC'
          )
          .all(status)
      : db
          .prepare('SELECT * FROM optimization_recommendations ORDER BY created_at ASC, id ASC')
          .all()
  ) as RecommendationRow[];
  return rows.map(rowToRecommendation);
}

/**
 * Pending recommendations on a target, of any type
 */
export function findPendingForTarget(
  db: Database.Database,
  target: string
): OptimizationRecommendation[] {
  const rows = db
    .prepare(
      `SELECT * FROM optimization_recommendations
       WHERE target = ? AND status = 'pending'
       ORDER BY created_at ASC, id ASC`
    )
    .all(target) as RecommendationRow[];
  return rows.map(rowToRecommendation);
}

/**
 * Claim a pending recommendation for applying. Only one caller can hold
 * the claim; returns false when it is taken or the recommendation is no
 * longer pending.
 */
export function claimRecommendation(db: Database.Database, id: string, now: string): boolean {
  return (
    db
      .prepare(
        `UPDATE optimization_recommendations SET claimed_at = ?
         WHERE id = ? AND status = 'pending' AND claimed_at IS NULL`
      )
      .run(now, id).changes === 1
  );
}

/**
 * Drop claims left by a process that stopped mid-apply
 *
 * @returns number of claims released
 */
export function releaseRecommendationClaims(db: Database.Database): number {
  return db
    .prepare(
      `UPDATE optimization_recommendations SET claimed_at = NULL
       WHERE status = 'pending' AND claimed_at IS NOT NULL`
    )
    .run().changes;
}

/**
 * Move a recommendation out of 'pending'. Returns false if it was no longer
 * pending (someone else resolved it).
 */
export function resolveRecommendation(
  db: Database.Database,
  id: string,
  status: Exclude<RecommendationStatus, 'pending'>,
  reason: string | null,
  now: string
): boolean {
  const result = db
    .prepare(
      `UPDATE optimization_recommendations
       SET status = ?, status_reason = ?, resolved_at = ?, claimed_at = NULL
       WHERE id = ? AND status = 'pending'`
    )
    .run(status, reason, now, id);
  return result.changes === 1;
}

/**
 * Expire unclaimed pending recommendations created before `cutoff`
 */
export function expirePendingBefore(db: Database.Database, cutoff: string, now: string): number {
  return db
    .prepare(
      `UPDATE optimization_recommendations
       SET status = 'expired', status_reason = 'not applied within retention window', resolved_at = ?
       WHERE status = 'pending' AND claimed_at IS NULL AND created_at < ?`
    )
    .run(now, cutoff).changes;
}

export function countRecommendationsByStatus(
  db: Database.Database
): Record<RecommendationStatus, number> {
  const counts: Record<RecommendationStatus, number> = {
    pending: 0,
    applied: 0,
    rejected: 0,
    failed: 0,
    expired: 0,
  };
  const rows = db
    .prepare('SELECT status, COUNT(*) AS cnt FROM optimization_recommendations GROUP BY status')
    .all() as Array<{ status: string; cnt: number }>;
  for (const status of RECOMMENDATION_STATUSES) {
    counts[status] = rows.find((r) => r.status === status)?.cnt ?? 0;
  }
  return counts;
}
