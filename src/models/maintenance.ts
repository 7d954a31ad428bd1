/**
 * Background maintenance rows: reconciliation jobs, deferred garbage
 * collection and incidents raised for manual review.
 */

import type { StorageLeg } from './content-record.js';

export type ReconciliationStatus = 'pending' | 'succeeded' | 'fatal';

export interface ReconciliationJob {
  id: string;
  record_id: string;
  leg: StorageLeg;
  attempts: number;
  max_attempts: number;
  next_attempt_at: string;
  status: ReconciliationStatus;
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

export type GcKind = 'blob' | 'vector_batch' | 'table_row';

export type GcStatus = 'pending' | 'done' | 'failed';

export interface GcEntry {
  id: number;
  kind: GcKind;
  /** blob: content hash; vector_batch: batch id; table_row: '<table>:<rowid>' */
  ref: string;
  record_id: string | null;
  reason: string;
  eligible_at: string;
  status: GcStatus;
  created_at: string;
}

export type IncidentKind = 'reconciliation_exhausted' | 'consistency_violation' | 'orphan_sweep';

export interface Incident {
  id: string;
  kind: IncidentKind;
  record_id: string | null;
  message: string;
  details: Record<string, unknown>;
  resolved: boolean;
  created_at: string;
}

/**
 * Raw text retained while a record still has legs to write
 */
export interface SpooledContent {
  record_id: string;
  content_hash: string;
  body: string;
  created_at: string;
}
