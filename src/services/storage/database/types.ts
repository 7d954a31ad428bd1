/**
 * Type definitions for DatabaseService
 *
 * Contains error codes, row types and option interfaces used by the
 * database operation modules.
 */

import type { RecordStatus, StorageStrategy } from '../../../models/content-record.js';

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  RECORD_NOT_FOUND = 'RECORD_NOT_FOUND',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
  CORRUPT_ROW = 'CORRUPT_ROW',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Options for listing content records
 */
export interface ListRecordsOptions {
  status?: RecordStatus;
  strategy?: StorageStrategy;
  domain?: string;
  needsReview?: boolean;
  limit?: number;
  offset?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROW TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ContentRecordRow {
  id: string;
  source_locator: string;
  title: string | null;
  author: string | null;
  domain: string;
  content_type: string;
  declared_size: number;
  content_hash: string;
  content_preview: string;
  word_count: number;
  semantic_complexity: number;
  topic_coherence: number;
  information_density: number;
  query_potential: number;
  strategy: string;
  policy_version: number;
  confidence: number;
  status: string;
  needs_review: number;
  location_json: string;
  query_count: number;
  last_queried_at: string | null;
  access_frequency: number;
  scrape_count: number;
  last_scraped_at: string;
  metadata_json: string;
  tags_json: string;
  keywords_json: string;
  annotations_json: string;
  created_at: string;
  updated_at: string;
}

export interface ContentBlobRow {
  content_hash: string;
  owner_record_id: string;
  body: string;
  byte_size: number;
  chunks_json: string | null;
  created_at: string;
}

export interface VectorMappingRow {
  point_id: string;
  record_id: string;
  batch_id: string;
  collection: string;
  chunk_sequence: number;
  dimensions: number;
  model: string;
  word_count: number;
  chunk_text: string;
  start_offset: number;
  state: string;
  created_at: string;
}

export interface CompletionMarkerRow {
  batch_id: string;
  record_id: string;
  collection: string;
  chunk_count: number;
  created_at: string;
}

export interface DynamicTableRow {
  id: string;
  kind: string;
  table_name: string;
  domain: string;
  content_type: string | null;
  version: number;
  columns_json: string;
  indexes_json: string;
  statements_json: string;
  status: string;
  row_count: number;
  query_count: number;
  error_message: string | null;
  created_at: string;
  applied_at: string | null;
}

export interface PerformanceSampleRow {
  id: number;
  query_signature: string;
  mode: string;
  strategy: string | null;
  domain: string | null;
  latency_ms: number;
  rows_returned: number;
  partial: number;
  executed_at: string;
}

export interface RecommendationRow {
  id: string;
  type: string;
  target: string;
  title: string;
  description: string;
  params_json: string;
  estimated_improvement: number;
  confidence: number;
  status: string;
  status_reason: string | null;
  created_at: string;
  resolved_at: string | null;
}

export interface ReconciliationJobRow {
  id: string;
  record_id: string;
  leg: string;
  attempts: number;
  max_attempts: number;
  next_attempt_at: string;
  status: string;
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

export interface GcEntryRow {
  id: number;
  kind: string;
  ref: string;
  record_id: string | null;
  reason: string;
  eligible_at: string;
  status: string;
  created_at: string;
}

export interface IncidentRow {
  id: string;
  kind: string;
  record_id: string | null;
  message: string;
  details_json: string;
  resolved: number;
  created_at: string;
}

export interface SpooledContentRow {
  record_id: string;
  content_hash: string;
  body: string;
  created_at: string;
}
