/**
 * SQL Schema Definitions for the relational store
 *
 * Tables mirror the engine's entities; FTS5 tables index record titles and
 * previews and full blob bodies.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Database configuration pragmas
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA wal_autocheckpoint = 1000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Engine metadata - one row, holds persisted config overrides
 */
export const CREATE_ENGINE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS engine_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  engine_name TEXT NOT NULL,
  config_json TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

/**
 * Content records - one row per source locator.
 * location_json is the durable pointer; a swap is one UPDATE of this column.
 */
export const CREATE_CONTENT_RECORDS_TABLE = `
CREATE TABLE IF NOT EXISTS content_records (
  id TEXT PRIMARY KEY,
  source_locator TEXT NOT NULL UNIQUE,
  title TEXT,
  author TEXT,
  domain TEXT NOT NULL,
  content_type TEXT NOT NULL,
  declared_size INTEGER NOT NULL CHECK (declared_size >= 0),
  content_hash TEXT NOT NULL,
  content_preview TEXT NOT NULL,
  word_count INTEGER NOT NULL DEFAULT 0,
  semantic_complexity REAL NOT NULL CHECK (semantic_complexity >= 0 AND semantic_complexity <= 1),
  topic_coherence REAL NOT NULL CHECK (topic_coherence >= 0 AND topic_coherence <= 1),
  information_density REAL NOT NULL CHECK (information_density >= 0 AND information_density <= 1),
  query_potential REAL NOT NULL CHECK (query_potential >= 0 AND query_potential <= 1),
  strategy TEXT NOT NULL CHECK (strategy IN ('full_store', 'vector_store', 'hybrid', 'specialized_table', 'metadata_only')),
  policy_version INTEGER NOT NULL,
  -- Latest policy version the optimizer has compared this record against
  policy_checked_version INTEGER NOT NULL DEFAULT 0,
  confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
  status TEXT NOT NULL CHECK (status IN ('pending', 'ready', 'degraded', 'migrating')),
  needs_review INTEGER NOT NULL DEFAULT 0,
  location_json TEXT NOT NULL DEFAULT '{}',
  query_count INTEGER NOT NULL DEFAULT 0,
  last_queried_at TEXT,
  access_frequency REAL NOT NULL DEFAULT 0,
  scrape_count INTEGER NOT NULL DEFAULT 1,
  last_scraped_at TEXT NOT NULL,
  metadata_json TEXT NOT NULL DEFAULT '{}',
  tags_json TEXT NOT NULL DEFAULT '[]',
  keywords_json TEXT NOT NULL DEFAULT '[]',
  annotations_json TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Full content blobs, keyed by content hash. owner_record_id is UNIQUE:
 * one record owns at most one blob.
 */
export const CREATE_CONTENT_BLOBS_TABLE = `
CREATE TABLE IF NOT EXISTS content_blobs (
  content_hash TEXT PRIMARY KEY,
  owner_record_id TEXT NOT NULL UNIQUE,
  body TEXT NOT NULL,
  byte_size INTEGER NOT NULL,
  chunks_json TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY (owner_record_id) REFERENCES content_records(id)
)
`;

/**
 * Vector mappings - one row per upserted point. 'staged' until the batch's
 * completion marker is written.
 */
export const CREATE_VECTOR_MAPPINGS_TABLE = `
CREATE TABLE IF NOT EXISTS vector_mappings (
  point_id TEXT PRIMARY KEY,
  record_id TEXT NOT NULL,
  batch_id TEXT NOT NULL,
  collection TEXT NOT NULL,
  chunk_sequence INTEGER NOT NULL,
  dimensions INTEGER NOT NULL,
  model TEXT NOT NULL,
  word_count INTEGER NOT NULL DEFAULT 0,
  chunk_text TEXT NOT NULL DEFAULT '',
  start_offset INTEGER NOT NULL DEFAULT 0,
  state TEXT NOT NULL CHECK (state IN ('staged', 'committed')),
  created_at TEXT NOT NULL,
  UNIQUE (batch_id, chunk_sequence),
  FOREIGN KEY (record_id) REFERENCES content_records(id)
)
`;

/**
 * Completion markers - written once per batch after every chunk was acknowledged
 */
export const CREATE_COMPLETION_MARKERS_TABLE = `
CREATE TABLE IF NOT EXISTS completion_markers (
  batch_id TEXT PRIMARY KEY,
  record_id TEXT NOT NULL,
  collection TEXT NOT NULL,
  chunk_count INTEGER NOT NULL CHECK (chunk_count >= 0),
  created_at TEXT NOT NULL,
  FOREIGN KEY (record_id) REFERENCES content_records(id)
)
`;

/**
 * Raw text held for records whose legs still need writing (failed leg
 * awaiting reconciliation). Removed once the record is ready.
 */
export const CREATE_CONTENT_SPOOL_TABLE = `
CREATE TABLE IF NOT EXISTS content_spool (
  record_id TEXT PRIMARY KEY,
  content_hash TEXT NOT NULL,
  body TEXT NOT NULL,
  created_at TEXT NOT NULL,
  FOREIGN KEY (record_id) REFERENCES content_records(id)
)
`;

/**
 * Dynamic table descriptors (specialized content tables and query indexes)
 */
export const CREATE_DYNAMIC_TABLES_TABLE = `
CREATE TABLE IF NOT EXISTS dynamic_tables (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL CHECK (kind IN ('content_table', 'query_index')),
  table_name TEXT NOT NULL,
  domain TEXT NOT NULL,
  content_type TEXT,
  version INTEGER NOT NULL CHECK (version >= 1),
  columns_json TEXT NOT NULL DEFAULT '[]',
  indexes_json TEXT NOT NULL DEFAULT '[]',
  statements_json TEXT NOT NULL DEFAULT '[]',
  status TEXT NOT NULL CHECK (status IN ('pending', 'applied', 'failed')),
  row_count INTEGER NOT NULL DEFAULT 0,
  query_count INTEGER NOT NULL DEFAULT 0,
  error_message TEXT,
  created_at TEXT NOT NULL,
  applied_at TEXT,
  UNIQUE (table_name, version)
)
`;

/**
 * Performance samples - append-only
 */
export const CREATE_PERFORMANCE_SAMPLES_TABLE = `
CREATE TABLE IF NOT EXISTS performance_samples (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  query_signature TEXT NOT NULL,
  mode TEXT NOT NULL CHECK (mode IN ('text', 'vector', 'hybrid')),
  strategy TEXT,
  domain TEXT,
  latency_ms REAL NOT NULL CHECK (latency_ms >= 0),
  rows_returned INTEGER NOT NULL DEFAULT 0,
  partial INTEGER NOT NULL DEFAULT 0,
  executed_at TEXT NOT NULL
)
`;

/**
 * Optimization recommendations
 */
export const CREATE_RECOMMENDATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS optimization_recommendations (
  id TEXT PRIMARY KEY,
  type TEXT NOT NULL CHECK (type IN ('add_index', 'migrate_strategy')),
  target TEXT NOT NULL,
  title TEXT NOT NULL,
  description TEXT NOT NULL,
  params_json TEXT NOT NULL DEFAULT '{}',
  estimated_improvement REAL NOT NULL DEFAULT 0,
  confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
  status TEXT NOT NULL CHECK (status IN ('pending', 'applied', 'rejected', 'failed', 'expired')),
  status_reason TEXT,
  -- Set while an apply is in flight; cleared on open
  claimed_at TEXT,
  created_at TEXT NOT NULL,
  resolved_at TEXT
)
`;

/**
 * Reconciliation jobs for failed legs
 */
export const CREATE_RECONCILIATION_JOBS_TABLE = `
CREATE TABLE IF NOT EXISTS reconciliation_jobs (
  id TEXT PRIMARY KEY,
  record_id TEXT NOT NULL,
  leg TEXT NOT NULL CHECK (leg IN ('full', 'vector', 'table')),
  attempts INTEGER NOT NULL DEFAULT 0,
  max_attempts INTEGER NOT NULL CHECK (max_attempts >= 1),
  next_attempt_at TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('pending', 'succeeded', 'fatal')),
  last_error TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  FOREIGN KEY (record_id) REFERENCES content_records(id)
)
`;

/**
 * Deferred deletion of superseded location parts
 */
export const CREATE_GC_QUEUE_TABLE = `
CREATE TABLE IF NOT EXISTS gc_queue (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  kind TEXT NOT NULL CHECK (kind IN ('blob', 'vector_batch', 'table_row')),
  ref TEXT NOT NULL,
  record_id TEXT,
  reason TEXT NOT NULL,
  eligible_at TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('pending', 'done', 'failed')),
  created_at TEXT NOT NULL
)
`;

/**
 * Incidents raised for manual review
 */
export const CREATE_INCIDENTS_TABLE = `
CREATE TABLE IF NOT EXISTS incidents (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL CHECK (kind IN ('reconciliation_exhausted', 'consistency_violation', 'orphan_sweep')),
  record_id TEXT,
  message TEXT NOT NULL,
  details_json TEXT NOT NULL DEFAULT '{}',
  resolved INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
)
`;

/**
 * FTS5 index over record title and preview.
 * External content mode, kept in sync by triggers.
 */
export const CREATE_RECORDS_FTS_TABLE = `
CREATE VIRTUAL TABLE IF NOT EXISTS records_fts USING fts5(
  title,
  content_preview,
  content='content_records',
  content_rowid='rowid',
  tokenize='porter unicode61'
)
`;

export const CREATE_RECORDS_FTS_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS records_fts_ai AFTER INSERT ON content_records BEGIN
    INSERT INTO records_fts(rowid, title, content_preview)
    VALUES (new.rowid, COALESCE(new.title, ''), new.content_preview);
  END`,
  `CREATE TRIGGER IF NOT EXISTS records_fts_ad AFTER DELETE ON content_records BEGIN
    INSERT INTO records_fts(records_fts, rowid, title, content_preview)
    VALUES ('delete', old.rowid, COALESCE(old.title, ''), old.content_preview);
  END`,
  `CREATE TRIGGER IF NOT EXISTS records_fts_au AFTER UPDATE OF title, content_preview ON content_records BEGIN
    INSERT INTO records_fts(records_fts, rowid, title, content_preview)
    VALUES ('delete', old.rowid, COALESCE(old.title, ''), old.content_preview);
    INSERT INTO records_fts(rowid, title, content_preview)
    VALUES (new.rowid, COALESCE(new.title, ''), new.content_preview);
  END`,
] as const;

/**
 * FTS5 index over full blob bodies
 */
export const CREATE_BLOBS_FTS_TABLE = `
CREATE VIRTUAL TABLE IF NOT EXISTS blobs_fts USING fts5(
  body,
  content='content_blobs',
  content_rowid='rowid',
  tokenize='porter unicode61'
)
`;

export const CREATE_BLOBS_FTS_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS blobs_fts_ai AFTER INSERT ON content_blobs BEGIN
    INSERT INTO blobs_fts(rowid, body) VALUES (new.rowid, new.body);
  END`,
  `CREATE TRIGGER IF NOT EXISTS blobs_fts_ad AFTER DELETE ON content_blobs BEGIN
    INSERT INTO blobs_fts(blobs_fts, rowid, body) VALUES ('delete', old.rowid, old.body);
  END`,
] as const;

/**
 * All indexes. The partial unique indexes carry invariants:
 * one pending recommendation per (type, target), one open job per (record, leg).
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_records_domain ON content_records(domain)',
  'CREATE INDEX IF NOT EXISTS idx_records_content_type ON content_records(content_type)',
  'CREATE INDEX IF NOT EXISTS idx_records_status ON content_records(status)',
  'CREATE INDEX IF NOT EXISTS idx_records_strategy ON content_records(strategy)',
  'CREATE INDEX IF NOT EXISTS idx_records_created_at ON content_records(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_records_content_hash ON content_records(content_hash)',
  "CREATE INDEX IF NOT EXISTS idx_records_full_hash ON content_records(json_extract(location_json, '$.full.content_hash'))",

  'CREATE INDEX IF NOT EXISTS idx_vector_mappings_batch ON vector_mappings(batch_id)',
  'CREATE INDEX IF NOT EXISTS idx_vector_mappings_record ON vector_mappings(record_id)',
  'CREATE INDEX IF NOT EXISTS idx_vector_mappings_state ON vector_mappings(state, created_at)',

  'CREATE INDEX IF NOT EXISTS idx_completion_markers_record ON completion_markers(record_id)',

  'CREATE INDEX IF NOT EXISTS idx_dynamic_tables_domain ON dynamic_tables(domain, content_type)',

  'CREATE INDEX IF NOT EXISTS idx_samples_domain_time ON performance_samples(domain, executed_at)',
  'CREATE INDEX IF NOT EXISTS idx_samples_time ON performance_samples(executed_at)',

  "CREATE UNIQUE INDEX IF NOT EXISTS idx_recommendations_pending ON optimization_recommendations(type, target) WHERE status = 'pending'",
  'CREATE INDEX IF NOT EXISTS idx_recommendations_target ON optimization_recommendations(target, status)',

  "CREATE UNIQUE INDEX IF NOT EXISTS idx_reconciliation_open ON reconciliation_jobs(record_id, leg) WHERE status = 'pending'",
  'CREATE INDEX IF NOT EXISTS idx_reconciliation_due ON reconciliation_jobs(status, next_attempt_at)',

  'CREATE INDEX IF NOT EXISTS idx_gc_queue_due ON gc_queue(status, eligible_at)',

  'CREATE INDEX IF NOT EXISTS idx_incidents_record ON incidents(record_id)',
] as const;

/**
 * Every DDL statement in creation order: tables before the indexes and
 * FTS triggers that reference them. Bootstrap and verification both walk
 * this list.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_ENGINE_METADATA_TABLE,
  CREATE_CONTENT_RECORDS_TABLE,
  CREATE_CONTENT_BLOBS_TABLE,
  CREATE_VECTOR_MAPPINGS_TABLE,
  CREATE_COMPLETION_MARKERS_TABLE,
  CREATE_CONTENT_SPOOL_TABLE,
  CREATE_DYNAMIC_TABLES_TABLE,
  CREATE_PERFORMANCE_SAMPLES_TABLE,
  CREATE_RECOMMENDATIONS_TABLE,
  CREATE_RECONCILIATION_JOBS_TABLE,
  CREATE_GC_QUEUE_TABLE,
  CREATE_INCIDENTS_TABLE,
  ...CREATE_INDEXES,
  CREATE_RECORDS_FTS_TABLE,
  ...CREATE_RECORDS_FTS_TRIGGERS,
  CREATE_BLOBS_FTS_TABLE,
  ...CREATE_BLOBS_FTS_TRIGGERS,
];
