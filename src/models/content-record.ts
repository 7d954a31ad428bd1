/**
 * Content record interfaces
 *
 * A ContentRecord is the logical identity of one ingested item. It is
 * created once per source locator and then mutated (status, pointer, stats)
 * for the rest of its life; it is never duplicated.
 */

/**
 * Storage strategy chosen by the placement policy
 */
export type StorageStrategy =
  | 'full_store'
  | 'vector_store'
  | 'hybrid'
  | 'specialized_table'
  | 'metadata_only';

export const STORAGE_STRATEGIES: readonly StorageStrategy[] = [
  'full_store',
  'vector_store',
  'hybrid',
  'specialized_table',
  'metadata_only',
] as const;

/**
 * Fixed cost order used to break ties at policy thresholds (lower is cheaper)
 */
export const STRATEGY_COST: Readonly<Record<StorageStrategy, number>> = {
  metadata_only: 0,
  full_store: 1,
  vector_store: 2,
  specialized_table: 3,
  hybrid: 4,
};

/**
 * Record lifecycle status
 *
 * pending -> ready | degraded; ready -> migrating -> ready; degraded -> ready
 */
export type RecordStatus = 'pending' | 'ready' | 'degraded' | 'migrating';

export const RECORD_STATUSES: readonly RecordStatus[] = [
  'pending',
  'ready',
  'degraded',
  'migrating',
] as const;

/**
 * One physical part of a record's location
 */
export type StorageLeg = 'full' | 'vector' | 'table';

export const STORAGE_LEGS: readonly StorageLeg[] = ['full', 'vector', 'table'] as const;

/**
 * Legs each strategy writes. metadata_only writes none: the content stays
 * at its source and the record keeps only the preview and metadata.
 */
export function legsForStrategy(strategy: StorageStrategy): StorageLeg[] {
  switch (strategy) {
    case 'full_store':
      return ['full'];
    case 'vector_store':
      return ['vector'];
    case 'hybrid':
      return ['full', 'vector'];
    case 'specialized_table':
      return ['table'];
    case 'metadata_only':
      return [];
  }
}

/**
 * Content profile produced by the classifier. All scores in [0, 1],
 * rounded to 4 decimals.
 */
export interface ContentProfile {
  semantic_complexity: number;
  topic_coherence: number;
  information_density: number;
  query_potential: number;
}

/**
 * Durable pointer from a record to its physical location(s).
 * Stored as one JSON column so a swap is a single row update.
 */
export interface LocationPointer {
  full?: { content_hash: string };
  vector?: { collection: string; batch_id: string; chunk_count: number };
  table?: { table_name: string; row_id: number };
  source?: { locator: string };
}

/**
 * Logical content record
 */
export interface ContentRecord {
  /** UUID v4 identifier */
  id: string;

  /** Unique source locator (URL or path) */
  source_locator: string;

  title: string | null;
  author: string | null;
  domain: string;
  content_type: string;

  /** Declared size in bytes */
  declared_size: number;

  /** SHA-256 of the raw text (format: 'sha256:...') */
  content_hash: string;

  /** First 1000 characters of the raw text */
  content_preview: string;

  word_count: number;

  profile: ContentProfile;

  strategy: StorageStrategy;
  policy_version: number;
  confidence: number;

  status: RecordStatus;

  /** Set when reconciliation exhausted its attempts */
  needs_review: boolean;

  location: LocationPointer;

  query_count: number;
  last_queried_at: string | null;
  /** Exponentially decayed access rate (queries per day) */
  access_frequency: number;

  scrape_count: number;
  last_scraped_at: string;

  metadata: Record<string, unknown>;
  tags: string[];
  keywords: string[];

  /** Written only by analysis collaborators, keyed by agent name */
  annotations: Record<string, unknown>;

  created_at: string;
  updated_at: string;
}

/** Maximum characters kept in content_preview */
export const PREVIEW_LENGTH = 1000;
