/**
 * Performance Tracker
 *
 * One sample per executed query. Recording never throws into the query
 * path: a failed insert is logged and dropped.
 *
 * @module services/performance/tracker
 */

import type { StorageStrategy } from '../../models/content-record.js';
import type { QueryMode } from '../../models/performance.js';
import { shortDigest } from '../../utils/hash.js';
import type { QueryFilters } from '../../utils/validation.js';
import type { DatabaseService } from '../storage/database/index.js';

export interface QueryObservation {
  mode: QueryMode;
  text: string;
  filters: QueryFilters;
  /** Dominant strategy among returned records */
  strategy: StorageStrategy | null;
  domain: string | null;
  latency_ms: number;
  rows_returned: number;
  partial: boolean;
}

export interface PerformanceTrackerOptions {
  sampleRetentionDays: number;
}

const DAY_MS = 86_400_000;

/**
 * Signature grouping queries that differ only in case and spacing
 */
export function querySignature(mode: QueryMode, text: string, filters: QueryFilters): string {
  const normalized = text.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
  const filterKey = [filters.domain, filters.content_type, filters.from, filters.to]
    .map((v) => v ?? '')
    .join('|');
  return shortDigest(`${mode}\n${normalized}\n${filterKey}`);
}

export class PerformanceTracker {
  constructor(
    private readonly db: DatabaseService,
    private readonly clock: () => Date,
    private readonly options: PerformanceTrackerOptions
  ) {}

  /**
   * @returns the sample id, or null when it could not be stored
   */
  recordQuery(observation: QueryObservation): number | null {
    try {
      return this.db.insertSample({
        query_signature: querySignature(observation.mode, observation.text, observation.filters),
        mode: observation.mode,
        strategy: observation.strategy,
        domain: observation.domain,
        latency_ms: Math.max(0, Math.round(observation.latency_ms)),
        rows_returned: observation.rows_returned,
        partial: observation.partial,
        executed_at: this.clock().toISOString(),
      });
    } catch (error) {
      console.error(
        `[PerformanceTracker] Failed to record sample: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }

  /**
   * Delete samples older than the retention window
   */
  sweep(now: Date = this.clock()): number {
    const cutoff = new Date(now.getTime() - this.options.sampleRetentionDays * DAY_MS).toISOString();
    const deleted = this.db.deleteSamplesBefore(cutoff);
    if (deleted > 0) {
      console.error(`[PerformanceTracker] Retention sweep removed ${deleted} samples`);
    }
    return deleted;
  }
}
