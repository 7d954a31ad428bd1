/**
 * Performance samples and optimization recommendations
 */

import type { StorageStrategy } from './content-record.js';

export type QueryMode = 'text' | 'vector' | 'hybrid';

/**
 * One executed query. Append-only; deleted only by the retention sweep.
 */
export interface PerformanceSample {
  id: number;
  query_signature: string;
  mode: QueryMode;
  /** Dominant strategy among the returned records, null when nothing returned */
  strategy: StorageStrategy | null;
  domain: string | null;
  latency_ms: number;
  rows_returned: number;
  partial: boolean;
  executed_at: string;
}

export type RecommendationType = 'add_index' | 'migrate_strategy';

export type RecommendationStatus = 'pending' | 'applied' | 'rejected' | 'failed' | 'expired';

export interface OptimizationRecommendation {
  id: string;
  type: RecommendationType;
  /** 'domain:<name>' or 'record:<id>' */
  target: string;
  title: string;
  description: string;
  params: Record<string, unknown>;
  /** Estimated latency improvement in percent */
  estimated_improvement: number;
  confidence: number;
  status: RecommendationStatus;
  status_reason: string | null;
  created_at: string;
  resolved_at: string | null;
}
