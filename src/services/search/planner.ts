/**
 * Hybrid Query Planner
 *
 * Runs the text and vector sub-queries concurrently, each under its own
 * timeout and AbortController, with the caller's deadline capping both.
 * Filters are pushed into each sub-query before it runs. One failed side
 * yields a partial response from the other; both failing is an error.
 *
 * Vector hits count only when their mapping is committed and their batch
 * is the record's current pointer, so superseded or half-written batches
 * never surface.
 *
 * @module services/search/planner
 */

import type { ContentRecord, StorageStrategy } from '../../models/content-record.js';
import type { QueryMode } from '../../models/performance.js';
import { QueryFailedError } from '../../engine/errors.js';
import { TimeoutError, withTimeout } from '../../utils/timeout.js';
import {
  QueryRequestSchema,
  validateInput,
  type QueryFilters,
  type QueryRequest,
  type QueryRequestInput,
} from '../../utils/validation.js';
import { isZeroVector, type Embedder } from '../embedding/embedder.js';
import type { PerformanceTracker } from '../performance/tracker.js';
import type { DatabaseService } from '../storage/database/index.js';
import { collectionForDomain, type VectorSearchFilter, type VectorStore } from '../storage/vector.js';
import { fuseResults, type FusedResult, type ScoredRecord } from './fusion.js';
import type { TextSearchService } from './text-search.js';

export interface QueryResultItem {
  record: ContentRecord;
  score: number;
  text_score: number | null;
  vector_score: number | null;
}

export interface QueryResponse {
  results: QueryResultItem[];
  /** True when one sub-query failed or timed out */
  partial: boolean;
  mode: QueryMode;
  /** Matches before pagination */
  total: number;
  latency_ms: number;
  /** Error message per failed sub-query */
  failures: Partial<Record<'text' | 'vector', string>>;
}

export interface QueryPlannerOptions {
  hybridAlpha: number;
  minSimilarity: number;
  textTimeoutMs: number;
  vectorTimeoutMs: number;
  queryDeadlineMs: number;
  overfetchFactor: number;
}

export interface QueryPlannerDeps {
  db: DatabaseService;
  text: TextSearchService;
  vectors: VectorStore;
  embedder: Embedder;
  tracker: PerformanceTracker;
  clock: () => Date;
}

type SubQueryOutcome = { ok: true; hits: ScoredRecord[] } | { ok: false; error: string };

/**
 * Mode for a request: explicit mode, else semantic=false means text only
 */
export function resolveMode(request: Pick<QueryRequest, 'mode' | 'semantic'>): QueryMode {
  if (request.mode) return request.mode;
  return request.semantic === false ? 'text' : 'hybrid';
}

export function vectorFilterFor(filters: QueryFilters): VectorSearchFilter {
  return {
    content_type: filters.content_type,
    ingested_from: filters.from,
    ingested_to: filters.to,
  };
}

/**
 * Most frequent value, ties broken by first occurrence
 */
function dominant<T>(values: T[]): T | null {
  const counts = new Map<T, number>();
  let best: T | null = null;
  let bestCount = 0;
  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export class HybridQueryPlanner {
  constructor(
    private readonly deps: QueryPlannerDeps,
    private readonly options: QueryPlannerOptions
  ) {}

  /**
   * @throws ValidationError synchronously on a malformed request
   */
  query(input: QueryRequestInput): Promise<QueryResponse> {
    const request = validateInput(QueryRequestSchema, input);
    return this.execute(request);
  }

  private async execute(request: QueryRequest): Promise<QueryResponse> {
    const started = Date.now();
    const mode = resolveMode(request);
    const fetchLimit = (request.offset + request.limit) * this.options.overfetchFactor;

    const deadlineMs = request.deadline_ms ?? this.options.queryDeadlineMs;
    const deadline = new AbortController();
    const deadlineTimer = setTimeout(() => {
      deadline.abort(new TimeoutError(`query deadline of ${deadlineMs}ms reached`, deadlineMs));
    }, deadlineMs);

    let textOutcome: SubQueryOutcome | null = null;
    let vectorOutcome: SubQueryOutcome | null = null;
    try {
      [textOutcome, vectorOutcome] = await Promise.all([
        mode === 'vector'
          ? null
          : this.settle('text', () =>
              withTimeout(
                'text search',
                Math.min(this.options.textTimeoutMs, deadlineMs),
                async () => this.deps.text.search(request.text, request.filters, fetchLimit),
                deadline.signal
              )
            ),
        mode === 'text'
          ? null
          : this.settle('vector', () =>
              withTimeout(
                'vector search',
                Math.min(this.options.vectorTimeoutMs, deadlineMs),
                (signal) => this.vectorSearch(request, fetchLimit, signal),
                deadline.signal
              )
            ),
      ]);
    } finally {
      clearTimeout(deadlineTimer);
    }

    const failures: QueryResponse['failures'] = {};
    if (textOutcome && !textOutcome.ok) failures.text = textOutcome.error;
    if (vectorOutcome && !vectorOutcome.ok) failures.vector = vectorOutcome.error;

    const textHits = textOutcome?.ok ? textOutcome.hits : null;
    const vectorHits = vectorOutcome?.ok ? vectorOutcome.hits : null;
    if (textHits === null && vectorHits === null) {
      throw new QueryFailedError(
        `All sub-queries failed: ${Object.entries(failures)
          .map(([side, error]) => `${side}: ${error}`)
          .join('; ')}`,
        failures
      );
    }

    const alpha = request.alpha ?? this.options.hybridAlpha;
    const fused = fuseResults(textHits, vectorHits, alpha);
    const page = fused.slice(request.offset, request.offset + request.limit);
    const results = this.hydrate(page);
    const partial = Object.keys(failures).length > 0;
    const latency = Date.now() - started;

    this.bumpAccess(results.map((r) => r.record.id));
    this.deps.tracker.recordQuery({
      mode,
      text: request.text,
      filters: request.filters,
      strategy: dominant<StorageStrategy>(results.map((r) => r.record.strategy)),
      domain: request.filters.domain ?? dominant(results.map((r) => r.record.domain)),
      latency_ms: latency,
      rows_returned: results.length,
      partial,
    });

    if (partial) {
      console.error(`[QueryPlanner] Partial ${mode} result: ${JSON.stringify(failures)}`);
    }
    return { results, partial, mode, total: fused.length, latency_ms: latency, failures };
  }

  private async settle(side: 'text' | 'vector', run: () => Promise<ScoredRecord[]>): Promise<SubQueryOutcome> {
    try {
      return { ok: true, hits: await run() };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[QueryPlanner] ${side} sub-query failed: ${message}`);
      return { ok: false, error: message };
    }
  }

  /**
   * Nearest chunks across the filtered collections, reduced to the best
   * similarity per record whose current pointer owns the chunk's batch
   */
  private async vectorSearch(request: QueryRequest, fetchLimit: number, signal: AbortSignal): Promise<ScoredRecord[]> {
    const { db, vectors, embedder } = this.deps;
    const queryVector = await embedder.embedQuery(request.text, signal);
    if (isZeroVector(queryVector)) return [];

    const available = await vectors.listCollections();
    const collections = request.filters.domain
      ? available.filter((c) => c === collectionForDomain(request.filters.domain ?? ''))
      : available.filter((c) => c.startsWith('content_'));

    const perCollection = await Promise.all(
      collections.map((collection) =>
        vectors.search(
          collection,
          queryVector,
          {
            limit: fetchLimit,
            filter: vectorFilterFor(request.filters),
            minSimilarity: this.options.minSimilarity,
          },
          signal
        )
      )
    );
    const hits = perCollection.flat();
    if (hits.length === 0) return [];

    const mappings = new Map(db.getCommittedMappingsByPointIds(hits.map((h) => h.id)).map((m) => [m.point_id, m]));
    const records = new Map(
      db.getRecordsByIds([...new Set([...mappings.values()].map((m) => m.record_id))]).map((r) => [r.id, r])
    );

    const scored: ScoredRecord[] = [];
    for (const hit of hits) {
      const mapping = mappings.get(hit.id);
      if (!mapping) continue;
      const record = records.get(mapping.record_id);
      if (!record || record.status === 'pending') continue;
      if (record.location.vector?.batch_id !== mapping.batch_id) continue;
      if (request.filters.domain && record.domain !== request.filters.domain) continue;
      scored.push({ record_id: record.id, score: hit.similarity });
    }
    return scored;
  }

  private hydrate(page: FusedResult[]): QueryResultItem[] {
    const records = new Map(this.deps.db.getRecordsByIds(page.map((p) => p.record_id)).map((r) => [r.id, r]));
    const items: QueryResultItem[] = [];
    for (const hit of page) {
      const record = records.get(hit.record_id);
      if (!record) continue;
      items.push({ record, score: hit.score, text_score: hit.text_score, vector_score: hit.vector_score });
    }
    return items;
  }

  private bumpAccess(ids: string[]): void {
    try {
      this.deps.db.recordAccess(ids, this.deps.clock().toISOString());
    } catch (error) {
      console.error(
        `[QueryPlanner] Failed to update access stats: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
