/**
 * Optimizer
 *
 * Reads performance samples and record placement, writes recommendations.
 * Applying one never mutates a record in place: indexes go through a
 * versioned descriptor, placement changes through the migration protocol.
 *
 * @module services/performance/optimizer
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { legsForStrategy, type ContentRecord, type StorageStrategy } from '../../models/content-record.js';
import type {
  OptimizationRecommendation,
  RecommendationStatus,
  RecommendationType,
} from '../../models/performance.js';
import { RecommendationConflict, recommendationNotFoundError } from '../../engine/errors.js';
import type { EngineEventBus } from '../../engine/events.js';
import { roundTo } from '../../utils/math.js';
import { StorageStrategySchema, ValidationError } from '../../utils/validation.js';
import type { MigrationScheduler } from '../consistency/migration-scheduler.js';
import { LATEST_POLICY_VERSION, type PlacementPolicy } from '../placement/policy.js';
import type { DatabaseService } from '../storage/database/index.js';
import { pointerLegs, type LegWriter } from '../storage/legs.js';
import type { DynamicTableRegistry } from '../storage/schema-builder.js';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export const AddIndexParamsSchema = z.object({
  domain: z.string().min(1),
});

export const MigrateParamsSchema = z.object({
  record_id: z.string().min(1),
  from: StorageStrategySchema,
  to: StorageStrategySchema,
  policy_version: z.number().int().min(1).optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export interface OptimizerOptions {
  windowHours: number;
  minSamples: number;
  latencyThresholdMs: number;
  largeRecordBytes: number;
  recommendationTtlDays: number;
  reevaluationBatchSize: number;
}

export interface OptimizerDeps {
  db: DatabaseService;
  policy: PlacementPolicy;
  legs: LegWriter;
  registry: DynamicTableRegistry;
  scheduler: MigrationScheduler;
  events: EngineEventBus;
  clock: () => Date;
}

export interface AnalysisSummary {
  created: OptimizationRecommendation[];
  /** Stored as rejected because the target had a different pending recommendation */
  conflicts: RecommendationConflict[];
  /** Identical to a pending recommendation, not stored */
  duplicates: number;
}

interface Candidate {
  type: RecommendationType;
  target: string;
  title: string;
  description: string;
  params: Record<string, unknown>;
  estimated_improvement: number;
  confidence: number;
}

/**
 * JSON with sorted keys, for comparing params
 */
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

function migrationCandidate(
  record: ContentRecord,
  to: StorageStrategy,
  estimated: number,
  confidence: number,
  reason: string,
  policyVersion?: number
): Candidate {
  return {
    type: 'migrate_strategy',
    target: `record:${record.id}`,
    title: `Migrate ${record.source_locator} to ${to}`,
    description: reason,
    params: {
      record_id: record.id,
      from: record.strategy,
      to,
      ...(policyVersion !== undefined ? { policy_version: policyVersion, confidence } : {}),
    },
    estimated_improvement: estimated,
    confidence,
  };
}

export class Optimizer {
  constructor(
    private readonly deps: OptimizerDeps,
    private readonly options: OptimizerOptions
  ) {}

  // ═══════════════════════════════════════════════════════════════════════════
  // ANALYSIS
  // ═══════════════════════════════════════════════════════════════════════════

  analyze(now: Date = this.deps.clock()): AnalysisSummary {
    const summary: AnalysisSummary = { created: [], conflicts: [], duplicates: 0 };
    const candidates = [
      ...this.indexCandidates(now),
      ...this.largeRecordCandidates(),
      ...this.policyCandidates(),
    ];
    for (const candidate of candidates) {
      this.propose(candidate, now, summary);
    }
    if (summary.created.length > 0 || summary.conflicts.length > 0) {
      console.error(
        `[Optimizer] ${summary.created.length} recommendations, ${summary.conflicts.length} conflicts, ${summary.duplicates} duplicates`
      );
    }
    return summary;
  }

  /**
   * Domains whose mean query latency over the window is above threshold
   */
  private indexCandidates(now: Date): Candidate[] {
    const since = new Date(now.getTime() - this.options.windowHours * HOUR_MS).toISOString();
    const recentlyApplied = new Set(
      this.deps.db
        .listRecommendations('applied')
        .filter((r) => r.type === 'add_index' && (r.resolved_at ?? '') >= since)
        .map((r) => r.target)
    );

    const candidates: Candidate[] = [];
    for (const stats of this.deps.db.getDomainLatencyStats(since)) {
      if (stats.sample_count < this.options.minSamples) continue;
      if (stats.mean_latency_ms <= this.options.latencyThresholdMs) continue;
      const target = `domain:${stats.domain}`;
      if (recentlyApplied.has(target)) continue;
      candidates.push({
        type: 'add_index',
        target,
        title: `Add query index for ${stats.domain}`,
        description: `Mean latency ${roundTo(stats.mean_latency_ms, 1)}ms over ${stats.sample_count} queries exceeds ${this.options.latencyThresholdMs}ms`,
        params: { domain: stats.domain },
        estimated_improvement: 25,
        confidence: 0.8,
      });
    }
    return candidates;
  }

  private largeRecordCandidates(): Candidate[] {
    return this.deps.db
      .listLargeFullStoreRecords(this.options.largeRecordBytes, this.options.reevaluationBatchSize)
      .map((record) =>
        migrationCandidate(
          record,
          'vector_store',
          40,
          0.9,
          `${record.declared_size} bytes held as a full copy; chunked vectors serve it with less I/O`
        )
      );
  }

  /**
   * Records placed under an older policy version whose decision changed.
   * Each run takes the next batch of records not yet compared against the
   * latest version; a record whose new legs cannot be written from retained
   * text is skipped.
   */
  private policyCandidates(): Candidate[] {
    const { db, policy, legs } = this.deps;
    const batch = db.listRecordsBelowPolicyVersion(LATEST_POLICY_VERSION, this.options.reevaluationBatchSize);
    db.markPolicyChecked(
      batch.map((r) => r.id),
      LATEST_POLICY_VERSION
    );

    const candidates: Candidate[] = [];
    for (const record of batch) {
      const decision = policy.decide(record.declared_size, record.profile, record.domain, LATEST_POLICY_VERSION);
      if (decision.strategy === record.strategy) continue;
      const missing = legsForStrategy(decision.strategy).filter((leg) => !pointerLegs(record.location).includes(leg));
      if (missing.length > 0 && legs.readBody(record) === null) continue;
      candidates.push(
        migrationCandidate(
          record,
          decision.strategy,
          15,
          decision.confidence,
          `Policy v${LATEST_POLICY_VERSION} places this record as ${decision.strategy} (${decision.rule}); it was placed as ${record.strategy} under v${record.policy_version}`,
          LATEST_POLICY_VERSION
        )
      );
    }
    return candidates;
  }

  private propose(candidate: Candidate, now: Date, summary: AnalysisSummary): void {
    const { db, events } = this.deps;
    const stamp = now.toISOString();
    const pending = db.findPendingForTarget(candidate.target);
    const params = stableStringify(candidate.params);

    if (pending.some((p) => p.type === candidate.type && stableStringify(p.params) === params)) {
      summary.duplicates++;
      return;
    }

    const rec: OptimizationRecommendation = {
      id: uuidv4(),
      ...candidate,
      confidence: roundTo(candidate.confidence),
      status: 'pending',
      status_reason: null,
      created_at: stamp,
      resolved_at: null,
    };

    const existing = pending[0];
    if (existing) {
      const conflict = new RecommendationConflict(
        `${candidate.target} already has pending recommendation ${existing.id}`,
        existing.id
      );
      db.insertRecommendation({ ...rec, status: 'rejected', status_reason: conflict.message, resolved_at: stamp });
      summary.conflicts.push(conflict);
      return;
    }

    db.insertRecommendation(rec);
    summary.created.push(rec);
    events.emitEvent({
      type: 'recommendation.created',
      timestamp: stamp,
      entityId: rec.id,
      data: { type: rec.type, target: rec.target },
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // APPLY / EXPIRE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Apply a pending recommendation. Failures are recorded on the
   * recommendation and reported through the returned status. The
   * recommendation is claimed first, so concurrent callers cannot both
   * apply it.
   *
   * @throws EngineError RECOMMENDATION_NOT_FOUND
   * @throws ValidationError when the recommendation is not pending or is
   * already being applied
   */
  async apply(id: string): Promise<RecommendationStatus> {
    const { db, events } = this.deps;
    const rec = db.getRecommendation(id);
    if (!rec) throw recommendationNotFoundError(id);
    if (rec.status !== 'pending') {
      throw new ValidationError(`Recommendation ${id} is ${rec.status}, not pending`);
    }
    if (!db.claimRecommendation(id, this.now())) {
      const current = db.getRecommendation(id)?.status ?? rec.status;
      throw new ValidationError(
        current === 'pending'
          ? `Recommendation ${id} is already being applied`
          : `Recommendation ${id} is ${current}, not pending`
      );
    }

    let outcome: Exclude<RecommendationStatus, 'pending'> = 'applied';
    let reason: string | null = null;
    try {
      await this.execute(rec);
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
      outcome = 'failed';
      console.error(`[Optimizer] Applying ${id} failed: ${reason}`);
    }

    if (!db.resolveRecommendation(id, outcome, reason, this.now())) {
      const current = db.getRecommendation(id)?.status ?? outcome;
      console.error(`[Optimizer] ${id} was resolved as ${current} while being applied`);
      return current;
    }
    if (outcome === 'failed') return outcome;

    console.error(`[Optimizer] Applied ${rec.type} for ${rec.target}`);
    events.emitEvent({
      type: 'recommendation.applied',
      timestamp: this.now(),
      entityId: id,
      data: { type: rec.type, target: rec.target },
    });
    return outcome;
  }

  /**
   * Release claims held by a process that stopped mid-apply
   */
  releaseStaleClaims(): number {
    const released = this.deps.db.releaseRecommendationClaims();
    if (released > 0) console.error(`[Optimizer] Released ${released} interrupted recommendation claims`);
    return released;
  }

  private async execute(rec: OptimizationRecommendation): Promise<void> {
    switch (rec.type) {
      case 'add_index': {
        const params = AddIndexParamsSchema.parse(rec.params);
        this.deps.registry.createQueryIndex(params.domain, this.now());
        return;
      }
      case 'migrate_strategy': {
        const params = MigrateParamsSchema.parse(rec.params);
        const task = this.deps.scheduler.schedule(`recommendation:${rec.id}`, params.record_id, params.to, {
          policyVersion: params.policy_version,
          confidence: params.confidence,
        });
        await task.result;
        return;
      }
    }
  }

  /**
   * Expire pending recommendations older than the TTL
   */
  expire(now: Date = this.deps.clock()): number {
    const cutoff = new Date(now.getTime() - this.options.recommendationTtlDays * DAY_MS).toISOString();
    const expired = this.deps.db.expirePendingRecommendations(cutoff, now.toISOString());
    if (expired > 0) console.error(`[Optimizer] Expired ${expired} recommendations`);
    return expired;
  }

  private now(): string {
    return this.deps.clock().toISOString();
  }
}
