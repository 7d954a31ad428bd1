/**
 * Storage Coordinator
 *
 * Ingestion path: classify, place, create the record 'pending', write every
 * leg of the chosen strategy, then hand the pointer to the Consistency
 * Mapper. Writes for one source locator are serialized, so concurrent
 * re-ingestion of the same source can never create a second record.
 *
 * Two-store writes are not a distributed transaction. When a leg fails
 * after its retries, the legs that succeeded stay in place, the record is
 * marked 'degraded', its text is spooled and a reconciliation job is queued
 * per failed leg. Nothing is rolled back or dropped.
 *
 * @module services/storage/coordinator
 */

import { v4 as uuidv4 } from 'uuid';
import {
  legsForStrategy,
  PREVIEW_LENGTH,
  type ContentRecord,
  type LocationPointer,
  type RecordStatus,
  type StorageLeg,
  type StorageStrategy,
} from '../../models/content-record.js';
import { classifyContent, detectDomain, inferContentType } from '../classification/classifier.js';
import type { PlacementDecision, PlacementPolicy } from '../placement/policy.js';
import { ConsistencyViolation, DuplicateContentError, recordNotFoundError } from '../../engine/errors.js';
import type { EngineEventBus } from '../../engine/events.js';
import { computeHash } from '../../utils/hash.js';
import { KeyedSerialQueue } from '../../utils/keyed-queue.js';
import { countWords, preview } from '../../utils/text.js';
import {
  IngestionPayloadSchema,
  validateInput,
  type IngestionPayload,
  type IngestionPayloadInput,
} from '../../utils/validation.js';
import type { ConsistencyMapper } from '../consistency/mapper.js';
import { sourcePointer } from '../consistency/mapper.js';
import type { DatabaseService, NewContentRecord } from './database/index.js';
import { mergePointers, pointerLegs, type LegWriter } from './legs.js';
import { nextAttemptAt, type ReconcileSchedule } from './reconciler.js';
import type { VectorStore } from './vector.js';

export interface IngestResult {
  record_id: string;
  /** false when the source was already stored and this was a re-scrape */
  created: boolean;
  status: RecordStatus;
  strategy: StorageStrategy;
  confidence: number;
  policy_version: number;
  rule: string;
  reasoning: string[];
  /** Legs queued for reconciliation */
  degraded_legs: StorageLeg[];
}

export interface OrphanSweepSummary {
  batches: number;
  points: number;
  failed: number;
}

export interface StorageCoordinatorDeps {
  db: DatabaseService;
  vectors: VectorStore;
  policy: PlacementPolicy;
  legs: LegWriter;
  mapper: ConsistencyMapper;
  events: EngineEventBus;
  clock: () => Date;
}

export interface StorageCoordinatorOptions {
  /** Policy version for new records */
  policyVersion: number;
  reconcile: ReconcileSchedule;
  /** Staged batches without a marker older than this are swept */
  orphanGraceMs: number;
}

/**
 * Decision for a strategy forced by the caller
 */
function forcedDecision(strategy: StorageStrategy, policyVersion: number): PlacementDecision {
  return {
    strategy,
    confidence: 0.99,
    policy_version: policyVersion,
    rule: 'forced',
    reasoning: [`strategy ${strategy} forced by the ingestion payload`],
  };
}

export class StorageCoordinator {
  private readonly queue = new KeyedSerialQueue();

  constructor(
    private readonly deps: StorageCoordinatorDeps,
    private readonly options: StorageCoordinatorOptions
  ) {
    if (!deps.policy.hasVersion(options.policyVersion)) {
      throw new Error(`Unknown placement policy version ${options.policyVersion}`);
    }
  }

  /**
   * Ingest one item.
   *
   * Validation happens before anything is queued or written and throws
   * synchronously. Store failures after retries degrade the record instead
   * of rejecting.
   *
   * @throws ValidationError on a malformed payload
   */
  ingest(input: IngestionPayloadInput): Promise<IngestResult> {
    const payload = validateInput(IngestionPayloadSchema, input);
    return this.queue.run(payload.source_locator, () => this.ingestSerialized(payload));
  }

  private async ingestSerialized(payload: IngestionPayload): Promise<IngestResult> {
    const { db } = this.deps;
    const existing = db.getRecordByLocator(payload.source_locator);
    if (existing?.status === 'pending') return this.resumePending(existing, payload);
    if (existing) return this.rescrape(existing, payload);

    const now = this.now();
    const { record, decision } = this.stage(payload, uuidv4(), now);

    try {
      db.insertRecord(record);
    } catch (error) {
      // Another process stored the same locator between lookup and insert
      if (error instanceof DuplicateContentError) {
        const winner = db.getRecordByLocator(payload.source_locator);
        if (winner) return this.rescrape(winner, payload);
      }
      throw error;
    }

    console.error(
      `[Coordinator] ${record.id} (${payload.source_locator}): ${decision.strategy} via ${decision.rule}, confidence ${decision.confidence}`
    );
    return this.writeLegs(record, payload.raw_text, decision);
  }

  /**
   * A pending record was inserted by an ingestion that never committed.
   * Take it over with this payload instead of merging a re-scrape into it.
   */
  private async resumePending(existing: ContentRecord, payload: IngestionPayload): Promise<IngestResult> {
    const { db, mapper } = this.deps;
    const { record, decision } = this.stage(payload, existing.id, existing.created_at);
    await mapper.discardStrandedParts(existing);
    if (!db.restagePendingRecord(record)) {
      const current = db.getRecord(existing.id);
      if (current) return this.rescrape(current, payload);
      throw recordNotFoundError(existing.id);
    }

    console.error(
      `[Coordinator] Resuming interrupted ingestion of ${record.id} (${payload.source_locator}): ${decision.strategy} via ${decision.rule}`
    );
    return this.writeLegs(record, payload.raw_text, decision);
  }

  private stage(
    payload: IngestionPayload,
    id: string,
    createdAt: string
  ): { record: NewContentRecord; decision: PlacementDecision } {
    const text = payload.raw_text;
    const declaredSize = payload.declared_size ?? Buffer.byteLength(text, 'utf8');
    const domain = payload.domain ?? detectDomain(text, payload.source_locator);
    const contentType = payload.content_type ?? inferContentType(payload.source_locator, declaredSize);
    const profile = classifyContent({ text, domain, contentType, declaredSize });
    const decision = payload.strategy
      ? forcedDecision(payload.strategy, this.options.policyVersion)
      : this.deps.policy.decide(declaredSize, profile, domain, this.options.policyVersion);

    const record: NewContentRecord = {
      id,
      source_locator: payload.source_locator,
      title: payload.title ?? null,
      author: payload.author ?? null,
      domain,
      content_type: contentType,
      declared_size: declaredSize,
      content_hash: computeHash(text),
      content_preview: preview(text, PREVIEW_LENGTH),
      word_count: countWords(text),
      profile,
      strategy: decision.strategy,
      policy_version: decision.policy_version,
      confidence: decision.confidence,
      status: 'pending',
      location: {},
      last_scraped_at: this.now(),
      metadata: payload.metadata,
      tags: payload.tags,
      keywords: payload.keywords,
      created_at: createdAt,
    };
    return { record, decision };
  }

  private async writeLegs(
    record: NewContentRecord,
    text: string,
    decision: PlacementDecision
  ): Promise<IngestResult> {
    const { legs, mapper, events } = this.deps;
    const wanted = legsForStrategy(record.strategy);

    let pointer: LocationPointer;
    const failures = new Map<StorageLeg, string>();
    if (wanted.length === 0) {
      pointer = sourcePointer(record.source_locator);
    } else {
      const settled = await Promise.allSettled(wanted.map((leg) => legs.write(leg, record, text)));
      const parts: LocationPointer[] = [];
      settled.forEach((outcome, i) => {
        if (outcome.status === 'fulfilled') {
          parts.push(outcome.value);
        } else {
          failures.set(wanted[i], describe(outcome.reason));
        }
      });
      pointer = mergePointers(...parts);
    }

    if (failures.size === 0) {
      try {
        const committed = mapper.commitIngestion(record.id, pointer);
        events.emitEvent({
          type: 'record.ingested',
          timestamp: this.now(),
          entityId: record.id,
          data: { strategy: committed.strategy, domain: committed.domain },
        });
        return this.result(committed, true, decision, []);
      } catch (error) {
        if (!(error instanceof ConsistencyViolation)) throw error;
        console.error(`[Coordinator] ${error.message}`);
      }
    }

    return this.degrade(record, text, pointer, failures, decision);
  }

  private degrade(
    record: NewContentRecord,
    text: string,
    pointer: LocationPointer,
    failures: Map<StorageLeg, string>,
    decision: PlacementDecision
  ): IngestResult {
    const { db, mapper, events } = this.deps;
    const now = this.now();
    const { maxAttempts } = this.options.reconcile;

    const degraded = db.transaction(() => {
      const updated = mapper.commitPartial(record.id, pointer);
      db.spoolContent(record.id, record.content_hash, text, now);
      const missing = legsForStrategy(record.strategy).filter(
        (leg) => !pointerLegs(updated.location).includes(leg)
      );
      for (const leg of missing) {
        db.enqueueReconciliation(
          record.id,
          leg,
          maxAttempts,
          nextAttemptAt(this.deps.clock(), 0, this.options.reconcile),
          failures.get(leg) ?? 'part did not resolve at commit',
          now
        );
      }
      return { updated, missing };
    });

    console.error(
      `[Coordinator] ${record.id} degraded, reconciliation queued for: ${degraded.missing.join(', ')}`
    );
    events.emitEvent({
      type: 'record.degraded',
      timestamp: now,
      entityId: record.id,
      data: { strategy: record.strategy, legs: degraded.missing, errors: Object.fromEntries(failures) },
    });
    return this.result(degraded.updated, true, decision, degraded.missing);
  }

  /**
   * Merge a repeated ingestion of a stored source into its record
   */
  private rescrape(existing: ContentRecord, payload: IngestionPayload): IngestResult {
    const now = this.now();
    const merged = this.deps.db.mergeRescrape(
      existing.id,
      { metadata: payload.metadata, tags: payload.tags, keywords: payload.keywords },
      now
    );
    console.error(`[Coordinator] ${payload.source_locator} already stored as ${existing.id}, merged re-scrape`);
    this.deps.events.emitEvent({
      type: 'record.rescraped',
      timestamp: now,
      entityId: existing.id,
      data: { scrape_count: merged.scrape_count },
    });
    return {
      record_id: merged.id,
      created: false,
      status: merged.status,
      strategy: merged.strategy,
      confidence: merged.confidence,
      policy_version: merged.policy_version,
      rule: 'rescrape',
      reasoning: [`source already stored as ${merged.id}; scrape statistics merged`],
      degraded_legs: [],
    };
  }

  /**
   * Remove staged vector batches that never got a completion marker
   */
  async sweepOrphans(now: Date = this.deps.clock()): Promise<OrphanSweepSummary> {
    const { db, vectors } = this.deps;
    const cutoff = new Date(now.getTime() - this.options.orphanGraceMs).toISOString();
    const summary: OrphanSweepSummary = { batches: 0, points: 0, failed: 0 };

    for (const batch of db.findOrphanBatches(cutoff)) {
      try {
        await vectors.deletePoints(batch.collection, batch.point_ids);
        db.deleteBatch(batch.batch_id);
        summary.batches++;
        summary.points += batch.point_ids.length;
      } catch (error) {
        summary.failed++;
        const message = describe(error);
        console.error(`[Coordinator] Orphan sweep of batch ${batch.batch_id} failed: ${message}`);
        db.insertIncident(
          'orphan_sweep',
          batch.record_id,
          `Orphaned batch ${batch.batch_id} could not be removed: ${message}`,
          { batch_id: batch.batch_id, collection: batch.collection },
          now.toISOString()
        );
      }
    }
    if (summary.batches > 0) {
      console.error(`[Coordinator] Swept ${summary.batches} orphaned batches (${summary.points} points)`);
    }
    return summary;
  }

  private result(
    record: ContentRecord,
    created: boolean,
    decision: PlacementDecision,
    degradedLegs: StorageLeg[]
  ): IngestResult {
    return {
      record_id: record.id,
      created,
      status: record.status,
      strategy: record.strategy,
      confidence: record.confidence,
      policy_version: record.policy_version,
      rule: decision.rule,
      reasoning: decision.reasoning,
      degraded_legs: degradedLegs,
    };
  }

  private now(): string {
    return this.deps.clock().toISOString();
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
