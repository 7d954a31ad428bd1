/**
 * Content Storage Engine
 *
 * Wires the relational store, vector store, classifier, placement policy,
 * coordinator, consistency mapper, query planner and optimizer into one
 * operator surface. One engine instance per database.
 *
 * @module engine/engine
 */

import { dirname, join } from 'path';
import type { ContentRecord, StorageStrategy } from '../models/content-record.js';
import type {
  OptimizationRecommendation,
  RecommendationStatus,
} from '../models/performance.js';
import type { FullContentBlob } from '../models/storage.js';
import { MigrationRateLimiter, MigrationScheduler, type ScheduledMigration } from '../services/consistency/migration-scheduler.js';
import { ConsistencyMapper, type GcSummary, type VerificationReport } from '../services/consistency/mapper.js';
import type { Embedder } from '../services/embedding/embedder.js';
import { LocalHashingEmbedder } from '../services/embedding/hashing.js';
import { Optimizer, type AnalysisSummary } from '../services/performance/optimizer.js';
import { PerformanceTracker } from '../services/performance/tracker.js';
import { PlacementPolicy } from '../services/placement/policy.js';
import { HybridQueryPlanner, type QueryResponse } from '../services/search/planner.js';
import { TextSearchService } from '../services/search/text-search.js';
import { StorageCoordinator, type IngestResult, type OrphanSweepSummary } from '../services/storage/coordinator.js';
import { DatabaseService, type RecordStats } from '../services/storage/database/index.js';
import { LegWriter } from '../services/storage/legs.js';
import { InMemoryVectorStore } from '../services/storage/memory-vector.js';
import { Reconciler, type ReconcileSummary } from '../services/storage/reconciler.js';
import { DynamicTableRegistry } from '../services/storage/schema-builder.js';
import { SqliteVecStore, type VectorStore } from '../services/storage/vector.js';
import {
  AnnotationSchema,
  StorageStrategySchema,
  validateInput,
  type IngestionPayloadInput,
  type QueryRequestInput,
} from '../utils/validation.js';
import { mergeConfig, parseEngineConfig, type EngineConfig, type EngineConfigInput } from './config.js';
import { recordNotFoundError } from './errors.js';
import { EngineEventBus } from './events.js';

export interface EngineDependencies {
  /** Defaults to the backend named by config.vectorBackend */
  vectors?: VectorStore;
  /** Defaults to LocalHashingEmbedder at config.embeddingDimensions */
  embedder?: Embedder;
  clock?: () => Date;
}

export interface EngineHealth {
  status: 'ok' | 'degraded';
  vector_backend: string;
  records: RecordStats;
  reconciliation: { pending: number; fatal: number };
  pending_gc: number;
  pending_batches: number;
  open_incidents: number;
  recommendations: Record<RecommendationStatus, number>;
  samples: number;
  dynamic_tables: { content_tables: number; query_indexes: number };
}

export interface MaintenanceSummary {
  reconciliation: ReconcileSummary;
  orphans: OrphanSweepSummary;
  gc: GcSummary;
  expired_recommendations: number;
  analysis: { created: number; conflicts: number; duplicates: number };
  samples_deleted: number;
}

export interface AnalysisView {
  record: ContentRecord;
  blob: FullContentBlob | null;
  /** Raw text when any stored copy still hashes to the record's content hash */
  text: string | null;
}

export class ContentStorageEngine {
  private constructor(
    readonly config: EngineConfig,
    readonly events: EngineEventBus,
    private readonly db: DatabaseService,
    private readonly vectors: VectorStore,
    private readonly legs: LegWriter,
    private readonly mapper: ConsistencyMapper,
    private readonly coordinator: StorageCoordinator,
    private readonly reconciler: Reconciler,
    private readonly planner: HybridQueryPlanner,
    private readonly tracker: PerformanceTracker,
    private readonly optimizer: Optimizer,
    private readonly scheduler: MigrationScheduler,
    private readonly clock: () => Date
  ) {}

  /**
   * Open (or create) the engine's databases. Overrides persisted in the
   * database are applied on top of `input`.
   *
   * @throws EngineError CONFIGURATION_ERROR on an invalid config
   */
  static open(input: EngineConfigInput = {}, deps: EngineDependencies = {}): ContentStorageEngine {
    const initial = parseEngineConfig(input);
    const db = DatabaseService.open(initial.name, initial.storagePath);

    let config: EngineConfig;
    let vectors: VectorStore;
    try {
      config = parseEngineConfig(mergeConfig(initial, db.getPersistedConfig()));
      vectors =
        deps.vectors ??
        (config.vectorBackend === 'memory'
          ? new InMemoryVectorStore()
          : new SqliteVecStore(join(dirname(db.getPath()), `${config.name}.vectors.db`)));
    } catch (error) {
      db.close();
      throw error;
    }

    const clock = deps.clock ?? ((): Date => new Date());
    const embedder = deps.embedder ?? new LocalHashingEmbedder(config.embeddingDimensions);
    const engine = ContentStorageEngine.assemble(config, db, vectors, embedder, clock);
    engine.mapper.recoverInterruptedMigrations();
    engine.optimizer.releaseStaleClaims();
    return engine;
  }

  private static assemble(
    config: EngineConfig,
    db: DatabaseService,
    vectors: VectorStore,
    embedder: Embedder,
    clock: () => Date
  ): ContentStorageEngine {
    const registry = new DynamicTableRegistry(db);
    const policy = new PlacementPolicy({ overrides: config.policyOverrides, margins: config.policyMargins });

    const legs = new LegWriter(
      { db, vectors, embedder, registry, clock },
      {
        chunking: { chunkSize: config.chunkSize, overlapPercent: config.chunkOverlapPercent },
        embeddingBatchSize: config.embeddingBatchSize,
        vectorWorkers: config.vectorWorkers,
        upsertBatchSize: config.upsertBatchSize,
        retainChunkText: config.retainChunkText,
        retry: config.retry,
      }
    );

    const events = new EngineEventBus();
    const mapper = new ConsistencyMapper(
      { db, vectors, registry, legs, events, clock },
      { gcGraceMs: config.gcGraceMs }
    );
    const coordinator = new StorageCoordinator(
      { db, vectors, policy, legs, mapper, events, clock },
      { policyVersion: config.policyVersion, reconcile: config.reconcile, orphanGraceMs: config.orphanGraceMs }
    );
    const reconciler = new Reconciler({ db, legs, mapper, events, clock }, config.reconcile);
    const tracker = new PerformanceTracker(db, clock, { sampleRetentionDays: config.sampleRetentionDays });
    const planner = new HybridQueryPlanner(
      { db, text: new TextSearchService(db.getConnection()), vectors, embedder, tracker, clock },
      {
        hybridAlpha: config.hybridAlpha,
        minSimilarity: config.minSimilarity,
        textTimeoutMs: config.textTimeoutMs,
        vectorTimeoutMs: config.vectorTimeoutMs,
        queryDeadlineMs: config.queryDeadlineMs,
        overfetchFactor: config.overfetchFactor,
      }
    );
    const scheduler = new MigrationScheduler(mapper, new MigrationRateLimiter(config.migrationsPerMinute));
    const optimizer = new Optimizer({ db, policy, legs, registry, scheduler, events, clock }, config.optimizer);

    const engine = new ContentStorageEngine(
      config,
      events,
      db,
      vectors,
      legs,
      mapper,
      coordinator,
      reconciler,
      planner,
      tracker,
      optimizer,
      scheduler,
      clock
    );
    console.error(`[Engine] Opened ${db.getPath()} (vectors: ${vectors.backend}, policy v${config.policyVersion})`);
    return engine;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INGESTION AND QUERY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * @throws ValidationError synchronously on a malformed payload
   */
  ingest(payload: IngestionPayloadInput): Promise<IngestResult> {
    return this.coordinator.ingest(payload);
  }

  /**
   * @throws ValidationError synchronously on a malformed request
   * @throws QueryFailedError when every sub-query failed
   */
  query(request: QueryRequestInput): Promise<QueryResponse> {
    return this.planner.query(request);
  }

  getRecord(id: string): ContentRecord | null {
    return this.db.getRecord(id);
  }

  getRecordByLocator(sourceLocator: string): ContentRecord | null {
    return this.db.getRecordByLocator(sourceLocator);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // ANALYSIS COLLABORATORS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * @throws EngineError RECORD_NOT_FOUND
   */
  readForAnalysis(id: string): AnalysisView {
    const record = this.db.getRecord(id);
    if (!record) throw recordNotFoundError(id);
    const blob = record.location.full ? this.db.getBlob(record.location.full.content_hash) : null;
    return { record, blob, text: this.legs.readBody(record) };
  }

  /**
   * Store an annotation under the agent's key. Never touches placement.
   *
   * @throws ValidationError on malformed input
   */
  writeAnnotation(recordId: string, agent: string, payload: Record<string, unknown>): void {
    const input = validateInput(AnnotationSchema, { record_id: recordId, agent, payload });
    this.db.writeAnnotation(input.record_id, input.agent, input.payload, this.now());
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // RECOMMENDATIONS AND MIGRATION
  // ═══════════════════════════════════════════════════════════════════════════

  listRecommendations(status?: RecommendationStatus): OptimizationRecommendation[] {
    return this.db.listRecommendations(status);
  }

  analyze(): AnalysisSummary {
    return this.optimizer.analyze(this.clock());
  }

  applyRecommendation(id: string): Promise<RecommendationStatus> {
    return this.optimizer.apply(id);
  }

  /**
   * Start a rate-limited, cancellable migration of one record
   *
   * @param taskId - defaults to 'migrate:<recordId>'
   */
  scheduleMigration(recordId: string, target: StorageStrategy, taskId = `migrate:${recordId}`): ScheduledMigration {
    return this.scheduler.schedule(taskId, recordId, StorageStrategySchema.parse(target));
  }

  cancelMigration(taskId: string): boolean {
    return this.scheduler.cancel(taskId);
  }

  verifyRecord(id: string): Promise<VerificationReport> {
    return this.mapper.verifyRecord(id);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  health(): EngineHealth {
    const records = this.db.getStats();
    const reconciliation = this.db.countJobsByStatus();
    const openIncidents = this.db.listIncidents(true).length;
    const degraded =
      records.by_status.degraded > 0 || records.needs_review > 0 || reconciliation.fatal > 0 || openIncidents > 0;
    return {
      status: degraded ? 'degraded' : 'ok',
      vector_backend: this.vectors.backend,
      records,
      reconciliation,
      pending_gc: this.db.countPendingGc(),
      pending_batches: this.db.countPendingBatches(),
      open_incidents: openIncidents,
      recommendations: this.db.countRecommendationsByStatus(),
      samples: this.db.countSamples(),
      dynamic_tables: {
        content_tables: this.db.countDynamicTables('content_table'),
        query_indexes: this.db.countDynamicTables('query_index'),
      },
    };
  }

  /**
   * One maintenance pass: reconciliation, orphan sweep, garbage collection,
   * recommendation expiry and analysis, sample retention
   */
  async runMaintenance(now: Date = this.clock()): Promise<MaintenanceSummary> {
    const reconciliation = await this.reconciler.run(now);
    const orphans = await this.coordinator.sweepOrphans(now);
    const gc = await this.mapper.collectGarbage(now);
    const expired = this.optimizer.expire(now);
    const analysis = this.optimizer.analyze(now);
    const samplesDeleted = this.tracker.sweep(now);
    return {
      reconciliation,
      orphans,
      gc,
      expired_recommendations: expired,
      analysis: {
        created: analysis.created.length,
        conflicts: analysis.conflicts.length,
        duplicates: analysis.duplicates,
      },
      samples_deleted: samplesDeleted,
    };
  }

  /**
   * Persist config overrides; they take effect on the next open
   *
   * @throws EngineError CONFIGURATION_ERROR when the merged config is invalid
   */
  persistConfigOverrides(overrides: Omit<EngineConfigInput, 'name' | 'storagePath'>): void {
    const stored = mergeConfig(this.db.getPersistedConfig(), overrides);
    parseEngineConfig(mergeConfig({ ...this.config }, stored));
    this.db.setPersistedConfig(stored);
  }

  /**
   * Cancel running migrations and wait for each to restore its record
   * before the stores close.
   */
  async close(): Promise<void> {
    this.scheduler.cancelAll();
    await this.scheduler.settle();
    try {
      await this.vectors.close();
    } finally {
      this.db.close();
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
