/**
 * Shared test helpers
 *
 * Temp directories, a controllable clock, record factories, test doubles
 * for the embedder and vector store, and a harness that wires the engine's
 * services the same way ContentStorageEngine does.
 */

import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { v4 as uuidv4 } from 'uuid';
import { mergeConfig, parseEngineConfig, type EngineConfig, type EngineConfigInput } from '../../src/engine/config.js';
import { ContentStorageEngine } from '../../src/engine/engine.js';
import { EngineEventBus } from '../../src/engine/events.js';
import { MigrationRateLimiter, MigrationScheduler } from '../../src/services/consistency/migration-scheduler.js';
import { ConsistencyMapper } from '../../src/services/consistency/mapper.js';
import type { Embedder } from '../../src/services/embedding/embedder.js';
import { LocalHashingEmbedder } from '../../src/services/embedding/hashing.js';
import { Optimizer } from '../../src/services/performance/optimizer.js';
import { PerformanceTracker } from '../../src/services/performance/tracker.js';
import { PlacementPolicy } from '../../src/services/placement/policy.js';
import { HybridQueryPlanner } from '../../src/services/search/planner.js';
import { TextSearchService } from '../../src/services/search/text-search.js';
import { StorageCoordinator } from '../../src/services/storage/coordinator.js';
import { DatabaseService, type NewContentRecord } from '../../src/services/storage/database/index.js';
import { LegWriter } from '../../src/services/storage/legs.js';
import { InMemoryVectorStore } from '../../src/services/storage/memory-vector.js';
import { sleep } from '../../src/utils/backoff.js';
import { Reconciler } from '../../src/services/storage/reconciler.js';
import { DynamicTableRegistry } from '../../src/services/storage/schema-builder.js';
import type { VectorPoint, VectorSearchHit, VectorSearchOptions, VectorStore } from '../../src/services/storage/vector.js';
import { computeHash } from '../../src/utils/hash.js';

export { DatabaseService, computeHash };

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTestDir(dir: string): void {
  if (dir && existsSync(dir)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLOCK
// ═══════════════════════════════════════════════════════════════════════════════

export const BASE_TIME = '2026-01-15T10:00:00.000Z';

/**
 * Manually advanced clock. `clock` is the function handed to services.
 */
export class TestClock {
  private current: number;

  constructor(start: string = BASE_TIME) {
    this.current = Date.parse(start);
  }

  readonly clock = (): Date => new Date(this.current);

  now(): Date {
    return new Date(this.current);
  }

  iso(): string {
    return new Date(this.current).toISOString();
  }

  advance(ms: number): Date {
    this.current += ms;
    return this.now();
  }

  set(iso: string): void {
    this.current = Date.parse(iso);
  }
}

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a pending record row with default values
 */
export function createTestRecord(overrides: Partial<NewContentRecord> = {}): NewContentRecord {
  const id = uuidv4();
  const text = overrides.content_preview ?? `Test content for ${id}`;
  return {
    id,
    source_locator: `https://example.com/items/${id}`,
    title: 'Test item',
    author: null,
    domain: 'general',
    content_type: 'small_document',
    declared_size: Buffer.byteLength(text, 'utf8'),
    content_hash: computeHash(text),
    content_preview: text,
    word_count: text.split(/\s+/).filter(Boolean).length,
    profile: {
      semantic_complexity: 0.5,
      topic_coherence: 0.5,
      information_density: 0.5,
      query_potential: 0.5,
    },
    strategy: 'full_store',
    policy_version: 1,
    confidence: 0.9,
    status: 'pending',
    location: {},
    last_scraped_at: BASE_TIME,
    metadata: {},
    tags: [],
    keywords: [],
    created_at: BASE_TIME,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DOUBLES
// ═══════════════════════════════════════════════════════════════════════════════

const CONCEPT_TERMS = ['consciousness', 'awareness', 'mind', 'sentience'];

/**
 * Embeds every text mentioning the concept to the same unit vector and
 * everything else to an orthogonal one
 */
export class ConceptEmbedder implements Embedder {
  readonly model = 'concept-test';
  readonly dimensions = 8;

  async embed(texts: string[]): Promise<Float32Array[]> {
    return texts.map((t) => this.vectorFor(t));
  }

  async embedQuery(text: string): Promise<Float32Array> {
    return this.vectorFor(text);
  }

  private vectorFor(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    const lower = text.toLowerCase();
    vector[CONCEPT_TERMS.some((term) => lower.includes(term)) ? 0 : 1] = 1;
    return vector;
  }
}

/**
 * In-memory store whose upserts and searches can be switched to fail
 */
export class FlakyVectorStore extends InMemoryVectorStore {
  failUpserts = false;
  failSearches = false;
  /** Delay before each search resolves */
  searchDelayMs = 0;
  /** Delay before each upsert lands; aborting the signal cuts it short */
  upsertDelayMs = 0;
  upsertCalls = 0;

  override async upsert(collection: string, points: VectorPoint[], signal?: AbortSignal): Promise<void> {
    this.upsertCalls++;
    if (this.failUpserts) throw new Error('vector backend offline');
    if (this.upsertDelayMs > 0) await sleep(this.upsertDelayMs, signal);
    return super.upsert(collection, points, signal);
  }

  override async search(
    collection: string,
    vector: Float32Array,
    options: VectorSearchOptions,
    signal?: AbortSignal
  ): Promise<VectorSearchHit[]> {
    if (this.failSearches) throw new Error('vector search unavailable');
    if (this.searchDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.searchDelayMs));
    }
    return super.search(collection, vector, options, signal);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HARNESS
// ═══════════════════════════════════════════════════════════════════════════════

/** Fast retries, immediate reconciliation, in-memory vectors */
export const TEST_CONFIG: EngineConfigInput = {
  vectorBackend: 'memory',
  embeddingDimensions: 64,
  chunkSize: 200,
  chunkOverlapPercent: 10,
  retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
  reconcile: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, batchSize: 100 },
};

export function testConfig(dir: string, overrides: EngineConfigInput = {}): EngineConfig {
  return parseEngineConfig(mergeConfig({ ...TEST_CONFIG, storagePath: dir }, overrides));
}

export interface Harness {
  config: EngineConfig;
  clock: TestClock;
  db: DatabaseService;
  vectors: VectorStore;
  embedder: Embedder;
  registry: DynamicTableRegistry;
  policy: PlacementPolicy;
  legs: LegWriter;
  events: EngineEventBus;
  mapper: ConsistencyMapper;
  coordinator: StorageCoordinator;
  reconciler: Reconciler;
  tracker: PerformanceTracker;
  planner: HybridQueryPlanner;
  scheduler: MigrationScheduler;
  optimizer: Optimizer;
  close(): void;
}

export interface HarnessOptions {
  name?: string;
  config?: EngineConfigInput;
  vectors?: VectorStore;
  embedder?: Embedder;
  clock?: TestClock;
}

export function createHarness(dir: string, options: HarnessOptions = {}): Harness {
  const config = testConfig(dir, { name: options.name ?? 'test', ...options.config });
  const clock = options.clock ?? new TestClock();
  const db = DatabaseService.open(config.name, dir);
  const vectors = options.vectors ?? new InMemoryVectorStore();
  const embedder = options.embedder ?? new LocalHashingEmbedder(config.embeddingDimensions);
  const registry = new DynamicTableRegistry(db);
  const policy = new PlacementPolicy({ overrides: config.policyOverrides, margins: config.policyMargins });
  const events = new EngineEventBus();

  const legs = new LegWriter(
    { db, vectors, embedder, registry, clock: clock.clock },
    {
      chunking: { chunkSize: config.chunkSize, overlapPercent: config.chunkOverlapPercent },
      embeddingBatchSize: config.embeddingBatchSize,
      vectorWorkers: config.vectorWorkers,
      upsertBatchSize: config.upsertBatchSize,
      retainChunkText: config.retainChunkText,
      retry: config.retry,
    }
  );
  const mapper = new ConsistencyMapper(
    { db, vectors, registry, legs, events, clock: clock.clock },
    { gcGraceMs: config.gcGraceMs }
  );
  const coordinator = new StorageCoordinator(
    { db, vectors, policy, legs, mapper, events, clock: clock.clock },
    { policyVersion: config.policyVersion, reconcile: config.reconcile, orphanGraceMs: config.orphanGraceMs }
  );
  const reconciler = new Reconciler({ db, legs, mapper, events, clock: clock.clock }, config.reconcile);
  const tracker = new PerformanceTracker(db, clock.clock, { sampleRetentionDays: config.sampleRetentionDays });
  const planner = new HybridQueryPlanner(
    { db, text: new TextSearchService(db.getConnection()), vectors, embedder, tracker, clock: clock.clock },
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
  const optimizer = new Optimizer(
    { db, policy, legs, registry, scheduler, events, clock: clock.clock },
    config.optimizer
  );

  return {
    config,
    clock,
    db,
    vectors,
    embedder,
    registry,
    policy,
    legs,
    events,
    mapper,
    coordinator,
    reconciler,
    tracker,
    planner,
    scheduler,
    optimizer,
    close: () => {
      scheduler.cancelAll();
      db.close();
    },
  };
}

export interface TestEngineOptions {
  config?: EngineConfigInput;
  vectors?: VectorStore;
  embedder?: Embedder;
  clock?: TestClock;
}

/**
 * Open a ContentStorageEngine under `dir` with the test config
 */
export function openTestEngine(dir: string, options: TestEngineOptions = {}): ContentStorageEngine {
  return ContentStorageEngine.open(
    { ...TEST_CONFIG, name: 'engine', storagePath: dir, ...options.config },
    {
      vectors: options.vectors,
      embedder: options.embedder,
      clock: (options.clock ?? new TestClock()).clock,
    }
  );
}

/**
 * Narrow a nullable lookup result, failing the test when it is missing
 */
export function required<T>(value: T | null | undefined, what = 'value'): T {
  if (value === null || value === undefined) {
    throw new Error(`Expected ${what} to be present`);
  }
  return value;
}
