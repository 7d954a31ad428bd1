/**
 * End-to-end scenarios through the engine surface
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { ContentStorageEngine } from '../../src/engine/engine.js';
import { InMemoryVectorStore } from '../../src/services/storage/memory-vector.js';
import {
  ConceptEmbedder,
  FlakyVectorStore,
  HOUR_MS,
  MINUTE_MS,
  TestClock,
  cleanupTestDir,
  computeHash,
  createTestDir,
  openTestEngine,
  required,
} from '../unit/helpers.js';

const FULL_TEXT = 'Consciousness and awareness are studied by philosophy of mind.';
const VECTOR_TEXT = 'Awareness of the mind arises in sentient beings.';

describe('scenarios', () => {
  let testDir: string;
  let engine: ContentStorageEngine;

  afterEach(async () => {
    await engine.close();
    cleanupTestDir(testDir);
  });

  it('stores a small article whole with no vectors', async () => {
    testDir = createTestDir('hcs-scenario-');
    engine = openTestEngine(testDir);

    const result = await engine.ingest({
      raw_text: FULL_TEXT,
      source_locator: 'https://example.com/tech/article',
      domain: 'technology',
      declared_size: 10_240,
    });
    expect(result).toMatchObject({ status: 'ready', strategy: 'full_store', confidence: 0.99 });

    const { records } = engine.health();
    expect(records.total_blobs).toBe(1);
    expect(records.committed_batches).toBe(0);
    expect(engine.health().pending_batches).toBe(0);
  });

  it('stores a very large book as chunked vectors behind one completion marker', async () => {
    testDir = createTestDir('hcs-scenario-');
    const vectors = new InMemoryVectorStore();
    engine = openTestEngine(testDir, { vectors });

    const text = Array.from(
      { length: 8 },
      (_, i) => `Chapter ${i + 1} follows the river past the old mill and into the valley.`
    ).join(' ');
    const result = await engine.ingest({
      raw_text: text,
      source_locator: 'https://example.com/books/river',
      domain: 'literature',
      declared_size: 60_000_000,
    });
    expect(result).toMatchObject({ status: 'ready', strategy: 'vector_store' });

    const vector = required(required(engine.getRecord(result.record_id)).location.vector);
    expect(vector.chunk_count).toBeGreaterThan(1);
    expect(vectors.getPointCount('content_literature')).toBe(vector.chunk_count);

    const { records } = engine.health();
    expect(records.total_blobs).toBe(0);
    expect(records.committed_batches).toBe(1);
  });

  it('re-places a record under the newer policy and collects its old vectors', async () => {
    testDir = createTestDir('hcs-scenario-');
    const vectors = new InMemoryVectorStore();
    const clock = new TestClock();
    engine = openTestEngine(testDir, { vectors, clock });

    const { record_id } = await engine.ingest({
      raw_text: FULL_TEXT,
      source_locator: 'https://example.com/essays/mind',
      domain: 'philosophy',
      strategy: 'hybrid',
    });
    expect(vectors.getPointCount('content_philosophy')).toBe(1);

    const { created } = engine.analyze();
    expect(created.map((r) => r.params)).toEqual([
      { record_id, from: 'hybrid', to: 'full_store', policy_version: 2, confidence: 0.99 },
    ]);

    expect(await engine.applyRecommendation(created[0].id)).toBe('applied');
    const record = required(engine.getRecord(record_id));
    expect(record).toMatchObject({ status: 'ready', strategy: 'full_store', policy_version: 2, confidence: 0.99 });
    expect(record.location).toEqual({ full: { content_hash: computeHash(FULL_TEXT) } });
    expect(engine.health().pending_gc).toBe(1);

    clock.advance(HOUR_MS);
    const summary = await engine.runMaintenance();
    expect(summary.gc).toEqual({ deleted: 1, retained: 0, failed: 0 });
    expect(summary.analysis).toEqual({ created: 0, conflicts: 0, duplicates: 0 });
    expect(vectors.getPointCount('content_philosophy')).toBe(0);

    const response = await engine.query({ text: 'consciousness' });
    expect(response.results.map((r) => r.record.id)).toEqual([record_id]);
  });

  it('ranks records held in different places by the requested weighting', async () => {
    testDir = createTestDir('hcs-scenario-');
    engine = openTestEngine(testDir, { embedder: new ConceptEmbedder() });

    const full = await engine.ingest({
      raw_text: FULL_TEXT,
      source_locator: 'https://example.com/full',
      domain: 'philosophy',
      strategy: 'full_store',
    });
    const vector = await engine.ingest({
      raw_text: VECTOR_TEXT,
      source_locator: 'https://example.com/vector',
      domain: 'philosophy',
      strategy: 'vector_store',
    });

    const textFirst = await engine.query({ text: 'consciousness', alpha: 1 });
    expect(textFirst.results.map((r) => [r.record.id, r.score])).toEqual([
      [full.record_id, 1],
      [vector.record_id, 0],
    ]);

    const vectorFirst = await engine.query({ text: 'consciousness', alpha: 0 });
    expect(vectorFirst.results.map((r) => [r.record.id, r.score])).toEqual([
      [vector.record_id, 1],
      [full.record_id, 0],
    ]);
  });

  it('escalates a record whose vector store stays down, then sweeps the staged batches', async () => {
    testDir = createTestDir('hcs-scenario-');
    const vectors = new FlakyVectorStore();
    vectors.failUpserts = true;
    const clock = new TestClock();
    engine = openTestEngine(testDir, { vectors, clock });

    const { record_id } = await engine.ingest({
      raw_text: FULL_TEXT,
      source_locator: 'https://example.com/essays/mind',
      strategy: 'vector_store',
    });
    expect(required(engine.getRecord(record_id)).status).toBe('degraded');

    const passes = [];
    for (let i = 0; i < 3; i++) {
      passes.push((await engine.runMaintenance()).reconciliation);
    }
    expect(passes).toEqual([
      { attempted: 1, repaired: 0, rescheduled: 1, fatal: 0 },
      { attempted: 1, repaired: 0, rescheduled: 1, fatal: 0 },
      { attempted: 1, repaired: 0, rescheduled: 0, fatal: 1 },
    ]);
    expect(engine.health()).toMatchObject({
      status: 'degraded',
      open_incidents: 1,
      reconciliation: { pending: 0, fatal: 1 },
      pending_batches: 4,
    });
    expect(required(engine.getRecord(record_id)).needs_review).toBe(true);

    clock.advance(16 * MINUTE_MS);
    expect((await engine.runMaintenance()).orphans).toEqual({ batches: 4, points: 4, failed: 0 });
    expect(engine.health().pending_batches).toBe(0);
  });
});
