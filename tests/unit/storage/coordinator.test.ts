/**
 * Storage Coordinator Tests
 *
 * Placement on ingest, staged leg writes, re-scrapes, degradation on a
 * failed leg and the orphan sweep.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { EngineEvent } from '../../../src/engine/events.js';
import { ValidationError } from '../../../src/utils/validation.js';
import {
  FlakyVectorStore,
  MINUTE_MS,
  cleanupTestDir,
  computeHash,
  createHarness,
  createTestDir,
  createTestRecord,
  required,
  type Harness,
} from '../helpers.js';

const SOURCE = 'https://example.com/essays/mind';
const TEXT = 'Consciousness and awareness are studied by philosophy of mind.';

describe('StorageCoordinator', () => {
  let testDir: string;
  let h: Harness;
  let vectors: FlakyVectorStore;
  let events: EngineEvent[];

  beforeEach(() => {
    testDir = createTestDir('hcs-coord-');
    vectors = new FlakyVectorStore();
    h = createHarness(testDir, { vectors });
    events = [];
    h.events.onEvent('*', (event) => events.push(event));
  });

  afterEach(() => {
    h.close();
    cleanupTestDir(testDir);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // INGEST
  // ═══════════════════════════════════════════════════════════════════════════

  describe('ingest()', () => {
    it('places small content whole and makes it ready', async () => {
      const result = await h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE, domain: 'philosophy' });

      expect(result).toMatchObject({
        created: true,
        status: 'ready',
        strategy: 'full_store',
        confidence: 0.99,
        policy_version: 1,
        rule: 'small_size',
        degraded_legs: [],
      });
      const record = required(h.db.getRecord(result.record_id));
      expect(record.location).toEqual({ full: { content_hash: computeHash(TEXT) } });
      expect(record.content_hash).toBe(computeHash(TEXT));
      expect(record.declared_size).toBe(Buffer.byteLength(TEXT, 'utf8'));
      expect(record.content_preview).toBe(TEXT);
      expect(record.word_count).toBe(9);
      expect(events.map((e) => e.type)).toEqual(['record.ingested']);
    });

    it('defaults the declared size to the UTF-8 byte length', async () => {
      const result = await h.coordinator.ingest({ raw_text: 'naïve', source_locator: SOURCE, domain: 'general' });
      expect(required(h.db.getRecord(result.record_id)).declared_size).toBe(6);
    });

    it('rejects a malformed payload synchronously, before any write', () => {
      expect(() => h.coordinator.ingest({ raw_text: TEXT, source_locator: '   ' })).toThrow(ValidationError);
      expect(() => h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE, domain: 'Philosophy!' })).toThrow(
        'domain: must be a lowercase identifier (a-z, 0-9, _)'
      );
      expect(h.db.listRecords()).toEqual([]);
    });

    it('writes both legs for a forced hybrid strategy', async () => {
      const result = await h.coordinator.ingest({
        raw_text: TEXT,
        source_locator: SOURCE,
        domain: 'philosophy',
        strategy: 'hybrid',
      });

      expect(result).toMatchObject({ status: 'ready', strategy: 'hybrid', rule: 'forced', confidence: 0.99 });
      const record = required(h.db.getRecord(result.record_id));
      expect(record.location.full).toEqual({ content_hash: computeHash(TEXT) });
      expect(record.location.vector).toMatchObject({ collection: 'content_philosophy', chunk_count: 1 });
      expect(vectors.getPointCount('content_philosophy')).toBe(1);
    });

    it('keeps only the source for metadata_only', async () => {
      const result = await h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE, strategy: 'metadata_only' });

      const record = required(h.db.getRecord(result.record_id));
      expect(record.status).toBe('ready');
      expect(record.location).toEqual({ source: { locator: SOURCE } });
      expect(h.db.getBlob(computeHash(TEXT))).toBeNull();
    });

    it('writes a specialized table row', async () => {
      const result = await h.coordinator.ingest({
        raw_text: TEXT,
        source_locator: SOURCE,
        domain: 'history',
        content_type: 'book',
        metadata: { year: 1850 },
        strategy: 'specialized_table',
      });

      const record = required(h.db.getRecord(result.record_id));
      expect(record.location.table?.table_name).toBe('ct_history_book_v1');
      expect(record.status).toBe('ready');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // RE-SCRAPE
  // ═══════════════════════════════════════════════════════════════════════════

  describe('re-scrape', () => {
    it('merges a repeated source into the existing record', async () => {
      const first = await h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE, tags: ['mind'] });
      const second = await h.coordinator.ingest({ raw_text: 'changed', source_locator: SOURCE, tags: ['brain'] });

      expect(second).toMatchObject({
        record_id: first.record_id,
        created: false,
        rule: 'rescrape',
        strategy: first.strategy,
        degraded_legs: [],
      });
      const record = required(h.db.getRecord(first.record_id));
      expect(record.scrape_count).toBe(2);
      expect(record.tags).toEqual(['mind', 'brain']);
      expect(record.content_hash).toBe(computeHash(TEXT));
      expect(events.map((e) => e.type)).toEqual(['record.ingested', 'record.rescraped']);
    });

    it('takes over a record left pending by an interrupted ingestion', async () => {
      const stale = createTestRecord({
        source_locator: SOURCE,
        domain: 'history',
        content_type: 'book',
        strategy: 'specialized_table',
      });
      h.db.insertRecord(stale);
      await h.legs.write('table', stale, 'An older draft of the essay.');

      const result = await h.coordinator.ingest({
        raw_text: TEXT,
        source_locator: SOURCE,
        domain: 'history',
        content_type: 'book',
        strategy: 'specialized_table',
      });

      expect(result).toMatchObject({ record_id: stale.id, status: 'ready', strategy: 'specialized_table', degraded_legs: [] });
      const record = required(h.db.getRecord(stale.id));
      expect(record).toMatchObject({ status: 'ready', scrape_count: 2, content_hash: computeHash(TEXT) });
      const table = required(record.location.table);
      expect(required(h.registry.getContentRow(table.table_name, table.row_id)).body).toBe(TEXT);
      expect(h.registry.findContentRowsForRecord(stale.id)).toEqual([table]);
      expect(events.map((e) => e.type)).toEqual(['record.ingested']);
    });

    it('never creates two records for concurrent ingests of one source', async () => {
      const results = await Promise.all([
        h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE }),
        h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE }),
        h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE }),
      ]);

      expect(results.map((r) => r.created)).toEqual([true, false, false]);
      expect(new Set(results.map((r) => r.record_id)).size).toBe(1);
      expect(h.db.listRecords()).toHaveLength(1);
      expect(required(h.db.getRecord(results[0].record_id)).scrape_count).toBe(3);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // DEGRADATION
  // ═══════════════════════════════════════════════════════════════════════════

  describe('failed legs', () => {
    it('keeps the written leg, spools the text and queues the failed leg', async () => {
      vectors.failUpserts = true;
      const result = await h.coordinator.ingest({
        raw_text: TEXT,
        source_locator: SOURCE,
        domain: 'philosophy',
        strategy: 'hybrid',
      });

      expect(result).toMatchObject({ created: true, status: 'degraded', strategy: 'hybrid', degraded_legs: ['vector'] });

      const record = required(h.db.getRecord(result.record_id));
      expect(record.location).toEqual({ full: { content_hash: computeHash(TEXT) } });
      expect(required(h.db.getSpooledContent(record.id)).body).toBe(TEXT);

      const jobs = h.db.listJobsForRecord(record.id);
      expect(jobs).toHaveLength(1);
      expect(jobs[0]).toMatchObject({
        leg: 'vector',
        status: 'pending',
        attempts: 0,
        max_attempts: 3,
        next_attempt_at: h.clock.iso(),
        last_error: 'vector backend offline',
      });

      const degraded = required(events.find((e) => e.type === 'record.degraded'));
      expect(degraded.data).toEqual({
        strategy: 'hybrid',
        legs: ['vector'],
        errors: { vector: 'vector backend offline' },
      });
    });

    it('sweeps the staged batch of a failed vector write after the grace period', async () => {
      vectors.failUpserts = true;
      await h.coordinator.ingest({ raw_text: TEXT, source_locator: SOURCE, strategy: 'vector_store' });
      expect(h.db.countPendingBatches()).toBe(1);

      expect(await h.coordinator.sweepOrphans(h.clock.now())).toEqual({ batches: 0, points: 0, failed: 0 });

      h.clock.advance(16 * MINUTE_MS);
      expect(await h.coordinator.sweepOrphans(h.clock.now())).toEqual({ batches: 1, points: 1, failed: 0 });
      expect(h.db.countPendingBatches()).toBe(0);
    });
  });
});
