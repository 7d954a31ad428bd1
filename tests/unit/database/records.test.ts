/**
 * Content Record Operation Tests
 *
 * Insert and lookup, pointer swaps, re-scrape merges, access statistics
 * and annotations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DuplicateContentError } from '../../../src/engine/errors.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/index.js';
import {
  BASE_TIME,
  DatabaseService,
  cleanupTestDir,
  createTestDir,
  createTestRecord,
  required,
} from '../helpers.js';

const LATER = '2026-01-17T10:00:00.000Z';

describe('Record operations', () => {
  let testDir: string;
  let db: DatabaseService;

  beforeEach(() => {
    testDir = createTestDir('hcs-db-');
    db = DatabaseService.open('test', testDir);
  });

  afterEach(() => {
    db.close();
    cleanupTestDir(testDir);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // INSERT AND LOOKUP
  // ═══════════════════════════════════════════════════════════════════════════

  describe('insertRecord()', () => {
    it('stores a record with initial counters', () => {
      const input = createTestRecord({ tags: ['a'], metadata: { lang: 'en' } });
      expect(db.insertRecord(input)).toBe(input.id);

      const stored = required(db.getRecord(input.id), 'record');
      expect(stored.source_locator).toBe(input.source_locator);
      expect(stored.profile).toEqual(input.profile);
      expect(stored.location).toEqual({});
      expect(stored.scrape_count).toBe(1);
      expect(stored.query_count).toBe(0);
      expect(stored.last_queried_at).toBeNull();
      expect(stored.needs_review).toBe(false);
      expect(stored.annotations).toEqual({});
      expect(stored.tags).toEqual(['a']);
      expect(stored.metadata).toEqual({ lang: 'en' });
      expect(stored.updated_at).toBe(BASE_TIME);
    });

    it('rejects a second record for the same source', () => {
      const first = createTestRecord();
      db.insertRecord(first);

      const second = createTestRecord({ source_locator: first.source_locator });
      let caught: unknown;
      try {
        db.insertRecord(second);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(DuplicateContentError);
      expect(caught).toMatchObject({
        details: { sourceLocator: first.source_locator, existingRecordId: first.id },
      });
      expect(db.getRecord(second.id)).toBeNull();
    });

    it('finds records by locator and by id list', () => {
      const a = createTestRecord();
      const b = createTestRecord();
      db.insertRecord(a);
      db.insertRecord(b);

      expect(db.getRecordByLocator(b.source_locator)?.id).toBe(b.id);
      expect(db.getRecordByLocator('https://example.com/none')).toBeNull();
      expect(db.getRecordsByIds([a.id, b.id, 'missing']).map((r) => r.id).sort()).toEqual(
        [a.id, b.id].sort()
      );
      expect(db.getRecordsByIds([])).toEqual([]);
    });

    it('filters listRecords by status and strategy', () => {
      db.insertRecord(createTestRecord({ status: 'ready' }));
      db.insertRecord(createTestRecord({ status: 'pending', strategy: 'hybrid' }));

      expect(db.listRecords({ status: 'ready' })).toHaveLength(1);
      expect(db.listRecords({ strategy: 'hybrid' })).toHaveLength(1);
      expect(db.listRecords({ needsReview: true })).toHaveLength(0);
      expect(db.listRecords()).toHaveLength(2);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // STATUS AND POINTER
  // ═══════════════════════════════════════════════════════════════════════════

  describe('updateRecordState()', () => {
    it('updates status and pointer', () => {
      const record = createTestRecord();
      db.insertRecord(record);

      db.updateRecordState(record.id, 'ready', LATER, { full: { content_hash: record.content_hash } });
      const stored = required(db.getRecord(record.id));
      expect(stored.status).toBe('ready');
      expect(stored.location).toEqual({ full: { content_hash: record.content_hash } });
      expect(stored.updated_at).toBe(LATER);
    });

    it('throws RECORD_NOT_FOUND for an unknown id', () => {
      let caught: unknown;
      try {
        db.updateRecordState('missing', 'ready', LATER);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(DatabaseError);
      expect(caught).toMatchObject({ code: DatabaseErrorCode.RECORD_NOT_FOUND });
    });
  });

  describe('compareAndSwapLocation()', () => {
    it('swaps only when the stored pointer matches', () => {
      const record = createTestRecord({
        status: 'ready',
        location: { full: { content_hash: 'sha256:old' } },
      });
      db.insertRecord(record);

      const next = {
        location: {
          vector: { collection: 'content_vectors', batch_id: 'b1', chunk_count: 2 },
        },
        status: 'ready' as const,
        strategy: 'vector_store' as const,
        policy_version: 2,
        confidence: 0.7,
      };

      expect(
        db.compareAndSwapLocation(record.id, { full: { content_hash: 'sha256:other' } }, next, LATER)
      ).toBe(false);
      expect(required(db.getRecord(record.id)).strategy).toBe('full_store');

      expect(
        db.compareAndSwapLocation(record.id, { full: { content_hash: 'sha256:old' } }, next, LATER)
      ).toBe(true);
      const stored = required(db.getRecord(record.id));
      expect(stored.location).toEqual(next.location);
      expect(stored.strategy).toBe('vector_store');
      expect(stored.policy_version).toBe(2);
      expect(stored.confidence).toBe(0.7);
    });

    it('compares pointers independent of key order', () => {
      const location = {
        full: { content_hash: 'sha256:x' },
        vector: { collection: 'c', batch_id: 'b', chunk_count: 1 },
      };
      const record = createTestRecord({ status: 'ready', location });
      db.insertRecord(record);

      const reordered = {
        vector: { chunk_count: 1, batch_id: 'b', collection: 'c' },
        full: { content_hash: 'sha256:x' },
      };
      expect(
        db.compareAndSwapLocation(
          record.id,
          reordered,
          { location: {}, status: 'ready', strategy: 'metadata_only', policy_version: 1, confidence: 0.5 },
          LATER
        )
      ).toBe(true);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // RE-SCRAPE, ACCESS AND ANNOTATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  describe('mergeRescrape()', () => {
    it('bumps the counter and unions tags, keywords and metadata', () => {
      const record = createTestRecord({
        tags: ['a', 'b'],
        keywords: ['mind'],
        metadata: { lang: 'en', source: 'crawl' },
      });
      db.insertRecord(record);

      const merged = db.mergeRescrape(
        record.id,
        { tags: ['b', 'c'], keywords: ['brain'], metadata: { source: 'feed' } },
        LATER
      );
      expect(merged.scrape_count).toBe(2);
      expect(merged.last_scraped_at).toBe(LATER);
      expect(merged.tags).toEqual(['a', 'b', 'c']);
      expect(merged.keywords).toEqual(['mind', 'brain']);
      expect(merged.metadata).toEqual({ lang: 'en', source: 'feed' });
    });

    it('throws for an unknown record', () => {
      expect(() => db.mergeRescrape('missing', { tags: [], keywords: [], metadata: {} }, LATER)).toThrow(
        'Content record missing not found'
      );
    });
  });

  describe('recordAccess()', () => {
    it('counts queries and derives a per-day frequency', () => {
      const record = createTestRecord();
      db.insertRecord(record);

      db.recordAccess([record.id], LATER);
      let stored = required(db.getRecord(record.id));
      expect(stored.query_count).toBe(1);
      expect(stored.last_queried_at).toBe(LATER);
      expect(stored.access_frequency).toBeCloseTo(0.5, 6);

      db.recordAccess([record.id], LATER);
      stored = required(db.getRecord(record.id));
      expect(stored.query_count).toBe(2);
      expect(stored.access_frequency).toBeCloseTo(1, 6);
    });

    it('uses a one-day floor for young records', () => {
      const record = createTestRecord();
      db.insertRecord(record);
      db.recordAccess([record.id], '2026-01-15T11:00:00.000Z');
      expect(required(db.getRecord(record.id)).access_frequency).toBe(1);
    });
  });

  describe('writeAnnotation()', () => {
    it('stores payloads per agent without touching placement', () => {
      const record = createTestRecord({ status: 'ready', location: { full: { content_hash: 'sha256:x' } } });
      db.insertRecord(record);

      db.writeAnnotation(record.id, 'summarizer', { summary: 'short' }, LATER);
      db.writeAnnotation(record.id, 'tagger', { tags: ['x'] }, LATER);

      const stored = required(db.getRecord(record.id));
      expect(stored.annotations).toEqual({
        summarizer: { summary: 'short', written_at: LATER },
        tagger: { tags: ['x'], written_at: LATER },
      });
      expect(stored.location).toEqual({ full: { content_hash: 'sha256:x' } });
      expect(stored.strategy).toBe('full_store');
    });

    it('throws RECORD_NOT_FOUND for an unknown record', () => {
      expect(() => db.writeAnnotation('missing', 'a', {}, LATER)).toThrow(DatabaseError);
    });
  });

  describe('placement queries', () => {
    it('lists ready records below a policy version', () => {
      const old = createTestRecord({ status: 'ready', policy_version: 1 });
      const current = createTestRecord({ status: 'ready', policy_version: 2 });
      const pending = createTestRecord({ status: 'pending', policy_version: 1 });
      db.insertRecord(old);
      db.insertRecord(current);
      db.insertRecord(pending);

      expect(db.listRecordsBelowPolicyVersion(2, 10).map((r) => r.id)).toEqual([old.id]);
    });

    it('skips records already compared against the version', () => {
      const checked = createTestRecord({ status: 'ready', policy_version: 1, created_at: '2026-01-15T09:00:00.000Z' });
      const unchecked = createTestRecord({ status: 'ready', policy_version: 1 });
      db.insertRecord(checked);
      db.insertRecord(unchecked);

      expect(db.listRecordsBelowPolicyVersion(2, 1).map((r) => r.id)).toEqual([checked.id]);
      db.markPolicyChecked([checked.id], 2);
      expect(db.listRecordsBelowPolicyVersion(2, 1).map((r) => r.id)).toEqual([unchecked.id]);
      expect(db.listRecordsBelowPolicyVersion(3, 10).map((r) => r.id)).toEqual([checked.id, unchecked.id]);
    });

    it('lists large full_store records, largest first', () => {
      const big = createTestRecord({ status: 'ready', declared_size: 50_000_000 });
      const bigger = createTestRecord({ status: 'ready', declared_size: 80_000_000 });
      const small = createTestRecord({ status: 'ready', declared_size: 1_000 });
      db.insertRecord(big);
      db.insertRecord(bigger);
      db.insertRecord(small);

      expect(db.listLargeFullStoreRecords(10_000_000, 10).map((r) => r.id)).toEqual([bigger.id, big.id]);
    });

    it('finds records referencing a blob', () => {
      const record = createTestRecord({ status: 'ready', location: { full: { content_hash: 'sha256:shared' } } });
      db.insertRecord(record);
      expect(db.findRecordIdsReferencingBlob('sha256:shared')).toEqual([record.id]);
      expect(db.findRecordIdsReferencingBlob('sha256:none')).toEqual([]);
    });
  });

  it('reports stats by status and strategy', () => {
    db.insertRecord(createTestRecord({ status: 'ready' }));
    db.insertRecord(createTestRecord({ status: 'degraded', strategy: 'hybrid' }));

    const stats = db.getStats();
    expect(stats.total_records).toBe(2);
    expect(stats.by_status).toEqual({ pending: 0, ready: 1, degraded: 1, migrating: 0 });
    expect(stats.by_strategy.hybrid).toBe(1);
    expect(stats.by_strategy.full_store).toBe(1);
    expect(stats.total_blobs).toBe(0);
  });
});
