/**
 * Reconciler Tests
 *
 * Replay of failed legs, backoff scheduling and escalation to review.
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { EngineEvent } from '../../../src/engine/events.js';
import { nextAttemptAt } from '../../../src/services/storage/reconciler.js';
import {
  FlakyVectorStore,
  MINUTE_MS,
  TestClock,
  cleanupTestDir,
  createHarness,
  createTestDir,
  required,
  type Harness,
} from '../helpers.js';

const SOURCE = 'https://example.com/essays/mind';
const TEXT = 'Consciousness and awareness are studied by philosophy of mind.';

describe('nextAttemptAt', () => {
  const schedule = { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 5000 };
  const now = new Date('2026-01-15T10:00:00.000Z');

  it('doubles the delay per failure without jitter', () => {
    expect(nextAttemptAt(now, 0, schedule)).toBe('2026-01-15T10:00:01.000Z');
    expect(nextAttemptAt(now, 2, schedule)).toBe('2026-01-15T10:00:04.000Z');
  });

  it('caps the delay', () => {
    expect(nextAttemptAt(now, 6, schedule)).toBe('2026-01-15T10:00:05.000Z');
  });
});

describe('Reconciler', () => {
  let testDir: string;
  let h: Harness;
  let vectors: FlakyVectorStore;
  let events: EngineEvent[];

  function setup(config: Parameters<typeof createHarness>[1] = {}): void {
    testDir = createTestDir('hcs-recon-');
    vectors = new FlakyVectorStore();
    h = createHarness(testDir, { vectors, ...config });
    events = [];
    h.events.onEvent('*', (event) => events.push(event));
  }

  async function ingestDegraded(): Promise<string> {
    vectors.failUpserts = true;
    const result = await h.coordinator.ingest({
      raw_text: TEXT,
      source_locator: SOURCE,
      domain: 'philosophy',
      strategy: 'hybrid',
    });
    expect(result.status).toBe('degraded');
    return result.record_id;
  }

  afterEach(() => {
    h.close();
    cleanupTestDir(testDir);
  });

  it('repairs the missing leg once the store recovers', async () => {
    setup();
    const recordId = await ingestDegraded();

    vectors.failUpserts = false;
    expect(await h.reconciler.run(h.clock.now())).toEqual({ attempted: 1, repaired: 1, rescheduled: 0, fatal: 0 });

    const record = required(h.db.getRecord(recordId));
    expect(record.status).toBe('ready');
    expect(record.location.vector).toMatchObject({ collection: 'content_philosophy', chunk_count: 1 });
    expect(h.db.getSpooledContent(recordId)).toBeNull();
    expect(h.db.listJobsForRecord(recordId)[0]).toMatchObject({ status: 'succeeded', attempts: 1 });
    expect(events.filter((e) => e.type === 'record.repaired').map((e) => e.entityId)).toEqual([recordId]);
    expect((await h.mapper.verifyRecord(recordId)).ok).toBe(true);
  });

  it('reschedules failures and escalates after the last attempt', async () => {
    setup();
    const recordId = await ingestDegraded();

    expect(await h.reconciler.run(h.clock.now())).toEqual({ attempted: 1, repaired: 0, rescheduled: 1, fatal: 0 });
    expect(await h.reconciler.run(h.clock.now())).toEqual({ attempted: 1, repaired: 0, rescheduled: 1, fatal: 0 });
    expect(await h.reconciler.run(h.clock.now())).toEqual({ attempted: 1, repaired: 0, rescheduled: 0, fatal: 1 });
    expect(await h.reconciler.run(h.clock.now())).toEqual({ attempted: 0, repaired: 0, rescheduled: 0, fatal: 0 });

    const record = required(h.db.getRecord(recordId));
    expect(record.status).toBe('degraded');
    expect(record.needs_review).toBe(true);
    expect(record.location.full).toBeDefined();

    const incidents = h.db.listIncidents();
    expect(incidents).toHaveLength(1);
    expect(incidents[0]).toMatchObject({
      kind: 'reconciliation_exhausted',
      record_id: recordId,
      message: 'Reconciliation of the vector leg gave up after 3 attempts: vector backend offline',
    });
    expect(h.db.countJobsByStatus()).toEqual({ pending: 0, fatal: 1 });
    expect(events.filter((e) => e.type === 'record.review_required')).toHaveLength(1);
  });

  it('waits for the backoff before retrying', async () => {
    const clock = new TestClock();
    setup({ clock, config: { reconcile: { baseDelayMs: MINUTE_MS, maxDelayMs: 10 * MINUTE_MS } } });
    const recordId = await ingestDegraded();

    expect(h.db.listJobsForRecord(recordId)[0].next_attempt_at).toBe('2026-01-15T10:01:00.000Z');
    expect((await h.reconciler.run(clock.now())).attempted).toBe(0);

    clock.advance(MINUTE_MS);
    expect((await h.reconciler.run(clock.now())).rescheduled).toBe(1);
    expect(h.db.listJobsForRecord(recordId)[0]).toMatchObject({
      attempts: 1,
      next_attempt_at: '2026-01-15T10:03:00.000Z',
    });
  });

  it('finishes a job whose leg is already present', async () => {
    setup();
    const recordId = await ingestDegraded();
    vectors.failUpserts = false;
    await h.reconciler.run(h.clock.now());

    const record = required(h.db.getRecord(recordId));
    h.db.enqueueReconciliation(recordId, 'full', 3, h.clock.iso(), 'stale', h.clock.iso());
    const upsertsBefore = vectors.upsertCalls;

    expect(await h.reconciler.run(h.clock.now())).toEqual({ attempted: 1, repaired: 1, rescheduled: 0, fatal: 0 });
    expect(required(h.db.getRecord(recordId)).location).toEqual(record.location);
    expect(vectors.upsertCalls).toBe(upsertsBefore);
  });
});
