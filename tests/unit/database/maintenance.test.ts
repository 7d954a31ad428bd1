/**
 * Maintenance, Recommendation and Sample Operation Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { OptimizationRecommendation } from '../../../src/models/performance.js';
import {
  BASE_TIME,
  DatabaseService,
  cleanupTestDir,
  createTestDir,
  createTestRecord,
  required,
} from '../helpers.js';

const T1 = '2026-01-15T10:01:00.000Z';
const T2 = '2026-01-15T10:02:00.000Z';

function recommendation(overrides: Partial<OptimizationRecommendation> = {}): OptimizationRecommendation {
  return {
    id: 'rec-1',
    type: 'add_index',
    target: 'domain:science',
    title: 'Index science',
    description: 'Slow domain',
    params: { domain: 'science' },
    estimated_improvement: 25,
    confidence: 0.8,
    status: 'pending',
    status_reason: null,
    created_at: BASE_TIME,
    resolved_at: null,
    ...overrides,
  };
}

describe('Maintenance operations', () => {
  let testDir: string;
  let db: DatabaseService;
  let recordId: string;

  beforeEach(() => {
    testDir = createTestDir('hcs-db-');
    db = DatabaseService.open('test', testDir);
    recordId = db.insertRecord(createTestRecord());
  });

  afterEach(() => {
    db.close();
    cleanupTestDir(testDir);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // RECONCILIATION JOBS
  // ═══════════════════════════════════════════════════════════════════════════

  describe('reconciliation jobs', () => {
    it('keeps one pending job per record and leg', () => {
      const first = db.enqueueReconciliation(recordId, 'vector', 3, T1, 'offline', BASE_TIME);
      const again = db.enqueueReconciliation(recordId, 'vector', 3, T2, 'still offline', T1);

      expect(again.id).toBe(first.id);
      expect(again.last_error).toBe('still offline');
      expect(again.next_attempt_at).toBe(T1);
      expect(db.listJobsForRecord(recordId)).toHaveLength(1);

      db.enqueueReconciliation(recordId, 'full', 3, T1, 'disk', BASE_TIME);
      expect(db.listJobsForRecord(recordId)).toHaveLength(2);
    });

    it('returns only jobs due by now', () => {
      db.enqueueReconciliation(recordId, 'vector', 3, T2, 'offline', BASE_TIME);
      expect(db.getDueJobs(T1)).toEqual([]);
      expect(db.getDueJobs(T2)).toHaveLength(1);
    });

    it('turns fatal once attempts reach the maximum', () => {
      const job = db.enqueueReconciliation(recordId, 'vector', 2, T1, 'offline', BASE_TIME);

      const once = required(db.recordJobFailure(job.id, 'fail 1', T2, T1));
      expect(once).toMatchObject({ attempts: 1, status: 'pending', last_error: 'fail 1', next_attempt_at: T2 });

      const twice = required(db.recordJobFailure(job.id, 'fail 2', T2, T2));
      expect(twice).toMatchObject({ attempts: 2, status: 'fatal' });
      expect(db.countJobsByStatus()).toEqual({ pending: 0, fatal: 1 });
      expect(db.getOpenJob(recordId, 'vector')).toBeNull();
    });

    it('marks success and clears the error', () => {
      const job = db.enqueueReconciliation(recordId, 'full', 3, T1, 'disk', BASE_TIME);
      db.markJobSucceeded(job.id, T1);
      expect(db.listJobsForRecord(recordId)[0]).toMatchObject({
        status: 'succeeded',
        attempts: 1,
        last_error: null,
      });
      expect(db.countJobsByStatus()).toEqual({ pending: 0, fatal: 0 });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // GC QUEUE, INCIDENTS AND SPOOL
  // ═══════════════════════════════════════════════════════════════════════════

  describe('gc queue', () => {
    it('releases entries once eligible', () => {
      const id = db.enqueueGc(
        { kind: 'blob', ref: 'sha256:x', record_id: recordId, reason: 'migrated', eligible_at: T2 },
        BASE_TIME
      );
      expect(db.getDueGcEntries(T1)).toEqual([]);
      expect(db.getDueGcEntries(T2).map((e) => e.id)).toEqual([id]);
      expect(db.countPendingGc()).toBe(1);

      db.markGcEntry(id, 'done');
      expect(db.countPendingGc()).toBe(0);
      expect(db.listGcEntries(recordId)[0]).toMatchObject({ kind: 'blob', ref: 'sha256:x', status: 'done' });
    });
  });

  describe('incidents', () => {
    it('lists open incidents until resolved', () => {
      const incident = db.insertIncident('consistency_violation', recordId, 'pointer moved', { leg: 'full' }, BASE_TIME);
      expect(db.listIncidents()).toEqual([incident]);

      expect(db.resolveIncident(incident.id)).toBe(true);
      expect(db.listIncidents()).toEqual([]);
      expect(db.listIncidents(false)[0]).toMatchObject({ id: incident.id, resolved: true, details: { leg: 'full' } });
    });
  });

  describe('content spool', () => {
    it('replaces and deletes spooled text', () => {
      db.spoolContent(recordId, 'sha256:a', 'first', BASE_TIME);
      db.spoolContent(recordId, 'sha256:b', 'second', T1);

      expect(db.getSpooledContent(recordId)).toEqual({
        record_id: recordId,
        content_hash: 'sha256:b',
        body: 'second',
        created_at: BASE_TIME,
      });
      expect(db.deleteSpooledContent(recordId)).toBe(true);
      expect(db.getSpooledContent(recordId)).toBeNull();
      expect(db.deleteSpooledContent(recordId)).toBe(false);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // RECOMMENDATIONS AND SAMPLES
  // ═══════════════════════════════════════════════════════════════════════════

  describe('recommendations', () => {
    it('resolves a pending recommendation once', () => {
      db.insertRecommendation(recommendation());
      expect(db.findPendingForTarget('domain:science').map((r) => r.id)).toEqual(['rec-1']);

      expect(db.resolveRecommendation('rec-1', 'applied', null, T1)).toBe(true);
      expect(db.resolveRecommendation('rec-1', 'failed', 'late', T2)).toBe(false);
      expect(required(db.getRecommendation('rec-1'))).toMatchObject({ status: 'applied', resolved_at: T1 });
      expect(db.findPendingForTarget('domain:science')).toEqual([]);
    });

    it('expires pending recommendations created before the cutoff', () => {
      db.insertRecommendation(recommendation({ id: 'old' }));
      db.insertRecommendation(recommendation({ id: 'new', target: 'domain:history', created_at: T2 }));

      expect(db.expirePendingRecommendations(T1, T2)).toBe(1);
      expect(required(db.getRecommendation('old'))).toMatchObject({
        status: 'expired',
        status_reason: 'not applied within retention window',
      });
      expect(db.countRecommendationsByStatus()).toEqual({
        pending: 1,
        applied: 0,
        rejected: 0,
        failed: 0,
        expired: 1,
      });
      expect(db.listRecommendations('pending').map((r) => r.id)).toEqual(['new']);
    });
  });

  describe('performance samples', () => {
    const sample = {
      query_signature: 'sig',
      mode: 'hybrid' as const,
      strategy: 'full_store' as const,
      domain: 'science',
      latency_ms: 100,
      rows_returned: 3,
      partial: false,
      executed_at: BASE_TIME,
    };

    it('aggregates latency per domain, skipping unfiltered queries', () => {
      db.insertSample(sample);
      db.insertSample({ ...sample, latency_ms: 300, executed_at: T1 });
      db.insertSample({ ...sample, domain: null, latency_ms: 900 });

      expect(db.getDomainLatencyStats(BASE_TIME)).toEqual([
        { domain: 'science', sample_count: 2, mean_latency_ms: 200, max_latency_ms: 300 },
      ]);
      expect(db.getDomainLatencyStats(T1)).toEqual([
        { domain: 'science', sample_count: 1, mean_latency_ms: 300, max_latency_ms: 300 },
      ]);
    });

    it('deletes samples before the cutoff', () => {
      db.insertSample(sample);
      db.insertSample({ ...sample, executed_at: T2 });
      expect(db.deleteSamplesBefore(T1)).toBe(1);
      expect(db.countSamples()).toBe(1);
      expect(db.listSamples()[0]).toMatchObject({ executed_at: T2, partial: false, mode: 'hybrid' });
    });
  });

  it('persists config overrides', () => {
    expect(db.getPersistedConfig()).toEqual({});
    db.setPersistedConfig({ hybridAlpha: 0.7 });
    expect(db.getPersistedConfig()).toEqual({ hybridAlpha: 0.7 });
  });
});
