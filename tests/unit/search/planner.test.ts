/**
 * Hybrid Query Planner Tests
 *
 * Concurrent text and vector sub-queries, fusion, partial results when one
 * side fails or times out, and visibility of vector batches.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { EngineConfigInput } from '../../../src/engine/config.js';
import { QueryFailedError } from '../../../src/engine/errors.js';
import { resolveMode, vectorFilterFor } from '../../../src/services/search/planner.js';
import { ValidationError } from '../../../src/utils/validation.js';
import {
  ConceptEmbedder,
  FlakyVectorStore,
  cleanupTestDir,
  createHarness,
  createTestDir,
  required,
  type Harness,
} from '../helpers.js';

const FULL_TEXT = 'Consciousness and awareness are studied by philosophy of mind.';
const VECTOR_TEXT = 'Awareness of the mind arises in sentient beings.';

describe('resolveMode', () => {
  it('prefers the explicit mode, then the semantic flag', () => {
    expect(resolveMode({ mode: 'vector', semantic: false })).toBe('vector');
    expect(resolveMode({ semantic: false })).toBe('text');
    expect(resolveMode({ semantic: true })).toBe('hybrid');
    expect(resolveMode({})).toBe('hybrid');
  });

  it('maps query filters onto vector payload filters', () => {
    expect(vectorFilterFor({ domain: 'science', content_type: 'book', from: '2026-01-01T00:00:00.000Z' })).toEqual({
      content_type: 'book',
      ingested_from: '2026-01-01T00:00:00.000Z',
      ingested_to: undefined,
    });
  });
});

describe('HybridQueryPlanner', () => {
  let testDir: string;
  let h: Harness;
  let vectors: FlakyVectorStore;
  let fullId: string;
  let vectorId: string;

  async function setup(config: EngineConfigInput = {}): Promise<void> {
    testDir = createTestDir('hcs-planner-');
    vectors = new FlakyVectorStore();
    h = createHarness(testDir, { vectors, embedder: new ConceptEmbedder(), config });

    fullId = (
      await h.coordinator.ingest({
        raw_text: FULL_TEXT,
        source_locator: 'https://example.com/full',
        domain: 'philosophy',
        strategy: 'full_store',
      })
    ).record_id;
    vectorId = (
      await h.coordinator.ingest({
        raw_text: VECTOR_TEXT,
        source_locator: 'https://example.com/vector',
        domain: 'philosophy',
        strategy: 'vector_store',
      })
    ).record_id;
  }

  afterEach(() => {
    h.close();
    cleanupTestDir(testDir);
  });

  describe('with both sides healthy', () => {
    beforeEach(async () => {
      await setup();
    });

    it('fuses text and vector matches', async () => {
      const response = await h.planner.query({ text: 'consciousness', alpha: 0.5 });

      expect(response).toMatchObject({ mode: 'hybrid', partial: false, total: 2, failures: {} });
      const byId = new Map(response.results.map((r) => [r.record.id, r]));
      expect(byId.get(fullId)).toMatchObject({ score: 0.5, text_score: 1, vector_score: null });
      expect(byId.get(vectorId)).toMatchObject({ score: 0.5, text_score: null, vector_score: 1 });
    });

    it('runs only the text side in text mode', async () => {
      const response = await h.planner.query({ text: 'consciousness', semantic: false });

      expect(response.mode).toBe('text');
      expect(response.results.map((r) => [r.record.id, r.score, r.vector_score])).toEqual([[fullId, 1, null]]);
    });

    it('runs only the vector side in vector mode', async () => {
      const response = await h.planner.query({ text: 'consciousness', mode: 'vector' });
      expect(response.results.map((r) => [r.record.id, r.score, r.text_score])).toEqual([[vectorId, 1, null]]);
    });

    it('pushes the domain filter into both sides', async () => {
      const response = await h.planner.query({ text: 'consciousness', filters: { domain: 'science' } });
      expect(response).toMatchObject({ results: [], total: 0, partial: false });
    });

    it('pages after fusion', async () => {
      const response = await h.planner.query({ text: 'consciousness', limit: 1, offset: 1 });
      expect(response.total).toBe(2);
      expect(response.results).toHaveLength(1);
    });

    it('ignores vectors from a batch the record does not point to', async () => {
      const result = await h.coordinator.ingest({
        raw_text: 'Sentience puzzles philosophers.',
        source_locator: 'https://example.com/stray',
        domain: 'philosophy',
        strategy: 'full_store',
      });
      const record = required(h.db.getRecord(result.record_id));
      await h.legs.writeVector(record, 'Sentience puzzles philosophers.');

      const response = await h.planner.query({ text: 'consciousness', mode: 'vector' });
      expect(response.results.map((r) => r.record.id)).toEqual([vectorId]);
    });

    it('records a sample and the access of returned records', async () => {
      await h.planner.query({ text: 'consciousness', semantic: false });

      expect(h.db.listSamples()[0]).toMatchObject({
        mode: 'text',
        strategy: 'full_store',
        domain: 'philosophy',
        rows_returned: 1,
        partial: false,
      });
      expect(required(h.db.getRecord(fullId))).toMatchObject({ query_count: 1, last_queried_at: h.clock.iso() });
      expect(required(h.db.getRecord(vectorId)).query_count).toBe(0);
    });

    it('rejects a malformed request synchronously', () => {
      expect(() => h.planner.query({ text: '   ' })).toThrow(ValidationError);
      expect(() => h.planner.query({ text: '   ' })).toThrow('text: query text is required');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // FAILURES
  // ═══════════════════════════════════════════════════════════════════════════

  describe('with a failing side', () => {
    it('returns the text side alone when vector search fails', async () => {
      await setup();
      vectors.failSearches = true;

      const response = await h.planner.query({ text: 'consciousness' });
      expect(response.partial).toBe(true);
      expect(response.failures).toEqual({ vector: 'vector search unavailable' });
      expect(response.results.map((r) => [r.record.id, r.score])).toEqual([[fullId, 1]]);
      expect(h.db.listSamples()[0].partial).toBe(true);
    });

    it('returns the text side alone when vector search times out', async () => {
      await setup({ vectorTimeoutMs: 20 });
      vectors.searchDelayMs = 200;

      const response = await h.planner.query({ text: 'consciousness' });
      expect(response.failures).toEqual({ vector: 'vector search timed out after 20ms' });
      expect(response.results.map((r) => r.record.id)).toEqual([fullId]);
    });

    it('fails when every side fails', async () => {
      await setup();
      vectors.failSearches = true;

      const pending = h.planner.query({ text: '!!!' });
      await expect(pending).rejects.toBeInstanceOf(QueryFailedError);
      await expect(pending).rejects.toThrow(
        'All sub-queries failed: text: Query contains no searchable terms; vector: vector search unavailable'
      );
      expect(h.db.countSamples()).toBe(0);
    });
  });
});
