/**
 * Chunker Tests
 *
 * Split priorities, overlap, offsets and config validation.
 */

import { describe, it, expect } from 'vitest';
import {
  chunkText,
  DEFAULT_CHUNKING_CONFIG,
  getOverlapCharacters,
} from '../../../src/services/chunking/chunker.js';

describe('chunkText', () => {
  it('returns a single chunk for short text', () => {
    const chunks = chunkText('Hello world.', { chunkSize: 100, overlapPercent: 10 });
    expect(chunks).toEqual([
      { index: 0, text: 'Hello world.', startOffset: 0, endOffset: 12, wordCount: 2 },
    ]);
  });

  it('returns no chunks for whitespace-only text', () => {
    expect(chunkText('  \n\n  ', { chunkSize: 100, overlapPercent: 10 })).toEqual([]);
  });

  it('prefers a paragraph break and overlaps the next chunk', () => {
    const text = 'x'.repeat(60) + '\n\n' + 'y'.repeat(80);
    const chunks = chunkText(text, { chunkSize: 100, overlapPercent: 10 });

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toMatchObject({ index: 0, startOffset: 0, endOffset: 62, wordCount: 1 });
    expect(chunks[1]).toMatchObject({ index: 1, startOffset: 52, endOffset: 142, wordCount: 2 });
    expect(chunks[1].text).toBe(text.slice(52));
  });

  it('splits after a sentence ending when there is no paragraph break', () => {
    const text = 'a'.repeat(70) + '. ' + 'b'.repeat(60);
    const chunks = chunkText(text, { chunkSize: 100, overlapPercent: 0 });
    expect(chunks[0].endOffset).toBe(72);
    expect(chunks[0].text).toBe('a'.repeat(70) + '. ');
    expect(chunks[1].startOffset).toBe(72);
  });

  it('forces a split at chunkSize when no boundary exists', () => {
    const chunks = chunkText('z'.repeat(250), { chunkSize: 100, overlapPercent: 0 });
    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 100],
      [100, 200],
      [200, 250],
    ]);
  });

  it('covers the whole text when overlap is removed', () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} is here.`).join(' ');
    const chunks = chunkText(text, { chunkSize: 120, overlapPercent: 20 });
    let rebuilt = '';
    for (const chunk of chunks) {
      rebuilt += chunk.text.slice(rebuilt.length - chunk.startOffset);
    }
    expect(rebuilt).toBe(text);
  });

  it('rejects invalid config', () => {
    expect(() => chunkText('abc', { chunkSize: 1, overlapPercent: 0 })).toThrow('chunkSize');
    expect(() => chunkText('abc', { chunkSize: 100, overlapPercent: 50 })).toThrow('overlapPercent');
    expect(() => chunkText('abc', { chunkSize: 100, overlapPercent: -1 })).toThrow('overlapPercent');
  });

  it('computes overlap characters from the percentage', () => {
    expect(getOverlapCharacters({ chunkSize: 2000, overlapPercent: 10 })).toBe(200);
    expect(getOverlapCharacters(DEFAULT_CHUNKING_CONFIG)).toBeGreaterThanOrEqual(0);
  });
});
