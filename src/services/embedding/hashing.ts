/**
 * LocalHashingEmbedder - deterministic signed feature hashing
 *
 * Each token is hashed (FNV-1a, 32 bit) to a dimension and a sign; weights
 * are sublinear term frequencies and the result is L2-normalized. No model
 * server, no randomness: identical text always yields an identical vector.
 *
 * @module services/embedding/hashing
 */

import type { Embedder } from './embedder.js';
import { tokenize } from '../../utils/text.js';

export const DEFAULT_EMBEDDING_DIMENSIONS = 384;
export const HASHING_MODEL_NAME = 'local-hashing-v1';

export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class LocalHashingEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;

  constructor(dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 8) {
      throw new Error(`Embedding dimensions must be an integer >= 8, got ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.model = `${HASHING_MODEL_NAME}-${dimensions}`;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    signal?.throwIfAborted();
    return texts.map((t) => this.embedSync(t));
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<Float32Array> {
    signal?.throwIfAborted();
    return this.embedSync(text);
  }

  embedSync(text: string): Float32Array {
    const counts = new Map<string, number>();
    for (const token of tokenize(text)) {
      if (token.length < 2) continue;
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const vector = new Float32Array(this.dimensions);
    for (const [token, count] of counts) {
      const hash = fnv1a(token);
      const index = hash % this.dimensions;
      const sign = (hash >>> 31) === 1 ? -1 : 1;
      vector[index] += sign * (1 + Math.log(count));
    }

    let norm = 0;
    for (let i = 0; i < vector.length; i++) norm += vector[i] * vector[i];
    if (norm === 0) return vector;
    const scale = 1 / Math.sqrt(norm);
    for (let i = 0; i < vector.length; i++) vector[i] *= scale;
    return vector;
  }
}
