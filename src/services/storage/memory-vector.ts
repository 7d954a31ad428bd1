/**
 * In-process VectorStore backend
 *
 * Brute-force cosine search over points held in maps. Used when the
 * sqlite-vec extension is not wanted (HCS_VECTOR_BACKEND=memory) and by
 * the test suite.
 *
 * @module services/storage/memory-vector
 */

import {
  VectorError,
  VectorErrorCode,
  matchesFilter,
  validateCollectionName,
  type StoredPoint,
  type VectorPoint,
  type VectorSearchHit,
  type VectorSearchOptions,
  type VectorStore,
} from './vector.js';

interface Collection {
  dimensions: number;
  points: Map<string, VectorPoint>;
}

/**
 * Cosine similarity; 0 when either vector has zero norm
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements VectorStore {
  readonly backend = 'memory';
  private readonly collections = new Map<string, Collection>();

  async ensureCollection(collection: string, dimensions: number): Promise<void> {
    validateCollectionName(collection);
    const existing = this.collections.get(collection);
    if (existing) {
      if (existing.dimensions !== dimensions) {
        throw new VectorError(
          `Collection ${collection} holds ${existing.dimensions}-dimension vectors, got ${dimensions}`,
          VectorErrorCode.INVALID_VECTOR_DIMENSIONS,
          { collection, expected: existing.dimensions, actual: dimensions }
        );
      }
      return;
    }
    this.collections.set(collection, { dimensions, points: new Map() });
  }

  async upsert(collection: string, points: VectorPoint[], signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const target = this.requireCollection(collection);
    for (const point of points) {
      if (point.vector.length !== target.dimensions) {
        throw new VectorError(
          `Vector for ${point.id} must be ${target.dimensions} dimensions, got ${point.vector.length}`,
          VectorErrorCode.INVALID_VECTOR_DIMENSIONS,
          { pointId: point.id, actualDimensions: point.vector.length }
        );
      }
    }
    for (const point of points) {
      target.points.set(point.id, {
        id: point.id,
        vector: Float32Array.from(point.vector),
        payload: { ...point.payload },
      });
    }
  }

  async search(
    collection: string,
    vector: Float32Array,
    options: VectorSearchOptions,
    signal?: AbortSignal
  ): Promise<VectorSearchHit[]> {
    signal?.throwIfAborted();
    const target = this.collections.get(collection);
    if (!target) return [];
    if (vector.length !== target.dimensions) {
      throw new VectorError(
        `Query vector must be ${target.dimensions} dimensions, got ${vector.length}`,
        VectorErrorCode.INVALID_VECTOR_DIMENSIONS,
        { collection, actualDimensions: vector.length }
      );
    }

    const minSimilarity = options.minSimilarity ?? -1;
    const hits: VectorSearchHit[] = [];
    for (const point of target.points.values()) {
      if (!matchesFilter(point.payload, options.filter)) continue;
      const similarity = cosineSimilarity(vector, point.vector);
      if (similarity < minSimilarity) continue;
      hits.push({ id: point.id, similarity, payload: { ...point.payload } });
    }
    hits.sort((a, b) => b.similarity - a.similarity || a.id.localeCompare(b.id));
    return hits.slice(0, Math.max(1, options.limit));
  }

  async getPoints(collection: string, ids: string[]): Promise<StoredPoint[]> {
    const target = this.collections.get(collection);
    if (!target) return [];
    const results: StoredPoint[] = [];
    for (const id of ids) {
      const point = target.points.get(id);
      if (point) results.push({ id, payload: { ...point.payload } });
    }
    return results;
  }

  async deletePoints(collection: string, ids: string[]): Promise<number> {
    const target = this.collections.get(collection);
    if (!target) return 0;
    let removed = 0;
    for (const id of ids) {
      if (target.points.delete(id)) removed++;
    }
    return removed;
  }

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()].sort();
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  getPointCount(collection?: string): number {
    if (collection) return this.collections.get(collection)?.points.size ?? 0;
    let total = 0;
    for (const c of this.collections.values()) total += c.points.size;
    return total;
  }

  private requireCollection(collection: string): Collection {
    const target = this.collections.get(collection);
    if (!target) {
      throw new VectorError(
        `Collection ${collection} does not exist`,
        VectorErrorCode.COLLECTION_NOT_FOUND,
        { collection }
      );
    }
    return target;
  }
}
