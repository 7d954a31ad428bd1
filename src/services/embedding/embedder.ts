/**
 * Embedder - text to vector
 *
 * The coordinator embeds chunks and the planner embeds queries through
 * this interface; any model server can sit behind it.
 *
 * @module services/embedding/embedder
 */

type EmbeddingErrorCode = 'EMBEDDING_FAILED' | 'DIMENSION_MISMATCH' | 'ABORTED';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

export interface Embedder {
  /** Model identifier stored on every vector mapping */
  readonly model: string;
  readonly dimensions: number;

  /** One vector per input text, in input order */
  embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;

  embedQuery(text: string, signal?: AbortSignal): Promise<Float32Array>;
}

/**
 * Embed `texts` in batches of `batchSize`, checking the vector count of
 * every batch.
 */
export async function embedInBatches(
  embedder: Embedder,
  texts: string[],
  batchSize: number,
  signal?: AbortSignal
): Promise<Float32Array[]> {
  const vectors: Float32Array[] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    signal?.throwIfAborted();
    const batch = texts.slice(i, i + batchSize);
    const result = await embedder.embed(batch, signal);
    if (result.length !== batch.length) {
      throw new EmbeddingError(
        `Vector count mismatch: got ${result.length}, expected ${batch.length}`,
        'EMBEDDING_FAILED',
        { vectorCount: result.length, textCount: batch.length }
      );
    }
    for (const vector of result) {
      if (vector.length !== embedder.dimensions) {
        throw new EmbeddingError(
          `Embedder ${embedder.model} returned ${vector.length} dimensions, expected ${embedder.dimensions}`,
          'DIMENSION_MISMATCH',
          { model: embedder.model }
        );
      }
      vectors.push(vector);
    }
  }
  return vectors;
}

/**
 * True when every component is zero (nothing to compare against)
 */
export function isZeroVector(vector: Float32Array): boolean {
  for (let i = 0; i < vector.length; i++) {
    if (vector[i] !== 0) return false;
  }
  return true;
}
