/**
 * Storage legs
 *
 * Writes one physical part of a record's location: the full-content blob,
 * a committed vector batch, or a row in a specialized table. Every write is
 * idempotent or uses fresh identifiers, so a leg can be retried, replayed
 * by reconciliation, or written again for a migration without harm.
 *
 * No relational transaction is held across a vector-store call.
 *
 * @module services/storage/legs
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  ContentRecord,
  LocationPointer,
  StorageLeg,
} from '../../models/content-record.js';
import type { VectorMapping } from '../../models/storage.js';
import { chunkText, type ChunkingConfig } from '../chunking/chunker.js';
import { embedInBatches, type Embedder } from '../embedding/embedder.js';
import { computeHash } from '../../utils/hash.js';
import { withRetry, type BackoffConfig } from '../../utils/backoff.js';
import { mapWithConcurrency, toBatches } from '../../utils/concurrency.js';
import { isTransientStoreError } from '../../engine/errors.js';
import type { DatabaseService } from './database/index.js';
import type { DynamicTableRegistry } from './schema-builder.js';
import { collectionForDomain, type VectorPoint, type VectorStore } from './vector.js';

export type FullPart = NonNullable<LocationPointer['full']>;
export type VectorPart = NonNullable<LocationPointer['vector']>;
export type TablePart = NonNullable<LocationPointer['table']>;

export interface LegWriterOptions {
  chunking: ChunkingConfig;
  embeddingBatchSize: number;
  vectorWorkers: number;
  upsertBatchSize: number;
  /** Store chunk text on each mapping; off leaves it empty */
  retainChunkText: boolean;
  retry: Partial<BackoffConfig>;
}

export interface LegWriterDeps {
  db: DatabaseService;
  vectors: VectorStore;
  embedder: Embedder;
  registry: DynamicTableRegistry;
  clock: () => Date;
}

/**
 * The record fields a leg write reads
 */
export type LegSubject = Pick<
  ContentRecord,
  'id' | 'domain' | 'content_type' | 'content_hash' | 'title' | 'word_count' | 'metadata' | 'created_at'
>;

export class LegWriter {
  constructor(
    private readonly deps: LegWriterDeps,
    private readonly options: LegWriterOptions
  ) {}

  /**
   * Write one leg and return its pointer fragment
   */
  async write(leg: StorageLeg, record: LegSubject, text: string, signal?: AbortSignal): Promise<LocationPointer> {
    switch (leg) {
      case 'full':
        return { full: await this.writeFull(record, text, signal) };
      case 'vector':
        return { vector: await this.writeVector(record, text, signal) };
      case 'table':
        return { table: await this.writeTable(record, text, signal) };
    }
  }

  /**
   * Blob keyed by content hash. An existing blob with the same hash (this
   * record's or another's) is referenced, never written twice.
   */
  async writeFull(record: LegSubject, text: string, signal?: AbortSignal): Promise<FullPart> {
    const contentHash = computeHash(text);
    await this.retrying('full', signal, async () => {
      this.deps.db.insertBlob({
        content_hash: contentHash,
        owner_record_id: record.id,
        body: text,
        chunks: null,
        created_at: this.now(),
      });
    });
    if (!this.deps.db.blobExists(contentHash)) {
      throw new Error(`Blob ${contentHash} missing after insert for record ${record.id}`);
    }
    return { content_hash: contentHash };
  }

  /**
   * Chunk, embed, stage mappings, upsert with bounded parallelism, then
   * write the completion marker. A failure anywhere before the marker leaves
   * a staged batch for the orphan sweep.
   */
  async writeVector(record: LegSubject, text: string, signal?: AbortSignal): Promise<VectorPart> {
    const { db, vectors, embedder } = this.deps;
    const chunks = chunkText(text, this.options.chunking);
    const collection = collectionForDomain(record.domain);
    const batchId = uuidv4();
    const stagedAt = this.now();

    const embeddings = await embedInBatches(
      embedder,
      chunks.map((c) => c.text),
      this.options.embeddingBatchSize,
      signal
    );
    await this.retrying('vector', signal, () => vectors.ensureCollection(collection, embedder.dimensions));

    const mappings: Omit<VectorMapping, 'state'>[] = chunks.map((chunk) => ({
      point_id: uuidv4(),
      record_id: record.id,
      batch_id: batchId,
      collection,
      chunk_sequence: chunk.index,
      dimensions: embedder.dimensions,
      model: embedder.model,
      word_count: chunk.wordCount,
      chunk_text: this.options.retainChunkText ? chunk.text : '',
      start_offset: chunk.startOffset,
      created_at: stagedAt,
    }));
    db.insertStagedMappings(mappings);

    const points: VectorPoint[] = mappings.map((m, i) => ({
      id: m.point_id,
      vector: embeddings[i],
      payload: {
        content_record_id: record.id,
        chunk_sequence: m.chunk_sequence,
        word_count: m.word_count,
        content_type: record.content_type,
        ingested_at: record.created_at,
        batch_id: batchId,
      },
    }));

    await mapWithConcurrency(
      toBatches(points, this.options.upsertBatchSize),
      this.options.vectorWorkers,
      (batch) => this.retrying('vector', signal, () => vectors.upsert(collection, batch, signal))
    );

    signal?.throwIfAborted();
    db.commitBatch({
      batch_id: batchId,
      record_id: record.id,
      collection,
      chunk_count: chunks.length,
      created_at: this.now(),
    });
    return { collection, batch_id: batchId, chunk_count: chunks.length };
  }

  /**
   * Row in the (domain, content_type) table, creating or evolving the table
   * through its descriptor first.
   */
  async writeTable(record: LegSubject, text: string, signal?: AbortSignal): Promise<TablePart> {
    const { registry } = this.deps;
    return this.retrying('table', signal, async () => {
      const descriptor = registry.ensureContentTable(
        record.domain,
        record.content_type,
        record.metadata,
        this.now()
      );
      const rowId = registry.insertContentRow(
        descriptor,
        {
          record_id: record.id,
          title: record.title,
          body: text,
          word_count: record.word_count,
          created_at: record.created_at,
        },
        record.metadata
      );
      return { table_name: descriptor.table_name, row_id: rowId };
    });
  }

  /**
   * Raw text of a record from whatever it still has: the spool, its blob,
   * its table row, its committed chunks, or the preview when the preview is
   * the whole text. Every candidate must hash to the record's content hash.
   */
  readBody(record: ContentRecord): string | null {
    const { db, registry } = this.deps;
    const candidates: Array<() => string | null> = [
      () => db.getSpooledContent(record.id)?.body ?? null,
      () => (record.location.full ? (db.getBlob(record.location.full.content_hash)?.body ?? null) : null),
      () => {
        const table = record.location.table;
        return table ? (registry.getContentRow(table.table_name, table.row_id)?.body ?? null) : null;
      },
      () => (record.location.vector ? this.rebuildFromChunks(record.location.vector.batch_id) : null),
      () => record.content_preview,
    ];
    for (const candidate of candidates) {
      const body = candidate();
      if (body !== null && computeHash(body) === record.content_hash) return body;
    }
    return null;
  }

  private rebuildFromChunks(batchId: string): string | null {
    const mappings = this.deps.db.getMappingsForBatch(batchId);
    if (mappings.length === 0 || mappings.some((m) => m.state !== 'committed' || m.chunk_text === '')) {
      return null;
    }
    let text = '';
    for (const m of mappings) {
      const skip = text.length - m.start_offset;
      if (skip < 0) return null;
      text += m.chunk_text.slice(skip);
    }
    return text;
  }

  private retrying<T>(leg: StorageLeg, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    return withRetry(() => fn(), isTransientStoreError, {
      ...this.options.retry,
      signal,
      label: `Coordinator:${leg}`,
    });
  }

  private now(): string {
    return this.deps.clock().toISOString();
  }
}

/**
 * Merge pointer fragments; later fragments win per leg
 */
export function mergePointers(...parts: LocationPointer[]): LocationPointer {
  const merged: LocationPointer = {};
  for (const part of parts) {
    if (part.full) merged.full = part.full;
    if (part.vector) merged.vector = part.vector;
    if (part.table) merged.table = part.table;
    if (part.source) merged.source = part.source;
  }
  return merged;
}

/**
 * Legs present in a pointer
 */
export function pointerLegs(pointer: LocationPointer): StorageLeg[] {
  const legs: StorageLeg[] = [];
  if (pointer.full) legs.push('full');
  if (pointer.vector) legs.push('vector');
  if (pointer.table) legs.push('table');
  return legs;
}
