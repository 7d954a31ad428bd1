/**
 * Vector store - similarity search over chunk embeddings
 *
 * The engine talks to the vector substrate only through the VectorStore
 * interface. One collection per domain (`content_<domain>`), cosine
 * similarity, and a payload on every point that the planner filters on.
 *
 * SqliteVecStore keeps points in its own database file and scores them with
 * sqlite-vec's vec_distance_cosine().
 *
 * @module services/storage/vector
 */

import Database from 'better-sqlite3';
import { createRequire } from 'module';
import { existsSync, mkdirSync } from 'fs';
import path from 'path';
import type { VectorPointPayload } from '../../models/storage.js';

const require = createRequire(import.meta.url);

interface SqliteVecModule {
  load: (db: Database.Database) => void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLING
// ═══════════════════════════════════════════════════════════════════════════════

export enum VectorErrorCode {
  INVALID_VECTOR_DIMENSIONS = 'INVALID_VECTOR_DIMENSIONS',
  INVALID_COLLECTION = 'INVALID_COLLECTION',
  COLLECTION_NOT_FOUND = 'COLLECTION_NOT_FOUND',
  VEC_EXTENSION_NOT_LOADED = 'VEC_EXTENSION_NOT_LOADED',
  STORE_FAILED = 'STORE_FAILED',
  SEARCH_FAILED = 'SEARCH_FAILED',
  DELETE_FAILED = 'DELETE_FAILED',
  UNAVAILABLE = 'UNAVAILABLE',
}

/**
 * Error raised by a vector backend. `retryable` marks faults worth another
 * attempt (lost connection, busy store).
 */
export class VectorError extends Error {
  constructor(
    message: string,
    public readonly code: VectorErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly retryable = false
  ) {
    super(message);
    this.name = 'VectorError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface VectorPoint {
  id: string;
  vector: Float32Array;
  payload: VectorPointPayload;
}

/**
 * Payload filter pushed down into the search
 */
export interface VectorSearchFilter {
  content_type?: string;
  /** Inclusive lower bound on payload.ingested_at */
  ingested_from?: string;
  /** Inclusive upper bound on payload.ingested_at */
  ingested_to?: string;
}

export interface VectorSearchOptions {
  limit: number;
  filter?: VectorSearchFilter;
  /** Drop hits below this cosine similarity */
  minSimilarity?: number;
}

export interface VectorSearchHit {
  id: string;
  /** Cosine similarity, 1 - cosine distance */
  similarity: number;
  payload: VectorPointPayload;
}

export interface StoredPoint {
  id: string;
  payload: VectorPointPayload;
}

export interface VectorStore {
  /** Backend name, reported by health() */
  readonly backend: string;

  ensureCollection(collection: string, dimensions: number): Promise<void>;

  /** Insert or replace points. All points must belong to `collection`. */
  upsert(collection: string, points: VectorPoint[], signal?: AbortSignal): Promise<void>;

  /** Nearest neighbours by cosine similarity, best first */
  search(
    collection: string,
    vector: Float32Array,
    options: VectorSearchOptions,
    signal?: AbortSignal
  ): Promise<VectorSearchHit[]>;

  /** Read back stored points; missing ids are omitted */
  getPoints(collection: string, ids: string[]): Promise<StoredPoint[]>;

  /** @returns number of points removed */
  deletePoints(collection: string, ids: string[]): Promise<number>;

  listCollections(): Promise<string[]>;

  close(): Promise<void>;
}

const COLLECTION_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Collection for a domain's chunks
 */
export function collectionForDomain(domain: string): string {
  return `content_${domain}`;
}

export function validateCollectionName(collection: string): void {
  if (!COLLECTION_PATTERN.test(collection)) {
    throw new VectorError(
      `Invalid collection name "${collection}"`,
      VectorErrorCode.INVALID_COLLECTION,
      { collection }
    );
  }
}

export function matchesFilter(payload: VectorPointPayload, filter?: VectorSearchFilter): boolean {
  if (!filter) return true;
  if (filter.content_type && payload.content_type !== filter.content_type) return false;
  if (filter.ingested_from && payload.ingested_at < filter.ingested_from) return false;
  if (filter.ingested_to && payload.ingested_at > filter.ingested_to) return false;
  return true;
}

/**
 * Float32Array to a Buffer over the same bytes (respects subarray offsets)
 */
export function vectorToBuffer(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE-VEC BACKEND
// ═══════════════════════════════════════════════════════════════════════════════

interface PointRow {
  point_id: string;
  content_record_id: string;
  chunk_sequence: number;
  word_count: number;
  content_type: string;
  ingested_at: string;
  batch_id: string;
}

interface SearchRow extends PointRow {
  distance: number;
}

function rowToPayload(row: PointRow): VectorPointPayload {
  return {
    content_record_id: row.content_record_id,
    chunk_sequence: row.chunk_sequence,
    word_count: row.word_count,
    content_type: row.content_type,
    ingested_at: row.ingested_at,
    batch_id: row.batch_id,
  };
}

/**
 * Probe whether the sqlite-vec extension loads on this platform
 */
export function isSqliteVecAvailable(): boolean {
  const probe = new Database(':memory:');
  try {
    const sqliteVec = require('sqlite-vec') as SqliteVecModule;
    sqliteVec.load(probe);
    return true;
  } catch (error) {
    console.error(
      `[VectorStore] sqlite-vec unavailable: ${error instanceof Error ? error.message : String(error)}`
    );
    return false;
  } finally {
    probe.close();
  }
}

export class SqliteVecStore implements VectorStore {
  readonly backend = 'sqlite-vec';
  private readonly db: Database.Database;
  private readonly dimensionsByCollection = new Map<string, number>();

  /**
   * @param dbPath - file for the vector database, or ':memory:'
   * @throws VectorError if sqlite-vec cannot be loaded
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }
    this.db = new Database(dbPath);
    try {
      const sqliteVec = require('sqlite-vec') as SqliteVecModule;
      sqliteVec.load(this.db);
    } catch (error) {
      this.db.close();
      throw new VectorError(
        'sqlite-vec extension failed to load. Install: npm install sqlite-vec',
        VectorErrorCode.VEC_EXTENSION_NOT_LOADED,
        { error: String(error) }
      );
    }

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 30000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vector_collections (
        name TEXT PRIMARY KEY,
        dimensions INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS vector_points (
        point_id TEXT PRIMARY KEY,
        collection TEXT NOT NULL REFERENCES vector_collections(name),
        embedding BLOB NOT NULL,
        content_record_id TEXT NOT NULL,
        chunk_sequence INTEGER NOT NULL,
        word_count INTEGER NOT NULL,
        content_type TEXT NOT NULL,
        ingested_at TEXT NOT NULL,
        batch_id TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_vector_points_collection ON vector_points(collection);
      CREATE INDEX IF NOT EXISTS idx_vector_points_record ON vector_points(content_record_id);
    `);

    const rows = this.db.prepare('SELECT name, dimensions FROM vector_collections').all() as Array<{
      name: string;
      dimensions: number;
    }>;
    for (const row of rows) {
      this.dimensionsByCollection.set(row.name, row.dimensions);
    }
  }

  async ensureCollection(collection: string, dimensions: number): Promise<void> {
    validateCollectionName(collection);
    const existing = this.dimensionsByCollection.get(collection);
    if (existing !== undefined) {
      if (existing !== dimensions) {
        throw new VectorError(
          `Collection ${collection} holds ${existing}-dimension vectors, got ${dimensions}`,
          VectorErrorCode.INVALID_VECTOR_DIMENSIONS,
          { collection, expected: existing, actual: dimensions }
        );
      }
      return;
    }
    this.db
      .prepare(
        'INSERT INTO vector_collections (name, dimensions, created_at) VALUES (?, ?, ?) ON CONFLICT(name) DO NOTHING'
      )
      .run(collection, dimensions, new Date().toISOString());
    this.dimensionsByCollection.set(collection, dimensions);
  }

  async upsert(collection: string, points: VectorPoint[], signal?: AbortSignal): Promise<void> {
    if (points.length === 0) return;
    signal?.throwIfAborted();
    const dimensions = this.requireCollection(collection);

    // Validate ALL vectors first, before any write
    for (const point of points) {
      if (point.vector.length !== dimensions) {
        throw new VectorError(
          `Vector for ${point.id} must be ${dimensions} dimensions, got ${point.vector.length}`,
          VectorErrorCode.INVALID_VECTOR_DIMENSIONS,
          { pointId: point.id, actualDimensions: point.vector.length }
        );
      }
    }

    const stmt = this.db.prepare(`
      INSERT INTO vector_points (
        point_id, collection, embedding, content_record_id, chunk_sequence,
        word_count, content_type, ingested_at, batch_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(point_id) DO UPDATE SET
        collection = excluded.collection,
        embedding = excluded.embedding,
        content_record_id = excluded.content_record_id,
        chunk_sequence = excluded.chunk_sequence,
        word_count = excluded.word_count,
        content_type = excluded.content_type,
        ingested_at = excluded.ingested_at,
        batch_id = excluded.batch_id
    `);
    const insertAll = this.db.transaction((batch: VectorPoint[]) => {
      for (const { id, vector, payload } of batch) {
        stmt.run(
          id,
          collection,
          vectorToBuffer(vector),
          payload.content_record_id,
          payload.chunk_sequence,
          payload.word_count,
          payload.content_type,
          payload.ingested_at,
          payload.batch_id
        );
      }
    });

    try {
      insertAll(points);
    } catch (error) {
      throw new VectorError('Vector upsert failed', VectorErrorCode.STORE_FAILED, {
        collection,
        count: points.length,
        error: String(error),
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
    const dimensions = this.dimensionsByCollection.get(collection);
    if (dimensions === undefined) return [];
    if (vector.length !== dimensions) {
      throw new VectorError(
        `Query vector must be ${dimensions} dimensions, got ${vector.length}`,
        VectorErrorCode.INVALID_VECTOR_DIMENSIONS,
        { collection, actualDimensions: vector.length }
      );
    }

    const conditions = ['collection = ?'];
    const params: unknown[] = [vectorToBuffer(vector), collection];
    const filter = options.filter;
    if (filter?.content_type) {
      conditions.push('content_type = ?');
      params.push(filter.content_type);
    }
    if (filter?.ingested_from) {
      conditions.push('ingested_at >= ?');
      params.push(filter.ingested_from);
    }
    if (filter?.ingested_to) {
      conditions.push('ingested_at <= ?');
      params.push(filter.ingested_to);
    }
    params.push(Math.max(1, options.limit));

    const sql = `
      SELECT point_id, content_record_id, chunk_sequence, word_count, content_type,
             ingested_at, batch_id,
             vec_distance_cosine(embedding, ?) AS distance
      FROM vector_points
      WHERE ${conditions.join(' AND ')}
      ORDER BY distance ASC, point_id ASC
      LIMIT ?
    `;

    let rows: SearchRow[];
    try {
      rows = this.db.prepare(sql).all(...params) as SearchRow[];
    } catch (error) {
      throw new VectorError('Vector search failed', VectorErrorCode.SEARCH_FAILED, {
        collection,
        error: String(error),
      });
    }

    const minSimilarity = options.minSimilarity ?? -1;
    return rows
      .filter((row) => Number.isFinite(row.distance))
      .map((row) => ({ id: row.point_id, similarity: 1 - row.distance, payload: rowToPayload(row) }))
      .filter((hit) => hit.similarity >= minSimilarity);
  }

  async getPoints(collection: string, ids: string[]): Promise<StoredPoint[]> {
    if (ids.length === 0) return [];
    const results: StoredPoint[] = [];
    for (let i = 0; i < ids.length; i += 500) {
      const slice = ids.slice(i, i + 500);
      const placeholders = slice.map(() => '?').join(', ');
      const rows = this.db
        .prepare(
          `SELECT point_id, content_record_id, chunk_sequence, word_count, content_type,
                  ingested_at, batch_id
           FROM vector_points WHERE collection = ? AND point_id IN (${placeholders})`
        )
        .all(collection, ...slice) as PointRow[];
      for (const row of rows) {
        results.push({ id: row.point_id, payload: rowToPayload(row) });
      }
    }
    return results;
  }

  async deletePoints(collection: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const stmt = this.db.prepare('DELETE FROM vector_points WHERE collection = ? AND point_id = ?');
    const deleteAll = this.db.transaction((batch: string[]) => {
      let count = 0;
      for (const id of batch) {
        count += stmt.run(collection, id).changes;
      }
      return count;
    });
    try {
      return deleteAll(ids);
    } catch (error) {
      throw new VectorError(`Failed to delete points from ${collection}`, VectorErrorCode.DELETE_FAILED, {
        collection,
        count: ids.length,
        error: String(error),
      });
    }
  }

  async listCollections(): Promise<string[]> {
    return [...this.dimensionsByCollection.keys()].sort();
  }

  async close(): Promise<void> {
    this.db.close();
  }

  /**
   * Count points, optionally for one collection
   */
  getPointCount(collection?: string): number {
    const row = (
      collection
        ? this.db.prepare('SELECT COUNT(*) AS cnt FROM vector_points WHERE collection = ?').get(collection)
        : this.db.prepare('SELECT COUNT(*) AS cnt FROM vector_points').get()
    ) as { cnt: number };
    return row.cnt;
  }

  private requireCollection(collection: string): number {
    const dimensions = this.dimensionsByCollection.get(collection);
    if (dimensions === undefined) {
      throw new VectorError(
        `Collection ${collection} does not exist`,
        VectorErrorCode.COLLECTION_NOT_FOUND,
        { collection }
      );
    }
    return dimensions;
  }
}
