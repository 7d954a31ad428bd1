/**
 * Physical storage interfaces: full-content blobs, vector mappings and
 * completion markers.
 */

/**
 * Full content blob, keyed by content hash.
 * Owned by exactly one record; a second record with identical content
 * references the existing blob.
 */
export interface FullContentBlob {
  content_hash: string;
  owner_record_id: string;
  body: string;
  byte_size: number;
  /** Optional paragraph chunks kept alongside the body */
  chunks: string[] | null;
  created_at: string;
}

/**
 * Staged mappings exist between the first upsert and the completion marker;
 * only committed mappings are visible to queries.
 */
export type MappingState = 'staged' | 'committed';

export interface VectorMapping {
  point_id: string;
  record_id: string;
  batch_id: string;
  collection: string;
  chunk_sequence: number;
  dimensions: number;
  model: string;
  word_count: number;
  /** Chunk text and its offset in the raw text, kept so the body can be rebuilt */
  chunk_text: string;
  start_offset: number;
  state: MappingState;
  created_at: string;
}

/**
 * Written once, after every chunk of a batch was acknowledged by the vector store.
 */
export interface CompletionMarker {
  batch_id: string;
  record_id: string;
  collection: string;
  chunk_count: number;
  created_at: string;
}

/**
 * Payload attached to each vector point
 */
export interface VectorPointPayload {
  content_record_id: string;
  chunk_sequence: number;
  word_count: number;
  content_type: string;
  /** ISO 8601 ingestion time */
  ingested_at: string;
  batch_id: string;
}
