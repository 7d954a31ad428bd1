/**
 * Row conversion functions for DatabaseService
 *
 * Converts database rows to domain model interfaces. Enum columns and JSON
 * columns are validated at runtime so a corrupt row fails loudly instead of
 * leaking an untyped value.
 */

import { z } from 'zod';
import {
  ContentRecord,
  LocationPointer,
  RECORD_STATUSES,
  STORAGE_LEGS,
  STORAGE_STRATEGIES,
} from '../../../models/content-record.js';
import type { CompletionMarker, FullContentBlob, VectorMapping } from '../../../models/storage.js';
import type { DynamicTableDescriptor } from '../../../models/dynamic-table.js';
import type {
  OptimizationRecommendation,
  PerformanceSample,
} from '../../../models/performance.js';
import type { GcEntry, Incident, ReconciliationJob } from '../../../models/maintenance.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import type {
  CompletionMarkerRow,
  ContentBlobRow,
  ContentRecordRow,
  DynamicTableRow,
  GcEntryRow,
  IncidentRow,
  PerformanceSampleRow,
  ReconciliationJobRow,
  RecommendationRow,
  VectorMappingRow,
} from './types.js';
import { parseJsonColumn } from './helpers.js';

const MAPPING_STATES = ['staged', 'committed'] as const;
const DESCRIPTOR_KINDS = ['content_table', 'query_index'] as const;
const DESCRIPTOR_STATUSES = ['pending', 'applied', 'failed'] as const;
const QUERY_MODES = ['text', 'vector', 'hybrid'] as const;
const RECOMMENDATION_TYPES = ['add_index', 'migrate_strategy'] as const;
const RECOMMENDATION_STATUSES = ['pending', 'applied', 'rejected', 'failed', 'expired'] as const;
const JOB_STATUSES = ['pending', 'succeeded', 'fatal'] as const;
const GC_KINDS = ['blob', 'vector_batch', 'table_row'] as const;
const GC_STATUSES = ['pending', 'done', 'failed'] as const;
const INCIDENT_KINDS = ['reconciliation_exhausted', 'consistency_violation', 'orphan_sweep'] as const;

// ═══════════════════════════════════════════════════════════════════════════════
// JSON COLUMN SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const LocationPointerSchema = z
  .object({
    full: z.object({ content_hash: z.string() }).optional(),
    vector: z
      .object({
        collection: z.string(),
        batch_id: z.string(),
        chunk_count: z.number().int().nonnegative(),
      })
      .optional(),
    table: z.object({ table_name: z.string(), row_id: z.number().int() }).optional(),
    source: z.object({ locator: z.string() }).optional(),
  })
  .strict();

const JsonObjectSchema = z.record(z.unknown());
const StringArraySchema = z.array(z.string());

const ColumnDefinitionSchema = z.object({
  name: z.string(),
  type: z.enum(['TEXT', 'INTEGER', 'REAL']),
  nullable: z.boolean(),
});

const IndexDefinitionSchema = z.object({
  name: z.string(),
  table: z.string(),
  columns: z.array(z.string()),
  unique: z.boolean(),
});

/**
 * Validate that a string value is a member of an enum/union type at runtime.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T {
  const match = validValues.find((v) => v === value);
  if (match === undefined) {
    throw new DatabaseError(
      `Invalid ${fieldName} "${value}" in row ${id}. Valid values: ${validValues.join(', ')}`,
      DatabaseErrorCode.CORRUPT_ROW
    );
  }
  return match;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, column: string, id: string): T {
  const result = schema.safeParse(parseJsonColumn(raw, column, id));
  if (!result.success) {
    throw new DatabaseError(
      `Invalid ${column} in row ${id}: ${result.error.errors.map((e) => e.message).join('; ')}`,
      DatabaseErrorCode.CORRUPT_ROW
    );
  }
  return result.data;
}

export function parseLocation(raw: string, id: string): LocationPointer {
  return parseWith(LocationPointerSchema, raw, 'location_json', id);
}

/**
 * Serialize a pointer with a fixed key order so equal pointers produce equal
 * strings (the compare-and-swap compares the stored text).
 */
export function serializeLocation(location: LocationPointer): string {
  const ordered: LocationPointer = {};
  if (location.full) ordered.full = { content_hash: location.full.content_hash };
  if (location.vector) {
    ordered.vector = {
      collection: location.vector.collection,
      batch_id: location.vector.batch_id,
      chunk_count: location.vector.chunk_count,
    };
  }
  if (location.table) {
    ordered.table = { table_name: location.table.table_name, row_id: location.table.row_id };
  }
  if (location.source) ordered.source = { locator: location.source.locator };
  return JSON.stringify(ordered);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROW CONVERTERS
// ═══════════════════════════════════════════════════════════════════════════════

export function rowToContentRecord(row: ContentRecordRow): ContentRecord {
  return {
    id: row.id,
    source_locator: row.source_locator,
    title: row.title,
    author: row.author,
    domain: row.domain,
    content_type: row.content_type,
    declared_size: row.declared_size,
    content_hash: row.content_hash,
    content_preview: row.content_preview,
    word_count: row.word_count,
    profile: {
      semantic_complexity: row.semantic_complexity,
      topic_coherence: row.topic_coherence,
      information_density: row.information_density,
      query_potential: row.query_potential,
    },
    strategy: validateEnum(row.strategy, STORAGE_STRATEGIES, 'strategy', row.id),
    policy_version: row.policy_version,
    confidence: row.confidence,
    status: validateEnum(row.status, RECORD_STATUSES, 'status', row.id),
    needs_review: row.needs_review === 1,
    location: parseLocation(row.location_json, row.id),
    query_count: row.query_count,
    last_queried_at: row.last_queried_at,
    access_frequency: row.access_frequency,
    scrape_count: row.scrape_count,
    last_scraped_at: row.last_scraped_at,
    metadata: parseWith(JsonObjectSchema, row.metadata_json, 'metadata_json', row.id),
    tags: parseWith(StringArraySchema, row.tags_json, 'tags_json', row.id),
    keywords: parseWith(StringArraySchema, row.keywords_json, 'keywords_json', row.id),
    annotations: parseWith(JsonObjectSchema, row.annotations_json, 'annotations_json', row.id),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToBlob(row: ContentBlobRow): FullContentBlob {
  return {
    content_hash: row.content_hash,
    owner_record_id: row.owner_record_id,
    body: row.body,
    byte_size: row.byte_size,
    chunks:
      row.chunks_json === null
        ? null
        : parseWith(StringArraySchema, row.chunks_json, 'chunks_json', row.content_hash),
    created_at: row.created_at,
  };
}

export function rowToVectorMapping(row: VectorMappingRow): VectorMapping {
  return {
    point_id: row.point_id,
    record_id: row.record_id,
    batch_id: row.batch_id,
    collection: row.collection,
    chunk_sequence: row.chunk_sequence,
    dimensions: row.dimensions,
    model: row.model,
    word_count: row.word_count,
    chunk_text: row.chunk_text,
    start_offset: row.start_offset,
    state: validateEnum(row.state, MAPPING_STATES, 'state', row.point_id),
    created_at: row.created_at,
  };
}

export function rowToCompletionMarker(row: CompletionMarkerRow): CompletionMarker {
  return {
    batch_id: row.batch_id,
    record_id: row.record_id,
    collection: row.collection,
    chunk_count: row.chunk_count,
    created_at: row.created_at,
  };
}

export function rowToDescriptor(row: DynamicTableRow): DynamicTableDescriptor {
  return {
    id: row.id,
    kind: validateEnum(row.kind, DESCRIPTOR_KINDS, 'kind', row.id),
    table_name: row.table_name,
    domain: row.domain,
    content_type: row.content_type,
    version: row.version,
    columns: parseWith(z.array(ColumnDefinitionSchema), row.columns_json, 'columns_json', row.id),
    indexes: parseWith(z.array(IndexDefinitionSchema), row.indexes_json, 'indexes_json', row.id),
    statements: parseWith(StringArraySchema, row.statements_json, 'statements_json', row.id),
    status: validateEnum(row.status, DESCRIPTOR_STATUSES, 'status', row.id),
    row_count: row.row_count,
    query_count: row.query_count,
    error_message: row.error_message,
    created_at: row.created_at,
    applied_at: row.applied_at,
  };
}

export function rowToSample(row: PerformanceSampleRow): PerformanceSample {
  const id = String(row.id);
  return {
    id: row.id,
    query_signature: row.query_signature,
    mode: validateEnum(row.mode, QUERY_MODES, 'mode', id),
    strategy:
      row.strategy === null ? null : validateEnum(row.strategy, STORAGE_STRATEGIES, 'strategy', id),
    domain: row.domain,
    latency_ms: row.latency_ms,
    rows_returned: row.rows_returned,
    partial: row.partial === 1,
    executed_at: row.executed_at,
  };
}

export function rowToRecommendation(row: RecommendationRow): OptimizationRecommendation {
  return {
    id: row.id,
    type: validateEnum(row.type, RECOMMENDATION_TYPES, 'type', row.id),
    target: row.target,
    title: row.title,
    description: row.description,
    params: parseWith(JsonObjectSchema, row.params_json, 'params_json', row.id),
    estimated_improvement: row.estimated_improvement,
    confidence: row.confidence,
    status: validateEnum(row.status, RECOMMENDATION_STATUSES, 'status', row.id),
    status_reason: row.status_reason,
    created_at: row.created_at,
    resolved_at: row.resolved_at,
  };
}

export function rowToReconciliationJob(row: ReconciliationJobRow): ReconciliationJob {
  return {
    id: row.id,
    record_id: row.record_id,
    leg: validateEnum(row.leg, STORAGE_LEGS, 'leg', row.id),
    attempts: row.attempts,
    max_attempts: row.max_attempts,
    next_attempt_at: row.next_attempt_at,
    status: validateEnum(row.status, JOB_STATUSES, 'status', row.id),
    last_error: row.last_error,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToGcEntry(row: GcEntryRow): GcEntry {
  const id = String(row.id);
  return {
    id: row.id,
    kind: validateEnum(row.kind, GC_KINDS, 'kind', id),
    ref: row.ref,
    record_id: row.record_id,
    reason: row.reason,
    eligible_at: row.eligible_at,
    status: validateEnum(row.status, GC_STATUSES, 'status', id),
    created_at: row.created_at,
  };
}

export function rowToIncident(row: IncidentRow): Incident {
  return {
    id: row.id,
    kind: validateEnum(row.kind, INCIDENT_KINDS, 'kind', row.id),
    record_id: row.record_id,
    message: row.message,
    details: parseWith(JsonObjectSchema, row.details_json, 'details_json', row.id),
    resolved: row.resolved === 1,
    created_at: row.created_at,
  };
}
