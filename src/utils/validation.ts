/**
 * Zod validation schemas for engine inputs
 *
 * Every external input (ingestion payloads, queries, annotations, config
 * overrides) is validated here before any store is touched.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Rejected input. Never retried, never leaves a partial write behind.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS
// ═══════════════════════════════════════════════════════════════════════════════

export const StorageStrategySchema = z.enum([
  'full_store',
  'vector_store',
  'hybrid',
  'specialized_table',
  'metadata_only',
]);

export const QueryModeSchema = z.enum(['text', 'vector', 'hybrid']);

/** Domain and content-type labels: lowercase identifiers */
const LabelSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z][a-z0-9_]*$/, 'must be a lowercase identifier (a-z, 0-9, _)');

const IsoTimestampSchema = z.string().datetime({ offset: true });

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION
// ═══════════════════════════════════════════════════════════════════════════════

export const IngestionPayloadSchema = z.object({
  raw_text: z.string(),
  source_locator: z.string().trim().min(1, 'source_locator is required').max(2048),
  domain: LabelSchema.optional(),
  content_type: LabelSchema.optional(),
  author: z.string().max(512).nullable().optional(),
  title: z.string().max(1024).nullable().optional(),
  declared_size: z.number().int().nonnegative().optional(),
  metadata: z.record(z.unknown()).default({}),
  tags: z.array(z.string().min(1).max(128)).max(256).default([]),
  keywords: z.array(z.string().min(1).max(128)).max(256).default([]),
  /** Force a strategy (operator override); bypasses the placement policy */
  strategy: StorageStrategySchema.optional(),
});

export type IngestionPayloadInput = z.input<typeof IngestionPayloadSchema>;
export type IngestionPayload = z.output<typeof IngestionPayloadSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

export const QueryFiltersSchema = z
  .object({
    domain: LabelSchema.optional(),
    content_type: LabelSchema.optional(),
    from: IsoTimestampSchema.optional(),
    to: IsoTimestampSchema.optional(),
  })
  .refine((f) => !f.from || !f.to || Date.parse(f.from) <= Date.parse(f.to), {
    message: 'from must not be after to',
    path: ['from'],
  });

export const QueryRequestSchema = z.object({
  text: z.string().trim().min(1, 'query text is required').max(4096),
  filters: QueryFiltersSchema.default({}),
  semantic: z.boolean().optional(),
  mode: QueryModeSchema.optional(),
  alpha: z.number().min(0).max(1).optional(),
  limit: z.number().int().min(1).max(100).default(10),
  offset: z.number().int().min(0).default(0),
  deadline_ms: z.number().int().min(1).max(120000).optional(),
});

export type QueryRequestInput = z.input<typeof QueryRequestSchema>;
export type QueryRequest = z.output<typeof QueryRequestSchema>;
export type QueryFilters = z.output<typeof QueryFiltersSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// ANNOTATIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const AnnotationSchema = z.object({
  record_id: z.string().uuid(),
  agent: z.string().min(1).max(128),
  payload: z.record(z.unknown()),
});

export type AnnotationInput = z.output<typeof AnnotationSchema>;
