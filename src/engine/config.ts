/**
 * Engine configuration
 *
 * Defaults, then a .env file and HCS_* environment variables, then explicit
 * overrides, then overrides persisted in engine_metadata (applied on open).
 * Everything goes through EngineConfigSchema, so a bad value fails at
 * startup instead of at first use.
 *
 * @module engine/config
 */

import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { z } from 'zod';
import { DEFAULT_EMBEDDING_DIMENSIONS } from '../services/embedding/hashing.js';
import { EngineError } from './errors.js';

const PolicyOverrideSchema = z.object({
  domain: z.string().min(1),
  minSize: z.number().nonnegative().optional(),
  maxSize: z.number().positive().optional(),
  strategy: z.enum(['full_store', 'vector_store', 'hybrid', 'specialized_table', 'metadata_only']),
  confidence: z.number().min(0).max(1).default(0.9),
});

export const EngineConfigSchema = z.object({
  /** Database file name (without .db) under storagePath */
  name: z
    .string()
    .regex(/^[a-zA-Z0-9_-]+$/)
    .default('content-store'),
  /** Directory holding the relational and vector database files; default ~/.hybrid-content-store */
  storagePath: z.string().optional(),

  vectorBackend: z.enum(['sqlite-vec', 'memory']).default('sqlite-vec'),
  embeddingDimensions: z.number().int().min(8).max(4096).default(DEFAULT_EMBEDDING_DIMENSIONS),
  embeddingBatchSize: z.number().int().min(1).max(1024).default(64),

  chunkSize: z.number().int().min(100).max(100_000).default(2000),
  chunkOverlapPercent: z.number().min(0).max(49).default(10),

  /** Placement policy version applied to new records */
  policyVersion: z.number().int().min(1).default(1),
  policyOverrides: z.array(PolicyOverrideSchema).default([]),
  /** Distances at which placement confidence reaches 1 before clamping */
  policyMargins: z
    .object({
      sizeMarginDecades: z.number().positive().default(0.5),
      scoreMargin: z.number().positive().default(0.2),
    })
    .default({}),

  vectorWorkers: z.number().int().min(1).max(64).default(4),
  /** Points per upsert call */
  upsertBatchSize: z.number().int().min(1).max(1000).default(32),
  /**
   * Keep each chunk's text on its vector mapping. Without it the body of a
   * vector_store record cannot be rebuilt locally, so the record cannot
   * move to a strategy that needs its text.
   */
  retainChunkText: z.boolean().default(true),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).max(10).default(3),
      baseDelayMs: z.number().int().min(0).default(200),
      maxDelayMs: z.number().int().min(0).default(10_000),
    })
    .default({}),

  reconcile: z
    .object({
      maxAttempts: z.number().int().min(1).max(50).default(3),
      baseDelayMs: z.number().int().min(0).default(30_000),
      maxDelayMs: z.number().int().min(0).default(3_600_000),
      batchSize: z.number().int().min(1).default(100),
    })
    .default({}),

  /** Staged vector batches without a marker older than this are swept */
  orphanGraceMs: z.number().int().min(0).default(15 * 60_000),
  /** Delay before superseded location parts may be deleted */
  gcGraceMs: z.number().int().min(0).default(60 * 60_000),

  hybridAlpha: z.number().min(0).max(1).default(0.5),
  minSimilarity: z.number().min(-1).max(1).default(0.2),
  textTimeoutMs: z.number().int().min(1).default(2_000),
  vectorTimeoutMs: z.number().int().min(1).default(3_000),
  queryDeadlineMs: z.number().int().min(1).default(5_000),
  overfetchFactor: z.number().int().min(1).max(10).default(3),

  sampleRetentionDays: z.number().int().min(1).default(30),
  optimizer: z
    .object({
      windowHours: z.number().min(1).default(24),
      minSamples: z.number().int().min(1).default(50),
      latencyThresholdMs: z.number().min(0).default(100),
      largeRecordBytes: z.number().int().min(1).default(10_000_000),
      recommendationTtlDays: z.number().min(1).default(7),
      reevaluationBatchSize: z.number().int().min(1).default(500),
    })
    .default({}),

  migrationsPerMinute: z.number().int().min(1).default(30),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const defaultConfig: EngineConfig = EngineConfigSchema.parse({});

/**
 * HCS_* variable -> config path. Numeric unless listed in STRING_VARS.
 */
const ENV_MAPPING: Record<string, string[]> = {
  HCS_NAME: ['name'],
  HCS_STORAGE_PATH: ['storagePath'],
  HCS_VECTOR_BACKEND: ['vectorBackend'],
  HCS_EMBEDDING_DIMENSIONS: ['embeddingDimensions'],
  HCS_EMBEDDING_BATCH_SIZE: ['embeddingBatchSize'],
  HCS_CHUNK_SIZE: ['chunkSize'],
  HCS_CHUNK_OVERLAP_PERCENT: ['chunkOverlapPercent'],
  HCS_POLICY_VERSION: ['policyVersion'],
  HCS_VECTOR_WORKERS: ['vectorWorkers'],
  HCS_UPSERT_BATCH_SIZE: ['upsertBatchSize'],
  HCS_RETRY_MAX_ATTEMPTS: ['retry', 'maxAttempts'],
  HCS_RETRY_BASE_DELAY_MS: ['retry', 'baseDelayMs'],
  HCS_RECONCILE_MAX_ATTEMPTS: ['reconcile', 'maxAttempts'],
  HCS_RECONCILE_BASE_DELAY_MS: ['reconcile', 'baseDelayMs'],
  HCS_ORPHAN_GRACE_MS: ['orphanGraceMs'],
  HCS_GC_GRACE_MS: ['gcGraceMs'],
  HCS_HYBRID_ALPHA: ['hybridAlpha'],
  HCS_MIN_SIMILARITY: ['minSimilarity'],
  HCS_TEXT_TIMEOUT_MS: ['textTimeoutMs'],
  HCS_VECTOR_TIMEOUT_MS: ['vectorTimeoutMs'],
  HCS_QUERY_DEADLINE_MS: ['queryDeadlineMs'],
  HCS_SAMPLE_RETENTION_DAYS: ['sampleRetentionDays'],
  HCS_MIN_SAMPLES: ['optimizer', 'minSamples'],
  HCS_LATENCY_THRESHOLD_MS: ['optimizer', 'latencyThresholdMs'],
  HCS_MIGRATIONS_PER_MINUTE: ['migrationsPerMinute'],
};

const STRING_VARS = new Set(['HCS_NAME', 'HCS_STORAGE_PATH', 'HCS_VECTOR_BACKEND']);

type ConfigObject = Record<string, unknown>;

function isObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: ConfigObject, path: string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (!isObject(next)) {
      const created: ConfigObject = {};
      node[key] = created;
      node = created;
    } else {
      node = next;
    }
  }
  node[path[path.length - 1]] = value;
}

/**
 * Deep merge of plain objects; arrays and scalars from `source` replace.
 */
export function mergeConfig(base: ConfigObject, source: ConfigObject): ConfigObject {
  const merged: ConfigObject = { ...base };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] = isObject(existing) && isObject(value) ? mergeConfig(existing, value) : value;
  }
  return merged;
}

/**
 * Config fragment from HCS_* variables
 *
 * @throws EngineError CONFIGURATION_ERROR on a non-numeric value
 */
export function configFromEnv(env: Record<string, string | undefined>): ConfigObject {
  const fragment: ConfigObject = {};
  for (const [name, path] of Object.entries(ENV_MAPPING)) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    if (STRING_VARS.has(name)) {
      setPath(fragment, path, raw);
      continue;
    }
    const parsed = Number(raw);
    if (Number.isNaN(parsed)) {
      throw new EngineError('CONFIGURATION_ERROR', `Invalid numeric env var ${name}: "${raw}"`, {
        variable: name,
      });
    }
    setPath(fragment, path, parsed);
  }
  return fragment;
}

/**
 * Validate a raw config object
 *
 * @throws EngineError CONFIGURATION_ERROR listing every failing path
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new EngineError('CONFIGURATION_ERROR', `Invalid engine config: ${problems.join('; ')}`, {
      problems,
    });
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** .env file to read; skipped when missing */
  envPath?: string;
  /** Variables to read instead of process.env */
  env?: Record<string, string | undefined>;
  overrides?: EngineConfigInput;
}

/**
 * Resolve the engine config from .env, environment and overrides.
 * The .env file never overwrites variables already present in `env`.
 */
export function loadEngineConfig(options: LoadConfigOptions = {}): EngineConfig {
  const env: Record<string, string | undefined> = { ...(options.env ?? process.env) };
  if (options.envPath && existsSync(options.envPath)) {
    const fromFile: Record<string, string> = {};
    dotenv.config({ path: options.envPath, processEnv: fromFile, quiet: true });
    for (const [key, value] of Object.entries(fromFile)) {
      if (env[key] === undefined) env[key] = value;
    }
  }

  const fromEnv = configFromEnv(env);
  return parseEngineConfig(mergeConfig(fromEnv, options.overrides ?? {}));
}
