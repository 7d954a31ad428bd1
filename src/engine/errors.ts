/**
 * Engine Error Handling
 *
 * Every failure that crosses the engine boundary is an EngineError with a
 * category. Lower layers throw their own coded errors (DatabaseError,
 * VectorError, MigrationError, ValidationError); fromUnknown() maps them.
 *
 * @module engine/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'VALIDATION_ERROR'
  | 'TRANSIENT_STORE_ERROR'
  | 'CONSISTENCY_VIOLATION'
  | 'DUPLICATE_CONTENT'
  | 'RECOMMENDATION_CONFLICT'
  | 'RECORD_NOT_FOUND'
  | 'RECOMMENDATION_NOT_FOUND'
  | 'QUERY_FAILED'
  | 'STORE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Map lower-layer error class names to categories
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  DatabaseError: 'STORE_ERROR',
  VectorError: 'STORE_ERROR',
  MigrationError: 'STORE_ERROR',
  TimeoutError: 'TRANSIENT_STORE_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class EngineError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EngineError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): EngineError {
    if (error instanceof EngineError) {
      return error;
    }

    if (error instanceof Error) {
      const category = isTransientStoreError(error)
        ? 'TRANSIENT_STORE_ERROR'
        : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);
      const code = readStringProperty(error, 'code');
      return new EngineError(category, error.message, {
        originalName: error.name,
        ...(code ? { errorCode: code } : {}),
        stack: error.stack,
      });
    }

    return new EngineError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SPECIFIC ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A store call failed in a way that may succeed on retry
 * (lock contention, network, timeout).
 */
export class TransientStoreError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TRANSIENT_STORE_ERROR', message, details);
    this.name = 'TransientStoreError';
  }
}

/**
 * Read-back verification of a new location failed. The original pointer
 * stays authoritative; never retried automatically.
 */
export class ConsistencyViolation extends EngineError {
  constructor(
    message: string,
    public readonly recordId: string,
    details?: Record<string, unknown>
  ) {
    super('CONSISTENCY_VIOLATION', message, { recordId, ...details });
    this.name = 'ConsistencyViolation';
  }
}

/**
 * A second record was about to be created for an existing source locator.
 */
export class DuplicateContentError extends EngineError {
  constructor(
    public readonly sourceLocator: string,
    public readonly existingRecordId: string
  ) {
    super('DUPLICATE_CONTENT', `Source "${sourceLocator}" is already stored as ${existingRecordId}`, {
      sourceLocator,
      existingRecordId,
    });
    this.name = 'DuplicateContentError';
  }
}

/**
 * A recommendation targets a record or domain that already has a different
 * pending recommendation.
 */
export class RecommendationConflict extends EngineError {
  constructor(
    message: string,
    public readonly conflictingRecommendationId: string
  ) {
    super('RECOMMENDATION_CONFLICT', message, { conflictingRecommendationId });
    this.name = 'RecommendationConflict';
  }
}

/**
 * Every sub-query of a query failed or timed out.
 */
export class QueryFailedError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('QUERY_FAILED', message, details);
    this.name = 'QueryFailedError';
  }
}

export function recordNotFoundError(recordId: string): EngineError {
  return new EngineError('RECORD_NOT_FOUND', `Content record ${recordId} not found`, { recordId });
}

export function recommendationNotFoundError(recommendationId: string): EngineError {
  return new EngineError(
    'RECOMMENDATION_NOT_FOUND',
    `Recommendation ${recommendationId} not found`,
    { recommendationId }
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

const TRANSIENT_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_BUSY_SNAPSHOT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
]);

const TRANSIENT_MESSAGE_PATTERN = /\b(database is locked|timed? ?out|temporarily unavailable)\b/i;

/**
 * Decide whether an error is worth retrying against a store.
 * Validation errors and consistency violations never are.
 */
export function isTransientStoreError(error: unknown): boolean {
  if (error instanceof TransientStoreError) return true;
  if (error instanceof EngineError) return false;
  if (!(error instanceof Error)) return false;
  if (error.name === 'ValidationError') return false;
  if (error.name === 'TimeoutError') return true;

  const code = readStringProperty(error, 'code');
  if (code && TRANSIENT_CODES.has(code)) return true;

  const retryable = readProperty(error, 'retryable');
  if (retryable === true) return true;

  return TRANSIENT_MESSAGE_PATTERN.test(error.message);
}

function readProperty(error: Error, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(error, key)
    ? Reflect.get(error, key)
    : undefined;
}

function readStringProperty(error: Error, key: string): string | undefined {
  const value = readProperty(error, key);
  return typeof value === 'string' ? value : undefined;
}
