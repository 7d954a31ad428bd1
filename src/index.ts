/**
 * Hybrid content store
 *
 * Classifies incoming content, places it in the relational store, a vector
 * collection, or both, and serves hybrid full-text + semantic queries over
 * the result.
 *
 * Logging goes to stderr (console.error) so stdout stays free for callers.
 *
 * @module index
 */

export { ContentStorageEngine } from './engine/engine.js';
export type {
  AnalysisView,
  EngineDependencies,
  EngineHealth,
  MaintenanceSummary,
} from './engine/engine.js';
export {
  EngineConfigSchema,
  defaultConfig,
  loadEngineConfig,
  parseEngineConfig,
} from './engine/config.js';
export type { EngineConfig, EngineConfigInput, LoadConfigOptions } from './engine/config.js';
export {
  EngineError,
  TransientStoreError,
  ConsistencyViolation,
  DuplicateContentError,
  RecommendationConflict,
  QueryFailedError,
  isTransientStoreError,
} from './engine/errors.js';
export type { ErrorCategory } from './engine/errors.js';
export { EngineEventBus, ENGINE_EVENT_TYPES } from './engine/events.js';
export type { EngineEvent, EngineEventType } from './engine/events.js';
export { ValidationError } from './utils/validation.js';
export type { IngestionPayloadInput, QueryRequestInput, QueryFilters } from './utils/validation.js';

export { classifyContent, detectDomain, inferContentType } from './services/classification/classifier.js';
export { PlacementPolicy, decide, LATEST_POLICY_VERSION } from './services/placement/policy.js';
export type { PlacementDecision, PolicyOverride } from './services/placement/policy.js';
export type { IngestResult } from './services/storage/coordinator.js';
export type { QueryResponse, QueryResultItem } from './services/search/planner.js';
export type { Embedder } from './services/embedding/embedder.js';
export { LocalHashingEmbedder } from './services/embedding/hashing.js';
export type { VectorStore } from './services/storage/vector.js';
export { InMemoryVectorStore } from './services/storage/memory-vector.js';
export { SqliteVecStore } from './services/storage/vector.js';

export * from './models/index.js';
