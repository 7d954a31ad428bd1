/**
 * Relational store
 *
 * @module services/storage/database
 */

export { DatabaseService } from './service.js';
export { DatabaseError, DatabaseErrorCode } from './types.js';
export type { ListRecordsOptions } from './types.js';
export type { NewContentRecord } from './record-operations.js';
export type { DomainLatencyStats } from './performance-operations.js';
export type { RecordStats } from './stats-operations.js';
export { DEFAULT_STORAGE_PATH } from './helpers.js';
