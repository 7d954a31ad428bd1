/**
 * Relational schema bootstrap, upgrade and verification
 *
 * @module migrations
 */

export { MigrationError, type SchemaStep, type SchemaVerification } from './types.js';
export { initializeDatabase, migrateToLatest, readSchemaVersion } from './operations.js';
export { configurePragmas, SCHEMA_STEPS } from './schema-helpers.js';
export { describeMissing, verifySchema } from './verification.js';
