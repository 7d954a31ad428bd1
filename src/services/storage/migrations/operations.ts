/**
 * Schema bootstrap and version checks
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import { applySchemaSteps, configurePragmas, seedSingletons } from './schema-helpers.js';

/**
 * Version stamped in schema_version; 0 for a file that was never bootstrapped
 * or whose bootstrap did not finish.
 */
export function readSchemaVersion(db: Database.Database): number {
  try {
    const stamped = db
      .prepare(`SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
      .get();
    if (!stamped) return 0;

    const row = db.prepare('SELECT version FROM schema_version WHERE id = 1').get() as
      | { version: number }
      | undefined;
    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to read schema version', 'version_check', 'schema_version', error);
  }
}

/**
 * Create every schema object and seed the singleton rows in one transaction.
 * The version row is written inside the same transaction, so an interrupted
 * bootstrap reads back as version 0 and runs again on the next open.
 */
export function initializeDatabase(db: Database.Database, engineName = 'hybrid-content-store'): void {
  configurePragmas(db);
  db.transaction(() => {
    applySchemaSteps(db);
    seedSingletons(db, engineName, new Date().toISOString());
  })();
}

/**
 * Bring an opened file up to SCHEMA_VERSION.
 *
 * @throws MigrationError when the file was written by a newer engine or
 * carries a version with no upgrade path
 */
export function migrateToLatest(db: Database.Database, engineName?: string): void {
  const current = readSchemaVersion(db);
  if (current === SCHEMA_VERSION) return;

  if (current === 0) {
    console.error('[Migrations] Schema not stamped; bootstrapping');
    initializeDatabase(db, engineName);
    return;
  }

  if (current > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version ${current} is newer than supported version ${SCHEMA_VERSION}`,
      'version_check',
      'schema_version'
    );
  }
  throw new MigrationError(`No migration path from schema version ${current} to ${SCHEMA_VERSION}`, 'migrate');
}
