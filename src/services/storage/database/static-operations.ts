/**
 * Opening the engine database file and the persisted config overrides
 * kept in its engine_metadata row.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { z } from 'zod';
import {
  configurePragmas,
  describeMissing,
  initializeDatabase,
  migrateToLatest,
  verifySchema,
} from '../migrations/index.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import {
  DEFAULT_STORAGE_PATH,
  getDatabasePath,
  parseJsonColumn,
  validateName,
} from './helpers.js';

/**
 * Open the engine database, creating and initializing it when missing.
 *
 * @throws DatabaseError if the file cannot be opened or the schema is invalid
 */
export function openOrCreateDatabase(
  name: string,
  storagePath?: string
): { db: Database.Database; name: string; path: string; created: boolean } {
  validateName(name);
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(basePath)) {
    mkdirSync(basePath, { recursive: true, mode: 0o700 });
  }
  const created = !existsSync(dbPath);

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(
      `Failed to open database "${name}": ${String(error)}`,
      DatabaseErrorCode.DATABASE_LOCKED,
      error
    );
  }

  try {
    if (created) {
      initializeDatabase(db, name);
    } else {
      configurePragmas(db);
      migrateToLatest(db, name);
    }
  } catch (error) {
    db.close();
    throw error;
  }

  const verification = verifySchema(db);
  if (!verification.valid) {
    db.close();
    throw new DatabaseError(
      `Database schema verification failed; missing ${describeMissing(verification)}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }

  return { db, name, path: dbPath, created };
}

/**
 * Read persisted runtime config overrides
 */
export function getPersistedConfig(db: Database.Database): Record<string, unknown> {
  const row = db.prepare('SELECT config_json FROM engine_metadata WHERE id = 1').get() as
    | { config_json: string }
    | undefined;
  if (!row) return {};
  const parsed = z
    .record(z.unknown())
    .safeParse(parseJsonColumn(row.config_json, 'config_json', 'engine_metadata'));
  if (!parsed.success) {
    throw new DatabaseError(
      'engine_metadata.config_json is not a JSON object',
      DatabaseErrorCode.CORRUPT_ROW
    );
  }
  return parsed.data;
}

/**
 * Persist runtime config overrides (replaces the stored object)
 */
export function setPersistedConfig(db: Database.Database, config: Record<string, unknown>): void {
  db.prepare(
    'UPDATE engine_metadata SET config_json = ?, last_modified_at = ? WHERE id = 1'
  ).run(JSON.stringify(config), new Date().toISOString());
}
