/**
 * Schema bootstrap steps
 *
 * Turns the DDL list into named steps and applies them. Every statement
 * uses IF NOT EXISTS, so re-running the steps on a partly built file only
 * adds what is missing.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError, type SchemaObjectKind, type SchemaStep } from './types.js';
import { DATABASE_PRAGMAS, SCHEMA_STATEMENTS, SCHEMA_VERSION } from './schema-definitions.js';

const DDL_HEAD = /CREATE\s+(?:UNIQUE\s+|VIRTUAL\s+)?(TABLE|INDEX|TRIGGER)\s+IF NOT EXISTS\s+(\w+)/i;

function kindOf(keyword: string): SchemaObjectKind {
  switch (keyword.toUpperCase()) {
    case 'TABLE':
      return 'table';
    case 'INDEX':
      return 'index';
    default:
      return 'trigger';
  }
}

/**
 * Name the object a CREATE statement makes
 *
 * @throws MigrationError for a statement that is not an idempotent CREATE
 */
export function toSchemaStep(sql: string): SchemaStep {
  const match = DDL_HEAD.exec(sql);
  if (!match) {
    throw new MigrationError(`Not an idempotent CREATE statement: ${sql.trim().slice(0, 60)}`, 'create');
  }
  return { kind: kindOf(match[1]), name: match[2], sql };
}

export const SCHEMA_STEPS: readonly SchemaStep[] = SCHEMA_STATEMENTS.map(toSchemaStep);

/**
 * Per-connection pragmas; SQLite does not persist these, so every open runs them
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set ${pragma}`, 'pragma', undefined, error);
    }
  }
}

export function applySchemaSteps(db: Database.Database, steps: readonly SchemaStep[] = SCHEMA_STEPS): void {
  for (const step of steps) {
    try {
      db.exec(step.sql);
    } catch (error) {
      throw new MigrationError(`Failed to create ${step.kind} ${step.name}`, 'create', step.name, error);
    }
  }
}

/**
 * Seed the singleton rows: the schema version stamp and the engine
 * metadata row that holds persisted config overrides.
 */
export function seedSingletons(db: Database.Database, engineName: string, now: string): void {
  try {
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at) VALUES (1, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(SCHEMA_VERSION, now, now);
    db.prepare(
      `INSERT OR IGNORE INTO engine_metadata (id, engine_name, config_json, created_at, last_modified_at)
       VALUES (1, ?, '{}', ?, ?)`
    ).run(engineName, now, now);
  } catch (error) {
    throw new MigrationError('Failed to seed schema_version and engine_metadata', 'seed', undefined, error);
  }
}
