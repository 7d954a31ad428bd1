/**
 * Shared helpers for the database operation modules: file location,
 * SQLite constraint errors and JSON columns.
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default storage directory for engine databases
 */
export const DEFAULT_STORAGE_PATH = join(homedir(), '.hybrid-content-store');

/** Database files are named `<name>.db`; the name must be safe as a file name */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export function validateName(name: string): void {
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}": use letters, digits, "_" or "-"`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

export function getDatabasePath(name: string, storagePath?: string): string {
  return join(storagePath ?? DEFAULT_STORAGE_PATH, `${name}.db`);
}

/**
 * Run a statement, converting SQLite FK constraint errors to DatabaseError.
 *
 * @param context - Error context (e.g., 'inserting blob: owner record does not exist')
 */
export function runWithForeignKeyCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    throw error;
  }
}

/**
 * True when `error` is a SQLite UNIQUE constraint failure on `column`
 * (e.g. 'content_records.source_locator').
 */
export function isUniqueViolation(error: unknown, column: string): boolean {
  return (
    error instanceof Error &&
    error.message.includes('UNIQUE constraint failed') &&
    error.message.includes(column)
  );
}

/**
 * Parse a JSON column, raising CORRUPT_ROW with context on failure
 */
export function parseJsonColumn(raw: string, column: string, id: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new DatabaseError(
      `Corrupt ${column} in row ${id}: ${error instanceof Error ? error.message : String(error)}`,
      DatabaseErrorCode.CORRUPT_ROW,
      error
    );
  }
}
