/**
 * Dynamic table descriptor operations for DatabaseService
 *
 * Descriptors are the registry of runtime-created tables and indexes.
 * Applying one executes its DDL statements and flips it to 'applied'
 * in the same transaction.
 */

import Database from 'better-sqlite3';
import type { DescriptorKind, DynamicTableDescriptor } from '../../../models/dynamic-table.js';
import { DatabaseError, DatabaseErrorCode, DynamicTableRow } from './types.js';
import { rowToDescriptor } from './converters.js';

export function insertDescriptor(db: Database.Database, descriptor: DynamicTableDescriptor): void {
  db.prepare(
    `INSERT INTO dynamic_tables (
      id, kind, table_name, domain, content_type, version, columns_json, indexes_json,
      statements_json, status, row_count, query_count, error_message, created_at, applied_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    descriptor.id,
    descriptor.kind,
    descriptor.table_name,
    descriptor.domain,
    descriptor.content_type,
    descriptor.version,
    JSON.stringify(descriptor.columns),
    JSON.stringify(descriptor.indexes),
    JSON.stringify(descriptor.statements),
    descriptor.status,
    descriptor.row_count,
    descriptor.query_count,
    descriptor.error_message,
    descriptor.created_at,
    descriptor.applied_at
  );
}

export function getDescriptor(db: Database.Database, id: string): DynamicTableDescriptor | null {
  const row = db.prepare('SELECT * FROM dynamic_tables WHERE id = ?').get(id) as
    | DynamicTableRow
    | undefined;
  return row ? rowToDescriptor(row) : null;
}

/**
 * Highest-version descriptor of a kind for (domain, content_type)
 */
export function getLatestDescriptor(
  db: Database.Database,
  kind: DescriptorKind,
  domain: string,
  contentType: string | null
): DynamicTableDescriptor | null {
  const row = db
    .prepare(
      `SELECT * FROM dynamic_tables
       WHERE kind = ? AND domain = ? AND content_type IS ?
       ORDER BY version DESC LIMIT 1`
    )
    .get(kind, domain, contentType) as DynamicTableRow | undefined;
  return row ? rowToDescriptor(row) : null;
}

export function listDescriptors(
  db: Database.Database,
  kind?: DescriptorKind
): DynamicTableDescriptor[] {
  const rows = (
    kind
      ? db
          .prepare('SELECT * FROM dynamic_tables WHERE kind = ? ORDER BY created_at ASC, id ASC')
          .all(kind)
      : db.prepare('SELECT * FROM dynamic_tables ORDER BY created_at ASC, id ASC').all()
  ) as DynamicTableRow[];
  return rows.map(rowToDescriptor);
}

/**
 * Execute a descriptor's DDL and mark it applied, atomically.
 * On failure the transaction rolls back and the descriptor is marked failed.
 */
export function applyDescriptor(db: Database.Database, id: string, now: string): DynamicTableDescriptor {
  const descriptor = getDescriptor(db, id);
  if (!descriptor) {
    throw new DatabaseError(`Dynamic table descriptor ${id} not found`, DatabaseErrorCode.RECORD_NOT_FOUND);
  }
  if (descriptor.status === 'applied') {
    return descriptor;
  }

  const apply = db.transaction(() => {
    for (const statement of descriptor.statements) {
      db.exec(statement);
    }
    db.prepare(
      `UPDATE dynamic_tables SET status = 'applied', applied_at = ?, error_message = NULL WHERE id = ?`
    ).run(now, id);
  });

  try {
    apply();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    db.prepare(`UPDATE dynamic_tables SET status = 'failed', error_message = ? WHERE id = ?`).run(
      message,
      id
    );
    throw error;
  }

  return { ...descriptor, status: 'applied', applied_at: now, error_message: null };
}

export function incrementDescriptorRows(db: Database.Database, id: string, delta: number): void {
  db.prepare('UPDATE dynamic_tables SET row_count = MAX(0, row_count + ?) WHERE id = ?').run(delta, id);
}

export function countDynamicTables(db: Database.Database, kind: DescriptorKind): number {
  const row = db
    .prepare(`SELECT COUNT(*) AS cnt FROM dynamic_tables WHERE kind = ? AND status = 'applied'`)
    .get(kind) as { cnt: number };
  return row.cnt;
}
