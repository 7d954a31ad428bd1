/**
 * Declarative schema builder and dynamic-table registry
 *
 * Specialized tables and query indexes are never created by ad hoc DDL.
 * The builder emits a versioned DynamicTableDescriptor (columns, indexes,
 * statements); the registry stores it as 'pending' and applies it in one
 * transaction. A failed apply leaves the descriptor 'failed', and the next
 * ensure call retries the same descriptor, so table creation rides the same
 * retry and reconciliation path as any other storage leg.
 *
 * @module services/storage/schema-builder
 */

import { v4 as uuidv4 } from 'uuid';
import type { DatabaseService } from './database/index.js';
import type {
  ColumnDefinition,
  ColumnType,
  DynamicTableDescriptor,
  IndexDefinition,
} from '../../models/dynamic-table.js';
import { ValidationError } from '../../utils/validation.js';

const IDENTIFIER_PATTERN = /^[a-z][a-z0-9_]*$/;
const MAX_METADATA_COLUMNS = 16;
const MAX_IDENTIFIER_LENGTH = 48;

/** Columns every content table carries, in order */
export const BASE_CONTENT_COLUMNS: readonly ColumnDefinition[] = [
  { name: 'record_id', type: 'TEXT', nullable: false },
  { name: 'title', type: 'TEXT', nullable: true },
  { name: 'body', type: 'TEXT', nullable: false },
  { name: 'word_count', type: 'INTEGER', nullable: false },
  { name: 'created_at', type: 'TEXT', nullable: false },
];

export interface ContentRow {
  id: number;
  record_id: string;
  title: string | null;
  body: string;
  word_count: number;
  created_at: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BUILDERS (pure)
// ═══════════════════════════════════════════════════════════════════════════════

function assertIdentifier(value: string, what: string): void {
  if (!IDENTIFIER_PATTERN.test(value) || value.length > MAX_IDENTIFIER_LENGTH) {
    throw new ValidationError(`${what} "${value}" is not a valid identifier`);
  }
}

export function contentTableName(domain: string, contentType: string, version: number): string {
  assertIdentifier(domain, 'domain');
  assertIdentifier(contentType, 'content_type');
  return `ct_${domain}_${contentType}_v${version}`;
}

export function queryIndexName(domain: string, version: number): string {
  assertIdentifier(domain, 'domain');
  return `qidx_${domain}_v${version}`;
}

/**
 * Metadata key to column name ('Page Count' -> 'm_page_count'), or null
 * when nothing usable is left.
 */
export function metadataColumnName(key: string): string | null {
  const cleaned = key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_IDENTIFIER_LENGTH - 2);
  if (cleaned.length === 0) return null;
  return `m_${cleaned}`;
}

function columnTypeFor(value: unknown): ColumnType | null {
  if (typeof value === 'string') return 'TEXT';
  if (typeof value === 'boolean') return 'INTEGER';
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Number.isInteger(value) ? 'INTEGER' : 'REAL';
  }
  return null;
}

/**
 * Typed columns derived from the primitive metadata values, sorted by name,
 * at most 16.
 */
export function metadataColumns(metadata: Record<string, unknown>): ColumnDefinition[] {
  const byName = new Map<string, ColumnDefinition>();
  for (const [key, value] of Object.entries(metadata)) {
    const name = metadataColumnName(key);
    const type = columnTypeFor(value);
    if (!name || !type || byName.has(name)) continue;
    byName.set(name, { name, type, nullable: true });
  }
  return [...byName.values()]
    .sort((a, b) => a.name.localeCompare(b.name))
    .slice(0, MAX_METADATA_COLUMNS);
}

/**
 * True when every wanted column exists in `columns` with the same type
 */
export function coversColumns(columns: ColumnDefinition[], wanted: ColumnDefinition[]): boolean {
  return wanted.every((w) => columns.some((c) => c.name === w.name && c.type === w.type));
}

/**
 * Union of two column sets; a name present with different types becomes TEXT
 */
export function mergeColumns(
  existing: ColumnDefinition[],
  wanted: ColumnDefinition[]
): ColumnDefinition[] {
  const merged = new Map<string, ColumnDefinition>();
  for (const c of [...existing, ...wanted]) {
    const prev = merged.get(c.name);
    if (!prev) {
      merged.set(c.name, { ...c });
    } else if (prev.type !== c.type) {
      merged.set(c.name, { ...prev, type: 'TEXT' });
    }
  }
  return [...merged.values()]
    .sort((a, b) => a.name.localeCompare(b.name))
    .slice(0, MAX_METADATA_COLUMNS);
}

export function buildContentTableDescriptor(
  domain: string,
  contentType: string,
  version: number,
  extraColumns: ColumnDefinition[],
  now: string
): DynamicTableDescriptor {
  const tableName = contentTableName(domain, contentType, version);
  const columns = [...BASE_CONTENT_COLUMNS, ...extraColumns];
  for (const c of extraColumns) assertIdentifier(c.name, 'column');

  const columnSql = [
    'id INTEGER PRIMARY KEY AUTOINCREMENT',
    'record_id TEXT NOT NULL UNIQUE',
    'title TEXT',
    'body TEXT NOT NULL',
    'word_count INTEGER NOT NULL',
    'created_at TEXT NOT NULL',
    ...extraColumns.map((c) => `${c.name} ${c.type}${c.nullable ? '' : ' NOT NULL'}`),
  ];
  const indexes: IndexDefinition[] = [
    { name: `idx_${tableName}_created`, table: tableName, columns: ['created_at'], unique: false },
  ];

  return {
    id: uuidv4(),
    kind: 'content_table',
    table_name: tableName,
    domain,
    content_type: contentType,
    version,
    columns,
    indexes,
    statements: [
      `CREATE TABLE IF NOT EXISTS ${tableName} (\n  ${columnSql.join(',\n  ')}\n)`,
      ...indexes.map(
        (i) => `CREATE ${i.unique ? 'UNIQUE ' : ''}INDEX IF NOT EXISTS ${i.name} ON ${i.table}(${i.columns.join(', ')})`
      ),
    ],
    status: 'pending',
    row_count: 0,
    query_count: 0,
    error_message: null,
    created_at: now,
    applied_at: null,
  };
}

/**
 * Partial index over content_records for one domain's filtered queries
 */
export function buildQueryIndexDescriptor(
  domain: string,
  version: number,
  now: string
): DynamicTableDescriptor {
  const indexName = queryIndexName(domain, version);
  const index: IndexDefinition = {
    name: indexName,
    table: 'content_records',
    columns: ['content_type', 'created_at'],
    unique: false,
  };
  return {
    id: uuidv4(),
    kind: 'query_index',
    table_name: indexName,
    domain,
    content_type: null,
    version,
    columns: [],
    indexes: [index],
    statements: [
      // domain passed assertIdentifier, so it is safe as a literal
      `CREATE INDEX IF NOT EXISTS ${indexName} ON content_records(${index.columns.join(', ')}) WHERE domain = '${domain}'`,
    ],
    status: 'pending',
    row_count: 0,
    query_count: 0,
    error_message: null,
    created_at: now,
    applied_at: null,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Repository over dynamic_tables and the content tables it describes.
 * One instance per engine, injected into the coordinator and the optimizer.
 */
export class DynamicTableRegistry {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Latest applied content table for (domain, content_type) able to hold
   * `metadata`, creating or re-applying a descriptor when needed.
   */
  ensureContentTable(
    domain: string,
    contentType: string,
    metadata: Record<string, unknown>,
    now: string
  ): DynamicTableDescriptor {
    const wanted = metadataColumns(metadata);
    const latest = this.db.getLatestDescriptor('content_table', domain, contentType);

    if (latest) {
      const latestExtra = latest.columns.filter(
        (c) => !BASE_CONTENT_COLUMNS.some((b) => b.name === c.name)
      );
      if (coversColumns(latestExtra, wanted)) {
        return latest.status === 'applied' ? latest : this.db.applyDescriptor(latest.id, now);
      }
      const next = buildContentTableDescriptor(
        domain,
        contentType,
        latest.version + 1,
        mergeColumns(latestExtra, wanted),
        now
      );
      console.error(
        `[SchemaBuilder] ${latest.table_name} lacks columns for new metadata, creating ${next.table_name}`
      );
      this.db.insertDescriptor(next);
      return this.db.applyDescriptor(next.id, now);
    }

    const first = buildContentTableDescriptor(domain, contentType, 1, wanted, now);
    this.db.insertDescriptor(first);
    return this.db.applyDescriptor(first.id, now);
  }

  /**
   * Insert the content row for a record. Idempotent per record_id.
   *
   * @returns row id
   */
  insertContentRow(
    descriptor: DynamicTableDescriptor,
    row: { record_id: string; title: string | null; body: string; word_count: number; created_at: string },
    metadata: Record<string, unknown>
  ): number {
    const conn = this.db.getConnection();
    const extra = descriptor.columns.filter(
      (c) => !BASE_CONTENT_COLUMNS.some((b) => b.name === c.name)
    );
    const extraValues = extra.map((c) => {
      const entry = Object.entries(metadata).find(([key]) => metadataColumnName(key) === c.name);
      return toColumnValue(entry?.[1], c.type);
    });

    const names = ['record_id', 'title', 'body', 'word_count', 'created_at', ...extra.map((c) => c.name)];
    return this.db.transaction(() => {
      const result = conn
        .prepare(
          `INSERT INTO ${descriptor.table_name} (${names.join(', ')})
           VALUES (${names.map(() => '?').join(', ')})
           ON CONFLICT(record_id) DO NOTHING`
        )
        .run(row.record_id, row.title, row.body, row.word_count, row.created_at, ...extraValues);
      if (result.changes === 1) {
        this.db.incrementDescriptorRows(descriptor.id, 1);
      }
      const existing = conn
        .prepare(`SELECT id FROM ${descriptor.table_name} WHERE record_id = ?`)
        .get(row.record_id) as { id: number } | undefined;
      if (!existing) {
        throw new Error(`Row for ${row.record_id} missing from ${descriptor.table_name} after insert`);
      }
      return existing.id;
    });
  }

  getContentRow(tableName: string, rowId: number): ContentRow | null {
    if (!this.isKnownTable(tableName)) return null;
    const row = this.db
      .getConnection()
      .prepare(
        `SELECT id, record_id, title, body, word_count, created_at FROM ${tableName} WHERE id = ?`
      )
      .get(rowId) as ContentRow | undefined;
    return row ?? null;
  }

  /**
   * Rows held for a record across every applied content table version
   */
  findContentRowsForRecord(recordId: string): Array<{ table_name: string; row_id: number }> {
    const conn = this.db.getConnection();
    const found: Array<{ table_name: string; row_id: number }> = [];
    for (const descriptor of this.db.listDescriptors('content_table')) {
      if (descriptor.status !== 'applied') continue;
      const rows = conn
        .prepare(`SELECT id FROM ${descriptor.table_name} WHERE record_id = ?`)
        .all(recordId) as Array<{ id: number }>;
      for (const row of rows) found.push({ table_name: descriptor.table_name, row_id: row.id });
    }
    return found;
  }

  deleteContentRow(tableName: string, rowId: number): boolean {
    const descriptor = this.findContentDescriptor(tableName);
    if (!descriptor) return false;
    const removed =
      this.db.getConnection().prepare(`DELETE FROM ${tableName} WHERE id = ?`).run(rowId).changes === 1;
    if (removed) this.db.incrementDescriptorRows(descriptor.id, -1);
    return removed;
  }

  /**
   * Create the next query index version for a domain and apply it
   */
  createQueryIndex(domain: string, now: string): DynamicTableDescriptor {
    const latest = this.db.getLatestDescriptor('query_index', domain, null);
    if (latest && latest.status !== 'applied') {
      return this.db.applyDescriptor(latest.id, now);
    }
    const descriptor = buildQueryIndexDescriptor(domain, (latest?.version ?? 0) + 1, now);
    this.db.insertDescriptor(descriptor);
    return this.db.applyDescriptor(descriptor.id, now);
  }

  listDescriptors(): DynamicTableDescriptor[] {
    return this.db.listDescriptors();
  }

  private findContentDescriptor(tableName: string): DynamicTableDescriptor | null {
    return (
      this.db
        .listDescriptors('content_table')
        .find((d) => d.table_name === tableName && d.status === 'applied') ?? null
    );
  }

  // Table names reach SQL only after matching an applied descriptor
  private isKnownTable(tableName: string): boolean {
    return this.findContentDescriptor(tableName) !== null;
  }
}

function toColumnValue(value: unknown, type: ColumnType): string | number | null {
  if (value === undefined || value === null) return null;
  if (type === 'TEXT') return typeof value === 'string' ? value : JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return type === 'INTEGER' ? Math.trunc(value) : value;
  }
  return null;
}
