/**
 * Dynamic table descriptors
 *
 * Specialized tables and query indexes are created at runtime from
 * declarative descriptors. A descriptor is versioned independently of the
 * records stored in it.
 */

export type ColumnType = 'TEXT' | 'INTEGER' | 'REAL';

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  nullable: boolean;
}

export interface IndexDefinition {
  name: string;
  table: string;
  columns: string[];
  unique: boolean;
}

export type DescriptorKind = 'content_table' | 'query_index';

export type DescriptorStatus = 'pending' | 'applied' | 'failed';

export interface DynamicTableDescriptor {
  id: string;
  kind: DescriptorKind;
  /** Physical object name (table or index) */
  table_name: string;
  domain: string;
  content_type: string | null;
  version: number;
  columns: ColumnDefinition[];
  indexes: IndexDefinition[];
  /** DDL statements, in application order */
  statements: string[];
  status: DescriptorStatus;
  row_count: number;
  query_count: number;
  error_message: string | null;
  created_at: string;
  applied_at: string | null;
}
