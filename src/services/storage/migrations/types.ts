/**
 * Schema step and migration error types
 *
 * @module migrations/types
 */

export type SchemaObjectKind = 'table' | 'index' | 'trigger';

/**
 * One DDL statement in the bootstrap order. `kind` and `name` identify the
 * sqlite_master entry the statement creates, so the same list drives both
 * creation and verification.
 */
export interface SchemaStep {
  kind: SchemaObjectKind;
  name: string;
  sql: string;
}

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: 'pragma' | 'create' | 'seed' | 'version_check' | 'migrate',
    public readonly objectName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

/**
 * Schema objects expected after bootstrap but absent from sqlite_master
 */
export interface SchemaVerification {
  valid: boolean;
  missing: Array<{ kind: SchemaObjectKind; name: string }>;
}
