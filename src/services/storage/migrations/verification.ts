/**
 * Schema verification against the bootstrap steps
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { SCHEMA_STEPS } from './schema-helpers.js';
import type { SchemaStep, SchemaVerification } from './types.js';

/**
 * Compare sqlite_master with every object the bootstrap steps create
 */
export function verifySchema(
  db: Database.Database,
  steps: readonly SchemaStep[] = SCHEMA_STEPS
): SchemaVerification {
  const rows = db
    .prepare(`SELECT type, name FROM sqlite_master WHERE type IN ('table', 'index', 'trigger')`)
    .all() as Array<{ type: string; name: string }>;
  const present = new Set(rows.map((r) => `${r.type}:${r.name}`));

  const missing = steps
    .filter((step) => !present.has(`${step.kind}:${step.name}`))
    .map(({ kind, name }) => ({ kind, name }));
  return { valid: missing.length === 0, missing };
}

export function describeMissing(verification: SchemaVerification): string {
  return verification.missing.map((m) => `${m.kind} ${m.name}`).join(', ');
}
