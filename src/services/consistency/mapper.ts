/**
 * Consistency Mapper
 *
 * Owns the pointer from a logical record to its physical location. The
 * pointer on a 'ready' record only ever names parts that were fully written
 * and read back:
 *
 *   - ingestion commits a pointer once every part resolves
 *   - migration writes the new location completely, verifies it, then swaps
 *     the pointer with a compare-and-swap and queues the old parts for GC
 *   - a failed verification keeps the original pointer and raises an
 *     incident; it is never retried automatically
 *
 * @module services/consistency/mapper
 */

import {
  legsForStrategy,
  type ContentRecord,
  type LocationPointer,
  type RecordStatus,
  type StorageLeg,
  type StorageStrategy,
} from '../../models/content-record.js';
import type { GcEntry, GcKind } from '../../models/maintenance.js';
import { ConsistencyViolation, EngineError, recordNotFoundError } from '../../engine/errors.js';
import type { EngineEventBus } from '../../engine/events.js';
import { computeHash } from '../../utils/hash.js';
import { ValidationError } from '../../utils/validation.js';
import type { DatabaseService } from '../storage/database/index.js';
import type { DynamicTableRegistry } from '../storage/schema-builder.js';
import { mergePointers, pointerLegs, type LegWriter } from '../storage/legs.js';
import type { VectorStore } from '../storage/vector.js';

export interface ConsistencyMapperDeps {
  db: DatabaseService;
  vectors: VectorStore;
  registry: DynamicTableRegistry;
  legs: LegWriter;
  events: EngineEventBus;
  clock: () => Date;
}

export interface ConsistencyMapperOptions {
  /** Delay before superseded parts may be deleted */
  gcGraceMs: number;
}

export interface VerificationReport {
  record_id: string;
  ok: boolean;
  problems: string[];
}

export interface MigrateOptions {
  signal?: AbortSignal;
  /** Policy version and confidence stamped on the record after the swap */
  policyVersion?: number;
  confidence?: number;
}

export interface MigrationResult {
  record_id: string;
  from: StorageStrategy;
  to: StorageStrategy;
  outcome: 'migrated' | 'unchanged';
  location: LocationPointer;
}

export interface GcSummary {
  deleted: number;
  retained: number;
  failed: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// POINTER HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parts of `previous` that `next` no longer references
 */
export function supersededParts(previous: LocationPointer, next: LocationPointer): LocationPointer {
  const stale: LocationPointer = {};
  if (previous.full && previous.full.content_hash !== next.full?.content_hash) {
    stale.full = previous.full;
  }
  if (previous.vector && previous.vector.batch_id !== next.vector?.batch_id) {
    stale.vector = previous.vector;
  }
  if (
    previous.table &&
    (previous.table.table_name !== next.table?.table_name || previous.table.row_id !== next.table?.row_id)
  ) {
    stale.table = previous.table;
  }
  return stale;
}

/**
 * GC queue entries naming each part of a pointer
 */
function gcTargets(parts: LocationPointer): Array<{ kind: GcKind; ref: string }> {
  const targets: Array<{ kind: GcKind; ref: string }> = [];
  if (parts.full) targets.push({ kind: 'blob', ref: parts.full.content_hash });
  if (parts.vector) targets.push({ kind: 'vector_batch', ref: parts.vector.batch_id });
  if (parts.table) targets.push({ kind: 'table_row', ref: `${parts.table.table_name}:${parts.table.row_id}` });
  return targets;
}

/**
 * Pointer for a strategy that stores nothing locally
 */
export function sourcePointer(locator: string): LocationPointer {
  return { source: { locator } };
}

export class ConsistencyMapper {
  constructor(
    private readonly deps: ConsistencyMapperDeps,
    private readonly options: ConsistencyMapperOptions
  ) {}

  // ═══════════════════════════════════════════════════════════════════════════
  // INGESTION
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Make a freshly written record ready. The pointer is swapped in only if
   * every part it names resolves.
   *
   * @throws ConsistencyViolation when a part is missing (record left pending)
   */
  commitIngestion(recordId: string, pointer: LocationPointer): ContentRecord {
    const record = this.requireRecord(recordId);
    const problems = this.checkParts(record, pointer);
    if (problems.length > 0) {
      throw new ConsistencyViolation(
        `Cannot commit ${recordId}: ${problems.join('; ')}`,
        recordId,
        { problems }
      );
    }
    this.deps.db.updateRecordState(recordId, 'ready', this.now(), pointer);
    return this.requireRecord(recordId);
  }

  /**
   * Record the legs that did succeed and mark the record degraded. Parts
   * that do not resolve are left out of the pointer.
   */
  commitPartial(recordId: string, pointer: LocationPointer): ContentRecord {
    const record = this.requireRecord(recordId);
    const resolved: LocationPointer = {};
    for (const leg of pointerLegs(pointer)) {
      const part = pick(pointer, leg);
      if (this.checkParts(record, part).length === 0) Object.assign(resolved, part);
    }
    this.deps.db.updateRecordState(recordId, 'degraded', this.now(), resolved);
    return this.requireRecord(recordId);
  }

  /**
   * Add a repaired leg to a degraded record's pointer. The record turns
   * ready once every leg of its strategy is present.
   *
   * @returns the record's status after the repair
   */
  repairLeg(recordId: string, part: LocationPointer): RecordStatus {
    const record = this.requireRecord(recordId);
    const problems = this.checkParts(record, part);
    if (problems.length > 0) {
      throw new ConsistencyViolation(
        `Repaired part of ${recordId} does not resolve: ${problems.join('; ')}`,
        recordId,
        { problems }
      );
    }

    const next = mergePointers(record.location, part);
    const complete = legsForStrategy(record.strategy).every((leg) => pointerLegs(next).includes(leg));
    const status: RecordStatus = complete && record.status === 'degraded' ? 'ready' : record.status;
    const swapped = this.deps.db.compareAndSwapLocation(
      recordId,
      record.location,
      {
        location: next,
        status,
        strategy: record.strategy,
        policy_version: record.policy_version,
        confidence: record.confidence,
      },
      this.now()
    );
    if (!swapped) {
      throw new ConsistencyViolation(`Pointer of ${recordId} changed during repair`, recordId);
    }
    return status;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // VERIFICATION
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Full read-back of a record's current location: blob hash recomputed,
   * marker and committed mapping count compared, points read back from the
   * vector store, table row fetched.
   */
  async verifyRecord(recordId: string): Promise<VerificationReport> {
    const record = this.requireRecord(recordId);
    const problems = await this.readBack(record, record.location);
    const missing = legsForStrategy(record.strategy).filter(
      (leg) => !pointerLegs(record.location).includes(leg)
    );
    if (record.status === 'ready') {
      for (const leg of missing) problems.push(`${leg} leg missing from pointer`);
      if (record.strategy === 'metadata_only' && !record.location.source) {
        problems.push('source locator missing from pointer');
      }
    }
    return { record_id: recordId, ok: problems.length === 0, problems };
  }

  /**
   * Synchronous existence checks against the relational store
   */
  private checkParts(record: ContentRecord, pointer: LocationPointer): string[] {
    const { db, registry } = this.deps;
    const problems: string[] = [];

    if (pointer.full && !db.blobExists(pointer.full.content_hash)) {
      problems.push(`blob ${pointer.full.content_hash} missing`);
    }
    if (pointer.vector) {
      const { batch_id, chunk_count } = pointer.vector;
      const marker = db.getMarker(batch_id);
      if (!marker) {
        problems.push(`completion marker for batch ${batch_id} missing`);
      } else if (marker.record_id !== record.id || marker.chunk_count !== chunk_count) {
        problems.push(`completion marker for batch ${batch_id} does not match`);
      } else {
        const committed = db.countCommittedMappings(batch_id);
        if (committed !== chunk_count) {
          problems.push(`batch ${batch_id} has ${committed} committed mappings, expected ${chunk_count}`);
        }
      }
    }
    if (pointer.table) {
      const row = registry.getContentRow(pointer.table.table_name, pointer.table.row_id);
      if (!row || row.record_id !== record.id) {
        problems.push(`row ${pointer.table.row_id} in ${pointer.table.table_name} missing`);
      }
    }
    return problems;
  }

  private async readBack(record: ContentRecord, pointer: LocationPointer): Promise<string[]> {
    const problems = this.checkParts(record, pointer);
    if (problems.length > 0) return problems;
    const { db, vectors, registry } = this.deps;

    if (pointer.full) {
      const blob = db.getBlob(pointer.full.content_hash);
      if (!blob || computeHash(blob.body) !== pointer.full.content_hash) {
        problems.push(`blob ${pointer.full.content_hash} does not hash to its key`);
      }
    }
    if (pointer.vector) {
      const mappings = db.getMappingsForBatch(pointer.vector.batch_id);
      const stored = await vectors.getPoints(
        pointer.vector.collection,
        mappings.map((m) => m.point_id)
      );
      if (stored.length !== pointer.vector.chunk_count) {
        problems.push(
          `vector store holds ${stored.length} of ${pointer.vector.chunk_count} points for batch ${pointer.vector.batch_id}`
        );
      } else if (stored.some((p) => p.payload.content_record_id !== record.id)) {
        problems.push(`batch ${pointer.vector.batch_id} has points owned by another record`);
      }
    }
    if (pointer.table) {
      const row = registry.getContentRow(pointer.table.table_name, pointer.table.row_id);
      if (row && computeHash(row.body) !== record.content_hash) {
        problems.push(`row ${pointer.table.row_id} in ${pointer.table.table_name} does not match content hash`);
      }
    }
    return problems;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // MIGRATION
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Move a ready record to `target`.
   *
   * migrating -> write new location -> read back -> compare-and-swap ->
   * old parts to GC. Any failure before the swap restores the status, keeps
   * the original pointer and queues the newly written parts for GC.
   *
   * @throws ValidationError when the record is not ready or its text is gone
   * @throws ConsistencyViolation when read-back fails or the pointer moved
   */
  async migrate(recordId: string, target: StorageStrategy, options: MigrateOptions = {}): Promise<MigrationResult> {
    const { db, legs, events } = this.deps;
    const record = this.requireRecord(recordId);
    if (record.status !== 'ready') {
      throw new ValidationError(`Record ${recordId} is ${record.status}; only ready records can migrate`);
    }
    if (record.strategy === target) {
      return { record_id: recordId, from: record.strategy, to: target, outcome: 'unchanged', location: record.location };
    }

    const targetLegs = legsForStrategy(target);
    const reused = pick(record.location, ...targetLegs.filter((leg) => pointerLegs(record.location).includes(leg)));
    const toWrite = targetLegs.filter((leg) => !pointerLegs(reused).includes(leg));
    const text = toWrite.length > 0 ? legs.readBody(record) : null;
    if (toWrite.length > 0 && text === null) {
      throw new ValidationError(
        `Content of ${recordId} is not retained locally; re-ingest the source to change its placement`
      );
    }

    const original = record.location;
    db.updateRecordState(recordId, 'migrating', this.now());
    console.error(`[ConsistencyMapper] Migrating ${recordId}: ${record.strategy} -> ${target}`);

    let written: LocationPointer = {};
    try {
      for (const leg of toWrite) {
        options.signal?.throwIfAborted();
        written = mergePointers(written, await legs.write(leg, record, text ?? '', options.signal));
      }
      options.signal?.throwIfAborted();

      const next =
        target === 'metadata_only' ? sourcePointer(record.source_locator) : mergePointers(reused, written);
      const problems = await this.readBack(record, next);
      if (problems.length > 0) {
        throw new ConsistencyViolation(
          `Read-back of new location for ${recordId} failed: ${problems.join('; ')}`,
          recordId,
          { target, problems }
        );
      }
      options.signal?.throwIfAborted();

      const now = this.now();
      const swapped = db.transaction(() => {
        const ok = db.compareAndSwapLocation(
          recordId,
          original,
          {
            location: next,
            status: 'ready',
            strategy: target,
            policy_version: options.policyVersion ?? record.policy_version,
            confidence: options.confidence ?? record.confidence,
          },
          now
        );
        if (ok) this.queueForGc(recordId, supersededParts(original, next), 'superseded by migration', this.gcEligibleAt());
        return ok;
      });
      if (!swapped) {
        throw new ConsistencyViolation(`Pointer of ${recordId} changed during migration`, recordId, { target });
      }

      console.error(`[ConsistencyMapper] Migrated ${recordId} to ${target}`);
      events.emitEvent({
        type: 'migration.completed',
        timestamp: now,
        entityId: recordId,
        data: { from: record.strategy, to: target },
      });
      return { record_id: recordId, from: record.strategy, to: target, outcome: 'migrated', location: next };
    } catch (error) {
      this.abandonMigration(record, written, error);
      if (error instanceof ConsistencyViolation || error instanceof ValidationError || options.signal?.aborted) {
        throw error;
      }
      throw EngineError.fromUnknown(error);
    }
  }

  private abandonMigration(record: ContentRecord, written: LocationPointer, error: unknown): void {
    const { db, events } = this.deps;
    const now = this.now();
    const message = error instanceof Error ? error.message : String(error);

    db.transaction(() => {
      db.updateRecordState(record.id, record.status, now);
      // Only parts this attempt created; reused parts stay with the record
      this.queueForGc(record.id, supersededParts(written, record.location), 'abandoned migration', now);
      if (error instanceof ConsistencyViolation) {
        db.insertIncident('consistency_violation', record.id, message, error.details ?? {}, now);
      }
    });

    console.error(`[ConsistencyMapper] Migration of ${record.id} abandoned: ${message}`);
    events.emitEvent({
      type: 'migration.failed',
      timestamp: now,
      entityId: record.id,
      data: { from: record.strategy, error: message },
    });
  }

  /**
   * Return records left `migrating` by an interrupted process to `ready`.
   * The swap writes pointer and status together, so such a record still
   * points at its original location. Parts the interrupted attempt wrote
   * are queued for GC; staged batches without a marker are left to the
   * orphan sweep.
   *
   * @returns number of records recovered
   */
  recoverInterruptedMigrations(): number {
    const { db } = this.deps;
    let recovered = 0;
    for (;;) {
      const stuck = db.listRecords({ status: 'migrating', limit: 100 });
      if (stuck.length === 0) break;
      for (const record of stuck) {
        const now = this.now();
        db.transaction(() => {
          db.updateRecordState(record.id, 'ready', now);
          for (const part of this.strandedParts(record)) {
            this.queueForGc(record.id, part, 'abandoned migration', now);
          }
        });
        console.error(`[ConsistencyMapper] Recovered interrupted migration of ${record.id}`);
        recovered++;
      }
    }
    return recovered;
  }

  /**
   * Delete parts an interrupted ingestion wrote for a pending record, so
   * the next attempt writes every leg from its own text.
   *
   * @returns number of parts deleted
   */
  async discardStrandedParts(record: ContentRecord): Promise<number> {
    let deleted = 0;
    for (const part of this.strandedParts(record)) {
      for (const target of gcTargets(part)) {
        if (await this.collectEntry({ ...target, record_id: record.id })) deleted++;
      }
    }
    if (deleted > 0) console.error(`[ConsistencyMapper] Discarded ${deleted} stranded parts of ${record.id}`);
    return deleted;
  }

  /**
   * Committed parts held for a record that its pointer does not reference
   */
  private strandedParts(record: ContentRecord): LocationPointer[] {
    const { db, registry } = this.deps;
    const pointer = record.location;
    const parts: LocationPointer[] = [];
    for (const marker of db.listMarkersForRecord(record.id)) {
      if (marker.batch_id === pointer.vector?.batch_id) continue;
      parts.push({
        vector: { collection: marker.collection, batch_id: marker.batch_id, chunk_count: marker.chunk_count },
      });
    }
    for (const row of registry.findContentRowsForRecord(record.id)) {
      if (row.table_name === pointer.table?.table_name && row.row_id === pointer.table.row_id) continue;
      parts.push({ table: row });
    }
    if (!pointer.full && db.blobExists(record.content_hash)) {
      parts.push({ full: { content_hash: record.content_hash } });
    }
    return parts;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // GARBAGE COLLECTION
  // ═══════════════════════════════════════════════════════════════════════════

  queueForGc(recordId: string, parts: LocationPointer, reason: string, eligibleAt: string): void {
    const now = this.now();
    for (const target of gcTargets(parts)) {
      this.deps.db.enqueueGc({ ...target, record_id: recordId, reason, eligible_at: eligibleAt }, now);
    }
  }

  /**
   * Delete due GC entries. A part still referenced by any record's current
   * pointer is kept (a shared blob changes owner instead).
   */
  async collectGarbage(now: Date = this.deps.clock()): Promise<GcSummary> {
    const summary: GcSummary = { deleted: 0, retained: 0, failed: 0 };
    for (const entry of this.deps.db.getDueGcEntries(now.toISOString())) {
      try {
        const deleted = await this.collectEntry(entry);
        if (deleted) summary.deleted++;
        else summary.retained++;
        this.deps.db.markGcEntry(entry.id, 'done');
      } catch (error) {
        summary.failed++;
        this.deps.db.markGcEntry(entry.id, 'failed');
        console.error(
          `[ConsistencyMapper] GC of ${entry.kind} ${entry.ref} failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    if (summary.deleted + summary.retained + summary.failed > 0) {
      console.error(
        `[ConsistencyMapper] GC: ${summary.deleted} deleted, ${summary.retained} retained, ${summary.failed} failed`
      );
    }
    return summary;
  }

  private async collectEntry(entry: Pick<GcEntry, 'kind' | 'ref' | 'record_id'>): Promise<boolean> {
    const { db, vectors, registry } = this.deps;
    const owner = entry.record_id ? db.getRecord(entry.record_id) : null;

    switch (entry.kind) {
      case 'blob': {
        const referencing = db.findRecordIdsReferencingBlob(entry.ref);
        if (referencing.length > 0) {
          const blob = db.getBlob(entry.ref);
          if (blob && !referencing.includes(blob.owner_record_id)) {
            db.reassignBlobOwner(entry.ref, referencing[0]);
          }
          return false;
        }
        return db.deleteBlob(entry.ref);
      }
      case 'vector_batch': {
        if (owner?.location.vector?.batch_id === entry.ref) return false;
        const mappings = db.getMappingsForBatch(entry.ref);
        if (mappings.length > 0) {
          await vectors.deletePoints(mappings[0].collection, mappings.map((m) => m.point_id));
        }
        return db.deleteBatch(entry.ref) > 0;
      }
      case 'table_row': {
        const separator = entry.ref.lastIndexOf(':');
        const tableName = entry.ref.slice(0, separator);
        const rowId = Number(entry.ref.slice(separator + 1));
        if (owner?.location.table?.table_name === tableName && owner.location.table.row_id === rowId) {
          return false;
        }
        return registry.deleteContentRow(tableName, rowId);
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════════════════

  private requireRecord(recordId: string): ContentRecord {
    const record = this.deps.db.getRecord(recordId);
    if (!record) throw recordNotFoundError(recordId);
    return record;
  }

  private gcEligibleAt(): string {
    return new Date(this.deps.clock().getTime() + this.options.gcGraceMs).toISOString();
  }

  private now(): string {
    return this.deps.clock().toISOString();
  }
}

function pick(pointer: LocationPointer, ...legs: StorageLeg[]): LocationPointer {
  const picked: LocationPointer = {};
  for (const leg of legs) {
    if (leg === 'full' && pointer.full) picked.full = pointer.full;
    if (leg === 'vector' && pointer.vector) picked.vector = pointer.vector;
    if (leg === 'table' && pointer.table) picked.table = pointer.table;
  }
  return picked;
}
