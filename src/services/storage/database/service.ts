/**
 * DatabaseService class for the relational store
 *
 * Facade over the *-operations modules. Every method takes timestamps from
 * the caller so the engine's clock stays injectable.
 */

import Database from 'better-sqlite3';
import type {
  ContentRecord,
  LocationPointer,
  RecordStatus,
  StorageLeg,
  StorageStrategy,
} from '../../../models/content-record.js';
import type { CompletionMarker, FullContentBlob, VectorMapping } from '../../../models/storage.js';
import type { DescriptorKind, DynamicTableDescriptor } from '../../../models/dynamic-table.js';
import type {
  OptimizationRecommendation,
  PerformanceSample,
  RecommendationStatus,
} from '../../../models/performance.js';
import type {
  GcEntry,
  GcKind,
  Incident,
  IncidentKind,
  ReconciliationJob,
  SpooledContent,
} from '../../../models/maintenance.js';
import type { ListRecordsOptions } from './types.js';
import {
  getPersistedConfig,
  openOrCreateDatabase,
  setPersistedConfig,
} from './static-operations.js';
import * as recordOps from './record-operations.js';
import type { NewContentRecord } from './record-operations.js';
import * as blobOps from './blob-operations.js';
import * as mappingOps from './mapping-operations.js';
import * as tableOps from './dynamic-table-operations.js';
import * as perfOps from './performance-operations.js';
import type { DomainLatencyStats } from './performance-operations.js';
import * as recOps from './recommendation-operations.js';
import * as maintOps from './maintenance-operations.js';
import { getRecordStats, type RecordStats } from './stats-operations.js';

export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  /**
   * Open the named database under `storagePath`, creating it if missing
   */
  static open(name: string, storagePath?: string): DatabaseService {
    const result = openOrCreateDatabase(name, storagePath);
    if (result.created) {
      console.error(`[DatabaseService] Created database ${result.path}`);
    }
    return new DatabaseService(result.db, result.name, result.path);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  getStats(): RecordStats {
    return getRecordStats(this.db);
  }

  getPersistedConfig(): Record<string, unknown> {
    return getPersistedConfig(this.db);
  }

  setPersistedConfig(config: Record<string, unknown>): void {
    setPersistedConfig(this.db, config);
  }

  // ==================== RECORD OPERATIONS ====================

  insertRecord(record: NewContentRecord): string {
    return recordOps.insertRecord(this.db, record);
  }

  restagePendingRecord(record: NewContentRecord): boolean {
    return recordOps.restagePendingRecord(this.db, record);
  }

  getRecord(id: string): ContentRecord | null {
    return recordOps.getRecord(this.db, id);
  }

  getRecordByLocator(sourceLocator: string): ContentRecord | null {
    return recordOps.getRecordByLocator(this.db, sourceLocator);
  }

  getRecordsByIds(ids: string[]): ContentRecord[] {
    return recordOps.getRecordsByIds(this.db, ids);
  }

  listRecords(options?: ListRecordsOptions): ContentRecord[] {
    return recordOps.listRecords(this.db, options);
  }

  updateRecordState(id: string, status: RecordStatus, now: string, location?: LocationPointer): void {
    recordOps.updateRecordState(this.db, id, status, now, location);
  }

  compareAndSwapLocation(
    id: string,
    expected: LocationPointer,
    next: {
      location: LocationPointer;
      status: RecordStatus;
      strategy: StorageStrategy;
      policy_version: number;
      confidence: number;
    },
    now: string
  ): boolean {
    return recordOps.compareAndSwapLocation(this.db, id, expected, next, now);
  }

  setNeedsReview(id: string, needsReview: boolean, now: string): void {
    recordOps.setNeedsReview(this.db, id, needsReview, now);
  }

  mergeRescrape(
    id: string,
    patch: { metadata: Record<string, unknown>; tags: string[]; keywords: string[] },
    now: string
  ): ContentRecord {
    return recordOps.mergeRescrape(this.db, id, patch, now);
  }

  recordAccess(ids: string[], now: string): void {
    recordOps.recordAccess(this.db, ids, now);
  }

  writeAnnotation(id: string, agent: string, payload: Record<string, unknown>, now: string): void {
    recordOps.writeAnnotation(this.db, id, agent, payload, now);
  }

  findRecordIdsReferencingBlob(contentHash: string): string[] {
    return recordOps.findRecordIdsReferencingBlob(this.db, contentHash);
  }

  listRecordsBelowPolicyVersion(policyVersion: number, limit: number): ContentRecord[] {
    return recordOps.listRecordsBelowPolicyVersion(this.db, policyVersion, limit);
  }

  markPolicyChecked(ids: string[], policyVersion: number): void {
    recordOps.markPolicyChecked(this.db, ids, policyVersion);
  }

  listLargeFullStoreRecords(minBytes: number, limit: number): ContentRecord[] {
    return recordOps.listLargeFullStoreRecords(this.db, minBytes, limit);
  }

  // ==================== BLOB OPERATIONS ====================

  insertBlob(blob: Omit<FullContentBlob, 'byte_size'>): boolean {
    return blobOps.insertBlob(this.db, blob);
  }

  getBlob(contentHash: string): FullContentBlob | null {
    return blobOps.getBlob(this.db, contentHash);
  }

  blobExists(contentHash: string): boolean {
    return blobOps.blobExists(this.db, contentHash);
  }

  reassignBlobOwner(contentHash: string, recordId: string): void {
    blobOps.reassignBlobOwner(this.db, contentHash, recordId);
  }

  deleteBlob(contentHash: string): boolean {
    return blobOps.deleteBlob(this.db, contentHash);
  }

  // ==================== VECTOR MAPPING OPERATIONS ====================

  insertStagedMappings(mappings: Omit<VectorMapping, 'state'>[]): number {
    return mappingOps.insertStagedMappings(this.db, mappings);
  }

  commitBatch(marker: CompletionMarker): number {
    return mappingOps.commitBatch(this.db, marker);
  }

  getMarker(batchId: string): CompletionMarker | null {
    return mappingOps.getMarker(this.db, batchId);
  }

  listMarkersForRecord(recordId: string): CompletionMarker[] {
    return mappingOps.listMarkersForRecord(this.db, recordId);
  }

  getMappingsForBatch(batchId: string): VectorMapping[] {
    return mappingOps.getMappingsForBatch(this.db, batchId);
  }

  countCommittedMappings(batchId: string): number {
    return mappingOps.countCommittedMappings(this.db, batchId);
  }

  deleteBatch(batchId: string): number {
    return mappingOps.deleteBatch(this.db, batchId);
  }

  findOrphanBatches(
    olderThan: string
  ): Array<{ batch_id: string; record_id: string; collection: string; point_ids: string[] }> {
    return mappingOps.findOrphanBatches(this.db, olderThan);
  }

  getCommittedMappingsByPointIds(pointIds: string[]): VectorMapping[] {
    return mappingOps.getCommittedMappingsByPointIds(this.db, pointIds);
  }

  countPendingBatches(): number {
    return mappingOps.countPendingBatches(this.db);
  }

  // ==================== DYNAMIC TABLE OPERATIONS ====================

  insertDescriptor(descriptor: DynamicTableDescriptor): void {
    tableOps.insertDescriptor(this.db, descriptor);
  }

  getDescriptor(id: string): DynamicTableDescriptor | null {
    return tableOps.getDescriptor(this.db, id);
  }

  getLatestDescriptor(
    kind: DescriptorKind,
    domain: string,
    contentType: string | null
  ): DynamicTableDescriptor | null {
    return tableOps.getLatestDescriptor(this.db, kind, domain, contentType);
  }

  listDescriptors(kind?: DescriptorKind): DynamicTableDescriptor[] {
    return tableOps.listDescriptors(this.db, kind);
  }

  applyDescriptor(id: string, now: string): DynamicTableDescriptor {
    return tableOps.applyDescriptor(this.db, id, now);
  }

  incrementDescriptorRows(id: string, delta: number): void {
    tableOps.incrementDescriptorRows(this.db, id, delta);
  }

  countDynamicTables(kind: DescriptorKind): number {
    return tableOps.countDynamicTables(this.db, kind);
  }

  // ==================== PERFORMANCE OPERATIONS ====================

  insertSample(sample: Omit<PerformanceSample, 'id'>): number {
    return perfOps.insertSample(this.db, sample);
  }

  getDomainLatencyStats(since: string): DomainLatencyStats[] {
    return perfOps.getDomainLatencyStats(this.db, since);
  }

  listSamples(limit?: number): PerformanceSample[] {
    return perfOps.listSamples(this.db, limit);
  }

  countSamples(): number {
    return perfOps.countSamples(this.db);
  }

  deleteSamplesBefore(cutoff: string): number {
    return perfOps.deleteSamplesBefore(this.db, cutoff);
  }

  // ==================== RECOMMENDATION OPERATIONS ====================

  insertRecommendation(rec: OptimizationRecommendation): void {
    recOps.insertRecommendation(this.db, rec);
  }

  getRecommendation(id: string): OptimizationRecommendation | null {
    return recOps.getRecommendation(this.db, id);
  }

  listRecommendations(status?: RecommendationStatus): OptimizationRecommendation[] {
    return recOps.listRecommendations(this.db, status);
  }

  findPendingForTarget(target: string): OptimizationRecommendation[] {
    return recOps.findPendingForTarget(this.db, target);
  }

  claimRecommendation(id: string, now: string): boolean {
    return recOps.claimRecommendation(this.db, id, now);
  }

  releaseRecommendationClaims(): number {
    return recOps.releaseRecommendationClaims(this.db);
  }

  resolveRecommendation(
    id: string,
    status: Exclude<RecommendationStatus, 'pending'>,
    reason: string | null,
    now: string
  ): boolean {
    return recOps.resolveRecommendation(this.db, id, status, reason, now);
  }

  expirePendingRecommendations(cutoff: string, now: string): number {
    return recOps.expirePendingBefore(this.db, cutoff, now);
  }

  countRecommendationsByStatus(): Record<RecommendationStatus, number> {
    return recOps.countRecommendationsByStatus(this.db);
  }

  // ==================== MAINTENANCE OPERATIONS ====================

  enqueueReconciliation(
    recordId: string,
    leg: StorageLeg,
    maxAttempts: number,
    nextAttemptAt: string,
    lastError: string,
    now: string
  ): ReconciliationJob {
    return maintOps.enqueueReconciliation(
      this.db,
      recordId,
      leg,
      maxAttempts,
      nextAttemptAt,
      lastError,
      now
    );
  }

  getOpenJob(recordId: string, leg: StorageLeg): ReconciliationJob | null {
    return maintOps.getOpenJob(this.db, recordId, leg);
  }

  listJobsForRecord(recordId: string): ReconciliationJob[] {
    return maintOps.listJobsForRecord(this.db, recordId);
  }

  getDueJobs(now: string, limit?: number): ReconciliationJob[] {
    return maintOps.getDueJobs(this.db, now, limit);
  }

  markJobSucceeded(id: string, now: string): void {
    maintOps.markJobSucceeded(this.db, id, now);
  }

  recordJobFailure(
    id: string,
    error: string,
    nextAttemptAt: string,
    now: string
  ): ReconciliationJob | null {
    return maintOps.recordJobFailure(this.db, id, error, nextAttemptAt, now);
  }

  countJobsByStatus(): { pending: number; fatal: number } {
    return maintOps.countJobsByStatus(this.db);
  }

  enqueueGc(
    entry: { kind: GcKind; ref: string; record_id: string | null; reason: string; eligible_at: string },
    now: string
  ): number {
    return maintOps.enqueueGc(this.db, entry, now);
  }

  getDueGcEntries(now: string, limit?: number): GcEntry[] {
    return maintOps.getDueGcEntries(this.db, now, limit);
  }

  listGcEntries(recordId: string): GcEntry[] {
    return maintOps.listGcEntries(this.db, recordId);
  }

  markGcEntry(id: number, status: 'done' | 'failed'): void {
    maintOps.markGcEntry(this.db, id, status);
  }

  countPendingGc(): number {
    return maintOps.countPendingGc(this.db);
  }

  insertIncident(
    kind: IncidentKind,
    recordId: string | null,
    message: string,
    details: Record<string, unknown>,
    now: string
  ): Incident {
    return maintOps.insertIncident(this.db, kind, recordId, message, details, now);
  }

  listIncidents(openOnly?: boolean): Incident[] {
    return maintOps.listIncidents(this.db, openOnly);
  }

  resolveIncident(id: string): boolean {
    return maintOps.resolveIncident(this.db, id);
  }

  spoolContent(recordId: string, contentHash: string, body: string, now: string): void {
    maintOps.spoolContent(this.db, recordId, contentHash, body, now);
  }

  getSpooledContent(recordId: string): SpooledContent | null {
    return maintOps.getSpooledContent(this.db, recordId);
  }

  deleteSpooledContent(recordId: string): boolean {
    return maintOps.deleteSpooledContent(this.db, recordId);
  }
}
