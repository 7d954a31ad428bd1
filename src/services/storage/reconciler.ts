/**
 * Reconciler
 *
 * Replays legs that failed during ingestion. Each due job reads the record's
 * text back (spool first, then whatever legs already hold it), writes the
 * missing leg and hands the part to the Consistency Mapper. Failures are
 * rescheduled with exponential backoff until the job's attempts run out,
 * after which the record is flagged for manual review.
 *
 * @module services/storage/reconciler
 */

import type { ContentRecord } from '../../models/content-record.js';
import type { ReconciliationJob } from '../../models/maintenance.js';
import type { EngineEventBus } from '../../engine/events.js';
import { calculateBackoffDelay } from '../../utils/backoff.js';
import type { ConsistencyMapper } from '../consistency/mapper.js';
import type { DatabaseService } from './database/index.js';
import { pointerLegs, type LegWriter } from './legs.js';

export interface ReconcileSchedule {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ReconcilerOptions extends ReconcileSchedule {
  /** Jobs taken per run */
  batchSize: number;
}

export interface ReconcilerDeps {
  db: DatabaseService;
  legs: LegWriter;
  mapper: ConsistencyMapper;
  events: EngineEventBus;
  clock: () => Date;
}

export interface ReconcileSummary {
  attempted: number;
  repaired: number;
  rescheduled: number;
  fatal: number;
}

/**
 * When the job should run after `failures` failed reconciliation attempts.
 * No jitter: a job's schedule is reproducible from its attempt count.
 */
export function nextAttemptAt(now: Date, failures: number, schedule: ReconcileSchedule): string {
  const delay = calculateBackoffDelay(failures, {
    baseDelayMs: schedule.baseDelayMs,
    maxDelayMs: schedule.maxDelayMs,
    jitterFraction: 0,
  });
  return new Date(now.getTime() + delay).toISOString();
}

export class Reconciler {
  constructor(
    private readonly deps: ReconcilerDeps,
    private readonly options: ReconcilerOptions
  ) {}

  /**
   * Process every job due at `now`
   */
  async run(now: Date = this.deps.clock()): Promise<ReconcileSummary> {
    const { db } = this.deps;
    const summary: ReconcileSummary = { attempted: 0, repaired: 0, rescheduled: 0, fatal: 0 };

    for (const job of db.getDueJobs(now.toISOString(), this.options.batchSize)) {
      summary.attempted++;
      const outcome = await this.runJob(job, now);
      summary[outcome]++;
    }

    if (summary.attempted > 0) {
      console.error(
        `[Reconciler] ${summary.attempted} jobs: ${summary.repaired} repaired, ${summary.rescheduled} rescheduled, ${summary.fatal} fatal`
      );
    }
    return summary;
  }

  private async runJob(
    job: ReconciliationJob,
    now: Date
  ): Promise<'repaired' | 'rescheduled' | 'fatal'> {
    const { db, legs, mapper } = this.deps;
    const stamp = now.toISOString();

    try {
      const record = db.getRecord(job.record_id);
      if (!record) throw new Error(`Record ${job.record_id} no longer exists`);

      if (!pointerLegs(record.location).includes(job.leg)) {
        const text = legs.readBody(record);
        if (text === null) {
          throw new Error(`No stored copy of ${record.id} hashes to ${record.content_hash}`);
        }
        const part = await legs.write(job.leg, record, text);
        const status = mapper.repairLeg(record.id, part);
        if (status === 'ready') this.finishRecord(record, stamp);
      }

      db.markJobSucceeded(job.id, stamp);
      console.error(`[Reconciler] ${job.leg} leg of ${job.record_id} repaired`);
      return 'repaired';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const updated = db.recordJobFailure(
        job.id,
        message,
        nextAttemptAt(now, job.attempts + 1, this.options),
        stamp
      );
      console.error(
        `[Reconciler] ${job.leg} leg of ${job.record_id} failed (attempt ${job.attempts + 1}/${job.max_attempts}): ${message}`
      );
      if (updated?.status === 'fatal') {
        this.escalate(updated, message, stamp);
        return 'fatal';
      }
      return 'rescheduled';
    }
  }

  private finishRecord(record: ContentRecord, stamp: string): void {
    this.deps.db.deleteSpooledContent(record.id);
    this.deps.events.emitEvent({
      type: 'record.repaired',
      timestamp: stamp,
      entityId: record.id,
      data: { strategy: record.strategy },
    });
  }

  private escalate(job: ReconciliationJob, message: string, stamp: string): void {
    const { db, events } = this.deps;
    db.setNeedsReview(job.record_id, true, stamp);
    db.insertIncident(
      'reconciliation_exhausted',
      job.record_id,
      `Reconciliation of the ${job.leg} leg gave up after ${job.attempts} attempts: ${message}`,
      { job_id: job.id, leg: job.leg, attempts: job.attempts },
      stamp
    );
    events.emitEvent({
      type: 'record.review_required',
      timestamp: stamp,
      entityId: job.record_id,
      data: { leg: job.leg, last_error: message },
    });
  }
}
