/**
 * Migration Scheduler
 *
 * Rate-limits strategy migrations (migrations per minute) and keeps an
 * AbortController per running task so a migration can be cancelled by id.
 * Cancelling aborts the mapper's migration, which restores the record's
 * previous pointer and status.
 *
 * @module services/consistency/migration-scheduler
 */

import type { StorageStrategy } from '../../models/content-record.js';
import { sleep } from '../../utils/backoff.js';
import type { ConsistencyMapper, MigrateOptions, MigrationResult } from './mapper.js';

export interface MigrationRateLimiterStatus {
  remaining: number;
  resetInMs: number;
}

/**
 * Fixed-window limiter. acquire() calls are serialized so concurrent
 * callers cannot all pass the check before any of them counts.
 */
export class MigrationRateLimiter {
  private count = 0;
  private windowStart: number;
  private acquireQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number = 60_000,
    private readonly now: () => number = Date.now
  ) {
    this.windowStart = now();
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    const prev = this.acquireQueue;
    let release!: () => void;
    this.acquireQueue = new Promise<void>((r) => {
      release = r;
    });

    try {
      await prev;
      await this.doAcquire(signal);
    } finally {
      release();
    }
  }

  private async doAcquire(signal?: AbortSignal): Promise<void> {
    this.checkWindow();
    if (this.count >= this.maxPerWindow) {
      const waitTime = this.windowMs - (this.now() - this.windowStart);
      if (waitTime > 0) {
        console.error(`[MigrationScheduler] Rate limit reached, waiting ${waitTime}ms`);
        await sleep(waitTime, signal);
      }
      this.count = 0;
      this.windowStart = this.now();
    }
    this.count++;
  }

  private checkWindow(): void {
    if (this.now() - this.windowStart >= this.windowMs) {
      this.count = 0;
      this.windowStart = this.now();
    }
  }

  getStatus(): MigrationRateLimiterStatus {
    this.checkWindow();
    return {
      remaining: Math.max(0, this.maxPerWindow - this.count),
      resetInMs: Math.max(0, this.windowMs - (this.now() - this.windowStart)),
    };
  }
}

export interface ScheduledMigration {
  /** Task id used for cancel() */
  id: string;
  record_id: string;
  target: StorageStrategy;
  result: Promise<MigrationResult>;
}

interface RunningTask {
  controller: AbortController;
  result: Promise<MigrationResult>;
}

export class MigrationScheduler {
  private readonly running = new Map<string, RunningTask>();

  constructor(
    private readonly mapper: ConsistencyMapper,
    private readonly limiter: MigrationRateLimiter
  ) {}

  /**
   * Start a migration once the rate limiter admits it
   *
   * @param id - task id; a second task with a running id is rejected
   */
  schedule(
    id: string,
    recordId: string,
    target: StorageStrategy,
    options: Omit<MigrateOptions, 'signal'> = {}
  ): ScheduledMigration {
    if (this.running.has(id)) {
      throw new Error(`Migration task ${id} is already running`);
    }
    const controller = new AbortController();
    const result = this.execute(recordId, target, options, controller.signal).finally(() => {
      this.running.delete(id);
    });
    this.running.set(id, { controller, result });
    return { id, record_id: recordId, target, result };
  }

  private async execute(
    recordId: string,
    target: StorageStrategy,
    options: Omit<MigrateOptions, 'signal'>,
    signal: AbortSignal
  ): Promise<MigrationResult> {
    await this.limiter.acquire(signal);
    return this.mapper.migrate(recordId, target, { ...options, signal });
  }

  /**
   * Cancel a running task
   *
   * @returns false when no task with this id is running
   */
  cancel(id: string, reason = 'migration cancelled'): boolean {
    const task = this.running.get(id);
    if (!task) return false;
    console.error(`[MigrationScheduler] Cancelling ${id}: ${reason}`);
    task.controller.abort(new Error(reason));
    return true;
  }

  isRunning(id: string): boolean {
    return this.running.has(id);
  }

  /**
   * Abort every running task (engine shutdown)
   */
  cancelAll(reason = 'engine closing'): number {
    const ids = [...this.running.keys()];
    for (const id of ids) this.cancel(id, reason);
    return ids.length;
  }

  /**
   * Resolves once every task running at call time has finished, whether it
   * committed, failed or was rolled back after a cancel.
   */
  async settle(): Promise<void> {
    await Promise.allSettled([...this.running.values()].map((t) => t.result));
  }
}
