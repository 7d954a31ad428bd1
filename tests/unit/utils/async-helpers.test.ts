/**
 * Async Helper Tests
 *
 * Keyed serial queue, sub-query timeouts and bounded concurrency.
 */

import { describe, it, expect } from 'vitest';
import { KeyedSerialQueue } from '../../../src/utils/keyed-queue.js';
import { TimeoutError, withTimeout } from '../../../src/utils/timeout.js';
import { mapWithConcurrency, toBatches } from '../../../src/utils/concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ═══════════════════════════════════════════════════════════════════════════════
// KEYED SERIAL QUEUE
// ═══════════════════════════════════════════════════════════════════════════════

describe('KeyedSerialQueue', () => {
  it('runs tasks on the same key one at a time, in order', async () => {
    const queue = new KeyedSerialQueue();
    const log: string[] = [];
    const task = (name: string, ms: number) => async (): Promise<string> => {
      log.push(`start ${name}`);
      await delay(ms);
      log.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run('k', task('a', 20)), queue.run('k', task('b', 1))]);
    expect(results).toEqual(['a', 'b']);
    expect(log).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('lets different keys run concurrently', async () => {
    const queue = new KeyedSerialQueue();
    const log: string[] = [];
    await Promise.all([
      queue.run('one', async () => {
        log.push('start one');
        await delay(20);
        log.push('end one');
      }),
      queue.run('two', async () => {
        log.push('start two');
      }),
    ]);
    expect(log.indexOf('start two')).toBeLessThan(log.indexOf('end one'));
  });

  it('does not block successors after a failure and forgets idle keys', async () => {
    const queue = new KeyedSerialQueue();
    const failing = queue.run('k', async () => {
      throw new Error('first failed');
    });
    const next = queue.run('k', async () => 'second ran');
    expect(queue.activeKeys).toBe(1);

    await expect(failing).rejects.toThrow('first failed');
    await expect(next).resolves.toBe('second ran');
    expect(queue.activeKeys).toBe(0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// TIMEOUTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('withTimeout', () => {
  it('returns the result when fast enough', async () => {
    await expect(withTimeout('fast', 1000, async () => 42)).resolves.toBe(42);
  });

  it('rejects with TimeoutError and aborts the signal given to fn', async () => {
    let seen: AbortSignal | undefined;
    const error = await withTimeout('slow search', 10, (signal) => {
      seen = signal;
      return new Promise<never>(() => undefined);
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'slow search timed out after 10ms', timeoutMs: 10 });
    expect(seen?.aborted).toBe(true);
  });

  it('aborts when the parent aborts, with the parent reason', async () => {
    const parent = new AbortController();
    const pending = withTimeout('child', 10_000, () => new Promise<never>(() => undefined), parent.signal);
    parent.abort(new Error('deadline reached'));
    await expect(pending).rejects.toThrow('deadline reached');
  });

  it('does not abort the parent when the child times out', async () => {
    const parent = new AbortController();
    await expect(
      withTimeout('child', 5, () => new Promise<never>(() => undefined), parent.signal)
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(parent.signal.aborted).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONCURRENCY
// ═══════════════════════════════════════════════════════════════════════════════

describe('mapWithConcurrency', () => {
  it('keeps input order and bounds in-flight calls', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([5, 1, 4, 2, 3], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(n);
      inFlight--;
      return n * 10;
    });
    expect(results).toEqual([50, 10, 40, 20, 30]);
    expect(peak).toBe(2);
  });

  it('throws the first error', async () => {
    await expect(
      mapWithConcurrency([1, 2, 3], 1, async (n) => {
        if (n >= 2) throw new Error(`item ${n} failed`);
        return n;
      })
    ).rejects.toThrow('item 2 failed');
  });

  it('rejects an invalid concurrency', async () => {
    await expect(mapWithConcurrency([1], 0, async (n) => n)).rejects.toThrow(
      'concurrency must be a positive integer, got 0'
    );
  });
});

describe('toBatches', () => {
  it('splits into consecutive batches', () => {
    expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(toBatches([], 3)).toEqual([]);
  });
});
