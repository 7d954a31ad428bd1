/**
 * Bounded-parallelism helpers
 *
 * A fixed number of workers pull items off a shared cursor, so at most
 * `concurrency` tasks are in flight at once.
 *
 * @module utils/concurrency
 */

/**
 * Map items through `fn` with at most `concurrency` calls in flight.
 * Results keep input order.
 *
 * The first failure stops dispatch of further items; in-flight calls are
 * allowed to settle and then that first error is thrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let cursor = 0;
  let failed = false;
  let firstError: unknown;

  const worker = async (): Promise<void> => {
    while (!failed && cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, items.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  if (failed) throw firstError;
  return results;
}

/**
 * Split an array into consecutive batches of `size` items.
 */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
