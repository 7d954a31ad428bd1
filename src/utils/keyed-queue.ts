/**
 * Per-key serial execution queue
 *
 * Each key owns a promise chain; a task waits for the previous task on the
 * same key to settle before it runs. Tasks on different keys run freely.
 * The chain entry is dropped once the last queued task for a key settles,
 * so the map only holds keys with work in flight.
 *
 * @module utils/keyed-queue
 */

export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` after every previously queued task for `key` has settled.
   * A rejected predecessor does not block its successors.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release!: () => void;
    const tail = new Promise<void>((r) => {
      release = r;
    });
    this.tails.set(key, tail);

    try {
      await prev;
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
