/**
 * Deadline helpers for sub-queries
 *
 * Each call gets its own AbortController. The controller aborts when the
 * local timeout fires or when the parent signal aborts, and never the
 * other way round, so cancelling one sub-query leaves its siblings running.
 *
 * @module utils/timeout
 */

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when `parent` aborts.
 * The returned promise rejects with TimeoutError on timeout even if `fn`
 * ignores its signal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  const aborted = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) {
      reject(toError(controller.signal.reason, label));
      return;
    }
    controller.signal.addEventListener(
      'abort',
      () => reject(toError(controller.signal.reason, label)),
      { once: true }
    );
  });
  // Either race loser may reject later; those rejections are already handled by Promise.race.
  timeout.catch(() => undefined);
  aborted.catch(() => undefined);

  try {
    return await Promise.race([fn(controller.signal), timeout, aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

function toError(reason: unknown, label: string): Error {
  return reason instanceof Error ? reason : new Error(`${label} aborted`);
}
