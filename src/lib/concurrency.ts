// Largest delay setTimeout honours; longer ones fire after 1ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const isValidTimeout = (ms: number) => Number.isFinite(ms) && ms > 0 && ms <= MAX_TIMEOUT_MS;

/**
 * Maps over `items` with at most `limit` calls in flight. Results keep input order.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;

  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  });

  await Promise.all(workers);
  return results;
};

/**
 * Runs `task` with a deadline. On expiry the task's signal is aborted with the
 * error from `onTimeout`, and the returned promise rejects with it.
 */
export const withTimeout = async <T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | null,
  onTimeout: () => Error,
): Promise<T> => {
  const controller = new AbortController();
  if (timeoutMs === null) {
    return task(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      // Reject before aborting: abort listeners settle the task synchronously
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
};
