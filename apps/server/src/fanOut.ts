export interface FanOutOptions {
  /** Maximum number of units in flight at once. */
  concurrency: number;
  signal?: AbortSignal;
}

export type FanOutWorker<T, R> = (item: T, index: number, signal: AbortSignal) => Promise<R>;

/**
 * Runs `worker` over every item with at most `concurrency` units in flight and
 * stores each result in the slot of its item index, so completion order never
 * affects the order of the returned array.
 *
 * The first failure aborts the signal shared by all units, stops issuing new
 * work, waits for the units already running and then rejects with that first
 * error. An aborted caller `signal` behaves the same way and rejects with its
 * reason.
 */
export async function fanOut<T, R>(
  items: readonly T[],
  worker: FanOutWorker<T, R>,
  options: FanOutOptions
): Promise<R[]> {
  const { concurrency, signal } = options;
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new RangeError("concurrency must be a positive integer");
  }
  signal?.throwIfAborted();

  const results = new Array<R>(items.length);
  const failures: unknown[] = [];
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(signal?.reason);
  signal?.addEventListener("abort", forwardAbort, { once: true });

  let next = 0;
  const drain = async (): Promise<void> => {
    while (!controller.signal.aborted && next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = await worker(items[index], index, controller.signal);
      } catch (error) {
        failures.push(error);
        controller.abort(error);
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, () => drain()));
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }

  if (signal?.aborted) {
    throw signal.reason;
  }
  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
