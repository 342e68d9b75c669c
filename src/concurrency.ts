export interface Semaphore {
  acquire(): Promise<void>;
  release(): void;
}

export function createSemaphore(maxConcurrency: number): Semaphore {
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
  }

  let current = 0;
  const queue: Array<() => void> = [];

  return {
    acquire: () => {
      return new Promise<void>((resolve) => {
        if (current < maxConcurrency) {
          current++;
          resolve();
        } else {
          queue.push(resolve);
        }
      });
    },
    release: () => {
      current--;
      const next = queue.shift();
      if (next) {
        current++;
        next();
      }
    },
  };
}

/**
 * Runs `task` for every item with at most `maxConcurrency` in flight.
 * Results keep the input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = createSemaphore(maxConcurrency);

  return Promise.all(
    items.map(async (item, index) => {
      await semaphore.acquire();
      try {
        return await task(item, index);
      } finally {
        semaphore.release();
      }
    }),
  );
}

/**
 * Races `run` against a deadline. When the deadline passes, or `parentSignal`
 * aborts first, the signal handed to `run` is aborted and the returned
 * promise rejects with `onTimeout()` or the parent's abort reason.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error = () => new Error(`Operation timed out after ${timeoutMs}ms`),
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    throw abortReason(parentSignal);
  }

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    const abortWith = (error: Error) => {
      controller.abort(error);
      reject(error);
    };
    timeoutId = setTimeout(() => abortWith(onTimeout()), timeoutMs);

    if (parentSignal) {
      const signal = parentSignal;
      onParentAbort = () => abortWith(abortReason(signal));
      signal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([run(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }
}

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("Operation aborted");
}
