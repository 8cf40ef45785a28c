import { StoreTimeoutError } from "../errors.js";

/**
 * Races `operation` against a timer. The timer is cleared either way; the
 * operation itself keeps running if the deadline wins.
 */
export async function withDeadline<T>(
  operation: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return;
  }

  await new Promise<void>((resolve) => {
    const timeout = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const cleanup = () => {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", abortHandler);
    };

    const abortHandler = () => {
      cleanup();
      resolve();
    };

    signal?.addEventListener("abort", abortHandler, { once: true });
  });
}

export function storeDeadline<T>(
  operation: string,
  pending: Promise<T>,
  timeoutMs: number,
): Promise<T> {
  return withDeadline(
    pending,
    timeoutMs,
    () => new StoreTimeoutError(operation, timeoutMs),
  );
}
