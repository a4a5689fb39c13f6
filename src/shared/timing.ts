// ============================================================================
// TIMING — controlling-process clock, delays and bounded waits
// ============================================================================

/** Delay helper for polling loops. */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Monotonic clock of the controlling process. Independent of the document-local
 * clock used for mutation timestamps.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: delay,
};

/**
 * Race a promise against a timer. The timer is cleared once the promise settles,
 * so nothing is left pending when the caller moves on.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
