/** Time source for every wait the loop performs; tests swap in a fake. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export async function sleep(delayMs: number): Promise<void> {
  if (delayMs <= 0) {
    return;
  }

  await new Promise((resolve) => {
    setTimeout(resolve, delayMs);
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * How often and how long to back off after a transient failure.
 * `delayMs` receives the 1-based number of the attempt that just failed.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  delayMs(attempt: number): number;
}

function normalizeDelay(value: number) {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.trunc(value));
}

export function fixedBackoff(delayMs: number, maxAttempts: number): RetryPolicy {
  const delay = normalizeDelay(delayMs);
  return {
    maxAttempts: Math.max(0, Math.trunc(maxAttempts)),
    delayMs: () => delay,
  };
}

export function exponentialBackoff(opts: {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
  factor?: number;
}): RetryPolicy {
  const base = normalizeDelay(opts.baseDelayMs);
  const cap = normalizeDelay(opts.maxDelayMs);
  const factor = opts.factor ?? 2;
  return {
    maxAttempts: Math.max(0, Math.trunc(opts.maxAttempts)),
    delayMs: (attempt) => {
      const exponent = Math.max(0, attempt - 1);
      return Math.min(cap, normalizeDelay(base * factor ** exponent));
    },
  };
}
