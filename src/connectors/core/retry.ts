export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Retries after the first attempt. `Infinity` retries until success. */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Multiplier applied per retry; 1 keeps a fixed interval. */
  backoffFactor?: number;
  /** Fraction of the delay added as random jitter. */
  jitter?: number;
  retryOn?: (err: unknown) => boolean;
  /** Per-error base delay, overriding `baseDelayMs`. */
  delayFor?: (err: unknown) => number;
  /** Performs the wait; receives the failed attempt's error and the upcoming attempt number. */
  wait?: (ms: number, err: unknown, nextAttempt: number) => Promise<void>;
}

function isRetryableError(err: unknown): boolean {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (
      msg.includes("econnreset") ||
      msg.includes("etimedout") ||
      msg.includes("enotfound") ||
      msg.includes("socket hang up") ||
      msg.includes("fetch failed")
    ) {
      return true;
    }
  }
  // Check for HTTP status codes
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number" && status >= 500 && status < 600) {
      return true;
    }
  }
  return false;
}

/**
 * Computes the wait before retry number `retry` (1-based).
 */
export function retryDelay(
  baseDelayMs: number,
  retry: number,
  backoffFactor: number,
  maxDelayMs: number,
): number {
  return Math.min(baseDelayMs * backoffFactor ** (retry - 1), maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const factor = opts.backoffFactor ?? 2;
  const jitterRatio = opts.jitter ?? 0.1;
  const retryOn = opts.retryOn ?? isRetryableError;
  const wait = opts.wait ?? ((ms: number) => sleep(ms));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt > maxRetries || !retryOn(err)) {
        throw err;
      }
      const base = opts.delayFor ? opts.delayFor(err) : baseDelay;
      const delay = retryDelay(base, attempt, factor, maxDelay);
      const jitter = delay * jitterRatio * Math.random();
      await wait(Math.round(delay + jitter), err, attempt + 1);
    }
  }
}
