/**
 * Retry and wait helpers.
 *
 * Exponential backoff with jitter for transient daemon errors, and an
 * abortable sleep shared with the readiness loop.
 */

export interface RetryOptions {
  /** Maximum number of retry attempts. Defaults to 3. */
  maxRetries?: number;
  /** Initial delay in milliseconds before the first retry. Defaults to 1000. */
  initialDelayMs?: number;
  /** Multiplier applied to the delay after each retry. Defaults to 2. */
  backoffMultiplier?: number;
  /** Maximum delay in milliseconds. Defaults to 30000. */
  maxDelayMs?: number;
  /** Whether to add random jitter to the delay. Defaults to true. */
  jitter?: boolean;
  /** Optional predicate to decide if an error is retryable. Defaults to always true. */
  isRetryable?: (error: unknown) => boolean;
  /** Optional callback invoked before each retry. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Stops retrying (and any pending backoff) when aborted. */
  signal?: AbortSignal;
}

export class RetryError extends Error {
  /** The last error that caused the final failure. */
  readonly cause: unknown;
  /** Total number of attempts made (initial + retries). */
  readonly attempts: number;

  constructor(message: string, cause: unknown, attempts: number) {
    super(message);
    this.name = "RetryError";
    this.cause = cause;
    this.attempts = attempts;
  }
}

/**
 * Execute a function with retries and exponential backoff.
 *
 * @throws RetryError if all attempts fail, or the abort reason when aborted.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    backoffMultiplier = 2,
    maxDelayMs = 30_000,
    jitter = true,
    isRetryable = () => true,
    onRetry,
    signal,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;
  let attempts = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    signal?.throwIfAborted();
    attempts++;
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || !isRetryable(error)) {
        break;
      }

      const actualDelay = jitter ? delay * (0.5 + Math.random()) : delay;

      onRetry?.(error, attempt + 1, actualDelay);

      await sleep(actualDelay, signal);

      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }

  throw new RetryError(`All ${attempts} attempts failed`, lastError, attempts);
}

/**
 * Resolve after `ms` milliseconds. Rejects with the signal's reason as soon
 * as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
