/**
 * Retry Utility
 *
 * Backoff and per-attempt timeouts for the chat, search and STT clients. Every attempt
 * gets its own AbortSignal, aborted when the attempt times out or the caller's signal
 * fires, so a timed-out request does not keep running.
 */

export interface RetryConfig {
  /** Attempts including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds (default: 1000) */
  initialDelayMs: number;
  /** Delay multiplier per retry (default: 2) */
  backoffMultiplier: number;
  /** Upper bound for a single delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number;
  /** Name used in timeout errors */
  serviceName?: string;
  /** Caller cancellation; stops the attempt in flight and any further retries */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Defaults to isNetworkRetryable */
  isRetryable?: (error: Error) => boolean;
}

export type RetryResult<T> =
  | { success: true; result: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };

const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000,
};

/**
 * Per-service timeouts in milliseconds
 */
export const SERVICE_TIMEOUTS = {
  STT: 30000,
  CHAT: 30000,
  SEARCH: 10000,
  TTS: 15000,
} as const;

export class TimeoutError extends Error {
  public readonly timeoutMs: number;
  public readonly serviceName: string;

  constructor(serviceName: string, timeoutMs: number) {
    super(`${serviceName} operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
    this.serviceName = serviceName;
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Run `fn` with a deadline. The signal handed to `fn` is aborted when the deadline
 * passes (the promise rejects with TimeoutError) or when `outer` aborts.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  serviceName: string = "Operation",
  outer?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(outer?.reason);

  if (outer?.aborted) {
    controller.abort(outer.reason);
  } else {
    outer?.addEventListener("abort", forwardAbort, { once: true });
  }

  return new Promise<T>((resolve, reject) => {
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            reject(new TimeoutError(serviceName, timeoutMs));
            controller.abort();
          }, timeoutMs);

    const settle = (): void => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", forwardAbort);
    };

    fn(controller.signal).then(
      (result) => {
        settle();
        resolve(result);
      },
      (error: unknown) => {
        settle();
        reject(error);
      }
    );
  });
}

/**
 * Network failures, 5xx, 429 and timeouts are worth another attempt
 */
export function isNetworkRetryable(error: Error): boolean {
  if (isTimeoutError(error)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const networkMarkers = ["fetch failed", "network", "econnrefused", "econnreset", "etimedout", "socket"];
  if (networkMarkers.some((marker) => message.includes(marker))) {
    return true;
  }

  return /\bhttp (5\d\d|429)\b/.test(message) || message.includes("timed out");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, the error is not retryable, the attempts run out or the
 * caller's signal aborts. Never rejects.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<RetryResult<T>> {
  const settings: RetryConfig = { ...RETRY_DEFAULTS, ...config };
  const isRetryable = settings.isRetryable ?? isNetworkRetryable;
  const startTime = Date.now();
  let lastError: Error = new Error("No attempts made");
  let attempts = 0;

  while (attempts < settings.maxAttempts) {
    attempts++;
    try {
      const result = await withTimeout(fn, settings.timeoutMs, settings.serviceName, settings.signal);
      return { success: true, result, attempts, totalTimeMs: Date.now() - startTime };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
    }

    if (attempts >= settings.maxAttempts || settings.signal?.aborted || !isRetryable(lastError)) {
      break;
    }

    const delayMs = Math.min(
      settings.initialDelayMs * settings.backoffMultiplier ** (attempts - 1),
      settings.maxDelayMs
    );
    settings.onRetry?.(attempts, lastError, delayMs);
    await sleep(delayMs);
  }

  return { success: false, error: lastError, attempts, totalTimeMs: Date.now() - startTime };
}

/**
 * "<service> not responding, attempt 1 of 3"
 */
export function formatRetryMessage(attempt: number, maxAttempts: number, serviceName: string): string {
  return attempt >= maxAttempts
    ? `${serviceName} gave up after ${maxAttempts} attempts`
    : `${serviceName} not responding, attempt ${attempt} of ${maxAttempts}`;
}
