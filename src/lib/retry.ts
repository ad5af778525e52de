import { isRateLimited } from "./errors";
import { log } from "./logger";

const DEFAULT_RETRY_AFTER_SECONDS = 5;

export type Sleep = (ms: number) => Promise<void>;

export type RetryOptions = {
  /** Unbounded when omitted. */
  maxRetries?: number | undefined;
  defaultRetryAfterSeconds?: number | undefined;
  label?: string | undefined;
  sleep?: Sleep | undefined;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wraps an async catalog call with retry logic for HTTP 429 rate limits.
 * Waits for the server-supplied Retry-After duration before each retry.
 * Only retries on 429; any other error is rethrown as is.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const maxRetries = options?.maxRetries;
  const label = options?.label ?? "request";
  const wait = options?.sleep ?? sleep;
  const fallbackSeconds =
    options?.defaultRetryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRateLimited(error)) throw error;

      if (maxRetries !== undefined && attempt >= maxRetries) {
        log(`[retry] ${label} — 429 after ${maxRetries} retries, giving up`);
        throw error;
      }

      const seconds = error.retryAfterSeconds ?? fallbackSeconds;
      const progress =
        maxRetries !== undefined ? ` (attempt ${attempt + 1}/${maxRetries})` : "";
      log(`[retry] ${label} — 429, waiting ${seconds}s${progress}`);
      await wait(seconds * 1000);
    }
  }
}
