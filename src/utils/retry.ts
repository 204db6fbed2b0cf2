import { getConfig } from "../config.js";
import { log } from "./logger.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to stop retrying on a given error. */
  shouldRetry?: (err: unknown) => boolean;
  /** Abort pending backoff; the last error is rethrown. */
  signal?: AbortSignal;
  label?: string;
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const defaults = getConfig().retry;
  const maxAttempts = opts?.maxAttempts ?? defaults.maxAttempts;
  const baseDelayMs = opts?.baseDelayMs ?? defaults.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? defaults.maxDelayMs;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      if (opts?.shouldRetry && !opts.shouldRetry(err)) break;
      if (opts?.signal?.aborted) break;
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      log.warn(`${opts?.label ?? "Operation"} failed, retrying`, {
        attempt,
        maxAttempts,
        delayMs: delay,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(delay, opts?.signal);
      if (opts?.signal?.aborted) break;
    }
  }
  throw lastError;
}

/** Resolves after `ms`, or as soon as `signal` fires. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
