import type pino from "pino";

export interface RetryOptions {
  /** Retries after the first attempt. */
  attempts: number;
  initialDelayMs: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "AbortError" || err.name === "TimeoutError") return true;
  if ("status" in err && typeof err.status === "number") {
    return err.status === 408 || err.status === 429 || err.status >= 500;
  }
  return /ECONNRESET|ETIMEDOUT|ECONNREFUSED|EAI_AGAIN|fetch failed|network|timed out|timeout/i.test(
    err.message,
  );
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
  logger?: pino.Logger,
): Promise<T> {
  const multiplier = options.backoffMultiplier ?? 2;
  const maxDelay = options.maxDelayMs ?? 8000;
  const shouldRetry = options.shouldRetry ?? isTransientError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= options.attempts || !shouldRetry(err)) {
        throw err;
      }
      const delay = Math.min(options.initialDelayMs * Math.pow(multiplier, attempt), maxDelay);
      logger?.debug(
        { attempt: attempt + 1, delayMs: delay, err: err instanceof Error ? err.message : err },
        "Retrying after failure",
      );
      await sleep(delay);
    }
  }
}
