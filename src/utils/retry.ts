import * as log from './logger.js';

export interface RetryOptions {
  /** Total attempts, including the first. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (err: Error) => boolean;
  onFailedAttempt?: (err: Error, attempt: number) => void;
}

const DEFAULTS: RetryOptions = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  isRetryable: () => true,
};

/**
 * Retry with exponential backoff + jitter.
 * `onFailedAttempt` sees every failure, including the last one.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  opts: Partial<RetryOptions> = {},
): Promise<T> {
  const { attempts, baseDelayMs, maxDelayMs, isRetryable, onFailedAttempt } = { ...DEFAULTS, ...opts };
  const total = Math.max(1, Math.floor(attempts));

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= total; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      onFailedAttempt?.(lastError, attempt);

      if (attempt === total || !isRetryable(lastError)) {
        throw lastError;
      }

      const backoffDelay = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      const jitter = backoffDelay * 0.5 * Math.random();
      const waitMs = backoffDelay + jitter;

      log.debug(`Retry ${attempt}/${total - 1} after ${Math.round(waitMs)}ms: ${lastError.message}`);
      await sleep(waitMs);
    }
  }

  throw lastError ?? new Error('retryWithBackoff: no attempts made');
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
