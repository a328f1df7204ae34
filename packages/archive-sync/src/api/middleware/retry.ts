import { HttpError } from '../../types.js';
import type { AppConfig } from '../../types.js';
import type { Logger } from '../../logger.js';
import type { HeaderReader } from '../http-client.js';

export type RetryConfig = Pick<AppConfig, 'maxRetries' | 'retryBaseMs' | 'retryMaxMs'>;

export function isRetryable(status: number): boolean {
  return status === 429 || status >= 500 || status === 0;
}

export function parseRetryAfter(headers: HeaderReader): number | null {
  const raw = headers.get('retry-after');
  if (raw === null) return null;

  // Delta seconds (e.g. "5")
  const seconds = Number(raw);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : null;
  }

  // HTTP-date (e.g. "Thu, 01 Dec 2025 16:00:00 GMT")
  const date = Date.parse(raw);
  if (Number.isFinite(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/** Backoff before retry number `attempt` (1-based). */
export function backoffDelayMs(err: HttpError, attempt: number, config: RetryConfig): number {
  if (err.retryAfterMs !== null) {
    return Math.min(err.retryAfterMs, config.retryMaxMs);
  }

  // Exponential backoff with jitter
  const base = config.retryBaseMs * Math.pow(2, attempt - 1);
  const jitter = Math.random() * base * 0.3;
  return Math.min(base + jitter, config.retryMaxMs);
}

/**
 * Wraps `fn` so that transient HTTP failures (network, 429, 5xx) are retried
 * up to `maxRetries` times. Anything else is rethrown immediately.
 */
export function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  logger: Logger,
  operationName: string,
): () => Promise<T> {
  return async (): Promise<T> => {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof HttpError) || !isRetryable(err.status) || attempt > config.maxRetries) {
          throw err;
        }

        const delayMs = backoffDelayMs(err, attempt, config);
        logger.warn(
          { operationName, attempt, maxRetries: config.maxRetries, status: err.status, delayMs },
          'Retrying operation',
        );

        await sleep(delayMs);
      }
    }
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
