/**
 * Exponential backoff utility with jitter for API rate limiting
 */

import { logger } from './logger.js';

export interface BackoffOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  shouldRetry?: (error: Error) => boolean;
  // Fixed wait for errors that carry their own, in place of the exponential delay
  retryDelayMs?: (error: Error) => number | undefined;
}

/**
 * Execute a function with exponential backoff retry logic.
 * Errors rejected by `shouldRetry`, and the last error once retries run out,
 * are rethrown as-is.
 */
export async function withBackoff<T>(
  fn: () => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const {
    maxRetries = 2,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    jitterFactor = 0.1,
    shouldRetry = () => true,
    retryDelayMs = () => undefined,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt >= maxRetries) {
        if (maxRetries > 0) {
          logger.warn(`Max retries (${maxRetries}) exceeded`, {
            error: lastError.message,
            attempts: attempt + 1,
          });
        }
        throw lastError;
      }

      // Calculate delay with exponential backoff and jitter
      const baseDelay = Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
      const jitter = baseDelay * jitterFactor * Math.random();
      const delay = retryDelayMs(lastError) ?? Math.floor(baseDelay + jitter);

      logger.warn(`Attempt ${attempt + 1} failed, retrying in ${delay}ms`, {
        error: lastError.message,
        attempt: attempt + 1,
        maxRetries,
        delay,
      });

      await sleep(delay);
    }
  }
}

/**
 * Wait before retrying an HTTP 429 (Too Many Requests): the Retry-After
 * value capped at maxDelayMs, or the initial delay without one
 */
export function rateLimitDelayMs(
  retryAfterSeconds?: number,
  options: BackoffOptions = {}
): number {
  if (retryAfterSeconds !== undefined) {
    const maxDelayMs = options.maxDelayMs ?? 30000;
    const delay = Math.min(retryAfterSeconds * 1000, maxDelayMs);
    logger.warn(`Rate limited, waiting ${delay}ms (Retry-After: ${retryAfterSeconds}s)`);
    return delay;
  }

  const delay = options.initialDelayMs ?? 1000;
  logger.warn(`Rate limited, using default backoff delay: ${delay}ms`);
  return delay;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Parse Retry-After header value (seconds or HTTP date)
 */
export function parseRetryAfter(retryAfter: string): number | undefined {
  const seconds = parseInt(retryAfter, 10);
  if (!isNaN(seconds)) {
    return seconds;
  }

  const date = new Date(retryAfter);
  if (!isNaN(date.getTime())) {
    const now = new Date();
    const diffMs = date.getTime() - now.getTime();
    return Math.max(0, Math.ceil(diffMs / 1000));
  }

  return undefined;
}
