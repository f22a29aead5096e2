/**
 * Ordered try-and-continue combinator over candidate strategies
 */

import { logger } from './logger.js';
import { errorMessage } from '../types.js';

export interface Attempt<T> {
  label: string;
  run: () => Promise<T>;
}

export interface AttemptFailure {
  label: string;
  error: Error;
}

export class AttemptsExhaustedError extends Error {
  constructor(message: string, public failures: AttemptFailure[]) {
    super(message);
    this.name = 'AttemptsExhaustedError';
  }

  get lastError(): Error | undefined {
    return this.failures[this.failures.length - 1]?.error;
  }
}

/**
 * Run attempts in order and return the first that resolves. Rejections are
 * collected; if every attempt fails an AttemptsExhaustedError carries them all.
 */
export async function firstSuccess<T>(
  attempts: readonly Attempt<T>[],
  description = 'candidates'
): Promise<{ value: T; label: string }> {
  const failures: AttemptFailure[] = [];

  for (const attempt of attempts) {
    try {
      const value = await attempt.run();
      return { value, label: attempt.label };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(errorMessage(error));
      failures.push({ label: attempt.label, error: failure });
      logger.debug(`Attempt failed, trying next of ${description}`, {
        label: attempt.label,
        error: failure.message,
      });
    }
  }

  const last = failures[failures.length - 1];
  throw new AttemptsExhaustedError(
    `All ${description} failed (${failures.length} attempted)` +
      (last ? `. Last error: ${last.error.message}` : ''),
    failures
  );
}
