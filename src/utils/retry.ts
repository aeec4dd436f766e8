import { Logger } from './logger';
import { errorMessage } from '../core/errors';

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  logger?: Logger;
  label?: string;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` up to `attempts` times, doubling the delay after each failure.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 200;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === attempts) break;
      const delay = baseDelayMs * 2 ** (attempt - 1);
      options.logger?.warn(`${options.label ?? 'operation'} failed, retrying in ${delay}ms`, {
        attempt,
        error: errorMessage(error),
      });
      await sleep(delay);
    }
  }
  throw lastError;
}
