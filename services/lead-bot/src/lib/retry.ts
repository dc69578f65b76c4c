import { createLogger } from './logger.js';

const log = createLogger({ module: 'retry' });

export interface RetryOptions {
  attempts: number;
  /** Delay before attempt N+1 is `delayMs * N`. */
  delayMs: number;
  label: string;
  wait?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Run with retry logic (linear backoff). Rethrows the last error.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      const message = error instanceof Error ? error.message : String(error);

      if (attempt < options.attempts) {
        const delay = options.delayMs * attempt;
        log.warn({ label: options.label, attempt, maxAttempts: options.attempts, delay, error: message }, 'Retrying');
        await (options.wait ?? sleep)(delay);
      } else {
        log.error({ label: options.label, attempts: options.attempts, error: message }, 'Failed after retries');
      }
    }
  }

  throw lastError;
}
