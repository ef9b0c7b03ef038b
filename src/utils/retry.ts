import axios from 'axios';

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before retry number `attempt` (1-based).
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'factor'>): number {
  const factor = options.factor ?? 2;
  return Math.min(options.maxDelayMs, options.baseDelayMs * Math.pow(factor, attempt - 1));
}

/**
 * Network failures, 429 and any 5xx are worth another try; other HTTP
 * errors (400, 404, ...) are not.
 */
export function isRetryableHttpError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    if (!error.response) return true;
    const { status } = error.response;
    return status === 429 || status >= 500;
  }
  return false;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? (() => true);
  let attempt = 0;

  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      attempt++;
      if (attempt > options.retries || !shouldRetry(error, attempt)) {
        throw error;
      }
      const wait = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, wait);
      await delay(wait);
    }
  }
}
