import { logger } from './logger.js';

export class NonRetryableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'NonRetryableError';
  }
}

export interface RetryOptions {
  maxAttempts: number;
  /** Shown in the retry warning, e.g. "transition concat_00012[2]". */
  label?: string;
  baseDelayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

export function retryDelay(attempt: number, baseDelayMs: number, backoffFactor: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(backoffFactor, attempt - 1));
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const {
    maxAttempts, label = 'operation', baseDelayMs = 1_000, backoffFactor = 2,
    maxDelayMs = 30_000, isRetryable = (e) => !(e instanceof NonRetryableError), onRetry,
  } = opts;
  if (maxAttempts < 1) throw new RangeError('withRetry: maxAttempts must be at least 1');

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err) || attempt >= maxAttempts) throw err;
      const delay = retryDelay(attempt, baseDelayMs, backoffFactor, maxDelayMs);
      logger.warn(`Retry: ${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${delay}ms`, { error: err });
      onRetry?.(attempt, err);
      await new Promise(r => setTimeout(r, delay));
    }
  }
}
