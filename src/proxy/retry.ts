import { setTimeout as delay } from 'node:timers/promises';
import type { RetryConfig } from '../config/types.js';
import { ClientDisconnectedError, UpstreamError, UpstreamExhaustedError } from '../gateway/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry');

export interface RetryOptions extends RetryConfig {
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  /** Called before each backoff sleep with the attempt that just failed. */
  onRetry?: (attempt: number, delayMs: number, error: UpstreamError) => void;
}

/**
 * Backoff before retry number `retry` (1-based): the initial delay doubled
 * per retry, capped at `maxBackoffMs`.
 */
export function backoffDelay(retry: number, initialBackoffMs: number, maxBackoffMs: number): number {
  return Math.min(initialBackoffMs * 2 ** (retry - 1), maxBackoffMs);
}

export function isTransient(err: unknown): err is UpstreamError {
  return err instanceof UpstreamError && err.transient;
}

/**
 * Runs `attempt` up to `maxRetries + 1` times. Only transient upstream
 * failures are retried; anything else propagates at once. When every attempt
 * fails the last failure is wrapped in UpstreamExhaustedError.
 */
export async function withRetry<T>(attempt: (n: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const maxAttempts = options.maxRetries + 1;
  let lastError: UpstreamError | undefined;
  let n = 0;

  while (n < maxAttempts) {
    n++;
    try {
      return await attempt(n);
    } catch (err) {
      if (!isTransient(err)) throw err;
      lastError = err;
      log.warn(`Attempt ${n}/${maxAttempts} failed: ${err.message}`);
    }

    if (n >= maxAttempts) break;
    if (options.signal?.aborted) throw new ClientDisconnectedError();

    const wait = backoffDelay(n, options.initialBackoffMs, options.maxBackoffMs);
    options.onRetry?.(n, wait, lastError);
    await sleep(wait);
    if (options.signal?.aborted) throw new ClientDisconnectedError();
  }

  if (!lastError) {
    throw new Error('withRetry ran no attempts');
  }
  throw new UpstreamExhaustedError(n, lastError);
}
