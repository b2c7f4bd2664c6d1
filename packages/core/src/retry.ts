import { setTimeout as delay } from 'node:timers/promises';

import { HarnessError, ScenarioAbortedError } from './errors.js';
import type { RetryStrategy } from './types.js';

/**
 * Sleep for `ms` milliseconds. Rejects with ScenarioAbortedError as soon as
 * `signal` aborts, so no wait outlives an operator interrupt.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new ScenarioAbortedError();
  }
  if (ms <= 0) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err: unknown) {
    if (signal?.aborted) {
      throw new ScenarioAbortedError('run aborted', { cause: err });
    }
    throw err;
  }
}

/**
 * Compute delay for a given attempt using the retry strategy.
 */
export function computeDelay(strategy: RetryStrategy, attempt: number): number {
  let ms: number;

  switch (strategy.backoff) {
    case 'constant':
      ms = strategy.baseDelayMs;
      break;
    case 'linear':
      ms = strategy.baseDelayMs * (attempt + 1);
      break;
    case 'exponential':
      ms = strategy.baseDelayMs * Math.pow(2, attempt);
      break;
  }

  return Math.min(ms, strategy.maxDelayMs);
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** Called before each wait with the failed attempt number (0-based). */
  onRetry?: (error: HarnessError, attempt: number, delayMs: number) => void;
  /** Injected for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Execute a function with bounded retry.
 *
 * - Only retries HarnessError with retryable=true
 * - Anything else is thrown immediately
 * - Total wait never exceeds maxRetries * maxDelayMs
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  strategy: RetryStrategy,
  opts: RetryOptions = {},
): Promise<T> {
  const wait = opts.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= strategy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!(error instanceof HarnessError) || !error.retryable) {
        throw error;
      }

      if (attempt < strategy.maxRetries) {
        const ms = computeDelay(strategy, attempt);
        opts.onRetry?.(error, attempt, ms);
        await wait(ms, opts.signal);
      }
    }
  }

  throw lastError;
}
