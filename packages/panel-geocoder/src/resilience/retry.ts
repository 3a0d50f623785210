/**
 * Bounded retry
 *
 * Runs an operation up to `maxAttempts` times, sleeping `backoff(attempt)`
 * between failures. There is no sleep after the last attempt, and every
 * failed attempt is recorded on the exhaustion error.
 */

import type { BackoffFn, RetryAttempt, RetryConfig, SleepFn } from './types.js';
import { defaultSleep } from './types.js';
import { toError } from '../core/errors.js';

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: readonly RetryAttempt[],
    readonly lastError: Error
  ) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * @example
 * ```typescript
 * const retry = createFixedBackoffRetry({ maxAttempts: 3, delayMs: 2000 });
 *
 * const coords = await retry.execute(async () => {
 *   const result = await client.lookup(query);
 *   if (result === null) throw new NoResultError(query);
 *   return result;
 * });
 * ```
 */
export class RetryExecutor {
  private readonly sleep: SleepFn;

  constructor(private readonly config: RetryConfig) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
    }
    this.sleep = config.sleep ?? defaultSleep;
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  async execute<T>(fn: (attemptNumber: number) => Promise<T>): Promise<T> {
    const { maxAttempts, backoff } = this.config;
    const attempts: RetryAttempt[] = [];
    const startedAt = Date.now();

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (thrown) {
        const error = toError(thrown);
        const more = attempt < maxAttempts;
        const delayMs = more ? Math.max(0, backoff(attempt)) : 0;

        attempts.push({
          attemptNumber: attempt,
          delayMs,
          totalElapsedMs: Date.now() - startedAt,
          error,
        });

        if (!more) throw new RetryExhaustedError(attempts, error);
        await this.sleep(delayMs);
      }
    }
  }
}

export function fixedBackoff(delayMs: number): BackoffFn {
  return () => delayMs;
}

/**
 * Fixed-delay retry used by the geocoding tiers (3 attempts, 2 s apart)
 */
export function createFixedBackoffRetry(
  options: {
    readonly maxAttempts?: number;
    readonly delayMs?: number;
    readonly sleep?: SleepFn;
  } = {}
): RetryExecutor {
  return new RetryExecutor({
    maxAttempts: options.maxAttempts ?? 3,
    backoff: fixedBackoff(options.delayMs ?? 2000),
    sleep: options.sleep,
  });
}
