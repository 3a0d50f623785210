/**
 * Rate Gate (minimum interval between call starts)
 *
 * Public geocoders such as Nominatim allow at most one request per second
 * per client. The gate is a single shared resource: every call, from any
 * number of logical callers, queues behind the previous one and starts no
 * sooner than `minIntervalMs` after the previous call started.
 *
 * ALGORITHM:
 * - Calls are chained on a promise tail, so at most one is in flight
 * - Before a call starts, wait out the remainder of the interval
 * - Record the start time, then run the call
 *
 * Failed calls release the gate like successful ones; the error is returned
 * to the caller that scheduled it.
 */

import type { ClockFn, RateGateConfig, RateGateStats, SleepFn } from './types.js';
import { defaultClock, defaultSleep } from './types.js';

/**
 * Serializing minimum-interval rate gate
 *
 * @example
 * ```typescript
 * const gate = new RateGate({ minIntervalMs: 1000 });
 *
 * const [a, b] = await Promise.all([
 *   gate.schedule(() => provider.geocode('Nairobi, Kenya')),
 *   gate.schedule(() => provider.geocode('Mombasa, Kenya')), // starts >= 1s later
 * ]);
 * ```
 */
export class RateGate {
  private readonly minIntervalMs: number;
  private readonly sleep: SleepFn;
  private readonly now: ClockFn;
  private tail: Promise<void> = Promise.resolve();
  private lastStartMs: number | null = null;
  private calls = 0;
  private totalWaitMs = 0;

  constructor(config: RateGateConfig) {
    if (!Number.isFinite(config.minIntervalMs) || config.minIntervalMs < 0) {
      throw new Error(`minIntervalMs must be a non-negative number, got ${config.minIntervalMs}`);
    }

    this.minIntervalMs = config.minIntervalMs;
    this.sleep = config.sleep ?? defaultSleep;
    this.now = config.now ?? defaultClock;
  }

  /**
   * Run `fn` once the gate grants a slot
   */
  schedule<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      await this.waitForSlot();
      this.lastStartMs = this.now();
      this.calls++;
      return fn();
    });

    // Next caller waits for this call to settle, whatever its result
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  getStats(): RateGateStats {
    return {
      calls: this.calls,
      totalWaitMs: this.totalWaitMs,
      lastStartMs: this.lastStartMs,
    };
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastStartMs === null) {
      return;
    }

    const elapsed = this.now() - this.lastStartMs;
    const remaining = this.minIntervalMs - elapsed;

    if (remaining > 0) {
      this.totalWaitMs += remaining;
      await this.sleep(remaining);
    }
  }
}

/**
 * Create a rate gate with the Nominatim usage-policy default (1 req/s)
 */
export function createRateGate(overrides?: Partial<RateGateConfig>): RateGate {
  return new RateGate({
    minIntervalMs: 1000,
    ...overrides,
  });
}
