/**
 * Resilience Types
 *
 * Configuration and bookkeeping types shared by the rate gate and the
 * retry executor.
 */

/**
 * Sleep function (injectable for tests)
 */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Monotonic-enough clock in milliseconds (injectable for tests)
 */
export type ClockFn = () => number;

export const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const defaultClock: ClockFn = () => Date.now();

// ============================================================================
// Rate Gate
// ============================================================================

export interface RateGateConfig {
  /** Minimum delay between the start of successive calls */
  readonly minIntervalMs: number;
  readonly sleep?: SleepFn;
  readonly now?: ClockFn;
}

export interface RateGateStats {
  /** Calls that have started */
  readonly calls: number;
  /** Total time spent waiting for a slot */
  readonly totalWaitMs: number;
  /** Start time of the most recent call, null before the first */
  readonly lastStartMs: number | null;
}

// ============================================================================
// Retry
// ============================================================================

/**
 * Milliseconds to wait after failed attempt `attempt` (1-based) before the
 * next one
 */
export type BackoffFn = (attempt: number) => number;

export interface RetryConfig {
  /** Total attempts including the first */
  readonly maxAttempts: number;
  readonly backoff: BackoffFn;
  readonly sleep?: SleepFn;
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  /** Delay waited after this attempt (0 for the last one) */
  readonly delayMs: number;
  readonly totalElapsedMs: number;
  readonly error: Error;
}
