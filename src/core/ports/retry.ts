/**
 * Retry runner port — runs a fallible action a bounded number of times,
 * waiting longer after every failure.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface RetryPolicy {
  /** Number of tries before giving up (default: 3) */
  readonly maxAttempts: number;
  /** Wait before the 2nd attempt, in seconds (default: 90) */
  readonly initialDelaySeconds: number;
  /** Multiplier applied to the wait after each failed attempt (default: 1.5) */
  readonly backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelaySeconds: 90,
  backoffFactor: 1.5,
};

/** Outcome of a single attempt: Success(value) or Failure(error). */
export type AttemptOutcome<T> = Result<T, Error>;

/**
 * One login/submit cycle. Must be safe to call repeatedly.
 * The signal fires when the surrounding run is cancelled.
 */
export type AttemptAction<T> = (
  signal: AbortSignal,
) => Promise<AttemptOutcome<T>> | AttemptOutcome<T>;

export interface RunResult<T> {
  readonly succeeded: boolean;
  readonly attemptsUsed: number;
  /** Error of the last failed attempt, set when every attempt failed */
  readonly lastError?: Error | undefined;
  /** Value of the succeeding attempt */
  readonly value?: T | undefined;
}

/** Waits `ms` milliseconds, returning early once `signal` aborts. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RunOptions {
  /** Cancels the run between attempts and during waits */
  readonly signal?: AbortSignal | undefined;
  /** Name used in log lines (default: "action") */
  readonly label?: string | undefined;
  /** Called before each wait */
  readonly onRetry?: ((attempt: number, error: Error, delayMs: number) => void) | undefined;
}

export interface RetryRunner {
  /**
   * Run `action` under `policy`. Resolves to `err` only for an invalid
   * policy (nothing attempted) or a cancelled run; exhausted retries are a
   * normal `ok` result with `succeeded: false`.
   */
  run<T>(
    action: AttemptAction<T>,
    policy: RetryPolicy,
    options?: RunOptions,
  ): Promise<Result<RunResult<T>, AppError>>;
}
