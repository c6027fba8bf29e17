/**
 * Retry with exponential backoff — runs one submission at a time, waiting
 * `initialDelaySeconds × backoffFactor^(n-1)` after the n-th failure.
 *
 *   Idle → Attempting → Succeeded
 *                     ↘ Waiting → Attempting … → Exhausted
 *
 * Thrown errors count as failed attempts. The wait is abortable; a cancelled
 * run stops before the next attempt.
 */

import { type AppError, cancelled, configurationError } from "../../core/errors/app-error.js";
import { toError } from "../../core/errors/action-failure.js";
import type { Logger } from "../../core/ports/logger.js";
import type {
  AttemptAction,
  AttemptOutcome,
  RetryPolicy,
  RetryRunner,
  RunOptions,
  RunResult,
  Sleeper,
} from "../../core/ports/retry.js";
import { type Result, err, ok, tryCatchAsync } from "../../core/types/result.js";
import { sleep as timerSleep } from "../../shared/utils/sleep.js";

interface RetryRunnerDeps {
  readonly logger: Logger;
  /** Wait primitive (default: abortable timer) */
  readonly sleep?: Sleeper | undefined;
}

/**
 * Check a policy before anything runs. Reports every offending field at once.
 */
export const validateRetryPolicy = (policy: RetryPolicy): Result<RetryPolicy, AppError> => {
  const problems: Record<string, string> = {};

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    problems["maxAttempts"] = `must be an integer >= 1, got ${policy.maxAttempts}`;
  }
  if (!Number.isFinite(policy.initialDelaySeconds) || policy.initialDelaySeconds < 0) {
    problems["initialDelaySeconds"] = `must be a finite number >= 0, got ${policy.initialDelaySeconds}`;
  }
  if (!Number.isFinite(policy.backoffFactor) || policy.backoffFactor < 1) {
    problems["backoffFactor"] = `must be a finite number >= 1, got ${policy.backoffFactor}`;
  }

  if (Object.keys(problems).length > 0) {
    return err(configurationError("Invalid retry policy", problems));
  }
  return ok(policy);
};

/** Wait before attempt `attempt + 1`, given `attempt` consecutive failures. */
export const backoffDelaySeconds = (policy: RetryPolicy, attempt: number): number =>
  policy.initialDelaySeconds * policy.backoffFactor ** (attempt - 1);

const attemptOnce = async <T>(
  action: AttemptAction<T>,
  signal: AbortSignal,
): Promise<AttemptOutcome<T>> => {
  const settled = await tryCatchAsync(async () => action(signal));
  if (!settled.ok) return err(toError(settled.error));
  return settled.value;
};

export const createRetryRunner = (deps: RetryRunnerDeps): RetryRunner => {
  const { logger } = deps;
  const sleep = deps.sleep ?? timerSleep;

  return {
    async run<T>(
      action: AttemptAction<T>,
      policy: RetryPolicy,
      options: RunOptions = {},
    ): Promise<Result<RunResult<T>, AppError>> {
      const checked = validateRetryPolicy(policy);
      if (!checked.ok) {
        logger.error("Refusing to run with an invalid retry policy", {
          action: options.label,
          ...checked.error.details,
        });
        return checked;
      }

      const { maxAttempts } = policy;
      const label = options.label ?? "action";
      const signal = options.signal ?? new AbortController().signal;
      let lastError: Error | undefined;

      const stopped = (attemptsUsed: number) => {
        logger.warn("Run cancelled", { action: label, attemptsUsed, maxAttempts });
        return err(cancelled(`${label} cancelled after ${attemptsUsed} attempt(s)`, { attemptsUsed }));
      };

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (signal.aborted) return stopped(attempt - 1);

        logger.info("Attempt started", { action: label, attempt, maxAttempts });
        const startedAt = performance.now();
        const outcome = await attemptOnce(action, signal);
        const elapsedMs = Math.round(performance.now() - startedAt);

        if (outcome.ok) {
          logger.info("Attempt succeeded", { action: label, attempt, maxAttempts, elapsedMs });
          return ok({ succeeded: true, attemptsUsed: attempt, value: outcome.value });
        }

        lastError = outcome.error;
        const remaining = maxAttempts - attempt;

        if (remaining === 0) {
          logger.error("Attempt failed, no retries left", {
            action: label,
            attempt,
            maxAttempts,
            elapsedMs,
            error: lastError.message,
          });
          break;
        }

        if (signal.aborted) return stopped(attempt);

        const delaySeconds = backoffDelaySeconds(policy, attempt);
        const delayMs = Math.round(delaySeconds * 1000);
        logger.warn("Attempt failed, retrying", {
          action: label,
          attempt,
          remaining,
          delaySeconds,
          elapsedMs,
          error: lastError.message,
        });
        options.onRetry?.(attempt, lastError, delayMs);

        await sleep(delayMs, signal);
      }

      logger.error("All attempts failed", { action: label, attemptsUsed: maxAttempts });
      return ok({ succeeded: false, attemptsUsed: maxAttempts, lastError });
    },
  };
};
