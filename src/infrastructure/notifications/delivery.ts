/**
 * Shared plumbing for the HTTP push notifiers: a timed JSON POST and a
 * small retry loop (2s, 4s, … between tries).
 */

import { type AppError, errorMessage, notificationFailed } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { Sleeper } from "../../core/ports/retry.js";
import { type Result, err, ok, tryCatchAsync } from "../../core/types/result.js";
import { startTimer } from "../../shared/utils/timers.js";

export interface PostResult {
  readonly status: number;
  readonly ok: boolean;
  readonly body: string;
}

/** Settles with `work`, or rejects as soon as `signal` aborts. */
const abortable = <T>(work: Promise<T>, signal: AbortSignal, reason: string): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error(reason));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });

/**
 * POST a JSON payload and read the whole response body. `timeoutMs` bounds
 * the request and the body read together.
 */
export const postJson = async (
  url: string,
  payload: unknown,
  timeoutMs: number,
  headers: Record<string, string> = {},
): Promise<PostResult> => {
  const controller = new AbortController();
  const cancelTimer = startTimer(timeoutMs, () => controller.abort());
  const reason = `request timed out after ${timeoutMs}ms`;

  try {
    const response = await abortable(
      fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...headers,
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      }),
      controller.signal,
      reason,
    );
    const body = await abortable(response.text(), controller.signal, reason);
    return { status: response.status, ok: response.ok, body };
  } finally {
    cancelTimer();
  }
};

interface DeliveryOptions {
  readonly notifier: string;
  readonly logger: Logger;
  readonly maxRetries: number;
  readonly sleep: Sleeper;
  /** One delivery try: `ok(summary)` when the service accepted the message */
  readonly attempt: () => Promise<Result<string, string>>;
}

export const deliverWithRetry = async (options: DeliveryOptions): Promise<Result<void, AppError>> => {
  const { notifier, logger, maxRetries, sleep } = options;
  let lastError = "";

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const settled = await tryCatchAsync(options.attempt);

    if (!settled.ok) {
      lastError = errorMessage(settled.error);
    } else if (!settled.value.ok) {
      lastError = settled.value.error;
    } else {
      logger.info("Notification sent", { notifier, attempt, response: settled.value.value });
      return ok(undefined);
    }

    logger.warn("Notification attempt failed", { notifier, attempt, maxRetries, error: lastError });

    if (attempt < maxRetries) {
      await sleep(2_000 * attempt);
    }
  }

  logger.error("Notification failed after retries", { notifier, maxRetries, error: lastError });
  return err(notificationFailed(`${notifier} failed after ${maxRetries} attempt(s): ${lastError}`));
};
