/**
 * Daily scheduler — one node-cron job per HH:MM entry, evaluated in a
 * named time zone. Jobs only enqueue; tasks run strictly one after
 * another, so a slot that comes up while another task is still running
 * fires as soon as that task finishes.
 */

import cron from "node-cron";
import type { TaskService } from "../../application/services/task.service.js";
import { type AppError, configurationError, errorMessage } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Result, err, ok, tryCatchAsync } from "../../core/types/result.js";

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

export interface ScheduleEntry {
  readonly time: TimeOfDay;
  readonly task: TaskService;
}

export interface DailyScheduler {
  /** Register every job and resolve once the signal aborts and the running task unwinds */
  start(signal: AbortSignal): Promise<void>;
}

export interface CronJob {
  stop(): void;
}

/** The slice of `cron.schedule` the scheduler relies on. */
export type CronScheduleFn = (expression: string, run: () => void, options: { timezone: string }) => CronJob;

interface SchedulerDeps {
  readonly entries: readonly ScheduleEntry[];
  readonly timeZone: string;
  readonly logger: Logger;
  readonly schedule?: CronScheduleFn | undefined;
}

export const parseTimeOfDay = (value: string): Result<TimeOfDay, AppError> => {
  const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(value.trim());
  if (!match) {
    return err(configurationError("Invalid time of day", { value, expected: "HH:MM (24h)" }));
  }
  return ok({ hour: Number(match[1]), minute: Number(match[2]) });
};

export const formatTimeOfDay = (time: TimeOfDay): string =>
  `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;

/** Every day at `time`: "40 17 * * *" */
export const dailyCronExpression = (time: TimeOfDay): string => `${time.minute} ${time.hour} * * *`;

const untilAborted = (signal: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });

export const createDailyScheduler = (deps: SchedulerDeps): Result<DailyScheduler, AppError> => {
  const { entries, timeZone, logger } = deps;
  const schedule = deps.schedule ?? cron.schedule;

  if (entries.length === 0) {
    return err(configurationError("Nothing to schedule", { entries: 0 }));
  }

  return ok({
    async start(signal: AbortSignal): Promise<void> {
      if (signal.aborted) return;

      // Tail of the run queue; each link settles without rejecting.
      let queue: Promise<void> = Promise.resolve();

      const runEntry = async (entry: ScheduleEntry): Promise<void> => {
        const task = entry.task.kind;
        if (signal.aborted) return;

        logger.info("Scheduled task starting", { task, slot: formatTimeOfDay(entry.time) });
        const settled = await tryCatchAsync(() => entry.task.execute(signal));
        if (!settled.ok) {
          logger.error("Scheduled task crashed", { task, error: errorMessage(settled.error) });
        } else if (!settled.value.ok) {
          logger.error("Scheduled task did not run", {
            task,
            code: settled.value.error.code,
            error: settled.value.error.message,
          });
        } else {
          logger.info("Scheduled task finished", { task, status: settled.value.value.status });
        }
      };

      const jobs = entries.map((entry) =>
        schedule(
          dailyCronExpression(entry.time),
          () => {
            logger.debug("Slot reached", { task: entry.task.kind, slot: formatTimeOfDay(entry.time) });
            queue = queue.then(() => runEntry(entry));
          },
          { timezone: timeZone },
        ),
      );

      logger.info("Scheduler started", {
        timeZone,
        entries: entries.map((e) => `${formatTimeOfDay(e.time)} ${e.task.kind}`).join(", "),
      });

      await untilAborted(signal);
      for (const job of jobs) job.stop();
      await queue;

      logger.info("Scheduler stopped");
    },
  });
};
