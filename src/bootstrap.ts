/**
 * Composition root — wire config into runner, submitters, notifier, tasks
 * and scheduler. Anything passed in `overrides` replaces the real adapter.
 */

import { type TaskService, createTaskService } from "./application/services/task.service.js";
import { TaskKind } from "./core/entities/task.entity.js";
import type { AppError } from "./core/errors/app-error.js";
import type { Clock } from "./core/ports/clock.js";
import type { Logger } from "./core/ports/logger.js";
import type { Notifier } from "./core/ports/notifier.js";
import type { Sleeper } from "./core/ports/retry.js";
import type { Submitter } from "./core/ports/submitter.js";
import { type Result, err, ok } from "./core/types/result.js";
import { createCommandSubmitter } from "./infrastructure/actions/command-submitter.js";
import type { AppConfig } from "./infrastructure/config/config.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createNotifierFromConfig } from "./infrastructure/notifications/index.js";
import { createRetryRunner } from "./infrastructure/resilience/retry.js";
import {
  type CronScheduleFn,
  type DailyScheduler,
  type ScheduleEntry,
  createDailyScheduler,
  parseTimeOfDay,
} from "./infrastructure/scheduling/daily-scheduler.js";
import { systemClock } from "./shared/utils/time.js";

export interface App {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly notifier: Notifier;
  readonly tasks: Readonly<Record<TaskKind, TaskService>>;
  readonly scheduler: DailyScheduler;
}

export interface AppOverrides {
  readonly logger?: Logger | undefined;
  readonly clock?: Clock | undefined;
  readonly sleep?: Sleeper | undefined;
  readonly notifier?: Notifier | undefined;
  readonly submitters?: Partial<Record<TaskKind, Submitter>> | undefined;
  /** Replaces node-cron when registering schedule jobs */
  readonly schedule?: CronScheduleFn | undefined;
  /** Environment handed to action commands (default: process.env) */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

interface TaskSettings {
  readonly command: string;
  readonly schedule: readonly string[];
}

export const createApp = (config: AppConfig, overrides: AppOverrides = {}): Result<App, AppError> => {
  const logger = overrides.logger ?? createLogger(config.log.level, {}, config.log.format);
  const clock = overrides.clock ?? systemClock;
  const env = overrides.env ?? process.env;
  const notifier = overrides.notifier ?? createNotifierFromConfig(config.notify, logger, overrides.sleep);
  const runner = createRetryRunner({ logger: logger.child({ component: "retry" }), sleep: overrides.sleep });

  const settings: Record<TaskKind, TaskSettings> = {
    [TaskKind.CHECKIN]: config.checkin,
    [TaskKind.DAILY_REPORT]: config.dailyReport,
  };

  const submitterFor = (kind: TaskKind): Result<Submitter, AppError> => {
    const override = overrides.submitters?.[kind];
    if (override) return ok(override);
    return createCommandSubmitter({
      name: kind,
      commandLine: settings[kind].command,
      timeoutMs: config.actionTimeoutSeconds * 1000,
      env,
      logger: logger.child({ component: "submitter", task: kind }),
    });
  };

  const taskFor = (kind: TaskKind): Result<TaskService, AppError> => {
    const submitter = submitterFor(kind);
    if (!submitter.ok) return submitter;
    return ok(
      createTaskService({
        kind,
        policy: kind === TaskKind.CHECKIN ? config.checkin.retry : config.dailyReport.retry,
        runner,
        submitter: submitter.value,
        notifier,
        clock,
        logger,
        username: config.username,
        timeZone: config.timeZone,
      }),
    );
  };

  const checkin = taskFor(TaskKind.CHECKIN);
  if (!checkin.ok) return checkin;
  const dailyReport = taskFor(TaskKind.DAILY_REPORT);
  if (!dailyReport.ok) return dailyReport;

  const tasks: Record<TaskKind, TaskService> = {
    [TaskKind.CHECKIN]: checkin.value,
    [TaskKind.DAILY_REPORT]: dailyReport.value,
  };

  const entries: ScheduleEntry[] = [];
  for (const kind of [TaskKind.CHECKIN, TaskKind.DAILY_REPORT]) {
    for (const value of settings[kind].schedule) {
      const time = parseTimeOfDay(value);
      if (!time.ok) return err(time.error);
      entries.push({ time: time.value, task: tasks[kind] });
    }
  }

  const scheduler = createDailyScheduler({
    entries,
    timeZone: config.timeZone,
    logger: logger.child({ component: "scheduler" }),
    schedule: overrides.schedule,
  });
  if (!scheduler.ok) return scheduler;

  return ok({ config, logger, notifier, tasks, scheduler: scheduler.value });
};
