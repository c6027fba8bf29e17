import {
  type CheckinPhase,
  TaskKind,
  type TaskOutcome,
  TaskStatus,
  checkinPhaseAt,
  taskLabel,
} from "../../core/entities/task.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { Clock } from "../../core/ports/clock.js";
import type { Logger } from "../../core/ports/logger.js";
import type { Notifier } from "../../core/ports/notifier.js";
import type { RetryPolicy, RetryRunner } from "../../core/ports/retry.js";
import type { Submitter } from "../../core/ports/submitter.js";
import { type Result, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import { toZoned } from "../../shared/utils/time.js";
import { buildTaskMessage } from "./task-messages.js";

export interface TaskService {
  readonly kind: TaskKind;
  /**
   * Run the task once: submit with retries, then notify. Resolves to `err`
   * for an invalid policy or a cancelled run; a submission that kept failing
   * is an `ok` outcome with status "failed".
   */
  execute(signal?: AbortSignal): Promise<Result<TaskOutcome, AppError>>;
}

interface Deps {
  readonly kind: TaskKind;
  readonly policy: RetryPolicy;
  readonly runner: RetryRunner;
  readonly submitter: Submitter;
  readonly notifier: Notifier;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly username: string;
  readonly timeZone: string;
}

export const createTaskService = (deps: Deps): TaskService => {
  const { kind, policy, runner, submitter, notifier, clock, username, timeZone } = deps;

  return {
    kind,

    async execute(signal?: AbortSignal): Promise<Result<TaskOutcome, AppError>> {
      const logger = deps.logger.child({ task: kind, runId: generateId() });
      const startedAt = clock.now();

      let phase: CheckinPhase | undefined;
      if (kind === TaskKind.CHECKIN) {
        const { hour } = toZoned(startedAt, timeZone);
        const current = checkinPhaseAt(hour);
        if (current === null) {
          logger.warn("Outside the check-in window, skipping", { hour });
          return ok({
            kind,
            status: TaskStatus.SKIPPED,
            startedAt: startedAt.toISOString(),
            finishedAt: startedAt.toISOString(),
          });
        }
        phase = current;
      }

      const label = taskLabel(kind, phase);
      logger.info("Task started", { label, submitter: submitter.name, ...policy });

      const run = await runner.run((s) => submitter.submit(s), policy, { signal, label });
      if (!run.ok) return run;

      const finishedAt = clock.now();
      const outcome: TaskOutcome = {
        kind,
        phase,
        status: run.value.succeeded ? TaskStatus.SUCCEEDED : TaskStatus.FAILED,
        run: run.value,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
      };

      if (run.value.succeeded) {
        logger.info("Task succeeded", { label, attemptsUsed: run.value.attemptsUsed });
      } else {
        logger.error("Task failed", {
          label,
          attemptsUsed: run.value.attemptsUsed,
          error: run.value.lastError?.message,
        });
      }

      const sent = await notifier.send(
        buildTaskMessage({
          kind,
          phase,
          run: run.value,
          maxAttempts: policy.maxAttempts,
          finishedAt,
          timeZone,
          username,
        }),
      );
      if (!sent.ok) {
        logger.warn("Outcome notification was not delivered", { error: sent.error.message });
      }

      return ok(outcome);
    },
  };
};
