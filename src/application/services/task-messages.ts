import { type CheckinPhase, type TaskKind, TaskStatus, taskLabel } from "../../core/entities/task.entity.js";
import type { NotificationMessage } from "../../core/ports/notifier.js";
import type { RunResult } from "../../core/ports/retry.js";
import { formatZonedDate, formatZonedTime } from "../../shared/utils/time.js";

export interface TaskMessageInput {
  readonly kind: TaskKind;
  readonly phase?: CheckinPhase | undefined;
  readonly run: RunResult<unknown>;
  readonly maxAttempts: number;
  readonly finishedAt: Date;
  readonly timeZone: string;
  readonly username: string;
}

/**
 * Markdown push message for a finished task, e.g.
 *
 *   **Morning check-in succeeded!**
 *
 *   📅 **Date**: 2026-10-18
 *   ⏰ **Time**: 07:00:05 (Asia/Shanghai)
 *   …
 */
export const buildTaskMessage = (input: TaskMessageInput): NotificationMessage => {
  const { run, timeZone } = input;
  const label = taskLabel(input.kind, input.phase);
  const status = run.succeeded ? TaskStatus.SUCCEEDED : TaskStatus.FAILED;

  const lines = [
    `**${label} ${status}!**`,
    "",
    `📅 **Date**: ${formatZonedDate(input.finishedAt, timeZone)}`,
    `⏰ **Time**: ${formatZonedTime(input.finishedAt, timeZone)} (${timeZone})`,
  ];
  if (input.username) {
    lines.push(`👤 **User**: ${input.username}`);
  }
  lines.push(`🔁 **Attempts**: ${run.attemptsUsed}/${input.maxAttempts}`);

  if (run.succeeded) {
    lines.push("✨ **Status**: submitted");
  } else {
    lines.push("❌ **Status**: failed, check the logs");
    if (run.lastError) {
      lines.push(`❗ **Error**: ${run.lastError.message}`);
    }
  }

  return {
    title: `${label} ${status} ${run.succeeded ? "✅" : "❌"}`,
    body: lines.join("\n"),
  };
};
