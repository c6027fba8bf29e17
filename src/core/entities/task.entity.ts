import type { RunResult } from "../ports/retry.js";
import type { SubmissionReceipt } from "../ports/submitter.js";

/**
 * Task entity — one scheduled submission and how it ended.
 */
export const TaskKind = {
  CHECKIN: "checkin",
  DAILY_REPORT: "daily-report",
} as const;

export type TaskKind = (typeof TaskKind)[keyof typeof TaskKind];

export const TaskStatus = {
  SUCCEEDED: "succeeded",
  FAILED: "failed",
  SKIPPED: "skipped",
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export const CheckinPhase = {
  MORNING: "morning",
  EVENING: "evening",
} as const;

export type CheckinPhase = (typeof CheckinPhase)[keyof typeof CheckinPhase];

export interface TaskOutcome {
  readonly kind: TaskKind;
  readonly status: TaskStatus;
  readonly phase?: CheckinPhase | undefined;
  /** Absent when the task was skipped */
  readonly run?: RunResult<SubmissionReceipt> | undefined;
  readonly startedAt: string;
  readonly finishedAt: string;
}

/**
 * Check-in window by local hour: 06:00–11:59 clocks in, 12:00–23:59 clocks
 * out, anything earlier is outside the window.
 */
export const checkinPhaseAt = (hour: number): CheckinPhase | null => {
  if (hour >= 6 && hour < 12) return CheckinPhase.MORNING;
  if (hour >= 12 && hour < 24) return CheckinPhase.EVENING;
  return null;
};

export const taskLabel = (kind: TaskKind, phase?: CheckinPhase): string => {
  if (kind === TaskKind.DAILY_REPORT) return "Daily report";
  switch (phase) {
    case CheckinPhase.MORNING:
      return "Morning check-in";
    case CheckinPhase.EVENING:
      return "Evening check-in";
    default:
      return "Check-in";
  }
};
