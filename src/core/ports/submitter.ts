import type { AttemptOutcome } from "./retry.js";

export interface SubmissionReceipt {
  /** Last line the collaborator printed, if any */
  readonly output: string;
  readonly durationMs: number;
}

/**
 * Submitter port — performs one real check-in or daily-report submission.
 * Every failure mode (bad credentials, network error, unexpected page) must
 * come back as a Failure outcome.
 */
export interface Submitter {
  readonly name: string;
  submit(signal: AbortSignal): Promise<AttemptOutcome<SubmissionReceipt>>;
}
