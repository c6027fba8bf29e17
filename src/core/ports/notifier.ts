/**
 * Notifier port — push notification of a task's final outcome.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface NotificationMessage {
  readonly title: string;
  /** Markdown body */
  readonly body: string;
}

export interface Notifier {
  readonly name: string;
  /** Check if the notifier is configured and available */
  readonly enabled: boolean;
  /** Deliver a message; never throws */
  send(message: NotificationMessage): Promise<Result<void, AppError>>;
}
