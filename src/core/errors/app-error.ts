/**
 * Canonical application error — every failure that reaches the command
 * line is expressed as an AppError so logging and the exit status share
 * a single shape.
 */

export const ErrorCode = {
  CONFIGURATION: "CONFIGURATION",
  NOTIFICATION_FAILED: "NOTIFICATION_FAILED",
  CANCELLED: "CANCELLED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/** Process exit statuses; a scheduler only needs to tell 0 from the rest. */
export const ExitCode = {
  SUCCESS: 0,
  TASK_FAILED: 1,
  CONFIG_ERROR: 2,
  USAGE: 64,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const EXIT_MAP: Record<ErrorCode, ExitCode> = {
  CONFIGURATION: ExitCode.CONFIG_ERROR,
  NOTIFICATION_FAILED: ExitCode.TASK_FAILED,
  CANCELLED: ExitCode.CANCELLED,
};

export const exitCodeFor = (code: ErrorCode): ExitCode => EXIT_MAP[code];

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return { ...error, details, cause };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const configurationError = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.CONFIGURATION, msg, details);

export const notificationFailed = (msg: string, cause?: unknown): AppError =>
  appError(ErrorCode.NOTIFICATION_FAILED, msg, undefined, cause);

export const cancelled = (msg = "Cancelled", details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.CANCELLED, msg, details);

/** Human-readable message for anything caught at a boundary. */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
