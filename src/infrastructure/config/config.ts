import { z } from "zod";
import { type AppError, configurationError } from "../../core/errors/app-error.js";
import { DEFAULT_RETRY_POLICY } from "../../core/ports/retry.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { isValidTimeZone } from "../../shared/utils/time.js";

/**
 * Application config — validated at boot via Zod.
 * Every retry knob has a documented default, so a bare environment is valid.
 */

const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

const retryPolicySchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).default(DEFAULT_RETRY_POLICY.maxAttempts),
  initialDelaySeconds: z.coerce.number().finite().min(0).default(DEFAULT_RETRY_POLICY.initialDelaySeconds),
  backoffFactor: z.coerce.number().finite().min(1).default(DEFAULT_RETRY_POLICY.backoffFactor),
});

const commandSchema = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((s) => s.trim().length > 0, "must not be blank");

const scheduleSchema = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((s) =>
      s
        .split(",")
        .map((t) => t.trim())
        .filter((t) => t.length > 0),
    )
    .pipe(z.array(z.string().regex(TIME_OF_DAY, "expected HH:MM (24h)")).min(1));

const configSchema = z.object({
  username: z.string().default(""),

  checkin: z.object({
    command: commandSchema("python auto_checkin.py"),
    retry: retryPolicySchema,
    schedule: scheduleSchema("07:00,17:00"),
  }),

  dailyReport: z.object({
    command: commandSchema("python auto_daily_report.py"),
    retry: retryPolicySchema,
    schedule: scheduleSchema("17:40"),
  }),

  actionTimeoutSeconds: z.coerce.number().finite().positive().default(600),
  timeZone: z.string().default("Asia/Shanghai").refine(isValidTimeZone, "unknown IANA time zone"),

  notify: z.object({
    timeoutMs: z.coerce.number().int().positive().default(10_000),
    wxpusher: z.object({
      appToken: z.string().optional(),
      uid: z.string().optional(),
    }),
    wxpush: z.object({
      url: z.string().url().optional(),
      token: z.string().optional(),
      userId: z.string().optional(),
    }),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type Env = Readonly<Record<string, string | undefined>>;

/** Blank values count as unset so `FOO=` in a compose file falls back to the default. */
const read = (env: Env, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
};

const fieldErrors = (error: z.ZodError): Record<string, string[]> => {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.join(".") || "(root)";
    fields[field] = [...(fields[field] ?? []), issue.message];
  }
  return fields;
};

export const parseConfig = (env: Env): Result<AppConfig, AppError> => {
  const result = configSchema.safeParse({
    username: read(env, "CHECKIN_USERNAME"),
    checkin: {
      command: read(env, "CHECKIN_COMMAND"),
      retry: {
        maxAttempts: read(env, "CHECKIN_RETRY_ATTEMPTS"),
        initialDelaySeconds: read(env, "CHECKIN_RETRY_DELAY"),
        backoffFactor: read(env, "CHECKIN_RETRY_BACKOFF"),
      },
      schedule: read(env, "CHECKIN_SCHEDULE"),
    },
    dailyReport: {
      command: read(env, "DAILY_REPORT_COMMAND"),
      retry: {
        maxAttempts: read(env, "DAILY_REPORT_RETRY_ATTEMPTS"),
        initialDelaySeconds: read(env, "DAILY_REPORT_RETRY_DELAY"),
        backoffFactor: read(env, "DAILY_REPORT_RETRY_BACKOFF"),
      },
      schedule: read(env, "DAILY_REPORT_SCHEDULE"),
    },
    actionTimeoutSeconds: read(env, "ACTION_TIMEOUT_SECONDS"),
    timeZone: read(env, "SCHEDULE_TIMEZONE"),
    notify: {
      timeoutMs: read(env, "NOTIFY_TIMEOUT_MS"),
      wxpusher: {
        appToken: read(env, "WXPUSHER_APP_TOKEN"),
        uid: read(env, "WXPUSHER_UID"),
      },
      wxpush: {
        url: read(env, "WXPUSH_URL"),
        token: read(env, "WXPUSH_TOKEN"),
        userId: read(env, "WXPUSH_USERID"),
      },
    },
    log: {
      level: read(env, "LOG_LEVEL"),
      format: read(env, "LOG_FORMAT"),
    },
  });

  if (!result.success) {
    return err(configurationError("Invalid configuration", fieldErrors(result.error)));
  }

  return ok(result.data);
};
