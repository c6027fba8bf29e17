import { describe, expect, it } from "vitest";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import { type AppConfig, type Env, parseConfig } from "../../src/infrastructure/config/config.js";

const load = (env: Env): AppConfig => {
  const result = parseConfig(env);
  if (!result.ok) throw new Error(`unexpected config error: ${result.error.message}`);
  return result.value;
};

const invalidFields = (env: Env): string[] => {
  const result = parseConfig(env);
  if (result.ok) throw new Error("expected a config error");
  expect(result.error.code).toBe(ErrorCode.CONFIGURATION);
  return Object.keys(result.error.details ?? {});
};

describe("parseConfig", () => {
  it("applies the documented defaults to an empty environment", () => {
    const config = load({});

    expect(config.checkin.retry).toEqual({ maxAttempts: 3, initialDelaySeconds: 90, backoffFactor: 1.5 });
    expect(config.dailyReport.retry).toEqual({ maxAttempts: 3, initialDelaySeconds: 90, backoffFactor: 1.5 });
    expect(config.checkin.command).toBe("python auto_checkin.py");
    expect(config.dailyReport.command).toBe("python auto_daily_report.py");
    expect(config.checkin.schedule).toEqual(["07:00", "17:00"]);
    expect(config.dailyReport.schedule).toEqual(["17:40"]);
    expect(config.timeZone).toBe("Asia/Shanghai");
    expect(config.actionTimeoutSeconds).toBe(600);
    expect(config.notify.timeoutMs).toBe(10_000);
    expect(config.username).toBe("");
    expect(config.log).toEqual({ level: "info", format: "pretty" });
  });

  it("reads each task's retry policy independently", () => {
    const config = load({
      CHECKIN_RETRY_ATTEMPTS: "5",
      CHECKIN_RETRY_DELAY: "30",
      CHECKIN_RETRY_BACKOFF: "2",
      DAILY_REPORT_RETRY_ATTEMPTS: "1",
    });

    expect(config.checkin.retry).toEqual({ maxAttempts: 5, initialDelaySeconds: 30, backoffFactor: 2 });
    expect(config.dailyReport.retry).toEqual({ maxAttempts: 1, initialDelaySeconds: 90, backoffFactor: 1.5 });
  });

  it("treats blank values as unset and trims the rest", () => {
    const config = load({ CHECKIN_RETRY_DELAY: "   ", CHECKIN_RETRY_ATTEMPTS: " 4 ", CHECKIN_USERNAME: " alice " });

    expect(config.checkin.retry.initialDelaySeconds).toBe(90);
    expect(config.checkin.retry.maxAttempts).toBe(4);
    expect(config.username).toBe("alice");
  });

  it("accepts a zero delay", () => {
    expect(load({ DAILY_REPORT_RETRY_DELAY: "0" }).dailyReport.retry.initialDelaySeconds).toBe(0);
  });

  it("splits schedules on commas", () => {
    expect(load({ CHECKIN_SCHEDULE: "06:30, 18:05," }).checkin.schedule).toEqual(["06:30", "18:05"]);
  });

  it("reads notifier settings", () => {
    const config = load({
      WXPUSHER_APP_TOKEN: "test-token",
      WXPUSHER_UID: "UID_test",
      WXPUSH_URL: "https://push.example.test",
      WXPUSH_TOKEN: "test-secret",
    });

    expect(config.notify.wxpusher).toEqual({ appToken: "test-token", uid: "UID_test" });
    expect(config.notify.wxpush.url).toBe("https://push.example.test");
    expect(config.notify.wxpush.userId).toBeUndefined();
  });

  it("rejects zero attempts", () => {
    expect(invalidFields({ CHECKIN_RETRY_ATTEMPTS: "0" })).toEqual(["checkin.retry.maxAttempts"]);
  });

  it("rejects fractional and non-numeric attempts", () => {
    expect(invalidFields({ CHECKIN_RETRY_ATTEMPTS: "1.5" })).toEqual(["checkin.retry.maxAttempts"]);
    expect(invalidFields({ DAILY_REPORT_RETRY_ATTEMPTS: "three" })).toEqual(["dailyReport.retry.maxAttempts"]);
  });

  it("rejects a backoff factor below 1", () => {
    expect(invalidFields({ DAILY_REPORT_RETRY_BACKOFF: "0.5" })).toEqual(["dailyReport.retry.backoffFactor"]);
  });

  it("rejects a negative delay", () => {
    expect(invalidFields({ CHECKIN_RETRY_DELAY: "-1" })).toEqual(["checkin.retry.initialDelaySeconds"]);
  });

  it("rejects malformed schedule times", () => {
    expect(invalidFields({ CHECKIN_SCHEDULE: "7am" })).toEqual(["checkin.schedule.0"]);
  });

  it("reads the schedule time zone", () => {
    expect(load({ SCHEDULE_TIMEZONE: "Europe/Berlin" }).timeZone).toBe("Europe/Berlin");
  });

  it("rejects an unknown time zone", () => {
    expect(invalidFields({ SCHEDULE_TIMEZONE: "Mars/Olympus_Mons" })).toEqual(["timeZone"]);
  });

  it("rejects an invalid push URL and log level", () => {
    expect(invalidFields({ WXPUSH_URL: "not-a-url", LOG_LEVEL: "verbose" }).sort()).toEqual([
      "log.level",
      "notify.wxpush.url",
    ]);
  });
});
