import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AppOverrides } from "../../src/bootstrap.js";
import { VERSION, runCli } from "../../src/cli/run.js";
import {
  createClock,
  createRecordingLogger,
  createRecordingNotifier,
  createRecordingSleeper,
  createScriptedSubmitter,
  fail,
  succeed,
} from "../helpers/fakes.js";

// 07:30 and 03:30 in UTC+8
const MORNING = "2026-10-17T23:30:00Z";
const NIGHT = "2026-10-17T19:30:00Z";

const overridesAt = (iso: string, script = [succeed()]) => {
  const checkin = createScriptedSubmitter(script);
  const report = createScriptedSubmitter(script);
  const notifier = createRecordingNotifier();
  const overrides: AppOverrides = {
    logger: createRecordingLogger(),
    clock: createClock(iso),
    sleep: createRecordingSleeper().sleep,
    notifier,
    submitters: { checkin, "daily-report": report },
  };
  return { overrides, checkin, report, notifier };
};

const live = () => new AbortController().signal;

describe("runCli", () => {
  let stdout: string[];

  beforeEach(() => {
    stdout = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the version", async () => {
    expect(await runCli(["version"], { env: {}, signal: live() })).toBe(0);
    expect(stdout).toEqual([`punchcard v${VERSION}\n`]);
  });

  it("prints help without a command", async () => {
    expect(await runCli([], { env: {}, signal: live() })).toBe(0);
  });

  it("exits 64 for an unknown command", async () => {
    expect(await runCli(["punch"], { env: {}, signal: live() })).toBe(64);
  });

  it("exits 2 on invalid configuration without running anything", async () => {
    const { overrides, checkin } = overridesAt(MORNING);

    const code = await runCli(["checkin"], { env: { CHECKIN_RETRY_ATTEMPTS: "0" }, signal: live(), overrides });

    expect(code).toBe(2);
    expect(checkin.calls).toBe(0);
  });

  it("exits 0 after a successful check-in and notifies", async () => {
    const { overrides, checkin, notifier } = overridesAt(MORNING);

    const code = await runCli(["checkin"], { env: {}, signal: live(), overrides });

    expect(code).toBe(0);
    expect(checkin.calls).toBe(1);
    expect(notifier.sent[0]?.title).toBe("Morning check-in succeeded ✅");
  });

  it("exits 1 when every attempt fails", async () => {
    const { overrides, report } = overridesAt(MORNING, [fail("portal unreachable")]);

    const code = await runCli(["daily-report"], {
      env: { DAILY_REPORT_RETRY_ATTEMPTS: "2" },
      signal: live(),
      overrides,
    });

    expect(code).toBe(1);
    expect(report.calls).toBe(2);
  });

  it("exits 0 for a check-in skipped outside the window", async () => {
    const { overrides, checkin } = overridesAt(NIGHT);

    expect(await runCli(["check-in"], { env: {}, signal: live(), overrides })).toBe(0);
    expect(checkin.calls).toBe(0);
  });

  it("exits 130 when cancelled before the run", async () => {
    const controller = new AbortController();
    controller.abort();
    const { overrides } = overridesAt(MORNING);

    expect(await runCli(["report"], { env: {}, signal: controller.signal, overrides })).toBe(130);
  });

  it("returns 0 when the scheduler is stopped", async () => {
    const controller = new AbortController();
    controller.abort();
    const { overrides, checkin, report } = overridesAt(MORNING);

    expect(await runCli(["schedule"], { env: {}, signal: controller.signal, overrides })).toBe(0);
    expect(checkin.calls + report.calls).toBe(0);
  });
});
