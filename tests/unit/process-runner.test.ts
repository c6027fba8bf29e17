import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));
vi.mock("node:child_process", () => ({ spawn: spawnMock }));

import { KILL_GRACE_MS, type ProcessRequest, spawnProcess } from "../../src/infrastructure/actions/process-runner.js";
import { MAX_TIMER_MS } from "../../src/shared/utils/timers.js";

/** Child process stand-in; tests emit its lifecycle events by hand. */
class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn((_signal?: NodeJS.Signals) => true);
}

const request = (overrides: Partial<ProcessRequest> = {}): ProcessRequest => ({
  command: "python",
  args: ["auto_checkin.py"],
  env: {},
  timeoutMs: 1_000,
  signal: new AbortController().signal,
  ...overrides,
});

const startChild = (req: ProcessRequest) => {
  const child = new FakeChild();
  spawnMock.mockReturnValue(child);
  const pending = spawnProcess(req);
  child.emit("spawn");
  return { child, pending };
};

describe("spawnProcess", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    spawnMock.mockReset();
  });

  it("sends SIGTERM on timeout and SIGKILL when the child ignores it", async () => {
    const { child, pending } = startChild(request());

    await vi.advanceTimersByTimeAsync(1_000);
    expect(child.kill.mock.calls).toEqual([["SIGTERM"]]);

    await vi.advanceTimersByTimeAsync(KILL_GRACE_MS);
    expect(child.kill.mock.calls).toEqual([["SIGTERM"], ["SIGKILL"]]);

    child.emit("close", null, "SIGKILL");
    expect(await pending).toEqual({ exitCode: null, signal: "SIGKILL", stdout: "", stderr: "", timedOut: true });
  });

  it("does not SIGKILL a child that exits after SIGTERM", async () => {
    const { child, pending } = startChild(request());

    await vi.advanceTimersByTimeAsync(1_000);
    child.emit("close", null, "SIGTERM");
    await pending;
    await vi.advanceTimersByTimeAsync(KILL_GRACE_MS * 2);

    expect(child.kill.mock.calls).toEqual([["SIGTERM"]]);
  });

  it("honours a timeout longer than the timer limit", async () => {
    const thirtyDays = 30 * 86_400_000;
    const { child, pending } = startChild(request({ timeoutMs: thirtyDays }));

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(child.kill).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(thirtyDays - MAX_TIMER_MS);
    expect(child.kill.mock.calls).toEqual([["SIGTERM"]]);

    child.emit("close", null, "SIGTERM");
    expect((await pending).timedOut).toBe(true);
  });

  it("escalates to SIGKILL after an abort", async () => {
    const controller = new AbortController();
    const { child, pending } = startChild(request({ signal: controller.signal }));

    controller.abort();
    await vi.advanceTimersByTimeAsync(KILL_GRACE_MS);
    expect(child.kill.mock.calls).toEqual([["SIGKILL"]]);

    child.emit("close", null, "SIGKILL");
    expect((await pending).timedOut).toBe(false);
  });

  it("passes the request through to spawn", async () => {
    const { child, pending } = startChild(request());
    child.emit("close", 0, null);
    await pending;

    expect(spawnMock).toHaveBeenCalledWith("python", ["auto_checkin.py"], {
      env: {},
      signal: expect.any(AbortSignal),
      stdio: ["ignore", "pipe", "pipe"],
    });
  });

  it("rejects when the command cannot start", async () => {
    const child = new FakeChild();
    spawnMock.mockReturnValue(child);
    const pending = spawnProcess(request());

    child.emit("error", new Error("spawn python ENOENT"));

    await expect(pending).rejects.toThrow("spawn python ENOENT");
  });
});
