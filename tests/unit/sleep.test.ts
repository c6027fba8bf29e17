import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { sleep } from "../../src/shared/utils/sleep.js";
import { MAX_TIMER_MS } from "../../src/shared/utils/timers.js";

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves once the delay elapses", async () => {
    let done = false;
    const pending = sleep(1_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toBe(true);
    await pending;
  });

  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    let done = false;
    const pending = sleep(90_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await pending;

    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("resolves immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await sleep(90_000, controller.signal);

    expect(vi.getTimerCount()).toBe(0);
  });

  it("waits the full delay beyond the timer limit", async () => {
    const thirtyDays = 30 * 86_400_000;
    let done = false;
    const pending = sleep(thirtyDays).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(thirtyDays - MAX_TIMER_MS - 1);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toBe(true);
    await pending;
  });

  it("can be aborted during a long delay", async () => {
    const controller = new AbortController();
    const pending = sleep(30 * 86_400_000, controller.signal);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS + 1_000);
    controller.abort();
    await pending;

    expect(vi.getTimerCount()).toBe(0);
  });
});
