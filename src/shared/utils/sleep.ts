import type { Sleeper } from "../../core/ports/retry.js";
import { startTimer } from "./timers.js";

/**
 * Timer-based wait that resolves early (without throwing) when the signal
 * aborts. Callers check `signal.aborted` afterwards.
 */
export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      cancel();
      resolve();
    };

    const cancel = startTimer(ms, () => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    });

    signal?.addEventListener("abort", onAbort, { once: true });
  });
