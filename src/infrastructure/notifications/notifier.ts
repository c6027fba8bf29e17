import type { Logger } from "../../core/ports/logger.js";
import type { Notifier } from "../../core/ports/notifier.js";
import { ok } from "../../core/types/result.js";

/**
 * No-op notifier for when no push service is configured.
 */
export const createNoopNotifier = (logger: Logger): Notifier => ({
  name: "noop",
  get enabled(): boolean {
    return false;
  },
  async send(message) {
    logger.info("No notifier configured, skipping notification", { title: message.title });
    return ok(undefined);
  },
});

/**
 * Fan a message out to every enabled notifier. One delivered copy is
 * enough; the first failure is reported only when nothing got through.
 */
export const createCompositeNotifier = (notifiers: readonly Notifier[], logger: Logger): Notifier => {
  const active = notifiers.filter((n) => n.enabled);
  if (active.length === 0) return createNoopNotifier(logger);

  return {
    name: active.map((n) => n.name).join("+"),
    get enabled(): boolean {
      return true;
    },
    async send(message) {
      const results = await Promise.all(active.map((n) => n.send(message)));
      const delivered = results.filter((r) => r.ok).length;
      const firstFailure = results.find((r) => !r.ok);

      if (delivered === 0 && firstFailure) return firstFailure;
      return ok(undefined);
    },
  };
};
