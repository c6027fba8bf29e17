import type { Logger } from "../../core/ports/logger.js";
import type { Notifier } from "../../core/ports/notifier.js";
import type { Sleeper } from "../../core/ports/retry.js";
import type { AppConfig } from "../config/config.js";
import { createCompositeNotifier } from "./notifier.js";
import { createWxPushNotifier } from "./wxpush.js";
import { createWxPusherNotifier } from "./wxpusher.js";

export { createCompositeNotifier, createNoopNotifier } from "./notifier.js";
export { createWxPushNotifier } from "./wxpush.js";
export { createWxPusherNotifier, WXPUSHER_ENDPOINT } from "./wxpusher.js";

/**
 * Build the notifier from config. Services missing a required value are
 * left out; with none left, notifications are skipped.
 */
export const createNotifierFromConfig = (
  notify: AppConfig["notify"],
  logger: Logger,
  sleep?: Sleeper,
): Notifier => {
  const notifiers: Notifier[] = [];
  const log = logger.child({ component: "notifier" });

  const { wxpusher, wxpush, timeoutMs } = notify;
  if (wxpusher.appToken && wxpusher.uid) {
    notifiers.push(
      createWxPusherNotifier({
        appToken: wxpusher.appToken,
        uid: wxpusher.uid,
        logger: log,
        timeoutMs,
        sleep,
      }),
    );
  }
  if (wxpush.url && wxpush.token) {
    notifiers.push(
      createWxPushNotifier({
        baseUrl: wxpush.url,
        token: wxpush.token,
        userId: wxpush.userId,
        logger: log,
        timeoutMs,
        sleep,
      }),
    );
  }

  return createCompositeNotifier(notifiers, log);
};
