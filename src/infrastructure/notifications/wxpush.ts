/**
 * WXPush notifier — self-hosted worker exposing `POST /wxsend`.
 * `userId` overrides the worker's default recipients when set.
 */

import type { Logger } from "../../core/ports/logger.js";
import type { Notifier } from "../../core/ports/notifier.js";
import type { Sleeper } from "../../core/ports/retry.js";
import { err, ok } from "../../core/types/result.js";
import { sleep as timerSleep } from "../../shared/utils/sleep.js";
import { deliverWithRetry, postJson } from "./delivery.js";

interface WxPushNotifierOptions {
  readonly baseUrl: string;
  readonly token: string;
  readonly userId?: string | undefined;
  readonly logger: Logger;
  /** Request timeout in ms (default: 10000) */
  readonly timeoutMs?: number | undefined;
  /** Delivery attempts (default: 3) */
  readonly maxRetries?: number | undefined;
  readonly sleep?: Sleeper | undefined;
}

export const createWxPushNotifier = (options: WxPushNotifierOptions): Notifier => {
  const { token, userId, logger } = options;
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? 10_000;
  const maxRetries = options.maxRetries ?? 3;
  const sleep = options.sleep ?? timerSleep;

  return {
    name: "wxpush",

    get enabled(): boolean {
      return baseUrl.length > 0 && token.length > 0;
    },

    async send(message) {
      const payload: Record<string, string> = {
        title: message.title,
        content: message.body,
      };
      if (userId) {
        payload["userid"] = userId;
      }

      return deliverWithRetry({
        notifier: "wxpush",
        logger,
        maxRetries,
        sleep,
        attempt: async () => {
          const response = await postJson(`${baseUrl}/wxsend`, payload, timeoutMs, {
            Authorization: token,
          });
          const summary = `HTTP ${response.status} ${response.body}`.trim();
          return response.ok ? ok(summary) : err(summary);
        },
      });
    },
  };
};
