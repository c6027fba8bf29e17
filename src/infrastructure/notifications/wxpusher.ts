/**
 * WxPusher notifier — pushes a markdown message to one WeChat user id.
 */

import { z } from "zod";
import type { Logger } from "../../core/ports/logger.js";
import type { Notifier } from "../../core/ports/notifier.js";
import type { Sleeper } from "../../core/ports/retry.js";
import { err, ok, tryCatch } from "../../core/types/result.js";
import { sleep as timerSleep } from "../../shared/utils/sleep.js";
import { deliverWithRetry, postJson } from "./delivery.js";

export const WXPUSHER_ENDPOINT = "https://wxpusher.zjiecode.com/api/send/message";

/** WxPusher's success code in the JSON envelope */
const WXPUSHER_OK = 1000;
/** contentType 3 = markdown */
const MARKDOWN = 3;

const responseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
});

interface WxPusherNotifierOptions {
  readonly appToken: string;
  readonly uid: string;
  readonly logger: Logger;
  /** Request timeout in ms (default: 10000) */
  readonly timeoutMs?: number | undefined;
  /** Delivery attempts (default: 3) */
  readonly maxRetries?: number | undefined;
  readonly sleep?: Sleeper | undefined;
}

export const createWxPusherNotifier = (options: WxPusherNotifierOptions): Notifier => {
  const { appToken, uid, logger } = options;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const maxRetries = options.maxRetries ?? 3;
  const sleep = options.sleep ?? timerSleep;

  return {
    name: "wxpusher",

    get enabled(): boolean {
      return appToken.length > 0 && uid.length > 0;
    },

    async send(message) {
      const payload = {
        appToken,
        content: `# ${message.title}\n\n${message.body}`,
        summary: message.title,
        contentType: MARKDOWN,
        uids: [uid],
        verifyPay: false,
      };

      return deliverWithRetry({
        notifier: "wxpusher",
        logger,
        maxRetries,
        sleep,
        attempt: async () => {
          const response = await postJson(WXPUSHER_ENDPOINT, payload, timeoutMs);
          const json = tryCatch((): unknown => JSON.parse(response.body));
          const parsed = responseSchema.safeParse(json.ok ? json.value : undefined);
          if (!parsed.success) {
            return err(`unexpected response (HTTP ${response.status})`);
          }
          if (parsed.data.code !== WXPUSHER_OK) {
            return err(parsed.data.msg ?? `code ${parsed.data.code}`);
          }
          return ok(`code ${parsed.data.code}`);
        },
      });
    },
  };
};
