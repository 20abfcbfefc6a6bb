import { Bot } from "grammy";
import type { RuntimeConfig } from "@infra/config/config.types";
import { ConfigurationError, errorMessage } from "@infra/errors/errors";
import { logger } from "@infra/logger/logger";
import type { InboundHandler, TelegramBridge } from "./telegram.types";
import { createTelegramResponder, sendReplies } from "./telegram.utils";

export function createTelegramBridge(config: RuntimeConfig): TelegramBridge {
  const token = config.telegram.token;
  if (!token) {
    throw new ConfigurationError("Telegram token is missing.", "TELEGRAM_BOT_TOKEN");
  }

  const bot = new Bot(token);
  const responder = createTelegramResponder(bot.api);
  const mode = config.telegram.mode;
  let handler: InboundHandler | undefined;
  let registered = false;
  let started = false;
  let startError: string | undefined;

  return {
    deliver: responder.deliver,

    async start(onMessage) {
      handler = onMessage;
      if (!registered) {
        bot.catch((error) => {
          logger.error({ error: errorMessage(error.error) }, "[stdhuman] Telegram middleware error.");
        });
        bot.on(["message:text", "edited_message:text"], async (ctx) => {
          const chatId = String(ctx.chat.id);
          const text = ctx.msg.text.trim();
          logger.info({ chatId }, "[stdhuman] Telegram message received.");
          if (!handler) {
            return;
          }
          const result = await handler({ chatId, text, username: ctx.from?.username });
          await sendReplies(responder, chatId, result);
        });
        registered = true;
      }

      if (mode !== "polling" || started) {
        return;
      }

      started = true;
      startError = undefined;
      void bot
        .start({
          drop_pending_updates: config.telegram.dropPendingUpdates,
          onStart: () => {
            logger.info("[stdhuman] Telegram polling started.");
          },
        })
        .catch((error: unknown) => {
          startError = errorMessage(error);
          logger.error({ error: startError }, "[stdhuman] Telegram polling failed.");
          started = false;
        });
    },

    async stop() {
      if (started) {
        await bot.stop();
      }
      started = false;
    },

    health() {
      return {
        started,
        mode,
        ...(startError ? { error: startError } : {}),
      };
    },
  };
}
