import { AbortController as TelegramAbortController } from "abort-controller";
import { DeliveryError, errorMessage } from "@infra/errors/errors";
import { logger } from "@infra/logger/logger";
import type { Responder } from "@core/ports/responder.types";
import type { InboundResult } from "@core/inbound/inbound.types";
import type { TelegramUpdate } from "./telegram.schema";
import type { TelegramSender, TelegramSignal, UpdateExtraction } from "./telegram.types";

export function isNumericChatId(value: string): boolean {
  return /^-?\d+$/.test(value.trim());
}

export function extractInboundFromUpdate(update: TelegramUpdate): UpdateExtraction {
  const message = update.message ?? update.edited_message;
  if (!message) {
    return { kind: "ignored" };
  }
  const chatId = message.chat?.id;
  if (chatId === undefined) {
    return { kind: "invalid", error: "missing chat id" };
  }
  const username = message.from?.username ?? message.chat?.username;
  return {
    kind: "message",
    message: {
      chatId: String(chatId),
      text: (message.text ?? "").trim(),
      ...(username ? { username } : {}),
    },
  };
}

export function toTelegramSignal(signal: AbortSignal | undefined): TelegramSignal | undefined {
  if (!signal) {
    return undefined;
  }
  const controller = new TelegramAbortController();
  if (signal.aborted) {
    controller.abort();
  } else {
    signal.addEventListener("abort", () => controller.abort(), { once: true });
  }
  return controller.signal;
}

export function createTelegramResponder(sender: TelegramSender): Responder {
  return {
    async deliver(destination, text, signal) {
      if (!isNumericChatId(destination)) {
        const failure = new DeliveryError(destination, "chat id must be numeric");
        logger.error({ error: failure.message }, "[stdhuman] Refusing to send Telegram message.");
        return false;
      }

      const chatId = Number.parseInt(destination, 10);
      try {
        await sender.sendMessage(chatId, text, { link_preview_options: { is_disabled: true } }, toTelegramSignal(signal));
        logger.info({ chatId }, "[stdhuman] Telegram message sent.");
        return true;
      } catch (error) {
        logger.error({ chatId, error: errorMessage(error) }, "[stdhuman] Failed to send Telegram message.");
        return false;
      }
    },
  };
}

export async function sendReplies(responder: Responder, chatId: string, result: InboundResult): Promise<void> {
  for (const reply of result.replies) {
    await responder.deliver(chatId, reply);
  }
}
