import type { Api } from "grammy";
import type { InboundMessage, InboundResult } from "@core/inbound/inbound.types";
import type { Responder } from "@core/ports/responder.types";

/** grammy ships its own AbortSignal type on Node, distinct from the global one. */
export type TelegramSignal = NonNullable<Parameters<Api["sendMessage"]>[3]>;

export type TelegramSender = Pick<Api, "sendMessage">;

export type InboundHandler = (message: InboundMessage) => Promise<InboundResult>;

export type TelegramBridgeHealth = {
  started: boolean;
  mode: "polling" | "webhook";
  error?: string;
};

export type TelegramBridge = Responder & {
  start: (onMessage: InboundHandler) => Promise<void>;
  stop: () => Promise<void>;
  health: () => TelegramBridgeHealth;
};

export type UpdateExtraction =
  | { kind: "ignored" }
  | { kind: "invalid"; error: string }
  | { kind: "message"; message: InboundMessage };
