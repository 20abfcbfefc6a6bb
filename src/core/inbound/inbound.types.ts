export type InboundMessage = {
  chatId: string;
  username?: string | undefined;
  text: string;
};

export type InboundResult =
  | { ok: true; replies: string[]; resolved: boolean }
  | { ok: false; error: "unauthorized"; replies: string[] };

export type InboundPolicy = {
  /** Configured operator handle, with or without the leading `@`. */
  operatorUsername: string;
  startReplyDelayMs: number;
  infoText: string;
};
