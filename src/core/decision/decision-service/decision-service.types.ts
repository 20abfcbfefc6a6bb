import type { AnswerSlot, PeekResult } from "../answer-slot/answer-slot.types";
import type { DestinationResolver, Responder } from "@core/ports/responder.types";

export type DecisionServiceDeps = {
  slot: AnswerSlot;
  responder: Responder;
  resolveDestination: DestinationResolver;
  defaultTimeoutSeconds: number;
  deliveryTimeoutMs: number;
  lastStatus?: () => string | undefined;
};

export type AskInput = {
  question: string;
  options: readonly string[];
};

export type AskSyncInput = AskInput & {
  timeoutSeconds?: number | undefined;
};

export type AskFailureReason = "no_destination" | "conflict" | "delivery_failed" | "timeout";

export type AskSyncResult =
  | { ok: true; requestId: string; answer: string }
  | { ok: false; reason: AskFailureReason };

export type AskAsyncResult =
  | { ok: true; requestId: string }
  | { ok: false; reason: Exclude<AskFailureReason, "timeout"> };

export type PollResult = PeekResult;

export type DecisionService = {
  /** Preempts any pending decision, then waits for the operator's answer. */
  askSync: (input: AskSyncInput) => Promise<AskSyncResult>;
  /** Refuses to replace a pending decision; the caller polls with the returned id. */
  askAsync: (input: AskInput) => Promise<AskAsyncResult>;
  poll: (requestId: string) => PollResult;
  cancelPending: () => void;
};
