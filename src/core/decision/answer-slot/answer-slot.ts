import { randomUUID } from "node:crypto";
import { logger } from "@infra/logger/logger";
import type { AnswerSlot, AnswerSlotOptions, DecisionStatus, WaitOutcome } from "./answer-slot.types";

const MAX_TIMER_DELAY_MS = 2_147_483_647;

type TerminalSignal = Extract<WaitOutcome, { status: "answered" } | { status: "cancelled" }>;

type PendingDecision = {
  id: string;
  question: string;
  options: readonly string[];
  outcome: { status: "pending" } | TerminalSignal;
  waiters: Set<(signal: TerminalSignal) => void>;
};

function releaseWaiters(decision: PendingDecision, signal: TerminalSignal): void {
  const waiters = [...decision.waiters];
  decision.waiters.clear();
  for (const wake of waiters) {
    wake(signal);
  }
}

function statusOf(decision: PendingDecision): DecisionStatus {
  return decision.outcome.status;
}

/**
 * Single-occupancy rendezvous between one caller waiting for a human answer and
 * the inbound reply path. Every mutation is synchronous, so the event loop
 * serializes create, resolve, cancel and clear; only `awaitAnswer` suspends.
 */
export function createAnswerSlot(options: AnswerSlotOptions = {}): AnswerSlot {
  const createId = options.createId ?? randomUUID;
  let slot: PendingDecision | undefined;

  const isLive = (decision: PendingDecision | undefined): decision is PendingDecision =>
    decision !== undefined && decision.outcome.status === "pending";

  const terminate = (decision: PendingDecision, signal: TerminalSignal): void => {
    decision.outcome = signal;
    releaseWaiters(decision, signal);
  };

  return {
    create(question, candidateOptions) {
      if (isLive(slot)) {
        logger.debug({ pendingId: slot.id }, "[stdhuman] Decision slot is occupied.");
        return { ok: false, reason: "conflict", pendingId: slot.id };
      }

      const decision: PendingDecision = {
        id: createId(),
        question,
        options: Object.freeze([...candidateOptions]),
        outcome: { status: "pending" },
        waiters: new Set(),
      };
      slot = decision;
      logger.debug({ requestId: decision.id, optionCount: decision.options.length }, "[stdhuman] Decision created.");
      return { ok: true, id: decision.id };
    },

    awaitAnswer(id, timeoutMs) {
      const decision = slot;
      if (!decision || decision.id !== id) {
        return Promise.resolve<WaitOutcome>({ status: "not_found" });
      }
      if (decision.outcome.status !== "pending") {
        return Promise.resolve<WaitOutcome>(decision.outcome);
      }

      return new Promise<WaitOutcome>((resolve) => {
        let settled = false;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const settle = (outcome: WaitOutcome) => {
          if (settled) {
            return;
          }
          settled = true;
          if (timer) {
            clearTimeout(timer);
          }
          decision.waiters.delete(settle);
          resolve(outcome);
        };

        // timers longer than MAX_TIMER_DELAY_MS fire at once, so long deadlines re-arm in chunks
        const deadline = Date.now() + Math.max(0, timeoutMs);
        const arm = () => {
          const remaining = deadline - Date.now();
          timer = remaining > MAX_TIMER_DELAY_MS
            ? setTimeout(arm, MAX_TIMER_DELAY_MS)
            : setTimeout(() => settle({ status: "timeout" }), Math.max(0, remaining));
        };

        decision.waiters.add(settle);
        arm();
      });
    },

    resolve(text) {
      if (!isLive(slot)) {
        return false;
      }
      terminate(slot, { status: "answered", text });
      logger.debug({ requestId: slot.id }, "[stdhuman] Decision answered.");
      return true;
    },

    peek(id) {
      if (!slot || slot.id !== id) {
        return { status: "not_found" };
      }
      if (slot.outcome.status === "answered") {
        return slot.outcome;
      }
      return slot.outcome.status === "pending" ? { status: "pending" } : { status: "not_found" };
    },

    cancel() {
      const decision = slot;
      slot = undefined;
      if (isLive(decision)) {
        terminate(decision, { status: "cancelled" });
        logger.debug({ requestId: decision.id }, "[stdhuman] Decision cancelled.");
      }
    },

    clear(id) {
      if (!slot || slot.id !== id) {
        return;
      }
      const decision = slot;
      slot = undefined;
      if (isLive(decision)) {
        terminate(decision, { status: "cancelled" });
      }
    },

    current() {
      if (!slot) {
        return undefined;
      }
      return {
        id: slot.id,
        question: slot.question,
        options: slot.options,
        status: statusOf(slot),
      };
    },

    hasPending() {
      return isLive(slot);
    },
  };
}
