import { StdHumanError, errorMessage } from "@infra/errors/errors";
import { logger } from "@infra/logger/logger";
import type { Responder } from "@core/ports/responder.types";
import { buildQuestionSummary, renderPrompt } from "../prompt/prompt.utils";
import type { DecisionService, DecisionServiceDeps } from "./decision-service.types";

export async function deliverWithin(
  responder: Responder,
  destination: string,
  text: string,
  timeoutMs: number,
): Promise<boolean> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(false);
    }, timeoutMs);
  });

  try {
    const delivered = await Promise.race([responder.deliver(destination, text, controller.signal), expired]);
    if (!delivered && controller.signal.aborted) {
      logger.warn({ destination, timeoutMs }, "[stdhuman] Prompt delivery timed out.");
    }
    return delivered;
  } catch (error) {
    logger.error({ destination, error: errorMessage(error) }, "[stdhuman] Prompt delivery threw.");
    return false;
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export function createDecisionService(deps: DecisionServiceDeps): DecisionService {
  const { slot, responder } = deps;

  return {
    async askSync(input) {
      const destination = await deps.resolveDestination();
      if (!destination) {
        return { ok: false, reason: "no_destination" };
      }

      const timeoutSeconds = input.timeoutSeconds ?? deps.defaultTimeoutSeconds;
      const previous = slot.current();
      if (previous) {
        logger.info({ requestId: previous.id, status: previous.status }, "[stdhuman] Preempting previous decision.");
        slot.cancel();
      }
      const created = slot.create(input.question, input.options);
      if (!created.ok) {
        throw new StdHumanError(`Decision slot still occupied by ${created.pendingId} after preemption.`);
      }
      const requestId = created.id;

      const summary = buildQuestionSummary({
        question: input.question,
        lastStatus: deps.lastStatus?.(),
        timeoutSeconds,
      });
      const delivered = await deliverWithin(responder, destination, renderPrompt(summary, input.options), deps.deliveryTimeoutMs);
      if (!delivered) {
        slot.clear(requestId);
        return { ok: false, reason: "delivery_failed" };
      }

      logger.info({ requestId, timeoutSeconds }, "[stdhuman] Awaiting human decision.");
      const outcome = await slot.awaitAnswer(requestId, timeoutSeconds * 1000);
      slot.clear(requestId);

      switch (outcome.status) {
        case "answered":
          logger.info({ requestId }, "[stdhuman] Human decision received.");
          return { ok: true, requestId, answer: outcome.text };
        case "timeout":
          logger.warn({ requestId, timeoutSeconds }, "[stdhuman] Human decision timed out.");
          return { ok: false, reason: "timeout" };
        case "cancelled":
        case "not_found":
          logger.info({ requestId, status: outcome.status }, "[stdhuman] Decision superseded before an answer arrived.");
          return { ok: false, reason: "conflict" };
      }
    },

    async askAsync(input) {
      const destination = await deps.resolveDestination();
      if (!destination) {
        return { ok: false, reason: "no_destination" };
      }

      const created = slot.create(input.question, input.options);
      if (!created.ok) {
        logger.info({ pendingId: created.pendingId }, "[stdhuman] Rejecting async question while another is pending.");
        return { ok: false, reason: "conflict" };
      }

      const summary = buildQuestionSummary({ question: input.question, lastStatus: deps.lastStatus?.() });
      const delivered = await deliverWithin(responder, destination, renderPrompt(summary, input.options), deps.deliveryTimeoutMs);
      if (!delivered) {
        slot.clear(created.id);
        return { ok: false, reason: "delivery_failed" };
      }

      logger.info({ requestId: created.id }, "[stdhuman] Async decision pending.");
      return { ok: true, requestId: created.id };
    },

    poll(requestId) {
      return slot.peek(requestId);
    },

    cancelPending() {
      slot.cancel();
    },
  };
}
