import { deliverWithin } from "@core/decision/decision-service/decision-service";
import type { AskFailureReason } from "@core/decision/decision-service/decision-service.types";
import { formatPlanSummary } from "@core/mission/mission-manager";
import { logger } from "@infra/logger/logger";
import type { CommandDeps, CommandFailureStatus, CommandHandlers, CommandResult, LogPayload } from "./api.types";

const MISSING_DESTINATION = "authorized user id missing; send /start <code> to the bot first";

const failureByReason: Record<AskFailureReason, { status: CommandFailureStatus; error: string }> = {
  no_destination: { status: 400, error: MISSING_DESTINATION },
  delivery_failed: { status: 502, error: "telegram send failed" },
  timeout: { status: 408, error: "timeout waiting for human response" },
  conflict: { status: 409, error: "another decision is already pending" },
};

function fail<T>(reason: AskFailureReason): CommandResult<T> {
  return { ok: false, ...failureByReason[reason] };
}

function logWithLevel(level: LogPayload["level"], fields: Record<string, unknown>, message: string): void {
  if (level === "error") {
    logger.error(fields, message);
  } else if (level === "warning") {
    logger.warn(fields, message);
  } else {
    logger.info(fields, message);
  }
}

export function createCommandHandlers(deps: CommandDeps): CommandHandlers {
  const notify = async (text: string): Promise<CommandResult<true>> => {
    const destination = await deps.resolveDestination();
    if (!destination) {
      return fail("no_destination");
    }
    const delivered = await deliverWithin(deps.responder, destination, text, deps.deliveryTimeoutMs);
    return delivered ? { ok: true, value: true } : fail("delivery_failed");
  };

  return {
    async ask(payload) {
      if (payload.mode === "async") {
        const result = await deps.decisions.askAsync({ question: payload.question, options: payload.options });
        if (!result.ok) {
          return fail(result.reason);
        }
        return { ok: true, value: { request_id: result.requestId, status: "pending" } };
      }

      const result = await deps.decisions.askSync({
        question: payload.question,
        options: payload.options,
        timeoutSeconds: payload.timeout,
      });
      if (!result.ok) {
        // a newer question took the slot while this caller was waiting
        return result.reason === "conflict"
          ? { ok: false, status: 409, error: "decision superseded by a newer question" }
          : fail(result.reason);
      }
      return { ok: true, value: { answer: result.answer } };
    },

    askResult(requestId) {
      const result = deps.decisions.poll(requestId);
      if (result.status === "answered") {
        return { ok: true, value: { answer: result.text } };
      }
      if (result.status === "pending") {
        return { ok: true, value: { status: "pending" } };
      }
      return { ok: false, status: 404, error: "unknown request id" };
    },

    async plan(payload) {
      const mission = deps.missions.create(payload.project, payload.steps);
      logger.info({ missionId: mission.id, steps: mission.steps.length }, "[stdhuman] Mission planned.");
      const sent = await notify(formatPlanSummary(mission));
      if (!sent.ok) {
        return sent;
      }
      return { ok: true, value: { mission_id: mission.id } };
    },

    async log(payload) {
      deps.missions.appendLog(`${payload.level.toUpperCase()}: ${payload.message}`);
      logWithLevel(payload.level, { stepIndex: payload.step_index }, `[stdhuman] Agent log: ${payload.message}`);

      const stepLine = payload.step_index === undefined ? undefined : deps.missions.completeStep(payload.step_index);
      const sent = await notify(stepLine ? `${stepLine}\n${payload.message}` : payload.message);
      if (!sent.ok) {
        return sent;
      }
      return { ok: true, value: { status: "logged" } };
    },
  };
}
