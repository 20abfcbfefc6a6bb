import type { z } from "zod";
import type { DecisionService } from "@core/decision/decision-service/decision-service.types";
import type { MissionManager } from "@core/mission/mission-manager.types";
import type { DestinationResolver, Responder } from "@core/ports/responder.types";
import type { askPayloadSchema, logPayloadSchema, planPayloadSchema } from "./api.schema";
import type { createCommandRouter } from "./api";

export type AskPayload = z.infer<typeof askPayloadSchema>;
export type PlanPayload = z.infer<typeof planPayloadSchema>;
export type LogPayload = z.infer<typeof logPayloadSchema>;

export type CommandFailureStatus = 400 | 404 | 408 | 409 | 502;

export type CommandResult<T> =
  | { ok: true; value: T }
  | { ok: false; status: CommandFailureStatus; error: string };

export type AskReply = { answer: string } | { request_id: string; status: "pending" };
export type AskResultReply = { answer: string } | { status: "pending" };

export type CommandDeps = {
  decisions: DecisionService;
  missions: MissionManager;
  responder: Responder;
  resolveDestination: DestinationResolver;
  deliveryTimeoutMs: number;
};

export type CommandHandlers = {
  ask: (payload: AskPayload) => Promise<CommandResult<AskReply>>;
  askResult: (requestId: string) => CommandResult<AskResultReply>;
  plan: (payload: PlanPayload) => Promise<CommandResult<{ mission_id: string }>>;
  log: (payload: LogPayload) => Promise<CommandResult<{ status: "logged" }>>;
};

export type CommandRouter = ReturnType<typeof createCommandRouter>;
