import { Effect } from "effect";
import { parseAnswer } from "@core/decision/prompt/prompt.utils";
import type { AnswerSlot } from "@core/decision/answer-slot/answer-slot.types";
import { extractStartCode } from "@core/pairing/start-code.utils";
import type { OperatorStore } from "@core/ports/operator-store.types";
import type { StartCodeProvider } from "@core/ports/start-code.types";
import { logger } from "@infra/logger/logger";
import {
  AUTH_CODE_REQUIRED_MESSAGE,
  AUTH_FAILED_MESSAGE,
  AUTH_MISMATCH_MESSAGE,
  AUTH_USERNAME_REQUIRED_MESSAGE,
} from "./inbound.consts";
import type { InboundMessage, InboundPolicy, InboundResult } from "./inbound.types";
import { AnswerSlotService, OperatorStoreService, StartCodeService } from "./services.types";

export function normalizeUsername(username: string | undefined): string | undefined {
  const normalized = username?.trim().replace(/^@+/, "").toLowerCase();
  return normalized ? normalized : undefined;
}

function isOperatorUsername(username: string | undefined, policy: InboundPolicy): boolean {
  const normalized = normalizeUsername(username);
  return normalized !== undefined && normalized === normalizeUsername(policy.operatorUsername);
}

function delayedReply(text: string, policy: InboundPolicy): Effect.Effect<InboundResult> {
  return Effect.as(Effect.sleep(policy.startReplyDelayMs), { ok: true as const, replies: [text], resolved: false });
}

function handleStart(
  message: InboundMessage,
  policy: InboundPolicy,
): Effect.Effect<InboundResult, never, OperatorStoreService | StartCodeService> {
  return Effect.gen(function* () {
    const operators = yield* OperatorStoreService;
    const startCodes = yield* StartCodeService;

    const code = extractStartCode(message.text);
    if (!code) {
      logger.warn({ chatId: message.chatId }, "[stdhuman] Start denied: missing code.");
      return yield* delayedReply(AUTH_CODE_REQUIRED_MESSAGE, policy);
    }

    const expected = yield* Effect.promise(() => startCodes.startCode());
    if (code !== expected) {
      logger.warn({ chatId: message.chatId }, "[stdhuman] Start denied: invalid code.");
      return yield* delayedReply(AUTH_FAILED_MESSAGE, policy);
    }

    if (!isOperatorUsername(message.username, policy)) {
      logger.warn({ chatId: message.chatId }, "[stdhuman] Start denied: username mismatch.");
      return yield* delayedReply(AUTH_USERNAME_REQUIRED_MESSAGE, policy);
    }

    const stored = yield* Effect.promise(() => operators.get());
    if (stored && stored.chatId !== message.chatId) {
      logger.warn({ chatId: message.chatId }, "[stdhuman] Start denied: paired chat differs.");
      return yield* delayedReply(AUTH_MISMATCH_MESSAGE, policy);
    }

    yield* Effect.promise(() => operators.remember({ chatId: message.chatId, username: normalizeUsername(message.username) }));
    logger.info({ chatId: message.chatId }, "[stdhuman] Start authorized.");
    return yield* delayedReply(policy.infoText, policy);
  });
}

function isAuthorized(
  message: InboundMessage,
  policy: InboundPolicy,
): Effect.Effect<boolean, never, OperatorStoreService> {
  return Effect.gen(function* () {
    const operators = yield* OperatorStoreService;
    const stored = yield* Effect.promise(() => operators.get());
    if (!stored) {
      logger.warn({ chatId: message.chatId }, "[stdhuman] Authorization denied: no paired operator.");
      return false;
    }
    if (!isOperatorUsername(message.username, policy)) {
      logger.warn({ chatId: message.chatId, hasUsername: Boolean(message.username) }, "[stdhuman] Authorization denied: username mismatch.");
      return false;
    }
    if (stored.chatId !== message.chatId) {
      logger.warn({ chatId: message.chatId }, "[stdhuman] Authorization denied: chat id mismatch.");
      return false;
    }
    return true;
  });
}

/**
 * Routes one operator message: `/start <code>` pairs the chat, anything else
 * from the paired operator answers the pending decision, if there is one.
 */
export function routeInbound(
  message: InboundMessage,
  policy: InboundPolicy,
): Effect.Effect<InboundResult, never, OperatorStoreService | StartCodeService | AnswerSlotService> {
  return Effect.gen(function* () {
    if (message.text.trim().startsWith("/start")) {
      return yield* handleStart(message, policy);
    }

    if (!(yield* isAuthorized(message, policy))) {
      return { ok: false as const, error: "unauthorized" as const, replies: [AUTH_MISMATCH_MESSAGE] };
    }

    const slot = yield* AnswerSlotService;
    const pending = slot.current();
    if (!pending || pending.status !== "pending") {
      logger.debug({ chatId: message.chatId }, "[stdhuman] No pending decision for inbound message.");
      return { ok: true as const, replies: [], resolved: false };
    }

    const answer = parseAnswer(message.text, pending.options);
    if (!answer) {
      return { ok: true as const, replies: [], resolved: false };
    }

    const resolved = slot.resolve(answer);
    logger.info({ requestId: pending.id, resolved }, "[stdhuman] Operator reply applied to pending decision.");
    return { ok: true as const, replies: [], resolved };
  });
}

export function createInboundHandler(deps: {
  operatorStore: OperatorStore;
  slot: AnswerSlot;
  startCodes: StartCodeProvider;
  policy: InboundPolicy;
}): (message: InboundMessage) => Promise<InboundResult> {
  return async (message) => {
    const program = routeInbound(message, deps.policy);
    const withServices = Effect.provideService(
      Effect.provideService(
        Effect.provideService(program, OperatorStoreService, deps.operatorStore),
        StartCodeService,
        deps.startCodes,
      ),
      AnswerSlotService,
      deps.slot,
    );
    return await Effect.runPromise(withServices);
  };
}

export function buildInfoText(input: { projectName: string; port: number }): string {
  return [
    `${input.projectName} is a local helper that keeps the /v1/plan, /v1/log, and /v1/ask endpoints ready.`,
    `Base URL: http://localhost:${input.port}`,
    "Plan missions, report progress, and request human input when ambiguity pops up.",
  ].join("\n");
}
