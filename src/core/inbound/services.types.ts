import { Context } from "effect";
import type { AnswerSlot } from "@core/decision/answer-slot/answer-slot.types";
import type { OperatorStore } from "@core/ports/operator-store.types";
import type { StartCodeProvider } from "@core/ports/start-code.types";

export class OperatorStoreService extends Context.Tag("OperatorStoreService")<OperatorStoreService, OperatorStore>() {}

export class AnswerSlotService extends Context.Tag("AnswerSlotService")<AnswerSlotService, AnswerSlot>() {}

export class StartCodeService extends Context.Tag("StartCodeService")<StartCodeService, StartCodeProvider>() {}
