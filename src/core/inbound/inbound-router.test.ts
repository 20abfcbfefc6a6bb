import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { createAnswerSlot } from "@core/decision/answer-slot/answer-slot";
import type { OperatorRecord, OperatorStore } from "@core/ports/operator-store.types";
import { buildInfoText, createInboundHandler, normalizeUsername, routeInbound } from "./inbound-router";
import { AnswerSlotService, OperatorStoreService, StartCodeService } from "./services.types";

function createMemoryOperatorStore(initial?: OperatorRecord): OperatorStore & { record: () => OperatorRecord | undefined } {
  let record = initial;
  return {
    record: () => record,
    async get() {
      return record;
    },
    async remember(input) {
      record = { chatId: input.chatId, pairedAt: "2026-01-01T00:00:00Z", ...(input.username ? { username: input.username } : {}) };
    },
    async forget() {
      record = undefined;
    },
  };
}

const policy = {
  operatorUsername: "@Alice",
  startReplyDelayMs: 0,
  infoText: "info",
};

const startCodes = { startCode: async () => "code-123" };

function setup(initial?: OperatorRecord) {
  const operatorStore = createMemoryOperatorStore(initial);
  const slot = createAnswerSlot({ createId: () => "req-1" });
  const handle = createInboundHandler({ operatorStore, slot, startCodes, policy });
  return { operatorStore, slot, handle };
}

const paired: OperatorRecord = { chatId: "1001", username: "alice", pairedAt: "2026-01-01T00:00:00Z" };

describe("inbound router", () => {
  describe("/start", () => {
    it("asks for a code when none is given", async () => {
      const { handle, operatorStore } = setup();

      const result = await handle({ chatId: "1001", username: "alice", text: "/start" });

      expect(result).toEqual({ ok: true, replies: ["Authorization code required. Send /start <code>."], resolved: false });
      expect(operatorStore.record()).toBeUndefined();
    });

    it("rejects a wrong code", async () => {
      const { handle } = setup();

      const result = await handle({ chatId: "1001", username: "alice", text: "/start nope" });

      expect(result.replies).toEqual(["Authorization failed. Contact the operator."]);
    });

    it("rejects a sender that is not the configured operator", async () => {
      const { handle, operatorStore } = setup();

      const result = await handle({ chatId: "1001", username: "mallory", text: "/start code-123" });

      expect(result.replies).toEqual(["Authorization requires a Telegram username."]);
      expect(operatorStore.record()).toBeUndefined();
    });

    it("refuses to re-pair a different chat", async () => {
      const { handle, operatorStore } = setup(paired);

      const result = await handle({ chatId: "2002", username: "alice", text: "/start code-123" });

      expect(result.replies).toEqual(["Authorization mismatch. Contact the operator."]);
      expect(operatorStore.record()?.chatId).toBe("1001");
    });

    it("pairs the operator chat and sends the info text", async () => {
      const { handle, operatorStore } = setup();

      const result = await handle({ chatId: "1001", username: "@ALICE", text: "/start code-123" });

      expect(result).toEqual({ ok: true, replies: ["info"], resolved: false });
      expect(operatorStore.record()).toEqual({ chatId: "1001", username: "alice", pairedAt: "2026-01-01T00:00:00Z" });
    });
  });

  describe("replies", () => {
    it("rejects messages from an unpaired chat", async () => {
      const { handle, slot } = setup(paired);
      slot.create("Proceed?", ["Yes", "No"]);

      const result = await handle({ chatId: "2002", username: "alice", text: "1" });

      expect(result).toEqual({ ok: false, error: "unauthorized", replies: ["Authorization mismatch. Contact the operator."] });
      expect(slot.peek("req-1")).toEqual({ status: "pending" });
    });

    it("rejects everyone before pairing", async () => {
      const { handle } = setup();

      const result = await handle({ chatId: "1001", username: "alice", text: "hello" });

      expect(result.ok).toBe(false);
    });

    it("acknowledges a message when nothing is pending", async () => {
      const { handle, slot } = setup(paired);

      const result = await handle({ chatId: "1001", username: "alice", text: "hello" });

      expect(result).toEqual({ ok: true, replies: [], resolved: false });
      expect(slot.current()).toBeUndefined();
    });

    it("maps a positional reply onto the pending options", async () => {
      const { handle, slot } = setup(paired);
      slot.create("Proceed?", ["Yes", "No"]);

      const result = await handle({ chatId: "1001", username: "alice", text: "2" });

      expect(result).toEqual({ ok: true, replies: [], resolved: true });
      expect(slot.peek("req-1")).toEqual({ status: "answered", text: "No" });
    });

    it("ignores a duplicate reply after the first answer", async () => {
      const { handle, slot } = setup(paired);
      slot.create("Proceed?", ["Yes", "No"]);

      await handle({ chatId: "1001", username: "alice", text: "Yes" });
      const duplicate = await handle({ chatId: "1001", username: "alice", text: "No" });

      expect(duplicate).toEqual({ ok: true, replies: [], resolved: false });
      expect(slot.peek("req-1")).toEqual({ status: "answered", text: "Yes" });
    });

    it("does not resolve on an empty answer command", async () => {
      const { handle, slot } = setup(paired);
      slot.create("Proceed?", []);

      const result = await handle({ chatId: "1001", username: "alice", text: "/answer" });

      expect(result).toEqual({ ok: true, replies: [], resolved: false });
      expect(slot.hasPending()).toBe(true);
    });
  });

  it("runs with explicitly provided services", async () => {
    const slot = createAnswerSlot({ createId: () => "req-7" });
    slot.create("Name?", []);
    const program = routeInbound({ chatId: "1001", username: "alice", text: "/a  Ada " }, policy);

    const provided = Effect.provideService(
      Effect.provideService(
        Effect.provideService(program, OperatorStoreService, createMemoryOperatorStore(paired)),
        StartCodeService,
        startCodes,
      ),
      AnswerSlotService,
      slot,
    );

    const result = await Effect.runPromise(provided);
    expect(result).toEqual({ ok: true, replies: [], resolved: true });
    expect(slot.peek("req-7")).toEqual({ status: "answered", text: "Ada" });
  });

  it("normalizes usernames", () => {
    expect(normalizeUsername(" @@Alice ")).toBe("alice");
    expect(normalizeUsername("@")).toBeUndefined();
    expect(normalizeUsername(undefined)).toBeUndefined();
  });

  it("builds the info text", () => {
    expect(buildInfoText({ projectName: "StdHuman Agent", port: 18081 })).toBe(
      "StdHuman Agent is a local helper that keeps the /v1/plan, /v1/log, and /v1/ask endpoints ready.\n"
        + "Base URL: http://localhost:18081\n"
        + "Plan missions, report progress, and request human input when ambiguity pops up.",
    );
  });
});
