export type DecisionStatus = "pending" | "answered" | "cancelled";

export type DecisionSnapshot = {
  id: string;
  question: string;
  options: readonly string[];
  status: DecisionStatus;
};

export type CreateDecisionResult =
  | { ok: true; id: string }
  | { ok: false; reason: "conflict"; pendingId: string };

export type WaitOutcome =
  | { status: "answered"; text: string }
  | { status: "timeout" }
  | { status: "cancelled" }
  | { status: "not_found" };

export type PeekResult =
  | { status: "answered"; text: string }
  | { status: "pending" }
  | { status: "not_found" };

export type AnswerSlot = {
  /** Installs a new decision unless a live one already occupies the slot. */
  create: (question: string, options: readonly string[]) => CreateDecisionResult;
  /** Waits for the decision `id`; never clears the slot. */
  awaitAnswer: (id: string, timeoutMs: number) => Promise<WaitOutcome>;
  /** First answer wins; later calls return false until a new decision is created. */
  resolve: (text: string) => boolean;
  peek: (id: string) => PeekResult;
  cancel: () => void;
  /** Clears the slot only while it still holds `id`. */
  clear: (id: string) => void;
  current: () => DecisionSnapshot | undefined;
  hasPending: () => boolean;
};

export type AnswerSlotOptions = {
  createId?: () => string;
};
