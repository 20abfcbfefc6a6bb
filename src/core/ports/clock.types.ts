export type Clock = {
  /** Current time as an ISO 8601 timestamp with the local offset. */
  nowIso: () => string;
};
