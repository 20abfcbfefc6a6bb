import { afterEach, describe, expect, it, vi } from "vitest";
import { createSystemClock } from "./system-clock";

describe("system clock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("formats the current instant with second precision and an offset", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T12:30:45.000Z"));

    const stamp = createSystemClock().nowIso();

    expect(stamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(Z|[+-]\d{2}:\d{2})$/);
    expect(new Date(stamp).getTime()).toBe(Date.parse("2026-03-01T12:30:45.000Z"));
  });
});
