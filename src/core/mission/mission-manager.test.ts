import { describe, expect, it } from "vitest";
import { createMissionManager, formatPlanSummary } from "./mission-manager";

const clock = {
  nowIso: () => "2026-01-01T00:00:00Z",
};

describe("mission manager", () => {
  it("tracks the latest mission as current", () => {
    const missions = createMissionManager({ clock, createId: () => "m-1" });

    const mission = missions.create("release", ["build", "deploy"]);

    expect(mission).toEqual({
      id: "m-1",
      project: "release",
      steps: ["build", "deploy"],
      startedAt: "2026-01-01T00:00:00Z",
      logs: [],
      completedSteps: [],
    });
    expect(missions.current()?.id).toBe("m-1");
  });

  it("records logs as the last status", () => {
    const missions = createMissionManager({ clock });
    missions.appendLog("INFO: ignored without a mission");
    missions.create("release", ["build"]);

    missions.appendLog("INFO: building");
    missions.appendLog("WARNING: slow");

    expect(missions.current()?.logs).toEqual(["INFO: building", "WARNING: slow"]);
    expect(missions.current()?.lastStatus).toBe("WARNING: slow");
  });

  it("completes steps once and rejects out of range indexes", () => {
    const missions = createMissionManager({ clock });
    expect(missions.completeStep(1)).toBeUndefined();
    missions.create("release", ["build", "deploy"]);

    expect(missions.completeStep(2)).toBe("Step 2/2 complete: deploy");
    expect(missions.completeStep(2)).toBe("Step 2/2 complete: deploy");
    expect(missions.completeStep(0)).toBeUndefined();
    expect(missions.completeStep(3)).toBeUndefined();
    expect(missions.current()?.completedSteps).toEqual([2]);
  });

  it("formats the plan summary", () => {
    expect(formatPlanSummary({ project: "release", steps: ["build", "deploy"] })).toBe(
      "Plan started: release (2 steps)\nSteps:\n1) build\n2) deploy",
    );
  });
});
