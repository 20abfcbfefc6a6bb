import { randomUUID } from "node:crypto";
import type { Clock } from "@core/ports/clock.types";
import type { Mission, MissionManager } from "./mission-manager.types";

export function createMissionManager(deps: { clock: Clock; createId?: () => string }): MissionManager {
  const createId = deps.createId ?? randomUUID;
  const missions = new Map<string, Mission>();
  let currentId: string | undefined;

  const current = () => (currentId ? missions.get(currentId) : undefined);

  return {
    create(project, steps) {
      const mission: Mission = {
        id: createId(),
        project,
        steps: [...steps],
        startedAt: deps.clock.nowIso(),
        logs: [],
        completedSteps: [],
      };
      missions.set(mission.id, mission);
      currentId = mission.id;
      return mission;
    },

    appendLog(text) {
      const mission = current();
      if (!mission) {
        return;
      }
      mission.logs.push(text);
      mission.lastStatus = text;
    },

    completeStep(stepIndex) {
      const mission = current();
      if (!mission) {
        return undefined;
      }
      const stepText = mission.steps[stepIndex - 1];
      if (stepIndex < 1 || stepText === undefined) {
        return undefined;
      }
      if (!mission.completedSteps.includes(stepIndex)) {
        mission.completedSteps.push(stepIndex);
      }
      return `Step ${stepIndex}/${mission.steps.length} complete: ${stepText}`;
    },

    current,
  };
}

export function formatPlanSummary(mission: Pick<Mission, "project" | "steps">): string {
  return [
    `Plan started: ${mission.project} (${mission.steps.length} steps)`,
    "Steps:",
    ...mission.steps.map((step, index) => `${index + 1}) ${step}`),
  ].join("\n");
}
