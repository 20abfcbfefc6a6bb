export type Mission = {
  id: string;
  project: string;
  steps: string[];
  startedAt: string;
  lastStatus?: string;
  logs: string[];
  completedSteps: number[];
};

export type MissionManager = {
  create: (project: string, steps: readonly string[]) => Mission;
  appendLog: (text: string) => void;
  /** Marks a 1-based step done; undefined when there is no mission or the index is out of range. */
  completeStep: (stepIndex: number) => string | undefined;
  current: () => Mission | undefined;
};
