import { HistoryEntry, RunReport, ScreenState } from '@deskpilot/shared';

export interface StepRecord {
  runId: string;
  step: number;
  /** Snapshot the step planned against; null when perception failed */
  state: ScreenState | null;
  entry: HistoryEntry;
}

/**
 * Receives a copy of every step for offline inspection. The agent loop
 * treats every method as best-effort.
 */
export interface StepArtifactSink {
  /** @returns the directory artifacts are written to, if any */
  startRun(runId: string, goal: string): Promise<string | undefined>;
  recordStep(record: StepRecord): Promise<void>;
  finishRun(report: RunReport): Promise<void>;
}

export const STEP_ARTIFACT_SINK = 'STEP_ARTIFACT_SINK';
