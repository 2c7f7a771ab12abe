import { FailureKind, HistoryEntry } from "./history.types";
import { ScreenState } from "./uiElement.types";

export type RunOutcome = "goal_complete" | "budget_exhausted" | "failed";

export interface RunFailure {
  readonly kind: FailureKind;
  /** Consecutive occurrences of `kind` when the run stopped */
  readonly count: number;
  readonly message: string;
}

export interface RunReport {
  readonly runId: string;
  readonly goal: string;
  readonly outcome: RunOutcome;
  readonly finalState: ScreenState | null;
  readonly stepsTaken: number;
  readonly history: readonly HistoryEntry[];
  readonly failure?: RunFailure;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly artifactsDir?: string;
}
