import { DeskpilotErrorKind } from "../errors/deskpilot.errors";
import { ActionPlan } from "./actionPlan.types";
import { InteractionResult } from "./interaction.types";
import { UIElement } from "./uiElement.types";

export type FailureKind = Exclude<DeskpilotErrorKind, "run_failed"> | "cancelled";

export interface HistoryEntry {
  readonly step: number;
  readonly plan: ActionPlan | null;
  readonly target?: UIElement;
  readonly summary: string;
  readonly success: boolean;
  readonly failureKind?: FailureKind;
  readonly result?: InteractionResult;
  readonly timestamp: number;
}
