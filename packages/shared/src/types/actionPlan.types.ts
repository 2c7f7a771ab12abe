export const ACTION_KINDS = ["click", "type", "scroll", "press_key"] as const;
export type ActionKind = (typeof ACTION_KINDS)[number];

export const SCROLL_DIRECTIONS = ["up", "down", "left", "right"] as const;
export type ScrollDirection = (typeof SCROLL_DIRECTIONS)[number];

export const DEFAULT_SCROLL_AMOUNT = 3;

export type ClickPlannedAction = {
  kind: "click";
  elementId: number;
};

export type TypePlannedAction = {
  kind: "type";
  text: string;
  elementId?: number;
};

export type ScrollPlannedAction = {
  kind: "scroll";
  direction: ScrollDirection;
  amount: number;
};

export type PressKeyPlannedAction = {
  kind: "press_key";
  keyInfo: string;
};

export type PlannedAction =
  | ClickPlannedAction
  | TypePlannedAction
  | ScrollPlannedAction
  | PressKeyPlannedAction;

export type ActionablePlan = {
  reasoning: string;
  isGoalComplete: false;
  action: PlannedAction;
};

// The payload of a completion plan is informational only and never executed.
export type GoalCompletePlan = {
  reasoning: string;
  isGoalComplete: true;
  action?: PlannedAction;
};

export type ActionPlan = ActionablePlan | GoalCompletePlan;
