import {
  ActionKind,
  ActionPlan,
  ClickPlannedAction,
  PlannedAction,
  PressKeyPlannedAction,
  ScrollPlannedAction,
  TypePlannedAction,
  ACTION_KINDS,
} from "../types/actionPlan.types";

/**
 * Type guard factory for planned actions
 */
function createPlannedActionGuard<T extends PlannedAction>(
  kind: T["kind"],
): (action: PlannedAction) => action is T {
  return (action: PlannedAction): action is T => action.kind === kind;
}

export const isClickAction = createPlannedActionGuard<ClickPlannedAction>("click");
export const isTypeAction = createPlannedActionGuard<TypePlannedAction>("type");
export const isScrollAction =
  createPlannedActionGuard<ScrollPlannedAction>("scroll");
export const isPressKeyAction =
  createPlannedActionGuard<PressKeyPlannedAction>("press_key");

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

export function targetElementId(action: PlannedAction): number | undefined {
  if (isClickAction(action) || isTypeAction(action)) {
    return action.elementId;
  }
  return undefined;
}

export function describeAction(action: PlannedAction): string {
  if (isClickAction(action)) {
    return `click element ${action.elementId}`;
  }
  if (isTypeAction(action)) {
    const into =
      action.elementId === undefined ? "" : ` into element ${action.elementId}`;
    return `type ${JSON.stringify(action.text)}${into}`;
  }
  if (isScrollAction(action)) {
    return `scroll ${action.direction} x${action.amount}`;
  }
  return `press ${action.keyInfo}`;
}

export function describePlan(plan: ActionPlan | null): string {
  if (!plan) {
    return "no plan";
  }
  if (plan.isGoalComplete) {
    return "declare goal complete";
  }
  return describeAction(plan.action);
}
