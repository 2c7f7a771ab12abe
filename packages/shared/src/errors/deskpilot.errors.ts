export type DeskpilotErrorKind =
  | "perception_unavailable"
  | "perception_malformed"
  | "plan_parse"
  | "plan_target_missing"
  | "planner_unavailable"
  | "execution"
  | "run_failed";

export abstract class DeskpilotError extends Error {
  abstract readonly kind: DeskpilotErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The vision-parsing collaborator or the screen capture could not be reached. */
export class PerceptionUnavailableError extends DeskpilotError {
  readonly kind = "perception_unavailable";
}

/** The parser answered, but its response does not fit the element model. */
export class PerceptionMalformedError extends DeskpilotError {
  readonly kind = "perception_malformed";
}

export class PlanParseError extends DeskpilotError {
  readonly kind = "plan_parse";
}

export class PlanTargetMissingError extends DeskpilotError {
  readonly kind = "plan_target_missing";

  constructor(readonly elementId: number) {
    super(`Plan references element ${elementId}, which is not on screen`);
  }
}

export class PlannerUnavailableError extends DeskpilotError {
  readonly kind = "planner_unavailable";
}

export class ExecutionError extends DeskpilotError {
  readonly kind = "execution";
}

export function isDeskpilotError(error: unknown): error is DeskpilotError {
  return error instanceof DeskpilotError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
