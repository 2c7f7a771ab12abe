import { z } from 'zod';
import {
  ActionPlan,
  DEFAULT_SCROLL_AMOUNT,
  PlanParseError,
  PlannedAction,
  SCROLL_DIRECTIONS,
  errorMessage,
  isActionKind,
} from '@deskpilot/shared';

/** Fields shared by every reply. Kind-specific fields are checked afterwards. */
const planEnvelopeSchema = z
  .object({
    reasoning: z.string(),
    action: z.string(),
    is_goal_complete: z.boolean(),
  })
  .passthrough();

// A field that belongs to another action kind may only be omitted or null
const absent = z.null().optional();
const elementId = z.number().int().nonnegative();

const clickPayloadSchema = z.object({
  action: z.literal('click'),
  element_id: elementId,
  text_to_type: absent,
  key_info: absent,
  scroll_direction: absent,
  scroll_amount: absent,
});

const typePayloadSchema = z.object({
  action: z.literal('type'),
  text_to_type: z.string(),
  element_id: elementId.nullish(),
  key_info: absent,
  scroll_direction: absent,
  scroll_amount: absent,
});

const scrollPayloadSchema = z.object({
  action: z.literal('scroll'),
  scroll_direction: z.enum(SCROLL_DIRECTIONS),
  scroll_amount: z.number().int().positive().nullish(),
  element_id: absent,
  text_to_type: absent,
  key_info: absent,
});

const pressKeyPayloadSchema = z.object({
  action: z.literal('press_key'),
  key_info: z.string().trim().min(1),
  element_id: absent,
  text_to_type: absent,
  scroll_direction: absent,
  scroll_amount: absent,
});

export const planPayloadSchema = z.discriminatedUnion('action', [
  clickPayloadSchema,
  typePayloadSchema,
  scrollPayloadSchema,
  pressKeyPayloadSchema,
]);

export type PlanPayload = z.infer<typeof planPayloadSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

function toPlannedAction(payload: PlanPayload): PlannedAction {
  switch (payload.action) {
    case 'click':
      return { kind: 'click', elementId: payload.element_id };
    case 'type':
      return payload.element_id === null || payload.element_id === undefined
        ? { kind: 'type', text: payload.text_to_type }
        : {
            kind: 'type',
            text: payload.text_to_type,
            elementId: payload.element_id,
          };
    case 'scroll':
      return {
        kind: 'scroll',
        direction: payload.scroll_direction,
        amount: payload.scroll_amount ?? DEFAULT_SCROLL_AMOUNT,
      };
    case 'press_key':
      return { kind: 'press_key', keyInfo: payload.key_info };
  }
}

/**
 * Pulls the outermost `{...}` out of a model reply, ignoring markdown fences
 * and any prose around it.
 */
export function extractJsonObject(reply: string): string {
  const unfenced = reply.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new PlanParseError('Reply contains no JSON object');
  }
  return unfenced.slice(start, end + 1);
}

/**
 * Parses a model reply into an ActionPlan.
 *
 * When the reply declares the goal complete only the action kind is
 * checked; a kind-specific payload that does not validate is omitted
 * from the plan instead of failing it.
 */
export function parsePlanReply(reply: string): ActionPlan {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonObject(reply));
  } catch (error) {
    if (error instanceof PlanParseError) {
      throw error;
    }
    throw new PlanParseError(`Reply is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const envelope = planEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new PlanParseError(`Invalid plan: ${formatIssues(envelope.error)}`);
  }

  const { reasoning, action, is_goal_complete } = envelope.data;
  if (!isActionKind(action)) {
    throw new PlanParseError(`Unknown action kind '${action}'`);
  }

  const payload = planPayloadSchema.safeParse(envelope.data);
  if (is_goal_complete) {
    return payload.success
      ? {
          reasoning,
          isGoalComplete: true,
          action: toPlannedAction(payload.data),
        }
      : { reasoning, isGoalComplete: true };
  }

  if (!payload.success) {
    throw new PlanParseError(
      `Invalid '${action}' plan: ${formatIssues(payload.error)}`,
    );
  }
  return {
    reasoning,
    isGoalComplete: false,
    action: toPlannedAction(payload.data),
  };
}
