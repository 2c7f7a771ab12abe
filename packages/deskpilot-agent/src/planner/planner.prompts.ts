import {
  HistoryEntry,
  PlatformHint,
  UIElement,
  formatElementForPrompt,
  formatHistoryEntry,
  getPlatformModifierKey,
} from '@deskpilot/shared';

export const PLANNER_SYSTEM_PROMPT = [
  'You are a UI automation assistant that operates a desktop one action at a time.',
  'Respond ONLY with a single JSON object that follows the requested structure. Do not add any text before or after it.',
].join('\n');

export interface PlannerPromptContext {
  goal: string;
  platformHint: PlatformHint;
  history: readonly HistoryEntry[];
  /** Elements shown to the model, already truncated */
  elements: readonly UIElement[];
  /** Number of elements on screen before truncation */
  totalElements: number;
}

const RESPONSE_FORMAT = [
  '{',
  '  "reasoning": "step-by-step thinking that links the goal to the chosen action",',
  '  "action": "click | type | scroll | press_key",',
  '  "is_goal_complete": false,',
  '  "element_id": <ID for click, optional for type, otherwise null>,',
  '  "text_to_type": "<text for type, otherwise null>",',
  '  "key_info": "<key or shortcut for press_key, e.g. Enter or Cmd+Space, otherwise null>",',
  '  "scroll_direction": "<up | down | left | right for scroll, otherwise null>",',
  '  "scroll_amount": <wheel steps for scroll, optional, otherwise null>',
  '}',
].join('\n');

export function buildPlannerPrompt(context: PlannerPromptContext): string {
  const modifierKey = getPlatformModifierKey(context.platformHint);

  const historyLines =
    context.history.length > 0
      ? context.history.map(formatHistoryEntry)
      : ['(none)'];

  const elementLines =
    context.elements.length > 0
      ? context.elements.map(formatElementForPrompt)
      : ['(no elements detected)'];

  return [
    'USER GOAL',
    context.goal,
    '',
    'PLATFORM',
    `Operating system: ${context.platformHint}. Use ${modifierKey} as the primary modifier for shortcuts (e.g. ${modifierKey}+T for a new tab).`,
    '',
    'PREVIOUS STEPS',
    ...historyLines,
    '',
    `CURRENT UI ELEMENTS (${context.elements.length} of ${context.totalElements})`,
    'Bounds are (x, y, width, height) relative to the screen, from 0 to 1.',
    ...elementLines,
    '',
    'INSTRUCTIONS',
    '1. Compare the goal with the current elements and the previous steps. Do not repeat an action that already failed unless the screen has changed.',
    '2. If the goal is already achieved on this screen, set "is_goal_complete" to true.',
    '3. Otherwise choose exactly one action: "click" an element, "type" text (optionally into an element), "scroll" the view, or "press_key" for a key or shortcut.',
    '4. Fill only the fields that belong to the chosen action and set the others to null.',
    '',
    'RESPONSE FORMAT',
    RESPONSE_FORMAT,
  ].join('\n');
}
