import {
  Bounds,
  ElementAttributes,
  ScreenState,
  UIElement,
} from "../types/uiElement.types";
import { boundsCenter, isNormalizedBounds } from "./coordinates.utils";

const PROMPT_CONTENT_LIMIT = 30;

export function createUIElement(fields: {
  id: number;
  type: string;
  content: string;
  bounds: Bounds;
  confidence: number;
  attributes?: Record<string, unknown>;
}): UIElement {
  const attributes: ElementAttributes = Object.freeze({
    ...(fields.attributes ?? {}),
  });
  return Object.freeze({
    id: fields.id,
    type: fields.type,
    content: fields.content,
    bounds: Object.freeze({ ...fields.bounds }),
    confidence: fields.confidence,
    attributes,
  });
}

export function findElementById(
  state: ScreenState,
  id: number,
): UIElement | undefined {
  return state.elements.find((element) => element.id === id);
}

/**
 * Locates the element in a newer snapshot that most likely is the same
 * widget as `element`: identical type and content, nearest center.
 */
export function findCounterpart(
  element: UIElement,
  candidates: readonly UIElement[],
): UIElement | undefined {
  const origin = boundsCenter(element.bounds);
  let best: UIElement | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    if (
      candidate.type !== element.type ||
      candidate.content !== element.content
    ) {
      continue;
    }
    const center = boundsCenter(candidate.bounds);
    const distance = Math.hypot(center.x - origin.x, center.y - origin.y);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}

/**
 * Single-line rendering used in planner prompts, e.g.
 * `ID: 3, Type: button, Content: 'Submit', Bounds: (0.40, 0.50, 0.20, 0.10)`
 */
export function formatElementForPrompt(element: UIElement): string {
  const flattened = element.content.replace(/\s*\n\s*/g, " ");
  const content =
    flattened.length > PROMPT_CONTENT_LIMIT
      ? `${flattened.slice(0, PROMPT_CONTENT_LIMIT)}...`
      : flattened;
  const { x, y, width, height } = element.bounds;
  const bounds = [x, y, width, height].map((v) => v.toFixed(2)).join(", ");
  return `ID: ${element.id}, Type: ${element.type}, Content: '${content}', Bounds: (${bounds})`;
}

/**
 * Returns the first broken invariant of a snapshot, or null when ids are
 * dense from 0 and every bounds value is normalized.
 */
export function findScreenStateViolation(state: ScreenState): string | null {
  for (const [index, element] of state.elements.entries()) {
    if (element.id !== index) {
      return `element at position ${index} has id ${element.id}`;
    }
    if (!isNormalizedBounds(element.bounds)) {
      return `element ${element.id} has bounds outside [0, 1]`;
    }
    if (!(element.confidence >= 0 && element.confidence <= 1)) {
      return `element ${element.id} has confidence ${element.confidence}`;
    }
  }
  return null;
}
