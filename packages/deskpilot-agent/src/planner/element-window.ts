import { UIElement, findCounterpart } from '@deskpilot/shared';

/**
 * Chooses which elements the prompt shows when the screen has more than
 * `maxElements`. Detection order is kept; if the previous step's target
 * has a counterpart beyond the cut it replaces the last kept element.
 */
export function selectPromptElements(
  elements: readonly UIElement[],
  maxElements: number,
  previousTarget?: UIElement,
): UIElement[] {
  if (elements.length <= maxElements) {
    return [...elements];
  }

  const kept = elements.slice(0, Math.max(maxElements, 0));
  if (!previousTarget || kept.length === 0) {
    return kept;
  }

  const counterpart = findCounterpart(previousTarget, elements);
  if (counterpart && !kept.includes(counterpart)) {
    kept[kept.length - 1] = counterpart;
  }
  return kept;
}
