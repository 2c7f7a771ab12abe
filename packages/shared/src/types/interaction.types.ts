import { Bounds } from "./uiElement.types";

/**
 * "input" means only the input operation was confirmed; such results always
 * carry a confidence of 0. "visual" results come from a before/after
 * screenshot comparison.
 */
export type VerificationMethod = "input" | "visual";

export interface InteractionResult {
  readonly success: boolean;
  readonly changesDetected: readonly Bounds[];
  readonly confidence: number;
  readonly method: VerificationMethod;
  readonly error?: string;
  readonly context: Readonly<Record<string, unknown>>;
}

export type ActionVerification = InteractionResult;
