import { ScrollDirection } from "./actionPlan.types";

export type ClickKind = "left" | "right" | "middle" | "double";

/**
 * Low-level input simulation. Every operation resolves once the input has
 * been dispatched and rejects on a fault.
 */
export interface InputController {
  moveAndClick(x: number, y: number, clickKind: ClickKind): Promise<void>;
  typeText(text: string): Promise<void>;
  pressCombo(key: string, modifiers: readonly string[]): Promise<void>;
  scroll(direction: ScrollDirection, amount: number): Promise<void>;
  /** Ratio of screenshot pixels to logical input coordinates */
  getScalingFactor(): Promise<number>;
}

export interface ScreenCaptureProvider {
  /**
   * Captures the full screen as PNG bytes. An already aborted `signal`
   * rejects without capturing.
   */
  captureScreen(signal?: AbortSignal): Promise<Buffer>;
}

export const INPUT_CONTROLLER = "INPUT_CONTROLLER";
export const SCREEN_CAPTURE = "SCREEN_CAPTURE";
