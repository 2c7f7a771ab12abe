/**
 * Rectangle in normalized screen space: every value lies in [0, 1]
 * relative to the screenshot it was detected on.
 */
export type Bounds = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type Dimensions = { width: number; height: number };

export type Point = { x: number; y: number };

export type ElementAttributes = Readonly<Record<string, unknown>>;

/**
 * One detected region of the screen. Ids are only meaningful inside the
 * ScreenState that produced them.
 */
export interface UIElement {
  readonly id: number;
  readonly type: string;
  readonly content: string;
  readonly bounds: Readonly<Bounds>;
  readonly confidence: number;
  readonly attributes: ElementAttributes;
}

/**
 * A single perception snapshot. Superseded, never merged, by the next one.
 */
export interface ScreenState {
  readonly elements: readonly UIElement[];
  readonly dimensions: Readonly<Dimensions>;
  readonly timestamp: number;
  /** PNG bytes of the screenshot the elements were detected on */
  readonly screenshot: Buffer;
}
