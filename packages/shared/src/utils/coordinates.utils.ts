import { Bounds, Dimensions, Point, UIElement } from "../types/uiElement.types";

const EPSILON = 1e-9;

export function boundsCenter(bounds: Bounds): Point {
  return {
    x: bounds.x + bounds.width / 2,
    y: bounds.y + bounds.height / 2,
  };
}

/**
 * Maps a normalized point onto pixel space. No rounding is applied here;
 * callers decide when to snap to integers.
 */
export function denormalizePoint(point: Point, dimensions: Dimensions): Point {
  return {
    x: point.x * dimensions.width,
    y: point.y * dimensions.height,
  };
}

export function isNormalizedPoint(value: unknown): value is Point {
  if (!value || typeof value !== "object" || !("x" in value) || !("y" in value)) {
    return false;
  }
  const { x, y } = value;
  return (
    typeof x === "number" &&
    typeof y === "number" &&
    Number.isFinite(x) &&
    Number.isFinite(y)
  );
}

/**
 * Point an element should be clicked at: its `clickPoint` attribute when
 * one is present, otherwise the center of its bounds.
 */
export function elementTargetPoint(element: UIElement): Point {
  const clickPoint = element.attributes.clickPoint;
  if (isNormalizedPoint(clickPoint)) {
    return { x: clickPoint.x, y: clickPoint.y };
  }
  return boundsCenter(element.bounds);
}

/**
 * Converts screenshot pixels to the logical coordinates the input layer
 * expects on scaled (HiDPI) displays.
 */
export function toLogicalPixels(point: Point, scalingFactor: number): Point {
  const factor =
    Number.isFinite(scalingFactor) && scalingFactor > 0 ? scalingFactor : 1;
  return {
    x: Math.round(point.x / factor),
    y: Math.round(point.y / factor),
  };
}

export function isWithinScreen(point: Point, dimensions: Dimensions): boolean {
  return (
    point.x >= 0 &&
    point.y >= 0 &&
    point.x < dimensions.width &&
    point.y < dimensions.height
  );
}

export function isNormalizedBounds(bounds: Bounds): boolean {
  const values = [bounds.x, bounds.y, bounds.width, bounds.height];
  if (!values.every((value) => Number.isFinite(value) && value >= 0)) {
    return false;
  }
  return (
    bounds.x + bounds.width <= 1 + EPSILON &&
    bounds.y + bounds.height <= 1 + EPSILON
  );
}
