import {
  boundsCenter,
  denormalizePoint,
  elementTargetPoint,
  isNormalizedBounds,
  isWithinScreen,
  toLogicalPixels,
} from "./coordinates.utils";
import { createUIElement } from "./uiElement.utils";

describe("coordinates utils", () => {
  describe("boundsCenter + denormalizePoint", () => {
    it("maps the center of normalized bounds to (x + w/2)·W, (y + h/2)·H", () => {
      const bounds = { x: 0.4, y: 0.5, width: 0.2, height: 0.1 };

      const point = denormalizePoint(boundsCenter(bounds), {
        width: 1920,
        height: 1080,
      });

      expect(point.x).toBe((0.4 + 0.2 / 2) * 1920);
      expect(point.y).toBe((0.5 + 0.1 / 2) * 1080);
    });

    it("maps a full-screen box to the screen center", () => {
      const point = denormalizePoint(
        boundsCenter({ x: 0, y: 0, width: 1, height: 1 }),
        { width: 800, height: 600 },
      );

      expect(point).toEqual({ x: 400, y: 300 });
    });
  });

  describe("elementTargetPoint", () => {
    it("uses the bounds center by default", () => {
      const element = createUIElement({
        id: 0,
        type: "button",
        content: "OK",
        bounds: { x: 0.5, y: 0.5, width: 0.25, height: 0.5 },
        confidence: 0.9,
      });

      expect(elementTargetPoint(element)).toEqual({ x: 0.625, y: 0.75 });
    });

    it("prefers a clickPoint attribute", () => {
      const element = createUIElement({
        id: 0,
        type: "checkbox",
        content: "Remember me",
        bounds: { x: 0.1, y: 0.1, width: 0.4, height: 0.1 },
        confidence: 0.9,
        attributes: { clickPoint: { x: 0.11, y: 0.15 } },
      });

      expect(elementTargetPoint(element)).toEqual({ x: 0.11, y: 0.15 });
    });

    it("ignores a clickPoint attribute that is not a point", () => {
      const element = createUIElement({
        id: 0,
        type: "link",
        content: "Docs",
        bounds: { x: 0, y: 0, width: 0.5, height: 0.5 },
        confidence: 0.5,
        attributes: { clickPoint: "top-left" },
      });

      expect(elementTargetPoint(element)).toEqual({ x: 0.25, y: 0.25 });
    });
  });

  describe("toLogicalPixels", () => {
    it("divides by the scaling factor and rounds", () => {
      expect(toLogicalPixels({ x: 1000, y: 441 }, 2)).toEqual({
        x: 500,
        y: 221,
      });
    });

    it("treats a non-positive factor as 1", () => {
      expect(toLogicalPixels({ x: 10.4, y: 20.6 }, 0)).toEqual({
        x: 10,
        y: 21,
      });
    });
  });

  it("isWithinScreen excludes the right and bottom edges", () => {
    const screen = { width: 100, height: 50 };

    expect(isWithinScreen({ x: 99.9, y: 49.9 }, screen)).toBe(true);
    expect(isWithinScreen({ x: 100, y: 10 }, screen)).toBe(false);
    expect(isWithinScreen({ x: 10, y: -1 }, screen)).toBe(false);
  });

  it("isNormalizedBounds rejects boxes that leave the unit square", () => {
    expect(isNormalizedBounds({ x: 0.4, y: 0.5, width: 0.2, height: 0.1 })).toBe(
      true,
    );
    expect(isNormalizedBounds({ x: 0.9, y: 0, width: 0.2, height: 0.1 })).toBe(
      false,
    );
    expect(isNormalizedBounds({ x: -0.1, y: 0, width: 0.2, height: 0.1 })).toBe(
      false,
    );
  });
});
