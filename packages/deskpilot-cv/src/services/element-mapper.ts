import {
  Dimensions,
  PerceptionMalformedError,
  UIElement,
  createUIElement,
} from '@deskpilot/shared';
import { OmniParserElement } from '../types/omniparser.types';

/** Normalized overhang accepted (and clamped) at the image edges */
export const BOUNDS_TOLERANCE = 0.001;

export interface MapDetectionsOptions {
  /** Detections narrower or shorter than this many pixels are dropped */
  minElementPx: number;
  tolerance?: number;
}

export interface MappedDetections {
  elements: UIElement[];
  skipped: number;
}

/**
 * Converts OmniParser detections into UIElements with normalized bounds.
 * Ids follow detection order from 0 and stay dense after filtering.
 */
export function mapDetections(
  detections: readonly OmniParserElement[],
  imageSize: Dimensions,
  options: MapDetectionsOptions,
): MappedDetections {
  if (!(imageSize.width > 0 && imageSize.height > 0)) {
    throw new PerceptionMalformedError(
      `Cannot normalize detections against a ${imageSize.width}x${imageSize.height} image`,
    );
  }

  const tolerance = options.tolerance ?? BOUNDS_TOLERANCE;
  const elements: UIElement[] = [];
  let skipped = 0;

  for (const [index, detection] of detections.entries()) {
    const [left, top, width, height] = detection.bbox;
    if (width <= 0 || height <= 0) {
      throw new PerceptionMalformedError(
        `Detection ${index} has a non-positive size (${width}x${height})`,
      );
    }
    if (width < options.minElementPx || height < options.minElementPx) {
      skipped += 1;
      continue;
    }

    const x = left / imageSize.width;
    const y = top / imageSize.height;
    const w = width / imageSize.width;
    const h = height / imageSize.height;

    if (
      x < -tolerance ||
      y < -tolerance ||
      x + w > 1 + tolerance ||
      y + h > 1 + tolerance
    ) {
      throw new PerceptionMalformedError(
        `Detection ${index} lies outside the ${imageSize.width}x${imageSize.height} image`,
      );
    }

    const [clampedX, clampedWidth] = clampSpan(x, w);
    const [clampedY, clampedHeight] = clampSpan(y, h);

    elements.push(
      createUIElement({
        id: elements.length,
        type: normalizeElementType(detection.type),
        content: normalizeContent(detection.content || detection.caption || ''),
        bounds: {
          x: clampedX,
          y: clampedY,
          width: clampedWidth,
          height: clampedHeight,
        },
        confidence: detection.confidence ?? 0,
        attributes: detectionAttributes(detection),
      }),
    );
  }

  return { elements, skipped };
}

export function normalizeElementType(type: string): string {
  return type.trim().toLowerCase().replace(/[\s-]+/g, '_') || 'unknown';
}

function normalizeContent(content: string): string {
  return content.replace(/\s+/g, ' ').trim();
}

function clampSpan(start: number, span: number): [number, number] {
  let clampedStart = start;
  let clampedSpan = span;
  if (clampedStart < 0) {
    clampedSpan += clampedStart;
    clampedStart = 0;
  }
  if (clampedStart + clampedSpan > 1) {
    clampedSpan = 1 - clampedStart;
  }
  return [clampedStart, clampedSpan];
}

function detectionAttributes(
  detection: OmniParserElement,
): Record<string, unknown> {
  const attributes: Record<string, unknown> = {};
  if (detection.interactable !== undefined) {
    attributes.interactable = detection.interactable;
  }
  if (detection.source) {
    attributes.source = detection.source;
  }
  return attributes;
}
