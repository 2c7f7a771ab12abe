import sharp from 'sharp';
import { Bounds } from '@deskpilot/shared';

export interface GreyscaleImage {
  data: Buffer;
  width: number;
  height: number;
}

export interface PixelRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface RegionChange {
  changed: boolean;
  /** Mean absolute difference in grey levels (0-255) */
  difference: number;
  confidence: number;
}

export interface GridChanges {
  changes: Bounds[];
  difference: number;
  confidence: number;
}

export const REGION_PADDING_PX = 8;
export const GRID_SIZE = 4;
/** Largest possible grey-level difference, reported when sizes differ */
export const MAX_DIFFERENCE = 255;

export async function decodeGreyscale(png: Buffer): Promise<GreyscaleImage> {
  const { data, info } = await sharp(png)
    .removeAlpha()
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels === 1) {
    return { data, width: info.width, height: info.height };
  }

  const grey = Buffer.alloc(info.width * info.height);
  for (let i = 0; i < grey.length; i++) {
    grey[i] = data[i * info.channels];
  }
  return { data: grey, width: info.width, height: info.height };
}

/**
 * Pixel rectangle covering normalized `bounds` plus `padding` on each side,
 * clipped to the image.
 */
export function regionAroundBounds(
  bounds: Bounds,
  image: { width: number; height: number },
  padding = REGION_PADDING_PX,
): PixelRegion {
  const left = Math.max(0, Math.floor(bounds.x * image.width) - padding);
  const top = Math.max(0, Math.floor(bounds.y * image.height) - padding);
  const right = Math.min(
    image.width,
    Math.ceil((bounds.x + bounds.width) * image.width) + padding,
  );
  const bottom = Math.min(
    image.height,
    Math.ceil((bounds.y + bounds.height) * image.height) + padding,
  );
  return {
    left,
    top,
    width: Math.max(0, right - left),
    height: Math.max(0, bottom - top),
  };
}

export function meanAbsoluteDifference(
  a: GreyscaleImage,
  b: GreyscaleImage,
  region: PixelRegion,
): number {
  const count = region.width * region.height;
  if (count === 0) {
    return 0;
  }

  let sum = 0;
  for (let y = region.top; y < region.top + region.height; y++) {
    const row = y * a.width;
    for (let x = region.left; x < region.left + region.width; x++) {
      sum += Math.abs(a.data[row + x] - b.data[row + x]);
    }
  }
  return sum / count;
}

export function changeConfidence(difference: number, threshold: number): number {
  return Math.min(1, Math.max(0, difference / threshold));
}

function sameSize(a: GreyscaleImage, b: GreyscaleImage): boolean {
  return a.width === b.width && a.height === b.height;
}

/**
 * Compares the padded area around `bounds`. Images of different sizes are
 * treated as fully changed.
 */
export function detectRegionChange(
  before: GreyscaleImage,
  after: GreyscaleImage,
  bounds: Bounds,
  threshold: number,
): RegionChange {
  if (!sameSize(before, after)) {
    return { changed: true, difference: MAX_DIFFERENCE, confidence: 1 };
  }

  const difference = meanAbsoluteDifference(
    before,
    after,
    regionAroundBounds(bounds, before),
  );
  return {
    changed: difference > threshold,
    difference,
    confidence: changeConfidence(difference, threshold),
  };
}

/**
 * Splits the screen into a GRID_SIZE x GRID_SIZE grid and reports every cell
 * whose difference exceeds `threshold`, as normalized bounds.
 */
export function detectGridChanges(
  before: GreyscaleImage,
  after: GreyscaleImage,
  threshold: number,
  gridSize = GRID_SIZE,
): GridChanges {
  if (!sameSize(before, after)) {
    return {
      changes: [{ x: 0, y: 0, width: 1, height: 1 }],
      difference: MAX_DIFFERENCE,
      confidence: 1,
    };
  }

  const { width, height } = before;
  const changes: Bounds[] = [];
  let maxDifference = 0;

  for (let row = 0; row < gridSize; row++) {
    const top = Math.floor((row * height) / gridSize);
    const bottom = Math.floor(((row + 1) * height) / gridSize);
    for (let column = 0; column < gridSize; column++) {
      const left = Math.floor((column * width) / gridSize);
      const right = Math.floor(((column + 1) * width) / gridSize);
      const region = { left, top, width: right - left, height: bottom - top };

      const difference = meanAbsoluteDifference(before, after, region);
      maxDifference = Math.max(maxDifference, difference);
      if (difference > threshold) {
        changes.push({
          x: left / width,
          y: top / height,
          width: region.width / width,
          height: region.height / height,
        });
      }
    }
  }

  return {
    changes,
    difference: maxDifference,
    confidence: changeConfidence(maxDifference, threshold),
  };
}
