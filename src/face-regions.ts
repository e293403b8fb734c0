// Face region helpers: picking the classification target, padding it into a
// crop rectangle, and drawing the overlay that shows every detected region.

import type { BoundingRegion } from "./types.js";
import { cloneImage, type ImageBuffer, type PixelRect } from "./image-buffer.js";

/** Padding in pixels added on every side of the selected face before cropping. */
export const FACE_CROP_PADDING = 20;

const OUTLINE_COLOR = [0, 255, 0, 255] as const;
const OUTLINE_THICKNESS = 2;

function area(region: BoundingRegion): number {
  if (!Number.isFinite(region.width) || !Number.isFinite(region.height)) return 0;
  return Math.max(0, region.width) * Math.max(0, region.height);
}

/**
 * Returns the region with the largest area. On equal area the region that
 * appears first in the locator's output wins. Null for an empty list.
 */
export function selectLargestRegion(regions: readonly BoundingRegion[]): BoundingRegion | null {
  let best: BoundingRegion | null = null;
  let bestArea = -1;
  for (const region of regions) {
    const a = area(region);
    if (a > bestArea) {
      best = region;
      bestArea = a;
    }
  }
  return best;
}

/**
 * Expands a region by `padding` on each side and clamps it to the frame.
 * Returns null when the clamped rectangle has no positive width or height.
 */
export function paddedCropRect(
  region: BoundingRegion,
  frameWidth: number,
  frameHeight: number,
  padding: number = FACE_CROP_PADDING,
): PixelRect | null {
  const { x, y, width, height } = region;
  if (![x, y, width, height].every(Number.isFinite)) return null;

  const left = Math.max(0, Math.floor(x - padding));
  const top = Math.max(0, Math.floor(y - padding));
  const right = Math.min(frameWidth, Math.ceil(x + width + padding));
  const bottom = Math.min(frameHeight, Math.ceil(y + height + padding));

  const cropWidth = right - left;
  const cropHeight = bottom - top;
  if (cropWidth <= 0 || cropHeight <= 0) return null;

  return { left, top, width: cropWidth, height: cropHeight };
}

function paintPixel(data: Uint8ClampedArray, frameWidth: number, px: number, py: number): void {
  const offset = (py * frameWidth + px) * 4;
  data[offset] = OUTLINE_COLOR[0];
  data[offset + 1] = OUTLINE_COLOR[1];
  data[offset + 2] = OUTLINE_COLOR[2];
  data[offset + 3] = OUTLINE_COLOR[3];
}

function outlineRegion(image: ImageBuffer, region: BoundingRegion): void {
  const rect = paddedCropRect(region, image.width, image.height, 0);
  if (!rect) return;

  const data = image.data;
  const right = rect.left + rect.width - 1;
  const bottom = rect.top + rect.height - 1;

  for (let t = 0; t < OUTLINE_THICKNESS; t++) {
    const topRow = Math.min(rect.top + t, bottom);
    const bottomRow = Math.max(bottom - t, rect.top);
    for (let px = rect.left; px <= right; px++) {
      paintPixel(data, image.width, px, topRow);
      paintPixel(data, image.width, px, bottomRow);
    }
    const leftCol = Math.min(rect.left + t, right);
    const rightCol = Math.max(right - t, rect.left);
    for (let py = rect.top; py <= bottom; py++) {
      paintPixel(data, image.width, leftCol, py);
      paintPixel(data, image.width, rightCol, py);
    }
  }
}

/** New buffer: a copy of `frame` with every region outlined in green. */
export function annotateRegions(frame: ImageBuffer, regions: readonly BoundingRegion[]): ImageBuffer {
  const overlay = cloneImage(frame, "visualization");
  try {
    for (const region of regions) {
      outlineRegion(overlay, region);
    }
  } catch (err) {
    overlay.release();
    throw err;
  }
  return overlay;
}
