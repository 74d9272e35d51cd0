import type { Size } from "./blocks.js";

/** PDF user-space units (points) per centimetre. */
export const POINTS_PER_CM = 72 / 2.54;

export function cm(value: number): number {
  return value * POINTS_PER_CM;
}

/** Bounding box every report photo is scaled into. */
export const PHOTO_BOX: Size = { width: cm(8), height: cm(6) };

/**
 * Largest size with the image's aspect ratio that fits `box`. Images wider
 * than the box take its full width; all others take its full height.
 */
export function fitWithin(width: number, height: number, box: Size = PHOTO_BOX): Size {
  if (!(width > 0 && height > 0)) {
    throw new Error(`Image dimensions must be positive, got ${width}x${height}`);
  }

  if (width / height > box.width / box.height) {
    return { width: box.width, height: (box.width * height) / width };
  }
  return { width: (box.height * width) / height, height: box.height };
}
