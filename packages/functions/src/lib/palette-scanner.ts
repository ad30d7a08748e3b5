import { PURE_COLORS } from "imagescheme-shared";
import { colorDistance, colorFromPure, type Color } from "./color";
import type { ImageSource } from "./image-source";
import { pureColorRgb } from "./pure-color";

/**
 * Nearest image pixel for each of the 12 hue anchors, found in a single pass.
 * Ties keep the first pixel in row-major order; alpha is ignored.
 * Anchors with no pixel to compare against come back as the anchor itself.
 */
export function scanPalette(image: ImageSource): Color[] {
  const anchors = PURE_COLORS.map((hue) => pureColorRgb(hue));
  const closest: Color[] = PURE_COLORS.map((hue) => colorFromPure(hue));
  const distances = anchors.map(() => Number.POSITIVE_INFINITY);

  for (const pixel of image.pixels()) {
    const value = { r: pixel.r, g: pixel.g, b: pixel.b };

    for (let i = 0; i < anchors.length; i++) {
      const distance = colorDistance(value, anchors[i]);
      if (distance < distances[i]) {
        distances[i] = distance;
        closest[i] = { hue: PURE_COLORS[i], value, distance };
      }
    }
  }

  return closest;
}
