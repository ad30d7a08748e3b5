import quantize from "quantize";
import type { RGB } from "imagescheme-shared";
import { SchemeError } from "./errors";

export interface QuantizeOptions {
  /** Sample every n-th pixel; 1 reads them all. */
  quality: number;
  maxColors: number;
}

export const DEFAULT_QUANTIZE_OPTIONS: QuantizeOptions = {
  quality: 1,
  maxColors: 15,
};

/**
 * Dominant-color extraction. Implementations must be deterministic for
 * identical input and return colors most dominant first.
 */
export interface Quantizer {
  quantize(rgba: Uint8Array, options: QuantizeOptions): RGB[];
}

const MIN_ALPHA = 125;
const NEAR_WHITE = 250;

export type PixelTuple = [number, number, number];

/** Opaque, non-white pixels, every `quality`-th one. */
export function samplePixels(rgba: Uint8Array, quality: number): PixelTuple[] {
  const step = Math.max(1, Math.floor(quality)) * 4;
  const pixels: PixelTuple[] = [];

  for (let offset = 0; offset + 3 < rgba.length; offset += step) {
    const r = rgba[offset];
    const g = rgba[offset + 1];
    const b = rgba[offset + 2];
    const a = rgba[offset + 3];

    if (a < MIN_ALPHA) continue;
    if (r > NEAR_WHITE && g > NEAR_WHITE && b > NEAR_WHITE) continue;

    pixels.push([r, g, b]);
  }

  return pixels;
}

function distinctPixels(pixels: readonly PixelTuple[]): PixelTuple[] {
  const seen = new Set<number>();
  const distinct: PixelTuple[] = [];
  for (const pixel of pixels) {
    const key = (pixel[0] << 16) | (pixel[1] << 8) | pixel[2];
    if (seen.has(key)) continue;
    seen.add(key);
    distinct.push(pixel);
  }
  return distinct;
}

/**
 * Replace each quantized color with the closest sampled pixel (first one on a
 * tie), dropping repeats. Box averages become colors the image really has.
 */
export function snapToPixels(palette: readonly PixelTuple[], pixels: readonly PixelTuple[]): RGB[] {
  const candidates = distinctPixels(pixels);
  const snapped: RGB[] = [];
  const used = new Set<PixelTuple>();

  for (const [r, g, b] of palette) {
    let best: PixelTuple | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const pixel of candidates) {
      const distance = (pixel[0] - r) ** 2 + (pixel[1] - g) ** 2 + (pixel[2] - b) ** 2;
      if (distance < bestDistance) {
        best = pixel;
        bestDistance = distance;
      }
    }
    if (!best || used.has(best)) continue;
    used.add(best);
    snapped.push({ r: best[0], g: best[1], b: best[2] });
  }

  return snapped;
}

/**
 * Modified median cut quantization (the color-thief approach), with each
 * bucket color snapped to a real pixel.
 */
export const mmcqQuantizer: Quantizer = {
  quantize(rgba, options) {
    const pixels = samplePixels(rgba, options.quality);
    if (pixels.length === 0) {
      throw new SchemeError("NoColors", "Image has no opaque, non-white pixels to quantize");
    }

    const colorMap = quantize(pixels, options.maxColors);
    if (!colorMap) {
      throw new SchemeError("NoColors", "Quantizer returned no colors");
    }

    return snapToPixels(colorMap.palette(), pixels);
  },
};
