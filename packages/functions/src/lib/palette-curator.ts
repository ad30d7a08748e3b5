import type { RGB } from "imagescheme-shared";
import { createColor, invertColor, type Color } from "./color";
import { SchemeError } from "./errors";

/**
 * Squared RGB distance (~100 units per channel) separating a usable match
 * from a poor one. Calibration constant; keep as is.
 */
export const CURATION_THRESHOLD = 10_000;

/**
 * Pick, per hue, between the directly scanned color and the inverted scan of
 * its complementary hue (which `invertColor` tags back to this hue).
 *
 * The direct color survives only when it is beyond the threshold and still
 * closer than the inverted candidate; every other case takes the inverse.
 */
export function curateWithInverse(palette: readonly Color[], inversePalette: readonly Color[]): Color[] {
  return palette.map((color) => {
    const inverse = inversePalette.find((candidate) => candidate.hue === color.hue);
    if (!inverse) {
      return color;
    }
    return color.distance > CURATION_THRESHOLD && color.distance < inverse.distance ? color : inverse;
  });
}

function closestSlotMatch(palette: readonly Color[], rgb: RGB): Color | null {
  let best: Color | null = null;
  for (const slot of palette) {
    const attempt = createColor(slot.hue, rgb);
    if (attempt.distance >= CURATION_THRESHOLD) continue;
    if (!best || attempt.distance < best.distance) {
      best = attempt;
    }
  }
  return best;
}

/**
 * Replace palette entries with real dominant colors where one lands within
 * the threshold of the slot's anchor. Each dominant color claims at most one
 * hue (its closest); a hue keeps the closest dominant color that claimed it.
 * Unclaimed hues keep their current entry, so applying this twice with the
 * same dominant colors changes nothing.
 */
export function reconcileWithDominant(palette: readonly Color[], dominant: readonly RGB[]): Color[] {
  const claimed = new Map<Color["hue"], Color>();

  for (const rgb of dominant) {
    const match = closestSlotMatch(palette, rgb);
    if (!match) continue;

    const current = claimed.get(match.hue);
    if (!current || match.distance < current.distance) {
      claimed.set(match.hue, match);
    }
  }

  return palette.map((color) => claimed.get(color.hue) ?? color);
}

/**
 * Full curation: scanned palette → inverse curation → dominant reconciliation.
 */
export function curatePalette(scanned: readonly Color[], dominant: readonly RGB[]): Color[] {
  if (dominant.length === 0) {
    throw new SchemeError("NoColors", "Failed to find colors on image");
  }

  const inverse = scanned.map((color) => invertColor(color));
  const curated = curateWithInverse(scanned, inverse);
  return reconcileWithDominant(curated, dominant);
}
