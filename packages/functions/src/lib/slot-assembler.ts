import {
  NEUTRAL_SLOTS,
  type PureColor,
  type RGB,
  type SchemeSlot,
  type SchemeSystem,
} from "imagescheme-shared";
import { addLightness, colorToHex, saturateColor, type Color } from "./color";
import { clamp, rgbToHex, rgbToHsl } from "./color-space";
import { SchemeError } from "./errors";

export const GRADIENT_STEPS = NEUTRAL_SLOTS.length;

/** Combined saturation+lightness score above which accents get no boost. */
export const VISIBILITY_THRESHOLD = 0.7;

/** Desaturation applied to the base24 companion accents. */
export const MUTED_SATURATION = 0.7;

const SATURATION_WEIGHT = 0.5;
const LIGHTNESS_WEIGHT = 1.0;

export const ACCENT_SLOTS: Partial<Record<PureColor, SchemeSlot>> = {
  red: "base08",
  orange: "base09",
  yellow: "base0A",
  green: "base0B",
  cyan: "base0C",
  blue: "base0D",
  purple: "base0E",
  brown: "base0F",
};

export const MUTED_ACCENT_SLOTS: Partial<Record<PureColor, SchemeSlot>> = {
  red: "base10",
  orange: "base11",
  yellow: "base12",
  green: "base13",
  cyan: "base14",
  blue: "base15",
  purple: "base16",
  brown: "base17",
};

const HEX_PATTERN = /^[0-9A-F]{6}$/;

/**
 * Ordered slot → hex mapping where the first write to a slot wins.
 */
export class SlotMap {
  private readonly slots = new Map<SchemeSlot, string>();

  /** Returns false (and changes nothing) when the slot is already filled. */
  insertIfAbsent(slot: SchemeSlot, hex: string): boolean {
    if (!HEX_PATTERN.test(hex)) {
      throw new SchemeError("GenerateColors", `Invalid hex color "${hex}" for ${slot}`);
    }
    if (this.slots.has(slot)) {
      return false;
    }
    this.slots.set(slot, hex);
    return true;
  }

  has(slot: SchemeSlot): boolean {
    return this.slots.has(slot);
  }

  get(slot: SchemeSlot): string | undefined {
    return this.slots.get(slot);
  }

  get size(): number {
    return this.slots.size;
  }

  toRecord(): Partial<Record<SchemeSlot, string>> {
    const record: Partial<Record<SchemeSlot, string>> = {};
    for (const [slot, hex] of this.slots) {
      record[slot] = hex;
    }
    return record;
  }
}

/** Linear blend; channels are truncated toward zero. */
export function interpolateColor(start: RGB, end: RGB, t: number): RGB {
  return {
    r: Math.trunc(start.r + t * (end.r - start.r)),
    g: Math.trunc(start.g + t * (end.g - start.g)),
    b: Math.trunc(start.b + t * (end.b - start.b)),
  };
}

/** Evenly spaced steps from `darkest` (step 0) to `lightest` (last step). */
export function generateGradient(darkest: RGB, lightest: RGB, steps: number = GRADIENT_STEPS): RGB[] {
  if (steps <= 1) {
    return [{ ...darkest }];
  }
  return Array.from({ length: steps }, (_, i) => interpolateColor(darkest, lightest, i / (steps - 1)));
}

/**
 * Lightness to add so dim or washed-out accents stay visible, capped at 0.5.
 */
export function lightnessBoost(color: Color, threshold: number = VISIBILITY_THRESHOLD): number {
  const { s, l } = rgbToHsl(color.value);
  const visibility = SATURATION_WEIGHT * s + LIGHTNESS_WEIGHT * l;
  return clamp((threshold - visibility) / LIGHTNESS_WEIGHT, 0, 1) / 2;
}

export function assembleSlots(
  background: RGB,
  foreground: RGB,
  palette: readonly Color[],
  system: SchemeSystem
): SlotMap {
  const slots = new SlotMap();

  generateGradient(background, foreground).forEach((rgb, index) => {
    slots.insertIfAbsent(NEUTRAL_SLOTS[index], rgbToHex(rgb));
  });

  for (const color of palette) {
    const boosted = addLightness(color, lightnessBoost(color));

    const accentSlot = ACCENT_SLOTS[color.hue];
    if (accentSlot) {
      slots.insertIfAbsent(accentSlot, colorToHex(boosted));
    }

    if (system === "base24") {
      const mutedSlot = MUTED_ACCENT_SLOTS[color.hue];
      if (mutedSlot) {
        slots.insertIfAbsent(mutedSlot, colorToHex(saturateColor(boosted, MUTED_SATURATION)));
      }
    }
  }

  return slots;
}
