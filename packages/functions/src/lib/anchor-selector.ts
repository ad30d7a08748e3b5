import type { SchemeVariant } from "imagescheme-shared";
import {
  unitToHsl,
  unitToYxy,
  hslToUnit,
  yxyToUnit,
  type UnitRGB,
} from "./color-space";
import { SchemeError } from "./errors";
import type { SchemeLogger } from "./scheme-logger";

/** Inclusive luminance/saturation window; missing bounds are open. */
export interface ColorPass {
  description: string;
  minLuma?: number;
  maxLuma?: number;
  minSaturation?: number;
  maxSaturation?: number;
}

export interface AnchorSelection {
  color: UnitRGB;
  /** 1-based; `passes.length + 1` means the dominant-color fallback was used. */
  pass: number;
  description: string;
}

export interface SaturationLuma {
  saturation: number;
  luma: number;
}

export const LIGHT_PASSES: readonly ColorPass[] = [
  { description: "light with low saturation", minLuma: 0.6, maxSaturation: 0.4 },
  { description: "very bright, saturated allowed", minLuma: 0.7, maxSaturation: 0.85 },
  { description: "light with low saturation, more permissive", minLuma: 0.5, maxSaturation: 0.5 },
  { description: "light, saturated allowed", minLuma: 0.6, maxSaturation: 0.85 },
  { description: "darker but unsaturated", minLuma: 0.32, maxSaturation: 0.4 },
  { description: "medium, any saturation", minLuma: 0.4 },
  { description: "darker, any saturation", minLuma: 0.3 },
];

export const DARK_PASSES: readonly ColorPass[] = [
  {
    description: "dark with a bit of color",
    minLuma: 0.012,
    maxLuma: 0.1,
    minSaturation: 0.18,
    maxSaturation: 0.9,
  },
  { description: "dark but not very dark, any saturation", minLuma: 0.012, maxLuma: 0.1 },
  { description: "dark, any saturation", maxLuma: 0.1 },
];

const FALLBACK_DESCRIPTION = "most dominant color";

export function saturationLuma(color: UnitRGB): SaturationLuma {
  return {
    saturation: unitToHsl(color).s,
    luma: unitToYxy(color).Y,
  };
}

function within(value: number, min?: number, max?: number): boolean {
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

export function colorPass(colors: readonly UnitRGB[], pass: ColorPass): UnitRGB | undefined {
  return colors.find((color) => {
    const { saturation, luma } = saturationLuma(color);
    return (
      within(luma, pass.minLuma, pass.maxLuma) &&
      within(saturation, pass.minSaturation, pass.maxSaturation)
    );
  });
}

/**
 * Run `passes` in order and return the first match of the first pass that has
 * one, falling back to the most dominant color.
 */
export function selectAnchor(
  colors: readonly UnitRGB[],
  passes: readonly ColorPass[],
  label: string,
  logger?: SchemeLogger
): AnchorSelection {
  for (let i = 0; i < passes.length; i++) {
    const color = colorPass(colors, passes[i]);
    if (color) {
      logger?.debug(`[anchor-selector] ${label} anchor found`, {
        pass: i + 1,
        description: passes[i].description,
      });
      return { color, pass: i + 1, description: passes[i].description };
    }
  }

  const [fallback] = colors;
  if (!fallback) {
    throw new SchemeError("NoColors", "Failed to find colors on image");
  }

  logger?.debug(`[anchor-selector] ${label} anchor fell back to dominant color`, {
    pass: passes.length + 1,
  });
  return { color: fallback, pass: passes.length + 1, description: FALLBACK_DESCRIPTION };
}

export function selectLightAnchor(colors: readonly UnitRGB[], logger?: SchemeLogger): AnchorSelection {
  return selectAnchor(colors, LIGHT_PASSES, "light", logger);
}

export function selectDarkAnchor(colors: readonly UnitRGB[], logger?: SchemeLogger): AnchorSelection {
  return selectAnchor(colors, DARK_PASSES, "dark", logger);
}

// ── Variant fixup ────────────────────────────────────────────

interface LumaBound {
  kind: "floor" | "ceiling";
  value: number;
}

interface ColorBounds {
  luma: LumaBound;
  maxSaturation: number;
  /** Saturation set when `maxSaturation` is exceeded; defaults to `maxSaturation`. */
  saturationTarget?: number;
}

interface VariantBounds {
  background: ColorBounds;
  foreground: ColorBounds;
}

export const VARIANT_BOUNDS: Record<SchemeVariant, VariantBounds> = {
  dark: {
    background: { luma: { kind: "ceiling", value: 0.02 }, maxSaturation: 0.6 },
    foreground: { luma: { kind: "floor", value: 0.6 }, maxSaturation: 0.15 },
  },
  light: {
    background: { luma: { kind: "floor", value: 0.75 }, maxSaturation: 0.12, saturationTarget: 0.15 },
    foreground: { luma: { kind: "ceiling", value: 0.015 }, maxSaturation: 0.65 },
  },
};

function setLuma(color: UnitRGB, luma: number): UnitRGB {
  const yxy = unitToYxy(color);
  return yxyToUnit({ ...yxy, Y: luma });
}

function setSaturation(color: UnitRGB, saturation: number): UnitRGB {
  const hsl = unitToHsl(color);
  return hslToUnit({ ...hsl, s: saturation });
}

/**
 * Push `color` onto the edge of its bounds. The checks use the original
 * color's luma and saturation; luma moves along Y keeping the chromaticity,
 * saturation moves to its target keeping hue and lightness.
 */
export function clampToBounds(color: UnitRGB, bounds: ColorBounds): UnitRGB {
  const { saturation, luma } = saturationLuma(color);
  let result = color;

  const lumaOutside =
    bounds.luma.kind === "floor" ? luma < bounds.luma.value : luma > bounds.luma.value;
  if (lumaOutside) {
    result = setLuma(result, bounds.luma.value);
  }

  if (saturation > bounds.maxSaturation) {
    result = setSaturation(result, bounds.saturationTarget ?? bounds.maxSaturation);
  }

  return result;
}

export interface BackgroundForeground {
  background: UnitRGB;
  foreground: UnitRGB;
}

/**
 * Assign the dark and light anchors to background/foreground for `variant`
 * and clamp each into that variant's contrast box.
 */
export function fixColors(dark: UnitRGB, light: UnitRGB, variant: SchemeVariant): BackgroundForeground {
  const bounds = VARIANT_BOUNDS[variant];
  const [background, foreground] = variant === "dark" ? [dark, light] : [light, dark];

  return {
    background: clampToBounds(background, bounds.background),
    foreground: clampToBounds(foreground, bounds.foreground),
  };
}
