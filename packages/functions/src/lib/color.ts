import type { PureColor, RGB } from "imagescheme-shared";
import { clamp, hslToRgb, rgbToHex, rgbToHsl } from "./color-space";
import { inversePureColor, pureColorRgb } from "./pure-color";

/**
 * An image color tagged with the hue anchor it was matched against.
 * `distance` is always the squared RGB distance from `value` to that anchor.
 */
export interface Color {
  readonly hue: PureColor;
  readonly value: RGB;
  readonly distance: number;
}

/** Squared Euclidean distance in RGB space. Order of the arguments doesn't matter. */
export function colorDistance(a: RGB, b: RGB): number {
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return dr * dr + dg * dg + db * db;
}

export function createColor(hue: PureColor, value: RGB): Color {
  return {
    hue,
    value: { r: value.r, g: value.g, b: value.b },
    distance: colorDistance(pureColorRgb(hue), value),
  };
}

export function colorFromPure(hue: PureColor): Color {
  return { hue, value: { ...pureColorRgb(hue) }, distance: 0 };
}

export function invertColor(color: Color): Color {
  const { r, g, b } = color.value;
  return createColor(inversePureColor(color.hue), { r: 255 - r, g: 255 - g, b: 255 - b });
}

export function colorToHex(color: Color): string {
  return rgbToHex(color.value);
}

/**
 * Scale saturation by `amount²`. The quadratic makes small amounts
 * desaturate far more than a linear scale would.
 */
export function saturateColor(color: Color, amount: number): Color {
  const factor = clamp(amount, 0, 1);
  const hsl = rgbToHsl(color.value);
  return createColor(color.hue, hslToRgb({ ...hsl, s: hsl.s * factor * factor }));
}

export function addLightness(color: Color, delta: number): Color {
  const hsl = rgbToHsl(color.value);
  const l = clamp(hsl.l + clamp(delta, 0, 1), 0, 1);
  return createColor(color.hue, hslToRgb({ ...hsl, l }));
}
