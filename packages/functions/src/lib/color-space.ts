import type { RGB } from "imagescheme-shared";

// ── Types ────────────────────────────────────────────────────

/** RGB with channels in 0-1; may sit outside the gamut between conversions. */
export interface UnitRGB {
  r: number;
  g: number;
  b: number;
}

export interface HSL {
  h: number; // 0-360
  s: number; // 0-1
  l: number; // 0-1
}

export interface XYZ {
  X: number;
  Y: number;
  Z: number;
}

/** CIE xyY: chromaticity (x, y) plus luminance Y. */
export interface Yxy {
  x: number;
  y: number;
  Y: number;
}

// D65 white point chromaticity, used for colors with no chroma to speak of
const WHITE_X = 0.31271;
const WHITE_Y = 0.32902;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// ── Bytes ↔ unit / hex ───────────────────────────────────────

export function toUnit({ r, g, b }: RGB): UnitRGB {
  return { r: r / 255, g: g / 255, b: b / 255 };
}

export function toBytes({ r, g, b }: UnitRGB): RGB {
  const toByte = (n: number) => clamp(Math.round(n * 255), 0, 255);
  return { r: toByte(r), g: toByte(g), b: toByte(b) };
}

/** Truncating conversion, as an integer cast would do it. NaN becomes 0. */
export function truncateToBytes({ r, g, b }: UnitRGB): RGB {
  const toByte = (n: number) => (Number.isNaN(n) ? 0 : clamp(Math.trunc(n * 255), 0, 255));
  return { r: toByte(r), g: toByte(g), b: toByte(b) };
}

export function rgbToHex({ r, g, b }: RGB): string {
  const toHex = (n: number) =>
    clamp(Math.round(n), 0, 255)
      .toString(16)
      .padStart(2, "0");
  return `${toHex(r)}${toHex(g)}${toHex(b)}`.toUpperCase();
}

// ── HSL ↔ RGB ────────────────────────────────────────────────

export function hslToUnit({ h, s, l }: HSL): UnitRGB {
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = l - c / 2;

  let r1 = 0,
    g1 = 0,
    b1 = 0;
  if (h < 60) [r1, g1, b1] = [c, x, 0];
  else if (h < 120) [r1, g1, b1] = [x, c, 0];
  else if (h < 180) [r1, g1, b1] = [0, c, x];
  else if (h < 240) [r1, g1, b1] = [0, x, c];
  else if (h < 300) [r1, g1, b1] = [x, 0, c];
  else [r1, g1, b1] = [c, 0, x];

  return { r: r1 + m, g: g1 + m, b: b1 + m };
}

export function unitToHsl({ r, g, b }: UnitRGB): HSL {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const d = max - min;
  const l = (max + min) / 2;

  if (d === 0) return { h: 0, s: 0, l };

  const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
  let h = 0;
  if (max === r) h = ((g - b) / d + (g < b ? 6 : 0)) * 60;
  else if (max === g) h = ((b - r) / d + 2) * 60;
  else h = ((r - g) / d + 4) * 60;

  return { h, s, l };
}

export function rgbToHsl(rgb: RGB): HSL {
  return unitToHsl(toUnit(rgb));
}

/** Channels are truncated, so a round trip through HSL can lose a unit. */
export function hslToRgb(hsl: HSL): RGB {
  return truncateToBytes(hslToUnit(hsl));
}

// ── sRGB ↔ XYZ ↔ Yxy ─────────────────────────────────────────

function linearize(c: number): number {
  return c <= 0.04045 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
}

function delinearize(c: number): number {
  return c <= 0.0031308 ? c * 12.92 : 1.055 * Math.pow(c, 1 / 2.4) - 0.055;
}

export function unitToXyz({ r, g, b }: UnitRGB): XYZ {
  const lr = linearize(r);
  const lg = linearize(g);
  const lb = linearize(b);

  return {
    X: 0.4124564 * lr + 0.3575761 * lg + 0.1804375 * lb,
    Y: 0.2126729 * lr + 0.7151522 * lg + 0.072175 * lb,
    Z: 0.0193339 * lr + 0.119192 * lg + 0.9503041 * lb,
  };
}

export function xyzToUnit({ X, Y, Z }: XYZ): UnitRGB {
  const lr = 3.2404542 * X - 1.5371385 * Y - 0.4985314 * Z;
  const lg = -0.969266 * X + 1.8760108 * Y + 0.041556 * Z;
  const lb = 0.0556434 * X - 0.2040259 * Y + 1.0572252 * Z;

  return { r: delinearize(lr), g: delinearize(lg), b: delinearize(lb) };
}

export function xyzToYxy({ X, Y, Z }: XYZ): Yxy {
  const sum = X + Y + Z;
  if (sum <= 0) return { x: WHITE_X, y: WHITE_Y, Y };
  return { x: X / sum, y: Y / sum, Y };
}

export function yxyToXyz({ x, y, Y }: Yxy): XYZ {
  if (y === 0) return { X: 0, Y: 0, Z: 0 };
  return {
    X: (x * Y) / y,
    Y,
    Z: ((1 - x - y) * Y) / y,
  };
}

export function unitToYxy(unit: UnitRGB): Yxy {
  return xyzToYxy(unitToXyz(unit));
}

export function yxyToUnit(yxy: Yxy): UnitRGB {
  return xyzToUnit(yxyToXyz(yxy));
}
