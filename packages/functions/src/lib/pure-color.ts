import type { PureColor, RGB } from "imagescheme-shared";

export const PURE_COLOR_RGB = {
  red: { r: 255, g: 0, b: 0 },
  yellow: { r: 255, g: 255, b: 0 },
  orange: { r: 255, g: 165, b: 0 },
  green: { r: 0, g: 255, b: 0 },
  cyan: { r: 0, g: 255, b: 255 },
  blue: { r: 0, g: 0, b: 255 },
  purple: { r: 128, g: 0, b: 128 },
  brown: { r: 165, g: 42, b: 42 },
  magenta: { r: 255, g: 0, b: 255 },
  azure: { r: 0, g: 90, b: 255 },
  "spring-green": { r: 127, g: 255, b: 127 },
  "light-cyan": { r: 90, g: 213, b: 213 },
} as const satisfies Record<PureColor, RGB>;

const PURE_COLOR_INVERSE = {
  red: "cyan",
  yellow: "blue",
  orange: "azure",
  green: "magenta",
  cyan: "red",
  blue: "yellow",
  purple: "spring-green",
  brown: "light-cyan",
  magenta: "green",
  azure: "orange",
  "spring-green": "purple",
  "light-cyan": "brown",
} as const satisfies Record<PureColor, PureColor>;

export function pureColorRgb(hue: PureColor): RGB {
  return PURE_COLOR_RGB[hue];
}

/** Complementary anchor; applying it twice returns the original hue. */
export function inversePureColor(hue: PureColor): PureColor {
  return PURE_COLOR_INVERSE[hue];
}
