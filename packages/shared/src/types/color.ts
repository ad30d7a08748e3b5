export interface RGB {
  r: number;
  g: number;
  b: number;
}

export type PureColor =
  | "red"
  | "yellow"
  | "orange"
  | "green"
  | "cyan"
  | "blue"
  | "purple"
  | "brown"
  | "magenta"
  | "azure"
  | "spring-green"
  | "light-cyan";

/** Anchor order used for scanning and for slot assembly. */
export const PURE_COLORS = [
  "red",
  "yellow",
  "orange",
  "green",
  "cyan",
  "blue",
  "purple",
  "brown",
  "magenta",
  "azure",
  "spring-green",
  "light-cyan",
] as const satisfies readonly PureColor[];

export interface CuratedColor {
  hue: PureColor;
  /** 6-digit uppercase hex, no leading `#`. */
  hex: string;
  /** Squared RGB distance to the hue's canonical anchor. */
  distance: number;
}
