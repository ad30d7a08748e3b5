import type { CuratedColor } from "./color";

export type SchemeSystem = "base16" | "base24";

export type SchemeVariant = "dark" | "light";

export const SCHEME_SYSTEMS: readonly SchemeSystem[] = ["base16", "base24"];
export const SCHEME_VARIANTS: readonly SchemeVariant[] = ["dark", "light"];

export function isSchemeSystem(value: string): value is SchemeSystem {
  return SCHEME_SYSTEMS.some((system) => system === value);
}

export function isSchemeVariant(value: string): value is SchemeVariant {
  return SCHEME_VARIANTS.some((variant) => variant === value);
}

export type SchemeSlot =
  | "base00"
  | "base01"
  | "base02"
  | "base03"
  | "base04"
  | "base05"
  | "base06"
  | "base07"
  | "base08"
  | "base09"
  | "base0A"
  | "base0B"
  | "base0C"
  | "base0D"
  | "base0E"
  | "base0F"
  | "base10"
  | "base11"
  | "base12"
  | "base13"
  | "base14"
  | "base15"
  | "base16"
  | "base17";

/** Neutral ramp slots, darkest end of the gradient first. */
export const NEUTRAL_SLOTS = [
  "base00",
  "base01",
  "base02",
  "base03",
  "base04",
  "base05",
  "base06",
  "base07",
] as const satisfies readonly SchemeSlot[];

export interface Scheme {
  author: string;
  description?: string;
  name: string;
  slug: string;
  system: SchemeSystem;
  variant: SchemeVariant;
  /** Slot name → 6-digit uppercase hex (no `#`). */
  palette: Partial<Record<SchemeSlot, string>>;
}

export interface SchemeAnchor {
  hex: string;
  /** 1-based search pass that produced the anchor; the last value is the dominant-color fallback. */
  pass: number;
  description: string;
}

export interface SchemeAnchors {
  light: SchemeAnchor;
  dark: SchemeAnchor;
  background: string;
  foreground: string;
}

export interface SchemeCreateResponse {
  scheme: Scheme;
  palette: CuratedColor[];
  anchors: SchemeAnchors;
}

export type SchemeErrorKind =
  | "NoColors"
  | "GenerateColors"
  | "UnsupportedSchemeVariant"
  | "Other";

export interface SchemeErrorResponse {
  error: string;
  kind?: SchemeErrorKind;
}
