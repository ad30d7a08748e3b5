import type { QuantizeOptions } from "./quantizer";

const DEFAULT_MAX_IMAGE_BYTES = 10 * 1024 * 1024;
const DEFAULT_AUTHOR = "imagescheme";

export interface SchemeServiceConfig {
  maxImageBytes: number;
  defaultAuthor: string;
  verbose: boolean;
  quantize: QuantizeOptions;
}

export interface CorsConfig {
  allowedOrigins: string[];
  allowHeaders: string;
  allowMethods: string;
  supportCredentials: boolean;
}

type Env = Record<string, string | undefined>;

function parseClampedInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

function parseFlag(raw: string | undefined): boolean {
  return ["1", "true", "yes"].includes((raw ?? "").trim().toLowerCase());
}

export function loadSchemeConfig(env: Env = process.env): SchemeServiceConfig {
  return {
    maxImageBytes: parseClampedInt(env.SCHEME_MAX_IMAGE_BYTES, DEFAULT_MAX_IMAGE_BYTES, 1, Number.MAX_SAFE_INTEGER),
    defaultAuthor: env.SCHEME_DEFAULT_AUTHOR?.trim() || DEFAULT_AUTHOR,
    verbose: parseFlag(env.SCHEME_VERBOSE),
    quantize: {
      quality: parseClampedInt(env.SCHEME_QUANTIZE_QUALITY, 1, 1, 10),
      maxColors: parseClampedInt(env.SCHEME_QUANTIZE_MAX_COLORS, 15, 2, 256),
    },
  };
}

export function loadCorsConfig(env: Env = process.env): CorsConfig {
  return {
    allowedOrigins: (env.CORS_ALLOWED_ORIGINS ?? "http://localhost:3000")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    allowHeaders: env.CORS_ALLOWED_HEADERS ?? "Content-Type, Authorization",
    allowMethods: env.CORS_ALLOWED_METHODS ?? "POST,OPTIONS",
    supportCredentials: env.CORS_SUPPORT_CREDENTIALS === "true",
  };
}
