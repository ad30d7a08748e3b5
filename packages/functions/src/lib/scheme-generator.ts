import {
  isSchemeSystem,
  isSchemeVariant,
  type RGB,
  type Scheme,
  type SchemeCreateResponse,
  type SchemeSystem,
  type SchemeVariant,
} from "imagescheme-shared";
import { fixColors, selectDarkAnchor, selectLightAnchor } from "./anchor-selector";
import { colorToHex } from "./color";
import { rgbToHex, toBytes, toUnit } from "./color-space";
import { SchemeError, toSchemeError } from "./errors";
import type { ImageSource } from "./image-source";
import { curatePalette } from "./palette-curator";
import { scanPalette } from "./palette-scanner";
import { DEFAULT_QUANTIZE_OPTIONS, mmcqQuantizer, type QuantizeOptions, type Quantizer } from "./quantizer";
import { silentLogger, type SchemeLogger } from "./scheme-logger";
import { assembleSlots } from "./slot-assembler";

export interface SchemeOptions {
  author: string;
  description?: string;
  name: string;
  slug: string;
  system: SchemeSystem;
  variant: SchemeVariant;
}

export interface SchemeGeneratorDeps {
  quantizer?: Quantizer;
  quantizeOptions?: QuantizeOptions;
  logger?: SchemeLogger;
}

/**
 * Validate untrusted system/variant strings. Throws `UnsupportedSchemeVariant`
 * for anything other than base16|base24 and dark|light.
 */
export function resolveSchemeKind(
  system: string,
  variant: string
): { system: SchemeSystem; variant: SchemeVariant } {
  if (!isSchemeSystem(system)) {
    throw new SchemeError("UnsupportedSchemeVariant", `Unsupported scheme system "${system}"`);
  }
  if (!isSchemeVariant(variant)) {
    throw new SchemeError("UnsupportedSchemeVariant", `Unsupported scheme variant "${variant}"`);
  }
  return { system, variant };
}

function dominantColors(image: ImageSource, quantizer: Quantizer, options: QuantizeOptions): RGB[] {
  try {
    return quantizer.quantize(image.rgba, options);
  } catch (error) {
    throw toSchemeError(error, "GenerateColors");
  }
}

/**
 * Derive a base16/base24 scheme from a decoded image.
 *
 * Runs the full pipeline: anchor scan, quantization, palette curation,
 * background/foreground selection, then slot assembly. Any failure aborts
 * the run with a `SchemeError`; no partial scheme is returned.
 */
export function createSchemeFromImage(
  image: ImageSource,
  options: SchemeOptions,
  deps: SchemeGeneratorDeps = {}
): SchemeCreateResponse {
  const { system, variant } = resolveSchemeKind(options.system, options.variant);
  const quantizer = deps.quantizer ?? mmcqQuantizer;
  const quantizeOptions = deps.quantizeOptions ?? DEFAULT_QUANTIZE_OPTIONS;
  const logger = deps.logger ?? silentLogger();

  logger.debug("[scheme-generator] Generating scheme", {
    width: image.width,
    height: image.height,
    system,
    variant,
  });

  const scanned = scanPalette(image);
  const dominant = dominantColors(image, quantizer, quantizeOptions);
  logger.debug("[scheme-generator] Quantized dominant colors", { count: dominant.length });

  const curated = curatePalette(scanned, dominant);

  const candidates = dominant.map((rgb) => toUnit(rgb));
  const light = selectLightAnchor(candidates, logger);
  const dark = selectDarkAnchor(candidates, logger);
  const fixed = fixColors(dark.color, light.color, variant);
  const background = toBytes(fixed.background);
  const foreground = toBytes(fixed.foreground);

  const slots = assembleSlots(background, foreground, curated, system);

  const scheme: Scheme = {
    author: options.author,
    name: options.name,
    slug: options.slug,
    system,
    variant,
    palette: slots.toRecord(),
  };
  if (options.description) {
    scheme.description = options.description;
  }

  logger.info("[scheme-generator] Scheme generated", {
    slug: scheme.slug,
    slots: slots.size,
    lightPass: light.pass,
    darkPass: dark.pass,
  });

  return {
    scheme,
    palette: curated.map((color) => ({
      hue: color.hue,
      hex: colorToHex(color),
      distance: color.distance,
    })),
    anchors: {
      light: { hex: rgbToHex(toBytes(light.color)), pass: light.pass, description: light.description },
      dark: { hex: rgbToHex(toBytes(dark.color)), pass: dark.pass, description: dark.description },
      background: rgbToHex(background),
      foreground: rgbToHex(foreground),
    },
  };
}
