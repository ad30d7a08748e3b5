import type { HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import { loadSchemeConfig, type SchemeServiceConfig } from "./config";
import { ImageDecodeError, toSchemeError } from "./errors";
import { errorResponse, schemeErrorResponse } from "./http";
import { decodeImage, type ImageSource } from "./image-source";
import type { Quantizer } from "./quantizer";
import { createSchemeFromImage, resolveSchemeKind, type SchemeOptions } from "./scheme-generator";
import { SchemeLogger, type LogSink } from "./scheme-logger";
import { trackSchemeFailed, trackSchemeGenerated } from "./telemetry";

const DEFAULT_SCHEME_NAME = "Untitled";

export interface SchemeRequestOptions extends SchemeOptions {
  verbose: boolean;
}

export interface SchemeHandlerDeps {
  config: SchemeServiceConfig;
  sink: LogSink;
  decode?: (bytes: Uint8Array) => Promise<ImageSource>;
  quantizer?: Quantizer;
}

export function slugify(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "untitled";
}

function queryValue(query: URLSearchParams, key: string): string | undefined {
  const value = query.get(key)?.trim();
  return value ? value : undefined;
}

/**
 * Read scheme metadata from query parameters. Throws `UnsupportedSchemeVariant`
 * for an unknown `system` or `variant`.
 */
export function parseSchemeQuery(query: URLSearchParams, config: SchemeServiceConfig): SchemeRequestOptions {
  const { system, variant } = resolveSchemeKind(
    (queryValue(query, "system") ?? "base16").toLowerCase(),
    (queryValue(query, "variant") ?? "dark").toLowerCase()
  );
  const name = queryValue(query, "name") ?? DEFAULT_SCHEME_NAME;
  const verboseParam = queryValue(query, "verbose");

  return {
    author: queryValue(query, "author") ?? config.defaultAuthor,
    description: queryValue(query, "description"),
    name,
    slug: slugify(queryValue(query, "slug") ?? name),
    system,
    variant,
    verbose: verboseParam ? verboseParam === "true" || verboseParam === "1" : config.verbose,
  };
}

/**
 * Turn raw image bytes plus query metadata into an HTTP response.
 */
export async function respondWithScheme(
  bytes: Uint8Array,
  query: URLSearchParams,
  deps: SchemeHandlerDeps
): Promise<HttpResponseInit> {
  if (bytes.length === 0) {
    return errorResponse(400, "Request body must contain image bytes");
  }
  if (bytes.length > deps.config.maxImageBytes) {
    return errorResponse(413, `Image exceeds ${deps.config.maxImageBytes} bytes`);
  }

  const startedAt = Date.now();

  try {
    const options = parseSchemeQuery(query, deps.config);
    const logger = new SchemeLogger({ sink: deps.sink, verbose: options.verbose });
    const image = await (deps.decode ?? decodeImage)(bytes);

    const result = createSchemeFromImage(image, options, {
      quantizer: deps.quantizer,
      quantizeOptions: deps.config.quantize,
      logger,
    });
    trackSchemeGenerated(result, Date.now() - startedAt);

    return { status: 200, jsonBody: result };
  } catch (error) {
    if (error instanceof ImageDecodeError) {
      deps.sink.warn(`[schemes] ${error.message}`);
      return errorResponse(400, error.message);
    }

    const schemeError = toSchemeError(error);
    trackSchemeFailed(schemeError);
    if (schemeError.kind === "GenerateColors" || schemeError.kind === "Other") {
      deps.sink.error(`[schemes] Scheme generation failed:`, error);
    } else {
      deps.sink.warn(`[schemes] ${schemeError.kind}: ${schemeError.message}`);
    }
    return schemeErrorResponse(schemeError);
  }
}

/**
 * Generate a scheme from an uploaded image
 * POST /api/schemes?name=&slug=&author=&description=&system=&variant=&verbose=
 */
export async function createScheme(
  request: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  context.log("POST /api/schemes");

  const query = new URL(request.url).searchParams;
  const bytes = new Uint8Array(await request.arrayBuffer());

  return respondWithScheme(bytes, query, { config: loadSchemeConfig(), sink: context });
}
