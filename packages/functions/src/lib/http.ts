import { HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import type { SchemeErrorKind, SchemeErrorResponse } from "imagescheme-shared";
import { loadCorsConfig, type CorsConfig } from "./config";
import type { SchemeError } from "./errors";

type HttpHandler = (request: HttpRequest, context: InvocationContext) => Promise<HttpResponseInit>;

const ERROR_STATUS: Record<SchemeErrorKind, number> = {
  NoColors: 422,
  UnsupportedSchemeVariant: 400,
  GenerateColors: 500,
  Other: 500,
};

export function errorResponse(status: number, error: string, kind?: SchemeErrorKind): HttpResponseInit {
  const body: SchemeErrorResponse = kind ? { error, kind } : { error };
  return { status, jsonBody: body };
}

export function schemeErrorResponse(error: SchemeError): HttpResponseInit {
  return errorResponse(ERROR_STATUS[error.kind], error.message, error.kind);
}

export function originMatches(origin: string, pattern: string): boolean {
  if (pattern === "*") return true;
  if (pattern.includes("*")) {
    const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
    return new RegExp(`^${escaped.replace(/\*/g, ".*")}$`, "i").test(origin);
  }
  return origin === pattern;
}

export function resolveAllowedOrigin(origin: string | null, cors: CorsConfig): string | null {
  if (!origin) return null;
  const pattern = cors.allowedOrigins.find((candidate) => originMatches(origin, candidate));
  if (!pattern) return null;
  return pattern === "*" ? "*" : origin;
}

function corsHeaders(allowedOrigin: string, cors: CorsConfig): Headers {
  const headers = new Headers();
  headers.set("Access-Control-Allow-Origin", allowedOrigin);
  headers.set("Access-Control-Allow-Headers", cors.allowHeaders);
  headers.set("Access-Control-Allow-Methods", cors.allowMethods);
  headers.set("Vary", "Origin");
  if (cors.supportCredentials && allowedOrigin !== "*") {
    headers.set("Access-Control-Allow-Credentials", "true");
  }
  return headers;
}

export function withCors(handler: HttpHandler, cors: CorsConfig = loadCorsConfig()): HttpHandler {
  return async (request, context) => {
    const allowedOrigin = resolveAllowedOrigin(request.headers.get("origin"), cors);

    if (request.method?.toUpperCase() === "OPTIONS") {
      return allowedOrigin ? { status: 204, headers: corsHeaders(allowedOrigin, cors) } : { status: 204 };
    }

    const response = await handler(request, context);
    if (!allowedOrigin) return response;

    const headers = new Headers(response.headers ?? {});
    corsHeaders(allowedOrigin, cors).forEach((value, key) => headers.set(key, value));
    return { ...response, headers };
  };
}

export type { HttpHandler };
