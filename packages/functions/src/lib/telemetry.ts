import appInsights from "applicationinsights";
import type { SchemeCreateResponse } from "imagescheme-shared";
import type { SchemeError } from "./errors";

const connectionString = process.env.APPLICATIONINSIGHTS_CONNECTION_STRING?.trim();

let client: appInsights.TelemetryClient | null = null;

if (connectionString) {
  appInsights
    .setup(connectionString)
    // Request telemetry is already collected by Azure Functions runtime.
    .setAutoCollectRequests(false)
    .setAutoCollectDependencies(false)
    .setAutoCollectExceptions(false)
    .setAutoCollectConsole(false)
    .start();

  client = appInsights.defaultClient;
}

type SchemeProperties = Record<string, string | number>;

function toProperties(properties: SchemeProperties): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(properties)) {
    normalized[key] = String(value);
  }
  return normalized;
}

export function trackSchemeGenerated(result: SchemeCreateResponse, durationMs: number): void {
  const properties = toProperties({
    system: result.scheme.system,
    variant: result.scheme.variant,
    lightPass: result.anchors.light.pass,
    darkPass: result.anchors.dark.pass,
  });

  try {
    client?.trackEvent({ name: "scheme.generated", properties });
    client?.trackMetric({ name: "scheme.generate.durationMs", value: durationMs, properties });
  } catch {
    // Telemetry must not fail a scheme request.
  }
}

export function trackSchemeFailed(error: SchemeError): void {
  const properties = toProperties({ component: "scheme-generator", kind: error.kind });

  try {
    client?.trackEvent({ name: "scheme.failed", properties: { kind: error.kind } });
    client?.trackException({ exception: error, properties });
  } catch {
    // Telemetry must not fail a scheme request.
  }
}
