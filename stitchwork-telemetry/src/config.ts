import type { TelemetryAuthMode, TelemetryConfig } from "./types.js";

const AUTH_MODES: readonly TelemetryAuthMode[] = ["apiKey", "bearer", "none"];

function parseAuthMode(value: string | undefined, apiKey: string, bearer: string): TelemetryAuthMode {
  const explicit = AUTH_MODES.find((mode) => mode === value);
  if (explicit) return explicit;
  return apiKey ? "apiKey" : bearer ? "bearer" : "none";
}

/**
 * Resolve telemetry defaults from environment variables.
 * Telemetry is enabled when an endpoint is configured, unless
 * STITCHWORK_TELEMETRY_ENABLED says otherwise.
 */
export function resolveTelemetryDefaults(
  env: NodeJS.ProcessEnv = process.env
): Omit<TelemetryConfig, "serviceId"> {
  const endpoint = env.STITCHWORK_TELEMETRY_ENDPOINT || "";
  const apiKey = env.STITCHWORK_TELEMETRY_API_KEY || "";
  const bearer = env.STITCHWORK_TELEMETRY_BEARER || "";
  const explicitEnabled = env.STITCHWORK_TELEMETRY_ENABLED;

  return {
    enabled: explicitEnabled ? explicitEnabled === "true" : Boolean(endpoint),
    endpoint,
    authMode: parseAuthMode(env.STITCHWORK_TELEMETRY_AUTH_MODE, apiKey, bearer),
    apiKey,
    bearer,
    env: env.STITCHWORK_TELEMETRY_ENV || env.NODE_ENV || "dev",
    maxBatch: Number.parseInt(env.STITCHWORK_TELEMETRY_MAX_BATCH || "50", 10),
    flushMs: Number.parseInt(env.STITCHWORK_TELEMETRY_FLUSH_MS || "1000", 10),
    retry: Number.parseInt(env.STITCHWORK_TELEMETRY_RETRY || "3", 10),
    retryBackoffMs: Number.parseInt(env.STITCHWORK_TELEMETRY_RETRY_BACKOFF_MS || "1000", 10),
    maxQueue: Number.parseInt(env.STITCHWORK_TELEMETRY_MAX_QUEUE || "1000", 10),
  };
}

export const DEFAULT_CONFIG = resolveTelemetryDefaults();

/**
 * Normalize endpoint URL
 * - Remove trailing slashes
 * - Ensure /api suffix
 */
export function normalizeEndpoint(endpoint: string): string {
  if (!endpoint) return "";
  const trimmed = endpoint.replace(/\/+$/, "");
  return trimmed.endsWith("/api") ? trimmed : `${trimmed}/api`;
}

/**
 * Build HTTP headers for telemetry requests
 */
export function getHeaders(config: TelemetryConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "X-Service-Id": config.serviceId,
    "X-Env": config.env,
  };

  if (config.authMode === "apiKey" && config.apiKey) {
    headers["X-API-Key"] = config.apiKey;
  }

  if (config.authMode === "bearer" && config.bearer) {
    headers["Authorization"] = `Bearer ${config.bearer}`;
  }

  return headers;
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function buildBaseMetadata(config: TelemetryConfig): Record<string, unknown> {
  return {
    serviceId: config.serviceId,
    env: config.env,
  };
}

/**
 * Clamp queue size by removing oldest entries
 */
export function clampQueue(queue: Array<unknown>, maxQueue: number): void {
  while (queue.length > maxQueue) {
    queue.shift();
  }
}
