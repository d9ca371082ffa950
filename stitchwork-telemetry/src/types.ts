/**
 * Authentication mode for the telemetry endpoint
 * - "apiKey": X-API-Key header
 * - "bearer": Authorization: Bearer header
 * - "none": no authentication (local collectors)
 */
export type TelemetryAuthMode = "apiKey" | "bearer" | "none";

export type TelemetryLevel = "debug" | "info" | "warn" | "error";

/**
 * Minimal fetch signature so tests can hand in an in-process collector
 */
export type TelemetryFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

/**
 * Telemetry client configuration
 */
export type TelemetryConfig = {
  /** Enable/disable telemetry */
  enabled: boolean;

  /** Collector base URL */
  endpoint: string;

  authMode: TelemetryAuthMode;
  apiKey: string;
  bearer: string;

  /** Component emitting the telemetry (e.g. "stitchwork-engine") */
  serviceId: string;

  /** Environment (dev, stage, prod) */
  env: string;

  /** Maximum batch size per request */
  maxBatch: number;

  /** Flush interval in milliseconds */
  flushMs: number;

  /** Number of retry attempts */
  retry: number;

  /** Base backoff between retries in milliseconds */
  retryBackoffMs: number;

  /** Maximum queue size (oldest entries dropped when exceeded) */
  maxQueue: number;

  fetch?: TelemetryFetch;
};

export type LogEntry = {
  timestamp: string;
  level: TelemetryLevel;
  message: string;
  metadata?: Record<string, unknown>;
};

export type MetricEntry = {
  name: string;
  timestamp: string;
  value: number;
  labels?: Record<string, unknown>;
};

export interface TelemetryClient {
  /**
   * Log a message with level and optional metadata
   */
  log(level: TelemetryLevel, message: string, metadata?: Record<string, unknown>): void;

  /**
   * Track a domain event (logged with an `eventType` field)
   */
  event(eventType: string, message: string, metadata?: Record<string, unknown>, level?: TelemetryLevel): void;

  /**
   * Record a metric value
   */
  metric(name: string, value: number, labels?: Record<string, unknown>): void;

  /**
   * Manually flush all pending telemetry data
   */
  flush(): Promise<void>;

  /**
   * Stop the flush timer and ship whatever is queued
   */
  shutdown(): Promise<void>;
}

export type MetricDefinition = {
  type: "counter" | "gauge" | "histogram";
  description: string;
};
