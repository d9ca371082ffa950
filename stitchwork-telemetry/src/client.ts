import type {
  TelemetryClient,
  TelemetryConfig,
  TelemetryLevel,
  LogEntry,
  MetricEntry,
} from "./types.js";
import {
  DEFAULT_CONFIG,
  normalizeEndpoint,
  getHeaders,
  nowIso,
  buildBaseMetadata,
  clampQueue,
} from "./config.js";
import { getMetricDefinition } from "./metrics.js";

const NOOP_CLIENT: TelemetryClient = {
  log: () => undefined,
  event: () => undefined,
  metric: () => undefined,
  flush: async () => undefined,
  shutdown: async () => undefined,
};

/**
 * Create a telemetry client instance
 *
 * @param overrides - Partial config to override defaults from environment
 * @returns TelemetryClient instance (or no-op client if disabled)
 *
 * @example
 * ```typescript
 * const telemetry = createTelemetryClient({ serviceId: 'stitchwork-engine' });
 *
 * telemetry.event('run.started', 'Graph run started', { runId });
 * telemetry.metric('engine.node.duration_ms', 412, { nodeId });
 * await telemetry.shutdown();
 * ```
 */
export function createTelemetryClient(
  overrides: Partial<TelemetryConfig> & { serviceId: string }
): TelemetryClient {
  const config: TelemetryConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    endpoint: normalizeEndpoint(overrides.endpoint ?? DEFAULT_CONFIG.endpoint),
  };

  if (!config.enabled || !config.endpoint) {
    return NOOP_CLIENT;
  }

  const send = config.fetch ?? fetch;
  const logQueue: LogEntry[] = [];
  const metricQueue: MetricEntry[] = [];

  let timer: NodeJS.Timeout | null = null;
  let flushing: Promise<void> | null = null;

  /**
   * POST to the collector with linear backoff. Telemetry never fails the
   * caller: after the last attempt the batch is dropped with a warning.
   */
  async function request(path: string, body: Record<string, unknown>): Promise<boolean> {
    for (let attempt = 0; attempt <= config.retry; attempt++) {
      try {
        const res = await send(`${config.endpoint}${path}`, {
          method: "POST",
          headers: getHeaders(config),
          body: JSON.stringify(body),
        });

        if (res.ok) return true;

        const text = await res.text();
        throw new Error(`Telemetry request failed: ${res.status} ${text}`);
      } catch (error) {
        if (attempt >= config.retry) {
          console.warn(
            `[Telemetry] Dropping batch for ${path}:`,
            error instanceof Error ? error.message : error
          );
          return false;
        }
        const backoff = Math.min(config.retryBackoffMs * (attempt + 1), 5000);
        await new Promise((resolve) => setTimeout(resolve, backoff));
      }
    }
    return false;
  }

  async function flushLogs(): Promise<void> {
    while (logQueue.length) {
      const batch = logQueue.splice(0, config.maxBatch);
      await request("/logs/ingest", { entries: batch });
    }
  }

  async function flushMetrics(): Promise<void> {
    while (metricQueue.length) {
      const batch = metricQueue.splice(0, config.maxBatch);

      const grouped = new Map<string, Array<Omit<MetricEntry, "name">>>();
      for (const item of batch) {
        const points = grouped.get(item.name) ?? [];
        points.push({ timestamp: item.timestamp, value: item.value, labels: item.labels });
        grouped.set(item.name, points);
      }

      const metrics = Array.from(grouped.entries()).map(([name, dataPoints]) => ({
        name,
        metricType: getMetricDefinition(name).type,
        dataPoints,
      }));
      await request("/metrics/ingest", { metrics });
    }
  }

  async function flush(): Promise<void> {
    if (flushing) return flushing;

    flushing = (async () => {
      try {
        await flushLogs();
        await flushMetrics();
      } finally {
        flushing = null;
      }
    })();
    return flushing;
  }

  function startTimer(): void {
    if (timer) return;

    timer = setInterval(() => {
      flush().catch((error: unknown) => {
        console.warn("[Telemetry] Periodic flush failed:", error);
      });
    }, config.flushMs);
    timer.unref();
  }

  function log(level: TelemetryLevel, message: string, metadata: Record<string, unknown> = {}): void {
    logQueue.push({
      timestamp: nowIso(),
      level,
      message,
      metadata: { ...buildBaseMetadata(config), ...metadata },
    });

    clampQueue(logQueue, config.maxQueue);
    startTimer();
  }

  function event(
    eventType: string,
    message: string,
    metadata: Record<string, unknown> = {},
    level: TelemetryLevel = "info"
  ): void {
    log(level, message, { eventType, ...metadata });
  }

  function metric(name: string, value: number, labels: Record<string, unknown> = {}): void {
    metricQueue.push({
      name,
      timestamp: nowIso(),
      value,
      labels: { ...buildBaseMetadata(config), ...labels },
    });

    clampQueue(metricQueue, config.maxQueue);
    startTimer();
  }

  async function shutdown(): Promise<void> {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
    await flush();
  }

  return { log, event, metric, flush, shutdown };
}
