/**
 * @stitchwork/telemetry - batched telemetry client for Stitchwork components
 *
 * Ships log entries, domain events and metrics to a collector endpoint:
 * - Batched delivery with a bounded in-memory queue
 * - Retry with linear backoff
 * - No-op client when disabled or no endpoint is configured
 *
 * @example
 * ```typescript
 * import { createTelemetryClient } from '@stitchwork/telemetry';
 *
 * const telemetry = createTelemetryClient({ serviceId: 'stitchwork-engine' });
 * telemetry.log('info', 'Run started', { runId });
 * await telemetry.shutdown();
 * ```
 */

export * from "./types.js";
export * from "./client.js";
export * from "./config.js";
export * from "./metrics.js";
