import type { MetricDefinition } from "./types.js";

/**
 * Metric definitions emitted by the execution engine
 */
export const METRIC_DEFINITIONS: Record<string, MetricDefinition> = {
  "engine.node.duration_ms": {
    type: "histogram",
    description: "Wall time of a single agent node (ms)",
  },
  "engine.node.failed": {
    type: "counter",
    description: "Agent nodes that ended in the failed state",
  },
  "engine.run.duration_ms": {
    type: "histogram",
    description: "Wall time of a complete graph run (ms)",
  },
  "engine.stitch.rejected": {
    type: "counter",
    description: "Patch batches rejected by conflict or validation",
  },
};

/**
 * Get metric definition, falling back to gauge for custom metrics
 */
export function getMetricDefinition(name: string): MetricDefinition {
  return METRIC_DEFINITIONS[name] ?? { type: "gauge", description: "Custom metric" };
}
