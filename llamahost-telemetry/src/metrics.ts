import type { MetricDefinition } from "./types.js";

/**
 * Standard metric definitions used by llamahost services
 */
export const METRIC_DEFINITIONS: Record<string, MetricDefinition> = {
  "service.request.count": {
    type: "counter",
    description: "Total HTTP requests",
  },
  "service.error.count": {
    type: "counter",
    description: "Total HTTP errors",
  },
  "service.request.latency_ms": {
    type: "histogram",
    description: "HTTP request latency (ms)",
  },
  "inference.generation.count": {
    type: "counter",
    description: "Completed generations, labelled by outcome",
  },
  "inference.generation.latency_ms": {
    type: "histogram",
    description: "Generation wall time including queue wait (ms)",
  },
  "inference.tokens.completion": {
    type: "counter",
    description: "Generated completion tokens",
  },
  "inference.reload.count": {
    type: "counter",
    description: "Model reload attempts, labelled by outcome",
  },
};

/** Names outside the table are recorded as gauges */
export function getMetricDefinition(name: string): MetricDefinition {
  return name in METRIC_DEFINITIONS ? METRIC_DEFINITIONS[name] : { type: "gauge", description: "Custom metric" };
}
