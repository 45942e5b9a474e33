export type MetricType = "counter" | "histogram" | "gauge";

export interface MetricDefinition {
  type: MetricType;
  description: string;
}

export type MetricLabels = Record<string, string>;

/**
 * Aggregate of every sample recorded for one metric name and label set
 */
export interface MetricSeries {
  name: string;
  type: MetricType;
  labels: MetricLabels;
  count: number;
  sum: number;
  min: number;
  max: number;
  last: number;
}

export type EventLevel = "debug" | "info" | "warn" | "error";

export interface TelemetryEvent {
  at: string;
  type: string;
  message: string;
  level: EventLevel;
  data?: Record<string, unknown>;
}

export interface TelemetryOptions {
  /** When false every call is a no-op and snapshots stay empty */
  enabled?: boolean;
  /** Number of recent events kept */
  eventCapacity?: number;
  now?: () => Date;
}

export interface Telemetry {
  readonly enabled: boolean;
  metric(name: string, value: number, labels?: MetricLabels): void;
  event(type: string, message: string, data?: Record<string, unknown>, level?: EventLevel): void;
  /** Series ordered by name, then labels */
  snapshot(): MetricSeries[];
  /** Oldest first */
  recentEvents(): TelemetryEvent[];
}
