import type { EventLevel, MetricLabels, MetricSeries, Telemetry, TelemetryEvent, TelemetryOptions } from "./types.js";
import { getMetricDefinition } from "./metrics.js";

const DEFAULT_EVENT_CAPACITY = 100;

export function seriesKey(name: string, labels: MetricLabels): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`);
  return `${name}{${pairs.join(",")}}`;
}

const disabled: Telemetry = {
  enabled: false,
  metric: () => undefined,
  event: () => undefined,
  snapshot: () => [],
  recentEvents: () => [],
};

/**
 * In-process telemetry: metric samples are folded into per-series
 * aggregates and the latest events are kept in a bounded buffer.
 */
export function createTelemetry(options: TelemetryOptions = {}): Telemetry {
  if (options.enabled === false) return disabled;

  const capacity = options.eventCapacity ?? DEFAULT_EVENT_CAPACITY;
  const now = options.now ?? (() => new Date());
  const series = new Map<string, MetricSeries>();
  const events: TelemetryEvent[] = [];

  function metric(name: string, value: number, labels: MetricLabels = {}): void {
    if (!Number.isFinite(value)) return;

    const key = seriesKey(name, labels);
    const existing = series.get(key);
    if (!existing) {
      series.set(key, {
        name,
        type: getMetricDefinition(name).type,
        labels: { ...labels },
        count: 1,
        sum: value,
        min: value,
        max: value,
        last: value,
      });
      return;
    }

    existing.count++;
    existing.sum += value;
    existing.min = Math.min(existing.min, value);
    existing.max = Math.max(existing.max, value);
    existing.last = value;
  }

  function event(type: string, message: string, data?: Record<string, unknown>, level: EventLevel = "info"): void {
    events.push({
      at: now().toISOString(),
      type,
      message,
      level,
      ...(data ? { data } : {}),
    });
    if (events.length > capacity) events.shift();
  }

  return {
    enabled: true,
    metric,
    event,
    snapshot: () =>
      [...series.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([, entry]) => ({ ...entry, labels: { ...entry.labels } })),
    recentEvents: () => [...events],
  };
}
