/**
 * @llamahost/telemetry - In-process metrics and events for llamahost services
 *
 * @example
 * ```typescript
 * import { createTelemetry } from '@llamahost/telemetry';
 *
 * const telemetry = createTelemetry();
 * telemetry.metric('inference.generation.count', 1, { outcome: 'ok' });
 * telemetry.event('model.loaded', 'Model ready', { path: '/models/a.gguf' });
 *
 * telemetry.snapshot(); // [{ name: 'inference.generation.count', count: 1, ... }]
 * ```
 */

export * from "./types.js";
export * from "./registry.js";
export * from "./metrics.js";
