/**
 * @llamahost/http - Express host for llamahost services
 *
 * Covers CORS, request metrics and trace ids, request logging, health
 * routes, the `{ error: { message, type, code } }` renderer and graceful
 * shutdown. Handlers passed as `preBody` run before the JSON parser, so
 * authentication answers ahead of any body error.
 *
 * @example
 * ```typescript
 * import { createHostServer, createErrorHandler } from '@llamahost/http';
 * import { createTelemetry } from '@llamahost/telemetry';
 *
 * const server = createHostServer({
 *   serviceId: 'inference',
 *   port: 1133,
 *   host: '127.0.0.1',
 *   telemetry: createTelemetry(),
 *   preBody: [auth.authenticate],
 *   health: { readinessCheck: () => handle.isReady() },
 *   registerRoutes: (app) => {
 *     app.get('/v1/models', (req, res) => res.json({ object: 'list', data: [] }));
 *   },
 *   errorHandler: createErrorHandler(),
 * });
 *
 * await server.start();
 * ```
 */

export * from "./types.js";
export * from "./server.js";
export * from "./health.js";
export * from "./cors.js";
export * from "./telemetry.js";
export * from "./logging.js";
export * from "./errors.js";
