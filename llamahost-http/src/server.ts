import express from "express";
import { createServer } from "http";
import type { Socket } from "net";
import type { HostServer, HostServerOptions } from "./types.js";
import { createCorsMiddleware } from "./cors.js";
import { createHealthRouter } from "./health.js";
import { createRequestMetrics } from "./telemetry.js";
import { createLoggingMiddleware, createLogger } from "./logging.js";

const HEALTH_PATHS = ["/health", "/health/live", "/health/ready"];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Express host for one service. Middleware order: CORS, request metrics,
 * request logging, the `preBody` handlers, JSON body parsing, health routes,
 * then the service routes and error handler (mounted by start()).
 */
export function createHostServer(options: HostServerOptions): HostServer {
  const logger = createLogger(options.serviceId);
  const gracePeriodMs = options.shutdown?.gracePeriodMs ?? 30000;
  const preShutdownDelayMs = options.shutdown?.preShutdownDelayMs ?? 0;
  const hooks = options.shutdown?.hooks ?? [];
  const quietPaths = [...HEALTH_PATHS, ...(options.quietPaths ?? [])];

  let serving = false;
  let shuttingDown: Promise<void> | null = null;
  const sockets = new Set<Socket>();

  const app = express();
  const httpServer = createServer(app);

  // Generation length is bounded by the service's own timeout
  httpServer.requestTimeout = 0;
  httpServer.keepAliveTimeout = 65000;
  httpServer.headersTimeout = 66000;

  httpServer.on("connection", (socket: Socket) => {
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
  });

  app.disable("x-powered-by");
  app.use(createCorsMiddleware({ origins: options.corsOrigins ?? [] }));
  if (options.telemetry) {
    app.use(createRequestMetrics(options.telemetry, quietPaths));
  }
  app.use(createLoggingMiddleware({ quietPaths }));
  for (const handler of options.preBody ?? []) {
    app.use(handler);
  }
  app.use(express.json({ limit: options.bodyLimit ?? "1mb" }));
  app.use(createHealthRouter(options.health, () => serving));

  async function start(): Promise<void> {
    await options.registerRoutes(app);
    app.use(options.errorHandler);

    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen({ port: options.port, host: options.host }, () => {
        httpServer.off("error", reject);
        resolve();
      });
    });

    serving = true;
    const address = httpServer.address();
    const port = address !== null && typeof address === "object" ? address.port : options.port;
    logger.info(`Listening on http://${options.host}:${port}`);
    options.telemetry?.event("service.started", `${options.serviceId} started`, { port });
  }

  async function closeServer(): Promise<void> {
    if (!httpServer.listening) return;

    logger.info(`Closing server (${sockets.size} open connections)`);
    await new Promise<void>((resolve) => {
      const force = setTimeout(() => {
        logger.warn(`Grace period expired, destroying ${sockets.size} connections`);
        for (const socket of sockets) socket.destroy();
      }, gracePeriodMs);

      httpServer.close(() => {
        clearTimeout(force);
        resolve();
      });
      httpServer.closeIdleConnections();
    });
  }

  async function runShutdown(): Promise<void> {
    serving = false;
    logger.info("Shutting down");
    if (preShutdownDelayMs > 0) await delay(preShutdownDelayMs);

    for (const hook of hooks) {
      try {
        await hook();
      } catch (err) {
        logger.warn(`Shutdown hook failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    await closeServer();
    logger.info("Shutdown complete");
  }

  function shutdown(): Promise<void> {
    shuttingDown ??= runShutdown();
    return shuttingDown;
  }

  if (options.handleSignals ?? true) {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        void shutdown().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error("Shutdown failed", err);
            process.exit(1);
          }
        );
      });
    }
  }

  return { app, httpServer, start, shutdown };
}
