/**
 * Inference Service assembly
 *
 * Builds the credential store, route-tier authentication, engine handle and
 * completion orchestrator around the shared host server. Nothing listens
 * until start() is called, so tests can bind an ephemeral port.
 */

import { createCredentialStore, createAuthMiddleware } from "@llamahost/auth";
import { createErrorHandler, createHostServer, createLogger, type HostServer } from "@llamahost/http";
import { createTelemetry, type Telemetry } from "@llamahost/telemetry";
import type { Config } from "./config.js";
import type { ServiceContext } from "./context.js";
import type { InferenceBackend } from "./llama/backend.js";
import { EngineHandle } from "./llama/handle.js";
import { CompletionOrchestrator } from "./completions/orchestrator.js";
import { getChatTemplate } from "./completions/chat-template.js";
import { ROUTE_ACCESS_TABLE, registerRoutes } from "./routes.js";

export const SERVICE_ID = "inference";

const logger = createLogger("inference");

export interface InferenceServerOptions {
  backend: InferenceBackend;
  telemetry?: Telemetry;
  /** Install SIGINT/SIGTERM handlers (off for tests) */
  handleSignals?: boolean;
  shutdown?: {
    gracePeriodMs?: number;
    preShutdownDelayMs?: number;
  };
}

export interface InferenceServer {
  server: HostServer;
  context: ServiceContext;
  /** Load the configured model; rejects with ModelLoadError */
  loadModel(): Promise<void>;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export function createInferenceServer(config: Config, options: InferenceServerOptions): InferenceServer {
  const telemetry = options.telemetry ?? createTelemetry({ enabled: config.telemetryEnabled });

  const store = createCredentialStore(config.credentials);
  const auth = createAuthMiddleware(store, {
    routes: ROUTE_ACCESS_TABLE,
    defaultTier: "standard",
    logger: (level, message) => logger[level](message),
  });

  const handle = new EngineHandle({
    backend: options.backend,
    model: config.model,
    sequences: config.maxConcurrentGenerations,
    telemetry,
  });

  const orchestrator = new CompletionOrchestrator({
    handle,
    template: getChatTemplate(config.chatTemplate),
    timeoutMs: config.generationTimeoutMs,
    maxTokensLimit: config.maxTokensLimit,
    maxConcurrentGenerations: config.maxConcurrentGenerations,
    telemetry,
  });

  const context: ServiceContext = {
    config,
    handle,
    orchestrator,
    telemetry,
    startedAt: new Date(),
  };

  const server = createHostServer({
    serviceId: SERVICE_ID,
    port: config.port,
    host: config.host,
    corsOrigins: config.corsOrigins,
    telemetry,
    // Credentials are checked before the body is read
    preBody: [auth.authenticate],
    health: {
      readinessCheck: () => handle.isReady(),
      details: () => ({
        model_loaded: handle.info().modelLoaded,
        state: handle.getState(),
      }),
    },
    registerRoutes: (app) => registerRoutes(app, context, auth),
    errorHandler: createErrorHandler({
      source: SERVICE_ID,
      onUnexpected: () => telemetry.metric("service.error.count", 1, { kind: "unexpected" }),
    }),
    shutdown: {
      gracePeriodMs: options.shutdown?.gracePeriodMs ?? 30000,
      preShutdownDelayMs: options.shutdown?.preShutdownDelayMs ?? 0,
      hooks: [
        async () => {
          logger.info("Unloading model...");
          await handle.unload();
        },
      ],
    },
    handleSignals: options.handleSignals ?? true,
  });

  return {
    server,
    context,
    loadModel: () => handle.load(),
    start: () => server.start(),
    shutdown: () => server.shutdown(),
  };
}
