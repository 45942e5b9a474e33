import type { ErrorRequestHandler, Express, RequestHandler } from "express";
import type { Server } from "http";
import type { Telemetry } from "@llamahost/telemetry";

export interface HealthOptions {
  /** Backs `/health/ready` and the `status` of `/health` */
  readinessCheck: () => boolean | Promise<boolean>;
  /** Extra fields merged into the `/health` body */
  details?: () => Record<string, unknown>;
}

export interface HealthBody {
  status: "ok" | "degraded" | "unhealthy";
  timestamp: string;
  [detail: string]: unknown;
}

export interface ShutdownOptions {
  /** Time allowed for open connections before they are destroyed */
  gracePeriodMs?: number;
  /** Pause after readiness drops, before hooks run */
  preShutdownDelayMs?: number;
  /** Run in order; a failing hook is logged and skipped */
  hooks?: Array<() => Promise<void> | void>;
}

export interface HostServerOptions {
  serviceId: string;
  /** 0 binds a free port */
  port: number;
  host: string;
  /** Allowed browser origins, `*.example.com` wildcards allowed; empty allows any */
  corsOrigins?: readonly string[];
  /** @default "1mb" */
  bodyLimit?: string;
  telemetry?: Telemetry;
  /** Paths left out of request logs and metrics */
  quietPaths?: readonly string[];
  /**
   * Runs before the JSON body parser, e.g. authentication, so rejected
   * requests never have their bodies read
   */
  preBody?: RequestHandler[];
  health: HealthOptions;
  registerRoutes: (app: Express) => void | Promise<void>;
  errorHandler: ErrorRequestHandler;
  shutdown?: ShutdownOptions;
  /** @default true */
  handleSignals?: boolean;
}

export interface HostServer {
  app: Express;
  httpServer: Server;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}
