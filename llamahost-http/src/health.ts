import { Router } from "express";
import type { HealthBody, HealthOptions } from "./types.js";

/**
 * `/health` always answers 200 with the current status; the other two answer
 * 503 when the process is not serving (`/health/live`) or not ready
 * (`/health/ready`).
 */
export function createHealthRouter(options: HealthOptions, isServing: () => boolean): Router {
  const router = Router();

  async function ready(): Promise<boolean> {
    if (!isServing()) return false;
    try {
      return await options.readinessCheck();
    } catch {
      return false;
    }
  }

  function body(status: HealthBody["status"], extra: Record<string, unknown> = {}): HealthBody {
    return { status, timestamp: new Date().toISOString(), ...extra };
  }

  router.get("/health", async (_req, res) => {
    const details = options.details ? options.details() : {};
    res.status(200).json(body((await ready()) ? "ok" : "degraded", details));
  });

  router.get("/health/live", (_req, res) => {
    const serving = isServing();
    res.status(serving ? 200 : 503).json(body(serving ? "ok" : "unhealthy"));
  });

  router.get("/health/ready", async (_req, res) => {
    const isReady = await ready();
    res.status(isReady ? 200 : 503).json(body(isReady ? "ok" : "unhealthy"));
  });

  return router;
}
