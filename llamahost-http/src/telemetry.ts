import type { RequestHandler } from "express";
import { randomUUID } from "crypto";
import type { Telemetry } from "@llamahost/telemetry";

/**
 * Tags each request with an `x-trace-id` (the caller's, or a fresh one) and
 * records request count and latency when the response finishes. 5xx answers
 * also count as errors and leave a `service.error` event.
 */
export function createRequestMetrics(telemetry: Telemetry, quietPaths: string[] = []): RequestHandler {
  const quiet = new Set(quietPaths);

  return (req, res, next) => {
    const startedAt = performance.now();
    const inbound = req.headers["x-trace-id"];
    const traceId = typeof inbound === "string" && inbound.length > 0 ? inbound : randomUUID();
    res.setHeader("x-trace-id", traceId);

    // req.path is rewritten by mounted routers, so keep the entry path
    const path = req.path;

    res.on("finish", () => {
      if (quiet.has(path)) return;

      const labels = { method: req.method, status: String(res.statusCode) };
      telemetry.metric("service.request.count", 1, labels);
      telemetry.metric("service.request.latency_ms", performance.now() - startedAt, labels);

      if (res.statusCode >= 500) {
        telemetry.metric("service.error.count", 1, { kind: "http" });
        telemetry.event("service.error", `${req.method} ${path} answered ${res.statusCode}`, { traceId }, "error");
      }
    });

    next();
  };
}
