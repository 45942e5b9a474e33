/**
 * Admin Controller
 *
 * Diagnostics and hot reload of the served model. Both routes require an
 * admin key (see the route table).
 */

import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "@llamahost/http";
import type { ServiceContext } from "../context.js";
import type { ModelOptions } from "../llama/backend.js";
import { InvalidRequestError, ModelLoadError } from "../errors.js";

const logger = createLogger("admin");

const reloadRequestSchema = z
  .object({
    model_path: z.string().min(1).optional(),
    n_ctx: z.number().int().positive().optional(),
    n_batch: z.number().int().positive().optional(),
    n_gpu_layers: z.number().int().min(-1).optional(),
    n_threads: z.number().int().positive().optional(),
    use_mlock: z.boolean().optional(),
    use_mmap: z.boolean().optional(),
  })
  .default({});

export type ReloadRequest = z.infer<typeof reloadRequestSchema>;

/**
 * Only the fields present in the request override the current options
 */
export function toModelOverrides(body: ReloadRequest): Partial<ModelOptions> {
  const overrides: Partial<ModelOptions> = {};
  if (body.model_path !== undefined) overrides.modelPath = body.model_path;
  if (body.n_ctx !== undefined) overrides.contextSize = body.n_ctx;
  if (body.n_batch !== undefined) overrides.batchSize = body.n_batch;
  if (body.n_gpu_layers !== undefined) overrides.gpuLayers = body.n_gpu_layers;
  if (body.n_threads !== undefined) overrides.threads = body.n_threads;
  if (body.use_mlock !== undefined) overrides.useMlock = body.use_mlock;
  if (body.use_mmap !== undefined) overrides.useMmap = body.use_mmap;
  return overrides;
}

function toMegabytes(bytes: number): number {
  return Math.round((bytes / 1024 / 1024) * 10) / 10;
}

export function createAdminHandlers(ctx: ServiceContext) {
  return {
    info(_req: Request, res: Response): void {
      const engine = ctx.handle.info();
      const memory = process.memoryUsage();
      const stats = ctx.orchestrator.stats();

      res.json({
        model_name: ctx.config.modelName,
        version: ctx.config.version,
        uptime_seconds: Math.floor((Date.now() - ctx.startedAt.getTime()) / 1000),
        node_version: process.version,
        memory_mb: {
          rss: toMegabytes(memory.rss),
          heap_used: toMegabytes(memory.heapUsed),
          heap_total: toMegabytes(memory.heapTotal),
        },
        engine: {
          state: engine.state,
          ready: engine.ready,
          model_loaded: engine.modelLoaded,
          backend: engine.backend,
          model_path: engine.modelPath,
          n_ctx: engine.contextSize,
          n_batch: engine.batchSize,
          n_gpu_layers: engine.gpuLayers,
          n_threads: engine.threads,
          use_mlock: engine.useMlock,
          use_mmap: engine.useMmap,
          loaded_at: engine.loadedAt,
          reload_count: engine.reloadCount,
          last_error: engine.lastError,
        },
        generations: {
          active: stats.activeGenerations,
          queued: stats.queuedGenerations,
          leases: engine.activeLeases,
        },
        limits: {
          max_concurrent_generations: ctx.config.maxConcurrentGenerations,
          generation_timeout_ms: ctx.config.generationTimeoutMs,
          max_tokens_limit: ctx.config.maxTokensLimit,
        },
        chat_template: ctx.config.chatTemplate,
        telemetry: {
          enabled: ctx.telemetry.enabled,
          metrics: ctx.telemetry.snapshot(),
          events: ctx.telemetry.recentEvents(),
        },
      });
    },

    async reload(req: Request, res: Response, next: NextFunction): Promise<void> {
      const parsed = reloadRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        next(new InvalidRequestError("Invalid reload request", parsed.error.issues));
        return;
      }

      const overrides = toModelOverrides(parsed.data);
      logger.info(`Reload requested by ${req.auth?.keyId ?? "unknown"}`);

      try {
        const result = await ctx.handle.reload(overrides);
        res.json({
          status: "success",
          message: "Model reloaded",
          state: result.state,
          model_path: result.options.modelPath,
        });
      } catch (err) {
        if (err instanceof ModelLoadError) {
          res.status(err.status).json({ ...err.toJSON(), state: ctx.handle.getState() });
          return;
        }
        next(err);
      }
    },
  };
}
