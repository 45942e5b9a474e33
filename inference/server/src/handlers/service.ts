import type { Request, Response } from "express";
import type { ServiceContext } from "../context.js";
import { apiDocumentation } from "../openapi.js";

export function createServiceHandlers(ctx: ServiceContext) {
  return {
    // Service discovery document
    root(_req: Request, res: Response): void {
      res.json({
        service: "inference",
        version: ctx.config.version,
        model: ctx.config.modelName,
        docsUrls: {
          openapi: "/docs/openapi.json",
        },
        endpoints: {
          health: "/health",
          models: "/v1/models",
          chatCompletions: "/v1/chat/completions",
          adminInfo: "/admin/info",
          adminReload: "/admin/reload",
        },
        authentication: ["Bearer token (API key)"],
      });
    },

    openapi(_req: Request, res: Response): void {
      res.json(apiDocumentation);
    },

    docsRedirect(_req: Request, res: Response): void {
      res.redirect(302, "/docs/openapi.json");
    },
  };
}
