/**
 * Route table for the Inference Service
 *
 * Every route is declared here once with the tier it requires. The auth
 * middleware classifies requests from the same table ahead of body parsing,
 * and registration mounts each handler behind a guard for its own tier, so
 * a route cannot be dispatched without its tier being checked.
 */

import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import type { AuthMiddleware, RouteAccessRule } from "@llamahost/auth";
import type { ServiceContext } from "./context.js";
import { createChatCompletionsHandler } from "./handlers/chat-completions.js";
import { createModelHandlers } from "./handlers/models.js";
import { createAdminHandlers } from "./handlers/admin.js";
import { createServiceHandlers } from "./handlers/service.js";
import { NotFoundError } from "./errors.js";

type RouteHandler = (req: Request, res: Response, next: NextFunction) => void | Promise<void>;

export type RouteName =
  | "root"
  | "docs"
  | "docsOpenapi"
  | "openapi"
  | "listModels"
  | "getModel"
  | "chatCompletions"
  | "adminInfo"
  | "adminReload";

export interface RouteDefinition extends RouteAccessRule {
  method: "GET" | "POST";
  name: RouteName;
}

/**
 * Health checks are served by the host server's own router; they are listed
 * so the authenticator lets them through without a key.
 */
export const HEALTH_ROUTES: readonly RouteAccessRule[] = [
  { method: "GET", path: "/health", tier: "public" },
  { method: "GET", path: "/health/live", tier: "public" },
  { method: "GET", path: "/health/ready", tier: "public" },
];

export const ROUTES: readonly RouteDefinition[] = [
  { method: "GET", path: "/", tier: "public", name: "root" },
  { method: "GET", path: "/docs", tier: "public", name: "docs" },
  { method: "GET", path: "/docs/openapi.json", tier: "public", name: "docsOpenapi" },
  { method: "GET", path: "/openapi.json", tier: "public", name: "openapi" },

  // OpenAI-compatible endpoints
  { method: "GET", path: "/v1/models", tier: "standard", name: "listModels" },
  { method: "GET", path: "/v1/models/:id", tier: "standard", name: "getModel" },
  { method: "POST", path: "/v1/chat/completions", tier: "standard", name: "chatCompletions" },

  // Model management
  { method: "GET", path: "/admin/info", tier: "admin", name: "adminInfo" },
  { method: "POST", path: "/admin/reload", tier: "admin", name: "adminReload" },
];

export const ROUTE_ACCESS_TABLE: readonly RouteAccessRule[] = [...HEALTH_ROUTES, ...ROUTES];

function createHandlers(ctx: ServiceContext): Record<RouteName, RouteHandler> {
  const service = createServiceHandlers(ctx);
  const models = createModelHandlers(ctx);
  const admin = createAdminHandlers(ctx);

  return {
    root: service.root,
    docs: service.docsRedirect,
    docsOpenapi: service.openapi,
    openapi: service.docsRedirect,
    listModels: models.list,
    getModel: models.get,
    chatCompletions: createChatCompletionsHandler(ctx),
    adminInfo: admin.info,
    adminReload: admin.reload,
  };
}

/**
 * Rejections from async handlers go to the error handler
 */
function wrap(handler: RouteHandler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res, next))
      .catch(next);
  };
}

export function registerRoutes(app: Express, ctx: ServiceContext, auth: AuthMiddleware): void {
  const handlers = createHandlers(ctx);

  for (const route of ROUTES) {
    const guard = auth.requireTier(route.tier);
    const handler = wrap(handlers[route.name]);
    if (route.method === "GET") {
      app.get(route.path, guard, handler);
    } else {
      app.post(route.path, guard, handler);
    }
  }

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Unknown route: ${req.method} ${req.path}`));
  });
}
