/**
 * @llamahost/auth - Express middleware for authentication
 */

import type { Request, RequestHandler, Response, NextFunction } from "express";
import { ApiError } from "@llamahost/http";
import type { AccessTier, AuthMiddlewareOptions, CredentialTier, RequestAuth, RouteAccessRule } from "./types.js";
import type { CredentialStore } from "./credentials.js";
import { keyFingerprint, parseBearerToken } from "./utils.js";

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      auth?: RequestAuth;
    }
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = "Invalid API key") {
    super(message, {
      status: 401,
      type: "authentication_error",
      code: "unauthorized",
      headers: { "WWW-Authenticate": "Bearer" },
    });
  }
}

export class ForbiddenError extends ApiError {
  constructor(message = "Admin access required") {
    super(message, {
      status: 403,
      type: "permission_error",
      code: "forbidden",
    });
  }
}

interface CompiledRule {
  method: string;
  pattern: RegExp;
  tier: AccessTier;
}

function escapeSegment(segment: string): string {
  return segment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Turn an Express-style path into an anchored RegExp. Matching ignores case
 * and a trailing slash, as Express routing does by default.
 */
export function compileRoutePath(path: string): RegExp {
  const source = path
    .split("/")
    .map((segment) => (segment.startsWith(":") ? "[^/]+" : escapeSegment(segment)))
    .join("/");
  return new RegExp(`^${source}/?$`, "i");
}

function tierCovers(granted: CredentialTier, required: CredentialTier): boolean {
  return required === "standard" || granted === "admin";
}

/**
 * Create authentication middleware backed by a static route table
 */
export function createAuthMiddleware(store: CredentialStore, options: AuthMiddlewareOptions) {
  const {
    routes,
    defaultTier = "standard",
    logger = (level, msg) => console[level](`[auth] ${msg}`),
  } = options;

  const compiled: CompiledRule[] = routes.map((rule: RouteAccessRule) => ({
    method: rule.method.toUpperCase(),
    pattern: compileRoutePath(rule.path),
    tier: rule.tier,
  }));

  /**
   * Tier a request needs, from the first matching rule
   */
  function classify(method: string, path: string): AccessTier {
    const upper = method.toUpperCase();
    if (upper === "OPTIONS") return "public";
    const lookup = upper === "HEAD" ? "GET" : upper;
    const rule = compiled.find((candidate) => candidate.method === lookup && candidate.pattern.test(path));
    return rule ? rule.tier : defaultTier;
  }

  /**
   * Resolve the credential on a request against the tier it needs.
   * Throws UnauthorizedError or ForbiddenError.
   */
  function authorize(req: Request, required: CredentialTier): RequestAuth {
    const header = req.headers.authorization;
    const token = parseBearerToken(header);
    if (!token) {
      throw new UnauthorizedError(header ? "Malformed Authorization header, expected Bearer token" : "Missing API key");
    }

    const granted = store.resolveTier(token);
    if (!granted) {
      logger("warn", `Rejected unknown key on ${req.method} ${req.path}`);
      throw new UnauthorizedError("Invalid API key");
    }

    if (!tierCovers(granted, required)) {
      logger("warn", `Key ${keyFingerprint(token)} (${granted}) denied ${required} route ${req.method} ${req.path}`);
      throw new ForbiddenError();
    }

    return { tier: granted, keyId: keyFingerprint(token) };
  }

  /**
   * Middleware consulting the route table for every request
   */
  function authenticate(req: Request, _res: Response, next: NextFunction): void {
    const required = classify(req.method, req.path);
    if (required === "public") {
      next();
      return;
    }

    try {
      req.auth = authorize(req, required);
      next();
    } catch (err) {
      next(err);
    }
  }

  /**
   * Per-route guard, mounted with the handler so the tier travels with the
   * route that dispatches. Reuses the identity resolved by authenticate.
   */
  function requireTier(required: AccessTier): RequestHandler {
    return (req, _res, next) => {
      if (required === "public") {
        next();
        return;
      }
      try {
        const auth = req.auth ?? authorize(req, required);
        if (!tierCovers(auth.tier, required)) {
          logger("warn", `Key ${auth.keyId} (${auth.tier}) denied ${required} route ${req.method} ${req.path}`);
          throw new ForbiddenError();
        }
        req.auth = auth;
        next();
      } catch (err) {
        next(err);
      }
    };
  }

  return {
    authenticate,
    requireTier,
    classify,
    authorize,
  };
}

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
