import type { RequestHandler } from "express";

const ALLOW_HEADERS = "Authorization, Content-Type, X-Trace-Id";
const ALLOW_METHODS = "GET, POST, OPTIONS";
const MAX_AGE_SECONDS = "86400";

/**
 * True when `origin` is covered by `pattern`: `*`, an exact origin, or
 * `*.domain` for any subdomain of domain.
 */
export function matchesOrigin(origin: string, pattern: string): boolean {
  if (pattern === "*" || pattern === origin) return true;
  if (!pattern.startsWith("*.")) return false;

  let hostname: string;
  try {
    hostname = new URL(origin).hostname;
  } catch {
    return false;
  }
  return hostname.endsWith(pattern.slice(1));
}

/** Splits a comma-separated origin list, dropping blanks and trailing slashes */
export function parseOrigins(value: string): string[] {
  return value
    .split(",")
    .map((origin) => origin.trim().replace(/\/$/, ""))
    .filter(Boolean);
}

export interface CorsOptions {
  /** Allowed origins. Empty allows any origin. */
  origins: readonly string[];
}

/**
 * CORS for a JSON API reached with bearer keys. No credentials mode is
 * advertised since keys travel in the Authorization header.
 */
export function createCorsMiddleware(options: CorsOptions): RequestHandler {
  const patterns = options.origins;
  const openToAll = patterns.length === 0 || patterns.includes("*");

  return (req, res, next) => {
    const origin = req.headers.origin?.replace(/\/$/, "");
    const allowed = openToAll || (origin !== undefined && patterns.some((p) => matchesOrigin(origin, p)));

    if (allowed) {
      if (openToAll) {
        res.setHeader("Access-Control-Allow-Origin", "*");
      } else if (origin !== undefined) {
        res.setHeader("Access-Control-Allow-Origin", origin);
        res.vary("Origin");
      }
      res.setHeader("Access-Control-Allow-Methods", ALLOW_METHODS);
      res.setHeader("Access-Control-Allow-Headers", ALLOW_HEADERS);
      res.setHeader("Access-Control-Expose-Headers", "Retry-After, X-Trace-Id");
      res.setHeader("Access-Control-Max-Age", MAX_AGE_SECONDS);
    }

    if (req.method === "OPTIONS") {
      res.sendStatus(allowed || origin === undefined ? 204 : 403);
      return;
    }
    next();
  };
}
