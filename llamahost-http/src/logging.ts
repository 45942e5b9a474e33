import type { RequestHandler } from "express";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL ?? "";
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/**
 * Format log message with timestamp
 */
export function log(message: string, source = "express", level: LogLevel = "info") {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  const line = `${formattedTime} [${source}] ${message}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

/**
 * Logger bound to a source tag, e.g. createLogger("llama")
 */
export function createLogger(source: string): Logger {
  return {
    debug: (message) => log(message, source, "debug"),
    info: (message) => log(message, source, "info"),
    warn: (message) => log(message, source, "warn"),
    error: (message, err) => {
      const detail = err === undefined ? "" : `: ${err instanceof Error ? err.message : String(err)}`;
      log(`${message}${detail}`, source, "error");
    },
  };
}

const REDACTED_FIELDS = ["password", "token", "apiKey", "api_key", "secret"];

/**
 * Shallow copy of a request body with credential-like fields masked
 */
export function redactBody(body: Record<string, unknown>): Record<string, unknown> {
  const sanitized = { ...body };
  for (const field of REDACTED_FIELDS) {
    if (field in sanitized) sanitized[field] = "[REDACTED]";
  }
  return sanitized;
}

export interface LoggingMiddlewareOptions {
  /** Paths answered without a log line, e.g. health checks */
  quietPaths?: string[];
}

const MAX_LOGGED_BODY = 500;

function truncate(text: string): string {
  return text.length > MAX_LOGGED_BODY ? `${text.slice(0, MAX_LOGGED_BODY)}... [${text.length} bytes]` : text;
}

/**
 * One line per finished request. The request body is read at finish, after
 * the parser has run, and logged redacted at debug level. Error answers sent
 * with res.json() have their body appended.
 */
export function createLoggingMiddleware(options: LoggingMiddlewareOptions = {}): RequestHandler {
  const quiet = new Set(options.quietPaths ?? []);

  return (req, res, next) => {
    const path = req.path;
    if (quiet.has(path)) {
      next();
      return;
    }

    const startedAt = Date.now();
    let errorBody: unknown;

    const json = res.json.bind(res);
    res.json = (body?: unknown) => {
      if (res.statusCode >= 400) errorBody = body;
      return json(body);
    };

    res.on("finish", () => {
      const status = res.statusCode;
      let line = `${req.method} ${path} ${status} in ${Date.now() - startedAt}ms`;
      if (errorBody !== undefined) line += ` :: ${truncate(JSON.stringify(errorBody))}`;
      log(line, "http", status >= 500 ? "error" : status >= 400 ? "warn" : "info");

      const body: unknown = req.body;
      if (isPlainObject(body) && Object.keys(body).length > 0) {
        log(`${req.method} ${path} body ${truncate(JSON.stringify(redactBody(body)))}`, "http", "debug");
      }
    });

    next();
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
