import type { ErrorRequestHandler } from "express";
import { log } from "./logging.js";

export interface ApiErrorOptions {
  status: number;
  type: string;
  code: string;
  details?: unknown;
  headers?: Record<string, string>;
}

/**
 * Error carrying its HTTP rendering. Everything thrown toward the error
 * handler that is not an ApiError is reported as a 500 server_error.
 */
export class ApiError extends Error {
  readonly status: number;
  readonly type: string;
  readonly code: string;
  readonly details?: unknown;
  readonly headers: Record<string, string>;

  constructor(message: string, options: ApiErrorOptions) {
    super(message);
    this.name = new.target.name;
    this.status = options.status;
    this.type = options.type;
    this.code = options.code;
    this.details = options.details;
    this.headers = options.headers ?? {};
  }

  toJSON(): ErrorBody {
    return {
      error: {
        message: this.message,
        type: this.type,
        code: this.code,
        ...(this.details === undefined ? {} : { details: this.details }),
      },
    };
  }
}

export interface ErrorBody {
  error: {
    message: string;
    type: string;
    code: string | null;
    details?: unknown;
  };
}

/**
 * Errors raised by express.json() carry a `type` such as "entity.parse.failed"
 */
function bodyParserError(err: unknown): ApiError | null {
  if (!(err instanceof Error) || !("type" in err) || typeof err.type !== "string") {
    return null;
  }
  if (err.type === "entity.parse.failed") {
    return new ApiError("Request body is not valid JSON", {
      status: 400,
      type: "invalid_request_error",
      code: "invalid_json",
    });
  }
  if (err.type === "entity.too.large") {
    return new ApiError("Request body too large", {
      status: 413,
      type: "invalid_request_error",
      code: "body_too_large",
    });
  }
  return null;
}

export interface ErrorHandlerOptions {
  source?: string;
  /** Called for errors that are not ApiErrors, after logging */
  onUnexpected?: (err: unknown) => void;
}

/**
 * Render ApiErrors as `{ error: { message, type, code } }` bodies
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorRequestHandler {
  const source = options.source ?? "express";

  return (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const apiError = err instanceof ApiError ? err : bodyParserError(err);
    if (apiError) {
      if (apiError.status >= 500) {
        log(`${apiError.name}: ${apiError.message}`, source, "error");
      }
      res.set(apiError.headers);
      res.status(apiError.status).json(apiError.toJSON());
      return;
    }

    log(`Unhandled error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`, source, "error");
    options.onUnexpected?.(err);
    const body: ErrorBody = {
      error: {
        message: "Internal server error",
        type: "server_error",
        code: null,
      },
    };
    res.status(500).json(body);
  };
}
