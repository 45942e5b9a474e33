/**
 * Error taxonomy for the Inference Service
 *
 * Each class carries its HTTP rendering; the shared error handler from
 * @llamahost/http turns them into `{ error: { message, type, code } }`.
 */

import { ApiError } from "@llamahost/http";

export { UnauthorizedError, ForbiddenError } from "@llamahost/auth";

export class InvalidRequestError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, {
      status: 400,
      type: "invalid_request_error",
      code: "invalid_request",
      details,
    });
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, code = "not_found") {
    super(message, {
      status: 404,
      type: "invalid_request_error",
      code,
    });
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message = "Model is not loaded") {
    super(message, {
      status: 503,
      type: "service_unavailable",
      code: "model_not_ready",
      headers: { "Retry-After": "5" },
    });
  }
}

export class ModelLoadError extends ApiError {
  readonly modelPath: string;

  constructor(modelPath: string, reason: string) {
    super(`Failed to load model ${modelPath}: ${reason}`, {
      status: 500,
      type: "model_load_error",
      code: "model_load_failed",
    });
    this.modelPath = modelPath;
  }
}

export class GenerationTimeoutError extends ApiError {
  constructor(timeoutMs: number) {
    super(`Generation exceeded ${timeoutMs}ms`, {
      status: 504,
      type: "timeout_error",
      code: "generation_timeout",
    });
  }
}

export class EngineError extends ApiError {
  constructor(reason: string) {
    super(`Generation failed: ${reason}`, {
      status: 500,
      type: "server_error",
      code: "engine_error",
    });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
