/**
 * OpenAPI Documentation for the Inference Service
 */

import { SERVICE_VERSION } from "./config.js";

export type OpenApiDocument = {
  openapi: string;
  info: { title: string; version: string; description?: string };
  servers?: Array<{ url: string; description?: string }>;
  paths: Record<string, Record<string, unknown>>;
  components?: Record<string, Record<string, unknown>>;
};

const errorResponse = (description: string) => ({
  description,
  content: {
    "application/json": {
      schema: { $ref: "#/components/schemas/ErrorResponse" },
    },
  },
});

export const apiDocumentation: OpenApiDocument = {
  openapi: "3.1.0",
  info: {
    title: "llamahost Inference Service",
    version: SERVICE_VERSION,
    description: `Serves one local GGUF model through node-llama-cpp behind an OpenAI-compatible API.

## Authentication
Send \`Authorization: Bearer <key>\`. Standard keys reach the /v1 routes, admin keys
additionally reach /admin. Health and documentation routes are public.

## Streaming
Set \`stream: true\` to receive Server-Sent Events of \`chat.completion.chunk\` objects,
terminated by \`data: [DONE]\`.`,
  },
  servers: [
    {
      url: "http://localhost:1133",
      description: "Local development",
    },
  ],
  paths: {
    "/v1/chat/completions": {
      post: {
        operationId: "createChatCompletion",
        summary: "Create chat completion",
        description: "OpenAI-compatible chat completion endpoint. Supports both streaming and non-streaming responses.",
        tags: ["OpenAI Compatible"],
        security: [{ bearerAuth: [] }],
        requestBody: {
          required: true,
          content: {
            "application/json": {
              schema: { $ref: "#/components/schemas/ChatCompletionRequest" },
            },
          },
        },
        responses: {
          "200": {
            description: "Successful completion",
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/ChatCompletionResponse" },
              },
              "text/event-stream": {
                schema: {
                  type: "string",
                  description: "SSE stream of completion chunks",
                },
              },
            },
          },
          "400": errorResponse("Invalid request"),
          "401": errorResponse("Missing or invalid API key"),
          "503": errorResponse("Model not loaded or reloading"),
          "504": errorResponse("Generation timed out"),
        },
      },
    },
    "/v1/models": {
      get: {
        operationId: "listModels",
        summary: "List available models",
        description: "Returns the single model served by this instance.",
        tags: ["OpenAI Compatible"],
        security: [{ bearerAuth: [] }],
        responses: {
          "200": {
            description: "List of models",
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/ModelListResponse" },
              },
            },
          },
          "401": errorResponse("Missing or invalid API key"),
        },
      },
    },
    "/v1/models/{id}": {
      get: {
        operationId: "getModel",
        summary: "Get model details",
        tags: ["OpenAI Compatible"],
        security: [{ bearerAuth: [] }],
        parameters: [
          {
            name: "id",
            in: "path",
            required: true,
            schema: { type: "string" },
            description: "Model ID",
          },
        ],
        responses: {
          "200": {
            description: "Model details",
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/ModelInfo" },
              },
            },
          },
          "404": errorResponse("Model not found"),
        },
      },
    },
    "/admin/info": {
      get: {
        operationId: "adminInfo",
        summary: "Engine and process diagnostics",
        tags: ["Admin"],
        security: [{ bearerAuth: [] }],
        responses: {
          "200": { description: "Diagnostics" },
          "401": errorResponse("Missing or invalid API key"),
          "403": errorResponse("Admin key required"),
        },
      },
    },
    "/admin/reload": {
      post: {
        operationId: "adminReload",
        summary: "Reload the model",
        description: "Loads the model again, optionally with new options. The current model keeps serving if loading fails.",
        tags: ["Admin"],
        security: [{ bearerAuth: [] }],
        requestBody: {
          required: false,
          content: {
            "application/json": {
              schema: { $ref: "#/components/schemas/ReloadRequest" },
            },
          },
        },
        responses: {
          "200": { description: "Model reloaded" },
          "400": errorResponse("Invalid reload options"),
          "403": errorResponse("Admin key required"),
          "500": errorResponse("Model failed to load, previous model retained"),
        },
      },
    },
    "/health": {
      get: {
        operationId: "health",
        summary: "Health summary",
        description: "Always 200; status is degraded while no model is serving.",
        tags: ["Health"],
        responses: { "200": { description: "Health summary" } },
      },
    },
    "/health/live": {
      get: {
        operationId: "healthLive",
        summary: "Liveness check",
        tags: ["Health"],
        responses: { "200": { description: "Service is alive" } },
      },
    },
    "/health/ready": {
      get: {
        operationId: "healthReady",
        summary: "Readiness check",
        tags: ["Health"],
        responses: {
          "200": { description: "Model loaded and serving" },
          "503": { description: "Model not ready" },
        },
      },
    },
  },
  components: {
    securitySchemes: {
      bearerAuth: {
        type: "http",
        scheme: "bearer",
      },
    },
    schemas: {
      ChatMessage: {
        type: "object",
        required: ["role", "content"],
        properties: {
          role: { type: "string", enum: ["system", "user", "assistant"] },
          content: { type: "string" },
        },
      },
      ChatCompletionRequest: {
        type: "object",
        required: ["messages"],
        properties: {
          model: { type: "string", description: "Accepted for compatibility; the served model is always used" },
          messages: { type: "array", minItems: 1, items: { $ref: "#/components/schemas/ChatMessage" } },
          temperature: { type: "number", minimum: 0, maximum: 2, default: 0.7 },
          max_tokens: { type: "integer", minimum: 1, default: 500 },
          top_p: { type: "number", minimum: 0, maximum: 1, default: 1 },
          stop: {
            oneOf: [{ type: "string" }, { type: "array", items: { type: "string" }, maxItems: 4 }],
          },
          seed: { type: "integer" },
          stream: { type: "boolean", default: false },
        },
      },
      ChatCompletionResponse: {
        type: "object",
        properties: {
          id: { type: "string" },
          object: { type: "string", enum: ["chat.completion"] },
          created: { type: "integer" },
          model: { type: "string" },
          choices: {
            type: "array",
            items: {
              type: "object",
              properties: {
                index: { type: "integer" },
                message: { $ref: "#/components/schemas/ChatMessage" },
                finish_reason: { type: "string", enum: ["stop", "length"] },
              },
            },
          },
          usage: {
            type: "object",
            properties: {
              prompt_tokens: { type: "integer" },
              completion_tokens: { type: "integer" },
              total_tokens: { type: "integer" },
            },
          },
        },
      },
      ModelInfo: {
        type: "object",
        properties: {
          id: { type: "string" },
          object: { type: "string", enum: ["model"] },
          created: { type: "integer" },
          owned_by: { type: "string" },
          context_length: { type: "integer" },
          status: { type: "string", enum: ["unloaded", "loading", "ready", "failed"] },
        },
      },
      ModelListResponse: {
        type: "object",
        properties: {
          object: { type: "string", enum: ["list"] },
          data: { type: "array", items: { $ref: "#/components/schemas/ModelInfo" } },
        },
      },
      ReloadRequest: {
        type: "object",
        properties: {
          model_path: { type: "string" },
          n_ctx: { type: "integer", minimum: 1 },
          n_batch: { type: "integer", minimum: 1 },
          n_gpu_layers: { type: "integer", minimum: -1 },
          n_threads: { type: "integer", minimum: 1 },
          use_mlock: { type: "boolean" },
          use_mmap: { type: "boolean" },
        },
      },
      ErrorResponse: {
        type: "object",
        properties: {
          error: {
            type: "object",
            properties: {
              message: { type: "string" },
              type: { type: "string" },
              code: { type: ["string", "null"] },
              details: {},
            },
          },
        },
      },
    },
  },
};
