/**
 * Chat completions handler - OpenAI-compatible API
 */

import type { NextFunction, Request, Response } from "express";
import { ApiError, createLogger, type ErrorBody } from "@llamahost/http";
import type { ServiceContext } from "../context.js";
import { createChunkFactory, createCompletionId, toChatCompletion } from "../completions/openai.js";
import type { StreamEvent } from "../completions/orchestrator.js";
import type { ChatCompletionRequest } from "../completions/schema.js";
import { describeError } from "../errors.js";

const logger = createLogger("chat-completions");

function streamErrorBody(err: unknown): ErrorBody {
  if (err instanceof ApiError) return err.toJSON();
  return {
    error: {
      message: describeError(err),
      type: "server_error",
      code: null,
    },
  };
}

/** True once nothing more can reach the client */
function clientGone(res: Response): boolean {
  return res.destroyed || res.writableEnded || (res.socket?.destroyed ?? true);
}

/**
 * Write one SSE frame, waiting for the socket to drain when its buffer is
 * full. Frames for a client that has gone are dropped.
 */
async function writeEvent(res: Response, payload: string): Promise<void> {
  if (clientGone(res)) return;
  if (res.write(`data: ${payload}\n\n`)) return;
  if (clientGone(res)) return;
  await new Promise<void>((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

export function createChatCompletionsHandler(ctx: ServiceContext) {
  return async function handleChatCompletions(req: Request, res: Response, next: NextFunction): Promise<void> {
    // Invalid requests never reach the engine
    let request: ChatCompletionRequest;
    try {
      request = ctx.orchestrator.parse(req.body);
    } catch (err) {
      next(err);
      return;
    }

    const model = ctx.config.modelName;
    const id = createCompletionId();

    // Aborts generation when the client goes away
    const disconnect = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) disconnect.abort();
    });
    // The close event has already fired for a client that left while the body was read
    if (clientGone(res)) {
      disconnect.abort();
      logger.debug(`Client disconnected before ${id} started`);
      return;
    }

    if (!request.stream) {
      try {
        const result = await ctx.orchestrator.complete(request, { signal: disconnect.signal });
        if (result.cancelled || res.destroyed) {
          logger.debug(`Client disconnected before ${id} finished`);
          return;
        }
        res.json(toChatCompletion(id, model, result));
      } catch (err) {
        next(err);
      }
      return;
    }

    // Fails with 503 before any header is written when the model is not ready
    let events: AsyncGenerator<StreamEvent>;
    try {
      events = ctx.orchestrator.stream(request, { signal: disconnect.signal });
    } catch (err) {
      next(err);
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    const chunks = createChunkFactory(id, model);
    try {
      await writeEvent(res, JSON.stringify(chunks.role()));
      for await (const event of events) {
        if (disconnect.signal.aborted) break;
        if (event.type === "delta") {
          await writeEvent(res, JSON.stringify(chunks.content(event.text)));
        } else {
          await writeEvent(res, JSON.stringify(chunks.finish(event.finishReason, event.usage)));
        }
      }
      if (!disconnect.signal.aborted) {
        await writeEvent(res, "[DONE]");
      }
    } catch (err) {
      if (!(err instanceof ApiError)) {
        logger.error(`Streaming failed for ${id}`, err);
      }
      if (!res.destroyed) {
        await writeEvent(res, JSON.stringify(streamErrorBody(err)));
      }
    } finally {
      // Runs the stream's cleanup when the loop was left early
      await events.return(undefined);
      res.end();
    }
  };
}
