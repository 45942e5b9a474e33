/**
 * Model listing handlers (OpenAI-compatible format)
 */

import type { Request, Response } from "express";
import type { ServiceContext } from "../context.js";
import { NotFoundError } from "../errors.js";
import { unixSeconds } from "../completions/openai.js";

export interface ModelBody {
  id: string;
  object: "model";
  created: number;
  owned_by: string;
  context_length: number;
  status: string;
}

function describeModel(ctx: ServiceContext): ModelBody {
  const info = ctx.handle.info();
  return {
    id: ctx.config.modelName,
    object: "model",
    created: unixSeconds(info.loadedAt ? new Date(info.loadedAt) : ctx.startedAt),
    owned_by: "local",
    context_length: info.contextSize,
    status: info.state,
  };
}

export function createModelHandlers(ctx: ServiceContext) {
  return {
    list(_req: Request, res: Response): void {
      res.json({ object: "list", data: [describeModel(ctx)] });
    },

    get(req: Request, res: Response): void {
      const { id } = req.params;
      if (id !== ctx.config.modelName) {
        throw new NotFoundError(`Model '${id}' not found`, "model_not_found");
      }
      res.json(describeModel(ctx));
    },
  };
}
