/**
 * Chat completion request validation (OpenAI-compatible subset)
 */

import { z } from "zod";
import { InvalidRequestError } from "../errors.js";

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 500;
export const DEFAULT_TOP_P = 1;

export const chatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export function createChatCompletionRequestSchema(maxTokensCeiling: number) {
  return z.object({
    model: z.string().optional(),
    messages: z.array(chatMessageSchema).min(1, "messages must contain at least one message"),
    temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
    max_tokens: z
      .number()
      .int()
      .min(1)
      .max(maxTokensCeiling, `max_tokens must not exceed ${maxTokensCeiling}`)
      .default(Math.min(DEFAULT_MAX_TOKENS, maxTokensCeiling)),
    top_p: z.number().min(0).max(1).default(DEFAULT_TOP_P),
    stop: z.union([z.string(), z.array(z.string()).max(4)]).optional(),
    seed: z.number().int().optional(),
    stream: z.boolean().default(false),
  });
}

export type ChatCompletionRequest = z.infer<ReturnType<typeof createChatCompletionRequestSchema>>;

/**
 * Validate a request body. max_tokens is bounded by the smaller of the
 * configured ceiling and the loaded context size.
 */
export function parseChatCompletionRequest(body: unknown, maxTokensCeiling: number): ChatCompletionRequest {
  const parsed = createChatCompletionRequestSchema(maxTokensCeiling).safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join(".")}: ` : "";
    throw new InvalidRequestError(`Invalid request body: ${where}${first ? first.message : "invalid"}`, parsed.error.issues);
  }
  return parsed.data;
}

export function normalizeStop(stop: ChatCompletionRequest["stop"]): string[] {
  if (stop === undefined) return [];
  const list = typeof stop === "string" ? [stop] : stop;
  return list.filter((sequence) => sequence.length > 0);
}
