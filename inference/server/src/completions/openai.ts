/**
 * OpenAI wire shapes for chat completions
 */

import { randomUUID } from "crypto";
import type { CompletionResult, CompletionUsage, FinishReason } from "./orchestrator.js";

export interface UsageBody {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionBody {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: Array<{
    index: 0;
    message: { role: "assistant"; content: string };
    finish_reason: FinishReason;
  }>;
  usage: UsageBody;
}

export interface ChatCompletionChunkBody {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: Array<{
    index: 0;
    delta: { role?: "assistant"; content?: string };
    finish_reason: FinishReason | null;
  }>;
  usage?: UsageBody;
}

export function createCompletionId(): string {
  return `chatcmpl-${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function unixSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}

export function toUsageBody(usage: CompletionUsage): UsageBody {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

export function toChatCompletion(id: string, model: string, result: CompletionResult): ChatCompletionBody {
  return {
    id,
    object: "chat.completion",
    created: unixSeconds(),
    model,
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: result.content },
        finish_reason: result.finishReason,
      },
    ],
    usage: toUsageBody(result.usage),
  };
}

/**
 * Builds the chunks of one stream; id and created stay fixed across them
 */
export function createChunkFactory(id: string, model: string) {
  const created = unixSeconds();

  function chunk(
    delta: ChatCompletionChunkBody["choices"][number]["delta"],
    finishReason: FinishReason | null,
    usage?: CompletionUsage
  ): ChatCompletionChunkBody {
    return {
      id,
      object: "chat.completion.chunk",
      created,
      model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
      ...(usage ? { usage: toUsageBody(usage) } : {}),
    };
  }

  return {
    role: () => chunk({ role: "assistant" }, null),
    content: (text: string) => chunk({ content: text }, null),
    finish: (finishReason: FinishReason, usage: CompletionUsage) => chunk({}, finishReason, usage),
  };
}
