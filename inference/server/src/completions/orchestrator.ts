/**
 * Completion Orchestrator
 *
 * Turns validated chat requests into engine generations:
 * - renders messages with the configured chat template
 * - leases the current model from the Engine Handle (fails fast when not ready)
 * - limits concurrent generations with a FIFO semaphore
 * - enforces the per-request timeout and caller cancellation
 * - buffered results via complete(), incremental deltas via stream()
 */

import { createLogger } from "@llamahost/http";
import type { Telemetry } from "@llamahost/telemetry";
import type { EngineHandle, ModelLease } from "../llama/handle.js";
import type { GenerationOutcome, GenerationParams } from "../llama/backend.js";
import { ApiError } from "@llamahost/http";
import { EngineError, GenerationTimeoutError, describeError } from "../errors.js";
import { createSemaphore, type Semaphore } from "../util/async.js";
import type { ChatTemplate } from "./chat-template.js";
import { normalizeStop, parseChatCompletionRequest, type ChatCompletionRequest } from "./schema.js";
import { createChunkQueue } from "./chunk-queue.js";

const logger = createLogger("completions");

export type FinishReason = "stop" | "length";

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  content: string;
  finishReason: FinishReason;
  usage: CompletionUsage;
  /** True when the caller cancelled before generation finished */
  cancelled: boolean;
}

export type StreamEvent =
  | { type: "delta"; text: string }
  | { type: "done"; finishReason: FinishReason; usage: CompletionUsage };

export interface RunOptions {
  /** Caller cancellation, e.g. client disconnect */
  signal?: AbortSignal;
}

export interface OrchestratorOptions {
  handle: EngineHandle;
  template: ChatTemplate;
  timeoutMs: number;
  maxTokensLimit: number;
  maxConcurrentGenerations: number;
  telemetry?: Telemetry;
}

export interface OrchestratorStats {
  activeGenerations: number;
  queuedGenerations: number;
}

class CancelledError extends Error {
  constructor() {
    super("Generation cancelled by caller");
    this.name = "CancelledError";
  }
}

export class CompletionOrchestrator {
  private readonly handle: EngineHandle;
  private readonly template: ChatTemplate;
  private readonly timeoutMs: number;
  private readonly maxTokensLimit: number;
  private readonly slots: Semaphore;
  private readonly capacity: number;
  private readonly telemetry?: Telemetry;

  constructor(options: OrchestratorOptions) {
    this.handle = options.handle;
    this.template = options.template;
    this.timeoutMs = options.timeoutMs;
    this.maxTokensLimit = options.maxTokensLimit;
    this.capacity = options.maxConcurrentGenerations;
    this.slots = createSemaphore(options.maxConcurrentGenerations);
    this.telemetry = options.telemetry;
  }

  /**
   * Validate a raw request body. Never touches the engine.
   */
  parse(body: unknown): ChatCompletionRequest {
    const ceiling = Math.min(this.maxTokensLimit, this.handle.getOptions().contextSize);
    return parseChatCompletionRequest(body, ceiling);
  }

  render(request: ChatCompletionRequest): string {
    return this.template.render(request.messages);
  }

  stats(): OrchestratorStats {
    return {
      activeGenerations: this.capacity - this.slots.available,
      queuedGenerations: this.slots.waiting,
    };
  }

  /**
   * Generate the whole completion and return it once
   */
  async complete(request: ChatCompletionRequest, options: RunOptions = {}): Promise<CompletionResult> {
    const lease = this.handle.acquire();
    try {
      const outcome = await this.run(lease, request, options.signal);
      return toResult(outcome);
    } finally {
      lease.release();
    }
  }

  /**
   * Start a streamed completion. The model lease is taken immediately, so a
   * ServiceUnavailableError is thrown here rather than during iteration.
   * Generation begins on the first pull; leaving the loop early (break,
   * return, throw) aborts it and releases the lease and generation slot.
   */
  stream(request: ChatCompletionRequest, options: RunOptions = {}): AsyncGenerator<StreamEvent> {
    const lease = this.handle.acquire();
    return this.streamWithLease(lease, request, options.signal);
  }

  private async *streamWithLease(
    lease: ModelLease,
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<StreamEvent> {
    const consumer = new AbortController();
    const onCallerAbort = () => consumer.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const queue = createChunkQueue();
    let settled = false;
    const generation = this.run(lease, request, consumer.signal, (text) => queue.push(text)).then(
      (outcome) => {
        settled = true;
        queue.close();
        return outcome;
      },
      (err: unknown) => {
        settled = true;
        queue.fail(err);
        throw err;
      }
    );
    // Failures reach the consumer through the queue
    generation.catch(() => undefined);

    try {
      for await (const text of queue) {
        yield { type: "delta", text };
      }
      const outcome = await generation;
      const result = toResult(outcome);
      yield { type: "done", finishReason: result.finishReason, usage: result.usage };
    } finally {
      signal?.removeEventListener("abort", onCallerAbort);
      if (!settled) {
        consumer.abort();
        await generation.then(
          () => logger.debug("Stream closed early, generation stopped"),
          (err: unknown) => logger.debug(`Stream closed early, generation ended with: ${describeError(err)}`)
        );
      }
      lease.release();
    }
  }

  /**
   * One generation against a leased model: slot wait, timeout, cancellation
   * and error mapping. Resolves with stopReason "abort" on caller cancellation.
   */
  private async run(
    lease: ModelLease,
    request: ChatCompletionRequest,
    signal: AbortSignal | undefined,
    onTextChunk?: (text: string) => void
  ): Promise<GenerationOutcome> {
    const started = Date.now();
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new GenerationTimeoutError(this.timeoutMs));
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort(new CancelledError());
    if (signal?.aborted) {
      onCallerAbort();
    } else {
      signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    const prompt = this.render(request);
    const params: GenerationParams = {
      maxTokens: request.max_tokens,
      temperature: request.temperature,
      topP: request.top_p,
      stop: [...this.template.stop, ...normalizeStop(request.stop)],
      seed: request.seed,
    };

    let outcomeLabel = "ok";
    let releaseSlot: (() => void) | null = null;
    try {
      try {
        releaseSlot = await this.slots.acquire(controller.signal);
      } catch {
        if (timedOut) throw new GenerationTimeoutError(this.timeoutMs);
        return { text: "", stopReason: "abort", promptTokens: 0, completionTokens: 0 };
      }

      let outcome: GenerationOutcome;
      try {
        outcome = await lease.model.generate(prompt, params, {
          signal: controller.signal,
          onTextChunk,
        });
      } catch (err) {
        if (timedOut) throw new GenerationTimeoutError(this.timeoutMs);
        if (controller.signal.aborted) {
          return { text: "", stopReason: "abort", promptTokens: 0, completionTokens: 0 };
        }
        if (err instanceof ApiError) throw err;
        logger.error("Engine failure during generation", err);
        throw new EngineError(describeError(err));
      }

      if (timedOut) throw new GenerationTimeoutError(this.timeoutMs);

      this.telemetry?.metric("inference.tokens.completion", outcome.completionTokens);
      if (outcome.stopReason === "abort") outcomeLabel = "cancelled";
      return outcome;
    } catch (err) {
      outcomeLabel = err instanceof GenerationTimeoutError ? "timeout" : "error";
      throw err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
      releaseSlot?.();
      const durationMs = Date.now() - started;
      this.telemetry?.metric("inference.generation.count", 1, { outcome: outcomeLabel });
      this.telemetry?.metric("inference.generation.latency_ms", durationMs, { outcome: outcomeLabel });
      logger.debug(`Generation ${outcomeLabel} in ${durationMs}ms`);
    }
  }
}

function toResult(outcome: GenerationOutcome): CompletionResult {
  return {
    content: outcome.text,
    finishReason: outcome.stopReason === "length" ? "length" : "stop",
    usage: {
      promptTokens: outcome.promptTokens,
      completionTokens: outcome.completionTokens,
      totalTokens: outcome.promptTokens + outcome.completionTokens,
    },
    cancelled: outcome.stopReason === "abort",
  };
}
