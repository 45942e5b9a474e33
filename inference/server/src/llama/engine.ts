/**
 * LLM Engine - node-llama-cpp binding
 *
 * Implements InferenceBackend on top of node-llama-cpp:
 * - one shared Llama runtime, initialized lazily
 * - one context per loaded model, sized for the configured number of
 *   concurrent sequences
 * - raw prompt completion (the chat template is applied by the service)
 */

import {
  getLlama,
  LlamaCompletion,
  type Llama,
  type LlamaContext,
  type LlamaModel,
} from "node-llama-cpp";
import { createLogger } from "@llamahost/http";
import type {
  GenerationHooks,
  GenerationOutcome,
  GenerationParams,
  InferenceBackend,
  LoadOptions,
  LoadedModel,
  StopReason,
} from "./backend.js";

const logger = createLogger("llama");

class LlamaLoadedModel implements LoadedModel {
  constructor(
    private readonly model: LlamaModel,
    private readonly context: LlamaContext
  ) {}

  get contextSize(): number {
    return this.context.contextSize;
  }

  async generate(
    prompt: string,
    params: GenerationParams,
    hooks: GenerationHooks
  ): Promise<GenerationOutcome> {
    // Template markers must map to their special tokens
    const promptTokens = this.model.tokenize(prompt, true);

    const sequence = this.context.getSequence();
    const completion = new LlamaCompletion({ contextSequence: sequence });
    let completionTokens = 0;

    try {
      const { response, metadata } = await completion.generateCompletionWithMeta(promptTokens, {
        maxTokens: params.maxTokens,
        temperature: params.temperature,
        topP: params.topP,
        seed: params.seed,
        customStopTriggers: params.stop,
        signal: hooks.signal,
        stopOnAbortSignal: true,
        onTextChunk: hooks.onTextChunk,
        onToken: (tokens) => {
          completionTokens += tokens.length;
        },
      });

      let stopReason: StopReason = "stop";
      if (metadata.stopReason === "maxTokens") {
        stopReason = "length";
      } else if (metadata.stopReason === "abort") {
        stopReason = "abort";
      }

      return {
        text: response,
        stopReason,
        promptTokens: promptTokens.length,
        completionTokens,
      };
    } finally {
      completion.dispose();
      await sequence.dispose();
    }
  }

  async dispose(): Promise<void> {
    try {
      await this.context.dispose();
    } finally {
      await this.model.dispose();
    }
  }
}

class LlamaBackend implements InferenceBackend {
  readonly name = "node-llama-cpp";
  private initializing: Promise<Llama> | null = null;

  /**
   * Initialize the llama.cpp runtime once
   */
  private runtime(): Promise<Llama> {
    if (!this.initializing) {
      logger.info("Initializing llama.cpp...");
      this.initializing = getLlama().then((llama) => {
        logger.info(`llama.cpp initialized (gpu: ${llama.gpu || "none"})`);
        return llama;
      });
      this.initializing.catch(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  async load(options: LoadOptions): Promise<LoadedModel> {
    const llama = await this.runtime();

    const model = await llama.loadModel({
      modelPath: options.modelPath,
      gpuLayers: options.gpuLayers < 0 ? "max" : options.gpuLayers,
      useMmap: options.useMmap,
      useMlock: options.useMlock,
    });

    try {
      const context = await model.createContext({
        contextSize: options.contextSize,
        batchSize: options.batchSize,
        threads: options.threads,
        sequences: options.sequences,
      });
      return new LlamaLoadedModel(model, context);
    } catch (err) {
      await model.dispose();
      throw err;
    }
  }
}

export function createLlamaBackend(): InferenceBackend {
  return new LlamaBackend();
}
