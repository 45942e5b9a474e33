import type {
  GenerationHooks,
  GenerationOutcome,
  GenerationParams,
  InferenceBackend,
  LoadOptions,
  LoadedModel,
} from "../../inference/server/src/llama/backend.js";

export const DEFAULT_REPLY = "Hello from the scripted model.";

export interface Script {
  /** Reply text for a rendered prompt; split into tokens before each whitespace */
  respond: (prompt: string, params: GenerationParams) => string;
  /** Delay before each token */
  tokenDelayMs: number;
  /** Generate waits until aborted */
  hang: boolean;
  /** Generate throws this */
  error: Error | null;
}

export interface RecordedGeneration {
  prompt: string;
  params: GenerationParams;
}

export function tokenize(text: string): string[] {
  return text.split(/(?=\s)/).filter((piece) => piece.length > 0);
}

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}

export class ScriptedModel implements LoadedModel {
  disposed = false;

  constructor(
    private readonly backend: ScriptedBackend,
    readonly options: LoadOptions
  ) {}

  get contextSize(): number {
    return this.options.contextSize;
  }

  async generate(prompt: string, params: GenerationParams, hooks: GenerationHooks): Promise<GenerationOutcome> {
    if (this.disposed) throw new Error("model used after dispose");

    const backend = this.backend;
    const script = backend.script;
    backend.generations.push({ prompt, params });
    backend.active++;
    backend.maxActive = Math.max(backend.maxActive, backend.active);

    const promptTokens = prompt.length;
    let text = "";
    let completionTokens = 0;
    const outcome = (stopReason: GenerationOutcome["stopReason"]): GenerationOutcome => ({
      text,
      stopReason,
      promptTokens,
      completionTokens,
    });

    try {
      if (script.error) throw script.error;
      if (script.hang) {
        await waitForAbort(hooks.signal);
        return outcome("abort");
      }

      for (const piece of tokenize(script.respond(prompt, params))) {
        if (completionTokens >= params.maxTokens) return outcome("length");
        await pause(script.tokenDelayMs);
        if (hooks.signal.aborted) return outcome("abort");
        text += piece;
        completionTokens++;
        hooks.onTextChunk?.(piece);
      }
      return outcome("stop");
    } finally {
      backend.active--;
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    this.backend.disposed.push(this.options.modelPath);
  }
}

/**
 * In-process InferenceBackend whose output and failures are scripted by the test
 */
export class ScriptedBackend implements InferenceBackend {
  readonly name = "scripted";

  script: Script = {
    respond: () => DEFAULT_REPLY,
    tokenDelayMs: 0,
    hang: false,
    error: null,
  };

  /** Paths whose load fails */
  readonly failingPaths = new Set<string>();
  /** Milliseconds each load takes */
  loadDelayMs = 0;

  readonly loads: LoadOptions[] = [];
  readonly models: ScriptedModel[] = [];
  readonly disposed: string[] = [];
  readonly generations: RecordedGeneration[] = [];
  active = 0;
  maxActive = 0;

  async load(options: LoadOptions): Promise<LoadedModel> {
    this.loads.push(options);
    if (this.loadDelayMs > 0) await pause(this.loadDelayMs);
    if (this.failingPaths.has(options.modelPath)) {
      throw new Error("invalid GGUF header");
    }
    const model = new ScriptedModel(this, options);
    this.models.push(model);
    return model;
  }
}
