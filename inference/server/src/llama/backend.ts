/**
 * Contract between the service layer and an inference engine binding.
 * The node-llama-cpp adapter in ./engine.ts is the production backend.
 */

export interface ModelOptions {
  modelPath: string;
  contextSize: number;
  batchSize: number;
  /** -1 offloads every layer */
  gpuLayers: number;
  threads: number;
  useMlock: boolean;
  useMmap: boolean;
}

export interface LoadOptions extends ModelOptions {
  /** Number of generations the loaded context must serve at once */
  sequences: number;
}

export interface GenerationParams {
  maxTokens: number;
  temperature: number;
  topP: number;
  stop: string[];
  seed?: number;
}

export interface GenerationHooks {
  signal: AbortSignal;
  onTextChunk?: (text: string) => void;
}

export type StopReason = "stop" | "length" | "abort";

export interface GenerationOutcome {
  text: string;
  stopReason: StopReason;
  promptTokens: number;
  completionTokens: number;
}

export interface LoadedModel {
  readonly contextSize: number;
  /**
   * Generate a completion of a fully rendered prompt. Aborting the signal
   * stops generation and resolves with stopReason "abort".
   */
  generate(prompt: string, params: GenerationParams, hooks: GenerationHooks): Promise<GenerationOutcome>;
  dispose(): Promise<void>;
}

export interface InferenceBackend {
  readonly name: string;
  load(options: LoadOptions): Promise<LoadedModel>;
}
