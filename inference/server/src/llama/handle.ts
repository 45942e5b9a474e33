/**
 * Engine Handle - owns the single loaded model instance
 *
 * - load / reload / unload of exactly one model
 * - reload loads the replacement first and swaps only on success
 * - reloads are serialized; completions never wait on them
 * - requests hold a lease on the instance they started with, and a replaced
 *   instance is disposed once its last lease is released
 */

import { stat } from "fs/promises";
import { createLogger } from "@llamahost/http";
import type { Telemetry } from "@llamahost/telemetry";
import type { InferenceBackend, LoadedModel, ModelOptions } from "./backend.js";
import { ModelLoadError, ServiceUnavailableError, describeError } from "../errors.js";
import { createMutex } from "../util/async.js";

const logger = createLogger("llama");

export type EngineState = "unloaded" | "loading" | "ready" | "failed";

interface ModelInstance {
  model: LoadedModel;
  options: ModelOptions;
  loadedAt: Date;
  leases: number;
  retired: boolean;
}

export interface ModelLease {
  readonly model: LoadedModel;
  readonly options: ModelOptions;
  release(): void;
}

export interface EngineInfo {
  state: EngineState;
  ready: boolean;
  modelLoaded: boolean;
  backend: string;
  modelPath: string;
  contextSize: number;
  batchSize: number;
  gpuLayers: number;
  threads: number;
  useMlock: boolean;
  useMmap: boolean;
  loadedAt: string | null;
  reloadCount: number;
  activeLeases: number;
  lastError: string | null;
}

export interface ReloadResult {
  state: EngineState;
  options: ModelOptions;
  loadedAt: Date;
}

export interface EngineHandleOptions {
  backend: InferenceBackend;
  model: ModelOptions;
  /** Concurrent generations the loaded context must support */
  sequences: number;
  telemetry?: Telemetry;
}

export class EngineHandle {
  private readonly backend: InferenceBackend;
  private readonly sequences: number;
  private readonly telemetry?: Telemetry;
  private readonly reloadLock = createMutex();

  private options: ModelOptions;
  private current: ModelInstance | null = null;
  private state: EngineState = "unloaded";
  private reloadCount = 0;
  private lastError: string | null = null;

  constructor(options: EngineHandleOptions) {
    this.backend = options.backend;
    this.options = { ...options.model };
    this.sequences = options.sequences;
    this.telemetry = options.telemetry;
  }

  /**
   * Initial load from the configured options. A failure leaves the handle
   * in the "failed" state and is meant to abort startup.
   */
  async load(): Promise<void> {
    await this.reloadLock.runExclusive(async () => {
      this.state = "loading";
      try {
        const instance = await this.open(this.options);
        this.swap(instance);
      } catch (err) {
        this.state = "failed";
        this.lastError = describeError(err);
        throw err;
      }
    });
  }

  /**
   * Replace the loaded model, optionally with new options. On failure the
   * previous instance and options stay in service.
   */
  async reload(overrides: Partial<ModelOptions> = {}): Promise<ReloadResult> {
    return this.reloadLock.runExclusive(async () => {
      const next: ModelOptions = { ...this.options, ...overrides };
      const previousState = this.state;
      this.state = "loading";
      logger.info(`Reloading model from ${next.modelPath}`);

      try {
        const instance = await this.open(next);
        this.swap(instance);
        this.reloadCount++;
        this.telemetry?.metric("inference.reload.count", 1, { outcome: "success" });
        logger.info(`Model reloaded: ${next.modelPath}`);
        return { state: this.state, options: { ...instance.options }, loadedAt: instance.loadedAt };
      } catch (err) {
        this.state = this.current ? "ready" : previousState === "unloaded" ? "unloaded" : "failed";
        this.lastError = describeError(err);
        this.telemetry?.metric("inference.reload.count", 1, { outcome: "failure" });
        logger.warn(`Reload failed, keeping previous model: ${this.lastError}`);
        throw err;
      }
    });
  }

  /**
   * Dispose the loaded model. In-flight leases finish first.
   */
  async unload(): Promise<void> {
    await this.reloadLock.runExclusive(async () => {
      const instance = this.current;
      this.current = null;
      this.state = "unloaded";
      if (instance) {
        logger.info(`Unloading model: ${instance.options.modelPath}`);
        await this.retire(instance);
      }
    });
  }

  isReady(): boolean {
    return this.state === "ready" && this.current !== null;
  }

  getState(): EngineState {
    return this.state;
  }

  /**
   * Options of the serving model (or of the next load when none is loaded)
   */
  getOptions(): ModelOptions {
    return { ...this.options };
  }

  /**
   * Lease the current instance for one generation.
   * Throws ServiceUnavailableError unless the handle is ready.
   */
  acquire(): ModelLease {
    const instance = this.current;
    if (this.state !== "ready" || !instance) {
      throw new ServiceUnavailableError(
        this.state === "loading" ? "Model is reloading, retry shortly" : "Model is not loaded"
      );
    }

    instance.leases++;
    let released = false;
    return {
      model: instance.model,
      options: { ...instance.options },
      release: () => {
        if (released) return;
        released = true;
        instance.leases--;
        if (instance.retired && instance.leases === 0) {
          this.disposeInstance(instance).catch((err) => logger.error("Failed to dispose retired model", err));
        }
      },
    };
  }

  info(): EngineInfo {
    const instance = this.current;
    return {
      state: this.state,
      ready: this.isReady(),
      modelLoaded: instance !== null,
      backend: this.backend.name,
      modelPath: this.options.modelPath,
      contextSize: this.options.contextSize,
      batchSize: this.options.batchSize,
      gpuLayers: this.options.gpuLayers,
      threads: this.options.threads,
      useMlock: this.options.useMlock,
      useMmap: this.options.useMmap,
      loadedAt: instance ? instance.loadedAt.toISOString() : null,
      reloadCount: this.reloadCount,
      activeLeases: instance ? instance.leases : 0,
      lastError: this.lastError,
    };
  }

  private async open(options: ModelOptions): Promise<ModelInstance> {
    const { modelPath } = options;

    let isFile = false;
    try {
      isFile = (await stat(modelPath)).isFile();
    } catch {
      throw new ModelLoadError(modelPath, "model file not found");
    }
    if (!isFile) {
      throw new ModelLoadError(modelPath, "path is not a file");
    }

    logger.info(
      `Loading model from ${modelPath} (ctx=${options.contextSize}, batch=${options.batchSize}, gpuLayers=${options.gpuLayers})`
    );
    const started = Date.now();

    let model: LoadedModel;
    try {
      model = await this.backend.load({ ...options, sequences: this.sequences });
    } catch (err) {
      throw new ModelLoadError(modelPath, describeError(err));
    }

    logger.info(`Model loaded in ${Date.now() - started}ms: ${modelPath}`);
    this.telemetry?.event("model.loaded", `Model loaded: ${modelPath}`, {
      modelPath,
      durationMs: Date.now() - started,
    });

    return { model, options: { ...options }, loadedAt: new Date(), leases: 0, retired: false };
  }

  private swap(instance: ModelInstance): void {
    const previous = this.current;
    this.current = instance;
    this.options = { ...instance.options };
    this.state = "ready";
    this.lastError = null;
    if (previous) {
      this.retire(previous).catch((err) => logger.error("Failed to dispose replaced model", err));
    }
  }

  private async retire(instance: ModelInstance): Promise<void> {
    instance.retired = true;
    if (instance.leases === 0) {
      await this.disposeInstance(instance);
    } else {
      logger.info(`Deferring disposal of ${instance.options.modelPath} until ${instance.leases} generation(s) finish`);
    }
  }

  private async disposeInstance(instance: ModelInstance): Promise<void> {
    await instance.model.dispose();
    logger.debug(`Disposed model: ${instance.options.modelPath}`);
  }
}
