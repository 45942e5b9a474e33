import type { Telemetry } from "@llamahost/telemetry";
import type { Config } from "./config.js";
import type { EngineHandle } from "./llama/handle.js";
import type { CompletionOrchestrator } from "./completions/orchestrator.js";

/**
 * Everything a route handler needs, built once per server
 */
export interface ServiceContext {
  config: Config;
  handle: EngineHandle;
  orchestrator: CompletionOrchestrator;
  telemetry: Telemetry;
  startedAt: Date;
}
