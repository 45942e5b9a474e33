import { Command, InvalidArgumentError } from "commander";
import type { ServiceClient } from "../client.js";
import { detail, error, json, success } from "../output.js";

interface HealthBody {
  status: string;
  state?: string;
  model_loaded?: boolean;
}

interface InfoBody {
  model_name: string;
  version: string;
  uptime_seconds: number;
  engine: {
    state: string;
    model_path: string;
    n_ctx: number;
    loaded_at: string | null;
    reload_count: number;
    last_error: string | null;
  };
  generations: { active: number; queued: number };
}

interface ReloadBody {
  status: string;
  state: string;
  model_path: string;
}

interface CompletionBody {
  choices: Array<{ message: { content: string }; finish_reason: string }>;
  usage: { prompt_tokens: number; completion_tokens: number };
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

function fail(message: string | undefined): void {
  error(message || "Request failed");
  process.exitCode = 1;
}

export function registerServiceCommands(program: Command, getClient: () => ServiceClient): void {
  program
    .command("health")
    .description("Check service health")
    .action(async () => {
      const res = await getClient().request<HealthBody>("GET", "/health");
      if (!res.ok || !res.data) {
        fail(res.error);
        return;
      }
      detail("Status", res.data.status);
      detail("Engine", res.data.state);
      detail("Model loaded", res.data.model_loaded);
    });

  program
    .command("info")
    .description("Show engine diagnostics (admin key)")
    .option("--json", "Print the raw response")
    .action(async (opts: { json?: boolean }) => {
      const res = await getClient().request<InfoBody>("GET", "/admin/info");
      if (!res.ok || !res.data) {
        fail(res.error);
        return;
      }
      if (opts.json) {
        json(res.data);
        return;
      }
      const body = res.data;
      detail("Model", body.model_name);
      detail("Version", body.version);
      detail("Uptime", `${body.uptime_seconds}s`);
      detail("State", body.engine.state);
      detail("Path", body.engine.model_path);
      detail("Context", body.engine.n_ctx);
      detail("Loaded at", body.engine.loaded_at);
      detail("Reloads", body.engine.reload_count);
      detail("Last error", body.engine.last_error);
      detail("Generations", `${body.generations.active} active, ${body.generations.queued} queued`);
    });

  program
    .command("reload")
    .description("Reload the model, optionally with new options (admin key)")
    .option("--model-path <path>", "GGUF file to load")
    .option("--n-ctx <n>", "Context size", parseInteger)
    .option("--n-gpu-layers <n>", "GPU layers (-1 for all)", parseInteger)
    .option("--n-threads <n>", "CPU threads", parseInteger)
    .action(async (opts: { modelPath?: string; nCtx?: number; nGpuLayers?: number; nThreads?: number }) => {
      const body = {
        model_path: opts.modelPath,
        n_ctx: opts.nCtx,
        n_gpu_layers: opts.nGpuLayers,
        n_threads: opts.nThreads,
      };
      const res = await getClient().request<ReloadBody>("POST", "/admin/reload", body);
      if (!res.ok || !res.data) {
        fail(res.error);
        return;
      }
      success(`Reloaded ${res.data.model_path} (${res.data.state})`);
    });

  program
    .command("chat")
    .description("Send one chat message")
    .argument("<message...>", "User message")
    .option("-s, --system <prompt>", "System prompt")
    .option("--max-tokens <n>", "Maximum tokens to generate", parseInteger)
    .option("-t, --temperature <t>", "Sampling temperature", parseNumber)
    .option("--stream", "Print tokens as they arrive")
    .action(async (words: string[], opts: { system?: string; maxTokens?: number; temperature?: number; stream?: boolean }) => {
      const messages = [
        ...(opts.system ? [{ role: "system", content: opts.system }] : []),
        { role: "user", content: words.join(" ") },
      ];
      const body = { messages, max_tokens: opts.maxTokens, temperature: opts.temperature };

      if (opts.stream) {
        const res = await getClient().streamChat(body, (text) => process.stdout.write(text));
        process.stdout.write("\n");
        if (!res.ok) fail(res.error);
        return;
      }

      const res = await getClient().request<CompletionBody>("POST", "/v1/chat/completions", body);
      if (!res.ok || !res.data) {
        fail(res.error);
        return;
      }
      const [choice] = res.data.choices;
      console.log(choice ? choice.message.content : "");
    });
}
