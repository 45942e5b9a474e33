import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EngineHandle } from "../../inference/server/src/llama/handle.js";
import { CompletionOrchestrator, type StreamEvent } from "../../inference/server/src/completions/orchestrator.js";
import { getChatTemplate } from "../../inference/server/src/completions/chat-template.js";
import {
  EngineError,
  GenerationTimeoutError,
  InvalidRequestError,
  ServiceUnavailableError,
} from "../../inference/server/src/errors.js";
import { DEFAULT_REPLY, ScriptedBackend, tokenize } from "../helpers/scripted-backend.js";
import { createModelFiles, type ModelFiles } from "../helpers/service.js";

interface Setup {
  timeoutMs?: number;
  maxTokensLimit?: number;
  slots?: number;
  load?: boolean;
}

describe("CompletionOrchestrator", () => {
  let files: ModelFiles;
  let backend: ScriptedBackend;

  beforeEach(async () => {
    files = await createModelFiles();
    backend = new ScriptedBackend();
  });

  afterEach(async () => {
    await files.cleanup();
  });

  async function setup(options: Setup = {}) {
    const slots = options.slots ?? 1;
    const handle = new EngineHandle({
      backend,
      model: {
        modelPath: files.primary,
        contextSize: 1024,
        batchSize: 128,
        gpuLayers: 0,
        threads: 1,
        useMlock: false,
        useMmap: true,
      },
      sequences: slots,
    });
    if (options.load !== false) await handle.load();
    const orchestrator = new CompletionOrchestrator({
      handle,
      template: getChatTemplate("llama3"),
      timeoutMs: options.timeoutMs ?? 5000,
      maxTokensLimit: options.maxTokensLimit ?? 32000,
      maxConcurrentGenerations: slots,
    });
    return { handle, orchestrator };
  }

  async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
    const seen: StreamEvent[] = [];
    for await (const event of events) seen.push(event);
    return seen;
  }

  describe("parse", () => {
    it("applies defaults", async () => {
      const { orchestrator } = await setup();
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });
      expect(request).toEqual({
        messages: [{ role: "user", content: "Hi" }],
        temperature: 0.7,
        max_tokens: 500,
        top_p: 1,
        stream: false,
      });
    });

    it("rejects empty message lists", async () => {
      const { orchestrator } = await setup();
      expect(() => orchestrator.parse({ messages: [] })).toThrow(InvalidRequestError);
      expect(() => orchestrator.parse({ messages: [] })).toThrow(
        "Invalid request body: messages: messages must contain at least one message"
      );
    });

    it("enforces the temperature range", async () => {
      const { orchestrator } = await setup();
      const messages = [{ role: "user", content: "Hi" }];
      expect(orchestrator.parse({ messages, temperature: 0 }).temperature).toBe(0);
      expect(orchestrator.parse({ messages, temperature: 2 }).temperature).toBe(2);
      expect(() => orchestrator.parse({ messages, temperature: -0.1 })).toThrow(InvalidRequestError);
      expect(() => orchestrator.parse({ messages, temperature: 2.1 })).toThrow(InvalidRequestError);
    });

    it("bounds max_tokens by the smaller of the ceiling and the context size", async () => {
      const { orchestrator } = await setup({ maxTokensLimit: 4000 });
      const messages = [{ role: "user", content: "Hi" }];
      expect(orchestrator.parse({ messages, max_tokens: 1024 }).max_tokens).toBe(1024);
      expect(() => orchestrator.parse({ messages, max_tokens: 1025 })).toThrow("max_tokens must not exceed 1024");
      expect(() => orchestrator.parse({ messages, max_tokens: 0 })).toThrow(InvalidRequestError);
      expect(() => orchestrator.parse({ messages, max_tokens: 1.5 })).toThrow(InvalidRequestError);
    });

    it("lowers the default max_tokens to a small ceiling", async () => {
      const { orchestrator } = await setup({ maxTokensLimit: 100 });
      expect(orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] }).max_tokens).toBe(100);
    });

    it("rejects unknown roles and more than four stop sequences", async () => {
      const { orchestrator } = await setup();
      expect(() => orchestrator.parse({ messages: [{ role: "tool", content: "x" }] })).toThrow(InvalidRequestError);
      expect(() =>
        orchestrator.parse({ messages: [{ role: "user", content: "x" }], stop: ["a", "b", "c", "d", "e"] })
      ).toThrow(InvalidRequestError);
    });
  });

  describe("complete", () => {
    it("returns the whole completion with usage", async () => {
      const { orchestrator } = await setup();
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });
      const prompt = orchestrator.render(request);

      const result = await orchestrator.complete(request);

      expect(result).toEqual({
        content: DEFAULT_REPLY,
        finishReason: "stop",
        usage: {
          promptTokens: prompt.length,
          completionTokens: 5,
          totalTokens: prompt.length + 5,
        },
        cancelled: false,
      });
    });

    it("passes sampling options and the template stop marker to the engine", async () => {
      const { orchestrator } = await setup();
      const request = orchestrator.parse({
        messages: [{ role: "user", content: "Hi" }],
        temperature: 0.2,
        top_p: 0.9,
        stop: "END",
        seed: 42,
        max_tokens: 64,
      });

      await orchestrator.complete(request);

      expect(backend.generations[0].params).toEqual({
        maxTokens: 64,
        temperature: 0.2,
        topP: 0.9,
        stop: ["<|eot_id|>", "END"],
        seed: 42,
      });
    });

    it("reports length when max_tokens cuts the reply", async () => {
      const { orchestrator } = await setup();
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }], max_tokens: 2 });

      const result = await orchestrator.complete(request);

      expect(result.content).toBe("Hello from");
      expect(result.finishReason).toBe("length");
      expect(result.usage.completionTokens).toBe(2);
    });

    it("fails fast when no model is loaded", async () => {
      const { orchestrator } = await setup({ load: false });
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });
      await expect(orchestrator.complete(request)).rejects.toThrow(ServiceUnavailableError);
      expect(backend.generations).toEqual([]);
    });

    it("maps engine failures to EngineError and stays ready", async () => {
      const { handle, orchestrator } = await setup();
      backend.script.error = new Error("CUDA out of memory");
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      await expect(orchestrator.complete(request)).rejects.toThrow("Generation failed: CUDA out of memory");
      await expect(orchestrator.complete(request)).rejects.toThrow(EngineError);
      expect(handle.isReady()).toBe(true);
      expect(handle.info().activeLeases).toBe(0);
    });

    it("times out and frees the slot", async () => {
      const { handle, orchestrator } = await setup({ timeoutMs: 30 });
      backend.script.hang = true;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      await expect(orchestrator.complete(request)).rejects.toThrow(GenerationTimeoutError);
      expect(orchestrator.stats()).toEqual({ activeGenerations: 0, queuedGenerations: 0 });
      expect(handle.info().activeLeases).toBe(0);

      backend.script.hang = false;
      await expect(orchestrator.complete(request)).resolves.toMatchObject({ content: DEFAULT_REPLY });
    });

    it("counts queue wait toward the timeout", async () => {
      const { orchestrator } = await setup({ timeoutMs: 40 });
      backend.script.hang = true;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      const first = orchestrator.complete(request);
      const second = orchestrator.complete(request);

      await expect(first).rejects.toThrow("Generation exceeded 40ms");
      await expect(second).rejects.toThrow("Generation exceeded 40ms");
      expect(backend.generations).toHaveLength(1);
    });

    it("returns a cancelled result when the caller aborts", async () => {
      const { orchestrator } = await setup();
      backend.script.hang = true;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });
      const controller = new AbortController();

      const pending = orchestrator.complete(request, { signal: controller.signal });
      setTimeout(() => controller.abort(), 10);

      await expect(pending).resolves.toMatchObject({ cancelled: true, content: "" });
      expect(orchestrator.stats().activeGenerations).toBe(0);
    });

    it("runs generations one at a time with a single slot", async () => {
      const { orchestrator } = await setup();
      backend.script.tokenDelayMs = 2;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      await Promise.all([orchestrator.complete(request), orchestrator.complete(request), orchestrator.complete(request)]);

      expect(backend.maxActive).toBe(1);
      expect(backend.generations).toHaveLength(3);
    });

    it("overlaps generations up to the configured slot count", async () => {
      const { orchestrator } = await setup({ slots: 2 });
      backend.script.tokenDelayMs = 5;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      await Promise.all([orchestrator.complete(request), orchestrator.complete(request), orchestrator.complete(request)]);

      expect(backend.maxActive).toBe(2);
    });
  });

  describe("stream", () => {
    it("yields every token then a done event", async () => {
      const { orchestrator } = await setup();
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }], stream: true });
      const prompt = orchestrator.render(request);

      const events = await collect(orchestrator.stream(request));

      expect(events).toEqual([
        ...tokenize(DEFAULT_REPLY).map((text) => ({ type: "delta", text })),
        {
          type: "done",
          finishReason: "stop",
          usage: { promptTokens: prompt.length, completionTokens: 5, totalTokens: prompt.length + 5 },
        },
      ]);
    });

    it("concatenates to the buffered result", async () => {
      const { orchestrator } = await setup();
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Tell me" }], seed: 7, temperature: 0 });

      const buffered = await orchestrator.complete(request);
      const streamed = (await collect(orchestrator.stream(request)))
        .map((event) => (event.type === "delta" ? event.text : ""))
        .join("");

      expect(streamed).toBe(buffered.content);
    });

    it("throws ServiceUnavailableError before iteration when not ready", async () => {
      const { orchestrator } = await setup({ load: false });
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });
      expect(() => orchestrator.stream(request)).toThrow(ServiceUnavailableError);
    });

    it("aborts generation and releases the slot when the consumer stops early", async () => {
      const { handle, orchestrator } = await setup();
      backend.script.tokenDelayMs = 5;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      const seen: string[] = [];
      for await (const event of orchestrator.stream(request)) {
        if (event.type === "delta") seen.push(event.text);
        break;
      }

      expect(seen).toEqual(["Hello"]);
      expect(backend.active).toBe(0);
      expect(orchestrator.stats()).toEqual({ activeGenerations: 0, queuedGenerations: 0 });
      expect(handle.info().activeLeases).toBe(0);

      const next = await orchestrator.complete(request);
      expect(next.content).toBe(DEFAULT_REPLY);
    });

    it("surfaces engine failures to the consumer after buffered deltas", async () => {
      const { orchestrator } = await setup();
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });
      backend.script.error = new Error("decode failed");

      await expect(collect(orchestrator.stream(request))).rejects.toThrow("Generation failed: decode failed");
    });

    it("surfaces timeouts to the consumer", async () => {
      const { orchestrator } = await setup({ timeoutMs: 30 });
      backend.script.hang = true;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      await expect(collect(orchestrator.stream(request))).rejects.toThrow(GenerationTimeoutError);
    });

    it("keeps a reloaded-away model alive until its stream ends", async () => {
      const { handle, orchestrator } = await setup();
      backend.script.tokenDelayMs = 15;
      const request = orchestrator.parse({ messages: [{ role: "user", content: "Hi" }] });

      const streaming = collect(orchestrator.stream(request));
      await new Promise((resolve) => setTimeout(resolve, 8));
      await handle.reload({ modelPath: files.secondary });
      expect(backend.disposed).toEqual([]);

      const events = await streaming;
      expect(events.at(-1)).toMatchObject({ type: "done", finishReason: "stop" });
      await new Promise((resolve) => setImmediate(resolve));
      expect(backend.disposed).toEqual([files.primary]);
    });
  });
});
