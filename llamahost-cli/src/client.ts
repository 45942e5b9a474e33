/**
 * HTTP client for a running inference service
 */

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ApiResponse<T = unknown> {
  ok: boolean;
  status: number;
  data?: T;
  error?: string;
}

export interface ClientOptions {
  url: string;
  apiKey?: string;
  fetch?: FetchLike;
}

export interface ServiceClient {
  request<T = unknown>(method: "GET" | "POST", path: string, body?: unknown): Promise<ApiResponse<T>>;
  /**
   * POST a streaming chat completion and hand each content delta to onDelta.
   * Resolves with the finish reason, or the error message from the stream.
   */
  streamChat(body: Record<string, unknown>, onDelta: (text: string) => void): Promise<ApiResponse<{ finishReason: string | null }>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Message from an `{ error: { message } }` body
 */
export function errorMessage(body: unknown, status: number): string {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.message === "string") {
    return body.error.message;
  }
  return `Request failed with status ${status}`;
}

/**
 * Split buffered SSE text into complete `data:` payloads. Returns the
 * payloads and the unterminated remainder.
 */
export function parseSseData(buffer: string): { events: string[]; rest: string } {
  const frames = buffer.split("\n\n");
  const rest = frames.pop() ?? "";
  const events: string[] = [];
  for (const frame of frames) {
    const data = frame
      .split("\n")
      .filter((line) => line.startsWith("data:"))
      .map((line) => line.slice(5).trimStart())
      .join("\n");
    if (data) events.push(data);
  }
  return { events, rest };
}

function readDelta(chunk: unknown): { content?: string; finishReason?: string } {
  if (!isRecord(chunk) || !Array.isArray(chunk.choices)) return {};
  const choice: unknown = chunk.choices[0];
  if (!isRecord(choice)) return {};
  const result: { content?: string; finishReason?: string } = {};
  if (isRecord(choice.delta) && typeof choice.delta.content === "string") {
    result.content = choice.delta.content;
  }
  if (typeof choice.finish_reason === "string") {
    result.finishReason = choice.finish_reason;
  }
  return result;
}

export function createServiceClient(options: ClientOptions): ServiceClient {
  const baseUrl = options.url.replace(/\/$/, "");
  const transport: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  function headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
    };
  }

  async function request<T = unknown>(method: "GET" | "POST", path: string, body?: unknown): Promise<ApiResponse<T>> {
    try {
      const res = await transport(`${baseUrl}${path}`, {
        method,
        headers: headers(),
        body: body === undefined ? undefined : JSON.stringify(body),
      });

      const text = await res.text();
      let parsed: unknown = undefined;
      if (text) {
        try {
          parsed = JSON.parse(text);
        } catch {
          parsed = undefined;
        }
      }

      if (!res.ok) {
        return { ok: false, status: res.status, error: errorMessage(parsed, res.status) };
      }
      return { ok: true, status: res.status, data: parsed as T };
    } catch (err) {
      return {
        ok: false,
        status: 0,
        error: err instanceof Error ? err.message : "Network error",
      };
    }
  }

  async function streamChat(
    body: Record<string, unknown>,
    onDelta: (text: string) => void
  ): Promise<ApiResponse<{ finishReason: string | null }>> {
    let res: Response;
    try {
      res = await transport(`${baseUrl}/v1/chat/completions`, {
        method: "POST",
        headers: headers(),
        body: JSON.stringify({ ...body, stream: true }),
      });
    } catch (err) {
      return { ok: false, status: 0, error: err instanceof Error ? err.message : "Network error" };
    }

    if (!res.ok || !res.body) {
      const text = await res.text();
      let parsed: unknown = undefined;
      try {
        parsed = text ? JSON.parse(text) : undefined;
      } catch {
        parsed = undefined;
      }
      return { ok: false, status: res.status, error: errorMessage(parsed, res.status) };
    }

    const decoder = new TextDecoder();
    const reader = res.body.getReader();
    let buffer = "";
    let finishReason: string | null = null;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      const { events, rest } = parseSseData(buffer);
      buffer = rest;

      for (const data of events) {
        if (data === "[DONE]") {
          return { ok: true, status: res.status, data: { finishReason } };
        }
        const chunk: unknown = JSON.parse(data);
        if (isRecord(chunk) && "error" in chunk) {
          return { ok: false, status: res.status, error: errorMessage(chunk, res.status) };
        }
        const delta = readDelta(chunk);
        if (delta.content) onDelta(delta.content);
        if (delta.finishReason) finishReason = delta.finishReason;
      }
    }

    return { ok: false, status: res.status, error: "Stream ended before completion" };
  }

  return { request, streamChat };
}
