import { afterAll, beforeAll, describe, expect, it } from "vitest";
import express from "express";
import type { Server } from "http";
import { ApiError, createErrorHandler, setLogLevel } from "@llamahost/http";

setLogLevel("error");

describe("ApiError", () => {
  it("renders the OpenAI error envelope", () => {
    const err = new ApiError("Nope", { status: 418, type: "teapot_error", code: "short_and_stout" });
    expect(err.toJSON()).toEqual({
      error: { message: "Nope", type: "teapot_error", code: "short_and_stout" },
    });
    expect(err.name).toBe("ApiError");
  });

  it("includes details only when present", () => {
    const err = new ApiError("Bad", { status: 400, type: "invalid_request_error", code: "invalid", details: [{ path: ["x"] }] });
    expect(err.toJSON()).toEqual({
      error: { message: "Bad", type: "invalid_request_error", code: "invalid", details: [{ path: ["x"] }] },
    });
  });
});

describe("createErrorHandler", () => {
  let server: Server;
  let baseUrl = "";

  beforeAll(async () => {
    const app = express();
    app.use(express.json({ limit: "64b" }));
    app.get("/api-error", () => {
      throw new ApiError("Slow down", {
        status: 429,
        type: "rate_limit_error",
        code: "too_many",
        headers: { "Retry-After": "3" },
      });
    });
    app.get("/crash", () => {
      throw new Error("database password leaked in message");
    });
    app.post("/echo", (req, res) => {
      res.json(req.body);
    });
    app.use(createErrorHandler({ source: "test" }));

    await new Promise<void>((resolve) => {
      server = app.listen(0, "127.0.0.1", () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("renders ApiErrors with their status and headers", async () => {
    const res = await fetch(`${baseUrl}/api-error`);
    expect(res.status).toBe(429);
    expect(res.headers.get("retry-after")).toBe("3");
    expect(await res.json()).toEqual({
      error: { message: "Slow down", type: "rate_limit_error", code: "too_many" },
    });
  });

  it("hides unexpected errors behind a generic 500", async () => {
    const res = await fetch(`${baseUrl}/crash`);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { message: "Internal server error", type: "server_error", code: null },
    });
  });

  it("maps malformed JSON to invalid_json", async () => {
    const res = await fetch(`${baseUrl}/echo`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { message: "Request body is not valid JSON", type: "invalid_request_error", code: "invalid_json" },
    });
  });

  it("maps oversized bodies to 413", async () => {
    const res = await fetch(`${baseUrl}/echo`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text: "x".repeat(200) }),
    });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: { message: "Request body too large", type: "invalid_request_error", code: "body_too_large" },
    });
  });
});
