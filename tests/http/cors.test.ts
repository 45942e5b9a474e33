import { afterAll, beforeAll, describe, expect, it } from "vitest";
import express from "express";
import type { Server } from "http";
import { createCorsMiddleware, matchesOrigin, parseOrigins, redactBody } from "@llamahost/http";

async function listen(origins: string[]): Promise<{ server: Server; baseUrl: string }> {
  const app = express();
  app.use(createCorsMiddleware({ origins }));
  app.get("/v1/models", (_req, res) => {
    res.json({ object: "list" });
  });
  const server = await new Promise<Server>((resolve) => {
    const started = app.listen(0, "127.0.0.1", () => resolve(started));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server did not bind a TCP port");
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe("matchesOrigin", () => {
  it("matches exact origins", () => {
    expect(matchesOrigin("https://app.example.com", "https://app.example.com")).toBe(true);
    expect(matchesOrigin("https://other.example.com", "https://app.example.com")).toBe(false);
  });

  it("matches wildcard subdomains", () => {
    expect(matchesOrigin("https://app.example.com", "*.example.com")).toBe(true);
    expect(matchesOrigin("https://example.org", "*.example.com")).toBe(false);
  });
});

describe("parseOrigins", () => {
  it("trims entries and trailing slashes", () => {
    expect(parseOrigins(" https://a.example.com/, *.example.org ,")).toEqual([
      "https://a.example.com",
      "*.example.org",
    ]);
  });
});

describe("redactBody", () => {
  it("masks credential fields and keeps the rest", () => {
    expect(redactBody({ api_key: "test-secret", model: "m", token: "t" })).toEqual({
      api_key: "[REDACTED]",
      model: "m",
      token: "[REDACTED]",
    });
  });
});

describe("createCorsMiddleware", () => {
  describe("with an allow-list", () => {
    let server: Server;
    let baseUrl = "";

    beforeAll(async () => {
      ({ server, baseUrl } = await listen(["https://app.example.com", "*.example.org"]));
    });

    afterAll(() => close(server));

    it("echoes an allowed origin", async () => {
      const res = await fetch(`${baseUrl}/v1/models`, { headers: { Origin: "https://docs.example.org" } });
      expect(res.status).toBe(200);
      expect(res.headers.get("access-control-allow-origin")).toBe("https://docs.example.org");
      expect(res.headers.get("vary")).toBe("Origin");
    });

    it("sends no CORS headers to other origins", async () => {
      const res = await fetch(`${baseUrl}/v1/models`, { headers: { Origin: "https://evil.test" } });
      expect(res.status).toBe(200);
      expect(res.headers.get("access-control-allow-origin")).toBeNull();
    });

    it("answers preflights", async () => {
      const allowed = await fetch(`${baseUrl}/v1/models`, {
        method: "OPTIONS",
        headers: { Origin: "https://app.example.com" },
      });
      expect(allowed.status).toBe(204);
      expect(allowed.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");

      const denied = await fetch(`${baseUrl}/v1/models`, {
        method: "OPTIONS",
        headers: { Origin: "https://evil.test" },
      });
      expect(denied.status).toBe(403);
    });
  });

  describe("without an allow-list", () => {
    let server: Server;
    let baseUrl = "";

    beforeAll(async () => {
      ({ server, baseUrl } = await listen([]));
    });

    afterAll(() => close(server));

    it("allows any origin", async () => {
      const res = await fetch(`${baseUrl}/v1/models`, { headers: { Origin: "https://anywhere.test" } });
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
    });
  });
});
