import { describe, it, expect, vi, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../server/app.js";
import { createModelGateway } from "../core/gateway/modelGateway.js";
import { DEFAULT_BODY_LIMIT, type AppConfig } from "../config/index.js";
import { MOCK_RESPONSE, type GenerationRequest } from "../providers/index.js";
import { escapeHtml } from "../server/views/page.js";

const MOCK_CONFIG: AppConfig = {
  port: 0,
  host: "127.0.0.1",
  bodyLimit: DEFAULT_BODY_LIMIT,
  secretsFile: "/dev/null",
  gateway: { mode: "mock" },
};

const LIVE = { mode: "live", apiKey: "test-key", model: "gemini-pro" } as const;

describe("HTTP server", () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  function mockServer(): FastifyInstance {
    server = buildServer({ config: MOCK_CONFIG, logger: false });
    return server;
  }

  function liveServer(send: (request: GenerationRequest) => Promise<unknown>): FastifyInstance {
    server = buildServer({
      config: MOCK_CONFIG,
      gateway: createModelGateway(LIVE, { transport: { send } }),
      logger: false,
    });
    return server;
  }

  it("serves the form with both actions, the sections and the footer", async () => {
    const res = await mockServer().inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.body).toContain('<textarea id="input-text"');
    expect(res.body).toContain("🔍 Analyze</button>");
    expect(res.body).toContain(">Clear</button>");
    expect(res.body).toContain("<h2>🚩 Red Flag Analysis</h2>");
    expect(res.body).toContain("<h2>📌 Factual Summary</h2>");
    expect(res.body).toContain("<h2>🎓 Educational Insights</h2>");
    expect(res.body).toContain("<h3>How to enable Gemini (live mode)</h3>");
    expect(res.body).toContain("Running in MOCK mode");
  });

  it("returns three mock outputs for non-empty text", async () => {
    const res = await mockServer().inject({
      method: "POST",
      url: "/analyze",
      payload: { text: "Share this before it gets deleted!" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.mode).toBe("mock");
    expect(body.redFlags).toBe(MOCK_RESPONSE);
    expect(body.summary).toBe(MOCK_RESPONSE);
    expect(body.insights).toBe(MOCK_RESPONSE);
    expect(body.html.summary).toContain("This is a placeholder.");
  });

  it("warns on whitespace-only text without calling the model", async () => {
    const send = vi.fn(async () => ({ text: "unused" }));

    const res = await liveServer(send).inject({ method: "POST", url: "/analyze", payload: { text: "   " } });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ warning: "Please paste text to analyze." });
    expect(send).not.toHaveBeenCalled();
  });

  it("forwards pastes larger than 1 MiB verbatim", async () => {
    const requests: GenerationRequest[] = [];
    const send = vi.fn(async (request: GenerationRequest) => {
      requests.push(request);
      return { text: "ok" };
    });
    const text = "A".repeat(1_100_000);

    const res = await liveServer(send).inject({ method: "POST", url: "/analyze", payload: { text } });

    expect(res.statusCode).toBe(200);
    expect(res.json().redFlags).toBe("ok");
    expect(requests).toHaveLength(3);
    expect(requests[0]?.prompt).toContain(`TEXT:\n'''${text}'''`);
  });

  it("honours a configured body limit", async () => {
    server = buildServer({ config: { ...MOCK_CONFIG, bodyLimit: 64 }, logger: false });

    const res = await server.inject({ method: "POST", url: "/analyze", payload: { text: "B".repeat(100) } });

    expect(res.statusCode).toBe(413);
  });

  it("rejects a body without text", async () => {
    const res = await mockServer().inject({ method: "POST", url: "/analyze", payload: { content: "hi" } });
    expect(res.statusCode).toBe(400);
  });

  it.each([
    ["a number", 42],
    ["a boolean", true],
    ["null", null],
  ])("rejects text given as %s without calling the model", async (_label, value) => {
    const send = vi.fn(async () => ({ text: "unused" }));

    const res = await liveServer(send).inject({ method: "POST", url: "/analyze", payload: { text: value } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Body must be a JSON object with a string `text` field" });
    expect(send).not.toHaveBeenCalled();
  });

  it("reports the live provider on the health check", async () => {
    server = buildServer({
      config: {
        ...MOCK_CONFIG,
        gateway: { mode: "live", apiKey: "test-key", model: "gemini-1.5-flash" },
      },
      logger: false,
    });

    const res = await server.inject({ method: "GET", url: "/health" });
    const body = res.json();
    expect(res.statusCode).toBe(200);
    expect(body.status).toBe("ok");
    expect(body.mode).toBe("live");
    expect(body.provider).toBe("Gemini/gemini-1.5-flash");
  });

  it("escapes text rendered into the page", () => {
    expect(escapeHtml(`<script>"x" & 'y'</script>`)).toBe(
      "&lt;script&gt;&quot;x&quot; &amp; &#39;y&#39;&lt;/script&gt;",
    );
  });
});
