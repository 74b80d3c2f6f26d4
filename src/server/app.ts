import Fastify from "fastify";
import { loadConfig, type AppConfig } from "../config/index.js";
import { Analyzer } from "../core/pipeline/analyzer.js";
import { createModelGateway, type ModelGateway } from "../core/gateway/modelGateway.js";
import { EmptyInputError } from "../core/errors.js";
import { AnalyzeRequestSchema } from "../core/schemas/index.js";
import { renderPage } from "./views/page.js";
import { renderSections } from "./views/markdown.js";

export interface ServerOptions {
  config?: AppConfig;
  /** Overrides the gateway built from `config.gateway`. */
  gateway?: ModelGateway;
  logger?: boolean;
}

export function buildServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const fastify = Fastify({
    logger: options.logger ?? true,
    bodyLimit: config.bodyLimit,
  });

  const gateway = options.gateway ?? createModelGateway(config.gateway);
  const analyzer = new Analyzer(gateway);

  // ── GET / ─────────────────────────────────────────────────────────
  fastify.get("/", async (_req, reply) => {
    return reply
      .code(200)
      .type("text/html; charset=utf-8")
      .send(renderPage({ mode: analyzer.mode, provider: analyzer.providerName }));
  });

  // ── POST /analyze ─────────────────────────────────────────────────
  // Validated with zod rather than a route schema: Fastify's Ajv would coerce
  // `{ "text": 42 }` into a string.
  fastify.post("/analyze", {
    handler: async (req, reply) => {
      const body = AnalyzeRequestSchema.safeParse(req.body);
      if (!body.success) {
        return reply.code(400).send({ error: "Body must be a JSON object with a string `text` field" });
      }

      try {
        const result = await analyzer.analyze(body.data.text);
        return reply.code(200).send({ ...result, html: renderSections(result) });
      } catch (error) {
        if (error instanceof EmptyInputError) {
          return reply.code(422).send({ warning: error.message });
        }
        const message = error instanceof Error ? error.message : "Unknown error";
        req.log.error({ err: error }, "Analysis failed");
        return reply.code(500).send({ error: message });
      }
    },
  });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return {
      status: "ok",
      mode: analyzer.mode,
      provider: analyzer.providerName,
      timestamp: new Date().toISOString(),
    };
  });

  return fastify;
}
