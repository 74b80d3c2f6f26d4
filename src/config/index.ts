import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseDotenv } from "dotenv";
import pino from "pino";
import { z } from "zod";
import { DEFAULT_GEMINI_MODEL } from "../providers/gemini-llm.js";

const logger = pino({ name: "config" });

export const DEFAULT_SECRETS_FILE = ".secrets/secrets.env";
export const API_KEY_NAME = "GEMINI_API_KEY";
/** Request body cap in bytes (200 MiB). Pasted text is never truncated below it. */
export const DEFAULT_BODY_LIMIT = 200 * 1024 * 1024;

/**
 * How the model gateway operates, decided once at startup.
 * Mock mode never leaves the process.
 */
export type GatewayMode =
  | { mode: "mock" }
  | { mode: "live"; apiKey: string; model: string };

export interface AppConfig {
  port: number;
  host: string;
  bodyLimit: number;
  secretsFile: string;
  gateway: GatewayMode;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3200),
  HOST: z.string().min(1).default("0.0.0.0"),
  GEMINI_MODEL: z.string().min(1).default(DEFAULT_GEMINI_MODEL),
  SECRETS_FILE: z.string().min(1).default(DEFAULT_SECRETS_FILE),
  BODY_LIMIT: z.coerce.number().int().positive().default(DEFAULT_BODY_LIMIT),
});

/**
 * Read the local secret store (dotenv format). A missing file yields no secrets.
 * Values are returned, never copied into process.env.
 */
export function readSecretStore(filePath: string): Record<string, string> {
  try {
    return parseDotenv(fs.readFileSync(filePath));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Secret store first, then the environment. Blank values count as absent. */
export function resolveApiKey(
  secrets: Record<string, string>,
  env: NodeJS.ProcessEnv,
): string | undefined {
  return nonBlank(secrets[API_KEY_NAME]) ?? nonBlank(env[API_KEY_NAME]);
}

export function resolveGatewayMode(apiKey: string | undefined, model: string): GatewayMode {
  if (!apiKey) {
    return { mode: "mock" };
  }
  return { mode: "live", apiKey, model };
}

/**
 * Build the application config from the environment and the secret store.
 * Throws on malformed settings (e.g. a non-numeric PORT).
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = EnvSchema.parse(env);
  const secretsFile = path.resolve(cwd, parsed.SECRETS_FILE);
  const apiKey = resolveApiKey(readSecretStore(secretsFile), env);
  const gateway = resolveGatewayMode(apiKey, parsed.GEMINI_MODEL);

  if (gateway.mode === "mock") {
    logger.warn({ secretsFile }, `No ${API_KEY_NAME} found – running in mock mode`);
  } else {
    logger.info({ model: gateway.model }, "Gemini credential found – running in live mode");
  }

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    bodyLimit: parsed.BODY_LIMIT,
    secretsFile,
    gateway,
  };
}
