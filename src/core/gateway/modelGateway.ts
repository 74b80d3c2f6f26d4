import pino from "pino";
import type { GatewayMode } from "../../config/index.js";
import type { GatewayModeName } from "../schemas/index.js";
import { createLLMProvider, type GeminiTransport, type LLMProvider } from "../../providers/index.js";

const logger = pino({ name: "model-gateway" });

export const GATEWAY_ERROR_PREFIX = "[ERROR calling Gemini API]";

/**
 * Model Gateway
 *
 * One best-effort call per prompt: no retries, no timeout of its own.
 * Never rejects. A failing call resolves with
 * `[ERROR calling Gemini API] <message>` so each UI section always has text.
 */
export class ModelGateway {
  readonly mode: GatewayModeName;
  private readonly provider: LLMProvider;

  constructor(provider: LLMProvider, mode: GatewayModeName) {
    this.provider = provider;
    this.mode = mode;
  }

  get providerName(): string {
    return this.provider.name;
  }

  async generate(prompt: string, maxTokens: number): Promise<string> {
    try {
      const text = await this.provider.generate(prompt, maxTokens);
      logger.debug(
        { provider: this.provider.name, promptLength: prompt.length, outputLength: text.length },
        "Generation completed",
      );
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ provider: this.provider.name, err: error }, "Generation failed");
      return `${GATEWAY_ERROR_PREFIX} ${message}`;
    }
  }
}

export function createModelGateway(
  mode: GatewayMode,
  options?: { transport?: GeminiTransport },
): ModelGateway {
  return new ModelGateway(createLLMProvider(mode, options), mode.mode);
}
