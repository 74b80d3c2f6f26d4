/**
 * Provider factory – picks the backend from the gateway mode resolved at startup.
 *
 *   { mode: "live", apiKey, model } → GeminiLLM
 *   { mode: "mock" }                → MockLLM
 *
 * Usage:
 *   import { createLLMProvider } from "../providers/index.js";
 *   const llm = createLLMProvider(config.gateway);
 */
export { MockLLM, MOCK_RESPONSE } from "./mock-llm.js";
export { GeminiLLM, SdkGeminiTransport, extractText, DEFAULT_GEMINI_MODEL } from "./gemini-llm.js";
export type { GeminiTransport, GenerationRequest } from "./gemini-llm.js";
export type { LLMProvider } from "./llm-provider.js";

import type { GatewayMode } from "../config/index.js";
import type { GeminiTransport } from "./gemini-llm.js";
import type { LLMProvider } from "./llm-provider.js";
import { MockLLM } from "./mock-llm.js";
import { GeminiLLM } from "./gemini-llm.js";

export function createLLMProvider(
  mode: GatewayMode,
  options?: { transport?: GeminiTransport },
): LLMProvider {
  if (mode.mode === "mock") {
    return new MockLLM();
  }

  return new GeminiLLM({
    apiKey: mode.apiKey,
    model: mode.model,
    transport: options?.transport,
  });
}
