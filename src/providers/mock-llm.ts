import type { LLMProvider } from "./llm-provider.js";

export const MOCK_RESPONSE =
  "[MOCK RESPONSE — no API key detected]\n\n" +
  "This is a placeholder. Add your Gemini API key in .secrets/secrets.env or as env var GEMINI_API_KEY to get live results.";

/**
 * MockLLM – used when no Gemini credential is configured.
 * Returns the same placeholder for every prompt so the UI can be exercised offline.
 */
export class MockLLM implements LLMProvider {
  readonly name = "MockLLM";

  async generate(_prompt: string, _maxTokens: number): Promise<string> {
    return MOCK_RESPONSE;
  }
}
