/**
 * LLMProvider interface – the backend a ModelGateway talks to.
 * The system ships with MockLLM and GeminiLLM.
 */
export interface LLMProvider {
  readonly name: string;

  /**
   * Generate a completion for a single prompt, with a hint for the
   * maximum number of output tokens. Returns the extracted text.
   * Implementations may throw; the gateway turns failures into text.
   */
  generate(prompt: string, maxTokens: number): Promise<string>;
}
