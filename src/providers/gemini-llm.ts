import { GoogleGenerativeAI } from "@google/generative-ai";
import {
  CandidatesResponseSchema,
  DirectTextResponseSchema,
  type CandidateContent,
} from "../core/schemas/index.js";
import type { LLMProvider } from "./llm-provider.js";

export const DEFAULT_GEMINI_MODEL = "gemini-pro";

export interface GenerationRequest {
  model: string;
  prompt: string;
  maxOutputTokens: number;
}

/**
 * Sends one generation request and resolves with the raw response object.
 * Swappable so the provider can be exercised without the network.
 */
export interface GeminiTransport {
  send(request: GenerationRequest): Promise<unknown>;
}

/** Transport backed by the official @google/generative-ai SDK. */
export class SdkGeminiTransport implements GeminiTransport {
  private client: GoogleGenerativeAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async send(request: GenerationRequest): Promise<unknown> {
    const model = this.client.getGenerativeModel({
      model: request.model,
      generationConfig: { maxOutputTokens: request.maxOutputTokens },
    });
    const result = await model.generateContent(request.prompt);
    return result.response;
  }
}

function candidateText(content: CandidateContent): string {
  if (typeof content === "string") return content;
  return content.parts.map((part) => part.text ?? "").join("");
}

/**
 * Pull the generated text out of a Gemini response.
 *
 * Accepts a direct `text` field, or a `candidates` list (first candidate wins).
 * Anything else is converted to a string as-is.
 */
export function extractText(response: unknown): string {
  const direct = DirectTextResponseSchema.safeParse(response);
  if (direct.success) {
    return direct.data.text;
  }

  const withCandidates = CandidatesResponseSchema.safeParse(response);
  if (withCandidates.success) {
    return candidateText(withCandidates.data.candidates[0].content);
  }

  if (typeof response === "string") return response;
  return JSON.stringify(response) ?? String(response);
}

/**
 * Gemini LLM provider.
 *
 * Needs an API key (resolved by the config layer); the model defaults to gemini-pro.
 */
export class GeminiLLM implements LLMProvider {
  readonly name: string;
  private transport: GeminiTransport;
  private model: string;

  constructor(options: { apiKey: string; model?: string; transport?: GeminiTransport }) {
    if (!options.apiKey.trim()) {
      throw new Error("GEMINI_API_KEY is required for the Gemini provider.");
    }

    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.name = `Gemini/${this.model}`;
    this.transport = options.transport ?? new SdkGeminiTransport(options.apiKey);
  }

  async generate(prompt: string, maxTokens: number): Promise<string> {
    const response = await this.transport.send({
      model: this.model,
      prompt,
      maxOutputTokens: maxTokens,
    });
    return extractText(response);
  }
}
