import { v4 as uuidv4 } from "uuid";
import pino from "pino";
import { AnalysisResultSchema, type AnalysisResult, type AnalysisSection } from "../schemas/index.js";
import { buildAnalysisPrompts } from "../prompts/index.js";
import { EmptyInputError } from "../errors.js";
import type { ModelGateway } from "../gateway/modelGateway.js";

const logger = pino({ name: "analyzer" });

/**
 * Analysis pipeline
 *   validate input → build 3 prompts → gateway × 3 (sequential) → result
 *
 * Each gateway call resolves to text even on failure, so one broken
 * section never blocks the other two.
 */
export class Analyzer {
  private readonly gateway: ModelGateway;

  constructor(gateway: ModelGateway) {
    this.gateway = gateway;
  }

  get mode(): ModelGateway["mode"] {
    return this.gateway.mode;
  }

  get providerName(): string {
    return this.gateway.providerName;
  }

  async analyze(text: string): Promise<AnalysisResult> {
    if (!text.trim()) {
      throw new EmptyInputError();
    }

    const analysisId = uuidv4();
    logger.info(
      { analysisId, mode: this.gateway.mode, inputLength: text.length },
      "Analysis started",
    );

    const outputs: Record<AnalysisSection, string> = { redFlags: "", summary: "", insights: "" };
    for (const { section, prompt, maxTokens } of buildAnalysisPrompts(text)) {
      logger.info({ analysisId, section }, "Generating section");
      outputs[section] = await this.gateway.generate(prompt, maxTokens);
    }

    const result = AnalysisResultSchema.parse({
      analysisId,
      mode: this.gateway.mode,
      provider: this.gateway.providerName,
      ...outputs,
      timestamp: new Date().toISOString(),
    });

    logger.info({ analysisId }, "Analysis completed");
    return result;
  }
}
