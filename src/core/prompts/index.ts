import type { AnalysisSection } from "../schemas/index.js";

/** A prompt ready to send, with the output-token hint for its section. */
export interface SectionPrompt {
  section: AnalysisSection;
  prompt: string;
  maxTokens: number;
}

export const RED_FLAGS_MAX_TOKENS = 280;
export const SUMMARY_MAX_TOKENS = 200;
export const INSIGHTS_MAX_TOKENS = 300;

function quoteText(text: string): string {
  return `TEXT:\n'''${text}'''`;
}

/**
 * Red-flag extraction: quote, problem type and a one-line explanation per flag.
 */
export function buildRedFlagsPrompt(text: string): string {
  return (
    "You are an assistant that identifies indicators of misinformation in text. " +
    "Given the following text, return a bulleted list of 'red flags'. For each flag include: " +
    "1) Quote or short excerpt, 2) the type of problem (e.g., emotional appeal, no source, sensational claim, cherry-picking, misleading statistic, poor sourcing), " +
    "3) a one-line explanation. Use short bullet points.\n\n" +
    `${quoteText(text)}\n\n` +
    "Format strictly as bullets."
  );
}

export function buildSummaryPrompt(text: string): string {
  return (
    "You are a neutral summarizer. Read the text and provide a concise, factual, neutral summary (2-4 sentences). " +
    "Do not add opinions and avoid speculative language. If the input contains claims that are verifiable, indicate them as 'Claim: ...' and mark 'Verified/Unverified/Unknown' if possible.\n\n" +
    quoteText(text)
  );
}

export function buildInsightsPrompt(text: string): string {
  return (
    "You are an educational assistant. For the provided text, list 2-4 misinformation tactics used (e.g., cherry-picking, appeal to emotion, false cause), " +
    "and for each tactic give a two-sentence plain-language explanation and an example suggestion for how a user can check or verify such a tactic.\n\n" +
    quoteText(text)
  );
}

/**
 * All three prompts in the order the pipeline sends them.
 * The text is embedded verbatim: no escaping, no truncation.
 */
export function buildAnalysisPrompts(text: string): SectionPrompt[] {
  return [
    { section: "redFlags", prompt: buildRedFlagsPrompt(text), maxTokens: RED_FLAGS_MAX_TOKENS },
    { section: "summary", prompt: buildSummaryPrompt(text), maxTokens: SUMMARY_MAX_TOKENS },
    { section: "insights", prompt: buildInsightsPrompt(text), maxTokens: INSIGHTS_MAX_TOKENS },
  ];
}
