import { describe, it, expect } from "vitest";
import {
  buildAnalysisPrompts,
  buildInsightsPrompt,
  buildRedFlagsPrompt,
  buildSummaryPrompt,
} from "../core/prompts/index.js";

const POST =
  "BREAKING: Scientists SHOCKED as miracle fruit cures everything overnight! " +
  "Share before they delete this!!!";

describe("Prompt Builder", () => {
  it("embeds the input verbatim in every prompt", () => {
    for (const build of [buildRedFlagsPrompt, buildSummaryPrompt, buildInsightsPrompt]) {
      expect(build(POST)).toContain(`TEXT:\n'''${POST}'''`);
    }
  });

  it("is deterministic across repeated calls", () => {
    expect(buildAnalysisPrompts(POST)).toEqual(buildAnalysisPrompts(POST));
    expect(buildRedFlagsPrompt(POST)).toBe(buildRedFlagsPrompt(POST));
  });

  it("returns sections in pipeline order with their token hints", () => {
    const prompts = buildAnalysisPrompts(POST);
    expect(prompts.map((p) => [p.section, p.maxTokens])).toEqual([
      ["redFlags", 280],
      ["summary", 200],
      ["insights", 300],
    ]);
  });

  it("uses a distinct instruction per section", () => {
    expect(buildRedFlagsPrompt(POST)).toMatch(/^You are an assistant that identifies indicators of misinformation/);
    expect(buildRedFlagsPrompt(POST).endsWith("Format strictly as bullets.")).toBe(true);
    expect(buildSummaryPrompt(POST)).toMatch(/^You are a neutral summarizer\./);
    expect(buildInsightsPrompt(POST)).toMatch(/^You are an educational assistant\./);
  });

  it("does not escape or truncate the input", () => {
    const tricky = "quotes ''' and <b>tags</b>\n" + "x".repeat(20_000);
    const prompt = buildSummaryPrompt(tricky);
    expect(prompt).toContain(tricky);
    expect(prompt.endsWith(`'''${tricky}'''`)).toBe(true);
  });
});
