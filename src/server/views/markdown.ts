import { Marked } from "marked";
import type { AnalysisResult, AnalysisSection } from "../../core/schemas/index.js";
import { escapeHtml } from "./page.js";

const SAFE_URL = /^(https?:|mailto:|#)/i;

// Raw HTML in model output is shown as text; links only keep web/mail targets.
const markdown = new Marked({
  gfm: true,
  breaks: true,
  renderer: {
    html(token) {
      return escapeHtml(token.text);
    },
  },
  walkTokens(token) {
    if ((token.type === "link" || token.type === "image") && !SAFE_URL.test(String(token.href))) {
      token.href = "#";
    }
  },
});

export function renderMarkdown(text: string): string {
  return markdown.parse(text, { async: false });
}

export function renderSections(result: AnalysisResult): Record<AnalysisSection, string> {
  return {
    redFlags: renderMarkdown(result.redFlags),
    summary: renderMarkdown(result.summary),
    insights: renderMarkdown(result.insights),
  };
}
