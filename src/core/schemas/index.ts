import { z } from "zod";

// ── Operating mode ────────────────────────────────────────────────────
export const GatewayModeNameSchema = z.enum(["mock", "live"]);
export type GatewayModeName = z.infer<typeof GatewayModeNameSchema>;

// ── Sections ──────────────────────────────────────────────────────────
export type AnalysisSection = "redFlags" | "summary" | "insights";

// ── POST /analyze body ────────────────────────────────────────────────
// Strict: no coercion of numbers or booleans into text.
export const AnalyzeRequestSchema = z.object({
  text: z.string(),
});

// ── Analysis Result ───────────────────────────────────────────────────
export const AnalysisResultSchema = z.object({
  analysisId: z.string().uuid(),
  mode: GatewayModeNameSchema,
  provider: z.string().min(1),
  redFlags: z.string(),
  summary: z.string(),
  insights: z.string(),
  timestamp: z.string().datetime(),
});
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

// ── Gemini response shapes ────────────────────────────────────────────
// A response either carries the text directly or a list of candidates whose
// content is a plain string or a list of parts.
export const DirectTextResponseSchema = z.object({
  text: z.string(),
});

export const CandidateContentSchema = z.union([
  z.string(),
  z.object({
    parts: z.array(z.object({ text: z.string().optional() })),
  }),
]);
export type CandidateContent = z.infer<typeof CandidateContentSchema>;

export const CandidatesResponseSchema = z.object({
  candidates: z.array(z.object({ content: CandidateContentSchema })).nonempty(),
});
