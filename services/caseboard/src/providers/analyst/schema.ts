/**
 * Analyst Output Schemas
 * Zod schemas for the JSON the model returns
 */

import { z } from "zod";

// ============================================
// CLAIM EXTRACTION
// ============================================

const ExtractedClaimSchema = z.object({
  statement: z.string().min(1),
  category: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export const ClaimExtractionOutputSchema = z.object({
  claims: z.array(ExtractedClaimSchema).default([]),
  urgency: z.number().min(0).max(1).default(0.5),
  misinformation_flags: z.array(z.string()).default([]),
  suggested_verifications: z.array(z.string()).default([]),
});

export type ClaimExtractionOutput = z.infer<typeof ClaimExtractionOutputSchema>;

// ============================================
// SEARCH QUERIES
// ============================================

export const SearchQueriesOutputSchema = z.object({
  queries: z.array(z.string().min(1)).max(10),
});

// ============================================
// CASE SYNTHESIS
// ============================================

export const CaseSynthesisOutputSchema = z.object({
  case_narrative: z.string(),
  origin_analysis: z.string().default(""),
  spread_map: z.string().default(""),
  confidence_score: z.number().min(0).max(1).nullable().default(null),
  recommended_action: z.string().default(""),
});

export type CaseSynthesisOutput = z.infer<typeof CaseSynthesisOutputSchema>;

// ============================================
// ALERT DRAFT
// ============================================

export const AlertDraftOutputSchema = z.object({
  alert_text: z.string().trim().min(1),
});

// ============================================
// PARSING
// ============================================

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/;

/**
 * Pull the JSON object out of model output, tolerating code fences and prose
 */
export function extractJson(output: string): unknown {
  const fenced = FENCE_PATTERN.exec(output);
  const body = fenced?.[1] ?? output;

  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new SyntaxError("No JSON object in model output");
  }
  const parsed: unknown = JSON.parse(body.slice(start, end + 1));
  return parsed;
}
