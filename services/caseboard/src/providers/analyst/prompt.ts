/**
 * Analyst Prompts
 */

import type { ClaimExtractionInput, ExtractedClaim } from "../types.js";

export const ANALYST_SYSTEM_PROMPT = `You are an investigations analyst reviewing anonymous community reports.
You separate checkable factual claims from opinion and rumor, and you never invent facts.
Always answer with a single JSON object and nothing else.`;

export function getClaimExtractionPrompt(input: ClaimExtractionInput): string {
  const location = input.location
    ? `${input.location.lat}, ${input.location.lng}${input.location.building ? ` (${input.location.building})` : ""}`
    : "unknown";

  return `Extract the factual claims from this report.

## Report
Case: ${input.caseId}
Reported at: ${input.timestamp ?? "unknown"}
Location: ${location}

${input.text}

## Output
Return JSON:
{
  "claims": [{ "statement": "...", "category": "event|person|place|media|other", "confidence": 0.0 }],
  "urgency": 0.0,
  "misinformation_flags": ["..."],
  "suggested_verifications": ["..."]
}

- "urgency" is 0..1; 1 means people may be in danger right now
- Each statement must be checkable on its own, without the report
- Flag emotional framing, unverifiable sourcing ("a friend said") and known hoax patterns`;
}

export function getSearchQueriesPrompt(claims: ExtractedClaim[]): string {
  const list = claims.map((claim, i) => `${i + 1}. ${claim.statement}`).join("\n");

  return `Write web search queries that would confirm or refute these claims.

## Claims
${list}

## Output
Return JSON: { "queries": ["..."] }

- At most one query per claim, at most 5 in total
- Plain keywords, no search operators`;
}

export function getCaseSynthesisPrompt(caseId: string, context: string): string {
  return `Summarize how this case developed, based only on the graph below.

${context}

## Output
Return JSON:
{
  "case_narrative": "2-4 sentences on what happened",
  "origin_analysis": "where the story most likely started",
  "spread_map": "how it moved between reports and sources",
  "confidence_score": 0.0,
  "recommended_action": "one concrete next step for the moderators of ${caseId}"
}

Use null for "confidence_score" when the graph is too thin to judge.`;
}

export function getAlertDraftPrompt(caseId: string, context: string, officerNotes?: string): string {
  const notes = officerNotes ? `\n\n## Officer notes\n${officerNotes}` : "";

  return `Draft a short public safety alert for case ${caseId}.

${context}${notes}

## Output
Return JSON: { "alert_text": "..." }

- Two or three plain sentences: what is happening, where, and what people should do
- State only what the reports support; say "unconfirmed" where they disagree
- No names, no contact details, no speculation about suspects`;
}
