/**
 * Claude Case Analyst
 * Claim extraction, search query generation and case synthesis over an executor
 */

import type { z } from "zod";
import { logger, type ChildLogger } from "@tipboard/core";
import type { ExecutorProfile, IExecutor } from "../../executor/types.js";
import type {
  AlertComposer,
  CaseNarrator,
  CaseSynthesis,
  ClaimAnalyst,
  ClaimExtraction,
  ClaimExtractionInput,
  ExtractedClaim,
} from "../types.js";
import {
  ANALYST_SYSTEM_PROMPT,
  getAlertDraftPrompt,
  getCaseSynthesisPrompt,
  getClaimExtractionPrompt,
  getSearchQueriesPrompt,
} from "./prompt.js";
import {
  AlertDraftOutputSchema,
  CaseSynthesisOutputSchema,
  ClaimExtractionOutputSchema,
  SearchQueriesOutputSchema,
  extractJson,
} from "./schema.js";

// ============================================
// PROFILE
// ============================================

const ANALYST_PROFILE: ExecutorProfile = {
  maxTurns: 1,
  tools: [],
};

const EMPTY_EXTRACTION: ClaimExtraction = {
  claims: [],
  urgency: 0.5,
  misinformationFlags: [],
  suggestedVerifications: [],
};

// ============================================
// ANALYST
// ============================================

export class ClaudeCaseAnalyst implements ClaimAnalyst, CaseNarrator, AlertComposer {
  private readonly executor: IExecutor;
  private readonly profile: ExecutorProfile;
  private readonly log: ChildLogger;

  constructor(executor: IExecutor, profile?: Partial<ExecutorProfile>) {
    this.executor = executor;
    this.profile = { ...ANALYST_PROFILE, ...profile };
    this.log = logger.child({ component: "analyst" });
  }

  async extractClaims(input: ClaimExtractionInput): Promise<ClaimExtraction> {
    const output = await this.run(
      getClaimExtractionPrompt(input),
      ClaimExtractionOutputSchema,
      { task: "extract_claims", caseId: input.caseId }
    );
    if (!output) return { ...EMPTY_EXTRACTION };

    return {
      claims: output.claims,
      urgency: output.urgency,
      misinformationFlags: output.misinformation_flags,
      suggestedVerifications: output.suggested_verifications,
    };
  }

  async generateSearchQueries(claims: ExtractedClaim[]): Promise<string[]> {
    if (claims.length === 0) return [];

    const output = await this.run(getSearchQueriesPrompt(claims), SearchQueriesOutputSchema, {
      task: "search_queries",
    });
    return output?.queries ?? [];
  }

  async synthesizeCase(caseId: string, context: string): Promise<CaseSynthesis | undefined> {
    const output = await this.run(
      getCaseSynthesisPrompt(caseId, context),
      CaseSynthesisOutputSchema,
      { task: "synthesize_case", caseId }
    );
    if (!output) return undefined;

    return {
      narrative: output.case_narrative,
      originAnalysis: output.origin_analysis,
      spreadMap: output.spread_map,
      confidenceScore: output.confidence_score,
      recommendedAction: output.recommended_action,
    };
  }

  async composeAlert(
    caseId: string,
    context: string,
    officerNotes?: string
  ): Promise<string | undefined> {
    const output = await this.run(
      getAlertDraftPrompt(caseId, context, officerNotes),
      AlertDraftOutputSchema,
      { task: "compose_alert", caseId }
    );
    return output?.alert_text;
  }

  /**
   * Execute a prompt and validate the JSON it returns.
   * Failed runs and unparseable output are logged and yield undefined.
   */
  private async run<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S,
    context: Record<string, unknown>
  ): Promise<z.output<S> | undefined> {
    const result = await this.executor.execute({
      prompt,
      systemPrompt: ANALYST_SYSTEM_PROMPT,
      profile: this.profile,
      context,
    });

    if (!result.success) {
      this.log.warn("Analyst run failed", { ...context, error: result.error?.message });
      return undefined;
    }

    let raw: unknown;
    try {
      raw = extractJson(result.output);
    } catch (error) {
      this.log.warn("Analyst output is not JSON", {
        ...context,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn("Analyst output failed validation", {
        ...context,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return undefined;
    }

    this.log.debug("Analyst run complete", {
      ...context,
      costUsd: result.costUsd,
      durationMs: result.durationMs,
    });
    return parsed.data;
  }
}
