/**
 * Network Agent
 * Extracts claims from a report, looks them up with fact checkers and seeds
 * external sources to follow up on
 */

import { logger, type ChildLogger } from "@tipboard/core";
import {
  reportLocation,
  reportText,
  type Attributes,
  type GraphNode,
} from "@tipboard/graph";
import type { BlackboardEvent } from "../../blackboard/types.js";
import type { ClaimExtraction, ExtractedClaim } from "../../providers/types.js";
import { eventReport, type Agent, type AgentDependencies } from "../types.js";

export const MAX_REVIEWS_PER_CLAIM = 3;
export const MAX_CLAIM_TEXT_LENGTH = 300;
export const EXTERNAL_SOURCE_CONFIDENCE = 0.5;

function claimAttributes(claim: ExtractedClaim): Attributes {
  const value: Attributes = { statement: claim.statement };
  if (claim.category !== undefined) value.category = claim.category;
  if (claim.confidence !== undefined) value.confidence = claim.confidence;
  return value;
}

export class NetworkAgent implements Agent {
  readonly name = "network";

  private readonly deps: AgentDependencies;
  private readonly log: ChildLogger;

  constructor(deps: AgentDependencies) {
    this.deps = deps;
    this.log = logger.child({ source: this.name });
  }

  async run(event: BlackboardEvent): Promise<void> {
    const subject = eventReport(event);
    const report = subject && this.deps.store.getNode(subject.id);
    if (!report) return;

    const analyst = this.deps.providers.claimAnalyst;
    if (!analyst) {
      this.log.debug("No claim analyst configured", { caseId: report.caseId });
      return;
    }

    const timestamp = report.attributes.timestamp;
    const extraction = await analyst.extractClaims({
      caseId: report.caseId,
      text: reportText(report),
      location: reportLocation(report),
      timestamp: typeof timestamp === "string" ? timestamp : undefined,
    });

    await this.recordExtraction(report, extraction);
    await this.factCheck(report, extraction.claims);

    const queries = await analyst.generateSearchQueries(extraction.claims);
    for (const query of queries) {
      await this.linkExternalSource(report, query);
    }

    this.log.info("Network analysis complete", {
      caseId: report.caseId,
      nodeId: report.id,
      claims: extraction.claims.length,
      queries: queries.length,
    });
  }

  private async recordExtraction(report: GraphNode, extraction: ClaimExtraction): Promise<void> {
    const updated = this.deps.store.updateNode(report.id, {
      claims: extraction.claims.map(claimAttributes),
      urgency: extraction.urgency,
      misinformation_flags: extraction.misinformationFlags,
      suggested_verifications: extraction.suggestedVerifications,
    });
    await this.deps.broadcaster.publish({ action: "update_node", node: updated });
  }

  private async factCheck(report: GraphNode, claims: ExtractedClaim[]): Promise<void> {
    const checker = this.deps.providers.factChecker;
    if (!checker) return;

    for (const claim of claims) {
      if (!claim.statement) continue;

      const reviews = await checker.searchClaims(claim.statement);
      for (const review of reviews.slice(0, MAX_REVIEWS_PER_CLAIM)) {
        const factCheck = this.deps.store.createNode("fact_check", report.caseId, {
          claim_text: (review.text || claim.statement).slice(0, MAX_CLAIM_TEXT_LENGTH),
          rating: review.rating,
          reviewer: review.reviewer,
          url: review.url,
        });
        await this.deps.broadcaster.publish({ action: "add_node", node: factCheck });

        const edge = this.deps.store.createEdge("debunked_by", report.id, factCheck.id, report.caseId);
        await this.deps.broadcaster.publish({ action: "add_edge", edge });
      }
    }
  }

  private async linkExternalSource(report: GraphNode, query: string): Promise<void> {
    let source = this.deps.store.findExternalSourceByQuery(report.caseId, query);
    if (!source) {
      source = this.deps.store.createNode("external_source", report.caseId, {
        search_query: query,
        platform: "web",
        url: "",
        status: "pending",
      });
      await this.deps.broadcaster.publish({ action: "add_node", node: source });
    }

    const edge = this.deps.store.createEdge("similar_to", report.id, source.id, report.caseId, {
      confidence: EXTERNAL_SOURCE_CONFIDENCE,
    });
    await this.deps.broadcaster.publish({ action: "add_edge", edge });
  }
}
