/**
 * Clustering Agent
 * Links a report to the most similar report in another case
 */

import { logger, type ChildLogger } from "@tipboard/core";
import type { GraphEdge, GraphNode } from "@tipboard/graph";
import type { BlackboardEvent } from "../../blackboard/types.js";
import { eventReport, type Agent, type AgentDependencies } from "../types.js";
import { SIMILARITY_THRESHOLD, scoreReports, type SimilarityScores } from "./scoring.js";

export interface ClusterMatch {
  node: GraphNode;
  scores: SimilarityScores;
}

export class ClusteringAgent implements Agent {
  readonly name = "clustering";

  private readonly deps: AgentDependencies;
  private readonly log: ChildLogger;

  constructor(deps: AgentDependencies) {
    this.deps = deps;
    this.log = logger.child({ source: this.name });
  }

  async run(event: BlackboardEvent): Promise<void> {
    const report = this.targetReport(event);
    if (!report) return;

    const match = this.findBestMatch(report);
    if (!match) {
      this.log.debug("No similar report", { caseId: report.caseId, nodeId: report.id });
      return;
    }

    const edge = this.deps.store.createEdge("similar_to", report.id, match.node.id, report.caseId, {
      confidence: match.scores.combined,
      temporal_score: match.scores.temporal,
      geo_score: match.scores.geo,
      semantic_score: match.scores.semantic,
    });
    this.log.info("Linked similar report", {
      caseId: report.caseId,
      nodeId: report.id,
      matchId: match.node.id,
      confidence: match.scores.combined,
    });
    await this.deps.broadcaster.publish({ action: "add_edge", edge });
  }

  /**
   * Best-scoring report in any other case, if it clears the threshold.
   * Ties keep the first candidate seen.
   */
  findBestMatch(report: GraphNode): ClusterMatch | undefined {
    let best: ClusterMatch | undefined;

    for (const candidate of this.deps.store.getNodesByKind("report")) {
      if (candidate.id === report.id || candidate.caseId === report.caseId) continue;

      const scores = scoreReports(report, candidate);
      if (!best || scores.combined > best.scores.combined) {
        best = { node: candidate, scores };
      }
    }

    return best && best.scores.combined >= SIMILARITY_THRESHOLD ? best : undefined;
  }

  private targetReport(event: BlackboardEvent): GraphNode | undefined {
    if (event.subject.kind === "edge") {
      return this.firstReportOfCase(event.subject.edge);
    }
    const report = eventReport(event);
    // Re-read so attributes written since the event are scored
    return report ? this.deps.store.getNode(report.id) : undefined;
  }

  private firstReportOfCase(edge: GraphEdge): GraphNode | undefined {
    return this.deps.store.getNodesByKind("report", edge.caseId)[0];
  }
}
