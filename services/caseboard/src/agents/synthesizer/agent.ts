/**
 * Case Synthesizer Agent
 * Writes the narrator's case-level narrative onto every report in the case
 */

import { logger, type ChildLogger } from "@tipboard/core";
import type { GraphNode, GraphStore } from "@tipboard/graph";
import type { BlackboardEvent } from "../../blackboard/types.js";
import type { Agent, AgentDependencies } from "../types.js";

export const MAX_CONTEXT_NODES = 15;
export const MAX_ATTRIBUTES_LENGTH = 300;

/**
 * Case id followed by one line per node: `- <kind>: <attributes JSON>`
 */
export function formatCaseContext(
  caseId: string,
  nodes: readonly GraphNode[],
  maxNodes: number = MAX_CONTEXT_NODES,
  maxLength: number = MAX_ATTRIBUTES_LENGTH
): string {
  const lines = [`Case ${caseId}`];
  for (const node of nodes.slice(0, maxNodes)) {
    lines.push(`- ${node.kind}: ${JSON.stringify(node.attributes).slice(0, maxLength)}`);
  }
  return lines.join("\n");
}

export function buildCaseContext(store: GraphStore, caseId: string): string {
  return formatCaseContext(caseId, store.getNodesForCase(caseId));
}

export class CaseSynthesizerAgent implements Agent {
  readonly name = "case_synthesizer";

  private readonly deps: AgentDependencies;
  private readonly log: ChildLogger;

  constructor(deps: AgentDependencies) {
    this.deps = deps;
    this.log = logger.child({ source: this.name });
  }

  async run(event: BlackboardEvent): Promise<void> {
    const narrator = this.deps.providers.caseNarrator;
    if (!narrator) return;

    const context = buildCaseContext(this.deps.store, event.caseId);
    const synthesis = await narrator.synthesizeCase(event.caseId, context);
    if (!synthesis) {
      this.log.debug("No synthesis returned", { caseId: event.caseId });
      return;
    }

    for (const report of this.deps.store.getNodesByKind("report", event.caseId)) {
      const updated = this.deps.store.updateNode(report.id, {
        case_narrative: synthesis.narrative,
        origin_analysis: synthesis.originAnalysis,
        spread_map: synthesis.spreadMap,
        confidence_score: synthesis.confidenceScore,
        recommended_action: synthesis.recommendedAction,
      });
      await this.deps.broadcaster.publish({ action: "update_node", node: updated });
    }
  }
}
