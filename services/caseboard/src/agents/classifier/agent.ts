/**
 * Classifier Agent
 * Assigns a semantic role to every report in a case:
 * - outgoing mutation_of: mutator
 * - outgoing repost_of: amplifier
 * - earliest timestamp among the case's reports: originator
 * - nothing linking out to sources or similar reports: unwitting sharer
 */

import { logger, type ChildLogger } from "@tipboard/core";
import type { GraphNode, GraphStore, SemanticRole } from "@tipboard/graph";
import type { BlackboardEvent } from "../../blackboard/types.js";
import type { Agent, AgentDependencies } from "../types.js";

/**
 * Reported time from the `timestamp` or `created_at` attribute
 */
function reportedAt(node: GraphNode): number | undefined {
  for (const key of ["timestamp", "created_at"]) {
    const value = node.attributes[key];
    if (typeof value !== "string" || value.length === 0) continue;
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? undefined : ms;
  }
  return undefined;
}

export function classifyReport(
  store: GraphStore,
  report: GraphNode,
  reports: readonly GraphNode[]
): SemanticRole | undefined {
  const outgoing = store.getOutgoingEdges(report.id);

  if (outgoing.some((edge) => edge.kind === "mutation_of")) return "mutator";
  if (outgoing.some((edge) => edge.kind === "repost_of")) return "amplifier";

  const time = reportedAt(report);
  if (time !== undefined) {
    const earliest = reports.every((other) => {
      if (other.id === report.id) return true;
      const otherTime = reportedAt(other);
      return otherTime !== undefined && otherTime >= time;
    });
    if (earliest) return "originator";
  }

  const linksOut = outgoing.some((edge) => {
    const target = store.getNode(edge.targetId);
    return target?.kind === "external_source" || target?.kind === "fact_check";
  });
  const hasSimilar = outgoing.some((edge) => edge.kind === "similar_to");
  if (!linksOut && !hasSimilar) return "unwitting_sharer";

  // Missing timestamps sort last; first report wins ties
  let first: GraphNode | undefined;
  let firstTime = Number.POSITIVE_INFINITY;
  for (const candidate of reports) {
    const candidateTime = reportedAt(candidate) ?? Number.POSITIVE_INFINITY;
    if (!first || candidateTime < firstTime) {
      first = candidate;
      firstTime = candidateTime;
    }
  }
  return first?.id === report.id ? "originator" : undefined;
}

export class ClassifierAgent implements Agent {
  readonly name = "classifier";

  private readonly deps: AgentDependencies;
  private readonly log: ChildLogger;

  constructor(deps: AgentDependencies) {
    this.deps = deps;
    this.log = logger.child({ source: this.name });
  }

  async run(event: BlackboardEvent): Promise<void> {
    const reports = this.deps.store.getNodesByKind("report", event.caseId);

    for (const report of reports) {
      const role = classifyReport(this.deps.store, report, reports);
      if (!role || report.attributes.semantic_role === role) continue;

      const updated = this.deps.store.updateNode(report.id, { semantic_role: role });
      this.log.debug("Assigned role", { caseId: event.caseId, nodeId: report.id, role });
      await this.deps.broadcaster.publish({ action: "update_node", node: updated });
    }
  }
}
