/**
 * Recluster Debunk Agent
 * Keeps `debunk_count` on every node that has outgoing debunked_by edges
 */

import type { BlackboardEvent } from "../../blackboard/types.js";
import type { Agent, AgentDependencies } from "../types.js";

export class ReclusterDebunkAgent implements Agent {
  readonly name = "recluster_debunk";

  private readonly deps: AgentDependencies;

  constructor(deps: AgentDependencies) {
    this.deps = deps;
  }

  async run(event: BlackboardEvent): Promise<void> {
    const counts = new Map<string, number>();
    for (const edge of this.deps.store.getEdgesForCase(event.caseId)) {
      if (edge.kind !== "debunked_by") continue;
      counts.set(edge.sourceId, (counts.get(edge.sourceId) ?? 0) + 1);
    }

    for (const [nodeId, count] of counts) {
      if (!this.deps.store.getNode(nodeId)) continue;
      const updated = this.deps.store.updateNode(nodeId, { debunk_count: count });
      await this.deps.broadcaster.publish({ action: "update_node", node: updated });
    }
  }
}
