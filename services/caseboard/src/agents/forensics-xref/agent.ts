/**
 * Forensics Cross-Reference Agent
 * Searches indexed video for the first claims of a report
 */

import { logger, type ChildLogger } from "@tipboard/core";
import { reportClaims, type AttributeValue } from "@tipboard/graph";
import type { BlackboardEvent } from "../../blackboard/types.js";
import { eventReport, type Agent, type AgentDependencies } from "../types.js";

export const MAX_CLAIMS = 2;
export const MAX_HITS_PER_CLAIM = 2;
export const MAX_QUERY_LENGTH = 200;

export class ForensicsXrefAgent implements Agent {
  readonly name = "forensics_xref";

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

    const claims = reportClaims(report);
    if (claims.length === 0) return;

    const search = this.deps.providers.videoAnalyst;
    if (!search) return;

    const existing = report.attributes.video_xref;
    const xref: AttributeValue[] = Array.isArray(existing) ? [...existing] : [];

    for (const claim of claims.slice(0, MAX_CLAIMS)) {
      if (!claim.statement) continue;

      const hits = await search.search(claim.statement);
      for (const hit of hits.slice(0, MAX_HITS_PER_CLAIM)) {
        xref.push({
          search_query: claim.statement.slice(0, MAX_QUERY_LENGTH),
          platform: hit.platform ?? "video",
          url: hit.url,
          status: "found",
        });
      }
    }

    const updated = this.deps.store.updateNode(report.id, { video_xref: xref });
    this.log.debug("Video cross-reference stored", {
      caseId: report.caseId,
      nodeId: report.id,
      entries: xref.length,
    });
    await this.deps.broadcaster.publish({ action: "update_node", node: updated });
  }
}
