/**
 * Intake
 * Inbound mutation API used by the ingestion layer. Every mutation is
 * published so viewers and the scheduler see it.
 */

import { NotFoundError, logger, type ChildLogger } from "@tipboard/core";
import {
  generateCaseId,
  generateReportId,
  type Attributes,
  type AttributeValue,
  type DeletionResult,
  type GraphEdge,
  type GraphNode,
  type GraphStore,
  type Location,
} from "@tipboard/graph";
import type { UpdateBroadcaster } from "../broadcast/broadcaster.js";
import {
  EdgeInputSchema,
  EvidenceInputSchema,
  ReportInputSchema,
  parseInput,
  relationToEdgeKind,
} from "./schema.js";

export interface IntakeDependencies {
  store: GraphStore;
  broadcaster: UpdateBroadcaster;
  now?: () => Date;
}

export interface SubmittedReport {
  caseId: string;
  reportId: string;
  node: GraphNode;
}

function locationAttribute(location: Location | null | undefined): AttributeValue {
  if (!location) return null;
  const value: Attributes = { lat: location.lat, lng: location.lng };
  if (location.building !== undefined) {
    value.building = location.building;
  }
  return value;
}

export class Intake {
  private readonly store: GraphStore;
  private readonly broadcaster: UpdateBroadcaster;
  private readonly now: () => Date;
  private readonly log: ChildLogger;

  constructor(deps: IntakeDependencies) {
    this.store = deps.store;
    this.broadcaster = deps.broadcaster;
    this.now = deps.now ?? (() => new Date());
    this.log = logger.child({ component: "intake" });
  }

  /**
   * Create a report node in a new (or the given) case
   */
  async submitReport(input: unknown, caseId?: string): Promise<SubmittedReport> {
    const report = parseInput(ReportInputSchema, input);
    const targetCase = caseId ?? generateCaseId();
    const reportId = generateReportId();
    const receivedAt = this.now().toISOString();

    const node = this.store.createNode(
      "report",
      targetCase,
      {
        text_body: report.text_body,
        location: locationAttribute(report.location),
        timestamp: report.timestamp ? new Date(report.timestamp).toISOString() : receivedAt,
        media_url: report.media_url ?? null,
        anonymous: report.anonymous,
        contact: report.contact ?? null,
        status: "processing",
        created_at: receivedAt,
      },
      reportId
    );

    this.log.info("Report received", { caseId: targetCase, nodeId: node.id });
    await this.broadcaster.publish({ action: "add_node", node });

    return { caseId: targetCase, reportId, node };
  }

  /**
   * Attach raw evidence to a case as a report node
   */
  async addEvidence(caseId: string, input: unknown): Promise<GraphNode> {
    const evidence = parseInput(EvidenceInputSchema, input);

    const node = this.store.createNode(
      "report",
      caseId,
      {
        text_body: evidence.content,
        media_url: evidence.url ?? "",
        timestamp: evidence.timestamp ?? "",
        evidence_type: evidence.type,
        reviewed: false,
      },
      evidence.id
    );

    this.log.info("Evidence added", { caseId, nodeId: node.id });
    await this.broadcaster.publish({ action: "add_node", node });
    return node;
  }

  /**
   * Operator-drawn link between two existing nodes
   */
  async createEdge(caseId: string, input: unknown): Promise<GraphEdge> {
    const link = parseInput(EdgeInputSchema, input);

    for (const id of [link.sourceId, link.targetId]) {
      if (!this.store.getNode(id)) {
        throw new NotFoundError("node", id);
      }
    }

    const edge = this.store.createEdge(
      relationToEdgeKind(link.relation),
      link.sourceId,
      link.targetId,
      caseId,
      { note: link.note ?? "" }
    );

    this.log.info("Edge created", { caseId, edgeId: edge.id, kind: edge.kind });
    await this.broadcaster.publish({ action: "add_edge", edge });
    return edge;
  }

  async deleteNode(id: string): Promise<DeletionResult> {
    const deletion = this.store.deleteNode(id);

    this.log.info("Node deleted", {
      caseId: deletion.caseId,
      nodeId: id,
      removedEdges: deletion.removedEdgeCount,
    });
    await this.broadcaster.publish({ action: "delete_node", deletion });
    return deletion;
  }
}
