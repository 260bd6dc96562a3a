/**
 * Case Catalog
 * Case summaries derived from the graph, with operator metadata layered on top
 */

import { reportBuilding, reportText, reportUrgency } from "./report.js";
import type { GraphStore } from "./store.js";
import type { GraphEdge, GraphNode } from "./types.js";

export const UNKNOWN_LOCATION = "Unknown Location";
const SUMMARY_LENGTH = 200;

export type CaseUrgency = "high" | "medium" | "low" | "unknown";

export interface CaseSummary {
  caseId: string;
  label: string;
  status: string;
  updatedAt: string;
  summary: string;
  location: string;
  story: string;
  reportCount: number;
  nodeCount: number;
  edgeCount: number;
}

export interface CaseSnapshot extends CaseSummary {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface CaseMetadata {
  label?: string;
  status?: string;
  location?: string;
  summary?: string;
  story?: string;
  updatedAt?: string;
}

export interface CaseCatalogOptions {
  now?: () => Date;
}

export class CaseCatalog {
  private readonly metadata = new Map<string, CaseMetadata>();
  private readonly now: () => Date;

  constructor(
    private readonly store: GraphStore,
    options: CaseCatalogOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  listCases(): CaseSummary[] {
    return this.store.listCaseIds().map((caseId) => this.summarize(caseId));
  }

  /**
   * Summary plus the case's nodes and edges; undefined when the case has neither
   */
  getCaseSnapshot(caseId: string): CaseSnapshot | undefined {
    const nodes = this.store.getNodesForCase(caseId);
    const edges = this.store.getEdgesForCase(caseId);
    if (nodes.length === 0 && edges.length === 0) {
      return undefined;
    }
    return { ...this.summarize(caseId), nodes, edges };
  }

  listSnapshots(): CaseSnapshot[] {
    const snapshots: CaseSnapshot[] = [];
    for (const caseId of this.store.listCaseIds()) {
      const snapshot = this.getCaseSnapshot(caseId);
      if (snapshot) snapshots.push(snapshot);
    }
    return snapshots;
  }

  setCaseMetadata(caseId: string, overrides: CaseMetadata): void {
    this.metadata.set(caseId, { ...overrides });
  }

  getCaseMetadata(caseId: string): CaseMetadata | undefined {
    return this.metadata.get(caseId);
  }

  /**
   * Highest report urgency in the case, bucketed
   */
  getCaseUrgency(caseId: string): CaseUrgency {
    const urgencies = this.store
      .getNodesByKind("report", caseId)
      .map(reportUrgency)
      .filter((value): value is number => value !== undefined);

    if (urgencies.length === 0) return "unknown";

    const highest = Math.max(...urgencies);
    if (highest >= 0.8) return "high";
    if (highest >= 0.5) return "medium";
    return "low";
  }

  clear(): void {
    this.metadata.clear();
  }

  private summarize(caseId: string): CaseSummary {
    const nodes = this.store.getNodesForCase(caseId);
    const reports = nodes.filter((node) => node.kind === "report");

    let updatedAt: string | undefined;
    for (const node of nodes) {
      if (updatedAt === undefined || node.createdAt > updatedAt) {
        updatedAt = node.createdAt;
      }
    }

    let summary = "";
    let location = UNKNOWN_LOCATION;
    const storyParts: string[] = [];

    for (const report of reports) {
      const text = reportText(report);

      if (!summary && text) {
        summary = text.length > SUMMARY_LENGTH ? `${text.slice(0, SUMMARY_LENGTH)}...` : text;
      }

      if (location === UNKNOWN_LOCATION) {
        location = reportBuilding(report) ?? UNKNOWN_LOCATION;
      }

      if (text) {
        const timestamp = report.attributes.timestamp;
        storyParts.push(
          typeof timestamp === "string" && timestamp ? `Report (${timestamp}): ${text}` : text
        );
      }
    }

    const result: CaseSummary = {
      caseId,
      label: caseId,
      status: "active",
      updatedAt: updatedAt ?? this.now().toISOString(),
      summary,
      location,
      story: storyParts.join("\n\n"),
      reportCount: reports.length,
      nodeCount: nodes.length,
      edgeCount: this.store.getEdgesForCase(caseId).length,
    };

    const meta = this.metadata.get(caseId);
    if (meta) {
      if (meta.label) result.label = meta.label;
      if (meta.status) result.status = meta.status;
      if (meta.location && result.location === UNKNOWN_LOCATION) result.location = meta.location;
      if (meta.summary && !result.summary) result.summary = meta.summary;
      if (meta.story && !result.story) result.story = meta.story;
      if (meta.updatedAt) result.updatedAt = meta.updatedAt;
    }

    return result;
  }
}
