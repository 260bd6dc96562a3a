/**
 * Alerts
 * Officer-reviewed public alerts: a draft composed from the case graph, an
 * approved feed, and live delivery to alert subscribers.
 */

import { logger, type ChildLogger } from "@tipboard/core";
import {
  generateAlertId,
  reportLocation,
  type CaseCatalog,
  type GraphNode,
} from "@tipboard/graph";
import { formatCaseContext } from "../agents/synthesizer/agent.js";
import { SubscriberSet, type Subscriber } from "../broadcast/subscribers.js";
import { parseInput } from "../intake/schema.js";
import type { AlertComposer } from "../providers/types.js";
import { AlertApproveInputSchema, AlertDraftInputSchema, type AlertStatus } from "./schema.js";

// ============================================
// TYPES
// ============================================

export const ALERT_CONTEXT_NODES = 10;
export const ALERT_CONTEXT_LENGTH = 200;

export const CASE_NOT_FOUND_DRAFT = "[Case not found or no data]";
export const DRAFT_UNAVAILABLE = "[Alert draft unavailable - compose manually]";

export interface AlertDraft {
  caseId: string;
  draftText: string;
  status: "draft";
  locationSummary: string | null;
}

export interface Alert {
  id: string;
  caseId: string;
  text: string;
  status: AlertStatus;
  locationSummary: string | null;
  /** ISO-8601 */
  createdAt: string;
}

export interface AlertMessage {
  type: "new_alert";
  alert: Alert;
}

export type AlertSubscriber = Subscriber<AlertMessage>;

export interface AlertsDependencies {
  catalog: CaseCatalog;
  composer?: AlertComposer;
  now?: () => Date;
}

/**
 * Building of the first report that has a location, else its coordinates
 */
function locationSummary(nodes: readonly GraphNode[]): string | null {
  for (const node of nodes) {
    if (node.kind !== "report") continue;
    const location = reportLocation(node);
    if (location) return location.building || `${location.lat},${location.lng}`;
  }
  return null;
}

// ============================================
// ALERTS
// ============================================

export class Alerts {
  private readonly catalog: CaseCatalog;
  private readonly composer?: AlertComposer;
  private readonly feed: Alert[] = [];
  private readonly subscribers: SubscriberSet<AlertMessage>;
  private readonly now: () => Date;
  private readonly log: ChildLogger;

  constructor(deps: AlertsDependencies) {
    this.catalog = deps.catalog;
    this.composer = deps.composer;
    this.now = deps.now ?? (() => new Date());
    this.log = logger.child({ component: "alerts" });
    this.subscribers = new SubscriberSet(this.log);
  }

  subscribe(subscriber: AlertSubscriber): () => void {
    return this.subscribers.add(subscriber);
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Compose a draft from the case graph. Nothing is published.
   */
  async draft(input: unknown): Promise<AlertDraft> {
    const request = parseInput(AlertDraftInputSchema, input);
    const snapshot = this.catalog.getCaseSnapshot(request.case_id);

    if (!snapshot) {
      return {
        caseId: request.case_id,
        draftText: CASE_NOT_FOUND_DRAFT,
        status: "draft",
        locationSummary: null,
      };
    }

    const context = formatCaseContext(
      request.case_id,
      snapshot.nodes,
      ALERT_CONTEXT_NODES,
      ALERT_CONTEXT_LENGTH
    );
    const composed = await this.composer?.composeAlert(
      request.case_id,
      context,
      request.officer_notes
    );
    if (!composed) {
      this.log.warn("No alert draft composed", { caseId: request.case_id });
    }

    this.log.info("Alert drafted", { caseId: request.case_id });
    return {
      caseId: request.case_id,
      draftText: composed ?? DRAFT_UNAVAILABLE,
      status: "draft",
      locationSummary: locationSummary(snapshot.nodes),
    };
  }

  /**
   * Publish officer-approved text to the feed and to alert subscribers
   */
  async approve(input: unknown): Promise<Alert> {
    const request = parseInput(AlertApproveInputSchema, input);
    const snapshot = this.catalog.getCaseSnapshot(request.case_id);

    const alert: Alert = {
      id: generateAlertId(),
      caseId: request.case_id,
      text: request.final_text,
      status: request.status,
      locationSummary: snapshot ? locationSummary(snapshot.nodes) : null,
      createdAt: this.now().toISOString(),
    };
    this.feed.push(alert);

    this.log.info("Alert approved", {
      caseId: alert.caseId,
      alertId: alert.id,
      status: alert.status,
    });
    await this.subscribers.deliverAll({ type: "new_alert", alert });
    return alert;
  }

  /**
   * Published alerts, oldest first
   */
  list(): Alert[] {
    return this.feed.map((alert) => ({ ...alert }));
  }
}
