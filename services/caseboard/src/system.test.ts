import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { logger } from "@tipboard/core";
import { createCaseboard, type CaseboardSystem } from "./system.js";
import type { GraphUpdateMessage } from "./broadcast/broadcaster.js";
import { DRAFT_UNAVAILABLE } from "./alerts/alerts.js";

describe("CaseboardSystem", () => {
  let system: CaseboardSystem;

  beforeEach(() => {
    logger.resetHandlers([]);
    system = createCaseboard(
      { scheduler: { pollIntervalMs: 10, maxDispatchesPerCase: 10 } },
      { providers: {} }
    );
  });

  afterEach(async () => {
    await system.stop();
    logger.resetHandlers();
  });

  it("reports health", () => {
    assert.deepEqual(system.health(), {
      status: "ok",
      knowledgeSources: 7,
      schedulerRunning: false,
    });
    system.start();
    assert.equal(system.health().schedulerRunning, true);
  });

  it("links nearby reports of the same incident across cases", async () => {
    const messages: GraphUpdateMessage[] = [];
    system.broadcaster.subscribe({ id: "viewer", deliver: (message) => void messages.push(message) });
    system.start();

    const first = await system.intake.submitReport({
      text_body: "fire alarm building A",
      location: { lat: 0, lng: 0 },
      timestamp: "2025-04-01T08:00:00Z",
    });
    await system.settle();

    const second = await system.intake.submitReport({
      text_body: "fire alarm building A",
      location: { lat: 0.0015, lng: 0 },
      timestamp: "2025-04-01T08:10:00Z",
    });
    await system.settle();

    assert.notEqual(first.caseId, second.caseId);

    const similar = system.store
      .getOutgoingEdges(second.reportId)
      .filter((edge) => edge.kind === "similar_to");
    assert.equal(similar.length, 1);
    assert.equal(similar[0]?.targetId, first.reportId);
    const confidence = similar[0]?.attributes.confidence;
    assert.ok(typeof confidence === "number" && confidence >= 0.4);

    // The classifier reacted to the new edge
    assert.equal(system.store.getNode(second.reportId)?.attributes.semantic_role, "originator");

    assert.deepEqual(
      messages.slice(0, 3).map((message) => message.action),
      ["add_node", "add_node", "add_edge"]
    );
    assert.equal(system.stats().scheduler.queued, 0);
    assert.deepEqual(system.stats().scheduler.active, []);
  });

  it("delivers approved alerts only to alert subscribers", async () => {
    const graphMessages: GraphUpdateMessage[] = [];
    const alertTypes: string[] = [];
    system.broadcaster.subscribe({ id: "viewer", deliver: (message) => void graphMessages.push(message) });
    system.alerts.subscribe({ id: "kiosk", deliver: (message) => void alertTypes.push(message.type) });

    const { caseId } = await system.intake.submitReport({ text_body: "smoke near the gym" });
    const draft = await system.alerts.draft({ case_id: caseId });
    await system.alerts.approve({ case_id: caseId, final_text: "Avoid the gym." });

    assert.equal(draft.draftText, DRAFT_UNAVAILABLE);
    assert.deepEqual(alertTypes, ["new_alert"]);
    assert.deepEqual(
      graphMessages.map((message) => message.action),
      ["add_node"]
    );
    assert.equal(system.stats().alerts, 1);
    assert.equal(system.stats().alertSubscribers, 1);
  });
});
