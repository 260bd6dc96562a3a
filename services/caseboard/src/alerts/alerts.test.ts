import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { ValidationError, logger } from "@tipboard/core";
import { CaseCatalog, GraphStore } from "@tipboard/graph";
import type { AlertComposer } from "../providers/types.js";
import { Alerts, CASE_NOT_FOUND_DRAFT, DRAFT_UNAVAILABLE, type AlertMessage } from "./alerts.js";

const NOW = new Date("2025-04-01T09:30:00.000Z");

describe("Alerts", () => {
  let store: GraphStore;
  let catalog: CaseCatalog;
  let calls: Array<{ caseId: string; context: string; officerNotes?: string }>;
  let composer: AlertComposer;

  beforeEach(() => {
    logger.resetHandlers([]);
    store = new GraphStore();
    catalog = new CaseCatalog(store);
    calls = [];
    composer = {
      composeAlert: async (caseId, context, officerNotes) => {
        calls.push({ caseId, context, officerNotes });
        return "Smoke reported at the library. Use the south exit.";
      },
    };
  });

  afterEach(() => {
    logger.resetHandlers();
  });

  it("drafts from the case graph with the officer's notes", async () => {
    store.createNode("report", "CASE-A", {
      text_body: "smoke in the stacks",
      location: { lat: 1.5, lng: 2, building: "Library" },
    });
    const alerts = new Alerts({ catalog, composer });

    const draft = await alerts.draft({ case_id: "CASE-A", officer_notes: "Crew on site" });

    assert.deepEqual(draft, {
      caseId: "CASE-A",
      draftText: "Smoke reported at the library. Use the south exit.",
      status: "draft",
      locationSummary: "Library",
    });
    assert.equal(calls.length, 1);
    assert.equal(calls[0]?.officerNotes, "Crew on site");
    assert.equal(
      calls[0]?.context,
      'Case CASE-A\n- report: {"text_body":"smoke in the stacks","location":{"lat":1.5,"lng":2,"building":"Library"}}'
    );
  });

  it("caps the draft context at ten nodes", async () => {
    for (let i = 0; i < 12; i++) {
      store.createNode("report", "CASE-A", { text_body: `report ${i}` });
    }

    await new Alerts({ catalog, composer }).draft({ case_id: "CASE-A" });

    assert.equal(calls[0]?.context.split("\n").length, 11);
  });

  it("answers a placeholder draft for an unknown case", async () => {
    const draft = await new Alerts({ catalog, composer }).draft({ case_id: "CASE-MISSING" });

    assert.deepEqual(draft, {
      caseId: "CASE-MISSING",
      draftText: CASE_NOT_FOUND_DRAFT,
      status: "draft",
      locationSummary: null,
    });
    assert.equal(calls.length, 0);
  });

  it("falls back to a manual draft without a composer", async () => {
    store.createNode("report", "CASE-A", { text_body: "smoke", location: { lat: 1.5, lng: 2 } });

    const draft = await new Alerts({ catalog }).draft({ case_id: "CASE-A" });

    assert.equal(draft.draftText, DRAFT_UNAVAILABLE);
    assert.equal(draft.locationSummary, "1.5,2");
  });

  it("publishes approved alerts to the feed and to subscribers", async () => {
    store.createNode("report", "CASE-A", {
      text_body: "smoke",
      location: { lat: 1.5, lng: 2, building: "Library" },
    });
    const alerts = new Alerts({ catalog, composer, now: () => NOW });
    const received: AlertMessage[] = [];
    alerts.subscribe({ id: "kiosk", deliver: (message) => void received.push(message) });
    alerts.subscribe({
      id: "closed-socket",
      deliver: () => {
        throw new Error("socket closed");
      },
    });

    const alert = await alerts.approve({ case_id: "CASE-A", final_text: "Avoid the library." });

    assert.match(alert.id, /^ALT-[0-9A-F]{12}$/);
    assert.deepEqual(alert, {
      id: alert.id,
      caseId: "CASE-A",
      text: "Avoid the library.",
      status: "Confirmed",
      locationSummary: "Library",
      createdAt: "2025-04-01T09:30:00.000Z",
    });
    assert.deepEqual(received, [{ type: "new_alert", alert }]);
    assert.equal(alerts.subscriberCount, 1);
    assert.deepEqual(alerts.list(), [alert]);
  });

  it("keeps the status an officer picks", async () => {
    const alerts = new Alerts({ catalog });

    const alert = await alerts.approve({
      case_id: "CASE-A",
      final_text: "Area reopened.",
      status: "All Clear",
    });

    assert.equal(alert.status, "All Clear");
    assert.equal(alert.locationSummary, null);
  });

  it("rejects invalid requests", async () => {
    const alerts = new Alerts({ catalog, composer });

    await assert.rejects(alerts.draft({ case_id: "  " }), ValidationError);
    await assert.rejects(
      alerts.approve({ case_id: "CASE-A", final_text: "text", status: "Resolved" }),
      ValidationError
    );
    await assert.rejects(alerts.approve({ case_id: "CASE-A", final_text: "" }), ValidationError);
    assert.deepEqual(alerts.list(), []);
  });
});
