import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { NotFoundError, ValidationError } from "@tipboard/core";
import { GraphStore } from "./store.js";
import type { Attributes } from "./types.js";

describe("GraphStore", () => {
  let store: GraphStore;

  beforeEach(() => {
    store = new GraphStore({ now: () => new Date("2025-01-01T00:00:00.000Z") });
  });

  it("creates nodes with kind-prefixed ids and stamps", () => {
    const node = store.createNode("report", "CASE-1", { text_body: "smoke" });
    assert.match(node.id, /^R-[0-9A-F]{12}$/);
    assert.equal(node.createdAt, "2025-01-01T00:00:00.000Z");
    assert.equal(store.getNode(node.id), node);
  });

  it("rejects duplicate node ids", () => {
    store.createNode("report", "CASE-1", {}, "RPT-1");
    assert.throws(() => store.createNode("report", "CASE-1", {}, "RPT-1"), ValidationError);
  });

  it("keeps its own copy of an added node", () => {
    const input: { id: string; kind: "report"; caseId: string; attributes: Attributes; createdAt: string } = {
      id: "RPT-1",
      kind: "report",
      caseId: "CASE-A",
      attributes: { text_body: "smoke" },
      createdAt: "2025-01-01T00:00:00.000Z",
    };
    store.addNode(input);
    input.caseId = "CASE-B";
    input.attributes.text_body = "changed";

    assert.equal(store.getNode("RPT-1")?.caseId, "CASE-A");
    assert.equal(store.getNode("RPT-1")?.attributes.text_body, "smoke");
    assert.deepEqual(
      store.getNodesForCase("CASE-A").map((node) => node.id),
      ["RPT-1"]
    );
    assert.deepEqual(store.getNodesForCase("CASE-B"), []);
  });

  it("does not let callers move a stored node to another case", () => {
    const node = store.createNode("report", "CASE-A", {});
    const edge = store.createEdge("similar_to", node.id, node.id, "CASE-A");

    assert.equal(Reflect.set(node, "caseId", "CASE-B"), false);
    assert.equal(Reflect.set(edge, "targetId", "elsewhere"), false);
    assert.equal(store.getNode(node.id)?.caseId, "CASE-A");
    assert.deepEqual(
      store.getNodesForCase("CASE-A").map((stored) => stored.caseId),
      ["CASE-A"]
    );
    assert.equal(store.getEdgesForCase("CASE-A")[0]?.targetId, node.id);
  });

  it("requires both edge endpoints", () => {
    const a = store.createNode("report", "CASE-1", {});
    assert.throws(() => store.createEdge("similar_to", a.id, "missing", "CASE-1"), NotFoundError);
    assert.equal(store.stats().edges, 0);
  });

  it("merges attributes on update", () => {
    const node = store.createNode("report", "CASE-1", { text_body: "smoke", status: "processing" });
    const updated = store.updateNode(node.id, { status: "analyzed", urgency: 0.7 });

    assert.deepEqual(updated.attributes, { text_body: "smoke", status: "analyzed", urgency: 0.7 });
    assert.equal(store.getNode(node.id)?.attributes.status, "analyzed");
    assert.equal(node.attributes.status, "processing");
  });

  it("fails to update or delete a missing node", () => {
    assert.throws(() => store.updateNode("nope", {}), NotFoundError);
    assert.throws(() => store.deleteNode("nope"), NotFoundError);
  });

  it("cascades deletion to every edge touching the node", () => {
    const a = store.createNode("report", "CASE-1", {});
    const b = store.createNode("report", "CASE-1", {});
    const c = store.createNode("fact_check", "CASE-1", {});
    const ab = store.createEdge("similar_to", a.id, b.id, "CASE-1");
    const cb = store.createEdge("debunked_by", c.id, b.id, "CASE-1");
    const ac = store.createEdge("debunked_by", a.id, c.id, "CASE-1");

    const result = store.deleteNode(b.id);

    assert.equal(result.nodeId, b.id);
    assert.equal(result.caseId, "CASE-1");
    assert.equal(result.removedEdgeCount, 2);
    assert.deepEqual([...result.removedEdgeIds].sort(), [ab.id, cb.id].sort());

    assert.equal(store.getNode(b.id), undefined);
    assert.deepEqual(store.getEdgesForNode(b.id), []);
    assert.deepEqual(store.getEdgesForNode(a.id), [ac]);
    assert.deepEqual(store.getEdgesForNode(c.id), [ac]);
    assert.deepEqual(store.getEdgesForCase("CASE-1"), [ac]);
    assert.deepEqual(store.stats(), { nodes: 2, edges: 1, cases: 1 });
  });

  it("lists outgoing edges before incoming ones", () => {
    const a = store.createNode("report", "CASE-1", {});
    const b = store.createNode("report", "CASE-1", {});
    const incoming = store.createEdge("repost_of", b.id, a.id, "CASE-1");
    const outgoing = store.createEdge("similar_to", a.id, b.id, "CASE-1");

    assert.deepEqual(store.getEdgesForNode(a.id), [outgoing, incoming]);
    assert.deepEqual(store.getOutgoingEdges(a.id), [outgoing]);
  });

  it("filters nodes by kind and case", () => {
    const r1 = store.createNode("report", "CASE-1", {});
    store.createNode("fact_check", "CASE-1", {});
    const r2 = store.createNode("report", "CASE-2", {});

    assert.deepEqual(store.getNodesByKind("report"), [r1, r2]);
    assert.deepEqual(store.getNodesByKind("report", "CASE-2"), [r2]);
    assert.deepEqual(store.listCaseIds(), ["CASE-1", "CASE-2"]);
  });

  it("finds reports carrying a perceptual hash", () => {
    const hashed = store.createNode("report", "CASE-1", { phash: "ffff000000000000" });
    const other = store.createNode("report", "CASE-2", { phash: "0000000000000000" });
    store.createNode("report", "CASE-2", { phash: "" });

    assert.deepEqual(store.getReportsWithHash(), [hashed, other]);
    assert.deepEqual(store.getReportsWithHash(hashed.id), [other]);
  });

  it("matches external sources by search query within a case", () => {
    const source = store.createNode("external_source", "CASE-1", { search_query: "fire alarm" });

    assert.equal(store.findExternalSourceByQuery("CASE-1", "fire alarm"), source);
    assert.equal(store.findExternalSourceByQuery("CASE-2", "fire alarm"), undefined);
    assert.equal(store.findExternalSourceByQuery("CASE-1", "flood"), undefined);
  });

  it("clears everything", () => {
    const a = store.createNode("report", "CASE-1", {});
    const b = store.createNode("report", "CASE-1", {});
    store.createEdge("similar_to", a.id, b.id, "CASE-1");

    store.clear();

    assert.deepEqual(store.stats(), { nodes: 0, edges: 0, cases: 0 });
  });
});
