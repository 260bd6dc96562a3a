import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { logger } from "@tipboard/core";
import { GraphStore } from "@tipboard/graph";
import type { BlackboardEvent } from "../../blackboard/types.js";
import { UpdateBroadcaster, toBlackboardEvent } from "../../broadcast/broadcaster.js";
import type { ImageHasher, MediaSource, Providers } from "../../providers/types.js";
import { ForensicsAgent, isVideoUrl } from "./agent.js";

const NOW = new Date("2025-04-01T09:00:00.000Z");

const HASHES: Record<string, string> = {
  "https://example.org/new.jpg": "0000000000000007",
  "https://example.org/blank.jpg": "0000000000000000",
};

const mediaSource: MediaSource = {
  fetch: async (url) => Buffer.from(url),
};

const imageHasher: ImageHasher = {
  hash: async (image) => {
    const hash = HASHES[image.toString()];
    if (!hash) throw new Error("undecodable");
    return hash;
  },
};

describe("isVideoUrl", () => {
  it("matches video extensions case-insensitively", () => {
    assert.equal(isVideoUrl("https://example.org/clip.MP4"), true);
    assert.equal(isVideoUrl("/api/upload/clip.webm"), true);
    assert.equal(isVideoUrl("https://example.org/photo.jpg"), false);
  });
});

describe("ForensicsAgent", () => {
  let store: GraphStore;
  let broadcaster: UpdateBroadcaster;
  let events: BlackboardEvent[];

  function createAgent(providers: Providers): ForensicsAgent {
    return new ForensicsAgent(
      { store, broadcaster, providers, now: () => NOW },
      { retry: { attempts: 3, backoffMs: 0 } }
    );
  }

  beforeEach(() => {
    logger.resetHandlers([]);
    events = [];
    store = new GraphStore();
    broadcaster = new UpdateBroadcaster();
    broadcaster.connect({ notify: (event) => void events.push(event) });
  });

  afterEach(() => {
    logger.resetHandlers();
  });

  it("links reposts and mutations by hash distance", async () => {
    const original = store.createNode("report", "CASE-A", { phash: "0000000000000000" });
    const cropped = store.createNode("report", "CASE-B", { phash: "0000000000000fff" });
    const unrelated = store.createNode("report", "CASE-C", { phash: "ffffffffffffffff" });
    store.createNode("report", "CASE-D", { phash: "not-a-hash" });
    const incoming = store.createNode("report", "CASE-E", {
      media_url: "https://example.org/new.jpg",
    });

    await createAgent({ mediaSource, imageHasher }).run(
      toBlackboardEvent({ action: "add_node", node: incoming })
    );
    await broadcaster.flush();

    const edges = store.getOutgoingEdges(incoming.id);
    assert.deepEqual(
      edges.map((edge) => [edge.kind, edge.targetId, edge.attributes.hamming]),
      [
        ["repost_of", original.id, 3],
        ["mutation_of", cropped.id, 9],
      ]
    );

    const updated = store.getNode(incoming.id);
    assert.deepEqual(updated?.attributes, {
      media_url: "https://example.org/new.jpg",
      phash: "0000000000000007",
      exif: {},
      ela_available: false,
      hamming_distances: [
        { node_id: original.id, distance: 3 },
        { node_id: cropped.id, distance: 9 },
        { node_id: unrelated.id, distance: 61 },
      ],
      authenticity_score: 65,
      manipulation_probability: 25,
      quality_score: 70,
      manipulation_indicators: ["Image forensics unavailable - manual review required"],
      indicators: ["Image forensics unavailable - manual review required"],
      analyzed_at: "2025-04-01T09:00:00.000Z",
    });
    assert.deepEqual(
      events.map((event) => event.type),
      ["edge:repost_of", "edge:mutation_of", "update:report"]
    );
  });

  it("bands distances inclusively at 5 and 15", async () => {
    const distances: Array<[string, number]> = [
      ["000000000000001f", 5],
      ["000000000000003f", 6],
      ["00000000000003ff", 10],
      ["0000000000007fff", 15],
      ["000000000000ffff", 16],
      ["00000000000fffff", 20],
    ];
    const others = distances.map(([phash], i) =>
      store.createNode("report", `CASE-${i}`, { phash })
    );
    const incoming = store.createNode("report", "CASE-NEW", {
      media_url: "https://example.org/blank.jpg",
    });

    await createAgent({ mediaSource, imageHasher }).run(
      toBlackboardEvent({ action: "add_node", node: incoming })
    );

    assert.deepEqual(
      store.getOutgoingEdges(incoming.id).map((edge) => [edge.kind, edge.targetId, edge.attributes.hamming]),
      [
        ["repost_of", others[0]?.id, 5],
        ["mutation_of", others[1]?.id, 6],
        ["mutation_of", others[2]?.id, 10],
        ["mutation_of", others[3]?.id, 15],
      ]
    );
    assert.deepEqual(
      store.getNode(incoming.id)?.attributes.hamming_distances,
      others.map((other, i) => ({ node_id: other.id, distance: distances[i]?.[1] }))
    );
  });

  it("records EXIF and ELA availability from the inspector", async () => {
    const incoming = store.createNode("report", "CASE-A", {
      media_url: "https://example.org/new.jpg",
    });
    const inspected: string[] = [];

    await createAgent({
      mediaSource,
      imageHasher,
      imageInspector: {
        inspect: async (image) => {
          inspected.push(image.toString());
          return { exif: { make: "TestCam", gps: { lat: 1.5, lng: -2 } }, elaAvailable: true };
        },
      },
    }).run(toBlackboardEvent({ action: "add_node", node: incoming }));

    assert.deepEqual(inspected, ["https://example.org/new.jpg"]);
    const attributes = store.getNode(incoming.id)?.attributes;
    assert.deepEqual(attributes?.exif, { make: "TestCam", gps: { lat: 1.5, lng: -2 } });
    assert.equal(attributes?.ela_available, true);
    assert.equal(attributes?.phash, "0000000000000007");
  });

  it("keeps the hash when inspection fails", async () => {
    const incoming = store.createNode("report", "CASE-A", {
      media_url: "https://example.org/new.jpg",
    });

    await createAgent({
      mediaSource,
      imageHasher,
      imageInspector: {
        inspect: async () => {
          throw new Error("corrupt segment");
        },
      },
    }).run(toBlackboardEvent({ action: "add_node", node: incoming }));

    const attributes = store.getNode(incoming.id)?.attributes;
    assert.deepEqual(attributes?.exif, {});
    assert.equal(attributes?.ela_available, false);
    assert.equal(attributes?.phash, "0000000000000007");
  });

  it("stores scores without a hash when the media cannot be decoded", async () => {
    store.createNode("report", "CASE-A", { phash: "0000000000000000" });
    const incoming = store.createNode("report", "CASE-B", {
      media_url: "https://example.org/broken.png",
    });

    await createAgent({ mediaSource, imageHasher }).run(
      toBlackboardEvent({ action: "add_node", node: incoming })
    );

    assert.equal(store.getOutgoingEdges(incoming.id).length, 0);
    assert.equal(store.getNode(incoming.id)?.attributes.phash, null);
    assert.deepEqual(store.getNode(incoming.id)?.attributes.hamming_distances, []);
  });

  it("retries image forensics before falling back", async () => {
    let calls = 0;
    const incoming = store.createNode("report", "CASE-A", {
      media_url: "https://example.org/new.jpg",
    });

    await createAgent({
      mediaSource,
      imageHasher,
      imageForensics: {
        analyze: async () => {
          calls++;
          throw new Error("vision service down");
        },
      },
    }).run(toBlackboardEvent({ action: "add_node", node: incoming }));

    assert.equal(calls, 3);
    assert.equal(store.getNode(incoming.id)?.attributes.authenticity_score, 65);
  });

  it("uses provider scores for images", async () => {
    const incoming = store.createNode("report", "CASE-A", {
      media_url: "https://example.org/new.jpg",
      claims: [{ statement: "Flooded underpass" }],
    });
    let seenClaims: unknown;

    await createAgent({
      mediaSource,
      imageHasher,
      imageForensics: {
        analyze: async (_url, evidence) => {
          seenClaims = evidence.claims;
          return {
            authenticityScore: 90,
            manipulationProbability: 5,
            qualityScore: 80,
            manipulationIndicators: [],
          };
        },
      },
    }).run(toBlackboardEvent({ action: "add_node", node: incoming }));

    assert.deepEqual(seenClaims, ["Flooded underpass"]);
    const attributes = store.getNode(incoming.id)?.attributes;
    assert.equal(attributes?.authenticity_score, 90);
    assert.equal(attributes?.manipulation_probability, 5);
    assert.equal(attributes?.quality_score, 80);
    assert.deepEqual(attributes?.manipulation_indicators, []);
  });

  it("scores video without hashing it", async () => {
    const incoming = store.createNode("report", "CASE-A", {
      media_url: "https://example.org/clip.mp4",
    });

    await createAgent({ mediaSource, imageHasher }).run(
      toBlackboardEvent({ action: "add_node", node: incoming })
    );

    assert.deepEqual(store.getNode(incoming.id)?.attributes, {
      media_url: "https://example.org/clip.mp4",
      media_type: "video",
      summary: null,
      deepfake_probability: 20,
      manipulation_probability: 25,
      quality_score: 65,
      authenticity_score: 60,
      indicators: ["Video analysis unavailable - manual review required"],
      manipulation_indicators: ["Video analysis unavailable - manual review required"],
      analyzed_at: "2025-04-01T09:00:00.000Z",
    });
  });

  it("does nothing for reports without media", async () => {
    const incoming = store.createNode("report", "CASE-A", { text_body: "no media" });

    await createAgent({ mediaSource, imageHasher }).run(
      toBlackboardEvent({ action: "add_node", node: incoming })
    );
    await broadcaster.flush();

    assert.equal(events.length, 0);
  });
});
