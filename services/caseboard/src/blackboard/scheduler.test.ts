import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { ConfigError, logger, type LogEntry } from "@tipboard/core";
import type { GraphNode } from "@tipboard/graph";
import { BlackboardScheduler } from "./scheduler.js";
import { Priority, type BlackboardEvent, type KnowledgeSourceDefinition } from "./types.js";

function reportEvent(caseId: string, type: BlackboardEvent["type"] = "node:report"): BlackboardEvent {
  const node: GraphNode = {
    id: `R-${caseId}`,
    kind: "report",
    caseId,
    attributes: {},
    createdAt: "2025-01-01T00:00:00.000Z",
  };
  return { type, caseId, subject: { kind: "node", node } };
}

function source(
  name: string,
  overrides: Partial<KnowledgeSourceDefinition> = {}
): KnowledgeSourceDefinition {
  return {
    name,
    priority: Priority.Medium,
    triggers: ["node:report"],
    cooldownMs: 0,
    handler: async () => {},
    ...overrides,
  };
}

async function until(predicate: () => boolean): Promise<void> {
  for (let i = 0; i < 1000 && !predicate(); i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
  assert.ok(predicate(), "condition never became true");
}

describe("BlackboardScheduler", () => {
  let now: number;
  let scheduler: BlackboardScheduler;
  let entries: LogEntry[];

  beforeEach(() => {
    now = 0;
    entries = [];
    logger.resetHandlers([(entry) => entries.push(entry)]);
    scheduler = new BlackboardScheduler({
      pollIntervalMs: 10,
      maxDispatchesPerCase: 10,
      clock: () => now,
    });
  });

  afterEach(async () => {
    await scheduler.stop();
    logger.resetHandlers();
  });

  it("rejects duplicate source names", () => {
    scheduler.register(source("clustering"));
    assert.throws(() => scheduler.register(source("clustering")), ConfigError);
    assert.equal(scheduler.sourceCount, 1);
  });

  it("ignores events without a case", () => {
    scheduler.register(source("clustering"));
    assert.equal(scheduler.notify(reportEvent("")), 0);
  });

  it("fires only sources whose triggers and guard accept the event", () => {
    scheduler.register(source("reports"));
    scheduler.register(source("edges", { triggers: ["edge:similar_to"] }));
    scheduler.register(source("guarded", { guard: () => false }));

    assert.equal(scheduler.notify(reportEvent("CASE-1")), 1);
    assert.deepEqual(scheduler.stats().active, ["reports:CASE-1"]);
  });

  it("keeps at most one pending task per source and case", () => {
    scheduler.register(source("network"));

    assert.equal(scheduler.notify(reportEvent("CASE-1")), 1);
    assert.equal(scheduler.notify(reportEvent("CASE-1")), 0);
    assert.equal(scheduler.notify(reportEvent("CASE-2")), 1);
    assert.equal(scheduler.stats().queued, 2);
  });

  it("runs queued tasks by priority, then by arrival", async () => {
    const order: string[] = [];
    const record = (name: string) => async () => {
      order.push(name);
    };

    scheduler.register(source("synthesizer", { priority: Priority.Background, handler: record("synthesizer") }));
    scheduler.register(source("network", { priority: Priority.Medium, handler: record("network") }));
    scheduler.register(source("clustering", { priority: Priority.Critical, handler: record("clustering") }));

    scheduler.notify(reportEvent("CASE-A"));
    scheduler.notify(reportEvent("CASE-B"));

    scheduler.start();
    await scheduler.whenIdle();

    assert.deepEqual(order, [
      "clustering",
      "clustering",
      "network",
      "network",
      "synthesizer",
      "synthesizer",
    ]);
  });

  it("orders tasks that arrive while the loop is waiting for work", async () => {
    const order: string[] = [];
    const record = (name: string) => async () => {
      order.push(name);
    };

    scheduler.register(
      source("synthesizer", {
        priority: Priority.Background,
        triggers: ["update:report"],
        handler: record("synthesizer"),
      })
    );
    scheduler.register(
      source("network", {
        priority: Priority.Medium,
        triggers: ["edge:similar_to"],
        handler: record("network"),
      })
    );
    scheduler.register(
      source("clustering", {
        priority: Priority.Critical,
        handler: record("clustering"),
      })
    );

    scheduler.start();
    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(scheduler.stats().queued, 0);

    scheduler.notify(reportEvent("CASE-A", "update:report"));
    scheduler.notify(reportEvent("CASE-B", "edge:similar_to"));
    scheduler.notify(reportEvent("CASE-C"));
    await scheduler.whenIdle();

    assert.deepEqual(order, ["clustering", "network", "synthesizer"]);
  });

  it("never runs two tasks at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const handler = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setImmediate(resolve));
      inFlight--;
    };

    for (const name of ["a", "b", "c"]) {
      scheduler.register(source(name, { handler }));
    }
    scheduler.start();
    for (const caseId of ["CASE-1", "CASE-2", "CASE-3"]) {
      scheduler.notify(reportEvent(caseId));
    }
    await scheduler.whenIdle();

    assert.equal(peak, 1);
  });

  it("respects the cooldown measured from the previous start", async () => {
    let runs = 0;
    scheduler.register(
      source("forensics", {
        cooldownMs: 2000,
        handler: async () => {
          runs++;
          now += 500;
        },
      })
    );
    scheduler.start();

    assert.equal(scheduler.notify(reportEvent("CASE-1")), 1);
    await scheduler.whenIdle();

    now = 1999;
    assert.equal(scheduler.notify(reportEvent("CASE-1")), 0);
    assert.equal(scheduler.notify(reportEvent("CASE-2")), 1);
    await scheduler.whenIdle();

    now = 2000;
    assert.equal(scheduler.notify(reportEvent("CASE-1")), 1);
    await scheduler.whenIdle();

    assert.equal(runs, 3);
  });

  it("stops enqueueing for a case once the dispatch cap is reached", async () => {
    const capped = new BlackboardScheduler({
      pollIntervalMs: 10,
      maxDispatchesPerCase: 3,
      clock: () => now,
    });
    capped.register(source("classifier"));
    capped.register(source("network", { triggers: ["edge:similar_to"] }));
    capped.start();

    try {
      for (let i = 0; i < 3; i++) {
        assert.equal(capped.notify(reportEvent("CASE-1")), 1);
        await capped.whenIdle();
      }

      assert.equal(capped.notify(reportEvent("CASE-1")), 0);
      assert.equal(capped.notify(reportEvent("CASE-1", "edge:similar_to")), 0);
      assert.equal(capped.notify(reportEvent("CASE-2")), 1);
      assert.equal(capped.stats().caseDispatches["CASE-1"], 3);
    } finally {
      await capped.stop();
    }
  });

  it("logs handler failures and keeps dispatching", async () => {
    const ran: string[] = [];
    scheduler.register(
      source("broken", {
        priority: Priority.Critical,
        handler: async () => {
          throw new Error("provider exploded");
        },
      })
    );
    scheduler.register(
      source("healthy", {
        handler: async () => {
          ran.push("healthy");
        },
      })
    );
    scheduler.start();

    scheduler.notify(reportEvent("CASE-1"));
    await scheduler.whenIdle();

    assert.deepEqual(ran, ["healthy"]);
    assert.deepEqual(scheduler.stats().active, []);

    const failure = entries.find((entry) => entry.level === "error");
    assert.equal(failure?.message, "Knowledge source broken failed: provider exploded");
    assert.equal(failure?.error?.name, "AgentError");
    assert.equal(failure?.context?.source, "broken");

    // The failed source can fire again for the case
    assert.equal(scheduler.notify(reportEvent("CASE-1")), 2);
  });

  it("emits a duration metric per task", async () => {
    scheduler.register(source("network"));
    scheduler.start();
    scheduler.notify(reportEvent("CASE-1"));
    await scheduler.whenIdle();

    const metric = entries.find((entry) => entry.context?.metric === "blackboard_task_ms");
    assert.equal(metric?.context?.value, 0);
    assert.equal(metric?.context?.caseId, "CASE-1");
  });

  it("lets the in-flight task finish on stop", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let started = false;
    let finished = false;

    scheduler.register(
      source("slow", {
        handler: async () => {
          started = true;
          await gate;
          finished = true;
        },
      })
    );
    scheduler.start();
    scheduler.notify(reportEvent("CASE-1"));
    await until(() => started);

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });

    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(stopped, false);
    assert.equal(scheduler.running, false);

    release();
    await stopping;

    assert.equal(finished, true);
    assert.equal(stopped, true);
  });
});
