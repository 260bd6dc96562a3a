/**
 * Update Broadcaster
 * Fans every graph mutation out to live subscribers and forwards a derived
 * event to the scheduler through a single forwarding loop.
 */

import { logger, type ChildLogger } from "@tipboard/core";
import type { DeletionResult, GraphEdge, GraphNode } from "@tipboard/graph";
import type { BlackboardEvent, EventSink } from "../blackboard/types.js";
import { SubscriberSet, type Subscriber } from "./subscribers.js";

// ============================================
// TYPES
// ============================================

export type GraphMutation =
  | { action: "add_node"; node: GraphNode }
  | { action: "add_edge"; edge: GraphEdge }
  | { action: "update_node"; node: GraphNode }
  | { action: "delete_node"; deletion: DeletionResult };

export type MutationAction = GraphMutation["action"];

export interface GraphUpdateMessage {
  type: "graph_update";
  action: MutationAction;
  payload: GraphNode | GraphEdge | DeletionResult;
  /** ISO-8601 */
  timestamp: string;
}

export type GraphSubscriber = Subscriber<GraphUpdateMessage>;

export interface BroadcasterOptions {
  now?: () => Date;
}

// ============================================
// EVENT DERIVATION
// ============================================

export function toBlackboardEvent(mutation: GraphMutation): BlackboardEvent {
  switch (mutation.action) {
    case "add_node":
      return {
        type: `node:${mutation.node.kind}`,
        caseId: mutation.node.caseId,
        subject: { kind: "node", node: mutation.node },
      };
    case "add_edge":
      return {
        type: `edge:${mutation.edge.kind}`,
        caseId: mutation.edge.caseId,
        subject: { kind: "edge", edge: mutation.edge },
      };
    case "update_node":
      return {
        type: `update:${mutation.node.kind}`,
        caseId: mutation.node.caseId,
        subject: { kind: "node", node: mutation.node },
      };
    case "delete_node":
      return {
        type: "delete_node",
        caseId: mutation.deletion.caseId,
        subject: { kind: "deletion", deletion: mutation.deletion },
      };
  }
}

function payloadOf(mutation: GraphMutation): GraphUpdateMessage["payload"] {
  switch (mutation.action) {
    case "add_node":
    case "update_node":
      return mutation.node;
    case "add_edge":
      return mutation.edge;
    case "delete_node":
      return mutation.deletion;
  }
}

// ============================================
// BROADCASTER
// ============================================

export class UpdateBroadcaster {
  private readonly subscribers: SubscriberSet<GraphUpdateMessage>;
  private readonly pending: BlackboardEvent[] = [];
  private forwarding: Promise<void> | null = null;
  private target?: EventSink;

  private readonly now: () => Date;
  private readonly log: ChildLogger;

  constructor(options: BroadcasterOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.log = logger.child({ component: "broadcaster" });
    this.subscribers = new SubscriberSet(this.log);
  }

  /**
   * Route derived events to a scheduler (or detach with undefined)
   */
  connect(target: EventSink | undefined): void {
    this.target = target;
  }

  subscribe(subscriber: GraphSubscriber): () => void {
    return this.subscribers.add(subscriber);
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Nothing waiting to be forwarded
   */
  get idle(): boolean {
    return this.forwarding === null && this.pending.length === 0;
  }

  /**
   * Deliver to every subscriber, then queue the derived event for the scheduler.
   * Never throws.
   */
  async publish(mutation: GraphMutation): Promise<void> {
    const message: GraphUpdateMessage = {
      type: "graph_update",
      action: mutation.action,
      payload: payloadOf(mutation),
      timestamp: this.now().toISOString(),
    };

    await this.subscribers.deliverAll(message);

    this.pending.push(toBlackboardEvent(mutation));
    if (!this.forwarding) {
      this.forwarding = this.drain();
    }
  }

  /**
   * Resolves once every queued event has been forwarded
   */
  async flush(): Promise<void> {
    while (this.forwarding) {
      await this.forwarding;
    }
  }

  private async drain(): Promise<void> {
    try {
      while (this.pending.length > 0) {
        // Forwarding always happens after publish() has returned
        await Promise.resolve();

        const event = this.pending.shift();
        if (!event) continue;

        try {
          this.target?.notify(event);
        } catch (error) {
          this.log.warn("Scheduler notify failed", {
            caseId: event.caseId,
            eventType: event.type,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    } finally {
      this.forwarding = null;
    }
  }
}
