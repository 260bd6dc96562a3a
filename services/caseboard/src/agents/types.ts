/**
 * Agent Types
 * Dependencies shared by every knowledge source
 */

import type { GraphNode, GraphStore } from "@tipboard/graph";
import type { BlackboardEvent } from "../blackboard/types.js";
import type { UpdateBroadcaster } from "../broadcast/broadcaster.js";
import type { Providers } from "../providers/types.js";

// ============================================
// AGENT DEPENDENCIES
// ============================================

export interface AgentDependencies {
  store: GraphStore;
  broadcaster: UpdateBroadcaster;
  providers: Providers;
  /** Clock for `analyzed_at` stamps */
  now?: () => Date;
}

/**
 * A knowledge source implementation. `run` is the scheduler handler.
 */
export interface Agent {
  readonly name: string;
  run(event: BlackboardEvent): Promise<void>;
}

// ============================================
// EVENT HELPERS
// ============================================

/**
 * The report node an event is about, if it is about one
 */
export function eventReport(event: BlackboardEvent): GraphNode | undefined {
  if (event.subject.kind !== "node") return undefined;
  return event.subject.node.kind === "report" ? event.subject.node : undefined;
}
