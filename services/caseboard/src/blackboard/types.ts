/**
 * Blackboard Types
 * Events, knowledge sources and queued work for the scheduler
 */

import type {
  DeletionResult,
  EdgeKind,
  GraphEdge,
  GraphNode,
  NodeKind,
} from "@tipboard/graph";

// ============================================
// PRIORITY
// ============================================

/**
 * Lower value runs first
 */
export const Priority = {
  Critical: 0,
  High: 1,
  Medium: 2,
  Low: 3,
  Background: 4,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

// ============================================
// EVENTS
// ============================================

export type EventType =
  | `node:${NodeKind}`
  | `edge:${EdgeKind}`
  | `update:${NodeKind}`
  | "delete_node";

/**
 * What the mutation touched
 */
export type EventSubject =
  | { kind: "node"; node: GraphNode }
  | { kind: "edge"; edge: GraphEdge }
  | { kind: "deletion"; deletion: DeletionResult };

/**
 * Graph mutation as seen by the scheduler
 */
export interface BlackboardEvent {
  type: EventType;
  caseId: string;
  subject: EventSubject;
}

// ============================================
// KNOWLEDGE SOURCES
// ============================================

export type KnowledgeSourceHandler = (event: BlackboardEvent) => Promise<void>;

/**
 * Static description of an analysis agent
 */
export interface KnowledgeSourceDefinition {
  /** Unique name */
  name: string;

  priority: Priority;

  /** Event types that can fire this source */
  triggers: readonly EventType[];

  /** Extra acceptance check over the event */
  guard?: (event: BlackboardEvent) => boolean;

  /** Minimum time between runs for the same case */
  cooldownMs: number;

  handler: KnowledgeSourceHandler;
}

// ============================================
// QUEUE
// ============================================

export interface QueuedTask {
  priority: Priority;
  /** Monotonic tiebreaker within a priority */
  sequence: number;
  sourceName: string;
  caseId: string;
  event: BlackboardEvent;
  enqueuedAt: number;
}

export interface SchedulerStats {
  sources: number;
  running: boolean;
  queued: number;
  active: string[];
  /** Active key of the running task */
  executing?: string;
  caseDispatches: Record<string, number>;
}

/**
 * Anything that accepts forwarded graph events
 */
export interface EventSink {
  notify(event: BlackboardEvent): number | void;
}
