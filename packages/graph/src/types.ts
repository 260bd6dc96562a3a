/**
 * Graph Types
 * Node and edge shapes for the per-case knowledge graph
 */

import { z } from "zod";

// ============================================================
// KINDS
// ============================================================

export const NodeKindSchema = z.enum([
  "report",
  "external_source",
  "fact_check",
  "media_variant",
]);

export type NodeKind = z.infer<typeof NodeKindSchema>;

export const EdgeKindSchema = z.enum([
  "similar_to",
  "repost_of",
  "mutation_of",
  "debunked_by",
  "amplified_by",
]);

export type EdgeKind = z.infer<typeof EdgeKindSchema>;

export const EDGE_KINDS: readonly EdgeKind[] = EdgeKindSchema.options;

/**
 * Role assigned to report nodes by the classifier
 */
export type SemanticRole = "originator" | "amplifier" | "mutator" | "unwitting_sharer";

// ============================================================
// ATTRIBUTES
// ============================================================

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type Attributes = Record<string, AttributeValue>;

// ============================================================
// NODES & EDGES
// ============================================================

/**
 * Identity fields are fixed at creation; the store holds frozen copies
 */
export interface GraphNode {
  readonly id: string;
  readonly kind: NodeKind;
  readonly caseId: string;
  attributes: Attributes;
  /** ISO-8601 */
  readonly createdAt: string;
}

export interface GraphEdge {
  readonly id: string;
  readonly kind: EdgeKind;
  readonly sourceId: string;
  readonly targetId: string;
  readonly caseId: string;
  attributes: Attributes;
  /** ISO-8601 */
  readonly createdAt: string;
}

export interface DeletionResult {
  nodeId: string;
  caseId: string;
  removedEdgeCount: number;
  removedEdgeIds: string[];
}

export interface GraphStats {
  nodes: number;
  edges: number;
  cases: number;
}
