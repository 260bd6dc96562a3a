/**
 * Graph Store
 * In-memory nodes and edges for every case, with adjacency and case indexes.
 *
 * All operations are synchronous. The store holds no locks: callers share it
 * from a single event loop.
 */

import { NotFoundError, ValidationError } from "@tipboard/core";
import { generateEdgeId, generateNodeId } from "./ids.js";
import type {
  Attributes,
  DeletionResult,
  EdgeKind,
  GraphEdge,
  GraphNode,
  GraphStats,
  NodeKind,
} from "./types.js";

/** Stored prefix length when matching external source search queries */
const SEARCH_QUERY_KEY_LENGTH = 500;

export interface GraphStoreOptions {
  /** Clock for createdAt stamps, injected for tests */
  now?: () => Date;
}

export class GraphStore {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();

  // nodeId -> edge ids
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly incoming = new Map<string, Set<string>>();

  // caseId -> ids
  private readonly caseNodes = new Map<string, Set<string>>();
  private readonly caseEdges = new Map<string, Set<string>>();

  private readonly now: () => Date;

  constructor(options: GraphStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  // ============================================================
  // MUTATIONS
  // ============================================================

  addNode(node: GraphNode): GraphNode {
    if (this.nodes.has(node.id)) {
      throw new ValidationError(`Node ${node.id} already exists`, {
        field: "id",
        context: { nodeId: node.id },
      });
    }

    const stored = Object.freeze({ ...node, attributes: { ...node.attributes } });
    this.nodes.set(stored.id, stored);
    indexAdd(this.caseNodes, stored.caseId, stored.id);
    return stored;
  }

  createNode(kind: NodeKind, caseId: string, attributes: Attributes, id?: string): GraphNode {
    return this.addNode({
      id: id ?? generateNodeId(kind),
      kind,
      caseId,
      attributes,
      createdAt: this.now().toISOString(),
    });
  }

  /**
   * Add a directed edge. Both endpoints must already be in the store.
   */
  addEdge(edge: GraphEdge): GraphEdge {
    if (this.edges.has(edge.id)) {
      throw new ValidationError(`Edge ${edge.id} already exists`, {
        field: "id",
        context: { edgeId: edge.id },
      });
    }
    if (!this.nodes.has(edge.sourceId)) {
      throw new NotFoundError("node", edge.sourceId);
    }
    if (!this.nodes.has(edge.targetId)) {
      throw new NotFoundError("node", edge.targetId);
    }

    const stored = Object.freeze({ ...edge, attributes: { ...edge.attributes } });
    this.edges.set(stored.id, stored);
    indexAdd(this.outgoing, stored.sourceId, stored.id);
    indexAdd(this.incoming, stored.targetId, stored.id);
    indexAdd(this.caseEdges, stored.caseId, stored.id);
    return stored;
  }

  createEdge(
    kind: EdgeKind,
    sourceId: string,
    targetId: string,
    caseId: string,
    attributes: Attributes = {}
  ): GraphEdge {
    return this.addEdge({
      id: generateEdgeId(),
      kind,
      sourceId,
      targetId,
      caseId,
      attributes,
      createdAt: this.now().toISOString(),
    });
  }

  /**
   * Shallow-merge attributes into a node. The node object is replaced rather
   * than mutated, so earlier references keep their snapshot.
   */
  updateNode(id: string, partial: Attributes): GraphNode {
    const current = this.nodes.get(id);
    if (!current) {
      throw new NotFoundError("node", id);
    }

    const updated: GraphNode = Object.freeze({
      ...current,
      attributes: { ...current.attributes, ...partial },
    });
    this.nodes.set(id, updated);
    return updated;
  }

  /**
   * Remove a node and every edge touching it.
   */
  deleteNode(id: string): DeletionResult {
    const node = this.nodes.get(id);
    if (!node) {
      throw new NotFoundError("node", id);
    }

    const touching = new Set<string>([
      ...(this.outgoing.get(id) ?? []),
      ...(this.incoming.get(id) ?? []),
    ]);

    for (const edgeId of touching) {
      this.removeEdge(edgeId);
    }

    this.outgoing.delete(id);
    this.incoming.delete(id);
    indexRemove(this.caseNodes, node.caseId, id);
    this.nodes.delete(id);

    return {
      nodeId: id,
      caseId: node.caseId,
      removedEdgeCount: touching.size,
      removedEdgeIds: [...touching],
    };
  }

  clear(): void {
    this.nodes.clear();
    this.edges.clear();
    this.outgoing.clear();
    this.incoming.clear();
    this.caseNodes.clear();
    this.caseEdges.clear();
  }

  // ============================================================
  // QUERIES
  // ============================================================

  getNode(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  getNodesForCase(caseId: string): GraphNode[] {
    return this.resolveNodes(this.caseNodes.get(caseId));
  }

  /**
   * Nodes of one kind, optionally limited to a case. Insertion order.
   */
  getNodesByKind(kind: NodeKind, caseId?: string): GraphNode[] {
    const candidates =
      caseId === undefined ? [...this.nodes.values()] : this.getNodesForCase(caseId);
    return candidates.filter((node) => node.kind === kind);
  }

  /**
   * Outgoing edges first, then incoming.
   */
  getEdgesForNode(nodeId: string): GraphEdge[] {
    return [...this.getOutgoingEdges(nodeId), ...this.getIncomingEdges(nodeId)];
  }

  getOutgoingEdges(nodeId: string): GraphEdge[] {
    return this.resolveEdges(this.outgoing.get(nodeId));
  }

  getIncomingEdges(nodeId: string): GraphEdge[] {
    return this.resolveEdges(this.incoming.get(nodeId));
  }

  getEdgesForCase(caseId: string): GraphEdge[] {
    return this.resolveEdges(this.caseEdges.get(caseId));
  }

  /**
   * External source node in a case with the same search query, if any
   */
  findExternalSourceByQuery(caseId: string, query: string): GraphNode | undefined {
    const key = query.slice(0, SEARCH_QUERY_KEY_LENGTH);
    return this.getNodesByKind("external_source", caseId).find((node) => {
      const stored = node.attributes.search_query;
      return typeof stored === "string" && stored.slice(0, SEARCH_QUERY_KEY_LENGTH) === key;
    });
  }

  /**
   * Report nodes (all cases) carrying a perceptual hash
   */
  getReportsWithHash(excludeId?: string): GraphNode[] {
    return this.getNodesByKind("report").filter((node) => {
      if (node.id === excludeId) return false;
      const hash = node.attributes.phash;
      return typeof hash === "string" && hash.length > 0;
    });
  }

  /**
   * Every case id with at least one node or edge
   */
  listCaseIds(): string[] {
    return [...new Set([...this.caseNodes.keys(), ...this.caseEdges.keys()])];
  }

  stats(): GraphStats {
    return {
      nodes: this.nodes.size,
      edges: this.edges.size,
      cases: this.listCaseIds().length,
    };
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private removeEdge(edgeId: string): void {
    const edge = this.edges.get(edgeId);
    if (!edge) return;

    indexRemove(this.outgoing, edge.sourceId, edgeId);
    indexRemove(this.incoming, edge.targetId, edgeId);
    indexRemove(this.caseEdges, edge.caseId, edgeId);
    this.edges.delete(edgeId);
  }

  private resolveNodes(ids: Set<string> | undefined): GraphNode[] {
    if (!ids) return [];
    const result: GraphNode[] = [];
    for (const id of ids) {
      const node = this.nodes.get(id);
      if (node) result.push(node);
    }
    return result;
  }

  private resolveEdges(ids: Set<string> | undefined): GraphEdge[] {
    if (!ids) return [];
    const result: GraphEdge[] = [];
    for (const id of ids) {
      const edge = this.edges.get(id);
      if (edge) result.push(edge);
    }
    return result;
  }
}

function indexAdd(index: Map<string, Set<string>>, key: string, value: string): void {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = new Set<string>();
    index.set(key, bucket);
  }
  bucket.add(value);
}

function indexRemove(index: Map<string, Set<string>>, key: string, value: string): void {
  const bucket = index.get(key);
  if (!bucket) return;
  bucket.delete(value);
  if (bucket.size === 0) {
    index.delete(key);
  }
}
