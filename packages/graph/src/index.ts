/**
 * @tipboard/graph
 * In-memory case graph: store, ids, report accessors and case catalog
 */

export {
  NodeKindSchema,
  EdgeKindSchema,
  EDGE_KINDS,
  type NodeKind,
  type EdgeKind,
  type SemanticRole,
  type AttributeValue,
  type Attributes,
  type GraphNode,
  type GraphEdge,
  type DeletionResult,
  type GraphStats,
} from "./types.js";

export { GraphStore, type GraphStoreOptions } from "./store.js";

export {
  generateCaseId,
  generateReportId,
  generateNodeId,
  generateEdgeId,
  generateAlertId,
} from "./ids.js";

export {
  LocationSchema,
  ClaimSchema,
  reportText,
  reportLocation,
  reportBuilding,
  reportMediaUrl,
  reportPhash,
  reportClaims,
  reportUrgency,
  reportTime,
  type Location,
  type Claim,
} from "./report.js";

export {
  CaseCatalog,
  UNKNOWN_LOCATION,
  type CaseSummary,
  type CaseSnapshot,
  type CaseMetadata,
  type CaseUrgency,
  type CaseCatalogOptions,
} from "./cases.js";
