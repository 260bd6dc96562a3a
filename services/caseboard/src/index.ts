/**
 * @tipboard/caseboard
 * Blackboard scheduler and analysis agents over the case graph
 */

export {
  CaseboardSystem,
  createCaseboard,
  createDefaultProviders,
  type CaseboardOptions,
  type CaseboardDependencies,
  type CaseboardHealth,
  type CaseboardStats,
} from "./system.js";

export * from "./blackboard/index.js";
export * from "./broadcast/index.js";
export * from "./intake/index.js";
export * from "./alerts/index.js";
export * from "./executor/index.js";
export * from "./providers/index.js";
export * from "./agents/index.js";
