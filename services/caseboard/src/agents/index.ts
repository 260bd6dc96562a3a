/**
 * Analysis agents
 */

export { eventReport, type Agent, type AgentDependencies } from "./types.js";
export { createKnowledgeSources, type RegistryOptions } from "./registry.js";
export * from "./clustering/index.js";
export * from "./forensics/index.js";
export * from "./network/index.js";
export * from "./forensics-xref/index.js";
export * from "./recluster-debunk/index.js";
export * from "./classifier/index.js";
export * from "./synthesizer/index.js";
