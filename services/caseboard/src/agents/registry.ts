/**
 * Knowledge Source Registry
 * Binds each agent to its priority, triggers, guard and cooldown
 */

import { EDGE_KINDS, reportClaims, reportMediaUrl } from "@tipboard/graph";
import {
  Priority,
  type BlackboardEvent,
  type EventType,
  type KnowledgeSourceDefinition,
} from "../blackboard/types.js";
import { ClassifierAgent } from "./classifier/index.js";
import { ClusteringAgent } from "./clustering/index.js";
import { ForensicsAgent, type ForensicsOptions } from "./forensics/index.js";
import { ForensicsXrefAgent } from "./forensics-xref/index.js";
import { NetworkAgent } from "./network/index.js";
import { ReclusterDebunkAgent } from "./recluster-debunk/index.js";
import { CaseSynthesizerAgent } from "./synthesizer/index.js";
import { eventReport, type Agent, type AgentDependencies } from "./types.js";

export interface RegistryOptions {
  forensics?: ForensicsOptions;
}

// ============================================
// GUARDS
// ============================================

function hasMedia(event: BlackboardEvent): boolean {
  const report = eventReport(event);
  return report !== undefined && reportMediaUrl(report) !== undefined;
}

function hasClaims(event: BlackboardEvent): boolean {
  const report = eventReport(event);
  return report !== undefined && reportClaims(report).length > 0;
}

function isReportOrEdge(event: BlackboardEvent): boolean {
  return event.subject.kind === "edge" || eventReport(event) !== undefined;
}

const ALL_EDGE_EVENTS: EventType[] = EDGE_KINDS.map((kind): EventType => `edge:${kind}`);

// ============================================
// REGISTRY
// ============================================

function define(
  agent: Agent,
  settings: Omit<KnowledgeSourceDefinition, "name" | "handler">
): KnowledgeSourceDefinition {
  return {
    name: agent.name,
    ...settings,
    handler: (event) => agent.run(event),
  };
}

/**
 * The seven analysis agents, in registration order
 */
export function createKnowledgeSources(
  deps: AgentDependencies,
  options: RegistryOptions = {}
): KnowledgeSourceDefinition[] {
  return [
    define(new ClusteringAgent(deps), {
      priority: Priority.Critical,
      triggers: ["node:report", "edge:repost_of", "edge:mutation_of"],
      guard: isReportOrEdge,
      cooldownMs: 2000,
    }),
    define(new ForensicsAgent(deps, options.forensics), {
      priority: Priority.High,
      triggers: ["node:report"],
      guard: hasMedia,
      cooldownMs: 2000,
    }),
    define(new ReclusterDebunkAgent(deps), {
      priority: Priority.High,
      triggers: ["edge:debunked_by"],
      cooldownMs: 1000,
    }),
    define(new NetworkAgent(deps), {
      priority: Priority.Medium,
      triggers: ["node:report"],
      cooldownMs: 1000,
    }),
    define(new ForensicsXrefAgent(deps), {
      priority: Priority.Medium,
      triggers: ["update:report"],
      guard: hasClaims,
      cooldownMs: 3000,
    }),
    define(new ClassifierAgent(deps), {
      priority: Priority.Low,
      triggers: [...ALL_EDGE_EVENTS, "node:fact_check", "node:external_source"],
      cooldownMs: 2000,
    }),
    define(new CaseSynthesizerAgent(deps), {
      priority: Priority.Background,
      triggers: ["update:report"],
      guard: hasClaims,
      cooldownMs: 5000,
    }),
  ];
}
