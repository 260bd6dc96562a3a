/**
 * Caseboard System
 * Wires the graph, broadcaster, scheduler, intake and analysis agents together
 *
 * Flow:
 * 1. Intake writes a node or edge and publishes the mutation
 * 2. The broadcaster delivers it to live subscribers, then forwards an event
 * 3. The scheduler queues every knowledge source the event fires
 * 4. Agents run one at a time and publish their own mutations, back to 2
 *
 * Officer alerts sit beside intake and read the same graph through the catalog.
 */

import { getConfig, logger, type ChildLogger } from "@tipboard/core";
import { CaseCatalog, GraphStore, type GraphStats } from "@tipboard/graph";
import { createKnowledgeSources, type RegistryOptions } from "./agents/registry.js";
import { Alerts } from "./alerts/alerts.js";
import { BlackboardScheduler, type SchedulerOptions } from "./blackboard/scheduler.js";
import type { SchedulerStats } from "./blackboard/types.js";
import { UpdateBroadcaster } from "./broadcast/broadcaster.js";
import { createClaudeExecutor } from "./executor/claude.js";
import type { IExecutor } from "./executor/types.js";
import { Intake } from "./intake/intake.js";
import { ClaudeCaseAnalyst } from "./providers/analyst/analyst.js";
import { FactCheckClient } from "./providers/factcheck.js";
import { DctImageHasher } from "./providers/image-hasher.js";
import { SharpImageInspector } from "./providers/image-inspector.js";
import { HttpMediaSource } from "./providers/media.js";
import type { Providers } from "./providers/types.js";

// ============================================
// TYPES
// ============================================

export interface CaseboardOptions {
  scheduler?: SchedulerOptions;
  agents?: RegistryOptions;
  now?: () => Date;
}

/**
 * Replaceable collaborators; anything left out is built from config
 */
export interface CaseboardDependencies {
  store: GraphStore;
  executor: IExecutor;
  providers: Providers;
}

export interface CaseboardHealth {
  status: "ok";
  knowledgeSources: number;
  schedulerRunning: boolean;
}

export interface CaseboardStats {
  graph: GraphStats;
  scheduler: SchedulerStats;
  subscribers: number;
  alertSubscribers: number;
  alerts: number;
}

// ============================================
// PROVIDERS
// ============================================

/**
 * Default providers. The claim analyst, narrator and alert composer need an Anthropic key;
 * the fact checker degrades to empty results without its own key.
 */
export function createDefaultProviders(executor?: IExecutor): Providers {
  const config = getConfig();
  const providers: Providers = {
    factChecker: new FactCheckClient(),
    mediaSource: new HttpMediaSource(),
    imageHasher: new DctImageHasher(),
    imageInspector: new SharpImageInspector(),
  };

  if (executor ?? config.providers.anthropicApiKey) {
    const analyst = new ClaudeCaseAnalyst(executor ?? createClaudeExecutor());
    providers.claimAnalyst = analyst;
    providers.caseNarrator = analyst;
    providers.alertComposer = analyst;
  }

  return providers;
}

// ============================================
// CASEBOARD SYSTEM
// ============================================

export class CaseboardSystem {
  readonly store: GraphStore;
  readonly catalog: CaseCatalog;
  readonly broadcaster: UpdateBroadcaster;
  readonly scheduler: BlackboardScheduler;
  readonly intake: Intake;
  readonly alerts: Alerts;
  readonly providers: Providers;

  private readonly log: ChildLogger;

  constructor(options: CaseboardOptions = {}, deps: Partial<CaseboardDependencies> = {}) {
    const now = options.now;

    this.store = deps.store ?? new GraphStore({ now });
    this.catalog = new CaseCatalog(this.store, { now });
    this.broadcaster = new UpdateBroadcaster({ now });
    this.scheduler = new BlackboardScheduler(options.scheduler);
    this.providers = deps.providers ?? createDefaultProviders(deps.executor);
    this.intake = new Intake({ store: this.store, broadcaster: this.broadcaster, now });
    this.alerts = new Alerts({
      catalog: this.catalog,
      composer: this.providers.alertComposer,
      now,
    });
    this.log = logger.child({ component: "caseboard" });

    const sources = createKnowledgeSources(
      { store: this.store, broadcaster: this.broadcaster, providers: this.providers, now },
      options.agents
    );
    for (const source of sources) {
      this.scheduler.register(source);
    }
    this.broadcaster.connect(this.scheduler);
  }

  start(): void {
    this.scheduler.start();
    this.log.info("Caseboard started", {
      knowledgeSources: this.scheduler.sourceCount,
      providers: Object.keys(this.providers),
    });
  }

  async stop(): Promise<void> {
    await this.broadcaster.flush();
    await this.scheduler.stop();
    this.log.info("Caseboard stopped");
  }

  /**
   * Resolves once no event is waiting to be forwarded and no task is queued
   * or running. Only meaningful while the scheduler runs.
   */
  async settle(): Promise<void> {
    for (;;) {
      await this.broadcaster.flush();
      if (!this.scheduler.running) return;
      await this.scheduler.whenIdle();
      if (this.broadcaster.idle && this.scheduler.stats().active.length === 0) return;
    }
  }

  health(): CaseboardHealth {
    return {
      status: "ok",
      knowledgeSources: this.scheduler.sourceCount,
      schedulerRunning: this.scheduler.running,
    };
  }

  stats(): CaseboardStats {
    return {
      graph: this.store.stats(),
      scheduler: this.scheduler.stats(),
      subscribers: this.broadcaster.subscriberCount,
      alertSubscribers: this.alerts.subscriberCount,
      alerts: this.alerts.list().length,
    };
  }
}

/**
 * Factory function to create a caseboard
 */
export function createCaseboard(
  options?: CaseboardOptions,
  deps?: Partial<CaseboardDependencies>
): CaseboardSystem {
  return new CaseboardSystem(options, deps);
}
