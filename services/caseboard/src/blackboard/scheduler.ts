/**
 * Blackboard Scheduler
 * Decides which knowledge source runs next after every graph mutation.
 *
 * - notify() evaluates every source against trigger, guard, active and cooldown rules
 * - one dispatch loop runs tasks one at a time, lowest (priority, sequence) first
 * - at most one queued or running task per (source, case)
 * - a per-case dispatch counter stops cascades once it reaches the cap; it never resets
 */

import {
  AgentError,
  ConfigError,
  getConfig,
  logger,
  type ChildLogger,
} from "@tipboard/core";
import { TaskQueue } from "./priority-queue.js";
import type {
  BlackboardEvent,
  EventSink,
  KnowledgeSourceDefinition,
  QueuedTask,
  SchedulerStats,
} from "./types.js";

export interface SchedulerOptions {
  /** Longest wait for a task before re-checking the running flag */
  pollIntervalMs?: number;
  maxDispatchesPerCase?: number;
  /** Monotonic milliseconds */
  clock?: () => number;
}

interface RegisteredSource extends KnowledgeSourceDefinition {
  /** caseId -> clock value at the start of the last run */
  lastRun: Map<string, number>;
}

function activeKey(sourceName: string, caseId: string): string {
  return `${sourceName}:${caseId}`;
}

export class BlackboardScheduler implements EventSink {
  private readonly sources = new Map<string, RegisteredSource>();
  private readonly queue = new TaskQueue();
  private readonly active = new Set<string>();
  private readonly caseDispatches = new Map<string, number>();

  private readonly pollIntervalMs: number;
  private readonly maxDispatchesPerCase: number;
  private readonly clock: () => number;
  private readonly log: ChildLogger;

  private isRunning = false;
  private loop?: Promise<void>;
  private executing?: QueuedTask;
  private sequence = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: SchedulerOptions = {}) {
    const config = getConfig().scheduler;

    this.pollIntervalMs = options.pollIntervalMs ?? config.pollIntervalMs;
    this.maxDispatchesPerCase = options.maxDispatchesPerCase ?? config.maxDispatchesPerCase;
    this.clock = options.clock ?? (() => performance.now());
    this.log = logger.child({ component: "blackboard" });
  }

  // ============================================
  // REGISTRATION
  // ============================================

  register(definition: KnowledgeSourceDefinition): void {
    if (this.sources.has(definition.name)) {
      throw new ConfigError(`Knowledge source ${definition.name} is already registered`, {
        source: definition.name,
      });
    }
    this.sources.set(definition.name, { ...definition, lastRun: new Map() });
  }

  get sourceCount(): number {
    return this.sources.size;
  }

  get running(): boolean {
    return this.isRunning;
  }

  // ============================================
  // NOTIFY
  // ============================================

  /**
   * Enqueue every source the event fires. Returns the number of tasks enqueued.
   */
  notify(event: BlackboardEvent): number {
    const { caseId } = event;
    if (!caseId) return 0;

    const dispatched = this.caseDispatches.get(caseId) ?? 0;
    if (dispatched >= this.maxDispatchesPerCase) {
      this.log.debug("Dispatch cap reached, dropping event", {
        caseId,
        eventType: event.type,
        dispatched,
      });
      return 0;
    }

    const now = this.clock();
    let enqueued = 0;

    for (const source of this.sources.values()) {
      if (!this.canFire(source, event, now)) continue;

      this.active.add(activeKey(source.name, caseId));
      this.caseDispatches.set(caseId, (this.caseDispatches.get(caseId) ?? 0) + 1);

      this.queue.push({
        priority: source.priority,
        sequence: ++this.sequence,
        sourceName: source.name,
        caseId,
        event,
        enqueuedAt: now,
      });
      enqueued++;
    }

    if (enqueued > 0) {
      this.log.debug(`Enqueued ${enqueued} task(s)`, { caseId, eventType: event.type });
    }
    return enqueued;
  }

  private canFire(source: RegisteredSource, event: BlackboardEvent, now: number): boolean {
    if (!source.triggers.includes(event.type)) return false;
    if (source.guard && !source.guard(event)) return false;
    if (this.active.has(activeKey(source.name, event.caseId))) return false;

    const lastRun = source.lastRun.get(event.caseId);
    if (lastRun !== undefined && now - lastRun < source.cooldownMs) return false;

    return true;
  }

  // ============================================
  // DISPATCH LOOP
  // ============================================

  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.log.info("Blackboard scheduler started", { sources: this.sources.size });
    this.loop = this.run();
  }

  /**
   * Stop after the in-flight task, if any, finishes
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;
    this.queue.wake();
    await this.loop;
    this.loop = undefined;
    this.releaseIdleWaiters();
    this.log.info("Blackboard scheduler stopped");
  }

  /**
   * Resolves once nothing is queued or executing
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async run(): Promise<void> {
    while (this.isRunning) {
      const task = await this.queue.take(this.pollIntervalMs);
      if (!task) continue;

      await this.execute(task);

      if (this.isIdle()) {
        this.releaseIdleWaiters();
      }
    }
  }

  private async execute(task: QueuedTask): Promise<void> {
    const key = activeKey(task.sourceName, task.caseId);
    const source = this.sources.get(task.sourceName);
    const log = this.log.child({ source: task.sourceName, caseId: task.caseId });

    if (!source) {
      this.active.delete(key);
      return;
    }

    this.executing = task;
    const startedAt = this.clock();
    source.lastRun.set(task.caseId, startedAt);
    log.debug("Task started", {
      eventType: task.event.type,
      waitedMs: Math.round(startedAt - task.enqueuedAt),
    });

    try {
      await source.handler(task.event);
      log.debug("Task finished");
    } catch (error) {
      const failure = new AgentError(
        `Knowledge source ${task.sourceName} failed: ${error instanceof Error ? error.message : String(error)}`,
        task.sourceName,
        {
          caseId: task.caseId,
          cause: error instanceof Error ? error : undefined,
          context: { eventType: task.event.type },
        }
      );
      log.error(failure.message, failure);
    } finally {
      this.active.delete(key);
      this.executing = undefined;
      log.metric("blackboard_task_ms", Math.round(this.clock() - startedAt));
    }
  }

  // ============================================
  // INTROSPECTION
  // ============================================

  stats(): SchedulerStats {
    return {
      sources: this.sources.size,
      running: this.isRunning,
      queued: this.queue.size,
      active: [...this.active],
      executing: this.executing
        ? activeKey(this.executing.sourceName, this.executing.caseId)
        : undefined,
      caseDispatches: Object.fromEntries(this.caseDispatches),
    };
  }

  // Active keys cover queued and executing tasks
  private isIdle(): boolean {
    return this.active.size === 0;
  }

  private releaseIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
