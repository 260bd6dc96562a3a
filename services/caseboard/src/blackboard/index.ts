export { BlackboardScheduler, type SchedulerOptions } from "./scheduler.js";
export { TaskQueue } from "./priority-queue.js";
export {
  Priority,
  type EventType,
  type EventSubject,
  type BlackboardEvent,
  type EventSink,
  type KnowledgeSourceHandler,
  type KnowledgeSourceDefinition,
  type QueuedTask,
  type SchedulerStats,
} from "./types.js";
