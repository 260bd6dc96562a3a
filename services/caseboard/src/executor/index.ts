export { ClaudeExecutor, createClaudeExecutor } from "./claude.js";
export type {
  IExecutor,
  ExecutorProfile,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
} from "./types.js";
