/**
 * @tipboard/core
 * Core utilities shared by the Tipboard packages
 */

// Config
export {
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type Env,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  TipboardError,
  ConfigError,
  NotFoundError,
  AgentError,
  BroadcastError,
  ProviderError,
  NetworkError,
  ValidationError,
  isRetryableError,
  wrapError,
} from "./errors.js";

// Retry
export { withRetry, sleep, type RetryOptions } from "./retry.js";
