/**
 * Custom Error Types
 * Structured errors shared by the graph, scheduler and agents
 */

/**
 * Base error class for all Tipboard errors
 */
export class TipboardError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "TipboardError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends TipboardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * A node or edge id that does not exist in the graph
 */
export class NotFoundError extends TipboardError {
  public readonly entity: "node" | "edge" | "case";
  public readonly entityId: string;

  constructor(entity: "node" | "edge" | "case", entityId: string) {
    super(`${entity} ${entityId} not found`, "NOT_FOUND", {
      context: { entity, entityId },
      retryable: false,
    });
    this.name = "NotFoundError";
    this.entity = entity;
    this.entityId = entityId;
  }
}

/**
 * Knowledge source handler failure, raised at the dispatch boundary
 */
export class AgentError extends TipboardError {
  public readonly source: string;
  public readonly caseId?: string;

  constructor(
    message: string,
    source: string,
    options?: {
      cause?: Error;
      caseId?: string;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message, "AGENT_ERROR", options);
    this.name = "AgentError";
    this.source = source;
    this.caseId = options?.caseId;
  }
}

/**
 * Live subscriber delivery failure
 */
export class BroadcastError extends TipboardError {
  public readonly subscriberId: string;

  constructor(subscriberId: string, cause?: Error) {
    super(`Delivery to subscriber ${subscriberId} failed`, "BROADCAST_ERROR", {
      cause,
      context: { subscriberId },
      retryable: false,
    });
    this.name = "BroadcastError";
    this.subscriberId = subscriberId;
  }
}

/**
 * External provider (fact check, media, LLM) errors
 */
export class ProviderError extends TipboardError {
  public readonly provider: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    provider: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      context?: Record<string, unknown>;
    }
  ) {
    // Rate limits and upstream 5xx are retryable
    const status = options?.statusCode;
    const retryable = status === 429 || (status !== undefined && status >= 500);

    super(message, "PROVIDER_ERROR", { ...options, retryable });
    this.name = "ProviderError";
    this.provider = provider;
    this.statusCode = status;
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends TipboardError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Validation errors (schemas, inputs)
 */
export class ValidationError extends TipboardError {
  public readonly field?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

function isTipboardError(error: unknown): error is TipboardError {
  return error instanceof TipboardError;
}

export function isRetryableError(error: unknown): boolean {
  if (isTipboardError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a Tipboard error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): TipboardError {
  if (isTipboardError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TipboardError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new TipboardError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
