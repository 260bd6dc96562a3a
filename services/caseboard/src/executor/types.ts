/**
 * Executor Types
 * Interface for the LLM execution layer
 */

// ============================================
// EXECUTOR INTERFACE
// ============================================

/**
 * Executor interface - abstracts LLM execution
 */
export interface IExecutor {
  /**
   * Execute a prompt with given profile
   */
  execute(request: ExecutorRequest): Promise<ExecutorResponse>;

  /**
   * Check if executor is ready
   */
  isReady(): boolean;
}

// ============================================
// REQUEST / RESPONSE
// ============================================

/**
 * Model, turn limit and tools for one run
 */
export interface ExecutorProfile {
  model?: string;
  maxTurns: number;
  /** Tools the model may call; empty for pure text tasks */
  tools: string[];
}

export interface ExecutorRequest {
  prompt: string;
  systemPrompt?: string;
  profile: ExecutorProfile;
  /** Logged with the run */
  context?: Record<string, unknown>;
}

export interface ExecutorResponse {
  success: boolean;

  /** Raw text output from the model */
  output: string;

  sessionId?: string;
  costUsd: number;
  durationMs: number;
  turns: number;

  error?: {
    code: string;
    message: string;
  };
}

// ============================================
// EXECUTOR OPTIONS
// ============================================

export interface ExecutorOptions {
  /** Working directory for tools */
  cwd?: string;

  /** Attempts per request, including the first */
  retries?: number;
  backoffMs?: number;

  /** Defaults to the configured Claude model */
  model?: string;
}
