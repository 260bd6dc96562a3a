/**
 * Claude Executor
 * Implementation using Claude Agent SDK
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import {
  ProviderError,
  getConfig,
  logger,
  withRetry,
  type ChildLogger,
} from "@tipboard/core";
import type {
  IExecutor,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
} from "./types.js";

/**
 * Overload and rate-limit failures from the SDK surface as plain errors
 */
function isTransient(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("rate limit") ||
      message.includes("overloaded") ||
      message.includes("529") ||
      message.includes("503")
    );
  }
  return false;
}

/**
 * Claude SDK Executor
 */
export class ClaudeExecutor implements IExecutor {
  private readonly cwd: string;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly model: string;
  private readonly log: ChildLogger;

  constructor(options: ExecutorOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.retries = options.retries ?? 2;
    this.backoffMs = options.backoffMs ?? 1000;
    this.model = options.model ?? getConfig().providers.claudeModel;
    this.log = logger.child({ component: "claude-executor" });
  }

  isReady(): boolean {
    return !!getConfig().providers.anthropicApiKey;
  }

  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    const startTime = Date.now();

    try {
      return await withRetry(() => this.executeOnce(request, startTime), {
        attempts: this.retries,
        backoffMs: this.backoffMs,
        log: this.log.child({ ...request.context }),
      });
    } catch (error) {
      return {
        success: false,
        output: "",
        costUsd: 0,
        durationMs: Date.now() - startTime,
        turns: 0,
        error: {
          code: "EXECUTOR_ERROR",
          message: error instanceof Error ? error.message : "Unknown error",
        },
      };
    }
  }

  /**
   * Execute once (no retries)
   */
  private async executeOnce(
    request: ExecutorRequest,
    startTime: number
  ): Promise<ExecutorResponse> {
    const { prompt, systemPrompt, profile } = request;

    const options: Options = {
      systemPrompt,
      model: profile.model ?? this.model,
      allowedTools: profile.tools,
      maxTurns: profile.maxTurns,
      permissionMode: "bypassPermissions",
      cwd: this.cwd,
    };

    let output = "";
    let sessionId: string | undefined;
    let costUsd = 0;
    let durationMs = 0;
    let turns = 0;

    try {
      for await (const message of query({ prompt, options })) {
        if (message.type === "assistant") {
          for (const block of message.message.content) {
            if (block.type === "text") {
              output += block.text;
            }
          }
          turns++;
        } else if (message.type === "result") {
          if (message.subtype === "success") {
            costUsd = message.total_cost_usd;
            durationMs = message.duration_ms;
            sessionId = message.session_id;

            if (!output && message.result) {
              output = message.result;
            }
          } else {
            throw new ProviderError(`Claude run ended with ${message.subtype}`, "claude", {
              context: { maxTurns: profile.maxTurns },
            });
          }
        }
      }
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (isTransient(error)) {
        throw new ProviderError(
          error instanceof Error ? error.message : String(error),
          "claude",
          { statusCode: 503, cause: error instanceof Error ? error : undefined }
        );
      }
      throw error;
    }

    return {
      success: true,
      output,
      sessionId,
      costUsd,
      durationMs: durationMs || Date.now() - startTime,
      turns,
    };
  }
}

/**
 * Create a Claude executor with default options
 */
export function createClaudeExecutor(options?: ExecutorOptions): IExecutor {
  return new ClaudeExecutor(options);
}
