/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

const envSchema = z.object({
  // Scheduler
  SCHEDULER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(500),
  SCHEDULER_MAX_DISPATCHES_PER_CASE: z.coerce.number().int().positive().default(10),

  // Media
  MEDIA_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  UPLOAD_DIR: z.string().default("/tmp/tipboard-uploads"),

  // Providers
  FACTCHECK_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  CLAUDE_MODEL: z.string().default("claude-sonnet-4-20250514"),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  scheduler: {
    pollIntervalMs: number;
    maxDispatchesPerCase: number;
  };

  media: {
    fetchTimeoutMs: number;
    uploadDir: string;
  };

  providers: {
    factCheckApiKey?: string;
    anthropicApiKey?: string;
    claudeModel: string;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    nodeEnv: "development" | "production" | "test";
  };
}

/**
 * Load and validate configuration from a source (defaults to process.env)
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): Config {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  return {
    scheduler: {
      pollIntervalMs: env.SCHEDULER_POLL_INTERVAL_MS,
      maxDispatchesPerCase: env.SCHEDULER_MAX_DISPATCHES_PER_CASE,
    },

    media: {
      fetchTimeoutMs: env.MEDIA_FETCH_TIMEOUT_MS,
      uploadDir: env.UPLOAD_DIR,
    },

    providers: {
      // Empty strings from .env files count as unset
      factCheckApiKey: env.FACTCHECK_API_KEY || undefined,
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      claudeModel: env.CLAUDE_MODEL,
    },

    env: {
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV,
    },
  };
}

let configInstance: Config | null = null;

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Drop the cached config so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  configInstance = null;
}
